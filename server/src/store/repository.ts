import type {
  ActivityAction,
  ActivityLogRow,
  HuntRow,
  MessageRow,
  PersonRow,
  PuzzleRow,
  PuzzleUnlockEdgeRow,
  ResponseRow,
  SolveRow,
  SubmissionRow,
  TeamRow,
  TeamUnlockableRow,
  UnlockableRow,
  UnlockRow,
} from '../types.js';

export type NewHunt = Omit<HuntRow, 'id' | 'is_current'>;
export type HuntPatch = Partial<Omit<HuntRow, 'id' | 'is_current'>>;
export type NewTeam = Omit<TeamRow, 'id'>;
export type NewSubmission = Omit<SubmissionRow, 'id'>;
export type NewSolve = Omit<SolveRow, 'id'>;
export type NewUnlock = Omit<UnlockRow, 'id'>;
export type NewMessage = Omit<MessageRow, 'id'>;

export interface NewActivity {
  action: ActivityAction;
  huntId?: string | null;
  teamId?: string | null;
  personId?: string | null;
  details?: unknown;
  createdAt: string;
}

export interface SolveInsertResult {
  created: boolean;
  solve: SolveRow;
}

/**
 * Storage seam for the hunt core. Every method is a single round trip; the
 * ones documented as atomic must not expose intermediate state to concurrent
 * callers.
 */
export interface HuntRepository {
  listHunts(): Promise<HuntRow[]>;
  getHunt(huntId: string): Promise<HuntRow | null>;
  listCurrentHunts(): Promise<HuntRow[]>;
  /** Rejects with a ConflictError when the hunt number is taken. */
  insertHunt(input: NewHunt): Promise<HuntRow>;
  updateHunt(huntId: string, patch: HuntPatch): Promise<HuntRow>;
  /**
   * Atomic: clears every other current flag and sets the target's. Resolves
   * with the hunts flagged current once the change is committed.
   */
  setCurrentHunt(huntId: string): Promise<HuntRow[]>;

  getPuzzle(puzzleId: string): Promise<PuzzleRow | null>;
  listPuzzles(huntId: string): Promise<PuzzleRow[]>;
  listUnlockEdges(huntId: string): Promise<PuzzleUnlockEdgeRow[]>;
  /** Ordered by position, then creation order. */
  listResponses(puzzleId: string): Promise<ResponseRow[]>;
  listUnlockables(puzzleId: string): Promise<UnlockableRow[]>;

  getPerson(personId: string): Promise<PersonRow | null>;
  getTeam(teamId: string): Promise<TeamRow | null>;
  /** Exact lookup on {@link teamNameKey} within a hunt. */
  findTeamByName(huntId: string, name: string): Promise<TeamRow | null>;
  listTeams(huntId: string): Promise<TeamRow[]>;
  findTeamForPerson(huntId: string, personId: string): Promise<TeamRow | null>;
  insertTeam(input: NewTeam): Promise<TeamRow>;
  setPlaytester(teamId: string, playtester: boolean): Promise<TeamRow>;
  listMemberIds(teamId: string): Promise<string[]>;
  /** Idempotent. */
  addMember(teamId: string, personId: string): Promise<void>;
  removeMember(teamId: string, personId: string): Promise<void>;

  getSubmission(submissionId: string): Promise<SubmissionRow | null>;
  insertSubmission(input: NewSubmission): Promise<SubmissionRow>;
  updateSubmissionResponse(submissionId: string, responseText: string, modifiedAt: string): Promise<SubmissionRow>;
  /** Newest first. */
  listSubmissions(teamId: string, puzzleId: string): Promise<SubmissionRow[]>;

  /**
   * Guarded by the (team, puzzle) unique constraint. A losing insert resolves
   * with the existing row and `created: false`.
   */
  insertSolve(input: NewSolve): Promise<SolveInsertResult>;
  listSolves(teamId: string): Promise<SolveRow[]>;
  listSolvesForTeams(teamIds: string[]): Promise<SolveRow[]>;
  listUnlocks(teamId: string): Promise<UnlockRow[]>;
  /** Skips pairs that already exist and resolves with the rows it created. */
  insertUnlocks(rows: NewUnlock[]): Promise<UnlockRow[]>;

  /** Skips pairs that already exist and resolves with the rows it created. */
  releaseUnlockables(rows: TeamUnlockableRow[]): Promise<TeamUnlockableRow[]>;
  listTeamUnlockables(teamId: string): Promise<Array<TeamUnlockableRow & { unlockable: UnlockableRow }>>;

  insertMessage(input: NewMessage): Promise<MessageRow>;
  /** Oldest first. */
  listMessages(teamId: string): Promise<MessageRow[]>;

  insertActivity(input: NewActivity): Promise<ActivityLogRow>;
}

/** Team names are unique per hunt by this key; it matches the `name_key` column. */
export function teamNameKey(name: string) {
  return name.toLowerCase();
}
