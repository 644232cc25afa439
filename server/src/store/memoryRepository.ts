import { randomUUID } from 'node:crypto';
import { ConflictError, NotFoundError } from '../utils/errors.js';
import type {
  ActivityLogRow,
  HuntRow,
  MessageRow,
  PersonRow,
  PuzzleRow,
  PuzzleUnlockEdgeRow,
  ResponseRow,
  SolveRow,
  SubmissionRow,
  TeamMemberRow,
  TeamRow,
  TeamUnlockableRow,
  UnlockableRow,
  UnlockRow,
} from '../types.js';
import { teamNameKey, type HuntRepository } from './repository.js';

export interface MemorySeed {
  hunts?: HuntRow[];
  puzzles?: PuzzleRow[];
  edges?: PuzzleUnlockEdgeRow[];
  responses?: ResponseRow[];
  unlockables?: UnlockableRow[];
  people?: PersonRow[];
  teams?: TeamRow[];
  members?: TeamMemberRow[];
}

export interface MemoryRepository extends HuntRepository {
  /** Raw table contents, for assertions. */
  readonly tables: MemoryTables;
}

export interface MemoryTables {
  hunts: HuntRow[];
  puzzles: PuzzleRow[];
  edges: PuzzleUnlockEdgeRow[];
  responses: ResponseRow[];
  unlockables: UnlockableRow[];
  people: PersonRow[];
  teams: TeamRow[];
  members: TeamMemberRow[];
  submissions: SubmissionRow[];
  solves: SolveRow[];
  unlocks: UnlockRow[];
  teamUnlockables: TeamUnlockableRow[];
  messages: MessageRow[];
  activity: ActivityLogRow[];
}

function copy<T extends object>(row: T): T {
  return { ...row };
}

function byTime<T>(pick: (row: T) => string) {
  return (a: T, b: T) => Date.parse(pick(a)) - Date.parse(pick(b));
}

/**
 * In-process store with the same constraints as the Postgres schema. No
 * method awaits between its read and its write, so each call is atomic with
 * respect to other callers on the event loop.
 */
export function createMemoryRepository(seed: MemorySeed = {}): MemoryRepository {
  const tables: MemoryTables = {
    hunts: (seed.hunts ?? []).map(copy),
    puzzles: (seed.puzzles ?? []).map(copy),
    edges: (seed.edges ?? []).map(copy),
    responses: (seed.responses ?? []).map(copy),
    unlockables: (seed.unlockables ?? []).map(copy),
    people: (seed.people ?? []).map(copy),
    teams: (seed.teams ?? []).map(copy),
    members: (seed.members ?? []).map(copy),
    submissions: [],
    solves: [],
    unlocks: [],
    teamUnlockables: [],
    messages: [],
    activity: [],
  };

  function requireHunt(huntId: string) {
    const hunt = tables.hunts.find((row) => row.id === huntId);
    if (!hunt) {
      throw new NotFoundError('Hunt not found');
    }
    return hunt;
  }

  function sameName(a: string, b: string) {
    return teamNameKey(a) === teamNameKey(b);
  }

  return {
    tables,

    async listHunts() {
      return tables.hunts.map(copy).sort((a, b) => a.number - b.number);
    },

    async getHunt(huntId) {
      const hunt = tables.hunts.find((row) => row.id === huntId);
      return hunt ? copy(hunt) : null;
    },

    async listCurrentHunts() {
      return tables.hunts.filter((row) => row.is_current).map(copy);
    },

    async insertHunt(input) {
      if (tables.hunts.some((row) => row.number === input.number)) {
        throw new ConflictError('ALREADY_EXISTS', 'A hunt with this number already exists');
      }
      const hunt: HuntRow = { ...input, id: randomUUID(), is_current: false };
      tables.hunts.push(hunt);
      return copy(hunt);
    },

    async updateHunt(huntId, patch) {
      const hunt = requireHunt(huntId);
      if (patch.number !== undefined && tables.hunts.some((row) => row.id !== huntId && row.number === patch.number)) {
        throw new ConflictError('ALREADY_EXISTS', 'A hunt with this number already exists');
      }
      Object.assign(hunt, patch);
      return copy(hunt);
    },

    async setCurrentHunt(huntId) {
      requireHunt(huntId);
      for (const row of tables.hunts) {
        row.is_current = row.id === huntId;
      }
      return tables.hunts.filter((row) => row.is_current).map(copy);
    },

    async getPuzzle(puzzleId) {
      const puzzle = tables.puzzles.find((row) => row.id === puzzleId);
      return puzzle ? copy(puzzle) : null;
    },

    async listPuzzles(huntId) {
      return tables.puzzles
        .filter((row) => row.hunt_id === huntId)
        .map(copy)
        .sort((a, b) => a.number - b.number);
    },

    async listUnlockEdges(huntId) {
      const puzzleIds = new Set(tables.puzzles.filter((row) => row.hunt_id === huntId).map((row) => row.id));
      return tables.edges.filter((edge) => puzzleIds.has(edge.puzzle_id)).map(copy);
    },

    async listResponses(puzzleId) {
      return tables.responses
        .filter((row) => row.puzzle_id === puzzleId)
        .map(copy)
        .sort((a, b) => a.position - b.position);
    },

    async listUnlockables(puzzleId) {
      return tables.unlockables.filter((row) => row.puzzle_id === puzzleId).map(copy);
    },

    async getPerson(personId) {
      const person = tables.people.find((row) => row.id === personId);
      return person ? copy(person) : null;
    },

    async getTeam(teamId) {
      const team = tables.teams.find((row) => row.id === teamId);
      return team ? copy(team) : null;
    },

    async findTeamByName(huntId, name) {
      const team = tables.teams.find((row) => row.hunt_id === huntId && sameName(row.name, name));
      return team ? copy(team) : null;
    },

    async listTeams(huntId) {
      return tables.teams
        .filter((row) => row.hunt_id === huntId)
        .map(copy)
        .sort((a, b) => a.name.localeCompare(b.name));
    },

    async findTeamForPerson(huntId, personId) {
      const teamIds = new Set(tables.members.filter((row) => row.person_id === personId).map((row) => row.team_id));
      const team = tables.teams.find((row) => row.hunt_id === huntId && teamIds.has(row.id));
      return team ? copy(team) : null;
    },

    async insertTeam(input) {
      requireHunt(input.hunt_id);
      if (tables.teams.some((row) => row.hunt_id === input.hunt_id && sameName(row.name, input.name))) {
        throw new ConflictError('ALREADY_EXISTS', 'A team with this name already exists');
      }
      const team: TeamRow = { ...input, id: randomUUID() };
      tables.teams.push(team);
      return copy(team);
    },

    async setPlaytester(teamId, playtester) {
      const team = tables.teams.find((row) => row.id === teamId);
      if (!team) {
        throw new NotFoundError('Team not found');
      }
      team.playtester = playtester;
      return copy(team);
    },

    async listMemberIds(teamId) {
      return tables.members.filter((row) => row.team_id === teamId).map((row) => row.person_id);
    },

    async addMember(teamId, personId) {
      if (!tables.members.some((row) => row.team_id === teamId && row.person_id === personId)) {
        tables.members.push({ team_id: teamId, person_id: personId });
      }
    },

    async removeMember(teamId, personId) {
      tables.members = tables.members.filter((row) => !(row.team_id === teamId && row.person_id === personId));
    },

    async getSubmission(submissionId) {
      const submission = tables.submissions.find((row) => row.id === submissionId);
      return submission ? copy(submission) : null;
    },

    async insertSubmission(input) {
      const submission: SubmissionRow = { ...input, id: randomUUID() };
      tables.submissions.push(submission);
      return copy(submission);
    },

    async updateSubmissionResponse(submissionId, responseText, modifiedAt) {
      const submission = tables.submissions.find((row) => row.id === submissionId);
      if (!submission) {
        throw new NotFoundError('Submission not found');
      }
      submission.response_text = responseText;
      submission.modified_at = modifiedAt;
      return copy(submission);
    },

    async listSubmissions(teamId, puzzleId) {
      return tables.submissions
        .filter((row) => row.team_id === teamId && row.puzzle_id === puzzleId)
        .map(copy)
        .reverse()
        .sort((a, b) => Date.parse(b.submitted_at) - Date.parse(a.submitted_at));
    },

    async insertSolve(input) {
      const existing = tables.solves.find((row) => row.team_id === input.team_id && row.puzzle_id === input.puzzle_id);
      if (existing) {
        return { created: false, solve: copy(existing) };
      }
      const solve: SolveRow = { ...input, id: randomUUID() };
      tables.solves.push(solve);
      return { created: true, solve: copy(solve) };
    },

    async listSolves(teamId) {
      return tables.solves.filter((row) => row.team_id === teamId).map(copy);
    },

    async listSolvesForTeams(teamIds) {
      const wanted = new Set(teamIds);
      return tables.solves.filter((row) => wanted.has(row.team_id)).map(copy);
    },

    async listUnlocks(teamId) {
      return tables.unlocks.filter((row) => row.team_id === teamId).map(copy);
    },

    async insertUnlocks(rows) {
      const created: UnlockRow[] = [];
      for (const input of rows) {
        if (tables.unlocks.some((row) => row.team_id === input.team_id && row.puzzle_id === input.puzzle_id)) {
          continue;
        }
        const unlock: UnlockRow = { ...input, id: randomUUID() };
        tables.unlocks.push(unlock);
        created.push(copy(unlock));
      }
      return created;
    },

    async releaseUnlockables(rows) {
      const created: TeamUnlockableRow[] = [];
      for (const input of rows) {
        const exists = tables.teamUnlockables.some(
          (row) => row.team_id === input.team_id && row.unlockable_id === input.unlockable_id,
        );
        if (!exists) {
          tables.teamUnlockables.push(copy(input));
          created.push(copy(input));
        }
      }
      return created;
    },

    async listTeamUnlockables(teamId) {
      return tables.teamUnlockables
        .filter((row) => row.team_id === teamId)
        .sort(byTime<TeamUnlockableRow>((row) => row.released_at))
        .flatMap((release) => {
          const unlockable = tables.unlockables.find((row) => row.id === release.unlockable_id);
          return unlockable ? [{ ...release, unlockable: copy(unlockable) }] : [];
        });
    },

    async insertMessage(input) {
      const message: MessageRow = { ...input, id: randomUUID() };
      tables.messages.push(message);
      return copy(message);
    },

    async listMessages(teamId) {
      return tables.messages
        .filter((row) => row.team_id === teamId)
        .map(copy)
        .sort(byTime<MessageRow>((row) => row.sent_at));
    },

    async insertActivity(input) {
      const row: ActivityLogRow = {
        id: randomUUID(),
        action: input.action,
        hunt_id: input.huntId ?? null,
        team_id: input.teamId ?? null,
        person_id: input.personId ?? null,
        details: input.details ?? null,
        created_at: input.createdAt,
      };
      tables.activity.push(row);
      return copy(row);
    },
  };
}
