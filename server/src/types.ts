export type UserRole = 'player' | 'staff';

export type TeamKind = 'playtester' | 'normal';

export type PuzzleState = 'LOCKED' | 'UNLOCKED' | 'SOLVED';

export type FailureReason =
  | 'ALREADY_EXISTS'
  | 'ALREADY_ON_TEAM'
  | 'FULL'
  | 'BAD_CODE'
  | 'HUNT_LOCKED'
  | 'PUZZLE_LOCKED';

export interface HuntRow {
  id: string;
  name: string;
  number: number;
  team_size: number;
  starts_at: string;
  ends_at: string;
  location: string;
  is_current: boolean;
}

export interface PuzzleRow {
  id: string; // external hex id
  hunt_id: string;
  number: number;
  name: string;
  answer: string;
  link: string;
  num_pages: number;
  num_required_to_unlock: number;
}

export interface PuzzleUnlockEdgeRow {
  puzzle_id: string;
  unlocks_puzzle_id: string;
}

export interface TeamRow {
  id: string;
  hunt_id: string;
  name: string;
  location: string;
  join_code: string;
  playtester: boolean;
}

export interface PersonRow {
  id: string;
  display_name: string;
  email: string;
  phone: string;
  allergies: string;
  comments: string;
}

export interface TeamMemberRow {
  team_id: string;
  person_id: string;
}

export interface SubmissionRow {
  id: string;
  team_id: string;
  puzzle_id: string;
  submission_text: string;
  response_text: string;
  submitted_at: string;
  modified_at: string;
}

export interface SolveRow {
  id: string;
  team_id: string;
  puzzle_id: string;
  submission_id: string;
  solved_at: string;
}

export interface UnlockRow {
  id: string;
  team_id: string;
  puzzle_id: string;
  unlocked_at: string;
}

export interface MessageRow {
  id: string;
  team_id: string;
  is_response: boolean;
  text: string;
  sent_at: string;
}

export type UnlockableContentType = 'IMG' | 'PDF' | 'TXT' | 'WEB';

export interface UnlockableRow {
  id: string;
  puzzle_id: string;
  content_type: UnlockableContentType;
  content: string;
}

export interface TeamUnlockableRow {
  team_id: string;
  unlockable_id: string;
  released_at: string;
}

export interface ResponseRow {
  id: string;
  puzzle_id: string;
  regex: string;
  text: string;
  position: number;
}

export type ActivityAction =
  | 'hunt_created'
  | 'hunt_updated'
  | 'hunt_set_current'
  | 'team_created'
  | 'team_joined'
  | 'team_left'
  | 'team_playtester_changed';

export interface ActivityLogRow {
  id: string;
  action: ActivityAction;
  hunt_id: string | null;
  team_id: string | null;
  person_id: string | null;
  details: unknown;
  created_at: string;
}

export interface PuzzleSummary {
  id: string;
  number: number;
  name: string;
}

export interface AuthContext {
  personId: string;
  role: UserRole;
}

declare module 'express-serve-static-core' {
  interface Request {
    auth?: AuthContext;
  }
}
