import type { SupabaseClient } from '@supabase/supabase-js';
import { ConflictError, HttpError } from '../utils/errors.js';
import {
  ensureRows,
  handleSupabaseError,
  handleSupabaseMaybe,
  isUniqueViolation,
} from '../utils/supabase.js';
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
  TeamRow,
  TeamUnlockableRow,
  UnlockableRow,
  UnlockRow,
} from '../types.js';
import { teamNameKey, type HuntRepository } from './repository.js';

const HUNT_COLUMNS = 'id, name, number, team_size, starts_at, ends_at, location, is_current';
const PUZZLE_COLUMNS = 'id, hunt_id, number, name, answer, link, num_pages, num_required_to_unlock';
const TEAM_COLUMNS = 'id, hunt_id, name, location, join_code, playtester';
const SUBMISSION_COLUMNS = 'id, team_id, puzzle_id, submission_text, response_text, submitted_at, modified_at';
const SOLVE_COLUMNS = 'id, team_id, puzzle_id, submission_id, solved_at';
const UNLOCK_COLUMNS = 'id, team_id, puzzle_id, unlocked_at';
const UNLOCKABLE_COLUMNS = 'id, puzzle_id, content_type, content';

export function createSupabaseRepository(supabase: SupabaseClient): HuntRepository {
  return {
    async listHunts() {
      return ensureRows<HuntRow>(
        await supabase.from('hunts').select(HUNT_COLUMNS).order('number', { ascending: true }),
        'Failed to load hunts',
      );
    },

    async getHunt(huntId) {
      return handleSupabaseMaybe<HuntRow>(
        await supabase.from('hunts').select(HUNT_COLUMNS).eq('id', huntId).maybeSingle(),
        'Hunt not found',
      );
    },

    async listCurrentHunts() {
      return ensureRows<HuntRow>(
        await supabase.from('hunts').select(HUNT_COLUMNS).eq('is_current', true),
        'Failed to load current hunt',
      );
    },

    async insertHunt(input) {
      const insert = await supabase
        .from('hunts')
        .insert({ ...input, is_current: false })
        .select(HUNT_COLUMNS)
        .maybeSingle();

      if (isUniqueViolation(insert.error)) {
        throw new ConflictError('ALREADY_EXISTS', 'A hunt with this number already exists');
      }
      return handleSupabaseError<HuntRow>(insert, 'Failed to create hunt');
    },

    async updateHunt(huntId, patch) {
      const update = await supabase.from('hunts').update(patch).eq('id', huntId).select(HUNT_COLUMNS).maybeSingle();

      if (isUniqueViolation(update.error)) {
        throw new ConflictError('ALREADY_EXISTS', 'A hunt with this number already exists');
      }
      return handleSupabaseError<HuntRow>(update, 'Hunt not found');
    },

    async setCurrentHunt(huntId) {
      return ensureRows<HuntRow>(
        await supabase.rpc('set_current_hunt', { p_hunt_id: huntId }),
        'Failed to set current hunt',
      );
    },

    async getPuzzle(puzzleId) {
      return handleSupabaseMaybe<PuzzleRow>(
        await supabase.from('puzzles').select(PUZZLE_COLUMNS).eq('id', puzzleId).maybeSingle(),
        'Puzzle not found',
      );
    },

    async listPuzzles(huntId) {
      return ensureRows<PuzzleRow>(
        await supabase
          .from('puzzles')
          .select(PUZZLE_COLUMNS)
          .eq('hunt_id', huntId)
          .order('number', { ascending: true }),
        'Failed to load puzzles',
      );
    },

    async listUnlockEdges(huntId) {
      return ensureRows<PuzzleUnlockEdgeRow>(
        await supabase.from('puzzle_unlocks').select('puzzle_id, unlocks_puzzle_id').eq('hunt_id', huntId),
        'Failed to load puzzle unlock graph',
      );
    },

    async listResponses(puzzleId) {
      return ensureRows<ResponseRow>(
        await supabase
          .from('responses')
          .select('id, puzzle_id, regex, text, position')
          .eq('puzzle_id', puzzleId)
          .order('position', { ascending: true })
          .order('seq', { ascending: true }),
        'Failed to load puzzle responses',
      );
    },

    async listUnlockables(puzzleId) {
      return ensureRows<UnlockableRow>(
        await supabase.from('unlockables').select(UNLOCKABLE_COLUMNS).eq('puzzle_id', puzzleId),
        'Failed to load unlockables',
      );
    },

    async getPerson(personId) {
      return handleSupabaseMaybe<PersonRow>(
        await supabase
          .from('people')
          .select('id, display_name, email, phone, allergies, comments')
          .eq('id', personId)
          .maybeSingle(),
        'Person not found',
      );
    },

    async getTeam(teamId) {
      return handleSupabaseMaybe<TeamRow>(
        await supabase.from('teams').select(TEAM_COLUMNS).eq('id', teamId).maybeSingle(),
        'Team not found',
      );
    },

    async findTeamByName(huntId, name) {
      return handleSupabaseMaybe<TeamRow>(
        await supabase
          .from('teams')
          .select(TEAM_COLUMNS)
          .eq('hunt_id', huntId)
          .eq('name_key', teamNameKey(name))
          .maybeSingle(),
        'Team not found',
      );
    },

    async listTeams(huntId) {
      return ensureRows<TeamRow>(
        await supabase.from('teams').select(TEAM_COLUMNS).eq('hunt_id', huntId).order('name', { ascending: true }),
        'Failed to load teams',
      );
    },

    async findTeamForPerson(huntId, personId) {
      const membership = handleSupabaseMaybe<{ team_id: string; teams: TeamRow }>(
        await supabase
          .from('team_members')
          .select(`team_id, teams!inner(${TEAM_COLUMNS})`)
          .eq('person_id', personId)
          .eq('teams.hunt_id', huntId)
          .limit(1)
          .maybeSingle(),
        'Failed to load team membership',
      );
      return membership?.teams ?? null;
    },

    async insertTeam(input) {
      const insert = await supabase.from('teams').insert(input).select(TEAM_COLUMNS).maybeSingle();

      if (isUniqueViolation(insert.error)) {
        throw new ConflictError('ALREADY_EXISTS', 'A team with this name already exists');
      }
      return handleSupabaseError<TeamRow>(insert, 'Failed to create team');
    },

    async setPlaytester(teamId, playtester) {
      return handleSupabaseError<TeamRow>(
        await supabase.from('teams').update({ playtester }).eq('id', teamId).select(TEAM_COLUMNS).maybeSingle(),
        'Team not found',
      );
    },

    async listMemberIds(teamId) {
      const rows = ensureRows<{ person_id: string }>(
        await supabase.from('team_members').select('person_id').eq('team_id', teamId),
        'Failed to load team members',
      );
      return rows.map((row) => row.person_id);
    },

    async addMember(teamId, personId) {
      const upsert = await supabase
        .from('team_members')
        .upsert({ team_id: teamId, person_id: personId }, { onConflict: 'team_id,person_id', ignoreDuplicates: true });

      if (upsert.error) {
        throw new HttpError(500, 'Failed to add team member', upsert.error);
      }
    },

    async removeMember(teamId, personId) {
      const removal = await supabase.from('team_members').delete().eq('team_id', teamId).eq('person_id', personId);

      if (removal.error) {
        throw new HttpError(500, 'Failed to remove team member', removal.error);
      }
    },

    async getSubmission(submissionId) {
      return handleSupabaseMaybe<SubmissionRow>(
        await supabase.from('submissions').select(SUBMISSION_COLUMNS).eq('id', submissionId).maybeSingle(),
        'Submission not found',
      );
    },

    async insertSubmission(input) {
      return handleSupabaseError<SubmissionRow>(
        await supabase.from('submissions').insert(input).select(SUBMISSION_COLUMNS).maybeSingle(),
        'Failed to store submission',
      );
    },

    async updateSubmissionResponse(submissionId, responseText, modifiedAt) {
      return handleSupabaseError<SubmissionRow>(
        await supabase
          .from('submissions')
          .update({ response_text: responseText, modified_at: modifiedAt })
          .eq('id', submissionId)
          .select(SUBMISSION_COLUMNS)
          .maybeSingle(),
        'Submission not found',
      );
    },

    async listSubmissions(teamId, puzzleId) {
      return ensureRows<SubmissionRow>(
        await supabase
          .from('submissions')
          .select(SUBMISSION_COLUMNS)
          .eq('team_id', teamId)
          .eq('puzzle_id', puzzleId)
          .order('submitted_at', { ascending: false }),
        'Failed to load submissions',
      );
    },

    async insertSolve(input) {
      const insert = await supabase.from('solves').insert(input).select(SOLVE_COLUMNS).maybeSingle();

      if (isUniqueViolation(insert.error)) {
        const existing = handleSupabaseError<SolveRow>(
          await supabase
            .from('solves')
            .select(SOLVE_COLUMNS)
            .eq('team_id', input.team_id)
            .eq('puzzle_id', input.puzzle_id)
            .maybeSingle(),
          'Solve not found',
        );
        return { created: false, solve: existing };
      }

      return { created: true, solve: handleSupabaseError<SolveRow>(insert, 'Failed to record solve') };
    },

    async listSolves(teamId) {
      return ensureRows<SolveRow>(
        await supabase.from('solves').select(SOLVE_COLUMNS).eq('team_id', teamId),
        'Failed to load solves',
      );
    },

    async listSolvesForTeams(teamIds) {
      if (teamIds.length === 0) {
        return [];
      }
      return ensureRows<SolveRow>(
        await supabase.from('solves').select(SOLVE_COLUMNS).in('team_id', teamIds),
        'Failed to load solves',
      );
    },

    async listUnlocks(teamId) {
      return ensureRows<UnlockRow>(
        await supabase.from('unlocks').select(UNLOCK_COLUMNS).eq('team_id', teamId),
        'Failed to load unlocks',
      );
    },

    async insertUnlocks(rows) {
      if (rows.length === 0) {
        return [];
      }
      return ensureRows<UnlockRow>(
        await supabase
          .from('unlocks')
          .upsert(rows, { onConflict: 'team_id,puzzle_id', ignoreDuplicates: true })
          .select(UNLOCK_COLUMNS),
        'Failed to record unlocks',
      );
    },

    async releaseUnlockables(rows) {
      if (rows.length === 0) {
        return [];
      }
      return ensureRows<TeamUnlockableRow>(
        await supabase
          .from('team_unlockables')
          .upsert(rows, { onConflict: 'team_id,unlockable_id', ignoreDuplicates: true })
          .select('team_id, unlockable_id, released_at'),
        'Failed to release unlockables',
      );
    },

    async listTeamUnlockables(teamId) {
      const rows = ensureRows<TeamUnlockableRow & { unlockables: UnlockableRow }>(
        await supabase
          .from('team_unlockables')
          .select(`team_id, unlockable_id, released_at, unlockables!inner(${UNLOCKABLE_COLUMNS})`)
          .eq('team_id', teamId)
          .order('released_at', { ascending: true }),
        'Failed to load unlockables',
      );
      return rows.map(({ unlockables, ...release }) => ({ ...release, unlockable: unlockables }));
    },

    async insertMessage(input) {
      return handleSupabaseError<MessageRow>(
        await supabase.from('messages').insert(input).select('id, team_id, is_response, text, sent_at').maybeSingle(),
        'Failed to store message',
      );
    },

    async listMessages(teamId) {
      return ensureRows<MessageRow>(
        await supabase
          .from('messages')
          .select('id, team_id, is_response, text, sent_at')
          .eq('team_id', teamId)
          .order('sent_at', { ascending: true }),
        'Failed to load messages',
      );
    },

    async insertActivity(input) {
      return handleSupabaseError<ActivityLogRow>(
        await supabase
          .from('activity_logs')
          .insert({
            action: input.action,
            hunt_id: input.huntId ?? null,
            team_id: input.teamId ?? null,
            person_id: input.personId ?? null,
            details: input.details ?? null,
            created_at: input.createdAt,
          })
          .select('id, action, hunt_id, team_id, person_id, details, created_at')
          .maybeSingle(),
        'Failed to insert activity log',
      );
    },
  };
}
