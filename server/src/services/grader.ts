import { ConflictError, NotFoundError, ValidationError } from '../utils/errors.js';
import type { PuzzleRow, PuzzleSummary, ResponseRow, SubmissionRow, TeamRow } from '../types.js';
import type { ServiceContext } from './context.js';
import { huntStatus } from './huntManager.js';
import { isVisible, summarizePuzzle } from './puzzleGraph.js';
import type { UnlockEngine } from './unlockEngine.js';

export const MAX_SUBMISSION_LENGTH = 100;
export const MAX_RESPONSE_LENGTH = 400;
export const CORRECT_RESPONSE = 'Correct!';
export const DEFAULT_RESPONSE = 'Wrong Answer.';

export interface GradeResult {
  correct: boolean;
  responseText: string;
  solveTimestamp?: string;
  submission: SubmissionRow;
  newlyUnlocked: PuzzleSummary[];
}

export function isCorrectAnswer(puzzle: Pick<PuzzleRow, 'answer'>, text: string) {
  return text.trim().toLowerCase() === puzzle.answer.trim().toLowerCase();
}

/**
 * First response in declaration order whose pattern matches from the start
 * of the text, ignoring case. Responses sharing a position keep the order
 * they were given in. Patterns that fail to compile are skipped.
 */
export function matchResponse(responses: ResponseRow[], text: string): ResponseRow | null {
  const ordered = [...responses].sort((a, b) => a.position - b.position);
  for (const response of ordered) {
    let pattern: RegExp;
    try {
      pattern = new RegExp(`^(?:${response.regex})`, 'i');
    } catch (error) {
      console.warn(`Skipping invalid response pattern ${response.id} for puzzle ${response.puzzle_id}`, error);
      continue;
    }
    if (pattern.test(text)) {
      return response;
    }
  }
  return null;
}

export interface GraderDeps extends ServiceContext {
  unlockEngine: UnlockEngine;
}

export function createGrader({ repository, now, unlockEngine }: GraderDeps) {
  async function loadTarget(teamId: string, puzzleId: string) {
    const [team, puzzle] = await Promise.all([repository.getTeam(teamId), repository.getPuzzle(puzzleId)]);
    if (!team) {
      throw new NotFoundError('Team not found');
    }
    if (!puzzle || puzzle.hunt_id !== team.hunt_id) {
      throw new NotFoundError('Puzzle not found');
    }
    return { team, puzzle };
  }

  async function assertCanSubmit(team: TeamRow, puzzle: PuzzleRow) {
    const hunt = await repository.getHunt(team.hunt_id);
    if (!hunt) {
      throw new NotFoundError('Hunt not found');
    }

    const status = huntStatus(hunt, now());
    if (status.locked && !team.playtester) {
      throw new ConflictError('HUNT_LOCKED', 'Hunt has not started yet');
    }

    const { progress } = await unlockEngine.reconcile(team);
    if (!status.public && !isVisible(progress, puzzle.id)) {
      throw new ConflictError('PUZZLE_LOCKED', 'Puzzle is not unlocked for this team');
    }
  }

  async function releaseUnlockables(team: TeamRow, puzzle: PuzzleRow, releasedAt: string) {
    const unlockables = await repository.listUnlockables(puzzle.id);
    await repository.releaseUnlockables(
      unlockables.map((unlockable) => ({ team_id: team.id, unlockable_id: unlockable.id, released_at: releasedAt })),
    );
  }

  async function gradeSubmission(teamId: string, puzzleId: string, text: string): Promise<GradeResult> {
    const submissionText = text.trim();
    if (!submissionText) {
      throw new ValidationError('Answer must not be blank', { field: 'text' });
    }
    if (submissionText.length > MAX_SUBMISSION_LENGTH) {
      throw new ValidationError(`Answer must be at most ${MAX_SUBMISSION_LENGTH} characters`, { field: 'text' });
    }

    const { team, puzzle } = await loadTarget(teamId, puzzleId);
    await assertCanSubmit(team, puzzle);

    const correct = isCorrectAnswer(puzzle, submissionText);
    const responseText = correct
      ? CORRECT_RESPONSE
      : matchResponse(await repository.listResponses(puzzle.id), submissionText)?.text ?? DEFAULT_RESPONSE;

    const submittedAt = now().toISOString();
    const submission = await repository.insertSubmission({
      team_id: team.id,
      puzzle_id: puzzle.id,
      submission_text: submissionText,
      response_text: responseText,
      submitted_at: submittedAt,
      modified_at: submittedAt,
    });

    if (!correct) {
      return { correct, responseText, submission, newlyUnlocked: [] };
    }

    const { solve } = await repository.insertSolve({
      team_id: team.id,
      puzzle_id: puzzle.id,
      submission_id: submission.id,
      solved_at: submittedAt,
    });
    // Idempotent: existing releases keep their original time.
    await releaseUnlockables(team, puzzle, solve.solved_at);

    const { graph, created: unlocks } = await unlockEngine.reconcile(team);
    const newlyUnlocked = unlocks
      .map((unlock) => graph.byId.get(unlock.puzzle_id))
      .filter((entry): entry is PuzzleRow => Boolean(entry))
      .sort((a, b) => a.number - b.number)
      .map(summarizePuzzle);

    return { correct, responseText, solveTimestamp: solve.solved_at, submission, newlyUnlocked };
  }

  async function updateResponse(submissionId: string, responseText: string): Promise<SubmissionRow> {
    if (responseText.length > MAX_RESPONSE_LENGTH) {
      throw new ValidationError(`Response must be at most ${MAX_RESPONSE_LENGTH} characters`, { field: 'responseText' });
    }
    const submission = await repository.getSubmission(submissionId);
    if (!submission) {
      throw new NotFoundError('Submission not found');
    }
    return repository.updateSubmissionResponse(submissionId, responseText, now().toISOString());
  }

  async function submissionHistory(teamId: string, puzzleId: string): Promise<SubmissionRow[]> {
    const { team, puzzle } = await loadTarget(teamId, puzzleId);
    return repository.listSubmissions(team.id, puzzle.id);
  }

  return { gradeSubmission, updateResponse, submissionHistory };
}

export type Grader = ReturnType<typeof createGrader>;
