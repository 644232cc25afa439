import { NotFoundError } from '../utils/errors.js';
import type { PuzzleRow, PuzzleSummary, TeamRow, UnlockRow } from '../types.js';
import type { ServiceContext } from './context.js';
import { buildPuzzleGraph, summarizePuzzle, type PuzzleGraph, type TeamProgress } from './puzzleGraph.js';

function qualifies(graph: PuzzleGraph, puzzle: PuzzleRow, solved: ReadonlySet<string>, visible: ReadonlySet<string>) {
  const prerequisites = graph.prerequisites.get(puzzle.id) ?? [];
  if (prerequisites.length === 0) {
    return true;
  }
  if (puzzle.num_required_to_unlock <= 0) {
    // Free puzzles appear together with any visible parent.
    return prerequisites.some((id) => visible.has(id));
  }
  const solvedCount = prerequisites.filter((id) => solved.has(id)).length;
  return solvedCount >= puzzle.num_required_to_unlock;
}

/**
 * Returns the ids of puzzles that become visible for the given progress, in
 * puzzle order. Runs to a fixed point; each productive pass reveals at least
 * one puzzle, so the loop ends after at most one pass per puzzle.
 */
export function computeUnlocks(graph: PuzzleGraph, progress: TeamProgress): string[] {
  const visible = new Set<string>([...progress.unlocked, ...progress.solved]);
  const revealed: PuzzleRow[] = [];

  for (let pass = 0; pass <= graph.puzzles.length; pass += 1) {
    let changed = false;
    for (const puzzle of graph.puzzles) {
      if (visible.has(puzzle.id) || !qualifies(graph, puzzle, progress.solved, visible)) {
        continue;
      }
      visible.add(puzzle.id);
      revealed.push(puzzle);
      changed = true;
    }
    if (!changed) {
      break;
    }
  }

  return revealed.sort((a, b) => a.number - b.number).map((puzzle) => puzzle.id);
}

export interface ReconcileResult {
  graph: PuzzleGraph;
  progress: TeamProgress;
  created: UnlockRow[];
}

export function createUnlockEngine({ repository, now }: ServiceContext) {
  async function loadGraph(huntId: string) {
    const [puzzles, edges] = await Promise.all([repository.listPuzzles(huntId), repository.listUnlockEdges(huntId)]);
    return buildPuzzleGraph(huntId, puzzles, edges);
  }

  async function loadProgress(teamId: string): Promise<TeamProgress> {
    const [solves, unlocks] = await Promise.all([repository.listSolves(teamId), repository.listUnlocks(teamId)]);
    return {
      solved: new Set(solves.map((solve) => solve.puzzle_id)),
      unlocked: new Set(unlocks.map((unlock) => unlock.puzzle_id)),
    };
  }

  /**
   * Brings the team's Unlock rows up to date with its solves. Safe to call
   * any number of times: rows that already exist are skipped by the store.
   */
  async function reconcile(team: TeamRow): Promise<ReconcileResult> {
    const [graph, progress] = await Promise.all([loadGraph(team.hunt_id), loadProgress(team.id)]);
    const pending = computeUnlocks(graph, progress);

    if (pending.length === 0) {
      return { graph, progress, created: [] };
    }

    const unlockedAt = now().toISOString();
    const created = await repository.insertUnlocks(
      pending.map((puzzleId) => ({ team_id: team.id, puzzle_id: puzzleId, unlocked_at: unlockedAt })),
    );

    return {
      graph,
      progress: { solved: progress.solved, unlocked: new Set([...progress.unlocked, ...pending]) },
      created,
    };
  }

  async function unlockedPuzzles(teamId: string): Promise<PuzzleSummary[]> {
    const team = await repository.getTeam(teamId);
    if (!team) {
      throw new NotFoundError('Team not found');
    }

    const { graph, progress } = await reconcile(team);
    return graph.puzzles
      .filter((puzzle) => progress.unlocked.has(puzzle.id) || progress.solved.has(puzzle.id))
      .map(summarizePuzzle);
  }

  return { loadGraph, loadProgress, reconcile, unlockedPuzzles };
}

export type UnlockEngine = ReturnType<typeof createUnlockEngine>;
