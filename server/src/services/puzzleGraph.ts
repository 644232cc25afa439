import type { PuzzleRow, PuzzleState, PuzzleSummary, PuzzleUnlockEdgeRow } from '../types.js';

export interface PuzzleGraph {
  huntId: string;
  /** Ordered by puzzle number. */
  puzzles: PuzzleRow[];
  byId: Map<string, PuzzleRow>;
  /** Puzzle id -> ids of the puzzles whose solves count towards unlocking it. */
  prerequisites: Map<string, string[]>;
}

export interface TeamProgress {
  solved: ReadonlySet<string>;
  unlocked: ReadonlySet<string>;
}

/**
 * Edges pointing outside the hunt are dropped. Cycles are kept; the unlock
 * evaluation is bounded and does not depend on the graph being acyclic.
 */
export function buildPuzzleGraph(huntId: string, puzzles: PuzzleRow[], edges: PuzzleUnlockEdgeRow[]): PuzzleGraph {
  const ordered = puzzles.filter((puzzle) => puzzle.hunt_id === huntId).sort((a, b) => a.number - b.number);
  const byId = new Map(ordered.map((puzzle) => [puzzle.id, puzzle]));
  const incoming = new Map<string, Set<string>>();

  for (const edge of edges) {
    if (!byId.has(edge.puzzle_id) || !byId.has(edge.unlocks_puzzle_id)) {
      continue;
    }
    const sources = incoming.get(edge.unlocks_puzzle_id) ?? new Set<string>();
    sources.add(edge.puzzle_id);
    incoming.set(edge.unlocks_puzzle_id, sources);
  }

  const prerequisites = new Map<string, string[]>();
  for (const puzzle of ordered) {
    prerequisites.set(puzzle.id, Array.from(incoming.get(puzzle.id) ?? []));
  }

  return { huntId, puzzles: ordered, byId, prerequisites };
}

export function isEntryPuzzle(graph: PuzzleGraph, puzzleId: string) {
  return (graph.prerequisites.get(puzzleId) ?? []).length === 0;
}

export function puzzleState(progress: TeamProgress, puzzleId: string): PuzzleState {
  if (progress.solved.has(puzzleId)) {
    return 'SOLVED';
  }
  return progress.unlocked.has(puzzleId) ? 'UNLOCKED' : 'LOCKED';
}

export function isVisible(progress: TeamProgress, puzzleId: string) {
  return puzzleState(progress, puzzleId) !== 'LOCKED';
}

export function summarizePuzzle(puzzle: PuzzleRow): PuzzleSummary {
  return { id: puzzle.id, number: puzzle.number, name: puzzle.name };
}
