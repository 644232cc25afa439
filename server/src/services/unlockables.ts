import { NotFoundError } from '../utils/errors.js';
import type { PuzzleSummary, UnlockableContentType } from '../types.js';
import type { ServiceContext } from './context.js';
import { summarizePuzzle } from './puzzleGraph.js';

export interface ReleasedUnlockable {
  id: string;
  contentType: UnlockableContentType;
  content: string;
  releasedAt: string;
  puzzle: PuzzleSummary | null;
}

export function createUnlockableService({ repository }: ServiceContext) {
  async function teamUnlockables(teamId: string): Promise<ReleasedUnlockable[]> {
    const team = await repository.getTeam(teamId);
    if (!team) {
      throw new NotFoundError('Team not found');
    }

    const [released, puzzles] = await Promise.all([
      repository.listTeamUnlockables(team.id),
      repository.listPuzzles(team.hunt_id),
    ]);
    const puzzleMap = new Map(puzzles.map((puzzle) => [puzzle.id, puzzle]));

    return released.map(({ unlockable, released_at }) => {
      const puzzle = puzzleMap.get(unlockable.puzzle_id);
      return {
        id: unlockable.id,
        contentType: unlockable.content_type,
        content: unlockable.content,
        releasedAt: released_at,
        puzzle: puzzle ? summarizePuzzle(puzzle) : null,
      };
    });
  }

  return { teamUnlockables };
}

export type UnlockableService = ReturnType<typeof createUnlockableService>;
