import { puzzleRow, setupHunt, teamRow } from '../testing/fixtures.js';
import { buildPuzzleGraph } from './puzzleGraph.js';
import { computeUnlocks } from './unlockEngine.js';

const none = new Set<string>();

function progress(solved: string[], unlocked: string[]) {
  return { solved: new Set(solved), unlocked: new Set(unlocked) };
}

describe('computeUnlocks', () => {
  const graph = buildPuzzleGraph(
    'hunt-1',
    [
      puzzleRow('a1', 1),
      puzzleRow('a2', 2),
      puzzleRow('b1', 3, { num_required_to_unlock: 2 }),
      puzzleRow('b2', 4, { num_required_to_unlock: 0 }),
      puzzleRow('c1', 5),
    ],
    [
      { puzzle_id: 'a1', unlocks_puzzle_id: 'b1' },
      { puzzle_id: 'a2', unlocks_puzzle_id: 'b1' },
      { puzzle_id: 'b1', unlocks_puzzle_id: 'b2' },
      { puzzle_id: 'b1', unlocks_puzzle_id: 'c1' },
    ],
  );

  it('unlocks only entry puzzles for a fresh team', () => {
    expect(computeUnlocks(graph, { solved: none, unlocked: none })).toEqual(['a1', 'a2']);
  });

  it('keeps a two-prerequisite puzzle locked after one solve', () => {
    expect(computeUnlocks(graph, progress(['a1'], ['a1', 'a2']))).toEqual([]);
  });

  it('unlocks on the second prerequisite and reveals free children with it', () => {
    expect(computeUnlocks(graph, progress(['a1', 'a2'], ['a1', 'a2']))).toEqual(['b1', 'b2']);
  });

  it('does not report puzzles that are already visible', () => {
    expect(computeUnlocks(graph, progress(['a1', 'a2'], ['a1', 'a2', 'b1', 'b2']))).toEqual([]);
  });

  it('cascades across passes when a free puzzle precedes its parent', () => {
    const chain = buildPuzzleGraph(
      'hunt-1',
      [
        puzzleRow('x', 1),
        puzzleRow('z', 2, { num_required_to_unlock: 0 }),
        puzzleRow('y', 3, { num_required_to_unlock: 0 }),
      ],
      [
        { puzzle_id: 'x', unlocks_puzzle_id: 'y' },
        { puzzle_id: 'y', unlocks_puzzle_id: 'z' },
      ],
    );

    expect(computeUnlocks(chain, { solved: none, unlocked: none })).toEqual(['x', 'z', 'y']);
  });

  it('terminates on cyclic unlock edges', () => {
    const cyclic = buildPuzzleGraph(
      'hunt-1',
      [
        puzzleRow('0a', 1),
        puzzleRow('0b', 2, { num_required_to_unlock: 0 }),
        puzzleRow('0c', 3, { num_required_to_unlock: 0 }),
        puzzleRow('0d', 4),
        puzzleRow('0e', 5),
        puzzleRow('0f', 6),
      ],
      [
        { puzzle_id: '0a', unlocks_puzzle_id: '0b' },
        { puzzle_id: '0b', unlocks_puzzle_id: '0c' },
        { puzzle_id: '0c', unlocks_puzzle_id: '0b' },
        { puzzle_id: '0d', unlocks_puzzle_id: '0e' },
        { puzzle_id: '0e', unlocks_puzzle_id: '0d' },
        { puzzle_id: '0f', unlocks_puzzle_id: '0f' },
      ],
    );

    expect(computeUnlocks(cyclic, { solved: none, unlocked: none })).toEqual(['0a', '0b', '0c']);
  });
});

describe('unlock engine', () => {
  function setup() {
    return setupHunt({
      puzzles: [puzzleRow('a1', 1), puzzleRow('a2', 2), puzzleRow('b1', 3)],
      edges: [{ puzzle_id: 'a1', unlocks_puzzle_id: 'b1' }],
      teams: [teamRow('team-1', 'Foo')],
    });
  }

  it('records each unlock once however often it is evaluated', async () => {
    const { repository, services } = setup();
    const team = teamRow('team-1', 'Foo');

    const first = await services.unlockEngine.reconcile(team);
    const second = await services.unlockEngine.reconcile(team);

    expect(first.created.map((unlock) => unlock.puzzle_id)).toEqual(['a1', 'a2']);
    expect(second.created).toEqual([]);
    expect(repository.tables.unlocks).toHaveLength(2);
  });

  it('stamps unlocks with the service clock', async () => {
    const { repository, services } = setup();

    await services.unlockEngine.reconcile(teamRow('team-1', 'Foo'));

    expect(repository.tables.unlocks[0].unlocked_at).toBe('2026-03-01T12:00:00.000Z');
  });

  it('lists unlocked puzzles as ordered summaries', async () => {
    const { services } = setup();

    await expect(services.unlockEngine.unlockedPuzzles('team-1')).resolves.toEqual([
      { id: 'a1', number: 1, name: 'Puzzle 1' },
      { id: 'a2', number: 2, name: 'Puzzle 2' },
    ]);
  });

  it('rejects unknown teams', async () => {
    const { services } = setup();

    await expect(services.unlockEngine.unlockedPuzzles('missing')).rejects.toThrow('Team not found');
  });
});
