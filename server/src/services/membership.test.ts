import { HUNT_ID, personRow, puzzleRow, setupHunt, teamRow } from '../testing/fixtures.js';
import { JOIN_CODE_ALPHABET, generateJoinCode, teamKind } from './membership.js';

function setup() {
  return setupHunt(
    {
      puzzles: [puzzleRow('a1', 1), puzzleRow('b1', 2)],
      edges: [{ puzzle_id: 'a1', unlocks_puzzle_id: 'b1' }],
      people: [personRow('p1'), personRow('p2'), personRow('p3'), personRow('p4')],
      teams: [teamRow('team-foo', 'Foo', { join_code: 'XK7QA' })],
      members: [
        { team_id: 'team-foo', person_id: 'p1' },
        { team_id: 'team-foo', person_id: 'p2' },
      ],
    },
    { joinCode: () => 'HJK23' },
  );
}

describe('generateJoinCode', () => {
  it('draws five characters from the unambiguous alphabet', () => {
    for (let i = 0; i < 50; i += 1) {
      const code = generateJoinCode();
      expect(code).toHaveLength(5);
      expect([...code].every((char) => JOIN_CODE_ALPHABET.includes(char))).toBe(true);
    }
  });

  it('never uses 0, 1, O or I', () => {
    expect(JOIN_CODE_ALPHABET).not.toMatch(/[01OI]/);
  });
});

describe('teamKind', () => {
  it('distinguishes playtester and normal teams', () => {
    expect(teamKind({ playtester: true })).toBe('playtester');
    expect(teamKind({ playtester: false })).toBe('normal');
  });
});

describe('createTeam', () => {
  it('creates the team with the creator as first member and unlocks entry puzzles', async () => {
    const { repository, services } = setup();

    const team = await services.membership.createTeam(HUNT_ID, 'p3', '  Bar  ', 'Room 12');

    expect(team).toMatchObject({ name: 'Bar', location: 'Room 12', join_code: 'HJK23', playtester: false });
    await expect(repository.listMemberIds(team.id)).resolves.toEqual(['p3']);
    await expect(services.unlockEngine.unlockedPuzzles(team.id)).resolves.toEqual([
      { id: 'a1', number: 1, name: 'Puzzle 1' },
    ]);
  });

  it('rejects names that differ only in case', async () => {
    const { services } = setup();

    await expect(services.membership.createTeam(HUNT_ID, 'p3', 'FOO', '')).rejects.toMatchObject({
      status: 409,
      reason: 'ALREADY_EXISTS',
    });
  });

  it('rejects blank names', async () => {
    const { services } = setup();

    await expect(services.membership.createTeam(HUNT_ID, 'p3', '   ', '')).rejects.toMatchObject({ status: 400 });
  });

  it('rejects a person who is already on a team in the hunt', async () => {
    const { services } = setup();

    await expect(services.membership.createTeam(HUNT_ID, 'p1', 'Bar', '')).rejects.toMatchObject({
      reason: 'ALREADY_ON_TEAM',
    });
  });
});

describe('joinTeam', () => {
  it('fails with FULL when the team is at capacity', async () => {
    const { services } = setup();

    await expect(services.membership.joinTeam('p3', HUNT_ID, 'Foo', 'XK7QA')).rejects.toMatchObject({
      reason: 'FULL',
    });
  });

  it('fails with BAD_CODE when the code does not match', async () => {
    const { repository, services } = setup();
    await repository.removeMember('team-foo', 'p2');

    await expect(services.membership.joinTeam('p3', HUNT_ID, 'Foo', 'XK7QB')).rejects.toMatchObject({
      reason: 'BAD_CODE',
    });
  });

  it('accepts the code in any case and finds the team ignoring name case', async () => {
    const { repository, services } = setup();
    await repository.removeMember('team-foo', 'p2');

    const team = await services.membership.joinTeam('p3', HUNT_ID, 'foo', 'xk7qa');

    expect(team.id).toBe('team-foo');
    await expect(repository.listMemberIds('team-foo')).resolves.toEqual(['p1', 'p3']);
  });

  it('returns the team for an existing member without a capacity check', async () => {
    const { services } = setup();

    await expect(services.membership.joinTeam('p1', HUNT_ID, 'Foo', 'wrong')).resolves.toMatchObject({
      id: 'team-foo',
    });
  });

  it('reports unknown teams as not found', async () => {
    const { services } = setup();

    await expect(services.membership.joinTeam('p3', HUNT_ID, 'Nobody', 'XK7QA')).rejects.toMatchObject({
      status: 404,
    });
  });
});

describe('leaveTeam', () => {
  it('removes the membership and frees a slot', async () => {
    const { repository, services } = setup();

    await services.membership.leaveTeam('p2', 'team-foo');
    await services.membership.joinTeam('p3', HUNT_ID, 'Foo', 'XK7QA');

    await expect(repository.listMemberIds('team-foo')).resolves.toEqual(['p1', 'p3']);
    expect(repository.tables.activity.map((entry) => entry.action)).toEqual(['team_left', 'team_joined']);
  });
});

describe('setPlaytester', () => {
  it('switches the team variant', async () => {
    const { services } = setup();

    const team = await services.membership.setPlaytester('team-foo', true);

    expect(teamKind(team)).toBe('playtester');
  });
});
