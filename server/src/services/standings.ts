import type { ServiceContext } from './context.js';
import { teamKind } from './membership.js';

export interface StandingRow {
  teamId: string;
  name: string;
  solves: number;
  lastSolveAt: string | null;
}

function compareStandings(a: StandingRow, b: StandingRow) {
  if (a.solves !== b.solves) {
    return b.solves - a.solves;
  }
  if (a.lastSolveAt !== b.lastSolveAt) {
    if (a.lastSolveAt === null) return 1;
    if (b.lastSolveAt === null) return -1;
    return Date.parse(a.lastSolveAt) - Date.parse(b.lastSolveAt);
  }
  return a.name.localeCompare(b.name);
}

/** Playtester teams never appear in standings. */
export function createStandingsService({ repository }: ServiceContext) {
  async function standings(huntId: string): Promise<StandingRow[]> {
    const teams = (await repository.listTeams(huntId)).filter((team) => teamKind(team) === 'normal');
    const solves = await repository.listSolvesForTeams(teams.map((team) => team.id));

    const byTeam = new Map<string, { solves: number; lastSolveAt: string | null }>();
    for (const solve of solves) {
      const entry = byTeam.get(solve.team_id) ?? { solves: 0, lastSolveAt: null };
      entry.solves += 1;
      if (entry.lastSolveAt === null || Date.parse(solve.solved_at) > Date.parse(entry.lastSolveAt)) {
        entry.lastSolveAt = solve.solved_at;
      }
      byTeam.set(solve.team_id, entry);
    }

    return teams
      .map((team) => ({
        teamId: team.id,
        name: team.name,
        solves: byTeam.get(team.id)?.solves ?? 0,
        lastSolveAt: byTeam.get(team.id)?.lastSolveAt ?? null,
      }))
      .sort(compareStandings);
  }

  return { standings };
}

export type StandingsService = ReturnType<typeof createStandingsService>;
