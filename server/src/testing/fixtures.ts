import { createServices } from '../services/index.js';
import { createMemoryRepository, type MemorySeed } from '../store/memoryRepository.js';
import type { HuntRow, PersonRow, PuzzleRow, TeamRow } from '../types.js';

export const HUNT_ID = 'hunt-1';

export function huntRow(overrides: Partial<HuntRow> = {}): HuntRow {
  return {
    id: HUNT_ID,
    name: 'Spring Hunt',
    number: 1,
    team_size: 2,
    starts_at: '2026-03-01T10:00:00.000Z',
    ends_at: '2026-03-01T22:00:00.000Z',
    location: 'Atrium',
    is_current: true,
    ...overrides,
  };
}

export function puzzleRow(id: string, number: number, overrides: Partial<PuzzleRow> = {}): PuzzleRow {
  return {
    id,
    hunt_id: HUNT_ID,
    number,
    name: `Puzzle ${number}`,
    answer: `ANSWER${number}`,
    link: `/puzzles/${id}.pdf`,
    num_pages: 1,
    num_required_to_unlock: 1,
    ...overrides,
  };
}

export function personRow(id: string, name = id): PersonRow {
  return { id, display_name: name, email: `${id}@example.com`, phone: '', allergies: '', comments: '' };
}

export function teamRow(id: string, name: string, overrides: Partial<TeamRow> = {}): TeamRow {
  return { id, hunt_id: HUNT_ID, name, location: '', join_code: 'ABCDE', playtester: false, ...overrides };
}

export function createTestClock(start = '2026-03-01T12:00:00.000Z') {
  let current = Date.parse(start);
  return {
    now: () => new Date(current),
    advance(ms: number) {
      current += ms;
    },
    set(iso: string) {
      current = Date.parse(iso);
    },
  };
}

export function setupHunt(seed: MemorySeed = {}, options: { start?: string; joinCode?: () => string } = {}) {
  const repository = createMemoryRepository({ hunts: [huntRow()], ...seed });
  const clock = createTestClock(options.start);
  const services = createServices(repository, { now: clock.now, joinCode: options.joinCode });
  return { repository, clock, services };
}
