import { readFile } from 'node:fs/promises';
import { z } from 'zod';
import type { MemorySeed } from './memoryRepository.js';

const timestamp = z.string().datetime({ offset: true });

const seedSchema = z.object({
  hunts: z
    .array(
      z.object({
        id: z.string().min(1),
        name: z.string().min(1),
        number: z.number().int(),
        team_size: z.number().int().min(1),
        starts_at: timestamp,
        ends_at: timestamp,
        location: z.string().default(''),
        is_current: z.boolean().default(false),
      }),
    )
    .default([]),
  puzzles: z
    .array(
      z.object({
        id: z.string().regex(/^[0-9a-fA-F]{1,8}$/),
        hunt_id: z.string().min(1),
        number: z.number().int(),
        name: z.string().min(1),
        answer: z.string().min(1).max(100),
        link: z.string().default(''),
        num_pages: z.number().int().default(1),
        num_required_to_unlock: z.number().int().default(1),
      }),
    )
    .default([]),
  edges: z.array(z.object({ puzzle_id: z.string(), unlocks_puzzle_id: z.string() })).default([]),
  responses: z
    .array(
      z.object({
        id: z.string().min(1),
        puzzle_id: z.string(),
        regex: z.string().max(400),
        text: z.string().max(400),
        position: z.number().int().default(0),
      }),
    )
    .default([]),
  unlockables: z
    .array(
      z.object({
        id: z.string().min(1),
        puzzle_id: z.string(),
        content_type: z.enum(['IMG', 'PDF', 'TXT', 'WEB']).default('TXT'),
        content: z.string().max(500),
      }),
    )
    .default([]),
  people: z
    .array(
      z.object({
        id: z.string().min(1),
        display_name: z.string().default(''),
        email: z.string().default(''),
        phone: z.string().default(''),
        allergies: z.string().default(''),
        comments: z.string().default(''),
      }),
    )
    .default([]),
});

export function parseSeed(input: unknown): MemorySeed {
  const seed = seedSchema.parse(input);
  const current = seed.hunts.filter((hunt) => hunt.is_current);
  if (seed.hunts.length > 0 && current.length !== 1) {
    throw new Error(`Seed must mark exactly one hunt as current, found ${current.length}`);
  }
  return seed;
}

export async function loadSeedFile(path: string): Promise<MemorySeed> {
  const raw = await readFile(path, 'utf8');
  return parseSeed(JSON.parse(raw));
}
