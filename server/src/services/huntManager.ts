import { IntegrityError, NotFoundError, ValidationError } from '../utils/errors.js';
import type { HuntRow } from '../types.js';
import type { HuntPatch, NewHunt } from '../store/repository.js';
import type { ServiceContext } from './context.js';

export interface HuntStatus {
  locked: boolean;
  open: boolean;
  public: boolean;
}

export interface HuntUpdate extends HuntPatch {
  is_current?: boolean;
}

export interface HuntInput extends NewHunt {
  is_current?: boolean;
}

export function huntStatus(hunt: Pick<HuntRow, 'starts_at' | 'ends_at'>, now: Date): HuntStatus {
  const time = now.getTime();
  const start = Date.parse(hunt.starts_at);
  const end = Date.parse(hunt.ends_at);
  return {
    locked: time < start,
    open: time >= start && time < end,
    public: time >= end,
  };
}

function validateSchedule(startsAt: string, endsAt: string, teamSize: number) {
  if (Number.isNaN(Date.parse(startsAt)) || Number.isNaN(Date.parse(endsAt))) {
    throw new ValidationError('Hunt dates must be valid timestamps', { field: 'starts_at' });
  }
  if (Date.parse(endsAt) <= Date.parse(startsAt)) {
    throw new ValidationError('Hunt must end after it starts', { field: 'ends_at' });
  }
  if (!Number.isInteger(teamSize) || teamSize < 1) {
    throw new ValidationError('Team size must be at least 1', { field: 'team_size' });
  }
}

/**
 * Rejects patches that would leave the hunt table without a current hunt or
 * with an impossible schedule. Setting another hunt current is the only way to
 * clear the flag.
 */
export function validateUpdate(hunt: HuntRow, patch: HuntUpdate) {
  if (patch.is_current === false && hunt.is_current) {
    throw new ValidationError('There must always be one current hunt', { field: 'is_current' });
  }
  if (patch.name !== undefined && !patch.name.trim()) {
    throw new ValidationError('Hunt name is required', { field: 'name' });
  }
  validateSchedule(patch.starts_at ?? hunt.starts_at, patch.ends_at ?? hunt.ends_at, patch.team_size ?? hunt.team_size);
}

export function createHuntManager({ repository, now }: ServiceContext) {
  async function requireHunt(huntId: string) {
    const hunt = await repository.getHunt(huntId);
    if (!hunt) {
      throw new NotFoundError('Hunt not found');
    }
    return hunt;
  }

  async function currentHunt(): Promise<HuntRow> {
    const current = await repository.listCurrentHunts();
    if (current.length !== 1) {
      throw new IntegrityError(`Expected exactly one current hunt, found ${current.length}`, {
        huntIds: current.map((hunt) => hunt.id),
      });
    }
    return current[0];
  }

  async function setCurrent(huntId: string): Promise<HuntRow> {
    const previous = await repository.listCurrentHunts();
    await requireHunt(huntId);

    const current = await repository.setCurrentHunt(huntId);
    if (current.length !== 1 || current[0].id !== huntId) {
      throw new IntegrityError('Current hunt flip did not leave exactly the target current', {
        huntId,
        huntIds: current.map((hunt) => hunt.id),
      });
    }

    await repository.insertActivity({
      action: 'hunt_set_current',
      huntId,
      details: { previous: previous.map((hunt) => hunt.id) },
      createdAt: now().toISOString(),
    });

    return current[0];
  }

  async function updateHunt(huntId: string, update: HuntUpdate): Promise<HuntRow> {
    const hunt = await requireHunt(huntId);
    validateUpdate(hunt, update);

    const { is_current: isCurrent, ...patch } = update;
    let updated = hunt;
    if (Object.keys(patch).length > 0) {
      updated = await repository.updateHunt(huntId, patch);
      await repository.insertActivity({
        action: 'hunt_updated',
        huntId,
        details: { previous: hunt, patch },
        createdAt: now().toISOString(),
      });
    }

    if (isCurrent && !hunt.is_current) {
      updated = await setCurrent(huntId);
    }

    return updated;
  }

  async function createHunt(input: HuntInput): Promise<HuntRow> {
    const { is_current: isCurrent, ...fields } = input;
    if (!fields.name.trim()) {
      throw new ValidationError('Hunt name is required', { field: 'name' });
    }
    validateSchedule(fields.starts_at, fields.ends_at, fields.team_size);

    const existing = await repository.listHunts();
    const hunt = await repository.insertHunt({ ...fields, name: fields.name.trim() });
    await repository.insertActivity({
      action: 'hunt_created',
      huntId: hunt.id,
      details: { number: hunt.number },
      createdAt: now().toISOString(),
    });

    // The very first hunt has nothing to supersede and must become current.
    if (isCurrent || existing.length === 0) {
      return setCurrent(hunt.id);
    }
    return hunt;
  }

  async function previousHunts(): Promise<HuntRow[]> {
    const [hunts, current] = await Promise.all([repository.listHunts(), currentHunt()]);
    if (huntStatus(current, now()).public) {
      return hunts;
    }
    return hunts.filter((hunt) => hunt.id !== current.id);
  }

  return {
    currentHunt,
    setCurrent,
    updateHunt,
    createHunt,
    previousHunts,
    requireHunt,
    status: (hunt: HuntRow) => huntStatus(hunt, now()),
  };
}

export type HuntManager = ReturnType<typeof createHuntManager>;
