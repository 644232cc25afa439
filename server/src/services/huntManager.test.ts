import { createServices } from './index.js';
import { createMemoryRepository } from '../store/memoryRepository.js';
import { createTestClock, huntRow } from '../testing/fixtures.js';
import { huntStatus, validateUpdate } from './huntManager.js';

function setup() {
  const repository = createMemoryRepository({
    hunts: [
      huntRow({ id: 'h1', number: 1, is_current: true }),
      huntRow({ id: 'h2', number: 2, is_current: false }),
      huntRow({ id: 'h3', number: 3, is_current: false }),
    ],
  });
  const clock = createTestClock();
  return { repository, clock, hunts: createServices(repository, { now: clock.now }).hunts };
}

function currentIds(repository: ReturnType<typeof createMemoryRepository>) {
  return repository.tables.hunts.filter((hunt) => hunt.is_current).map((hunt) => hunt.id);
}

describe('huntStatus', () => {
  const hunt = { starts_at: '2026-03-01T10:00:00.000Z', ends_at: '2026-03-01T22:00:00.000Z' };

  it('is locked before the start', () => {
    expect(huntStatus(hunt, new Date('2026-03-01T09:59:59.000Z'))).toEqual({ locked: true, open: false, public: false });
  });

  it('is open from the start until the end', () => {
    expect(huntStatus(hunt, new Date('2026-03-01T10:00:00.000Z'))).toEqual({ locked: false, open: true, public: false });
  });

  it('is public from the end on', () => {
    expect(huntStatus(hunt, new Date('2026-03-01T22:00:00.000Z'))).toEqual({ locked: false, open: false, public: true });
  });
});

describe('validateUpdate', () => {
  it('refuses to clear the flag on the current hunt', () => {
    expect(() => validateUpdate(huntRow({ is_current: true }), { is_current: false })).toThrow(
      'There must always be one current hunt',
    );
  });

  it('allows clearing an already cleared flag', () => {
    expect(() => validateUpdate(huntRow({ is_current: false }), { is_current: false })).not.toThrow();
  });

  it('rejects a schedule that ends before it starts', () => {
    expect(() => validateUpdate(huntRow(), { ends_at: '2026-03-01T09:00:00.000Z' })).toThrow(
      'Hunt must end after it starts',
    );
  });
});

describe('hunt manager', () => {
  it('keeps exactly one current hunt across any sequence of flips', async () => {
    const { repository, hunts } = setup();

    for (const huntId of ['h2', 'h3', 'h3', 'h1', 'h2']) {
      await hunts.setCurrent(huntId);
      expect(currentIds(repository)).toEqual([huntId]);
    }
  });

  it('keeps one current hunt when flips race', async () => {
    const { repository, hunts } = setup();

    await Promise.all([hunts.setCurrent('h2'), hunts.setCurrent('h3')]);

    expect(currentIds(repository)).toHaveLength(1);
  });

  it('logs each flip with the hunt it replaced', async () => {
    const { repository, hunts } = setup();

    await hunts.setCurrent('h2');

    expect(repository.tables.activity).toMatchObject([
      { action: 'hunt_set_current', hunt_id: 'h2', details: { previous: ['h1'] } },
    ]);
  });

  it('rejects unknown hunts without touching the flag', async () => {
    const { repository, hunts } = setup();

    await expect(hunts.setCurrent('missing')).rejects.toThrow('Hunt not found');
    expect(currentIds(repository)).toEqual(['h1']);
  });

  it('surfaces zero current hunts as an integrity error', async () => {
    const repository = createMemoryRepository({ hunts: [huntRow({ is_current: false })] });
    const { hunts } = createServices(repository);

    await expect(hunts.currentHunt()).rejects.toMatchObject({ name: 'IntegrityError', status: 500 });
  });

  it('surfaces several current hunts as an integrity error', async () => {
    const repository = createMemoryRepository({
      hunts: [huntRow({ id: 'h1', number: 1 }), huntRow({ id: 'h2', number: 2 })],
    });
    const { hunts } = createServices(repository);

    await expect(hunts.currentHunt()).rejects.toThrow('Expected exactly one current hunt, found 2');
  });

  it('routes a current flag in an update through the flip', async () => {
    const { repository, hunts } = setup();

    const updated = await hunts.updateHunt('h3', { location: 'Library', is_current: true });

    expect(updated).toMatchObject({ id: 'h3', location: 'Library', is_current: true });
    expect(currentIds(repository)).toEqual(['h3']);
  });

  it('refuses to unset the current hunt directly', async () => {
    const { repository, hunts } = setup();

    await expect(hunts.updateHunt('h1', { is_current: false })).rejects.toMatchObject({ status: 400 });
    expect(currentIds(repository)).toEqual(['h1']);
  });

  it('makes the first hunt ever created current', async () => {
    const repository = createMemoryRepository();
    const { hunts } = createServices(repository);

    const hunt = await hunts.createHunt({
      name: ' Opening Night ',
      number: 7,
      team_size: 4,
      starts_at: '2026-05-01T18:00:00.000Z',
      ends_at: '2026-05-02T02:00:00.000Z',
      location: 'Hall',
    });

    expect(hunt).toMatchObject({ name: 'Opening Night', is_current: true });
    await expect(hunts.currentHunt()).resolves.toMatchObject({ id: hunt.id });
  });

  it('creates later hunts without changing the current one', async () => {
    const { repository, hunts } = setup();

    const hunt = await hunts.createHunt({
      name: 'Autumn Hunt',
      number: 4,
      team_size: 4,
      starts_at: '2026-09-01T18:00:00.000Z',
      ends_at: '2026-09-02T02:00:00.000Z',
      location: '',
    });

    expect(hunt.is_current).toBe(false);
    expect(currentIds(repository)).toEqual(['h1']);
  });

  it('rejects duplicate hunt numbers', async () => {
    const { hunts } = setup();

    await expect(
      hunts.createHunt({
        name: 'Copy',
        number: 2,
        team_size: 4,
        starts_at: '2026-09-01T18:00:00.000Z',
        ends_at: '2026-09-02T02:00:00.000Z',
        location: '',
      }),
    ).rejects.toMatchObject({ reason: 'ALREADY_EXISTS' });
  });

  it('hides the current hunt from previous hunts until it is public', async () => {
    const { hunts, clock } = setup();

    const during = await hunts.previousHunts();
    clock.set('2026-03-02T00:00:00.000Z');
    const after = await hunts.previousHunts();

    expect(during.map((hunt) => hunt.id)).toEqual(['h2', 'h3']);
    expect(after.map((hunt) => hunt.id)).toEqual(['h1', 'h2', 'h3']);
  });
});
