import type { HuntRepository } from '../store/repository.js';
import { systemClock, type Clock } from './context.js';
import { createGrader } from './grader.js';
import { createHuntManager } from './huntManager.js';
import { createMembershipService } from './membership.js';
import { createMessageService } from './messages.js';
import { createStandingsService } from './standings.js';
import { createUnlockableService } from './unlockables.js';
import { createUnlockEngine } from './unlockEngine.js';

export interface ServiceOptions {
  now?: Clock;
  joinCode?: () => string;
}

export function createServices(repository: HuntRepository, options: ServiceOptions = {}) {
  const context = { repository, now: options.now ?? systemClock };
  const unlockEngine = createUnlockEngine(context);

  return {
    hunts: createHuntManager(context),
    unlockEngine,
    grader: createGrader({ ...context, unlockEngine }),
    membership: createMembershipService({ ...context, unlockEngine, joinCode: options.joinCode }),
    messages: createMessageService(context),
    unlockables: createUnlockableService(context),
    standings: createStandingsService(context),
  };
}

export type Services = ReturnType<typeof createServices>;
