import type { HuntRepository } from '../store/repository.js';

export type Clock = () => Date;

export interface ServiceContext {
  repository: HuntRepository;
  now: Clock;
}

export const systemClock: Clock = () => new Date();
