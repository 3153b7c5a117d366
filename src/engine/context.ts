/**
 * Engine Context
 *
 * Everything the scheduler needs, built once and passed explicitly:
 * store, history window, admission policy, decision observer, the three
 * collaborators and the clock/randomness/sleep sources.
 */

import type { EngineConfig } from '../config/engineConfig.js';
import type { CounterStore } from '../store/counterStore.js';
import { openCounterStore } from '../store/database.js';
import { RecentHistory } from '../store/recentHistory.js';
import { AdmissionPolicy } from '../pacing/admissionPolicy.js';
import { type Clock, systemClock } from '../pacing/clock.js';
import { type Rng, mathRng } from '../pacing/random.js';
import { type Sleeper, timerSleeper } from '../pacing/sleeper.js';
import { DecisionObserver } from './observer.js';
import type { Discovery, Executor, Generator } from '../collaborators/types.js';

export interface Collaborators {
  discovery: Discovery;
  generator: Generator;
  executor: Executor;
}

export interface EngineContext extends Collaborators {
  config: EngineConfig;
  store: CounterStore;
  history: RecentHistory;
  policy: AdmissionPolicy;
  observer: DecisionObserver;
  clock: Clock;
  rng: Rng;
  sleeper: Sleeper;
  /** Close the store. */
  close(): Promise<void>;
}

export interface EngineContextOverrides {
  /** Use this store instead of opening the configured database. */
  store?: CounterStore;
  observer?: DecisionObserver;
  clock?: Clock;
  rng?: Rng;
  sleeper?: Sleeper;
}

export async function createEngineContext(
  config: EngineConfig,
  collaborators: Collaborators,
  overrides: EngineContextOverrides = {},
): Promise<EngineContext> {
  const store = overrides.store ?? await openCounterStore(config.storage);
  const clock = overrides.clock ?? systemClock;
  const rng = overrides.rng ?? mathRng;
  const history = new RecentHistory(store, config.scheduler.historyWindow);
  const policy = new AdmissionPolicy(config.pacing, { store, history, clock, rng });
  const observer = overrides.observer ?? new DecisionObserver({ logDir: config.logDir });

  return {
    ...collaborators,
    config,
    store,
    history,
    policy,
    observer,
    clock,
    rng,
    sleeper: overrides.sleeper ?? timerSleeper,
    close: () => store.close(),
  };
}
