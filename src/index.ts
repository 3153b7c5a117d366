/**
 * reply-cadence
 *
 * Action admission and pacing engine: daily quotas, hourly targets,
 * session breaks, sleep windows, account cooldowns, randomized skips and
 * content rules, backed by durable counters.
 *
 * @license MIT
 */

// Domain
export * from './domain/types.js';

// Configuration
export * from './config/profiles.js';
export * from './config/engineConfig.js';

// Storage
export * from './store/counterStore.js';
export * from './store/database.js';
export * from './store/recentHistory.js';

// Pacing
export * from './pacing/clock.js';
export * from './pacing/random.js';
export * from './pacing/sleeper.js';
export * from './pacing/sleepWindow.js';
export * from './pacing/admissionPolicy.js';

// Content rules
export * from './safety/contentValidator.js';
export * from './safety/relevance.js';

// Engine
export * from './engine/observer.js';
export * from './engine/context.js';
export * from './engine/scheduler.js';

// Collaborators
export * from './collaborators/types.js';
export * from './collaborators/prompts.js';
export * from './collaborators/fileDiscovery.js';
export * from './collaborators/openRouterGenerator.js';
export * from './collaborators/reviewQueueExecutor.js';

// Reporting
export * from './analytics/dailyReport.js';

// Utilities
export * from './utils/logger.js';
export * from './utils/errors.js';
