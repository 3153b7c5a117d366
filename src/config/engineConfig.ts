/**
 * Engine Configuration
 *
 * Defaults come from the selected pacing profile; environment variables
 * override individual values. The merged result is validated once at
 * startup and a ConfigError lists every problem found.
 */

import { homedir } from 'os';
import { join } from 'path';
import { z } from 'zod';
import { ActionKind } from '../domain/types.js';
import { ConfigError } from '../utils/errors.js';
import { PACING_PROFILES, type PacingConfig, type PacingProfileName } from './profiles.js';
import type { Range } from '../pacing/random.js';

// ============================================================================
// TYPES
// ============================================================================

export interface SchedulerConfig {
  /** Kind of action each discovered candidate is considered for. */
  actionKind: ActionKind;
  /** Upper bound on candidates requested from discovery per cycle. */
  maxCandidates: number;
  /** Executed actions per cycle before the batch ends (0 = no cap). */
  maxActionsPerCycle: number;
  /**
   * Lowercase keywords a candidate's text must contain one of to be
   * considered. Empty accepts every candidate.
   */
  relevanceKeywords: string[];
  /** Delay before each candidate is considered. */
  readingDelayMs: Range;
  /** Base inter-cycle interval. */
  cycleIntervalMs: Range;
  /** Extra jitter added on top of the inter-cycle interval. */
  cycleJitterMs: Range;
  sleepWindowBackoffMs: number;
  hourlyBackoffMs: number;
  dailyBackoffMs: number;
  errorCooldownMs: number;
  /** Re-generations allowed after a validation rejection. */
  generationRetries: number;
  /** Size of the in-memory similarity window. */
  historyWindow: number;
}

export interface StorageConfig {
  /** PGlite data directory, or memory:// for an ephemeral store. */
  dataDir: string;
  /** When set, a shared PostgreSQL database is used instead of PGlite. */
  databaseUrl?: string;
}

export interface GenerationConfig {
  apiKey?: string;
  model: string;
  baseUrl: string;
  temperature: number;
  maxTokens: number;
}

export interface EngineConfig {
  pacing: PacingConfig;
  scheduler: SchedulerConfig;
  storage: StorageConfig;
  generation: GenerationConfig;
  /** Directory for the decision log. */
  logDir: string;
}

const MINUTE_MS = 60_000;

export const DEFAULT_SCHEDULER_CONFIG: SchedulerConfig = {
  actionKind: 'reply',
  maxCandidates: 15,
  maxActionsPerCycle: 3,
  relevanceKeywords: [],
  readingDelayMs: [1_500, 5_000],
  cycleIntervalMs: [MINUTE_MS, 5 * MINUTE_MS],
  cycleJitterMs: [10_000, MINUTE_MS],
  sleepWindowBackoffMs: 30 * MINUTE_MS,
  hourlyBackoffMs: 5 * MINUTE_MS,
  dailyBackoffMs: 30 * MINUTE_MS,
  errorCooldownMs: MINUTE_MS,
  generationRetries: 1,
  historyWindow: 30,
};

export const DEFAULT_GENERATION_CONFIG: GenerationConfig = {
  model: 'meta-llama/llama-3-8b-instruct:free',
  baseUrl: 'https://openrouter.ai/api/v1',
  temperature: 0.8,
  maxTokens: 300,
};

// ============================================================================
// ENVIRONMENT
// ============================================================================

const blankAsUndefined = (v: unknown) => (v === '' ? undefined : v);

const envInt = z.preprocess(blankAsUndefined, z.coerce.number().int().nonnegative().optional());
const envNumber = z.preprocess(blankAsUndefined, z.coerce.number().finite().optional());
const envString = z.preprocess(blankAsUndefined, z.string().optional());
const envList = z.preprocess(
  blankAsUndefined,
  z.string().transform(v => v.split(',').map(k => k.trim().toLowerCase()).filter(Boolean)).optional(),
);

const EnvSchema = z.object({
  PACING_PROFILE: z.preprocess(blankAsUndefined, z.enum(['cautious', 'relaxed', 'disabled']).optional()),
  ACTION_KIND: z.preprocess(blankAsUndefined, ActionKind.optional()),

  MAX_REPLIES_PER_DAY: envInt,
  MAX_LIKES_PER_DAY: envInt,
  MAX_RETWEETS_PER_DAY: envInt,
  MAX_POSTS_PER_DAY: envInt,
  MAX_THREADS_PER_DAY: envInt,
  MAX_QUOTES_PER_DAY: envInt,

  HOURLY_TARGET_MIN: envInt,
  HOURLY_TARGET_MAX: envInt,
  SESSION_MIN_ACTIONS: envInt,
  SESSION_MAX_ACTIONS: envInt,
  BREAK_MIN_MINUTES: envNumber,
  BREAK_MAX_MINUTES: envNumber,
  SLEEP_WINDOW_START: envInt,
  SLEEP_WINDOW_END: envInt,
  SKIP_CHANCE_MIN: envNumber,
  SKIP_CHANCE_MAX: envNumber,
  ACCOUNT_COOLDOWN_HOURS: envNumber,
  ENGAGEMENT_CYCLE_CHANCE: envNumber,
  LIKE_CHANCE: envNumber,
  RETWEET_CHANCE: envNumber,

  MIN_ACTION_DELAY: envNumber,
  MAX_ACTION_DELAY: envNumber,
  CYCLE_INTERVAL_MIN_SECONDS: envNumber,
  CYCLE_INTERVAL_MAX_SECONDS: envNumber,
  CYCLE_JITTER_MIN_SECONDS: envNumber,
  CYCLE_JITTER_MAX_SECONDS: envNumber,
  MAX_CANDIDATES: envInt,
  MAX_ACTIONS_PER_CYCLE: envInt,
  GENERATION_RETRIES: envInt,
  RELEVANT_KEYWORDS: envList,

  DATA_DIR: envString,
  DATABASE_URL: envString,
  LOG_DIR: envString,

  OPENROUTER_API_KEY: envString,
  OPENROUTER_BASE_URL: envString,
  AI_MODEL: envString,
  AI_TEMPERATURE: envNumber,
});

// ============================================================================
// VALIDATION
// ============================================================================

const hour = z.number().int().min(0).max(23);

function range(inner: z.ZodNumber) {
  return z
    .tuple([inner, inner])
    .refine(([min, max]) => min <= max, { message: 'range minimum exceeds maximum' });
}

const PacingSchema = z.object({
  profile: z.enum(['cautious', 'relaxed', 'disabled']),
  dailyLimits: z.record(ActionKind, z.number().int().nonnegative()),
  hourlyTargetRange: range(z.number().int().nonnegative()),
  hourlyKinds: z.array(ActionKind),
  sessionTargetRange: range(z.number().int().positive()),
  breakMinutesRange: range(z.number().nonnegative()),
  sleepWindow: z.object({ startHour: hour, endHour: hour }),
  skipChanceRange: range(z.number().min(0).max(1)),
  accountCooldownMs: z.number().nonnegative(),
  engagement: z.object({
    cycleChance: z.number().min(0).max(1),
    topItems: z.number().int().nonnegative(),
    actions: z.array(z.object({
      kind: ActionKind,
      chance: z.number().min(0).max(1),
      delayMs: range(z.number().nonnegative()),
    })),
  }),
});

const SchedulerSchema = z.object({
  actionKind: ActionKind,
  maxCandidates: z.number().int().positive(),
  maxActionsPerCycle: z.number().int().nonnegative(),
  relevanceKeywords: z.array(z.string().min(1)),
  readingDelayMs: range(z.number().nonnegative()),
  cycleIntervalMs: range(z.number().nonnegative()),
  cycleJitterMs: range(z.number().nonnegative()),
  sleepWindowBackoffMs: z.number().nonnegative(),
  hourlyBackoffMs: z.number().nonnegative(),
  dailyBackoffMs: z.number().nonnegative(),
  errorCooldownMs: z.number().nonnegative(),
  generationRetries: z.number().int().nonnegative(),
  historyWindow: z.number().int().positive(),
});

function formatIssues(error: z.ZodError): string[] {
  return error.issues.map(issue => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
}

/** Throws ConfigError when a pacing or scheduler section is invalid. */
export function assertValidConfig(config: EngineConfig): EngineConfig {
  const issues = [
    ...prefixed('pacing', PacingSchema.safeParse(config.pacing)),
    ...prefixed('scheduler', SchedulerSchema.safeParse(config.scheduler)),
  ];
  if (issues.length > 0) {
    throw new ConfigError(`Invalid configuration:\n  ${issues.join('\n  ')}`, issues);
  }
  return config;
}

function prefixed(section: string, result: { success: boolean; error?: z.ZodError }): string[] {
  if (result.success || !result.error) return [];
  return formatIssues(result.error).map(line => `${section}.${line}`);
}

// ============================================================================
// LOADING
// ============================================================================

function pickRange(current: Range, min: number | undefined, max: number | undefined, scale = 1): Range {
  return [min !== undefined ? min * scale : current[0], max !== undefined ? max * scale : current[1]];
}

export interface ConfigOverrides {
  pacing?: Partial<PacingConfig>;
  scheduler?: Partial<SchedulerConfig>;
  storage?: Partial<StorageConfig>;
  generation?: Partial<GenerationConfig>;
  logDir?: string;
}

/**
 * Build the engine configuration from environment variables.
 * Explicit overrides win over the environment.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env, overrides: ConfigOverrides = {}): EngineConfig {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const issues = formatIssues(parsed.error);
    throw new ConfigError(`Invalid environment:\n  ${issues.join('\n  ')}`, issues);
  }
  const e = parsed.data;

  const profileName: PacingProfileName = overrides.pacing?.profile ?? e.PACING_PROFILE ?? 'cautious';
  const base = PACING_PROFILES[profileName];

  const chanceOverrides: Partial<Record<ActionKind, number>> = { like: e.LIKE_CHANCE, retweet: e.RETWEET_CHANCE };
  const pacing: PacingConfig = {
    ...base,
    dailyLimits: {
      reply: e.MAX_REPLIES_PER_DAY ?? base.dailyLimits.reply,
      like: e.MAX_LIKES_PER_DAY ?? base.dailyLimits.like,
      retweet: e.MAX_RETWEETS_PER_DAY ?? base.dailyLimits.retweet,
      post: e.MAX_POSTS_PER_DAY ?? base.dailyLimits.post,
      thread: e.MAX_THREADS_PER_DAY ?? base.dailyLimits.thread,
      quote: e.MAX_QUOTES_PER_DAY ?? base.dailyLimits.quote,
    },
    hourlyTargetRange: pickRange(base.hourlyTargetRange, e.HOURLY_TARGET_MIN, e.HOURLY_TARGET_MAX),
    sessionTargetRange: pickRange(base.sessionTargetRange, e.SESSION_MIN_ACTIONS, e.SESSION_MAX_ACTIONS),
    breakMinutesRange: pickRange(base.breakMinutesRange, e.BREAK_MIN_MINUTES, e.BREAK_MAX_MINUTES),
    sleepWindow: {
      startHour: e.SLEEP_WINDOW_START ?? base.sleepWindow.startHour,
      endHour: e.SLEEP_WINDOW_END ?? base.sleepWindow.endHour,
    },
    skipChanceRange: pickRange(base.skipChanceRange, e.SKIP_CHANCE_MIN, e.SKIP_CHANCE_MAX),
    accountCooldownMs: e.ACCOUNT_COOLDOWN_HOURS !== undefined
      ? e.ACCOUNT_COOLDOWN_HOURS * 3_600_000
      : base.accountCooldownMs,
    engagement: {
      ...base.engagement,
      cycleChance: e.ENGAGEMENT_CYCLE_CHANCE ?? base.engagement.cycleChance,
      actions: base.engagement.actions.map(action => ({
        ...action,
        chance: chanceOverrides[action.kind] ?? action.chance,
      })),
    },
    ...overrides.pacing,
  };

  const d = DEFAULT_SCHEDULER_CONFIG;
  const scheduler: SchedulerConfig = {
    ...d,
    actionKind: e.ACTION_KIND ?? d.actionKind,
    maxCandidates: e.MAX_CANDIDATES ?? d.maxCandidates,
    maxActionsPerCycle: e.MAX_ACTIONS_PER_CYCLE ?? d.maxActionsPerCycle,
    relevanceKeywords: e.RELEVANT_KEYWORDS ?? d.relevanceKeywords,
    readingDelayMs: pickRange(d.readingDelayMs, e.MIN_ACTION_DELAY, e.MAX_ACTION_DELAY, 1000),
    cycleIntervalMs: pickRange(d.cycleIntervalMs, e.CYCLE_INTERVAL_MIN_SECONDS, e.CYCLE_INTERVAL_MAX_SECONDS, 1000),
    cycleJitterMs: pickRange(d.cycleJitterMs, e.CYCLE_JITTER_MIN_SECONDS, e.CYCLE_JITTER_MAX_SECONDS, 1000),
    generationRetries: e.GENERATION_RETRIES ?? d.generationRetries,
    ...overrides.scheduler,
  };

  const stateDir = join(homedir(), '.reply-cadence');

  return assertValidConfig({
    pacing,
    scheduler,
    storage: {
      dataDir: e.DATA_DIR ?? join(stateDir, 'data'),
      databaseUrl: e.DATABASE_URL,
      ...overrides.storage,
    },
    generation: {
      ...DEFAULT_GENERATION_CONFIG,
      apiKey: e.OPENROUTER_API_KEY,
      model: e.AI_MODEL ?? DEFAULT_GENERATION_CONFIG.model,
      baseUrl: e.OPENROUTER_BASE_URL ?? DEFAULT_GENERATION_CONFIG.baseUrl,
      temperature: e.AI_TEMPERATURE ?? DEFAULT_GENERATION_CONFIG.temperature,
      ...overrides.generation,
    },
    logDir: overrides.logDir ?? e.LOG_DIR ?? join(stateDir, 'logs'),
  });
}
