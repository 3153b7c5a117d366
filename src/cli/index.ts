#!/usr/bin/env node
/**
 * reply-cadence CLI
 *
 * reply-cadence run --feed <file> [--kind reply] [--queue <dir>] [--once]
 * reply-cadence report [--day YYYY-MM-DD]
 * reply-cadence validate <text> [--kind reply]
 * reply-cadence prune --before YYYY-MM-DD
 * reply-cadence queue [--queue <dir>]
 */

import dotenv from 'dotenv';
import chalk from 'chalk';
import { homedir } from 'os';
import { join } from 'path';
import { ActionKind, isTextKind } from '../domain/types.js';
import { loadConfig, type EngineConfig } from '../config/engineConfig.js';
import { openCounterStore } from '../store/database.js';
import { createEngineContext } from '../engine/context.js';
import { createPacingScheduler } from '../engine/scheduler.js';
import { FileDiscovery } from '../collaborators/fileDiscovery.js';
import { createOpenRouterGenerator } from '../collaborators/openRouterGenerator.js';
import { createReviewQueueExecutor } from '../collaborators/reviewQueueExecutor.js';
import type { Generator } from '../collaborators/types.js';
import { validateContent } from '../safety/contentValidator.js';
import { buildDailyReport, formatDailyReport } from '../analytics/dailyReport.js';
import { isDateKey, localDateKey } from '../pacing/clock.js';
import { ConfigError, toError } from '../utils/errors.js';
import { getFlag, hasFlag, positionals } from './args.js';

dotenv.config({ path: '.env.local' });
dotenv.config();

const DEFAULT_QUEUE_DIR = join(homedir(), '.reply-cadence', 'queue');

// ============================================================================
// MAIN DISPATCHER
// ============================================================================

async function main(args: string[]): Promise<void> {
  const command = args[0] ?? 'help';
  const rest = args.slice(1);

  switch (command) {
    case 'run':
      await runCommand(rest);
      break;
    case 'report':
      await reportCommand(rest);
      break;
    case 'validate':
      await validateCommand(rest);
      break;
    case 'prune':
      await pruneCommand(rest);
      break;
    case 'queue':
      await queueCommand(rest);
      break;
    case 'help':
    default:
      showHelp();
      break;
  }
}

// ============================================================================
// COMMANDS
// ============================================================================

async function runCommand(args: string[]): Promise<void> {
  const feed = getFlag(args, 'feed');
  if (!feed) fail('Usage: reply-cadence run --feed <file> [--kind reply] [--queue <dir>] [--once]');

  const kind = parseKind(getFlag(args, 'kind'));
  const config = loadConfig(process.env, { scheduler: kind ? { actionKind: kind } : {} });
  const actionKind = config.scheduler.actionKind;

  const generator = buildGenerator(config);
  if (isTextKind(actionKind) && !generator) {
    fail(`OPENROUTER_API_KEY is required for ${actionKind} actions`);
  }

  const ctx = await createEngineContext(config, {
    discovery: new FileDiscovery(feed),
    generator: generator ?? noGenerator,
    executor: createReviewQueueExecutor(getFlag(args, 'queue') ?? DEFAULT_QUEUE_DIR),
  });
  const scheduler = createPacingScheduler(ctx);

  scheduler.on('cycle:end', (stats) => {
    console.log(chalk.gray(
      `[${new Date().toISOString()}] ` +
      `discovered=${stats.discovered} considered=${stats.considered} generated=${stats.generated} ` +
      `rejected=${stats.rejected} skipped=${stats.skipped} executed=${stats.executed} ` +
      `failed=${stats.failed} errors=${stats.errors}`
    ));
  });

  scheduler.on('action', (actionKindDone, candidate, text) => {
    console.log(chalk.green(`  → ${actionKindDone} on ${candidate.id}${text ? `: ${text}` : ''}`));
  });

  scheduler.on('break:start', (breakMs) => {
    console.log(chalk.yellow(`  Session break for ${Math.round(breakMs / 60_000)} min`));
  });

  scheduler.on('error', (err) => {
    console.error(chalk.red(`  ✗ ${err.message}`));
  });

  if (hasFlag(args, 'once')) {
    try {
      await ctx.history.reseed();
      await ctx.observer.start();
      await scheduler.runCycle();
    } finally {
      await ctx.observer.stop();
      await ctx.close();
    }
    return;
  }

  let stopping = false;
  const shutdown = async (): Promise<void> => {
    if (stopping) return;
    stopping = true;
    console.log(chalk.yellow('\nStopping scheduler...'));
    await scheduler.stop();
    await ctx.close();
  };
  const onSignal = (): void => {
    shutdown().catch((err: unknown) => {
      console.error(chalk.red(`Shutdown failed: ${toError(err).message}`));
      process.exitCode = 1;
    });
  };
  process.once('SIGINT', onSignal);
  process.once('SIGTERM', onSignal);

  console.log(chalk.cyan(`reply-cadence running (${config.pacing.profile} pacing, ${actionKind})`));
  console.log(chalk.gray('Press Ctrl+C to stop'));
  await scheduler.start();
}

async function reportCommand(args: string[]): Promise<void> {
  const day = getFlag(args, 'day') ?? localDateKey(new Date());
  if (!isDateKey(day)) fail(`Invalid --day "${day}", expected YYYY-MM-DD`);

  const config = loadConfig();
  const store = await openCounterStore(config.storage);
  try {
    const report = await buildDailyReport(store, config.pacing, day);
    console.log(formatDailyReport(report));
  } finally {
    await store.close();
  }
}

async function validateCommand(args: string[]): Promise<void> {
  const text = positionals(args).join(' ');
  if (!text) fail('Usage: reply-cadence validate <text> [--kind reply]');
  const kind = parseKind(getFlag(args, 'kind')) ?? 'reply';

  const config = loadConfig();
  const store = await openCounterStore(config.storage);
  try {
    const history = await store.loadRecentReplyHistory(config.scheduler.historyWindow);
    const result = validateContent(text, kind, history);
    if (result.accepted) {
      console.log(chalk.green(`✓ accepted (${kind})`));
    } else {
      console.log(chalk.red(`✗ ${result.reason}: ${result.detail}`));
      process.exitCode = 1;
    }
  } finally {
    await store.close();
  }
}

async function pruneCommand(args: string[]): Promise<void> {
  const before = getFlag(args, 'before');
  if (!before || !isDateKey(before)) fail('Usage: reply-cadence prune --before YYYY-MM-DD');

  const config = loadConfig();
  const store = await openCounterStore(config.storage);
  try {
    const removed = await store.pruneBefore(before);
    console.log(chalk.green(`Pruned ${removed.counters} counter row(s) and ${removed.actionLog} action log row(s) before ${before}`));
  } finally {
    await store.close();
  }
}

async function queueCommand(args: string[]): Promise<void> {
  const queueDir = getFlag(args, 'queue') ?? DEFAULT_QUEUE_DIR;
  const pending = await createReviewQueueExecutor(queueDir).listPending();

  if (pending.length === 0) {
    console.log(chalk.gray('No pending drafts in queue.'));
    return;
  }

  console.log(chalk.cyan(`\n${pending.length} pending draft(s) in ${queueDir}:\n`));
  for (const item of pending) {
    console.log(chalk.white('─'.repeat(60)));
    console.log(chalk.gray(`ID: ${item.id}`));
    console.log(chalk.gray(`Queued: ${item.queuedAt}`));
    console.log(chalk.gray(`Action: ${item.kind} on ${item.target.id}${item.target.url ? ` (${item.target.url})` : ''}`));
    if (item.text) console.log(chalk.white(`\n${item.text}\n`));
  }
}

// ============================================================================
// HELPERS
// ============================================================================

const noGenerator: Generator = {
  generate: async () => ({ text: null, error: 'No generator configured' }),
};

function buildGenerator(config: EngineConfig): Generator | undefined {
  const { apiKey, ...rest } = config.generation;
  if (!apiKey) return undefined;
  return createOpenRouterGenerator({ ...rest, apiKey });
}

function parseKind(value: string | undefined): ActionKind | undefined {
  if (value === undefined) return undefined;
  const parsed = ActionKind.safeParse(value);
  if (!parsed.success) fail(`Unknown action kind "${value}" (expected one of ${ActionKind.options.join(', ')})`);
  return parsed.data;
}

function fail(message: string): never {
  console.error(chalk.red(message));
  process.exit(1);
}

function showHelp(): void {
  console.log(chalk.cyan('Usage: reply-cadence <command>\n'));
  console.log(chalk.white('Commands:'));
  console.log(chalk.gray('  run --feed <file> [--kind reply] [--queue <dir>]') + '  Run the pacing scheduler');
  console.log(chalk.gray('      --once') + '                                        Run a single cycle and exit');
  console.log(chalk.gray('  report [--day YYYY-MM-DD]') + '                         Show usage against daily limits');
  console.log(chalk.gray('  validate <text> [--kind reply]') + '                    Check text against content rules');
  console.log(chalk.gray('  prune --before YYYY-MM-DD') + '                         Delete old counters and action log');
  console.log(chalk.gray('  queue [--queue <dir>]') + '                             List pending drafts');
  console.log();
  console.log(chalk.white('Environment:'));
  console.log(chalk.gray('  OPENROUTER_API_KEY') + '   Required for text actions');
  console.log(chalk.gray('  PACING_PROFILE') + '       cautious (default), relaxed, disabled');
  console.log(chalk.gray('  RELEVANT_KEYWORDS') + '    Comma list a post must mention (empty: any)');
  console.log(chalk.gray('  DATA_DIR') + '             PGlite data directory');
  console.log(chalk.gray('  DATABASE_URL') + '         Shared PostgreSQL instead of PGlite');
  console.log(chalk.gray('  LOG_DIR') + '              Decision log directory');
  console.log(chalk.gray('  LOG_LEVEL') + '            debug, info, warn, error, silent');
  console.log();
}

main(process.argv.slice(2)).catch((err: unknown) => {
  if (err instanceof ConfigError) {
    console.error(chalk.red(err.message));
  } else {
    console.error(chalk.red(`Error: ${toError(err).message}`));
  }
  process.exit(1);
});
