/**
 * Review Queue Executor
 *
 * Executes an action by writing it as a pending draft to a queue directory
 * for a human to publish. One JSON file per action.
 */

import { readFile, writeFile, readdir, mkdir } from 'fs/promises';
import { join } from 'path';
import { randomUUID } from 'crypto';
import { z } from 'zod';
import { ActionKind, CandidateItem } from '../domain/types.js';
import type { Executor } from './types.js';
import { createLogger, type ComponentLogger } from '../utils/logger.js';
import { toError } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export const QueuedAction = z.object({
  id: z.string(),
  kind: ActionKind,
  target: CandidateItem,
  text: z.string().nullable(),
  queuedAt: z.string(),
  status: z.enum(['pending', 'published', 'discarded']),
});
export type QueuedAction = z.infer<typeof QueuedAction>;

// ============================================================================
// EXECUTOR
// ============================================================================

export class ReviewQueueExecutor implements Executor {
  private logger: ComponentLogger;

  constructor(private readonly queueDir: string, logger?: ComponentLogger) {
    this.logger = logger ?? createLogger('review-queue');
  }

  async performAction(kind: ActionKind, target: CandidateItem, text: string | null): Promise<boolean> {
    try {
      await this.enqueue(kind, target, text);
      return true;
    } catch (err) {
      this.logger.error('enqueue_failed', { kind, target: target.id, error: toError(err).message });
      return false;
    }
  }

  async enqueue(kind: ActionKind, target: CandidateItem, text: string | null): Promise<QueuedAction> {
    await mkdir(this.queueDir, { recursive: true });
    const item: QueuedAction = {
      id: randomUUID(),
      kind,
      target,
      text,
      queuedAt: new Date().toISOString(),
      status: 'pending',
    };
    await writeFile(join(this.queueDir, `${item.id}.json`), JSON.stringify(item, null, 2));
    return item;
  }

  /** Pending drafts, oldest first. Unreadable files are skipped with a warning. */
  async listPending(): Promise<QueuedAction[]> {
    let files: string[];
    try {
      files = await readdir(this.queueDir);
    } catch (err) {
      if (isMissingDir(err)) return [];
      throw err;
    }

    const items: QueuedAction[] = [];
    for (const file of files) {
      if (!file.endsWith('.json')) continue;
      try {
        const raw = await readFile(join(this.queueDir, file), 'utf-8');
        const item = QueuedAction.parse(JSON.parse(raw));
        if (item.status === 'pending') items.push(item);
      } catch (err) {
        this.logger.warn('unreadable_draft', { file, error: toError(err).message });
      }
    }
    return items.sort((a, b) => a.queuedAt.localeCompare(b.queuedAt));
  }
}

function isMissingDir(err: unknown): boolean {
  return err instanceof Error && 'code' in err && err.code === 'ENOENT';
}

export function createReviewQueueExecutor(queueDir: string): ReviewQueueExecutor {
  return new ReviewQueueExecutor(queueDir);
}
