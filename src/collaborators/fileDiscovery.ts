/**
 * File Discovery
 *
 * Reads candidates from a JSON feed file on every scan. The file holds an
 * array of candidate objects; rows that fail validation are logged and
 * dropped, duplicate ids keep their first occurrence.
 */

import { readFile } from 'fs/promises';
import { z } from 'zod';
import { CandidateItem } from '../domain/types.js';
import type { Discovery } from './types.js';
import { createLogger, type ComponentLogger } from '../utils/logger.js';

export class FileDiscovery implements Discovery {
  private logger: ComponentLogger;

  constructor(private readonly path: string, logger?: ComponentLogger) {
    this.logger = logger ?? createLogger('discovery');
  }

  async scanFeed(maxItems: number): Promise<CandidateItem[]> {
    const raw = await readFile(this.path, 'utf-8');
    const parsed = z.array(z.unknown()).safeParse(JSON.parse(raw));
    if (!parsed.success) {
      throw new Error(`Feed file ${this.path} must contain a JSON array`);
    }
    return dedupeCandidates(this.validRows(parsed.data)).slice(0, maxItems);
  }

  private validRows(rows: unknown[]): CandidateItem[] {
    const items: CandidateItem[] = [];
    rows.forEach((row, index) => {
      const result = CandidateItem.safeParse(row);
      if (result.success) {
        items.push(result.data);
      } else {
        this.logger.warn('invalid_candidate', { index, issues: result.error.issues.map(i => i.message) });
      }
    });
    return items;
  }
}

/** Drop repeated ids and candidates without an id, keeping list order. */
export function dedupeCandidates(items: CandidateItem[]): CandidateItem[] {
  const seen = new Set<string>();
  const unique: CandidateItem[] = [];
  for (const item of items) {
    if (!item.id || seen.has(item.id)) continue;
    seen.add(item.id);
    unique.push(item);
  }
  return unique;
}
