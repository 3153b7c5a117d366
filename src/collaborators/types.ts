/**
 * Collaborator contracts consumed by the scheduler.
 */

import type { ActionKind, CandidateItem } from '../domain/types.js';

export interface Discovery {
  /** Current candidates, at most `maxItems`. Each call re-reads the source. */
  scanFeed(maxItems: number): Promise<CandidateItem[]>;
}

export interface GenerationResult {
  text: string | null;
  error: string | null;
}

export interface Generator {
  generate(prompt: string, kind: ActionKind): Promise<GenerationResult>;
}

export interface Executor {
  /** Perform the action; resolves false on a clean failure. */
  performAction(kind: ActionKind, target: CandidateItem, text: string | null): Promise<boolean>;
}
