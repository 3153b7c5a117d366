/**
 * Domain Types
 *
 * Action kinds, discovered candidates and the shared reason-code vocabulary.
 * Schemas double as runtime validators at the collaborator boundaries.
 */

import { z } from 'zod';

// ============================================================================
// ACTION KINDS
// ============================================================================

export const ActionKind = z.enum(['reply', 'like', 'retweet', 'post', 'thread', 'quote']);
export type ActionKind = z.infer<typeof ActionKind>;

export const ACTION_KINDS: readonly ActionKind[] = ActionKind.options;

/** Kinds whose execution carries generated text. */
export const TEXT_KINDS: ReadonlySet<ActionKind> = new Set<ActionKind>(['reply', 'post', 'thread', 'quote']);

export function isTextKind(kind: ActionKind): boolean {
  return TEXT_KINDS.has(kind);
}

// ============================================================================
// CANDIDATES
// ============================================================================

export const EngagementMetrics = z.object({
  likes: z.number().int().nonnegative().default(0),
  replies: z.number().int().nonnegative().default(0),
  reposts: z.number().int().nonnegative().default(0),
  views: z.number().int().nonnegative().default(0),
});
export type EngagementMetrics = z.infer<typeof EngagementMetrics>;

export const CandidateItem = z.object({
  id: z.string().min(1),
  authorHandle: z.string().default(''),
  text: z.string(),
  url: z.string().default(''),
  metrics: EngagementMetrics.default({}),
});
export type CandidateItem = z.infer<typeof CandidateItem>;

// ============================================================================
// REASON CODES
// ============================================================================

export type ValidationReason =
  | 'ok'
  | 'empty'
  | 'too_long'
  | 'hashtag'
  | 'ends_with_question'
  | 'banned_phrase'
  | 'banned_emoji'
  | 'em_dash'
  | 'generic_opener'
  | 'duplicate'
  | 'similar_start';

export type AdmissionReason =
  | 'sleep_window'
  | 'daily_limit'
  | 'hourly_limit'
  | 'session_break'
  | 'already_acted'
  | 'account_cooldown'
  | 'random_skip';

/** Admission reasons that apply to the whole batch rather than one candidate. */
export const GLOBAL_ADMISSION_REASONS: ReadonlySet<AdmissionReason> = new Set<AdmissionReason>([
  'sleep_window',
  'daily_limit',
  'hourly_limit',
  'session_break',
]);

export type EngineReason =
  | 'executed'
  | 'duplicate_candidate'
  | 'irrelevant'
  | 'discovery_failed'
  | 'generation_failed'
  | 'validation_rejected'
  | 'regeneration_exhausted'
  | 'execution_failed'
  | 'bookkeeping_failed'
  | 'cycle_error'
  | 'sleep_window_backoff'
  | 'hourly_backoff'
  | 'daily_backoff';

export type ReasonCode = ValidationReason | AdmissionReason | EngineReason;
