/**
 * Content Validator
 *
 * Pure accept/reject decision for generated text. Checks run in a fixed
 * order and the first failing check names the rejection.
 */

import type { ActionKind, ValidationReason } from '../domain/types.js';

// ============================================================================
// RULE SETS
// ============================================================================

/** Boilerplate phrases, matched case-insensitively anywhere in the text. */
export const BANNED_PHRASES: readonly string[] = [
  'as an ai',
  'certainly',
  'in conclusion',
  'i can help',
  'interesting tweet',
  'great point',
  'this is huge',
  'delve',
  'crucial',
  "it's important to",
  'firstly',
  'absolutely',
  'definitely',
  'game changer',
  'paradigm shift',
  'let me explain',
  "here's why",
  "here's the thing",
];

export const BANNED_EMOJIS: readonly string[] = [
  '🚀', '📈', '💎', '🔥', '🧵', '👇', '🤖', '🧠',
  '😅', '🙏', '👀', '💯', '🎯', '⚡', '🌙', '📊',
];

/** Bland openers, matched against the start of the lowercased text. */
export const GENERIC_OPENERS: readonly string[] = [
  'great',
  'amazing',
  'love this',
  'so true',
  'facts',
  "couldn't agree more",
  'exactly',
  '100%',
  'this is the way',
];

export const EM_DASH = '—';

/** Characters compared when looking for a repeated opening. */
export const SIMILAR_PREFIX_LENGTH = 20;

const SHORT_FORM_MAX = 240;
const LONG_FORM_MAX = 280;

export function maxLengthFor(kind: ActionKind): number {
  return kind === 'reply' || kind === 'thread' ? SHORT_FORM_MAX : LONG_FORM_MAX;
}

// ============================================================================
// VALIDATION
// ============================================================================

export interface ValidationResult {
  accepted: boolean;
  reason: ValidationReason;
  /** Human-readable context for the log (offending phrase, lengths). */
  detail: string;
}

export interface ValidatorRules {
  bannedPhrases: readonly string[];
  bannedEmojis: readonly string[];
  genericOpeners: readonly string[];
}

export const DEFAULT_RULES: ValidatorRules = {
  bannedPhrases: BANNED_PHRASES,
  bannedEmojis: BANNED_EMOJIS,
  genericOpeners: GENERIC_OPENERS,
};

/** Extend the default lists; entries are lowercased where matching is case-insensitive. */
export function extendRules(extra: Partial<ValidatorRules>): ValidatorRules {
  return {
    bannedPhrases: [...BANNED_PHRASES, ...(extra.bannedPhrases ?? []).map(p => p.toLowerCase())],
    bannedEmojis: [...BANNED_EMOJIS, ...(extra.bannedEmojis ?? [])],
    genericOpeners: [...GENERIC_OPENERS, ...(extra.genericOpeners ?? []).map(p => p.toLowerCase())],
  };
}

function reject(reason: ValidationReason, detail: string): ValidationResult {
  return { accepted: false, reason, detail };
}

/** Length in code points, so an emoji counts once. */
function visibleLength(text: string): number {
  return [...text].length;
}

export function validateContent(
  text: string,
  kind: ActionKind,
  recentHistory: readonly string[],
  rules: ValidatorRules = DEFAULT_RULES,
): ValidationResult {
  const trimmed = text.trim();
  if (!trimmed) return reject('empty', 'Empty content');

  const max = maxLengthFor(kind);
  const length = visibleLength(trimmed);
  if (length > max) return reject('too_long', `Too long (${length} > ${max})`);

  if (text.includes('#')) return reject('hashtag', 'Contains hashtag');

  if (kind === 'reply' && trimmed.endsWith('?')) {
    return reject('ends_with_question', 'Ends with question');
  }

  const lower = trimmed.toLowerCase();

  const phrase = rules.bannedPhrases.find(p => lower.includes(p));
  if (phrase !== undefined) return reject('banned_phrase', `Banned phrase: ${phrase}`);

  const emoji = rules.bannedEmojis.find(e => text.includes(e));
  if (emoji !== undefined) return reject('banned_emoji', `Banned emoji: ${emoji}`);

  if (text.includes(EM_DASH)) return reject('em_dash', 'Contains em-dash');

  const opener = rules.genericOpeners.find(o => lower.startsWith(o));
  if (opener !== undefined) return reject('generic_opener', `Generic opener: ${opener}`);

  const prefix = lower.slice(0, SIMILAR_PREFIX_LENGTH);
  for (const past of recentHistory) {
    const pastLower = past.trim().toLowerCase();
    if (lower === pastLower) return reject('duplicate', 'Duplicate of a recent text');
    if (prefix === pastLower.slice(0, SIMILAR_PREFIX_LENGTH)) {
      return reject('similar_start', `Shares opening "${prefix}" with a recent text`);
    }
  }

  return { accepted: true, reason: 'ok', detail: 'OK' };
}
