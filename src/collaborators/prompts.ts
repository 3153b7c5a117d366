/**
 * Prompt construction for generated content.
 */

import type { ActionKind, CandidateItem } from '../domain/types.js';

const STYLE_RULES = `Write like a person who follows the topic closely.
Short and specific. No emojis, no hashtags, no hype, no marketing tone.
No em-dashes; use plain punctuation.
Do not open with praise or agreement, and do not explain basics.`;

export const SYSTEM_PROMPTS: Record<ActionKind, string> = {
  reply: `${STYLE_RULES}\nReply in one or two sentences, under 240 characters. Make a statement, do not end with a question.`,
  thread: `${STYLE_RULES}\nWrite one item of a thread, under 240 characters.`,
  post: `${STYLE_RULES}\nWrite a standalone post under 280 characters.`,
  quote: `${STYLE_RULES}\nWrite a quote comment under 280 characters that adds an angle the original misses.`,
  like: STYLE_RULES,
  retweet: STYLE_RULES,
};

export function buildPrompt(candidate: CandidateItem, kind: ActionKind): string {
  const author = candidate.authorHandle ? `@${candidate.authorHandle}` : 'unknown author';
  const source = `Post by ${author}:\n"${candidate.text.slice(0, 1000)}"`;
  switch (kind) {
    case 'reply':
      return `${source}\n\nWrite a reply that adds a concrete perspective.`;
    case 'quote':
      return `${source}\n\nWrite a quote comment for this post.`;
    case 'thread':
    case 'post':
      return `Topic, taken from this post:\n${source}\n\nWrite an original ${kind === 'thread' ? 'thread opener' : 'post'} on the topic.`;
    case 'like':
    case 'retweet':
      return source;
  }
}
