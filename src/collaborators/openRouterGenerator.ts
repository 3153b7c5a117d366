/**
 * OpenRouter Generator
 *
 * Chat-completions client that turns a prompt into candidate text.
 * Failures come back as `{ text: null, error }`; nothing here throws.
 */

import { z } from 'zod';
import type { ActionKind } from '../domain/types.js';
import { DEFAULT_GENERATION_CONFIG, type GenerationConfig } from '../config/engineConfig.js';
import type { GenerationResult, Generator } from './types.js';
import { SYSTEM_PROMPTS } from './prompts.js';
import { toError } from '../utils/errors.js';

// ============================================================================
// TYPES
// ============================================================================

export type FetchLike = (url: string, init: RequestInit) => Promise<Response>;

export interface OpenRouterGeneratorOptions extends Partial<GenerationConfig> {
  apiKey: string;
  /** Request timeout in ms (default: 30000). */
  timeoutMs?: number;
  fetch?: FetchLike;
}

const ChatCompletionResponse = z.object({
  choices: z.array(z.object({
    message: z.object({ content: z.string().nullish() }).optional(),
  })).optional(),
});

// ============================================================================
// GENERATOR
// ============================================================================

export class OpenRouterGenerator implements Generator {
  private config: GenerationConfig & { apiKey: string };
  private timeoutMs: number;
  private fetchFn: FetchLike;
  private stats = { generated: 0, failed: 0 };

  constructor(options: OpenRouterGeneratorOptions) {
    this.config = { ...DEFAULT_GENERATION_CONFIG, ...options };
    this.timeoutMs = options.timeoutMs ?? 30_000;
    this.fetchFn = options.fetch ?? ((url, init) => fetch(url, init));
  }

  async generate(prompt: string, kind: ActionKind): Promise<GenerationResult> {
    try {
      const raw = await this.callLLM(SYSTEM_PROMPTS[kind], prompt);
      const text = cleanGeneratedText(raw);
      if (!text) {
        this.stats.failed++;
        return { text: null, error: 'Empty generation' };
      }
      this.stats.generated++;
      return { text, error: null };
    } catch (err) {
      this.stats.failed++;
      return { text: null, error: toError(err).message };
    }
  }

  getStats() {
    return { ...this.stats };
  }

  // ==========================================================================
  // INTERNAL
  // ==========================================================================

  private async callLLM(systemPrompt: string, userPrompt: string): Promise<string> {
    const response = await this.fetchFn(`${this.config.baseUrl}/chat/completions`, {
      method: 'POST',
      headers: {
        'Authorization': `Bearer ${this.config.apiKey}`,
        'Content-Type': 'application/json',
        'X-Title': 'reply-cadence',
      },
      body: JSON.stringify({
        model: this.config.model,
        messages: [
          { role: 'system', content: systemPrompt },
          { role: 'user', content: userPrompt },
        ],
        max_tokens: this.config.maxTokens,
        temperature: this.config.temperature,
      }),
      signal: AbortSignal.timeout(this.timeoutMs),
    });

    if (!response.ok) {
      const text = await response.text();
      throw new Error(`OpenRouter API ${response.status}: ${text.slice(0, 200)}`);
    }

    const parsed = ChatCompletionResponse.safeParse(await response.json());
    if (!parsed.success) throw new Error('Malformed LLM response');
    const content = parsed.data.choices?.[0]?.message?.content;
    if (!content) throw new Error('Empty LLM response');
    return content;
  }
}

/** Trim whitespace and a single pair of wrapping double quotes. */
export function cleanGeneratedText(raw: string): string {
  let text = raw.trim();
  if (text.length >= 2 && text.startsWith('"') && text.endsWith('"')) {
    text = text.slice(1, -1).trim();
  }
  return text;
}

// ============================================================================
// FACTORY
// ============================================================================

export function createOpenRouterGenerator(options: OpenRouterGeneratorOptions): OpenRouterGenerator {
  return new OpenRouterGenerator(options);
}
