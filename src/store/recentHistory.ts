/**
 * Recent History
 *
 * Bounded in-memory window of accepted texts in front of the unbounded
 * durable reply log. The window is filled from the log once, at startup;
 * after that every append goes to both.
 */

import type { CounterStore } from './counterStore.js';

export class RecentHistory {
  private window: string[] = [];

  constructor(
    private readonly store: CounterStore,
    readonly capacity = 30,
  ) {}

  /** Replace the window with the newest `capacity` entries of the durable log. */
  async reseed(): Promise<number> {
    this.window = await this.store.loadRecentReplyHistory(this.capacity);
    return this.window.length;
  }

  /**
   * Record an accepted text. The window advances even when the durable
   * write fails, so similarity checks keep seeing what was published.
   */
  async append(text: string, at?: Date): Promise<void> {
    this.push(text);
    await this.store.appendReplyHistory(text, at);
  }

  /** Oldest first. */
  entries(): readonly string[] {
    return this.window;
  }

  get size(): number {
    return this.window.length;
  }

  private push(text: string): void {
    this.window.push(text);
    if (this.window.length > this.capacity) {
      this.window.splice(0, this.window.length - this.capacity);
    }
  }
}
