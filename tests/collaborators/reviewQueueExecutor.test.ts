import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync, readdirSync, readFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { ReviewQueueExecutor } from '../../src/collaborators/reviewQueueExecutor.js';
import { candidate } from '../helpers/fakes.js';

describe('ReviewQueueExecutor', () => {
  let dir: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cadence-queue-'));
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('writes one pending draft per action', async () => {
    const queueDir = join(dir, 'queue');
    const executor = new ReviewQueueExecutor(queueDir);

    const ok = await executor.performAction('reply', candidate('t1', 'alice'), 'Worth measuring before tuning.');
    expect(ok).toBe(true);

    const files = readdirSync(queueDir);
    expect(files).toHaveLength(1);
    const draft: unknown = JSON.parse(readFileSync(join(queueDir, files[0] ?? ''), 'utf-8'));
    expect(draft).toMatchObject({
      kind: 'reply',
      target: { id: 't1', authorHandle: 'alice' },
      text: 'Worth measuring before tuning.',
      status: 'pending',
    });
  });

  it('lists pending drafts oldest first and skips unreadable files', async () => {
    const executor = new ReviewQueueExecutor(dir);
    const first = await executor.enqueue('like', candidate('t1', 'a'), null);
    const second = await executor.enqueue('reply', candidate('t2', 'b'), 'Second draft text.');
    writeFileSync(join(dir, 'broken.json'), '{ not json');
    writeFileSync(join(dir, 'published.json'), JSON.stringify({ ...first, id: 'p1', status: 'published' }));

    const pending = await executor.listPending();
    const ids = pending.map(p => p.id);
    expect(ids).toHaveLength(2);
    expect(new Set(ids)).toEqual(new Set([first.id, second.id]));
    expect(pending[0]?.queuedAt.localeCompare(pending[1]?.queuedAt ?? '')).toBeLessThanOrEqual(0);
  });

  it('returns an empty list for a missing queue directory', async () => {
    expect(await new ReviewQueueExecutor(join(dir, 'nowhere')).listPending()).toEqual([]);
  });

  it('reports failure when the draft cannot be written', async () => {
    const blocker = join(dir, 'file');
    writeFileSync(blocker, 'not a directory');
    const executor = new ReviewQueueExecutor(join(blocker, 'queue'));
    expect(await executor.performAction('reply', candidate('t1', 'a'), 'text')).toBe(false);
  });
});
