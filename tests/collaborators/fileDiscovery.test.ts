import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import { mkdtempSync, rmSync, writeFileSync } from 'fs';
import { join } from 'path';
import { tmpdir } from 'os';
import { FileDiscovery, dedupeCandidates } from '../../src/collaborators/fileDiscovery.js';
import { candidate } from '../helpers/fakes.js';

describe('FileDiscovery', () => {
  let dir: string;
  let feed: string;

  beforeEach(() => {
    dir = mkdtempSync(join(tmpdir(), 'cadence-feed-'));
    feed = join(dir, 'feed.json');
  });

  afterEach(() => {
    rmSync(dir, { recursive: true, force: true });
  });

  it('reads candidates and fills defaults', async () => {
    writeFileSync(feed, JSON.stringify([
      { id: 't1', authorHandle: 'alice', text: 'first post', metrics: { likes: 4 } },
      { id: 't2', text: 'second post' },
    ]));

    const items = await new FileDiscovery(feed).scanFeed(10);
    expect(items).toEqual([
      { id: 't1', authorHandle: 'alice', text: 'first post', url: '', metrics: { likes: 4, replies: 0, reposts: 0, views: 0 } },
      { id: 't2', authorHandle: '', text: 'second post', url: '', metrics: { likes: 0, replies: 0, reposts: 0, views: 0 } },
    ]);
  });

  it('drops invalid rows and duplicate ids, then applies the limit', async () => {
    writeFileSync(feed, JSON.stringify([
      { id: 't1', text: 'a' },
      { text: 'no id' },
      { id: 't1', text: 'again' },
      { id: 't2', text: 'b' },
      { id: 't3', text: 'c' },
    ]));

    const items = await new FileDiscovery(feed).scanFeed(2);
    expect(items.map(i => [i.id, i.text])).toEqual([['t1', 'a'], ['t2', 'b']]);
  });

  it('re-reads the file on every scan', async () => {
    const discovery = new FileDiscovery(feed);
    writeFileSync(feed, JSON.stringify([{ id: 't1', text: 'a' }]));
    expect(await discovery.scanFeed(5)).toHaveLength(1);
    writeFileSync(feed, JSON.stringify([{ id: 't1', text: 'a' }, { id: 't2', text: 'b' }]));
    expect(await discovery.scanFeed(5)).toHaveLength(2);
  });

  it('rejects a file that is not an array', async () => {
    writeFileSync(feed, JSON.stringify({ items: [] }));
    await expect(new FileDiscovery(feed).scanFeed(5)).rejects.toThrow('must contain a JSON array');
  });

  it('fails when the file is missing', async () => {
    await expect(new FileDiscovery(join(dir, 'absent.json')).scanFeed(5)).rejects.toThrow();
  });
});

describe('dedupeCandidates', () => {
  it('keeps the first occurrence of each id', () => {
    const items = [candidate('a', 'x', 'one'), candidate('b', 'y'), candidate('a', 'z', 'two')];
    expect(dedupeCandidates(items).map(i => i.text)).toEqual(['one', 'post b']);
  });
});
