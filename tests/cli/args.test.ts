import { describe, it, expect } from 'vitest';
import { getFlag, hasFlag, positionals } from '../../src/cli/args.js';

describe('CLI args', () => {
  it('reads flags in both forms', () => {
    const args = ['--feed', 'feed.json', '--kind=like'];
    expect(getFlag(args, 'feed')).toBe('feed.json');
    expect(getFlag(args, 'kind')).toBe('like');
    expect(getFlag(args, 'queue')).toBeUndefined();
  });

  it('does not take the next flag as a value', () => {
    expect(getFlag(['--day', '--kind', 'reply'], 'day')).toBeUndefined();
    expect(hasFlag(['--day', '--kind', 'reply'], 'day')).toBe(true);
  });

  it('collects positionals around flags', () => {
    expect(positionals(['Some', '--kind', 'post', 'text here', '--x=1'])).toEqual(['Some', 'text here']);
  });
});
