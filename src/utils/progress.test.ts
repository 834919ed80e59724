import { describe, it, expect } from 'vitest';
import { ProgressChannel } from './progress.js';

describe('ProgressChannel', () => {
  it('should drop updates once full instead of waiting', () => {
    const channel = new ProgressChannel<number>(2);

    expect(channel.offer(1)).toBe(true);
    expect(channel.offer(2)).toBe(true);
    expect(channel.offer(3)).toBe(false);
    expect(channel.size).toBe(2);
    expect(channel.droppedCount).toBe(1);
  });

  it('should hand back buffered updates in order and make room again', () => {
    const channel = new ProgressChannel<string>(2);
    channel.offer('a');
    channel.offer('b');

    expect(channel.drain()).toEqual(['a', 'b']);
    expect(channel.size).toBe(0);
    expect(channel.offer('c')).toBe(true);
    expect(channel.drain()).toEqual(['c']);
  });

  it('should default to a capacity of 100', () => {
    const channel = new ProgressChannel<number>();
    for (let i = 0; i < 150; i++) {
      channel.offer(i);
    }

    expect(channel.size).toBe(100);
    expect(channel.droppedCount).toBe(50);
  });
});
