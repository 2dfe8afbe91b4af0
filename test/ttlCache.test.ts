import { describe, expect, it } from 'vitest';
import { createTtlCache } from '../src/lib/ttlCache';

function manualClock(start = 0) {
  let current = start;
  return {
    now: () => current,
    advance: (ms: number) => {
      current += ms;
    },
  };
}

describe('createTtlCache', () => {
  it('starts empty', () => {
    const cache = createTtlCache<string>(1000);
    expect(cache.get()).toBeUndefined();
  });

  it('serves a stored value until the TTL elapses', () => {
    const clock = manualClock();
    const cache = createTtlCache<string>(60_000, clock.now);

    cache.set('snapshot-1');
    clock.advance(59_999);
    expect(cache.get()).toBe('snapshot-1');

    clock.advance(1);
    expect(cache.get()).toBeUndefined();
  });

  it('measures the TTL from the latest set', () => {
    const clock = manualClock();
    const cache = createTtlCache<string>(1000, clock.now);

    cache.set('first');
    clock.advance(800);
    cache.set('second');
    clock.advance(800);

    expect(cache.get()).toBe('second');
  });

  it('drops the value on invalidate', () => {
    const cache = createTtlCache<number>(1000, manualClock().now);

    cache.set(42);
    cache.invalidate();

    expect(cache.get()).toBeUndefined();
  });
});
