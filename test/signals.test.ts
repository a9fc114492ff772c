/**
 * Abort Signal Helper Tests
 */

import { describe, it, expect } from 'vitest';
import { getEventListeners } from 'node:events';
import { combineSignals, delay } from '../src/agent/signals.js';

describe('combineSignals', () => {
  it('should abort with the reason of the first source to abort', () => {
    const first = new AbortController();
    const second = new AbortController();
    const combined = combineSignals(first.signal, second.signal);

    second.abort('stop');

    expect(combined.signal.aborted).toBe(true);
    expect(combined.signal.reason).toBe('stop');
    expect(getEventListeners(first.signal, 'abort')).toHaveLength(0);
  });

  it('should start aborted when a source already is', () => {
    const first = new AbortController();
    const second = new AbortController();
    first.abort('early');

    const combined = combineSignals(first.signal, second.signal);

    expect(combined.signal.reason).toBe('early');
    expect(getEventListeners(second.signal, 'abort')).toHaveLength(0);
  });

  it('should detach from every source on dispose', () => {
    const first = new AbortController();
    const second = new AbortController();
    const combined = combineSignals(first.signal, second.signal);

    combined.dispose();
    first.abort();

    expect(getEventListeners(first.signal, 'abort')).toHaveLength(0);
    expect(getEventListeners(second.signal, 'abort')).toHaveLength(0);
    expect(combined.signal.aborted).toBe(false);
  });
});

describe('delay', () => {
  it('should remove its abort listener once the timer fires', async () => {
    const controller = new AbortController();

    await delay(1, controller.signal);

    expect(getEventListeners(controller.signal, 'abort')).toHaveLength(0);
  });

  it('should resolve early when the signal aborts', async () => {
    const controller = new AbortController();
    const sleeping = delay(60_000, controller.signal);

    controller.abort();

    await expect(sleeping).resolves.toBeUndefined();
  });
});
