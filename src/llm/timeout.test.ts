import { describe, it, expect } from 'vitest';

import { CapabilityCancelled, CapabilityTimeout, runWithTimeout } from './timeout.js';

function hang(seen: AbortSignal[]) {
  return (signal: AbortSignal) => {
    seen.push(signal);
    return new Promise<string>(() => {});
  };
}

describe('runWithTimeout', () => {
  it('resolves with the task result', async () => {
    await expect(runWithTimeout(async () => 'ok', 1000, 'Task')).resolves.toBe('ok');
  });

  it('aborts and rejects once the timer expires', async () => {
    const seen: AbortSignal[] = [];
    const err = await runWithTimeout(hang(seen), 10, 'Task').then(
      () => null,
      (e: unknown) => e,
    );
    expect(err).toBeInstanceOf(CapabilityTimeout);
    expect(err instanceof Error ? err.message : '').toBe('Task timed out after 10ms');
    expect(seen[0].aborted).toBe(true);
  });

  it('aborts and rejects when the caller cancels', async () => {
    const seen: AbortSignal[] = [];
    const controller = new AbortController();
    const run = runWithTimeout(hang(seen), 5000, 'Task', controller.signal);
    controller.abort();

    await expect(run).rejects.toThrow(CapabilityCancelled);
    await expect(run).rejects.toThrow('Task was cancelled');
    expect(seen[0].aborted).toBe(true);
  });

  it('never starts a task whose caller already cancelled', async () => {
    const seen: AbortSignal[] = [];
    const controller = new AbortController();
    controller.abort();
    await expect(
      runWithTimeout(hang(seen), 5000, 'Task', controller.signal),
    ).rejects.toThrow(CapabilityCancelled);
    expect(seen).toEqual([]);
  });
});
