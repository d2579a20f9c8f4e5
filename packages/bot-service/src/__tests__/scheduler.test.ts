import { beforeEach, describe, expect, it, vi } from 'vitest';

const bullmq = vi.hoisted(() => {
  const processors: Array<() => Promise<unknown>> = [];
  return { upsertJobScheduler: vi.fn(async () => ({})), processors };
});

vi.mock('bullmq', () => ({
  Queue: class {
    upsertJobScheduler = bullmq.upsertJobScheduler;
  },
  Worker: class {
    constructor(_name: string, processor: () => Promise<unknown>) {
      bullmq.processors.push(processor);
    }
    on() {
      return this;
    }
  },
}));

import { registerScheduler } from '../scheduler.js';

describe('registerScheduler', () => {
  beforeEach(() => {
    bullmq.upsertJobScheduler.mockClear();
    bullmq.processors.length = 0;
  });

  it('schedules the balance check at the configured interval', async () => {
    await registerScheduler({}, { checkAll: vi.fn() }, 120_000);

    expect(bullmq.upsertJobScheduler).toHaveBeenCalledWith(
      'balance-check-scheduler',
      { every: 120_000 },
      { name: 'balance-check' },
    );
  });

  it('runs checkAll on every tick and returns its summary', async () => {
    const logSpy = vi.spyOn(console, 'log').mockImplementation(() => {});
    const summary = { cards: 2, changed: 1, failed: 0 };
    const checkAll = vi.fn(async () => summary);
    await registerScheduler({}, { checkAll });

    const processor = bullmq.processors[0];
    expect(processor).toBeDefined();
    await expect(processor?.()).resolves.toEqual(summary);

    expect(checkAll).toHaveBeenCalledOnce();
    expect(logSpy).toHaveBeenCalledWith('Balance check: 2 card(s), 1 changed, 0 failed');
    logSpy.mockRestore();
  });
});
