import { describe, expect, it, vi } from 'vitest';
import { createInteractionState } from '../interaction-state.js';

function createRedisDouble() {
  const values = new Map<string, string>();
  return {
    values,
    set: vi.fn(async (key: string, value: string) => {
      values.set(key, value);
      return 'OK';
    }),
    get: vi.fn(async (key: string) => values.get(key) ?? null),
    del: vi.fn(async (key: string) => (values.delete(key) ? 1 : 0)),
  };
}

describe('createInteractionState', () => {
  it('stores the dialog mode per chat and user with a 30 minute expiry', async () => {
    const redis = createRedisDouble();
    const state = createInteractionState(redis as any);

    await state.startCardDialog(123, 456, 'update');

    expect(redis.set).toHaveBeenCalledWith('card-dialog:123:456', 'update', 'EX', 1800);
    expect(await state.getCardDialog(123, 456)).toBe('update');
    expect(await state.getCardDialog(123, 789)).toBeNull();
  });

  it('ignores values that are not a dialog mode', async () => {
    const redis = createRedisDouble();
    redis.values.set('card-dialog:123:456', 'something-else');
    const state = createInteractionState(redis as any);

    expect(await state.getCardDialog(123, 456)).toBeNull();
  });

  it('reports whether a dialog was cleared', async () => {
    const redis = createRedisDouble();
    const state = createInteractionState(redis as any);
    await state.startCardDialog(123, 456, 'register');

    expect(await state.clearCardDialog(123, 456)).toBe(true);
    expect(await state.clearCardDialog(123, 456)).toBe(false);
  });
});
