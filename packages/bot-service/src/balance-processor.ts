import type { BalanceChange, BalanceSnapshot } from '@saldovakt/shared';

export type BalanceEvaluation =
  | { kind: 'baseline'; snapshot: BalanceSnapshot }
  | { kind: 'unchanged'; snapshot: BalanceSnapshot }
  | { kind: 'changed'; snapshot: BalanceSnapshot; change: BalanceChange };

/**
 * Compares a freshly fetched snapshot against the one stored before it.
 * `snapshot` on the result is what must be persisted for the card.
 */
export function evaluateSnapshot(
  previous: BalanceSnapshot | null,
  current: BalanceSnapshot,
): BalanceEvaluation {
  if (previous === null) {
    return { kind: 'baseline', snapshot: current };
  }

  if (previous.balanceOre === current.balanceOre) {
    // Only the observation time moves; a differing transaction alone is not a change.
    return {
      kind: 'unchanged',
      snapshot: { ...previous, observedAt: current.observedAt },
    };
  }

  return {
    kind: 'changed',
    snapshot: current,
    change: {
      cardNumber: current.cardNumber,
      oldBalanceOre: previous.balanceOre,
      newBalanceOre: current.balanceOre,
      transaction: current.lastTransaction,
      occurredAt: current.observedAt,
    },
  };
}
