import { formatKroner, formatSignedKroner } from '@saldovakt/shared';
import type {
  BalanceChange,
  BalanceHistoryEntry,
  BalanceSnapshot,
  TransactionRecord,
} from '@saldovakt/shared';

// Messages are sent as plain text; bank-provided descriptions are never interpreted as markup.

function formatTransaction(transaction: TransactionRecord | null): string {
  if (!transaction) return '';

  const lines = ['Last transaction:'];
  if (transaction.date) lines.push(`Date: ${transaction.date}`);
  if (transaction.description) lines.push(`Description: ${transaction.description}`);
  if (transaction.amountOre !== null) lines.push(`Amount: ${formatKroner(transaction.amountOre)}`);

  return lines.length > 1 ? `\n\n${lines.join('\n')}` : '';
}

export function formatBalanceChange(change: BalanceChange): string {
  const delta = change.newBalanceOre - change.oldBalanceOre;
  return (
    'Balance changed!\n\n' +
    `New balance: ${formatKroner(change.newBalanceOre)}\n` +
    `Previous balance: ${formatKroner(change.oldBalanceOre)}\n` +
    `Change: ${formatSignedKroner(delta)}` +
    formatTransaction(change.transaction)
  );
}

function formatTimestamp(date: Date): string {
  return date.toISOString().slice(0, 16).replace('T', ' ');
}

export function formatBalanceReport(snapshot: BalanceSnapshot): string {
  return `Balance: ${formatKroner(snapshot.balanceOre)}${formatTransaction(snapshot.lastTransaction)}`;
}

export function formatLastKnownBalance(snapshot: BalanceSnapshot): string {
  return `Last known balance: ${formatKroner(snapshot.balanceOre)} (checked ${formatTimestamp(snapshot.observedAt)} UTC)`;
}

export function formatBalanceHistory(entries: BalanceHistoryEntry[]): string {
  if (entries.length === 0) return 'No balance history yet.';
  return [
    'Recent balances (UTC):',
    ...entries.map((entry) => `${formatTimestamp(entry.observedAt)}  ${formatKroner(entry.balanceOre)}`),
  ].join('\n');
}
