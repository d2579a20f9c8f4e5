export interface TransactionRecord {
  date: string | null;
  description: string | null;
  amountOre: number | null;
}

export interface CardRegistration {
  userId: number;
  chatId: number;
  username: string | null;
  cardNumber: string;
  createdAt: Date;
  /** Last time the card number was set; the user's change tracking starts here. */
  updatedAt: Date;
}

export interface BalanceSnapshot {
  cardNumber: string;
  /** Balance in øre. */
  balanceOre: number;
  lastTransaction: TransactionRecord | null;
  observedAt: Date;
}

export interface BalanceChange {
  cardNumber: string;
  oldBalanceOre: number;
  newBalanceOre: number;
  transaction: TransactionRecord | null;
  occurredAt: Date;
}

export interface NotificationEvent extends BalanceChange {
  userId: number;
  chatId: number;
}

export interface BalanceHistoryEntry {
  cardNumber: string;
  balanceOre: number;
  observedAt: Date;
}

export const QUEUES = {
  BALANCE_CHECK: 'balance-check',
  BALANCE_FETCH: 'balance-fetch',
  NOTIFY_USER: 'notify-user',
} as const;

export interface BalanceFetchJob {
  cardNumber: string;
}

/** What the scraper worker returns for a `balance-fetch` job. Amounts are bank-formatted text. */
export interface BalanceFetchResult {
  balance: string;
  lastTransaction: {
    date: string | null;
    description: string | null;
    amount: string | null;
  } | null;
}

export interface NotifyUserJob {
  telegramChatId: number;
  message: string;
}
