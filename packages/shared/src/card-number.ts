import { InvalidCardNumberError } from './errors.js';

const CARD_NUMBER_REGEX = /^\d{12}$/;

export function normalizeCardNumber(input: string): string | null {
  const compact = input.replace(/\s+/g, '');
  return CARD_NUMBER_REGEX.test(compact) ? compact : null;
}

export function parseCardNumber(input: string): string {
  const cardNumber = normalizeCardNumber(input);
  if (!cardNumber) throw new InvalidCardNumberError(input);
  return cardNumber;
}

export function maskCardNumber(cardNumber: string): string {
  return `${cardNumber.slice(0, 4)}${'*'.repeat(Math.max(cardNumber.length - 4, 0))}`;
}
