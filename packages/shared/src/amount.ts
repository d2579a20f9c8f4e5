// Amounts are integers of øre (1/100 krone) everywhere past this module.

const AMOUNT_REGEX = /([-\u2212]?)\s*(\d[\d\s.,]*)/;

export function parseKroner(raw: string | null | undefined): number | null {
  if (!raw) return null;
  const match = raw.match(AMOUNT_REGEX);
  if (!match) return null;

  const negative = match[1] !== '';
  const numeric = match[2].replace(/\s/g, '').replace(/[.,]+$/, '');

  // The last separator is the decimal one only when at most two digits follow it;
  // "1.234" and "11 007" are whole kroner.
  const lastSeparator = Math.max(numeric.lastIndexOf(','), numeric.lastIndexOf('.'));
  let whole = numeric;
  let fraction = '';
  if (lastSeparator !== -1 && numeric.length - lastSeparator - 1 <= 2) {
    whole = numeric.slice(0, lastSeparator);
    fraction = numeric.slice(lastSeparator + 1);
  }
  whole = whole.replace(/[.,]/g, '');

  if (!/^\d+$/.test(whole) || !/^\d{0,2}$/.test(fraction)) return null;

  const ore = Number(whole) * 100 + Number(fraction.padEnd(2, '0'));
  if (!Number.isSafeInteger(ore)) return null;
  return negative && ore !== 0 ? -ore : ore;
}

export function formatKroner(ore: number): string {
  const abs = Math.abs(ore);
  const kroner = String(Math.floor(abs / 100)).replace(/\B(?=(\d{3})+(?!\d))/g, ' ');
  const rest = String(abs % 100).padStart(2, '0');
  return `${ore < 0 ? '-' : ''}${kroner},${rest} kr`;
}

export function formatSignedKroner(ore: number): string {
  return ore > 0 ? `+${formatKroner(ore)}` : formatKroner(ore);
}
