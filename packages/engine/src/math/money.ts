import Decimal from 'decimal.js';
import { InvalidInputError } from '../errors.js';

interface CurrencyConfig {
  symbol: string;
  position: 'prefix' | 'suffix';
}

const CURRENCY_CONFIG: Record<string, CurrencyConfig> = {
  USD: { symbol: '$', position: 'prefix' },
  CAD: { symbol: 'C$', position: 'prefix' },
  GBP: { symbol: '£', position: 'prefix' },
  EUR: { symbol: '€', position: 'suffix' },
  JPY: { symbol: '¥', position: 'prefix' },
  KZT: { symbol: '₸', position: 'suffix' },
};

export function formatMoney(amount: number, currency = 'USD'): string {
  if (!Number.isFinite(amount)) {
    throw new InvalidInputError(`Cannot format a non-finite amount: ${amount}`);
  }
  const fixed = new Decimal(amount).abs().toFixed(2);
  const isNegative = amount < 0 && fixed !== '0.00';
  const [whole, fraction] = fixed.split('.');
  const absStr = `${whole.replace(/\B(?=(\d{3})+(?!\d))/g, ',')}.${fraction}`;

  const config = CURRENCY_CONFIG[currency];

  if (config) {
    if (config.position === 'prefix') {
      return `${isNegative ? '-' : ''}${config.symbol}${absStr}`;
    }
    return `${isNegative ? '-' : ''}${absStr} ${config.symbol}`;
  }

  // Unknown currency: fallback to suffix with ISO code
  return `${isNegative ? '-' : ''}${absStr} ${currency}`;
}

export function formatPercent(rate: number, digits = 2): string {
  return `${new Decimal(rate).times(100).toFixed(digits)}%`;
}

export function sumMoney(amounts: number[]): number {
  return amounts.reduce((acc, val) => new Decimal(acc).plus(val).toNumber(), 0);
}
