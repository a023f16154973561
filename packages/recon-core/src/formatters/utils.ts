/**
 * Formatter Utilities
 */

import { isAbsent, stringifyValue } from '@termrecon/core';

/** Display form of a compared value; absent values use `fallback` */
export function formatValue(value: unknown, fallback = ''): string {
  return isAbsent(value) ? fallback : stringifyValue(value);
}

export function formatTradeId(tradeId: number | undefined): string {
  return tradeId === undefined ? 'unknown' : String(tradeId);
}

export function formatPercent(value: number): string {
  return `${value.toFixed(1)}%`;
}

export function yesNo(flag: boolean): 'YES' | 'NO' {
  return flag ? 'YES' : 'NO';
}

export function statusIcon(flag: boolean): string {
  return flag ? '✅' : '❌';
}
