import { BPS_DENOMINATOR } from '../types';

/**
 * Absolute deviation of `price` from `reference` in basis points.
 * Multiplies before dividing and truncates, so the result never rounds up.
 */
export function deviationBps(price: bigint, reference: bigint): bigint {
  if (reference <= 0n) {
    throw new RangeError('Reference price must be positive');
  }
  const diff = price > reference ? price - reference : reference - price;
  return (diff * BPS_DENOMINATOR) / reference;
}

/**
 * Fee-adjusted price from the trader's side: longs pay the fee on top,
 * shorts receive the price minus the fee.
 */
export function effectivePrice(price: bigint, fee: bigint, isLong: boolean): bigint {
  return isLong ? price + fee : price - fee;
}

/**
 * Strict comparison; equal prices are never better, so the first venue seen wins ties
 */
export function isBetterPrice(candidate: bigint, best: bigint, isLong: boolean): boolean {
  return isLong ? candidate < best : candidate > best;
}
