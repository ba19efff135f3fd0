import dotenv from 'dotenv';
import { getAddress, isAddress, ZeroAddress } from 'ethers';
import { RouterError, RouterErrorCode } from '../errors/RouterError';
import { DEFAULT_MAX_PRICE_DEVIATION_BPS } from '../types';
import { MAX_TIMER_DELAY_MS } from '../utils/timeout';

// Load environment variables from .env file
dotenv.config();

export type EnvSource = Record<string, string | undefined>;

/**
 * Router configuration
 */
export interface RouterConfig {
  maxPriceDeviationBps: number;
  venueCallTimeoutMs: number; // upper bound on a single quote call
  compensateOnSlippage: boolean;
  owner?: string;
}

export const DEFAULT_ROUTER_CONFIG: RouterConfig = {
  maxPriceDeviationBps: DEFAULT_MAX_PRICE_DEVIATION_BPS,
  venueCallTimeoutMs: 10_000,
  compensateOnSlippage: true,
};

/**
 * Quote call budgets must fit a Node timer: 1ms up to about 24.8 days
 */
export function requireCallTimeout(timeoutMs: number): number {
  if (!Number.isInteger(timeoutMs) || timeoutMs < 1 || timeoutMs > MAX_TIMER_DELAY_MS) {
    throw new RouterError(
      RouterErrorCode.InvalidTimeout,
      `Venue call timeout must be an integer between 1 and ${MAX_TIMER_DELAY_MS} ms`,
      { timeoutMs }
    );
  }
  return timeoutMs;
}

function envInteger(env: EnvSource, key: string, defaultValue: number, code: RouterErrorCode): number {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }

  const value = Number(raw);
  if (!Number.isSafeInteger(value) || value < 0) {
    throw new RouterError(code, `${key} must be a non-negative integer, got "${raw}"`, { key });
  }
  return value;
}

function envBoolean(env: EnvSource, key: string, defaultValue: boolean): boolean {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return defaultValue;
  }
  return ['1', 'true', 'yes', 'on'].includes(raw.trim().toLowerCase());
}

function envAddress(env: EnvSource, key: string): string | undefined {
  const raw = env[key];
  if (raw === undefined || raw.trim() === '') {
    return undefined;
  }
  if (!isAddress(raw) || getAddress(raw) === ZeroAddress) {
    throw new RouterError(RouterErrorCode.InvalidAddress, `${key} is not a valid address`, { key });
  }
  return getAddress(raw);
}

/**
 * Build the router configuration from environment variables
 *
 * @param env Variable source, defaults to process.env
 */
export function loadRouterConfig(env: EnvSource = process.env): RouterConfig {
  return {
    maxPriceDeviationBps: envInteger(
      env,
      'PERP_ROUTER_MAX_PRICE_DEVIATION_BPS',
      DEFAULT_ROUTER_CONFIG.maxPriceDeviationBps,
      RouterErrorCode.InvalidTolerance
    ),
    venueCallTimeoutMs: requireCallTimeout(
      envInteger(
        env,
        'PERP_ROUTER_VENUE_CALL_TIMEOUT_MS',
        DEFAULT_ROUTER_CONFIG.venueCallTimeoutMs,
        RouterErrorCode.InvalidTimeout
      )
    ),
    compensateOnSlippage: envBoolean(
      env,
      'PERP_ROUTER_COMPENSATE_ON_SLIPPAGE',
      DEFAULT_ROUTER_CONFIG.compensateOnSlippage
    ),
    owner: envAddress(env, 'PERP_ROUTER_OWNER'),
  };
}
