/**
 * Wires the two registries and the router around a shared clock and
 * logger. Registries come first, the router borrows them.
 */

import type { Logger } from 'winston';
import { loadRouterConfig, RouterConfig } from '../config';
import { RouterError, RouterErrorCode } from '../errors/RouterError';
import { OracleRegistry } from '../oracle/OracleRegistry';
import { VenueRegistry } from '../registry/VenueRegistry';
import { PerpRouter } from '../router/PerpRouter';
import type { PositionLocator } from '../router/PositionLocator';
import { createComponentLogger } from '../utils/logger';
import { Clock, systemClock } from '../types';

export interface PerpRouterStackOptions {
  owner?: string; // falls back to config.owner
  config?: RouterConfig;
  logger?: Logger;
  clock?: Clock;
  locator?: PositionLocator;
}

export interface PerpRouterStack {
  venues: VenueRegistry;
  oracles: OracleRegistry;
  router: PerpRouter;
  config: RouterConfig;
}

export function createPerpRouterStack(options: PerpRouterStackOptions = {}): PerpRouterStack {
  const config = options.config ?? loadRouterConfig();
  const owner = options.owner ?? config.owner;
  if (!owner) {
    throw new RouterError(RouterErrorCode.InvalidAddress, 'An owner address is required (PERP_ROUTER_OWNER)');
  }

  const clock = options.clock ?? systemClock;
  const log = options.logger ?? createComponentLogger('PerpRouterStack');

  const venues = new VenueRegistry(owner, { logger: log.child({ component: 'VenueRegistry' }) });
  const oracles = new OracleRegistry(owner, {
    clock,
    logger: log.child({ component: 'OracleRegistry' }),
    maxPriceDeviationBps: config.maxPriceDeviationBps,
  });
  const router = new PerpRouter({
    owner,
    venues,
    oracles,
    locator: options.locator,
    clock,
    logger: log.child({ component: 'PerpRouter' }),
    config: {
      venueCallTimeoutMs: config.venueCallTimeoutMs,
      compensateOnSlippage: config.compensateOnSlippage,
    },
  });

  log.info('Perp router stack created', {
    owner: router.owner(),
    maxPriceDeviationBps: config.maxPriceDeviationBps,
    venueCallTimeoutMs: config.venueCallTimeoutMs,
    compensateOnSlippage: config.compensateOnSlippage,
  });

  return { venues, oracles, router, config };
}
