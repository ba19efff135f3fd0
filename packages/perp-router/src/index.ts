/**
 * Perp Router
 *
 * Best-price venue selection with oracle-validated, deadline- and
 * slippage-bounded execution for leveraged perpetual-futures positions.
 */

export * from './types';
export * from './errors/RouterError';
export { loadRouterConfig, requireCallTimeout, DEFAULT_ROUTER_CONFIG } from './config';
export type { RouterConfig, EnvSource } from './config';
export { Ownable, Pausable, requireAddress } from './access/Ownable';
export { VenueRegistry, VenueSnapshot } from './registry/VenueRegistry';
export type { VenueRegistryOptions } from './registry/VenueRegistry';
export { OracleRegistry, OracleSnapshot } from './oracle/OracleRegistry';
export type { OracleRegistryOptions } from './oracle/OracleRegistry';
export { ChainlinkPriceFeed, scaleToPriceDecimals } from './oracle/ChainlinkPriceFeed';
export { ContractVenueGateway, encodeMarket } from './venues/ContractVenueGateway';
export { PerpRouter } from './router/PerpRouter';
export type { PerpRouterOptions, RouterExecutionConfig } from './router/PerpRouter';
export { VenueSelector } from './router/VenueSelector';
export { FirstActiveVenueLocator } from './router/PositionLocator';
export type { PositionLocator, PositionLookup } from './router/PositionLocator';
export { ReentrancyGuard } from './router/ReentrancyGuard';
export { createPerpRouterStack } from './core/createPerpRouterStack';
export type { PerpRouterStack, PerpRouterStackOptions } from './core/createPerpRouterStack';
export { deviationBps, effectivePrice, isBetterPrice } from './utils/pricing';
export { withTimeout, TimeoutError, MAX_TIMER_DELAY_MS } from './utils/timeout';
export { logger, createComponentLogger } from './utils/logger';
