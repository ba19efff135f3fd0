/**
 * Perp Router Type Definitions
 *
 * Shared types for the venue registry, oracle registry, venue gateways
 * and the router itself.
 */

// ============================================================================
// CONSTANTS
// ============================================================================

/** Prices, margins and sizes are 18-decimal fixed-point values */
export const PRICE_DECIMALS = 18;

/** Maximum age of an oracle observation, in seconds (15 minutes) */
export const MAX_PRICE_AGE_SECONDS = 15 * 60;

/** Default tolerated deviation between execution and oracle price (5%) */
export const DEFAULT_MAX_PRICE_DEVIATION_BPS = 500;

/** Upper bound accepted for a venue's max leverage */
export const MAX_LEVERAGE = 100;

export const BPS_DENOMINATOR = 10_000n;

/**
 * Returns the current unix time in seconds
 */
export type Clock = () => number;

export const systemClock: Clock = () => Math.floor(Date.now() / 1000);

// ============================================================================
// VENUE TYPES
// ============================================================================

/**
 * Venue metadata held by the registry
 */
export interface VenueInfo {
  active: boolean;
  maxLeverage: number;
  feeRateBps: number;
  name: string;
}

/**
 * Quote returned by a venue for a hypothetical trade
 */
export interface Quote {
  price: bigint;
  fee: bigint;
}

export interface QuoteOptions {
  signal?: AbortSignal;
}

/**
 * Execution surface exposed by every venue.
 *
 * Calls may reject at any time; a rejection means nothing happened on the
 * venue side.
 */
export interface VenueGateway {
  getQuote(
    market: string,
    isLong: boolean,
    margin: bigint,
    leverage: number,
    options?: QuoteOptions
  ): Promise<Quote>;
  openPosition(market: string, isLong: boolean, margin: bigint, leverage: number): Promise<bigint>;
  closePosition(market: string, positionSize: bigint): Promise<bigint>;
  increasePosition(market: string, additionalMargin: bigint, leverage: number): Promise<bigint>;
  reducePosition(market: string, sizeToReduce: bigint): Promise<bigint>;
}

// ============================================================================
// ORACLE TYPES
// ============================================================================

export interface PriceObservation {
  price: bigint;
  observedAt: number; // unix seconds
}

/**
 * Price feed bound to a market
 */
export interface PriceFeed {
  readonly id: string;
  getLatestPrice(): Promise<PriceObservation>;
}

// ============================================================================
// ROUTER REQUEST TYPES
// ============================================================================

export interface OpenPositionParams {
  market: string;
  isLong: boolean;
  margin: bigint;
  leverage: number;
  minOut: bigint;
  deadline: number; // unix seconds, inclusive
}

export interface ClosePositionParams {
  market: string;
  positionSize: bigint;
  minOut: bigint;
  deadline: number;
}

export interface IncreasePositionParams {
  market: string;
  additionalMargin: bigint;
  leverage: number;
  minOut: bigint;
  deadline: number;
}

export interface ReducePositionParams {
  market: string;
  sizeToReduce: bigint;
  minOut: bigint;
  deadline: number;
}

export type QuoteRequest = Pick<OpenPositionParams, 'market' | 'isLong' | 'margin' | 'leverage'> & {
  deadline?: number;
};

export type PositionAction = 'close' | 'increase' | 'reduce';

/**
 * Outcome of asking a single venue for a quote during selection
 */
export type QuoteOutcome =
  | { venue: string; status: 'quoted'; quote: Quote; effectivePrice: bigint }
  | { venue: string; status: 'ineligible'; reason: string }
  | { venue: string; status: 'failed'; reason: string };

export interface VenueSelection {
  venue: string;
  gateway: VenueGateway;
  executionPrice: bigint;
  fee: bigint;
  effectivePrice: bigint;
  outcomes: QuoteOutcome[];
}

export type CompensationOutcome = 'none' | 'unwound' | 'failed';

// ============================================================================
// EVENT TYPES
// ============================================================================

export interface PositionOpenedEvent {
  requestId: string;
  user: string;
  market: string;
  venue: string;
  isLong: boolean;
  margin: bigint;
  leverage: number;
  executedSize: bigint;
  executionPrice: bigint;
}

export interface PositionClosedEvent {
  requestId: string;
  user: string;
  market: string;
  venue: string;
  positionSize: bigint;
  payout: bigint;
}

export interface PositionIncreasedEvent {
  requestId: string;
  user: string;
  market: string;
  venue: string;
  additionalMargin: bigint;
  leverage: number;
  additionalSize: bigint;
}

export interface PositionReducedEvent {
  requestId: string;
  user: string;
  market: string;
  venue: string;
  sizeToReduce: bigint;
  payout: bigint;
}

export interface SlippageCompensatedEvent {
  requestId: string;
  user: string;
  market: string;
  venue: string;
  action: 'open' | 'increase';
  unwoundSize: bigint;
  recovered: bigint;
}

export interface VenueRegisteredEvent {
  venue: string;
  name: string;
  maxLeverage: number;
  feeRateBps: number;
}

export interface VenueStatusChangedEvent {
  venue: string;
  active: boolean;
}

export interface OracleSetEvent {
  market: string;
  feed: string;
}

export interface MaxPriceDeviationUpdatedEvent {
  oldBps: number;
  newBps: number;
}

export interface OwnershipTransferredEvent {
  previousOwner: string;
  newOwner: string;
}

/**
 * Lifecycle event names
 */
export const RouterEvents = {
  PositionOpened: 'PositionOpened',
  PositionClosed: 'PositionClosed',
  PositionIncreased: 'PositionIncreased',
  PositionReduced: 'PositionReduced',
  SlippageCompensated: 'SlippageCompensated',
  VenueRegistered: 'VenueRegistered',
  VenueRemoved: 'VenueRemoved',
  VenueStatusChanged: 'VenueStatusChanged',
  OracleSet: 'OracleSet',
  MaxPriceDeviationUpdated: 'MaxPriceDeviationUpdated',
  OwnershipTransferred: 'OwnershipTransferred',
  Paused: 'Paused',
  Unpaused: 'Unpaused',
} as const;

export type RouterEventName = (typeof RouterEvents)[keyof typeof RouterEvents];
