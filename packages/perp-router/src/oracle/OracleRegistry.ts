/**
 * Oracle Registry
 *
 * Maps markets to price feeds and validates venue execution prices
 * against them. Observations are read at the moment of use and never
 * cached.
 *
 * @module oracle/OracleRegistry
 */

import type { Logger } from 'winston';
import { Ownable } from '../access/Ownable';
import { RouterError, RouterErrorCode } from '../errors/RouterError';
import { createComponentLogger, formatAmount } from '../utils/logger';
import { deviationBps } from '../utils/pricing';
import {
  Clock,
  DEFAULT_MAX_PRICE_DEVIATION_BPS,
  MAX_PRICE_AGE_SECONDS,
  MaxPriceDeviationUpdatedEvent,
  OracleSetEvent,
  PriceFeed,
  RouterEvents,
  systemClock,
} from '../types';

/**
 * Frozen view of the bindings and tolerance. Feed reads stay live.
 */
export class OracleSnapshot {
  constructor(
    private readonly feeds: ReadonlyMap<string, PriceFeed>,
    private readonly toleranceBps: number,
    private readonly clock: Clock
  ) {}

  maxPriceDeviationBps(): number {
    return this.toleranceBps;
  }

  getFeed(market: string): PriceFeed | undefined {
    return this.feeds.get(market);
  }

  async getValidatedPrice(market: string): Promise<bigint> {
    const feed = this.feeds.get(market);
    if (!feed) {
      throw new RouterError(RouterErrorCode.OracleNotSet, `No oracle bound for market ${market}`, { market });
    }

    const { price, observedAt } = await feed.getLatestPrice();
    const now = this.clock();

    if (price <= 0n) {
      throw new RouterError(RouterErrorCode.InvalidOraclePrice, `Oracle reported a non-positive price for ${market}`, {
        market,
        feed: feed.id,
        price: price.toString(),
      });
    }
    if (observedAt > now) {
      throw new RouterError(RouterErrorCode.InvalidOraclePrice, `Oracle observation for ${market} is in the future`, {
        market,
        feed: feed.id,
        observedAt,
        now,
      });
    }
    if (now - observedAt > MAX_PRICE_AGE_SECONDS) {
      throw new RouterError(RouterErrorCode.StalePrice, `Oracle price for ${market} is stale`, {
        market,
        feed: feed.id,
        ageSeconds: now - observedAt,
        maxAgeSeconds: MAX_PRICE_AGE_SECONDS,
      });
    }

    return price;
  }

  /**
   * Reject an execution price too far from the oracle price.
   * The deviation is symmetric; `isLong` does not change it.
   */
  async validateExecutionPrice(market: string, executionPrice: bigint, isLong: boolean): Promise<void> {
    const oraclePrice = await this.getValidatedPrice(market);
    const deviation = deviationBps(executionPrice, oraclePrice);

    if (deviation > BigInt(this.toleranceBps)) {
      throw new RouterError(RouterErrorCode.PriceDeviationTooHigh, 'Execution price deviates too far from oracle', {
        market,
        isLong,
        executionPrice: formatAmount(executionPrice),
        oraclePrice: formatAmount(oraclePrice),
        deviationBps: Number(deviation),
        toleranceBps: this.toleranceBps,
      });
    }
  }
}

export interface OracleRegistryOptions {
  clock?: Clock;
  logger?: Logger;
  maxPriceDeviationBps?: number;
}

export class OracleRegistry extends Ownable {
  private feeds: Map<string, PriceFeed> = new Map();
  private toleranceBps: number;
  private clock: Clock;
  private logger: Logger;

  constructor(owner: string, options: OracleRegistryOptions = {}) {
    super(owner);
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createComponentLogger('OracleRegistry');
    this.toleranceBps = OracleRegistry.requireTolerance(
      options.maxPriceDeviationBps ?? DEFAULT_MAX_PRICE_DEVIATION_BPS
    );
  }

  /**
   * Bind a market to a feed. Re-binding overwrites.
   */
  bind(caller: string, market: string, feed: PriceFeed): void {
    this.onlyOwner(caller);
    if (!market || market.trim() === '' || !feed) {
      throw new RouterError(RouterErrorCode.InvalidOracle, 'Market and feed are required', { market });
    }

    this.feeds.set(market, feed);
    this.logger.info('Oracle bound', { market, feed: feed.id });

    const event: OracleSetEvent = { market, feed: feed.id };
    this.emit(RouterEvents.OracleSet, event);
  }

  setDeviationTolerance(caller: string, bps: number): void {
    this.onlyOwner(caller);
    const newBps = OracleRegistry.requireTolerance(bps);

    const event: MaxPriceDeviationUpdatedEvent = { oldBps: this.toleranceBps, newBps };
    this.toleranceBps = newBps;
    this.logger.info('Max price deviation updated', { ...event });
    this.emit(RouterEvents.MaxPriceDeviationUpdated, event);
  }

  maxPriceDeviationBps(): number {
    return this.toleranceBps;
  }

  getFeed(market: string): PriceFeed | undefined {
    return this.feeds.get(market);
  }

  getValidatedPrice(market: string): Promise<bigint> {
    return this.snapshot().getValidatedPrice(market);
  }

  validateExecutionPrice(market: string, executionPrice: bigint, isLong: boolean): Promise<void> {
    return this.snapshot().validateExecutionPrice(market, executionPrice, isLong);
  }

  snapshot(): OracleSnapshot {
    return new OracleSnapshot(new Map(this.feeds), this.toleranceBps, this.clock);
  }

  private static requireTolerance(bps: number): number {
    if (!Number.isSafeInteger(bps) || bps < 0) {
      throw new RouterError(RouterErrorCode.InvalidTolerance, 'Tolerance must be a non-negative integer', { bps });
    }
    return bps;
  }
}
