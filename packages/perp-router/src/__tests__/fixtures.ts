/**
 * In-process stand-ins for venues, feeds and time used across the tests
 */
import winston from 'winston';
import { PriceFeed, PriceObservation, Quote, QuoteOptions, VenueGateway } from '../types';

export const OWNER = '0x1000000000000000000000000000000000000001';
export const USER = '0x2000000000000000000000000000000000000002';
export const STRANGER = '0x3000000000000000000000000000000000000003';
export const VENUE_A = '0x0000000000000000000000000000000000000101';
export const VENUE_B = '0x0000000000000000000000000000000000000202';
export const VENUE_C = '0x0000000000000000000000000000000000000303';
export const MARKET = 'ETH-USD';
export const START_TIME = 1_700_000_000;

export const e18 = (value: number | bigint): bigint => BigInt(value) * 10n ** 18n;

export const silentLogger = winston.createLogger({ silent: true });

export class ManualClock {
  constructor(public now: number = START_TIME) {}

  readonly read = (): number => this.now;

  advance(seconds: number): void {
    this.now += seconds;
  }
}

export interface FakeVenueOptions {
  price: bigint;
  feeBps?: number;
}

/**
 * Venue whose quote is `price` with a proportional fee and whose fills
 * follow `size = margin * leverage / price`.
 */
export class FakeVenue implements VenueGateway {
  price: bigint;
  feeBps: number;
  quoteError?: Error;
  hangQuotes = false;
  executionError?: Error;
  sizeOverride?: bigint;
  payoutOverride?: bigint;
  unwindError?: Error;
  calls: string[] = [];

  constructor(options: FakeVenueOptions) {
    this.price = options.price;
    this.feeBps = options.feeBps ?? 0;
  }

  get fee(): bigint {
    return (this.price * BigInt(this.feeBps)) / 10_000n;
  }

  async getQuote(
    market: string,
    isLong: boolean,
    margin: bigint,
    leverage: number,
    options: QuoteOptions = {}
  ): Promise<Quote> {
    this.calls.push('getQuote');
    if (this.quoteError) {
      throw this.quoteError;
    }
    if (this.hangQuotes) {
      return new Promise<Quote>((_, reject) => {
        options.signal?.addEventListener('abort', () => reject(new Error('aborted')));
      });
    }
    return { price: this.price, fee: this.fee };
  }

  async openPosition(market: string, isLong: boolean, margin: bigint, leverage: number): Promise<bigint> {
    this.calls.push('openPosition');
    if (this.executionError) {
      throw this.executionError;
    }
    return this.sizeOverride ?? (margin * BigInt(leverage) * 10n ** 18n) / this.price;
  }

  async closePosition(market: string, positionSize: bigint): Promise<bigint> {
    this.calls.push('closePosition');
    if (this.unwindError) {
      throw this.unwindError;
    }
    return this.payoutOverride ?? (positionSize * this.price) / 10n ** 18n;
  }

  async increasePosition(market: string, additionalMargin: bigint, leverage: number): Promise<bigint> {
    this.calls.push('increasePosition');
    if (this.executionError) {
      throw this.executionError;
    }
    return this.sizeOverride ?? (additionalMargin * BigInt(leverage) * 10n ** 18n) / this.price;
  }

  async reducePosition(market: string, sizeToReduce: bigint): Promise<bigint> {
    this.calls.push('reducePosition');
    if (this.unwindError) {
      throw this.unwindError;
    }
    return this.payoutOverride ?? (sizeToReduce * this.price) / 10n ** 18n;
  }
}

export class StaticFeed implements PriceFeed {
  readonly id: string;
  observation: PriceObservation;
  error?: Error;
  reads = 0;

  constructor(id: string, price: bigint, observedAt: number) {
    this.id = id;
    this.observation = { price, observedAt };
  }

  async getLatestPrice(): Promise<PriceObservation> {
    this.reads++;
    if (this.error) {
      throw this.error;
    }
    return { ...this.observation };
  }
}
