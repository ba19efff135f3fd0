/**
 * Venue Selector
 *
 * Fans a quote request out to every eligible active venue and picks the
 * best fee-adjusted price. A venue that fails, times out or returns an
 * unusable quote is excluded; selection only fails when nothing usable is
 * left.
 *
 * @module router/VenueSelector
 */

import type { Logger } from 'winston';
import { requireCallTimeout } from '../config';
import { RouterError, RouterErrorCode, errorMessage } from '../errors/RouterError';
import type { VenueSnapshot } from '../registry/VenueRegistry';
import { formatAmount } from '../utils/logger';
import { effectivePrice, isBetterPrice } from '../utils/pricing';
import { withTimeout } from '../utils/timeout';
import { Clock, QuoteOutcome, QuoteRequest, VenueGateway, VenueSelection } from '../types';

export interface VenueSelectorOptions {
  clock: Clock;
  venueCallTimeoutMs: number;
  logger: Logger;
}

interface Candidate {
  outcome: QuoteOutcome;
  gateway?: VenueGateway; // set only for quoted venues
}

export class VenueSelector {
  private clock: Clock;
  private venueCallTimeoutMs: number;
  private logger: Logger;

  constructor(options: VenueSelectorOptions) {
    this.clock = options.clock;
    this.venueCallTimeoutMs = requireCallTimeout(options.venueCallTimeoutMs);
    this.logger = options.logger;
  }

  /**
   * Pick the venue with the best effective price.
   * Longs want the lowest `price + fee`, shorts the highest `price - fee`;
   * on equal prices the venue listed first wins.
   */
  async selectBestVenue(venues: VenueSnapshot, request: QuoteRequest): Promise<VenueSelection> {
    const active = venues.listActive();
    if (active.length === 0) {
      throw new RouterError(RouterErrorCode.NoActiveVenues, 'No active venues', { market: request.market });
    }

    const candidates = await Promise.all(active.map(venue => this.quoteVenue(venues, venue, request)));

    let best: { venue: string; gateway: VenueGateway; price: bigint; fee: bigint; effective: bigint } | undefined;
    for (const { outcome, gateway } of candidates) {
      if (outcome.status !== 'quoted') {
        this.logger.warn('Venue excluded from selection', {
          venue: outcome.venue,
          status: outcome.status,
          reason: outcome.reason,
        });
        continue;
      }
      if (!gateway) {
        continue;
      }

      if (!best || isBetterPrice(outcome.effectivePrice, best.effective, request.isLong)) {
        best = {
          venue: outcome.venue,
          gateway,
          price: outcome.quote.price,
          fee: outcome.quote.fee,
          effective: outcome.effectivePrice,
        };
      }
    }

    const outcomes = candidates.map(c => c.outcome);
    if (!best) {
      throw new RouterError(RouterErrorCode.NoActiveVenues, 'No venue produced a usable quote', {
        market: request.market,
        outcomes: outcomes.map(o => ({ venue: o.venue, status: o.status })),
      });
    }

    this.logger.debug('Venue selected', {
      venue: best.venue,
      executionPrice: formatAmount(best.price),
      effectivePrice: formatAmount(best.effective),
      considered: outcomes.length,
    });

    return {
      venue: best.venue,
      gateway: best.gateway,
      executionPrice: best.price,
      fee: best.fee,
      effectivePrice: best.effective,
      outcomes,
    };
  }

  private async quoteVenue(venues: VenueSnapshot, venue: string, request: QuoteRequest): Promise<Candidate> {
    const info = venues.getInfo(venue);
    const gateway = venues.getGateway(venue);
    const fail = (status: 'ineligible' | 'failed', reason: string): Candidate => ({
      outcome: { venue, status, reason },
    });

    if (request.leverage > info.maxLeverage) {
      return fail('ineligible', `leverage ${request.leverage} exceeds venue max ${info.maxLeverage}`);
    }
    if (!gateway) {
      return fail('failed', 'no gateway bound');
    }

    try {
      const quote = await withTimeout(
        signal => gateway.getQuote(request.market, request.isLong, request.margin, request.leverage, { signal }),
        this.quoteTimeoutMs(request.deadline),
        `quote from ${venue}`
      );

      if (quote.price <= 0n || quote.fee < 0n) {
        return fail('failed', 'unusable quote');
      }
      if (!request.isLong && quote.fee > quote.price) {
        return fail('failed', 'fee exceeds price');
      }

      return {
        gateway,
        outcome: {
          venue,
          status: 'quoted',
          quote,
          effectivePrice: effectivePrice(quote.price, quote.fee, request.isLong),
        },
      };
    } catch (error) {
      return fail('failed', errorMessage(error));
    }
  }

  /**
   * Quote budget: the configured cap, shortened to what is left of the
   * deadline's last second.
   */
  private quoteTimeoutMs(deadline?: number): number {
    if (deadline === undefined) {
      return this.venueCallTimeoutMs;
    }
    const remainingMs = (deadline + 1 - this.clock()) * 1000;
    return Math.min(this.venueCallTimeoutMs, remainingMs);
  }
}
