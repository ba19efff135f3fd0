/**
 * Perp Router
 *
 * Routes leveraged perpetual-futures trades to independent venues.
 *
 * Open flow:
 * 1. Validate: reentrancy, pause, deadline and input checks, no side effects
 * 2. Select: fan quotes out to eligible venues, keep the best effective price
 * 3. Price check: validate the winner's unadjusted price against the oracle
 * 4. Execute: the single state-changing venue call
 * 5. Confirm: enforce the caller's minimum output and emit the lifecycle event
 *
 * Close, increase and reduce resolve their venue through a PositionLocator
 * instead of a price search.
 *
 * @module router/PerpRouter
 */

import type { Logger } from 'winston';
import { v4 as uuidv4 } from 'uuid';
import { Pausable, requireAddress } from '../access/Ownable';
import { DEFAULT_ROUTER_CONFIG, RouterConfig } from '../config';
import { RouterError, RouterErrorCode, errorMessage } from '../errors/RouterError';
import type { OracleRegistry } from '../oracle/OracleRegistry';
import type { VenueRegistry, VenueSnapshot } from '../registry/VenueRegistry';
import { createComponentLogger, formatAmount } from '../utils/logger';
import { FirstActiveVenueLocator, PositionLocator } from './PositionLocator';
import { ReentrancyGuard } from './ReentrancyGuard';
import { VenueSelector } from './VenueSelector';
import {
  ClosePositionParams,
  Clock,
  CompensationOutcome,
  IncreasePositionParams,
  OpenPositionParams,
  PositionAction,
  PositionClosedEvent,
  PositionIncreasedEvent,
  PositionOpenedEvent,
  PositionReducedEvent,
  QuoteRequest,
  ReducePositionParams,
  RouterEvents,
  SlippageCompensatedEvent,
  VenueGateway,
  VenueSelection,
  systemClock,
} from '../types';

/**
 * The router-owned part of RouterConfig. The deviation tolerance belongs to
 * the OracleRegistry and the owner is passed on its own.
 */
export type RouterExecutionConfig = Pick<RouterConfig, 'venueCallTimeoutMs' | 'compensateOnSlippage'>;

export interface PerpRouterOptions {
  owner: string;
  venues: VenueRegistry;
  oracles: OracleRegistry;
  locator?: PositionLocator;
  clock?: Clock;
  logger?: Logger;
  config?: Partial<RouterExecutionConfig>;
}

interface SlippageContext {
  requestId: string;
  user: string;
  market: string;
  venue: string;
  realized: bigint;
  minOut: bigint;
  unwind?: {
    action: 'open' | 'increase';
    size: bigint;
    run: () => Promise<bigint>;
  };
}

export class PerpRouter extends Pausable {
  private venues: VenueRegistry;
  private oracles: OracleRegistry;
  private locator: PositionLocator;
  private clock: Clock;
  private logger: Logger;
  private config: RouterExecutionConfig;
  private selector: VenueSelector;
  private guard = new ReentrancyGuard();

  constructor(options: PerpRouterOptions) {
    super(options.owner);
    this.venues = options.venues;
    this.oracles = options.oracles;
    this.locator = options.locator ?? new FirstActiveVenueLocator();
    this.clock = options.clock ?? systemClock;
    this.logger = options.logger ?? createComponentLogger('PerpRouter');
    this.config = {
      venueCallTimeoutMs: options.config?.venueCallTimeoutMs ?? DEFAULT_ROUTER_CONFIG.venueCallTimeoutMs,
      compensateOnSlippage: options.config?.compensateOnSlippage ?? DEFAULT_ROUTER_CONFIG.compensateOnSlippage,
    };
    this.selector = new VenueSelector({
      clock: this.clock,
      venueCallTimeoutMs: this.config.venueCallTimeoutMs,
      logger: this.logger,
    });
  }

  /**
   * Open a position on the venue with the best effective price
   *
   * @returns Size executed by the venue
   */
  openPosition(caller: string, params: OpenPositionParams): Promise<bigint> {
    return this.guard.run(caller, async () => {
      const user = this.beginStateChange(caller, params.deadline);
      const { market, isLong, margin, leverage, minOut, deadline } = params;
      this.requireMarket(market);
      this.requirePositive(margin, RouterErrorCode.InvalidMargin, 'margin');
      this.requireLeverage(leverage);

      const requestId = uuidv4();
      const venues = this.venues.snapshot();
      const oracles = this.oracles.snapshot();

      this.logger.info('Opening position', {
        requestId,
        user,
        market,
        isLong,
        margin: formatAmount(margin),
        leverage,
      });

      const selection = await this.selector.selectBestVenue(venues, { market, isLong, margin, leverage, deadline });
      await oracles.validateExecutionPrice(market, selection.executionPrice, isLong);
      this.checkDeadline(deadline);

      const executedSize = await selection.gateway.openPosition(market, isLong, margin, leverage);

      if (executedSize < minOut) {
        await this.failSlippage({
          requestId,
          user,
          market,
          venue: selection.venue,
          realized: executedSize,
          minOut,
          unwind: {
            action: 'open',
            size: executedSize,
            run: () => selection.gateway.closePosition(market, executedSize),
          },
        });
      }

      const event: PositionOpenedEvent = {
        requestId,
        user,
        market,
        venue: selection.venue,
        isLong,
        margin,
        leverage,
        executedSize,
        executionPrice: selection.executionPrice,
      };
      this.logger.info('Position opened', {
        requestId,
        venue: selection.venue,
        executedSize: formatAmount(executedSize),
        executionPrice: formatAmount(selection.executionPrice),
      });
      this.emit(RouterEvents.PositionOpened, event);

      return executedSize;
    });
  }

  /**
   * @returns Payout realised by the venue
   */
  closePosition(caller: string, params: ClosePositionParams): Promise<bigint> {
    return this.guard.run(caller, async () => {
      const user = this.beginStateChange(caller, params.deadline);
      const { market, positionSize, minOut, deadline } = params;
      this.requireMarket(market);
      this.requirePositive(positionSize, RouterErrorCode.InvalidSize, 'positionSize');

      const requestId = uuidv4();
      const { venue, gateway } = this.locateVenue(this.venues.snapshot(), user, market, 'close');
      this.logger.info('Closing position', { requestId, user, market, venue, positionSize: formatAmount(positionSize) });
      this.checkDeadline(deadline);

      const payout = await gateway.closePosition(market, positionSize);
      if (payout < minOut) {
        await this.failSlippage({ requestId, user, market, venue, realized: payout, minOut });
      }

      const event: PositionClosedEvent = { requestId, user, market, venue, positionSize, payout };
      this.logger.info('Position closed', { requestId, venue, payout: formatAmount(payout) });
      this.emit(RouterEvents.PositionClosed, event);
      return payout;
    });
  }

  /**
   * @returns Size added by the venue
   */
  increasePosition(caller: string, params: IncreasePositionParams): Promise<bigint> {
    return this.guard.run(caller, async () => {
      const user = this.beginStateChange(caller, params.deadline);
      const { market, additionalMargin, leverage, minOut, deadline } = params;
      this.requireMarket(market);
      this.requirePositive(additionalMargin, RouterErrorCode.InvalidMargin, 'additionalMargin');
      this.requireLeverage(leverage);

      const requestId = uuidv4();
      const { venue, gateway } = this.locateVenue(this.venues.snapshot(), user, market, 'increase');
      this.logger.info('Increasing position', {
        requestId,
        user,
        market,
        venue,
        additionalMargin: formatAmount(additionalMargin),
        leverage,
      });
      this.checkDeadline(deadline);

      const additionalSize = await gateway.increasePosition(market, additionalMargin, leverage);
      if (additionalSize < minOut) {
        await this.failSlippage({
          requestId,
          user,
          market,
          venue,
          realized: additionalSize,
          minOut,
          unwind: {
            action: 'increase',
            size: additionalSize,
            run: () => gateway.reducePosition(market, additionalSize),
          },
        });
      }

      const event: PositionIncreasedEvent = {
        requestId,
        user,
        market,
        venue,
        additionalMargin,
        leverage,
        additionalSize,
      };
      this.logger.info('Position increased', { requestId, venue, additionalSize: formatAmount(additionalSize) });
      this.emit(RouterEvents.PositionIncreased, event);
      return additionalSize;
    });
  }

  /**
   * @returns Payout realised by the venue
   */
  reducePosition(caller: string, params: ReducePositionParams): Promise<bigint> {
    return this.guard.run(caller, async () => {
      const user = this.beginStateChange(caller, params.deadline);
      const { market, sizeToReduce, minOut, deadline } = params;
      this.requireMarket(market);
      this.requirePositive(sizeToReduce, RouterErrorCode.InvalidSize, 'sizeToReduce');

      const requestId = uuidv4();
      const { venue, gateway } = this.locateVenue(this.venues.snapshot(), user, market, 'reduce');
      this.logger.info('Reducing position', { requestId, user, market, venue, sizeToReduce: formatAmount(sizeToReduce) });
      this.checkDeadline(deadline);

      const payout = await gateway.reducePosition(market, sizeToReduce);
      if (payout < minOut) {
        await this.failSlippage({ requestId, user, market, venue, realized: payout, minOut });
      }

      const event: PositionReducedEvent = { requestId, user, market, venue, sizeToReduce, payout };
      this.logger.info('Position reduced', { requestId, venue, payout: formatAmount(payout) });
      this.emit(RouterEvents.PositionReduced, event);
      return payout;
    });
  }

  /**
   * Preview venue selection without validating or executing anything
   */
  async quoteBestVenue(request: QuoteRequest): Promise<VenueSelection> {
    if (request.deadline !== undefined) {
      this.checkDeadline(request.deadline);
    }
    this.requireMarket(request.market);
    this.requirePositive(request.margin, RouterErrorCode.InvalidMargin, 'margin');
    this.requireLeverage(request.leverage);

    return this.selector.selectBestVenue(this.venues.snapshot(), request);
  }

  isCallInFlight(user: string): boolean {
    return this.guard.isHeld(user);
  }

  // --------------------------------------------------------------------------
  // Checks
  // --------------------------------------------------------------------------

  private beginStateChange(caller: string, deadline: number): string {
    this.whenNotPaused();
    this.checkDeadline(deadline);
    return requireAddress(caller, 'caller');
  }

  private checkDeadline(deadline: number): void {
    const now = this.clock();
    if (!Number.isFinite(deadline) || now > deadline) {
      throw new RouterError(RouterErrorCode.DeadlineExpired, 'Deadline expired', { deadline, now });
    }
  }

  private requireMarket(market: string): void {
    if (!market || market.trim() === '') {
      throw new RouterError(RouterErrorCode.InvalidMarket, 'Market is required');
    }
  }

  private requirePositive(value: bigint, code: RouterErrorCode, label: string): void {
    if (value <= 0n) {
      throw new RouterError(code, `${label} must be greater than zero`, { [label]: value.toString() });
    }
  }

  private requireLeverage(leverage: number): void {
    if (!Number.isInteger(leverage) || leverage <= 0) {
      throw new RouterError(RouterErrorCode.InvalidLeverage, 'Leverage must be a positive integer', { leverage });
    }
  }

  private locateVenue(
    venues: VenueSnapshot,
    user: string,
    market: string,
    action: PositionAction
  ): { venue: string; gateway: VenueGateway } {
    const venue = this.locator.locate({ user, market, action }, venues);
    const gateway = venues.getGateway(venue);
    if (!venues.getInfo(venue).active || !gateway) {
      throw new RouterError(RouterErrorCode.NotRegistered, `Venue ${venue} is not active`, { venue });
    }
    return { venue, gateway };
  }

  // --------------------------------------------------------------------------
  // Slippage
  // --------------------------------------------------------------------------

  /**
   * The venue call has already happened. Optionally unwind it, then fail
   * the request.
   */
  private async failSlippage(context: SlippageContext): Promise<never> {
    const { requestId, user, market, venue, realized, minOut, unwind } = context;
    let compensation: CompensationOutcome = 'none';

    if (this.config.compensateOnSlippage && unwind) {
      try {
        const recovered = await unwind.run();
        compensation = 'unwound';

        const event: SlippageCompensatedEvent = {
          requestId,
          user,
          market,
          venue,
          action: unwind.action,
          unwoundSize: unwind.size,
          recovered,
        };
        this.logger.warn('Slippage compensated', { requestId, venue, recovered: formatAmount(recovered) });
        this.emit(RouterEvents.SlippageCompensated, event);
      } catch (error) {
        compensation = 'failed';
        this.logger.error('Slippage compensation failed', { requestId, venue, error: errorMessage(error) });
      }
    }

    throw new RouterError(RouterErrorCode.SlippageExceeded, 'Realized output below minimum', {
      requestId,
      venue,
      realized: realized.toString(),
      minOut: minOut.toString(),
      compensation,
    });
  }
}
