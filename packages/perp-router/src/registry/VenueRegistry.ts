/**
 * Venue Registry
 *
 * Keyed store of venue metadata and the gateway bound to each venue.
 * Venues are never removed: deactivation is the deletion semantic, so
 * lookups of retired venues keep returning their last metadata.
 *
 * @module registry/VenueRegistry
 */

import type { Logger } from 'winston';
import { getAddress, isAddress, ZeroAddress } from 'ethers';
import { Ownable } from '../access/Ownable';
import { RouterError, RouterErrorCode } from '../errors/RouterError';
import { createComponentLogger } from '../utils/logger';
import {
  MAX_LEVERAGE,
  RouterEvents,
  VenueGateway,
  VenueInfo,
  VenueRegisteredEvent,
  VenueStatusChangedEvent,
} from '../types';

const EMPTY_VENUE: VenueInfo = Object.freeze({
  active: false,
  maxLeverage: 0,
  feeRateBps: 0,
  name: '',
});

/**
 * Normalise a venue handle, or undefined if it cannot identify a venue
 */
function normalizeHandle(handle: string): string | undefined {
  if (!handle || !isAddress(handle)) {
    return undefined;
  }
  const address = getAddress(handle);
  return address === ZeroAddress ? undefined : address;
}

/**
 * Read-only view of the registry taken at a point in time
 */
export class VenueSnapshot {
  private readonly activeHandles: readonly string[];

  constructor(
    private readonly records: ReadonlyMap<string, VenueInfo>,
    private readonly gateways: ReadonlyMap<string, VenueGateway>,
    order: readonly string[]
  ) {
    this.activeHandles = Object.freeze(order.filter(handle => records.get(handle)?.active === true));
  }

  listActive(): string[] {
    return [...this.activeHandles];
  }

  getInfo(handle: string): VenueInfo {
    const key = normalizeHandle(handle);
    const record = key ? this.records.get(key) : undefined;
    return { ...(record ?? EMPTY_VENUE) };
  }

  getGateway(handle: string): VenueGateway | undefined {
    const key = normalizeHandle(handle);
    return key ? this.gateways.get(key) : undefined;
  }
}

export interface VenueRegistryOptions {
  logger?: Logger;
}

/**
 * Venue Registry
 *
 * @example
 * ```typescript
 * const registry = new VenueRegistry(owner);
 * registry.register(owner, venueAddress, 'GMX', 50, 10, gateway);
 * registry.listActive(); // [venueAddress]
 * ```
 */
export class VenueRegistry extends Ownable {
  private records: Map<string, VenueInfo> = new Map();
  private gateways: Map<string, VenueGateway> = new Map();
  private order: string[] = []; // first-registration order
  private logger: Logger;

  constructor(owner: string, options: VenueRegistryOptions = {}) {
    super(owner);
    this.logger = options.logger ?? createComponentLogger('VenueRegistry');
  }

  /**
   * Register a venue, or re-register a deactivated one
   */
  register(
    caller: string,
    handle: string,
    name: string,
    maxLeverage: number,
    feeRateBps: number,
    gateway: VenueGateway
  ): void {
    this.onlyOwner(caller);

    const key = normalizeHandle(handle);
    if (!key || !gateway) {
      throw new RouterError(RouterErrorCode.InvalidVenue, 'Invalid venue handle', { handle });
    }
    if (this.records.get(key)?.active) {
      throw new RouterError(RouterErrorCode.AlreadyRegistered, `Venue ${key} is already registered`, {
        venue: key,
      });
    }
    if (!Number.isInteger(maxLeverage) || maxLeverage <= 0 || maxLeverage > MAX_LEVERAGE) {
      throw new RouterError(
        RouterErrorCode.InvalidLeverage,
        `Max leverage must be an integer in (0, ${MAX_LEVERAGE}]`,
        { maxLeverage }
      );
    }
    if (!Number.isInteger(feeRateBps) || feeRateBps < 0) {
      throw new RouterError(RouterErrorCode.InvalidFeeRate, 'Fee rate must be a non-negative integer', {
        feeRateBps,
      });
    }

    if (!this.records.has(key)) {
      this.order.push(key);
    }
    this.records.set(key, { active: true, maxLeverage, feeRateBps, name });
    this.gateways.set(key, gateway);

    this.logger.info('Venue registered', { venue: key, name, maxLeverage, feeRateBps });

    const event: VenueRegisteredEvent = { venue: key, name, maxLeverage, feeRateBps };
    this.emit(RouterEvents.VenueRegistered, event);
  }

  deactivate(caller: string, handle: string): void {
    this.onlyOwner(caller);

    const key = normalizeHandle(handle);
    const record = key ? this.records.get(key) : undefined;
    if (!key || !record?.active) {
      throw new RouterError(RouterErrorCode.NotRegistered, `Venue ${handle} is not active`, { venue: handle });
    }

    this.records.set(key, { ...record, active: false });
    this.logger.info('Venue deactivated', { venue: key });
    this.emit(RouterEvents.VenueRemoved, { venue: key });
  }

  /**
   * Set the active flag directly. The only path that reactivates a venue.
   */
  setStatus(caller: string, handle: string, active: boolean): void {
    this.onlyOwner(caller);

    const key = normalizeHandle(handle);
    const record = key ? this.records.get(key) : undefined;
    if (!key || !record) {
      throw new RouterError(RouterErrorCode.NotRegistered, `Venue ${handle} was never registered`, {
        venue: handle,
      });
    }

    this.records.set(key, { ...record, active });
    this.logger.info('Venue status changed', { venue: key, active });

    const event: VenueStatusChangedEvent = { venue: key, active };
    this.emit(RouterEvents.VenueStatusChanged, event);
  }

  listActive(): string[] {
    return this.snapshot().listActive();
  }

  getInfo(handle: string): VenueInfo {
    return this.snapshot().getInfo(handle);
  }

  getGateway(handle: string): VenueGateway | undefined {
    const key = normalizeHandle(handle);
    return key ? this.gateways.get(key) : undefined;
  }

  /**
   * Consistent copy of the current registry state
   */
  snapshot(): VenueSnapshot {
    return new VenueSnapshot(new Map(this.records), new Map(this.gateways), [...this.order]);
  }
}
