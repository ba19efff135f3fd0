import { RouterError, RouterErrorCode } from '../errors/RouterError';
import type { VenueSnapshot } from '../registry/VenueRegistry';
import type { PositionAction } from '../types';

export interface PositionLookup {
  user: string;
  market: string;
  action: PositionAction;
}

/**
 * Resolves which venue holds the position a close/increase/reduce call
 * operates on.
 */
export interface PositionLocator {
  locate(lookup: PositionLookup, venues: VenueSnapshot): string;
}

/**
 * Always answers with the first active venue. Positions are not tracked
 * per venue, so this is only correct while a single venue is active.
 */
export class FirstActiveVenueLocator implements PositionLocator {
  locate(lookup: PositionLookup, venues: VenueSnapshot): string {
    const [first] = venues.listActive();
    if (first === undefined) {
      throw new RouterError(RouterErrorCode.NoActiveVenues, 'No active venues', { market: lookup.market });
    }
    return first;
  }
}
