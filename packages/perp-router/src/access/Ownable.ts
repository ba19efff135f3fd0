import { EventEmitter } from 'events';
import { getAddress, isAddress, ZeroAddress } from 'ethers';
import { RouterError, RouterErrorCode } from '../errors/RouterError';
import { OwnershipTransferredEvent, RouterEvents } from '../types';

/**
 * Normalise an address to its checksummed form.
 * Throws InvalidAddress for malformed or zero addresses.
 */
export function requireAddress(value: string, label: string): string {
  if (!value || !isAddress(value)) {
    throw new RouterError(RouterErrorCode.InvalidAddress, `${label} is not a valid address`, { value });
  }
  const address = getAddress(value);
  if (address === ZeroAddress) {
    throw new RouterError(RouterErrorCode.InvalidAddress, `${label} cannot be the zero address`);
  }
  return address;
}

/**
 * Single-administrator access control
 */
export class Ownable extends EventEmitter {
  private currentOwner: string;

  constructor(owner: string) {
    super();
    this.currentOwner = requireAddress(owner, 'owner');
  }

  owner(): string {
    return this.currentOwner;
  }

  transferOwnership(caller: string, newOwner: string): void {
    this.onlyOwner(caller);
    const next = requireAddress(newOwner, 'newOwner');

    const event: OwnershipTransferredEvent = {
      previousOwner: this.currentOwner,
      newOwner: next,
    };
    this.currentOwner = next;
    this.emit(RouterEvents.OwnershipTransferred, event);
  }

  protected onlyOwner(caller: string): void {
    if (!caller || !isAddress(caller) || getAddress(caller) !== this.currentOwner) {
      throw new RouterError(RouterErrorCode.Unauthorized, 'Caller is not the owner', { caller });
    }
  }
}

/**
 * Owner-controlled pause switch
 */
export class Pausable extends Ownable {
  private isPaused = false;

  paused(): boolean {
    return this.isPaused;
  }

  pause(caller: string): void {
    this.onlyOwner(caller);
    this.whenNotPaused();
    this.isPaused = true;
    this.emit(RouterEvents.Paused, { account: getAddress(caller) });
  }

  unpause(caller: string): void {
    this.onlyOwner(caller);
    if (!this.isPaused) {
      throw new RouterError(RouterErrorCode.NotPaused, 'Not paused');
    }
    this.isPaused = false;
    this.emit(RouterEvents.Unpaused, { account: getAddress(caller) });
  }

  protected whenNotPaused(): void {
    if (this.isPaused) {
      throw new RouterError(RouterErrorCode.Paused, 'Router is paused');
    }
  }
}
