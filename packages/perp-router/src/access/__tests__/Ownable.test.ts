import { Ownable, Pausable, requireAddress } from '../Ownable';
import { RouterErrorCode } from '../../errors/RouterError';
import { RouterEvents } from '../../types';
import { OWNER, STRANGER, USER } from '../../__tests__/fixtures';

describe('requireAddress', () => {
  test('returns the checksummed form', () => {
    expect(requireAddress(OWNER.toLowerCase(), 'owner')).toBe(OWNER);
  });

  test.each(['', 'owner', '0x0000000000000000000000000000000000000000'])('rejects %p', value => {
    expect(() => requireAddress(value, 'owner')).toThrow(
      expect.objectContaining({ code: RouterErrorCode.InvalidAddress })
    );
  });
});

describe('Ownable', () => {
  test('transfers ownership and emits the change', () => {
    const ownable = new Ownable(OWNER);
    const listener = jest.fn();
    ownable.on(RouterEvents.OwnershipTransferred, listener);

    ownable.transferOwnership(OWNER, USER);

    expect(ownable.owner()).toBe(USER);
    expect(listener).toHaveBeenCalledWith({ previousOwner: OWNER, newOwner: USER });
    expect(() => ownable.transferOwnership(OWNER, STRANGER)).toThrow(
      expect.objectContaining({ code: RouterErrorCode.Unauthorized })
    );
  });

  test('rejects a transfer to the zero address', () => {
    const ownable = new Ownable(OWNER);
    expect(() => ownable.transferOwnership(OWNER, '0x0000000000000000000000000000000000000000')).toThrow(
      expect.objectContaining({ code: RouterErrorCode.InvalidAddress })
    );
    expect(ownable.owner()).toBe(OWNER);
  });

  test('rejects a zero owner at construction', () => {
    expect(() => new Ownable('0x0000000000000000000000000000000000000000')).toThrow(
      expect.objectContaining({ code: RouterErrorCode.InvalidAddress })
    );
  });
});

describe('Pausable', () => {
  test('toggles the paused flag', () => {
    const pausable = new Pausable(OWNER);

    pausable.pause(OWNER.toLowerCase());
    expect(pausable.paused()).toBe(true);

    pausable.unpause(OWNER);
    expect(pausable.paused()).toBe(false);
  });

  test('only the owner can unpause', () => {
    const pausable = new Pausable(OWNER);
    pausable.pause(OWNER);

    expect(() => pausable.unpause(STRANGER)).toThrow(expect.objectContaining({ code: RouterErrorCode.Unauthorized }));
    expect(pausable.paused()).toBe(true);
  });
});
