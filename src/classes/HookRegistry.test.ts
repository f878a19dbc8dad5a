import { describe, expect, it } from 'vitest';
import { DYNAMIC_FEE_FLAG } from '../constants';
import {
  HookAddressNotValid,
  HookAlreadyRegistered,
  HookNotImplemented,
  HookNotRegistered,
} from '../errors';
import { hookAddress, makeHook, permissions } from '../test/fixtures';
import { HookFlag, HookSelector } from '../types/hooks';
import { HookRegistry } from './HookRegistry';

const ack = { selector: HookSelector.afterSwap };

describe('HookRegistry', () => {
  it('should register a hook whose address matches its permissions', () => {
    const registry = new HookRegistry();
    const hook = makeHook({ afterSwap: true }, { afterSwap: () => ack });

    const registration = registry.register(hook);

    expect(registration.permissions).toBe(HookFlag.AFTER_SWAP);
    expect(registry.has(hook.address)).toBe(true);
    expect(registry.resolve(hook.address)).toBe(registration);
  });

  it('should reject permissions the address does not carry', () => {
    const registry = new HookRegistry();
    const hook = {
      address: hookAddress(HookFlag.AFTER_SWAP),
      getHookPermissions: () => permissions({ beforeSwap: true }),
      beforeSwap: () => ({ selector: HookSelector.beforeSwap }),
    };

    expect(() => registry.register(hook)).toThrow(HookAddressNotValid);
    expect(registry.has(hook.address)).toBe(false);
  });

  it('should reject a returns-delta flag without its callback flag', () => {
    const registry = new HookRegistry();
    const hook = makeHook({ afterSwapReturnDelta: true });

    expect(() => registry.register(hook)).toThrow(HookAddressNotValid);
  });

  it('should reject a flagged callback that is not implemented', () => {
    const registry = new HookRegistry();
    const hook = makeHook({ afterSwap: true });

    expect(() => registry.register(hook)).toThrow(HookNotImplemented);
  });

  it('should reject a second registration at the same address', () => {
    const registry = new HookRegistry();
    const hook = makeHook({ afterSwap: true }, { afterSwap: () => ack });
    registry.register(hook);

    expect(() => registry.register(hook)).toThrow(HookAlreadyRegistered);
  });

  it('should throw for an unknown hook', () => {
    const registry = new HookRegistry();
    expect(() => registry.resolve(hookAddress(HookFlag.AFTER_SWAP))).toThrow(
      HookNotRegistered
    );
  });

  describe('validateForPool', () => {
    it('should allow a static fee without a hook', () => {
      expect(new HookRegistry().validateForPool(null, 3000)).toBeNull();
    });

    it('should reject a dynamic fee without a hook', () => {
      expect(() => new HookRegistry().validateForPool(null, DYNAMIC_FEE_FLAG)).toThrow(
        HookAddressNotValid
      );
    });

    it('should only accept a hook without flags on a dynamic pool', () => {
      const registry = new HookRegistry();
      const hook = makeHook({});
      const registration = registry.register(hook);

      expect(() => registry.validateForPool(hook.address, 3000)).toThrow(
        HookAddressNotValid
      );
      expect(registry.validateForPool(hook.address, DYNAMIC_FEE_FLAG)).toBe(registration);
    });
  });
});
