import { Address } from '@ton/core';
import {
  HookAddressNotValid,
  HookAlreadyRegistered,
  HookNotImplemented,
  HookNotRegistered,
} from '../errors';
import { addressKey } from '../functions/computePoolId';
import { Hook } from '../types/hooks';
import {
  CALLBACK_FLAGS,
  encodePermissions,
  hasPermission,
  permissionsFromAddress,
  RETURNS_DELTA_FLAGS,
} from '../utils/hookPermissions';
import { createLogger, Logger } from '../utils/logger';
import { LPFeeLibrary } from '../utils/lpFeeLibrary';

export interface HookRegistration {
  address: Address;
  /** Flag bits, checked against the address at registration. */
  permissions: number;
  hook: Hook;
}

/**
 * Extensions known to the engine, with their capability sets.
 */
export class HookRegistry {
  private readonly registrations: Map<string, HookRegistration> = new Map();
  private readonly log: Logger;

  constructor(logger?: Logger) {
    this.log = createLogger('HookRegistry', logger);
  }

  register(hook: Hook): HookRegistration {
    const { address } = hook;
    const key = addressKey(address);
    if (this.registrations.has(key)) throw new HookAlreadyRegistered(address);

    const permissions = encodePermissions(hook.getHookPermissions());
    if (permissions !== permissionsFromAddress(address)) {
      throw new HookAddressNotValid(address);
    }

    for (const [deltaFlag, baseFlag] of RETURNS_DELTA_FLAGS) {
      if (hasPermission(permissions, deltaFlag) && !hasPermission(permissions, baseFlag)) {
        throw new HookAddressNotValid(address);
      }
    }

    for (const [flag, callback] of CALLBACK_FLAGS) {
      if (hasPermission(permissions, flag) && typeof hook[callback] !== 'function') {
        throw new HookNotImplemented(address, callback);
      }
    }

    const registration: HookRegistration = { address, permissions, hook };
    this.registrations.set(key, registration);
    this.log.info(
      { hook: address.toRawString(), permissions },
      'Hook registered'
    );
    return registration;
  }

  get(address: Address): HookRegistration | undefined {
    return this.registrations.get(addressKey(address));
  }

  has(address: Address): boolean {
    return this.registrations.has(addressKey(address));
  }

  /**
   * Registration of the hook a pool names.
   */
  resolve(hooks: Address): HookRegistration {
    const registration = this.get(hooks);
    if (!registration) throw new HookNotRegistered(hooks);
    return registration;
  }

  /**
   * Checks that a pool may use `hooks` with `fee`. A hookless pool cannot be
   * dynamic; a hook without flags is only useful on a dynamic pool.
   */
  validateForPool(hooks: Address | null, fee: number): HookRegistration | null {
    if (hooks === null) {
      if (LPFeeLibrary.isDynamicFee(fee)) throw new HookAddressNotValid(hooks);
      return null;
    }
    const registration = this.resolve(hooks);
    if (registration.permissions === 0 && !LPFeeLibrary.isDynamicFee(fee)) {
      throw new HookAddressNotValid(hooks);
    }
    return registration;
  }
}
