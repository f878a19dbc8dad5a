import { DYNAMIC_FEE_FLAG, MAX_LP_FEE, OVERRIDE_FEE_FLAG } from '../constants';
import { LPFeeTooLarge } from '../errors';

export abstract class LPFeeLibrary {
  /**
   * Cannot be constructed.
   */
  private constructor() {}

  public static isDynamicFee(fee: number): boolean {
    return fee === DYNAMIC_FEE_FLAG;
  }

  public static isValid(fee: number): boolean {
    return Number.isInteger(fee) && fee >= 0 && fee <= MAX_LP_FEE;
  }

  public static validate(fee: number): void {
    if (!LPFeeLibrary.isValid(fee)) {
      throw new LPFeeTooLarge(fee);
    }
  }

  /**
   * Fee a pool starts with: dynamic pools start at zero until their hook sets one.
   */
  public static getInitialLPFee(fee: number): number {
    if (LPFeeLibrary.isDynamicFee(fee)) return 0;
    LPFeeLibrary.validate(fee);
    return fee;
  }

  public static isOverride(fee: number): boolean {
    return (fee & OVERRIDE_FEE_FLAG) !== 0;
  }

  public static removeOverrideFlag(fee: number): number {
    return fee & ~OVERRIDE_FEE_FLAG;
  }

  public static removeOverrideFlagAndValidate(fee: number): number {
    const result = LPFeeLibrary.removeOverrideFlag(fee);
    LPFeeLibrary.validate(result);
    return result;
  }
}
