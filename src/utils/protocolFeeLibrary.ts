import { MAX_PROTOCOL_FEE, PIPS_DENOMINATOR } from '../constants';
import { ProtocolFeeTooLarge } from '../errors';

/**
 * A protocol fee packs two 12-bit rates: the low half applies to zeroForOne
 * swaps, the high half to oneForZero swaps.
 */
export abstract class ProtocolFeeLibrary {
  /**
   * Cannot be constructed.
   */
  private constructor() {}

  public static getZeroForOneFee(protocolFee: number): number {
    return protocolFee & 0xfff;
  }

  public static getOneForZeroFee(protocolFee: number): number {
    return protocolFee >> 12;
  }

  public static pack(zeroForOneFee: number, oneForZeroFee: number): number {
    return (oneForZeroFee << 12) | zeroForOneFee;
  }

  public static isValidProtocolFee(protocolFee: number): boolean {
    if (!Number.isInteger(protocolFee) || protocolFee < 0 || protocolFee > 0xffffff) {
      return false;
    }
    return (
      ProtocolFeeLibrary.getZeroForOneFee(protocolFee) <= MAX_PROTOCOL_FEE &&
      ProtocolFeeLibrary.getOneForZeroFee(protocolFee) <= MAX_PROTOCOL_FEE
    );
  }

  public static validate(protocolFee: number): void {
    if (!ProtocolFeeLibrary.isValidProtocolFee(protocolFee)) {
      throw new ProtocolFeeTooLarge(protocolFee);
    }
  }

  /**
   * Total fee of a swap when the protocol fee is taken first and the LP fee
   * applies to the remainder.
   * @param protocolFee one direction of the protocol fee
   */
  public static calculateSwapFee(protocolFee: number, lpFee: number): number {
    const numerator = protocolFee * lpFee;
    return protocolFee + lpFee - Math.floor(numerator / PIPS_DENOMINATOR);
  }
}
