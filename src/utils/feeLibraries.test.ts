import { describe, expect, it } from 'vitest';
import { DYNAMIC_FEE_FLAG, OVERRIDE_FEE_FLAG } from '../constants';
import { LPFeeTooLarge, ProtocolFeeTooLarge } from '../errors';
import { LPFeeLibrary } from './lpFeeLibrary';
import { ProtocolFeeLibrary } from './protocolFeeLibrary';

describe('LPFeeLibrary', () => {
  it('should start dynamic pools at zero', () => {
    expect(LPFeeLibrary.getInitialLPFee(DYNAMIC_FEE_FLAG)).toBe(0);
    expect(LPFeeLibrary.getInitialLPFee(3000)).toBe(3000);
  });

  it('should reject static fees above 100%', () => {
    expect(() => LPFeeLibrary.getInitialLPFee(1_000_001)).toThrow(LPFeeTooLarge);
  });

  it('should strip the override flag before validating', () => {
    const fee = 10_000 | OVERRIDE_FEE_FLAG;
    expect(LPFeeLibrary.isOverride(fee)).toBe(true);
    expect(LPFeeLibrary.removeOverrideFlagAndValidate(fee)).toBe(10_000);
    expect(LPFeeLibrary.isOverride(10_000)).toBe(false);
    expect(() =>
      LPFeeLibrary.removeOverrideFlagAndValidate(1_000_001 | OVERRIDE_FEE_FLAG)
    ).toThrow(LPFeeTooLarge);
  });
});

describe('ProtocolFeeLibrary', () => {
  it('should split the two directions', () => {
    const fee = ProtocolFeeLibrary.pack(1000, 250);
    expect(fee).toBe((250 << 12) | 1000);
    expect(ProtocolFeeLibrary.getZeroForOneFee(fee)).toBe(1000);
    expect(ProtocolFeeLibrary.getOneForZeroFee(fee)).toBe(250);
  });

  it('should cap each direction at 0.1%', () => {
    expect(ProtocolFeeLibrary.isValidProtocolFee(ProtocolFeeLibrary.pack(1000, 1000))).toBe(
      true
    );
    expect(() => ProtocolFeeLibrary.validate(ProtocolFeeLibrary.pack(1001, 0))).toThrow(
      ProtocolFeeTooLarge
    );
    expect(() => ProtocolFeeLibrary.validate(ProtocolFeeLibrary.pack(0, 1001))).toThrow(
      ProtocolFeeTooLarge
    );
  });

  it('should apply the LP fee to what is left after the protocol fee', () => {
    expect(ProtocolFeeLibrary.calculateSwapFee(1000, 3000)).toBe(3997);
    expect(ProtocolFeeLibrary.calculateSwapFee(0, 3000)).toBe(3000);
    expect(ProtocolFeeLibrary.calculateSwapFee(1000, 1_000_000)).toBe(1_000_000);
  });
});
