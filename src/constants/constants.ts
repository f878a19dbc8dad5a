export const Q96 = BigInt(2) ** BigInt(96);
export const Q128 = BigInt(2) ** BigInt(128);

export const MaxUint128 = Q128 - BigInt(1);
export const MaxUint160 = BigInt(2) ** BigInt(160) - BigInt(1);
export const MaxUint256 = BigInt(2) ** BigInt(256) - BigInt(1);
export const MaxInt128 = BigInt(2) ** BigInt(127) - BigInt(1);
export const MinInt128 = -(BigInt(2) ** BigInt(127));

export const MIN_TICK = -887272;
export const MAX_TICK = 887272;

export const MIN_SQRT_PRICE = BigInt('4295128739');
export const MAX_SQRT_PRICE = BigInt(
  '1461446703485210103287273052203988822378723970342'
);

export const MIN_TICK_SPACING = 1;
export const MAX_TICK_SPACING = 16383;

/** Fees are expressed in hundredths of a bip: 1_000_000 is 100%. */
export const PIPS_DENOMINATOR = 1_000_000;

export const MAX_LP_FEE = 1_000_000;

/** Set on `PoolKey.fee` to mark a pool whose LP fee is managed by its hook. */
export const DYNAMIC_FEE_FLAG = 0x800000;

/** Set on a before-swap fee override for it to be applied. */
export const OVERRIDE_FEE_FLAG = 0x400000;

/** Upper bound for each direction of the protocol fee, 0.1%. */
export const MAX_PROTOCOL_FEE = 1000;

export const DEFAULT_TICK_SPACING = 60;
