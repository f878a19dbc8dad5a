export type TickInfo = {
  /** Total position liquidity referencing this tick. */
  liquidityGross: bigint;
  /** Liquidity added when the price crosses the tick moving up. */
  liquidityNet: bigint;
  feeGrowthOutside0X128: bigint;
  feeGrowthOutside1X128: bigint;
};

export type NumberedTickInfo = TickInfo & { tickNum: number };

export function emptyTickInfo(): TickInfo {
  return {
    liquidityGross: BigInt(0),
    liquidityNet: BigInt(0),
    feeGrowthOutside0X128: BigInt(0),
    feeGrowthOutside1X128: BigInt(0),
  };
}
