export * from './bitMath';
export * from './fullMath';
export * from './hookPermissions';
export * from './liquidityMath';
export * from './lpFeeLibrary';
export * from './protocolFeeLibrary';
export * from './safeCast';
export * from './sqrtPriceMath';
export * from './swapMath';
export * from './tickBitmap';
export { TickLibrary } from './tickLibrary';
export type { FeeGrowthInside } from './tickLibrary';
export * from './tickMath';
export { createLogger, logger } from './logger';
export type { Logger } from './logger';
