export * from './computePoolId';
export * from './getSwapEstimate';
