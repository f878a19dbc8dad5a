export * from './BalanceDelta';
export * from './BeforeSwapDelta';
export * from './Slot0';
export * from './PoolKey';
export * from './PositionInfo';
export * from './TickInfo';
export * from './hooks';
export * from './ManagerContext';
export * from './services';
