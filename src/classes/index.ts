export * from './ClaimsLedger';
export * from './HookRegistry';
export * from './Hooks';
export * from './InMemoryVault';
export * from './Ledger';
export * from './PoolManager';
export * from './Session';
export * from './SessionContext';
export * from './StateView';
export * from './SwapSimulator';
