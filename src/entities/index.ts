export * from './Pool';
export * from './Position';
