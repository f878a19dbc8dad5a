export * from './constants';
export * from './errors';
export * from './types';
export * from './utils';
export * from './entities';
export * from './classes';
export * from './functions';
