export * from './types';
export * from './constants';
export * from './schemas';
export * from './utils';
