export * from './types/perp';
export * from './constants';
export * from './utils/errors';
export * from './utils/serialization';
export * from './utils/formatting';
export * from './instructions/layout';
export * from './instructions/accounts';
export * from './config/market';
export { PerpClient } from './clients/PerpClient';
