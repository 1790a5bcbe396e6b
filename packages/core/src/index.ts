export * from './errors/index.js';
export * from './utils/date-utils.js';
export * from './utils/decimal-utils.js';
export * from './utils/type-guard-utils.js';
export * from './types/records.js';
