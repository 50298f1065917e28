export * from './errors/settlement-errors.js';
export * from './utils/decimal-utils.js';
export * from './utils/type-guard-utils.js';
export * from './schemas/index.js';
