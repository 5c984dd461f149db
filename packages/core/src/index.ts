export * from './utils/decimal-utils.js';
export * from './utils/zod-utils.js';
export * from './currency.js';
export * from './schemas/index.js';
export * from './errors/index.js';
