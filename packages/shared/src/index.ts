export * from './constants/index.js';
export * from './schemas/order.schema.js';
export * from './utils/identifier.utils.js';
