export * from './types.js';
export * from './errors.js';
export * from './amount.js';
export * from './card-number.js';
export * from './redis.js';
export * from './db/schema.js';
export * from './db/client.js';
