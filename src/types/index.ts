/**
 * stratum type exports.
 */

export * from './exit-codes.js';
export * from './parameters.js';
export * from './config.js';
