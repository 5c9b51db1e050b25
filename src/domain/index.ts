/**
 * Domain model exports.
 */

export * from './errors';
export * from './events';
export * from './pipeline';
export * from './run';
