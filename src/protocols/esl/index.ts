/**
 * Event socket client exports.
 * @module esl
 */
export * from './constants';
export * from './errors';
export * from './codec';
export * from './headers';
export * from './connection';
export * from './framer';
export * from './session';
