/**
 * Protocol exports.
 * @module protocols
 */
export * from './esl';
