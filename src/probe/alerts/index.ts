/**
 * Alert Evaluator Component
 */

export * from './alert-evaluator.js';
