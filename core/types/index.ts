/**
 * pipeshell core types
 */

export * from './pipeline-value';
export * from './stage';
