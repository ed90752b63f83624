/**
 * Formatting module
 */

export * from './ansi';
export * from './TextFormatter';
export * from './JsonFormatter';
