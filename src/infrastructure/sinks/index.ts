/**
 * Sinks module
 */

export * from './ISink';
export * from './ConsoleSink';
export * from './FileSink';
export * from './MemorySink';
