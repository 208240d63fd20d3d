/**
 * Tracing Module
 *
 * Exports all tracing functionality
 */

export * from './types';
export * from './sink';
export * from './jsonl-sink';
export * from './tracer';
