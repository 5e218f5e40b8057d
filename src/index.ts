/**
 * fillmark - Watches a source tree and completes code at `??` markers.
 */

export * from './types';
export * from './logging';
export * from './config';
export * from './watcher';
export * from './core';
export * from './ai';
export * from './patch';
export * from './orchestrator';
export * from './pipeline';
