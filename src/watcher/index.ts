/**
 * Filesystem side of the pipeline: event source, filtering, debouncing and
 * own-write detection.
 */

export { PathFilter, PathFilterRules, TEMP_FILE_SUFFIX } from './PathFilter';
export { Debouncer, ChangeHandler } from './Debouncer';
export { EventQueue } from './EventQueue';
export { WriteGuard, sameFingerprint } from './WriteGuard';
export { FileWatcher, FileWatcherOptions, WatcherStartError } from './FileWatcher';
