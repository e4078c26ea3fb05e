export { ChokidarWatcher } from './chokidar-watcher.js';
export type { ChokidarWatcherOptions } from './chokidar-watcher.js';
