import { once } from 'node:events';
import type { WatcherPort } from '@uplang/core';
import type { StreamSource } from '@uplang/parser';
import type { ChokidarWatcherOptions } from '@uplang/watcher-chokidar';
import { ChokidarWatcher } from '@uplang/watcher-chokidar';
import type { FileSystem } from './file-system.js';
import { NodeFileSystem } from './file-system.js';

/** Everything a command touches outside its own arguments. */
export interface CliContext {
  readonly cwd: string;
  readonly fileSystem: FileSystem;
  stdin(): StreamSource;
  stdout(text: string): void;
  stderr(text: string): void;
  createWatcher(dir: string, options: ChokidarWatcherOptions): WatcherPort;
  /** Resolves once the process is asked to stop. */
  untilInterrupted(): Promise<void>;
}

export function createNodeContext(): CliContext {
  return {
    cwd: process.cwd(),
    fileSystem: new NodeFileSystem(),
    stdin: () => process.stdin,
    stdout: (text) => {
      process.stdout.write(text);
    },
    stderr: (text) => {
      process.stderr.write(text);
    },
    createWatcher: (dir, options) => new ChokidarWatcher(dir, options),
    untilInterrupted: () =>
      Promise.race([once(process, 'SIGINT'), once(process, 'SIGTERM')]).then(() => undefined),
  };
}
