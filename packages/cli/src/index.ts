export { runCli, EXIT_OK, EXIT_USAGE } from './cli.js';
export { parseCliArgs, USAGE } from './args.js';
export type { CliArgs, CommandName } from './args.js';
export type { CliContext } from './context.js';
export { createNodeContext } from './context.js';
export { ConfigError, UsageError } from './errors.js';
export {
  CONFIG_FILE_NAME,
  DEFAULT_SETTINGS,
  loadConfigFile,
  resolveSettings,
  settingsFromDocument,
} from './settings.js';
export type { CliSettings, OutputFormat } from './settings.js';
export { printTree } from './tree-printer.js';
export { WatchSession } from './commands/watch.js';
