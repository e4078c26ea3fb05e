import type { CliArgs, CommandName } from './args.js';
import { parseCliArgs, USAGE } from './args.js';
import { runConvert } from './commands/convert.js';
import { runParse } from './commands/parse.js';
import { runValidate } from './commands/validate.js';
import { runWatch } from './commands/watch.js';
import type { CliContext } from './context.js';
import { ConfigError, UsageError } from './errors.js';
import type { CliSettings } from './settings.js';
import { loadConfigFile, resolveSettings } from './settings.js';
import { VERSION } from './version.js';

export const EXIT_OK = 0;
export const EXIT_USAGE = 2;

function reportUsageError(context: CliContext, error: unknown): number {
  if (error instanceof UsageError || error instanceof ConfigError) {
    context.stderr(`error: ${error.message}\nRun 'uplang --help' for usage.\n`);
    return EXIT_USAGE;
  }
  throw error;
}

function runCommand(
  command: CommandName,
  args: CliArgs,
  settings: CliSettings,
  context: CliContext,
): Promise<number> {
  const [first] = args.paths;
  switch (command) {
    case 'parse':
      return runParse(first, settings, context);
    case 'validate':
      return runValidate(args.paths, settings, context);
    case 'convert':
      return runConvert(first, args.out, settings, context);
    case 'watch':
      return runWatch(first, args.out ?? '', settings, context);
  }
}

/** Runs one command and resolves to the process exit code. */
export async function runCli(argv: readonly string[], context: CliContext): Promise<number> {
  let args: CliArgs;
  try {
    args = parseCliArgs(argv);
  } catch (error) {
    return reportUsageError(context, error);
  }

  if (args.version) {
    context.stdout(`${VERSION}\n`);
    return EXIT_OK;
  }
  if (args.help) {
    context.stdout(USAGE);
    return EXIT_OK;
  }
  const { command } = args;
  if (command === undefined) {
    context.stderr(USAGE);
    return EXIT_USAGE;
  }

  let settings: CliSettings;
  try {
    settings = resolveSettings(await loadConfigFile(context.fileSystem, context.cwd), args.overrides);
  } catch (error) {
    return reportUsageError(context, error);
  }

  try {
    return await runCommand(command, args, settings, context);
  } catch (error) {
    return reportUsageError(context, error);
  }
}
