import { parseArgs } from 'node:util';
import { UsageError } from './errors.js';
import type { CliSettings } from './settings.js';
import { parseDuplicates, parseFormat, parseIndent, parseMaxDepth } from './settings.js';

export type CommandName = 'parse' | 'validate' | 'convert' | 'watch';

const COMMANDS: readonly CommandName[] = ['parse', 'validate', 'convert', 'watch'];

export interface CliArgs {
  command?: CommandName;
  paths: string[];
  out?: string;
  help: boolean;
  version: boolean;
  /** Settings given as flags; unset flags are absent. */
  overrides: Partial<CliSettings>;
}

export const USAGE = `Usage: uplang <command> [options]

Commands:
  parse <file>         Print the document tree ("-" reads stdin)
  validate <file...>   Check that every file parses
  convert <file>       Convert to JSON or UP
  watch <dir>          Convert .up files in <dir> as they change

Options:
  --to <json|up>                  Output format (default json)
  -o, --out <path>                Output file (convert) or directory (watch)
  --no-coerce                     Keep annotated scalars as strings in JSON
  --duplicates <collect|first|last>
                                  How repeated keys map to JSON
  --indent <n>                    Output indentation
  --max-depth <n>                 Nesting limit while parsing (default 64)
  -h, --help                      Show this help
  -v, --version                   Show the version
`;

const OPTIONS = {
  to: { type: 'string' },
  out: { type: 'string', short: 'o' },
  'no-coerce': { type: 'boolean' },
  duplicates: { type: 'string' },
  indent: { type: 'string' },
  'max-depth': { type: 'string' },
  help: { type: 'boolean', short: 'h' },
  version: { type: 'boolean', short: 'v' },
} as const;

function readArgs(argv: readonly string[]) {
  try {
    return parseArgs({ args: [...argv], options: OPTIONS, allowPositionals: true, strict: true });
  } catch (error) {
    throw new UsageError(error instanceof Error ? error.message : String(error));
  }
}

function toCommand(name: string): CommandName {
  const command = COMMANDS.find((c) => c === name);
  if (command === undefined) {
    throw new UsageError(`Unknown command '${name}'`);
  }
  return command;
}

function checkArity(command: CommandName, paths: string[], out: string | undefined): void {
  switch (command) {
    case 'parse':
    case 'convert':
      if (paths.length !== 1) throw new UsageError(`${command} takes exactly one file`);
      break;
    case 'validate':
      if (paths.length === 0) throw new UsageError('validate needs at least one file');
      break;
    case 'watch':
      if (paths.length !== 1) throw new UsageError('watch takes exactly one directory');
      if (out === undefined) throw new UsageError('watch needs --out <dir>');
      break;
  }
}

export function parseCliArgs(argv: readonly string[]): CliArgs {
  const { values, positionals } = readArgs(argv);
  const [name, ...paths] = positionals;

  const overrides: Partial<CliSettings> = {};
  if (values.to !== undefined) overrides.format = parseFormat(values.to);
  if (values['no-coerce']) overrides.coerce = false;
  if (values.duplicates !== undefined) overrides.duplicates = parseDuplicates(values.duplicates);
  if (values.indent !== undefined) overrides.indent = parseIndent(values.indent);
  if (values['max-depth'] !== undefined) overrides.maxDepth = parseMaxDepth(values['max-depth']);

  const args: CliArgs = {
    paths,
    help: values.help ?? false,
    version: values.version ?? false,
    overrides,
  };
  if (values.out !== undefined) args.out = values.out;
  if (name !== undefined) {
    args.command = toCommand(name);
    if (!args.help && !args.version) checkArity(args.command, paths, values.out);
  }
  return args;
}
