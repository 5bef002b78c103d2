import { parseArgs } from 'node:util';

export interface CliArgs {
  configPath: string | undefined;
  task: string | undefined;
  help: boolean;
}

export const USAGE = 'Usage: stepwise [--config <path>] [task]';

/** Parse `stepwise [--config path] [task]`; words after the options form the task. */
export function parseCliArgs(argv: string[]): CliArgs {
  const { values, positionals } = parseArgs({
    args: argv,
    options: {
      config: { type: 'string', short: 'c' },
      help: { type: 'boolean', short: 'h' },
    },
    allowPositionals: true,
  });
  const task = positionals.join(' ').trim();
  return {
    configPath: values.config,
    task: task || undefined,
    help: values.help ?? false,
  };
}
