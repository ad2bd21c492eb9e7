export interface CliOptions {
  configFile?: string;
  help: boolean;
}

export class CliUsageError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'CliUsageError';
  }
}

export const USAGE = `
Usage: ipam-usage-report [options]

Prints per-tenant used and unused IPv4 address counts as JSON.

Options:
  --config-file <path>   Configuration file (dotenv format)
  --help                 Show this help

Without --config-file the first existing file is used from:
  ~/.ipam-report/ipam-report.env, ~/ipam-report.env,
  /etc/ipam-report/ipam-report.env, /etc/ipam-report.env
`;

/**
 * Parse argumentos da linha de comando
 */
export function parseCliArgs(args: readonly string[]): CliOptions {
  const options: CliOptions = {
    help: false,
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];

    if (arg.startsWith('--config-file=')) {
      options.configFile = requireValue('--config-file', arg.slice('--config-file='.length));
      continue;
    }

    switch (arg) {
      case '--config-file':
        options.configFile = requireValue('--config-file', args[++i]);
        break;
      case '--help':
      case '-h':
        options.help = true;
        break;
      default:
        throw new CliUsageError(`Unknown argument: ${arg}`);
    }
  }

  return options;
}

function requireValue(flag: string, value: string | undefined): string {
  if (!value || value.startsWith('--')) {
    throw new CliUsageError(`${flag} requires a value`);
  }
  return value;
}
