import { LogLevelSchema, type LogLevel } from '../logging/logger';
import { CliUsageError } from '../types/errors';
import { OutputFormatSchema, type OutputFormat } from '../utils/reportFormatter';

export interface CliArgs {
  output: OutputFormat;
  logLevel: LogLevel;
  namespace?: string | undefined;
  context?: string | undefined;
  annotate: boolean;
  help: boolean;
}

// Values taken from the environment before the command line is read
export interface CliDefaults {
  annotate: boolean;
  logLevel: LogLevel;
}

export const USAGE = `Usage: k8s-limits-checker [options]

Check Kubernetes pods for containers missing CPU or memory limits.

Options:
  -o, --output FORMAT     Output format: table, json, csv (default: table)
  -n, --namespace NAME    Check a single namespace (default: all namespaces)
  --log-level LEVEL       DEBUG, INFO, WARNING or ERROR (default: INFO, or LOG_LEVEL)
  --annotate              Annotate offending pods with warning=no-cpu-limit|no-memory-limit|no-limits
                          (default: ANNOTATE environment variable, true/false)
  -c, --context NAME      Kubeconfig context to use
  -h, --help              Show this help message`;

const VALUE_FLAGS = new Map<string, 'output' | 'namespace' | 'logLevel' | 'context'>([
  ['--output', 'output'],
  ['-o', 'output'],
  ['--namespace', 'namespace'],
  ['-n', 'namespace'],
  ['--log-level', 'logLevel'],
  ['--context', 'context'],
  ['-c', 'context']
]);

function parseOutput(value: string): OutputFormat {
  const parsed = OutputFormatSchema.safeParse(value.toLowerCase());
  if (!parsed.success) {
    throw new CliUsageError(
      `Invalid value "${value}" for --output (choose from ${OutputFormatSchema.options.join(', ')})`
    );
  }
  return parsed.data;
}

function parseLogLevel(value: string): LogLevel {
  const parsed = LogLevelSchema.safeParse(value.toUpperCase());
  if (!parsed.success) {
    throw new CliUsageError(
      `Invalid value "${value}" for --log-level (choose from ${LogLevelSchema.options.join(', ')})`
    );
  }
  return parsed.data;
}

export function parseArgs(args: string[], defaults: CliDefaults = { annotate: false, logLevel: 'INFO' }): CliArgs {
  const result: CliArgs = {
    output: 'table',
    logLevel: defaults.logLevel,
    namespace: undefined,
    context: undefined,
    annotate: defaults.annotate,
    help: false
  };

  let i = 0;
  while (i < args.length) {
    const arg = args[i] ?? '';

    if (arg === '--help' || arg === '-h') {
      result.help = true;
      i++;
      continue;
    }

    if (arg === '--annotate') {
      result.annotate = true;
      i++;
      continue;
    }

    // Handle both "--flag value" and "--flag=value"
    const eq = arg.indexOf('=');
    const flag = arg.startsWith('--') && eq > 0 ? arg.slice(0, eq) : arg;
    const target = VALUE_FLAGS.get(flag);
    if (!target) {
      throw new CliUsageError(arg.startsWith('-') ? `Unknown option: ${arg}` : `Unexpected argument: ${arg}`);
    }

    let value: string | undefined;
    if (flag !== arg) {
      value = arg.slice(eq + 1);
      i++;
    } else {
      // A following option is never taken as this flag's value
      const next = args[i + 1];
      value = next?.startsWith('-') ? undefined : next;
      i += value === undefined ? 1 : 2;
    }
    if (value === undefined || value === '') {
      throw new CliUsageError(`Option ${flag} requires a value`);
    }

    switch (target) {
      case 'output':
        result.output = parseOutput(value);
        break;
      case 'logLevel':
        result.logLevel = parseLogLevel(value);
        break;
      case 'namespace':
        result.namespace = value;
        break;
      case 'context':
        result.context = value;
        break;
    }
  }

  return result;
}
