import * as dotenv from 'dotenv';
import { parseArgs, USAGE, type CliArgs } from './cli/parser';
import { defaultStrategies } from './cluster/k8sClient';
import { getConfig } from './config/config';
import { createLogger } from './logging/logger';
import { ScanSession } from './session/scanSession';
import { CliUsageError } from './types/errors';

dotenv.config();

const EXIT_USAGE = 2;

async function main(argv: string[]): Promise<number> {
  const config = getConfig();

  let args: CliArgs;
  try {
    args = parseArgs(argv, { annotate: config.annotate, logLevel: config.logLevel });
  } catch (error: unknown) {
    if (!(error instanceof CliUsageError)) throw error;
    process.stderr.write(`${error.message}\n\n${USAGE}\n`);
    return EXIT_USAGE;
  }

  if (args.help) {
    process.stdout.write(`${USAGE}\n`);
    return 0;
  }

  const logger = createLogger({ level: args.logLevel, file: config.logFile });
  const session = new ScanSession({
    logger,
    strategies: defaultStrategies({ kubeconfigPaths: config.kubeconfigPaths, context: args.context })
  });

  const outcome = await session.run({ namespace: args.namespace, annotate: args.annotate, output: args.output });
  if (outcome.output !== undefined) {
    process.stdout.write(`${outcome.output}\n`);
  }
  return outcome.exitCode;
}

main(process.argv.slice(2))
  .then(code => {
    process.exitCode = code;
  })
  .catch((e: unknown) => {
    createLogger({ level: 'ERROR' }).error(e instanceof Error ? (e.stack ?? e.message) : String(e));
    process.exitCode = 1;
  });
