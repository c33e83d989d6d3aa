/**
 * conform - reconcile grading-tool frame annotations against a facility
 * manifest and report which ranges fall inside a video.
 */

import { loadPipelineConfig } from './config/PipelineConfig';
import { parseCliArgs, USAGE, type CliOptions } from './cli/CliArgs';
import { createDefaultDeps, runConform } from './cli/ConformCommand';
import { AppError, ValidationError } from './core/errors';
import { Logger } from './utils/Logger';

const log = new Logger('conform');

async function main(argv: readonly string[]): Promise<number> {
  let options: CliOptions;
  try {
    options = parseCliArgs(argv);
  } catch (err) {
    if (err instanceof ValidationError) {
      log.error(err.message);
      console.error(USAGE);
      return 2;
    }
    throw err;
  }

  if (options.help) {
    console.log(USAGE);
    return 0;
  }

  const config = loadPipelineConfig(process.env);
  if (config.logLevel !== null) Logger.setLevel(config.logLevel);

  try {
    await runConform(options, config, createDefaultDeps(options, config));
    return 0;
  } catch (err) {
    if (err instanceof AppError) {
      log.error(`${err.name}: ${err.message}`);
      return 1;
    }
    throw err;
  }
}

main(process.argv.slice(2)).then(
  code => {
    process.exitCode = code;
  },
  (err: unknown) => {
    log.error('Unexpected failure', err);
    process.exitCode = 1;
  },
);
