#!/usr/bin/env node
import isCI from 'is-ci';
import yargs from 'yargs';

import { logger, LogLevel } from './logger';
import { readEnvironmentConfig } from './utils/env';
import { handleGlobalError } from './utils/errors';
import { envToBool, setGlobals, toLogLevelName } from './utils/helpers';
import { initSentrySdk } from './utils/sentry';
import { getPackageVersion } from './utils/version';

// Commands
import * as generate from './commands/generate';

function printVersion(): void {
  if (!process.argv.includes('-v') && !process.argv.includes('--version')) {
    // Print the current version
    logger.debug(`changeset-notes ${getPackageVersion()}`);
  }
}

const GLOBAL_BOOLEAN_FLAGS = {
  'no-input': {
    coerce: envToBool,
    default: isCI,
    describe: 'Suppresses all user prompts',
    global: true,
  },
};

/**
 * Turns a standalone `--no-input` into `--no-input 1`
 *
 * The flag takes a value so that `CHANGESET_NOTES_NO_INPUT=no` can be parsed,
 * so yargs would otherwise read the next argument as that value.
 */
function fixGlobalBooleanFlags(argv: string[]): string[] {
  const result = [];
  for (const arg of argv) {
    result.push(arg);
    if (arg.slice(2) in GLOBAL_BOOLEAN_FLAGS) {
      result.push('1');
    }
  }
  return result;
}

/**
 * Main entrypoint
 */
async function main(): Promise<void> {
  printVersion();

  readEnvironmentConfig();

  initSentrySdk();

  const argv = fixGlobalBooleanFlags(process.argv.slice(2));

  await yargs()
    .parserConfiguration({
      'boolean-negation': false,
    })
    .env('CHANGESET_NOTES')
    .command(generate)
    .version(getPackageVersion())
    .alias('v', 'version')
    .help()
    .alias('h', 'help')
    .options(GLOBAL_BOOLEAN_FLAGS)
    .option('log-level', {
      default: 'Info',
      choices: Object.keys(LogLevel).filter(level => isNaN(Number(level))),
      coerce: toLogLevelName,
      describe: 'Logging level',
      global: true,
    })
    .strictCommands()
    .showHelpOnFail(true)
    .middleware(setGlobals)
    .parse(argv);
}

main().catch(handleGlobalError);
