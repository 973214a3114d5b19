import { existsSync, statSync } from 'fs';
import { join } from 'path';
import { homedir } from 'os';

import nvar from 'nvar';
import prompts from 'prompts';

import { ConfigurationError } from './errors';
import { hasInput } from './helpers';
import { logger } from '../logger';

/** File name in the home directory where environment variables are stored */
export const HOME_ENV_FILE_NAME = '.changeset-notes.env';

/** File name in the working directory where environment variables are stored */
export const LOCAL_ENV_FILE_NAME = '.env';

/**
 * A token, key, or other value which can be stored either in an env file or
 * directly in the environment
 */
export interface RequiredConfigVar {
  /**
   * The currently-preferred name of the variable, generally something in
   * UPPER_SNAKE_CASE
   */
  name: string;
  /** A deprecated (but still allowed) name for the variable, if any */
  legacyName?: string;
}

/** Where the GitHub token is looked up */
export const GITHUB_TOKEN_VAR: RequiredConfigVar = {
  name: 'GITHUB_TOKEN',
  legacyName: 'GITHUB_API_TOKEN',
};

/**
 * Checks that the file is only readable for the owner
 *
 * It is assumed that the file already exists
 * @param path File path
 * @returns true if file is private, false otherwise
 */
function checkFileIsPrivate(path: string): boolean {
  const FULL_MODE_MASK = 0o777;
  const GROUP_MODE_MASK = 0o070;
  const OTHER_MODE_MASK = 0o007;
  const mode = statSync(path).mode;
  if (mode & GROUP_MODE_MASK || mode & OTHER_MODE_MASK) {
    const perms = (mode & FULL_MODE_MASK).toString(8);
    logger.warn(
      `Permissions 0${perms} for file "${path}" are too open. ` +
        `Consider making it readable only for the user.`
    );
    return false;
  }
  return true;
}

function readEnvFile(path: string, checkPrivate: boolean): Record<string, string> {
  if (!existsSync(path)) {
    logger.debug(`No environment file found: ${path}`);
    return {};
  }
  logger.debug(`Found environment file: ${path}`);
  if (checkPrivate) {
    checkFileIsPrivate(path);
  }
  const fileEnv: Record<string, string> = {};
  nvar({ path, target: fileEnv });
  logger.debug(
    `Read the following variables from ${path}: ${Object.keys(fileEnv).toString()}`
  );
  return fileEnv;
}

/**
 * Loads environment variables from env files in certain locations
 *
 * The following two places are checked, the latter taking precedence:
 * - ".changeset-notes.env" in the user's home directory
 * - ".env" in the current working directory
 *
 * @param overwriteExisting If set to true, overwrite the existing environment
 * variables
 */
export function readEnvironmentConfig(overwriteExisting = false): void {
  const newEnv = {
    ...readEnvFile(join(homedir(), HOME_ENV_FILE_NAME), true),
    ...readEnvFile(join(process.cwd(), LOCAL_ENV_FILE_NAME), false),
  };

  // Add non-existing values to env
  for (const [key, value] of Object.entries(newEnv)) {
    if (overwriteExisting || process.env[key] === undefined) {
      process.env[key] = value;
    }
  }
}

/**
 * Reads a variable from the environment, taking into account its legacy
 * name, if applicable.
 *
 * @returns The value, or undefined if neither name is set
 */
export function getEnvVar({ name, legacyName }: RequiredConfigVar): string | undefined {
  const value = process.env[name];
  const legacyValue = legacyName ? process.env[legacyName] : undefined;

  if (value) {
    if (legacyValue) {
      logger.warn(
        `Found ${name} but also found legacy ${legacyName}. ` +
          `Do you mean to be using both?`
      );
    }
    logger.debug(`Found ${name}`);
    return value;
  }
  if (legacyValue) {
    logger.warn(
      `Usage of ${legacyName} is deprecated, and will be removed in ` +
        `later versions. Please use ${name} instead.`
    );
    return legacyValue;
  }
  return undefined;
}

/**
 * Gets the GitHub API token from the environment, or asks the user for it
 *
 * @returns GitHub authentication token
 * @throws ConfigurationError if no token could be obtained
 */
export async function getGitHubApiToken(): Promise<string> {
  const fromEnv = getEnvVar(GITHUB_TOKEN_VAR);
  if (fromEnv) {
    return fromEnv;
  }

  if (hasInput()) {
    const { token } = await prompts({
      type: 'password',
      name: 'token',
      message: 'Please enter your GitHub token:',
    });
    if (typeof token === 'string' && token.trim()) {
      return token.trim();
    }
  }

  throw new ConfigurationError(
    'GITHUB_TOKEN not found. A GitHub token is required to access the GitHub API.\n' +
      'Tip: Run `gh auth token` if you have GitHub CLI installed.'
  );
}
