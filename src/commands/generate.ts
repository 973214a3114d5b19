import { readFile, writeFile } from 'fs/promises';

import { ArgumentsCamelCase, Argv } from 'yargs';

import { logger } from '../logger';
import { getGitHubApiToken } from '../utils/env';
import { ConfigurationError, handleGlobalError } from '../utils/errors';
import {
  DEFAULT_GITHUB_API_URL,
  formatRepository,
  getGitHubClient,
  parseRepository,
} from '../utils/githubApi';
import { PullRequestResolver } from '../utils/pullRequests';
import { parseRateLimitRetries } from '../utils/rateLimit';
import { generateReleaseNotes } from '../utils/releaseNotes';

/** Repository used when none is given */
export const DEFAULT_REPOSITORY = 'saleor/saleor-dashboard';

export const command = ['$0'];
export const describe =
  'Generate release notes from a changeset, with pull request descriptions';

export const builder = (yargs: Argv) =>
  yargs
    .option('input', {
      alias: 'i',
      description: 'File containing the changeset text. Reads stdin if omitted.',
      type: 'string',
    })
    .option('output', {
      alias: 'o',
      description:
        'File to write the release notes to. Writes to stdout if omitted.',
      type: 'string',
    })
    .option('repo', {
      alias: 'r',
      description: 'GitHub repository in the "owner/repo" format',
      type: 'string',
      default: DEFAULT_REPOSITORY,
    })
    .option('api-url', {
      description: 'GitHub REST API URL, for GitHub Enterprise',
      type: 'string',
      default: process.env.GITHUB_API_URL || DEFAULT_GITHUB_API_URL,
    })
    .option('max-rate-limit-retries', {
      description:
        'How many times to wait out the GitHub rate limit per commit. Unlimited if omitted.',
      type: 'number',
      coerce: parseRateLimitRetries,
    });

/** Command line options */
export type GenerateOptions = ReturnType<typeof builder> extends Argv<infer T>
  ? T
  : never;

/**
 * Reads the changeset from standard input
 */
async function readStdin(): Promise<string> {
  if (process.stdin.isTTY) {
    logger.info(
      'Please paste your changeset text (press Ctrl+D on Unix/Mac or ' +
        'Ctrl+Z then Enter on Windows when done):'
    );
  }
  const chunks: Buffer[] = [];
  for await (const chunk of process.stdin) {
    chunks.push(typeof chunk === 'string' ? Buffer.from(chunk) : chunk);
  }
  return Buffer.concat(chunks).toString('utf-8');
}

async function readChangeset(input?: string): Promise<string> {
  if (!input) {
    return readStdin();
  }
  try {
    return await readFile(input, 'utf-8');
  } catch (e) {
    throw new Error(
      `Error reading input file "${input}": ${e instanceof Error ? e.message : String(e)}`
    );
  }
}

async function writeReleaseNotes(
  releaseNotes: string,
  output?: string
): Promise<void> {
  if (!output) {
    logger.info('Generated Release Notes:');
    process.stdout.write(releaseNotes);
    return;
  }
  try {
    await writeFile(output, releaseNotes, 'utf-8');
  } catch (e) {
    throw new Error(
      `Error writing to output file "${output}": ${
        e instanceof Error ? e.message : String(e)
      }`
    );
  }
  logger.success(`Release notes written to ${output}`);
}

/**
 * Body of the default command
 */
export async function generateMain(
  argv: ArgumentsCamelCase<GenerateOptions>
): Promise<void> {
  const repository = parseRepository(argv.repo);

  const changesetText = await readChangeset(argv.input);
  if (!changesetText.trim()) {
    throw new ConfigurationError('No changeset text provided.');
  }

  const token = await getGitHubApiToken();
  const github = getGitHubClient({ token, baseUrl: argv.apiUrl });
  const resolver = new PullRequestResolver(github, repository, {
    maxRateLimitRetries: argv.maxRateLimitRetries,
  });

  logger.debug(
    `Generating release notes for ${formatRepository(repository)}`
  );
  const releaseNotes = await generateReleaseNotes(changesetText, resolver);
  await writeReleaseNotes(releaseNotes, argv.output);
}

export const handler = async (
  args: ArgumentsCamelCase<GenerateOptions>
): Promise<void> => {
  try {
    return await generateMain(args);
  } catch (e) {
    handleGlobalError(e);
  }
};
