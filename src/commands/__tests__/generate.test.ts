import { vi, type MockInstance } from 'vitest';

import {
  commitResponse,
  createGitHubMock,
  pullResponse,
  searchResponse,
} from '../../utils/__tests__/fixtures/github';

const mocks = vi.hoisted(() => ({
  readFile: vi.fn(),
  writeFile: vi.fn(),
  getGitHubApiToken: vi.fn(),
  getGitHubClient: vi.fn(),
  captureException: vi.fn(),
}));

vi.mock('../../logger');
vi.mock('@sentry/node', () => ({ captureException: mocks.captureException }));
vi.mock('fs/promises', () => ({
  readFile: mocks.readFile,
  writeFile: mocks.writeFile,
}));
vi.mock('../../utils/env', () => ({
  getGitHubApiToken: mocks.getGitHubApiToken,
}));
vi.mock('../../utils/githubApi', async importOriginal => ({
  ...(await importOriginal<typeof import('../../utils/githubApi')>()),
  getGitHubClient: mocks.getGitHubClient,
}));

import { logger } from '../../logger';
import { GenerateOptions, handler } from '../generate';
import type { ArgumentsCamelCase } from 'yargs';

const CHANGESET = '### Patch Changes\n\n- abc1234: Fix bug X in the datagrid\n';
const RELEASE_NOTES =
  CHANGESET +
  '\n\n' +
  'Commit abc1234 (PR #42):\n' +
  'Contributors: @octocat, Jane Doe\n' +
  'Fixes bug X\n\n';

function args(
  overrides: Partial<ArgumentsCamelCase<GenerateOptions>> = {}
): ArgumentsCamelCase<GenerateOptions> {
  return {
    _: [],
    $0: 'changeset-notes',
    input: 'changeset.md',
    output: 'release-notes.md',
    repo: 'test-owner/test-repo',
    'api-url': 'https://api.github.com',
    apiUrl: 'https://api.github.com',
    'max-rate-limit-retries': undefined,
    maxRateLimitRetries: undefined,
    ...overrides,
  };
}

describe('generate command', () => {
  let github: ReturnType<typeof createGitHubMock>;
  let stdoutWrite: MockInstance<Parameters<typeof process.stdout.write>, boolean>;

  beforeEach(() => {
    vi.clearAllMocks();
    github = createGitHubMock();
    mocks.getGitHubClient.mockReturnValue(github.github);
    mocks.getGitHubApiToken.mockResolvedValue('test-token');
    mocks.readFile.mockResolvedValue(CHANGESET);
    mocks.writeFile.mockResolvedValue(undefined);

    github.endpoints.repos.getCommit.mockResolvedValue(
      commitResponse({
        message:
          'Fix bug X (#42)\n\nCo-authored-by: Jane Doe <jane@example.com>',
        login: 'octocat',
      })
    );
    github.endpoints.pulls.get.mockResolvedValue(
      pullResponse(42, 'Fix bug X', 'Fixes bug X', 'octocat')
    );
    github.endpoints.search.issuesAndPullRequests.mockResolvedValue(
      searchResponse([])
    );
    github.endpoints.repos.listPullRequestsAssociatedWithCommit.mockResolvedValue(
      { data: [] }
    );

    stdoutWrite = vi.spyOn(process.stdout, 'write').mockReturnValue(true);
  });

  afterEach(() => {
    stdoutWrite.mockRestore();
    process.exitCode = undefined;
  });

  test('writes release notes to the output file', async () => {
    await handler(args());

    expect(mocks.readFile).toHaveBeenCalledWith('changeset.md', 'utf-8');
    expect(mocks.getGitHubClient).toHaveBeenCalledWith({
      token: 'test-token',
      baseUrl: 'https://api.github.com',
    });
    expect(mocks.writeFile).toHaveBeenCalledWith(
      'release-notes.md',
      RELEASE_NOTES,
      'utf-8'
    );
    expect(logger.success).toHaveBeenCalledWith(
      'Release notes written to release-notes.md'
    );
    expect(stdoutWrite).not.toHaveBeenCalled();
    expect(process.exitCode).toBeUndefined();
  });

  test('prints release notes without an output file', async () => {
    await handler(args({ output: undefined }));

    expect(stdoutWrite).toHaveBeenCalledWith(RELEASE_NOTES);
    expect(mocks.writeFile).not.toHaveBeenCalled();
  });

  test('fails on empty input', async () => {
    mocks.readFile.mockResolvedValue('  \n\n');

    await handler(args());

    expect(logger.error).toHaveBeenCalledWith('No changeset text provided.');
    expect(process.exitCode).toBe(1);
    expect(mocks.getGitHubApiToken).not.toHaveBeenCalled();
    expect(mocks.captureException).not.toHaveBeenCalled();
  });

  test('fails on unreadable input files', async () => {
    mocks.readFile.mockRejectedValue(
      new Error("ENOENT: no such file or directory, open 'changeset.md'")
    );

    await handler(args());

    expect(logger.error).toHaveBeenCalledWith(
      'Error reading input file "changeset.md": ' +
        "ENOENT: no such file or directory, open 'changeset.md'"
    );
    expect(process.exitCode).toBe(1);
  });

  test('fails on unwritable output files', async () => {
    mocks.writeFile.mockRejectedValue(
      new Error("EACCES: permission denied, open 'release-notes.md'")
    );

    await handler(args());

    expect(logger.error).toHaveBeenCalledWith(
      'Error writing to output file "release-notes.md": ' +
        "EACCES: permission denied, open 'release-notes.md'"
    );
    expect(process.exitCode).toBe(1);
  });

  test('rejects malformed repositories', async () => {
    await handler(args({ repo: 'test-repo' }));

    expect(logger.error).toHaveBeenCalledWith(
      'Invalid repository "test-repo": expected the "owner/repo" format.'
    );
    expect(process.exitCode).toBe(1);
    expect(mocks.readFile).not.toHaveBeenCalled();
  });

  test('keeps going when a commit cannot be resolved', async () => {
    mocks.readFile.mockResolvedValue('- abc1234: First\n- def5678: Second');
    github.endpoints.repos.getCommit
      .mockRejectedValueOnce(
        Object.assign(new Error('Not Found'), { status: 404 })
      )
      .mockResolvedValueOnce(commitResponse({ message: 'Second', name: 'Jane Doe' }));

    await handler(args());

    expect(mocks.writeFile).toHaveBeenCalledWith(
      'release-notes.md',
      '- abc1234: First\n- def5678: Second\n\n' +
        'Commit abc1234: Could not retrieve information.\n\n' +
        'Commit def5678:\n' +
        'Contributors: Jane Doe\n' +
        'No pull request description found.\n\n',
      'utf-8'
    );
    expect(process.exitCode).toBeUndefined();
  });
});
