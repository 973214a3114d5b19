import { chmodSync, mkdirSync, mkdtempSync, rmSync, writeFileSync } from 'fs';
import { tmpdir } from 'os';
import { join } from 'path';

import { vi } from 'vitest';

const mocks = vi.hoisted(() => {
  const envFiles: Record<string, Record<string, string>> = {};
  return { homeDir: '', envFiles, prompts: vi.fn(), hasInput: vi.fn() };
});

vi.mock('../../logger');
vi.mock('os', async importOriginal => ({
  ...(await importOriginal<typeof import('os')>()),
  homedir: () => mocks.homeDir,
}));
vi.mock('nvar', () => ({
  default: ({
    path,
    target,
  }: {
    path: string;
    target: Record<string, string>;
  }) => {
    Object.assign(target, mocks.envFiles[path]);
  },
}));
vi.mock('prompts', () => ({ default: mocks.prompts }));
vi.mock('../helpers', () => ({ hasInput: mocks.hasInput }));

import { logger } from '../../logger';
import { getGitHubApiToken, readEnvironmentConfig } from '../env';
import { ConfigurationError } from '../errors';

describe('readEnvironmentConfig', () => {
  const cleanEnv = { ...process.env };
  let workDir: string;
  let homeEnvFile: string;
  let localEnvFile: string;

  beforeEach(() => {
    vi.clearAllMocks();
    process.env = { ...cleanEnv };
    workDir = mkdtempSync(join(tmpdir(), 'changeset-notes-env-'));
    mocks.homeDir = join(workDir, 'home');
    homeEnvFile = join(mocks.homeDir, '.changeset-notes.env');
    localEnvFile = join(workDir, '.env');
    mkdirSync(mocks.homeDir);
    vi.spyOn(process, 'cwd').mockReturnValue(workDir);
  });

  afterEach(() => {
    process.env = { ...cleanEnv };
    vi.mocked(process.cwd).mockRestore();
    rmSync(workDir, { recursive: true, force: true });
  });

  function writeEnvFile(path: string, vars: Record<string, string>, mode: number) {
    mocks.envFiles[path] = vars;
    writeFileSync(path, '');
    chmodSync(path, mode);
  }

  test('merges home and working directory files', () => {
    writeEnvFile(homeEnvFile, { CN_SHARED: 'home', CN_HOME_ONLY: '1' }, 0o600);
    writeEnvFile(localEnvFile, { CN_SHARED: 'local', CN_PRESET: 'override' }, 0o600);
    process.env.CN_PRESET = 'keep';

    readEnvironmentConfig();

    expect(process.env.CN_SHARED).toBe('local');
    expect(process.env.CN_HOME_ONLY).toBe('1');
    expect(process.env.CN_PRESET).toBe('keep');
    expect(logger.warn).not.toHaveBeenCalled();
  });

  test('overwrites existing variables on request', () => {
    writeEnvFile(localEnvFile, { CN_PRESET: 'override' }, 0o600);
    process.env.CN_PRESET = 'keep';

    readEnvironmentConfig(true);

    expect(process.env.CN_PRESET).toBe('override');
  });

  test('warns about readable home env files', () => {
    writeEnvFile(homeEnvFile, { CN_SHARED: 'home' }, 0o644);

    readEnvironmentConfig();

    expect(logger.warn).toHaveBeenCalledWith(
      `Permissions 0644 for file "${homeEnvFile}" are too open. ` +
        `Consider making it readable only for the user.`
    );
  });
});

describe('getGitHubApiToken', () => {
  const cleanEnv = { ...process.env };

  beforeEach(() => {
    vi.clearAllMocks();
    process.env = { ...cleanEnv };
    delete process.env.GITHUB_TOKEN;
    delete process.env.GITHUB_API_TOKEN;
  });

  afterEach(() => {
    process.env = { ...cleanEnv };
  });

  test('reads GITHUB_TOKEN', async () => {
    process.env.GITHUB_TOKEN = 'test-token';

    expect(await getGitHubApiToken()).toBe('test-token');
    expect(mocks.prompts).not.toHaveBeenCalled();
  });

  test('reads the legacy variable with a warning', async () => {
    process.env.GITHUB_API_TOKEN = 'test-legacy-token';

    expect(await getGitHubApiToken()).toBe('test-legacy-token');
    expect(logger.warn).toHaveBeenCalledWith(
      'Usage of GITHUB_API_TOKEN is deprecated, and will be removed in ' +
        'later versions. Please use GITHUB_TOKEN instead.'
    );
  });

  test('asks for the token when input is allowed', async () => {
    mocks.hasInput.mockReturnValue(true);
    mocks.prompts.mockResolvedValue({ token: ' test-token ' });

    expect(await getGitHubApiToken()).toBe('test-token');
    expect(mocks.prompts).toHaveBeenCalledWith(
      expect.objectContaining({ type: 'password', name: 'token' })
    );
  });

  test('fails when the prompt is left empty', async () => {
    mocks.hasInput.mockReturnValue(true);
    mocks.prompts.mockResolvedValue({ token: '' });

    await expect(getGitHubApiToken()).rejects.toThrow(ConfigurationError);
  });

  test('fails without prompting when input is disabled', async () => {
    mocks.hasInput.mockReturnValue(false);

    await expect(getGitHubApiToken()).rejects.toThrow(ConfigurationError);
    expect(mocks.prompts).not.toHaveBeenCalled();
  });
});
