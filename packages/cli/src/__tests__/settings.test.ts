import { describe, it, expect, beforeEach, afterEach } from 'vitest';
import * as fs from 'fs/promises';
import * as path from 'path';
import { tmpdir } from 'os';
import { ConfigError } from '@reposeed/config';
import { loadSettings, loadTarget } from '../services/settings.service';

const HOME = '/home/tester';

async function createTempDir(): Promise<string> {
  const tempDir = path.join(tmpdir(), `reposeed-test-${Date.now()}-${Math.random().toString(36).slice(2)}`);
  await fs.mkdir(tempDir, { recursive: true });
  return tempDir;
}

async function writeConfigFile(dir: string, config: Record<string, unknown>): Promise<string> {
  const configDir = path.join(dir, '.reposeed');
  await fs.mkdir(configDir, { recursive: true });
  const configPath = path.join(configDir, 'reposeed.config.json');
  await fs.writeFile(configPath, JSON.stringify(config, null, 2));
  return configPath;
}

describe('settings service', () => {
  let tempDir: string;

  beforeEach(async () => {
    tempDir = await createTempDir();
  });

  afterEach(async () => {
    await fs.rm(tempDir, { recursive: true, force: true });
  });

  it('should load settings from the config file with defaults', async () => {
    const configPath = await writeConfigFile(tempDir, {
      organization: 'acme',
      project: 'web',
      repository: 'site',
      sourceDir: 'public',
    });

    const settings = loadSettings(tempDir, {}, HOME);

    expect(settings).toEqual({
      host: 'azure-devops',
      target: { organization: 'acme', project: 'web' },
      repository: 'site',
      sourceDir: path.join(tempDir, 'public'),
      tokenFile: '/home/tester/.token',
      branch: 'master',
      remote: 'origin',
      commitMessage: 'first commit of all files',
      author: undefined,
      configPath,
    });
  });

  it('should let options win over the config file', async () => {
    await writeConfigFile(tempDir, {
      organization: 'acme',
      project: 'web',
      repository: 'site',
      branch: 'develop',
    });

    const settings = loadSettings(tempDir, { repository: 'docs', branch: 'main', tokenFile: 'secrets/pat' }, HOME);

    expect(settings.repository).toBe('docs');
    expect(settings.branch).toBe('main');
    expect(settings.tokenFile).toBe(path.join(tempDir, 'secrets', 'pat'));
  });

  it('should work without a config file when every value is given', () => {
    const settings = loadSettings(tempDir, { organization: 'acme', project: 'web', repository: 'site' }, HOME);

    expect(settings.configPath).toBeNull();
    expect(settings.sourceDir).toBe(tempDir);
  });

  it('should name every missing setting', () => {
    expect(() => loadSettings(tempDir, {}, HOME)).toThrow(
      'Missing required settings: organization, project, repository'
    );
  });

  it('should surface an invalid config file as a ConfigError', async () => {
    await writeConfigFile(tempDir, { organization: 'acme', unknownKey: true });

    let caught: unknown;
    try {
      loadSettings(tempDir, {}, HOME);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConfigError);
  });

  it('should load a target without a repository name', async () => {
    await writeConfigFile(tempDir, { organization: 'acme', project: 'web' });

    const target = loadTarget(tempDir, { tokenFile: '~/pat.txt' }, HOME);

    expect(target.host).toBe('azure-devops');
    expect(target.target).toEqual({ organization: 'acme', project: 'web' });
    expect(target.tokenFile).toBe('/home/tester/pat.txt');
  });
});
