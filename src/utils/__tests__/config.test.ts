import * as fs from 'fs/promises';
import * as os from 'os';
import * as path from 'path';
import { afterEach, beforeEach, describe, it, expect, vi } from 'vitest';
import { getConfigPath, loadConfig } from '../config';
import { ConfigError } from '../errors';

describe('config file', () => {
  let testDir: string;

  beforeEach(async () => {
    testDir = await fs.mkdtemp(path.join(os.tmpdir(), 'swarmctl-config-test-'));
  });

  afterEach(async () => {
    vi.unstubAllEnvs();
    await fs.rm(testDir, { recursive: true, force: true });
  });

  async function writeConfig(content: string): Promise<string> {
    const file = path.join(testDir, 'config.yml');
    await fs.writeFile(file, content, 'utf-8');
    return file;
  }

  describe('getConfigPath', () => {
    it('should prefer the explicit path, then the environment', () => {
      vi.stubEnv('SWARMCTL_CONFIG', '/etc/swarmctl.yml');

      expect(getConfigPath('/tmp/explicit.yml')).toBe('/tmp/explicit.yml');
      expect(getConfigPath()).toBe('/etc/swarmctl.yml');
    });

    it('should default to the home directory', () => {
      vi.stubEnv('SWARMCTL_CONFIG', '');

      expect(getConfigPath()).toBe(path.join(os.homedir(), '.swarmctl', 'config.yml'));
    });
  });

  describe('loadConfig', () => {
    it('should treat a missing file as an empty config', () => {
      expect(loadConfig(path.join(testDir, 'missing.yml'))).toEqual({});
    });

    it('should treat an empty file as an empty config', async () => {
      expect(loadConfig(await writeConfig(''))).toEqual({});
    });

    it('should read hosts and formats', async () => {
      const file = await writeConfig(
        ['host: tcp://10.0.0.5:2375', 'services_format: "{{.Name}}"', "configs_format: 'table {{.ID}}'"].join('\n')
      );

      expect(loadConfig(file)).toEqual({
        host: 'tcp://10.0.0.5:2375',
        services_format: '{{.Name}}',
        configs_format: 'table {{.ID}}',
      });
    });

    it('should reject unknown keys', async () => {
      const file = await writeConfig('colour: blue\n');

      expect(() => loadConfig(file)).toThrow(ConfigError);
      expect(() => loadConfig(file)).toThrow(`Invalid config file ${file}: root: Unrecognized key(s) in object: 'colour'`);
    });

    it('should reject a host without a scheme', async () => {
      const file = await writeConfig('host: 10.0.0.5\n');

      expect(() => loadConfig(file)).toThrow(
        `Invalid config file ${file}: host: Host must look like unix:///path/to/socket or tcp://host:port`
      );
    });

    it('should reject YAML it cannot parse', async () => {
      const file = await writeConfig('host: [unclosed\n');

      expect(() => loadConfig(file)).toThrow(`Error reading ${file}`);
    });
  });
});
