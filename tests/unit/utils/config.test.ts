import { describe, it, expect, beforeEach, afterEach, vi } from 'vitest';
import * as fs from 'fs';
import * as os from 'os';
import * as path from 'path';
import {
  applyEnvOverrides,
  DEFAULT_CONFIG,
  findConfigFile,
  getDefaultConfigPaths,
  loadConfig,
  loadConfigSync,
  mergeConfig,
  validateConfig,
} from '../../../src/utils/config.js';
import { ConfigurationError, ErrorCodes } from '../../../src/utils/errors.js';

// Mock the fs module
vi.mock('fs');

describe('Config', () => {
  const mockCwd = '/test/project';

  beforeEach(() => {
    vi.resetAllMocks();
    vi.spyOn(process, 'cwd').mockReturnValue(mockCwd);
    for (const name of ['BRIDGE_HOST', 'BRIDGE_PORT', 'BRIDGE_TIMEOUT', 'BRIDGE_WORKERS', 'BRIDGE_DEBUG']) {
      vi.stubEnv(name, '');
    }
  });

  afterEach(() => {
    vi.restoreAllMocks();
    vi.unstubAllEnvs();
  });

  describe('DEFAULT_CONFIG', () => {
    it('should have correct default server settings', () => {
      expect(DEFAULT_CONFIG.server).toEqual({
        host: '0.0.0.0',
        port: 18812,
        workers: 10,
        maxPayload: 268435456,
        circuitFailureThreshold: 5,
        circuitSuccessThreshold: 2,
        circuitResetTimeout: 30000,
        rateLimit: 100,
        rateBurst: 200,
      });
    });

    it('should have correct default client settings', () => {
      expect(DEFAULT_CONFIG.client.host).toBe('localhost');
      expect(DEFAULT_CONFIG.client.port).toBe(18812);
      expect(DEFAULT_CONFIG.client.timeout).toBe(300000);
      expect(DEFAULT_CONFIG.client.reconnect).toBe(false);
    });
  });

  describe('mergeConfig', () => {
    it('should return defaults when given empty object', () => {
      expect(mergeConfig({})).toEqual(DEFAULT_CONFIG);
    });

    it('should merge partial server config with defaults', () => {
      const merged = mergeConfig({ server: { port: 9000 } });

      expect(merged.server.port).toBe(9000);
      expect(merged.server.workers).toBe(DEFAULT_CONFIG.server.workers);
      expect(merged.client).toEqual(DEFAULT_CONFIG.client);
    });

    it('should merge partial client config with defaults', () => {
      const merged = mergeConfig({ client: { url: 'ws://terminal-host:18812', timeout: 1000 } });

      expect(merged.client.url).toBe('ws://terminal-host:18812');
      expect(merged.client.timeout).toBe(1000);
      expect(merged.client.host).toBe(DEFAULT_CONFIG.client.host);
    });

    it('should not mutate the defaults', () => {
      mergeConfig({ server: { port: 1 } });
      expect(DEFAULT_CONFIG.server.port).toBe(18812);
    });
  });

  describe('validateConfig', () => {
    it('should accept an empty document', () => {
      expect(validateConfig(null)).toEqual({});
    });

    it('should name the offending setting', () => {
      expect(() => validateConfig({ server: { port: 70000 } })).toThrow(
        "Invalid configuration for 'server.port': Number must be less than or equal to 65535"
      );
    });

    it('should reject a non-positive worker count', () => {
      expect(() => validateConfig({ server: { workers: 0 } })).toThrow(ConfigurationError);
    });

    it('should accept a zero rate limit and reject a negative reset timeout', () => {
      expect(validateConfig({ server: { rateLimit: 0 } })).toEqual({ server: { rateLimit: 0 } });
      expect(() => validateConfig({ server: { circuitResetTimeout: -1 } })).toThrow(
        "Invalid configuration for 'server.circuitResetTimeout': Number must be greater than or equal to 0"
      );
    });

    it('should reject a document that is not a mapping', () => {
      expect(() => validateConfig('port: 1')).toThrow("Invalid configuration for '(root)'");
    });
  });

  describe('getDefaultConfigPaths', () => {
    it('should search the working directory before the home directory', () => {
      expect(getDefaultConfigPaths()).toEqual([
        path.join(mockCwd, '.terminal-bridge.yml'),
        path.join(mockCwd, '.terminal-bridge.yaml'),
        path.join(os.homedir(), '.terminal-bridge', 'config.yml'),
        path.join(os.homedir(), '.terminal-bridge', 'config.yaml'),
      ]);
    });
  });

  describe('applyEnvOverrides', () => {
    it('should apply host and port to both server and client', () => {
      const config = applyEnvOverrides(DEFAULT_CONFIG, { BRIDGE_HOST: '10.0.0.5', BRIDGE_PORT: '19000' });

      expect(config.server.host).toBe('10.0.0.5');
      expect(config.client.host).toBe('10.0.0.5');
      expect(config.server.port).toBe(19000);
      expect(config.client.port).toBe(19000);
    });

    it('should apply timeout, workers and debug', () => {
      const config = applyEnvOverrides(DEFAULT_CONFIG, {
        BRIDGE_TIMEOUT: '5000',
        BRIDGE_WORKERS: '4',
        BRIDGE_DEBUG: 'TRUE',
      });

      expect(config.client.timeout).toBe(5000);
      expect(config.server.workers).toBe(4);
      expect(config.debug).toBe(true);
    });

    it('should treat other debug values as false', () => {
      expect(applyEnvOverrides({ ...DEFAULT_CONFIG, debug: true }, { BRIDGE_DEBUG: 'no' }).debug).toBe(false);
    });

    it('should reject a non-integer port', () => {
      try {
        applyEnvOverrides(DEFAULT_CONFIG, { BRIDGE_PORT: 'eighty' });
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error).toHaveProperty('message', "Invalid configuration for 'BRIDGE_PORT': must be an integer");
      }
    });

    it('should leave the input untouched', () => {
      applyEnvOverrides(DEFAULT_CONFIG, { BRIDGE_HOST: 'elsewhere' });
      expect(DEFAULT_CONFIG.server.host).toBe('0.0.0.0');
    });
  });

  describe('loadConfigSync', () => {
    it('should return defaults when no config file exists', () => {
      vi.mocked(fs.existsSync).mockReturnValue(false);

      expect(loadConfigSync()).toEqual(DEFAULT_CONFIG);
    });

    it('should load config from explicit path', () => {
      const configContent = `
server:
  port: 19000
  workers: 4
client:
  timeout: 60000
debug: true
`;
      vi.mocked(fs.existsSync).mockReturnValue(true);
      vi.mocked(fs.readFileSync).mockReturnValue(configContent);

      const config = loadConfigSync('/custom/bridge.yml');

      expect(fs.readFileSync).toHaveBeenCalledWith('/custom/bridge.yml', 'utf-8');
      expect(config.server.port).toBe(19000);
      expect(config.server.workers).toBe(4);
      expect(config.server.host).toBe('0.0.0.0');
      expect(config.client.timeout).toBe(60000);
      expect(config.debug).toBe(true);
    });

    it('should load config from the working directory', () => {
      vi.mocked(fs.existsSync).mockImplementation((p) => p === path.join(mockCwd, '.terminal-bridge.yaml'));
      vi.mocked(fs.readFileSync).mockReturnValue('client:\n  host: terminal-host\n');

      expect(loadConfigSync().client.host).toBe('terminal-host');
    });

    it('should prefer the project file over the home file', () => {
      const projectPath = path.join(mockCwd, '.terminal-bridge.yml');
      const homePath = path.join(os.homedir(), '.terminal-bridge', 'config.yml');

      vi.mocked(fs.existsSync).mockImplementation((p) => p === projectPath || p === homePath);
      vi.mocked(fs.readFileSync).mockImplementation((p) =>
        p === projectPath ? 'server:\n  port: 1111\n' : 'server:\n  port: 2222\n'
      );

      expect(loadConfigSync().server.port).toBe(1111);
    });

    it('should treat an empty file as defaults', () => {
      vi.mocked(fs.existsSync).mockReturnValue(true);
      vi.mocked(fs.readFileSync).mockReturnValue('');

      expect(loadConfigSync('/custom/empty.yml')).toEqual(DEFAULT_CONFIG);
    });

    it('should throw ConfigurationError for invalid YAML', () => {
      vi.mocked(fs.existsSync).mockReturnValue(true);
      vi.mocked(fs.readFileSync).mockReturnValue('server: [unclosed');

      try {
        loadConfigSync('/custom/broken.yml');
        expect.unreachable();
      } catch (error) {
        expect(error).toBeInstanceOf(ConfigurationError);
        expect(error).toHaveProperty('code', ErrorCodes.CONFIG_PARSE_ERROR);
      }
    });

    it('should throw ConfigurationError for invalid values', () => {
      vi.mocked(fs.existsSync).mockReturnValue(true);
      vi.mocked(fs.readFileSync).mockReturnValue('client:\n  timeout: soon\n');

      expect(() => loadConfigSync('/custom/bad.yml')).toThrow(
        "Invalid configuration for 'client.timeout': Expected number, received string"
      );
    });

    it('should let environment variables override the file', () => {
      vi.mocked(fs.existsSync).mockReturnValue(true);
      vi.mocked(fs.readFileSync).mockReturnValue('server:\n  port: 19000\n');
      vi.stubEnv('BRIDGE_PORT', '20000');

      expect(loadConfigSync('/custom/bridge.yml').server.port).toBe(20000);
    });
  });

  describe('loadConfig', () => {
    it('should resolve to the same config as loadConfigSync', async () => {
      vi.mocked(fs.existsSync).mockReturnValue(false);

      await expect(loadConfig()).resolves.toEqual(DEFAULT_CONFIG);
    });
  });

  describe('findConfigFile', () => {
    it('should return the first existing candidate', () => {
      const homePath = path.join(os.homedir(), '.terminal-bridge', 'config.yaml');
      vi.mocked(fs.existsSync).mockImplementation((p) => p === homePath);

      expect(findConfigFile()).toBe(homePath);
    });

    it('should return null when nothing exists', () => {
      vi.mocked(fs.existsSync).mockReturnValue(false);

      expect(findConfigFile('/custom/missing.yml')).toBeNull();
    });
  });
});
