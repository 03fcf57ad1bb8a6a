import { describe, it, expect, beforeEach, vi } from 'vitest';
import { ConfigLoader, DEFAULT_CONFIG, resolveConfig } from './loader';
import { ConfigurationError } from '@core/errors';

// Mock fs module
vi.mock('fs', () => ({
  existsSync: vi.fn(),
  readFileSync: vi.fn()
}));

import * as fs from 'fs';

const GLOBAL_PATH = '/home/tester/.config/pipewright.json';
const PROJECT_PATH = '/work/project/pipewright.config.json';

function withFiles(files: Record<string, unknown>): void {
  vi.mocked(fs.existsSync).mockImplementation(p => String(p) in files);
  vi.mocked(fs.readFileSync).mockImplementation(p => {
    const content = files[String(p)];
    return typeof content === 'string' ? content : JSON.stringify(content);
  });
}

describe('Configuration System', () => {
  beforeEach(() => {
    vi.clearAllMocks();
  });

  describe('ConfigLoader', () => {
    it('returns the defaults when no file exists', () => {
      withFiles({});
      const loader = new ConfigLoader('/work/project', GLOBAL_PATH);
      expect(loader.load({})).toEqual(DEFAULT_CONFIG);
    });

    it('lets the project file override the global one', () => {
      withFiles({
        [GLOBAL_PATH]: { shell: '/bin/zsh', importPath: 'lib', remote: { sshCommand: 'ssh -F cfg', sudo: false } },
        [PROJECT_PATH]: { importPath: 'scripts', remote: { sudo: true } }
      });

      const config = new ConfigLoader('/work/project', GLOBAL_PATH).load({});

      expect(config.shell).toBe('/bin/zsh');
      expect(config.importPath).toBe('scripts');
      expect(config.remote).toEqual({ sshCommand: 'ssh -F cfg', sudo: true, stagingDir: 'pipewright_tmp' });
    });

    it('merges constants by key', () => {
      withFiles({
        [GLOBAL_PATH]: { constants: { region: 'north', tier: 'gold' } },
        [PROJECT_PATH]: { constants: { tier: 'silver', retries: 3 } }
      });

      const config = new ConfigLoader('/work/project', GLOBAL_PATH).load({});

      expect(config.constants).toEqual({ region: 'north', tier: 'silver', retries: '3' });
    });

    it('takes the encoding from PIPEWRIGHT_ENCODING', () => {
      withFiles({ [PROJECT_PATH]: { encoding: 'utf-8' } });
      const config = new ConfigLoader('/work/project', GLOBAL_PATH).load({ PIPEWRIGHT_ENCODING: 'latin1' });
      expect(config.encoding).toBe('latin1');
    });

    it('caches the loaded configuration', () => {
      withFiles({ [PROJECT_PATH]: { shell: '/bin/sh' } });
      const loader = new ConfigLoader('/work/project', GLOBAL_PATH);

      const first = loader.load({});
      const second = loader.load({});

      expect(second).toBe(first);
      expect(fs.readFileSync).toHaveBeenCalledTimes(1);
    });

    it('rejects a file that is not valid JSON', () => {
      withFiles({ [PROJECT_PATH]: '{ shell: ' });
      const loader = new ConfigLoader('/work/project', GLOBAL_PATH);
      expect(() => loader.load({})).toThrow(ConfigurationError);
    });

    it('rejects a file whose top level is not an object', () => {
      withFiles({ [PROJECT_PATH]: ['shell'] });
      const loader = new ConfigLoader('/work/project', GLOBAL_PATH);
      expect(() => loader.load({})).toThrow(`Config ${PROJECT_PATH} must contain a JSON object`);
    });

    it('rejects constants that are not scalars', () => {
      withFiles({ [PROJECT_PATH]: { constants: { nested: { a: 1 } } } });
      const loader = new ConfigLoader('/work/project', GLOBAL_PATH);
      expect(() => loader.load({})).toThrow(
        `Constant "nested" must be a string, number or boolean in ${PROJECT_PATH}`
      );
    });

    it('rejects a non-boolean remote.sudo', () => {
      withFiles({ [PROJECT_PATH]: { remote: { sudo: 'yes' } } });
      const loader = new ConfigLoader('/work/project', GLOBAL_PATH);
      expect(() => loader.load({})).toThrow(`"remote.sudo" must be a boolean in ${PROJECT_PATH}`);
    });
  });

  describe('resolveConfig', () => {
    it('rejects an unknown encoding', () => {
      expect(() => resolveConfig({ encoding: 'klingon' })).toThrow('Unsupported encoding: klingon');
    });

    it('fills in every default', () => {
      const config = resolveConfig({ logging: { level: 'debug' } });
      expect(config.logging.level).toBe('debug');
      expect(config.shell).toBe('/bin/bash');
      expect(config.remote.stagingDir).toBe('pipewright_tmp');
    });
  });
});
