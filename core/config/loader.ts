import * as fs from 'fs';
import * as path from 'path';
import * as os from 'os';
import { ConfigurationError } from '@core/errors';
import { configLogger } from '@core/utils/logger';
import type { LoggingConfig, PipewrightConfig, RemoteConfig, ResolvedConfig } from './types';

export const DEFAULT_CONFIG: ResolvedConfig = {
  encoding: 'utf-8',
  shell: '/bin/bash',
  importPath: '.',
  constants: {},
  remote: {
    sshCommand: 'ssh',
    sudo: true,
    stagingDir: 'pipewright_tmp'
  },
  logging: {
    level: 'info'
  }
};

/**
 * Load pipewright configuration from both global and project locations
 */
export class ConfigLoader {
  private globalConfigPath: string;
  private projectConfigPath: string;
  private cachedConfig?: ResolvedConfig;

  constructor(projectPath?: string, globalConfigPath?: string) {
    // Global config location: ~/.config/pipewright.json
    this.globalConfigPath = globalConfigPath ?? path.join(os.homedir(), '.config', 'pipewright.json');

    // Project config location: <project>/pipewright.config.json
    this.projectConfigPath = path.join(projectPath ?? process.cwd(), 'pipewright.config.json');
  }

  /**
   * Load, merge and validate configurations
   */
  load(env: NodeJS.ProcessEnv = process.env): ResolvedConfig {
    if (this.cachedConfig) {
      return this.cachedConfig;
    }

    const globalConfig = this.loadConfigFile(this.globalConfigPath);
    const projectConfig = this.loadConfigFile(this.projectConfigPath);

    // Project overrides global
    const merged = this.mergeConfigs(globalConfig, projectConfig);
    if (env.PIPEWRIGHT_ENCODING) {
      merged.encoding = env.PIPEWRIGHT_ENCODING;
    }

    this.cachedConfig = resolveConfig(merged);
    return this.cachedConfig;
  }

  private loadConfigFile(filePath: string): PipewrightConfig {
    if (!fs.existsSync(filePath)) {
      return {};
    }

    let parsed: unknown;
    try {
      parsed = JSON.parse(fs.readFileSync(filePath, 'utf8'));
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      throw new ConfigurationError(`Failed to parse config ${filePath}: ${message}`, filePath);
    }

    if (!isRecord(parsed)) {
      throw new ConfigurationError(`Config ${filePath} must contain a JSON object`, filePath);
    }

    configLogger.debug(`Loaded config from ${filePath}`);
    return validateConfig(parsed, filePath);
  }

  private mergeConfigs(global: PipewrightConfig, project: PipewrightConfig): PipewrightConfig {
    const merged: PipewrightConfig = { ...global, ...project };

    if (global.constants || project.constants) {
      merged.constants = { ...global.constants, ...project.constants };
    }

    if (global.remote || project.remote) {
      merged.remote = this.mergeRemote(global.remote, project.remote);
    }

    if (global.logging || project.logging) {
      merged.logging = { ...global.logging, ...project.logging };
    }

    return merged;
  }

  private mergeRemote(global?: RemoteConfig, project?: RemoteConfig): RemoteConfig {
    return { ...global, ...project };
  }
}

/**
 * Apply defaults and check the values that cannot be expressed in the type
 */
export function resolveConfig(config: PipewrightConfig): ResolvedConfig {
  const encoding = config.encoding ?? DEFAULT_CONFIG.encoding;
  if (!Buffer.isEncoding(encoding)) {
    throw new ConfigurationError(`Unsupported encoding: ${encoding}`);
  }

  return {
    encoding,
    shell: config.shell ?? DEFAULT_CONFIG.shell,
    importPath: config.importPath ?? DEFAULT_CONFIG.importPath,
    constants: { ...DEFAULT_CONFIG.constants, ...config.constants },
    remote: { ...DEFAULT_CONFIG.remote, ...config.remote },
    logging: { ...DEFAULT_CONFIG.logging, ...config.logging }
  };
}

function validateConfig(raw: Record<string, unknown>, filePath: string): PipewrightConfig {
  const encoding = optionalString(raw, 'encoding', filePath);
  const shell = optionalString(raw, 'shell', filePath);
  const importPath = optionalString(raw, 'importPath', filePath);

  return {
    ...(encoding !== undefined ? { encoding } : {}),
    ...(shell !== undefined ? { shell } : {}),
    ...(importPath !== undefined ? { importPath } : {}),
    ...(raw.constants !== undefined ? { constants: validateConstants(raw.constants, filePath) } : {}),
    ...(raw.remote !== undefined ? { remote: validateRemote(raw.remote, filePath) } : {}),
    ...(raw.logging !== undefined ? { logging: validateLogging(raw.logging, filePath) } : {})
  };
}

function validateConstants(raw: unknown, filePath: string): Record<string, string> {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`"constants" must be an object in ${filePath}`, filePath);
  }
  const constants: Record<string, string> = {};
  for (const [key, value] of Object.entries(raw)) {
    if (typeof value !== 'string' && typeof value !== 'number' && typeof value !== 'boolean') {
      throw new ConfigurationError(`Constant "${key}" must be a string, number or boolean in ${filePath}`, filePath);
    }
    constants[key] = String(value);
  }
  return constants;
}

function validateRemote(raw: unknown, filePath: string): RemoteConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`"remote" must be an object in ${filePath}`, filePath);
  }
  const sudo = raw.sudo;
  if (sudo !== undefined && typeof sudo !== 'boolean') {
    throw new ConfigurationError(`"remote.sudo" must be a boolean in ${filePath}`, filePath);
  }
  const sshCommand = optionalString(raw, 'sshCommand', filePath);
  const stagingDir = optionalString(raw, 'stagingDir', filePath);
  return {
    ...(sshCommand !== undefined ? { sshCommand } : {}),
    ...(sudo !== undefined ? { sudo } : {}),
    ...(stagingDir !== undefined ? { stagingDir } : {})
  };
}

function validateLogging(raw: unknown, filePath: string): LoggingConfig {
  if (!isRecord(raw)) {
    throw new ConfigurationError(`"logging" must be an object in ${filePath}`, filePath);
  }
  const level = optionalString(raw, 'level', filePath);
  return level !== undefined ? { level } : {};
}

function optionalString(source: Record<string, unknown>, key: string, filePath: string): string | undefined {
  const value = source[key];
  if (value === undefined) return undefined;
  if (typeof value !== 'string') {
    throw new ConfigurationError(`"${key}" must be a string in ${filePath}`, filePath);
  }
  return value;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === 'object' && value !== null && !Array.isArray(value);
}
