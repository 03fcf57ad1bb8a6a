/**
 * Configuration types for pipewright
 */

export interface PipewrightConfig {
  /** Encoding used to decode captured command output */
  encoding?: string;
  /** Shell used for every local invocation */
  shell?: string;
  /** Local directory holding the import scripts */
  importPath?: string;
  /** Process-wide constants, available in templates as `{const_<name>}` */
  constants?: Record<string, string>;
  remote?: RemoteConfig;
  logging?: LoggingConfig;
}

export interface RemoteConfig {
  /** SSH client invocation, e.g. "ssh" or "ssh -F ./ssh_config" */
  sshCommand?: string;
  /** Run remote commands through sudo (default true) */
  sudo?: boolean;
  /** Directory created on the remote host to stage import scripts */
  stagingDir?: string;
}

export interface LoggingConfig {
  level?: string;
}

/**
 * Configuration with every default applied.
 */
export interface ResolvedConfig {
  encoding: BufferEncoding;
  shell: string;
  importPath: string;
  constants: Record<string, string>;
  remote: Required<RemoteConfig>;
  logging: Required<LoggingConfig>;
}
