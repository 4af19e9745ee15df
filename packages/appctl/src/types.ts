/**
 * Shared types for the appctl CLI
 */

export const DEPLOY_MODES = ['uvicorn', 'docker', 'docker-compose'] as const;

export type DeployMode = (typeof DEPLOY_MODES)[number];

/** Options accepted by every command (see index.ts) */
export type GlobalOptions = {
  mode: string;
  envFile: string;
  requirements: string;
  appDir: string;
  port: number;
  host: string;
  workers: number;
  app: string;
  name: string;
};

export interface DeployContext {
  /** Absolute path to the application directory */
  dir: string;

  mode: DeployMode;

  /** Absolute path to the env file (may not exist) */
  envFile: string;

  /** Whether the env file was found and loaded */
  envFileLoaded: boolean;

  /** Variables read from the env file, passed to every child process */
  env: Record<string, string>;

  /** Absolute path to the dependency file */
  requirementsFile: string;

  host: string;
  port: number;
  workers: number;

  /** ASGI import path, e.g. main:app */
  app: string;

  /** Image and container name */
  name: string;
}

export interface StartOptions {
  skipHealth?: boolean;
}

export interface CleanOptions {
  yes?: boolean;
}

export interface LogsOptions {
  follow?: boolean;
  tail?: string;
}

export interface HealthOptions {
  path?: string;
  timeout?: number;
}

/**
 * Lifecycle operations implemented by each deployment mode.
 * install and build are only offered by the modes that have them.
 */
export interface Backend {
  readonly mode: DeployMode;
  install?(): Promise<void>;
  build?(): Promise<void>;
  start(): Promise<void>;
  stop(): Promise<void>;
  /** Resolves true when the service is running */
  status(): Promise<boolean>;
  clean(): Promise<void>;
  logs(options: LogsOptions): Promise<void>;
}

export interface Prerequisites {
  node: {
    version: string;
    satisfies: boolean;
  };
  python: {
    installed: boolean;
    version?: string;
  };
  container: {
    command?: string;
    version?: string;
  };
  compose: {
    command?: string;
    version?: string;
  };
  platform: {
    name: string;
    isWSL?: boolean;
  };
}
