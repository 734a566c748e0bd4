import { isAbsolute, resolve } from 'node:path';

export const DEFAULT_VERSION_HISTORY_FILE = 'version_history.json';
export const DEFAULT_PLATFORM_VERSION_FILE = 'platform_version.json';

export type VersioningEnvironment = {
  versionHistoryPath: string;
  platformVersionPath: string;
};

function readEnvValue(env: NodeJS.ProcessEnv, key: string): string | undefined {
  const value = env[key]?.trim();
  return value ? value : undefined;
}

function resolvePath(root: string, value: string): string {
  return isAbsolute(value) ? value : resolve(root, value);
}

/**
 * Resolve the ledger and pointer file locations.
 *
 * VERSION_HISTORY_PATH and PLATFORM_VERSION_PATH override the defaults;
 * relative values and the defaults resolve against VERSIONING_ROOT, which
 * itself defaults to the working directory.
 */
export function loadVersioningConfig(
  env: NodeJS.ProcessEnv = process.env,
  cwd: string = process.cwd()
): VersioningEnvironment {
  const root = resolvePath(cwd, readEnvValue(env, 'VERSIONING_ROOT') ?? '.');

  return {
    versionHistoryPath: resolvePath(
      root,
      readEnvValue(env, 'VERSION_HISTORY_PATH') ?? DEFAULT_VERSION_HISTORY_FILE
    ),
    platformVersionPath: resolvePath(
      root,
      readEnvValue(env, 'PLATFORM_VERSION_PATH') ?? DEFAULT_PLATFORM_VERSION_FILE
    ),
  };
}
