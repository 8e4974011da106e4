/**
 * Location of the SDK configuration file.
 *
 * The file lives at `~/.anki_vector/sdk_config.ini` unless
 * `VECTOR_SDK_CONFIG_PATH` points somewhere else. The environment and the
 * home-directory lookup are injectable so tests never touch the real profile.
 */

import { homedir } from 'node:os';
import path from 'node:path';

export const SDK_CONFIG_DIR_NAME = '.anki_vector';
export const SDK_CONFIG_FILE_NAME = 'sdk_config.ini';
export const SDK_CONFIG_PATH_ENV = 'VECTOR_SDK_CONFIG_PATH';

export interface SdkConfigPathOptions {
  env?: NodeJS.ProcessEnv;
  /** Returns the user profile directory. Defaults to `os.homedir`. */
  homeDir?: () => string;
}

/** The configuration file under a given profile directory. */
export function defaultSdkConfigPath(homeDir: string): string {
  return path.join(homeDir, SDK_CONFIG_DIR_NAME, SDK_CONFIG_FILE_NAME);
}

/**
 * Resolve the configuration file path.
 *
 * - A non-blank `VECTOR_SDK_CONFIG_PATH` wins (relative values resolve against
 *   the working directory).
 * - Otherwise `<home>/.anki_vector/sdk_config.ini`.
 */
export function resolveSdkConfigPath(options: SdkConfigPathOptions = {}): string {
  const env = options.env ?? process.env;
  const override = env[SDK_CONFIG_PATH_ENV];
  if (override !== undefined && override.trim().length > 0) {
    return path.resolve(override.trim());
  }
  const lookupHome = options.homeDir ?? homedir;
  return defaultSdkConfigPath(lookupHome());
}
