import { existsSync } from 'fs';
import { homedir } from 'os';
import * as path from 'path';

export const CONFIG_FILE_NAME = 'ipam-report.env';

/**
 * Default locations of the configuration file, first existing wins
 */
export function defaultConfigSearchPaths(homeDir: string = homedir()): string[] {
  return [
    path.join(homeDir, '.ipam-report', CONFIG_FILE_NAME),
    path.join(homeDir, CONFIG_FILE_NAME),
    path.join('/etc', 'ipam-report', CONFIG_FILE_NAME),
    path.join('/etc', CONFIG_FILE_NAME),
  ];
}

export class ConfigFileNotFoundError extends Error {
  constructor(
    readonly searched: string[],
    readonly explicit: boolean,
  ) {
    super(
      explicit
        ? `Configuration file not found: ${searched.join(', ')}`
        : `Unable to find a configuration file in the default search paths (${searched.join(', ')}) and no --config-file option was given`,
    );
    this.name = 'ConfigFileNotFoundError';
  }
}

export interface ResolveConfigFileOptions {
  searchPaths?: string[];
  exists?: (filePath: string) => boolean;
}

/**
 * Resolves the configuration file from `--config-file` or the default search
 * paths
 *
 * @throws ConfigFileNotFoundError when nothing resolves
 */
export function resolveConfigFile(
  explicitPath?: string,
  options: ResolveConfigFileOptions = {},
): string {
  const exists = options.exists ?? existsSync;

  if (explicitPath) {
    const resolved = path.resolve(explicitPath);
    if (!exists(resolved)) {
      throw new ConfigFileNotFoundError([resolved], true);
    }
    return resolved;
  }

  const searchPaths = options.searchPaths ?? defaultConfigSearchPaths();
  const found = searchPaths.find((candidate) => exists(candidate));
  if (!found) {
    throw new ConfigFileNotFoundError(searchPaths, false);
  }

  return found;
}
