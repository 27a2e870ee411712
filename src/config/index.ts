import { readFile } from 'node:fs/promises';
import { join } from 'node:path';
import { NavError } from '../errors/index.ts';

export const CONFIG_FILE_NAME = 'pbxnav.config.json';

/**
 * Output configuration.
 */
export interface OutputConfig {
  /** Print the "Xcode Project Structure for" header and rules */
  header: boolean;
  /** Spaces per tree level */
  indentWidth: number;
}

/**
 * pbxnav configuration.
 */
export interface NavConfig {
  /** .xcodeproj bundle, relative to the config directory */
  project?: string;
  /** Project root used for SOURCE_ROOT paths, relative to the config directory */
  root?: string;
  output: OutputConfig;
}

/**
 * Default configuration.
 */
export const DEFAULT_CONFIG: NavConfig = {
  output: {
    header: true,
    indentWidth: 2,
  },
};

type UserConfig = {
  project?: unknown;
  root?: unknown;
  output?: { header?: unknown; indentWidth?: unknown };
};

function configError(message: string): NavError {
  return new NavError('CONFIG_ERROR', message, 'fatal');
}

function optionalString(value: unknown, field: string): string | undefined {
  if (value === undefined) return undefined;
  if (typeof value !== 'string' || value.length === 0) {
    throw configError(`Invalid "${field}" in ${CONFIG_FILE_NAME}: expected a non-empty string`);
  }
  return value;
}

/**
 * Load configuration from pbxnav.config.json or return defaults.
 * @param rootDir - The directory to search for the config file (defaults to cwd)
 * @throws NavError (CONFIG_ERROR) if the file exists but is invalid
 */
export async function loadConfig(rootDir?: string): Promise<NavConfig> {
  const configDir = rootDir || process.cwd();
  const configPath = join(configDir, CONFIG_FILE_NAME);

  let configContent: string;
  try {
    configContent = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (error && typeof error === 'object' && 'code' in error && error.code === 'ENOENT') {
      return DEFAULT_CONFIG;
    }
    throw error;
  }

  let parsed: unknown;
  try {
    parsed = JSON.parse(configContent);
  } catch (error) {
    const message = error instanceof Error ? error.message : String(error);
    throw configError(`Failed to parse ${CONFIG_FILE_NAME}: ${message}`);
  }

  if (!parsed || typeof parsed !== 'object' || Array.isArray(parsed)) {
    throw configError(`${CONFIG_FILE_NAME} must contain a JSON object`);
  }
  const userConfig: UserConfig = parsed;

  const header = userConfig.output?.header ?? DEFAULT_CONFIG.output.header;
  if (typeof header !== 'boolean') {
    throw configError(`Invalid "output.header" in ${CONFIG_FILE_NAME}: expected true or false`);
  }

  const indentWidth = userConfig.output?.indentWidth ?? DEFAULT_CONFIG.output.indentWidth;
  if (
    typeof indentWidth !== 'number' ||
    !Number.isInteger(indentWidth) ||
    indentWidth < 1 ||
    indentWidth > 8
  ) {
    throw configError(
      `Invalid "output.indentWidth": ${JSON.stringify(indentWidth)}. Must be an integer from 1 to 8`
    );
  }

  return {
    project: optionalString(userConfig.project, 'project'),
    root: optionalString(userConfig.root, 'root'),
    output: { header, indentWidth },
  };
}
