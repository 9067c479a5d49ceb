/**
 * Process-wide configuration
 *
 * The configuration is read from the environment once, when this module is
 * first loaded, and frozen. Nothing in stridekit mutates it afterwards.
 *
 * | Key                    | Environment variable               | Default |
 * |------------------------|------------------------------------|---------|
 * | referenceElementSize   | STRIDEKIT_REFERENCE_ELEMENT_SIZE   | 16      |
 * | checkBounds            | STRIDEKIT_CHECK_BOUNDS             | true    |
 * | maxRank                | STRIDEKIT_MAX_RANK                 | 32      |
 * | logLevel               | STRIDEKIT_LOG_LEVEL                | warn    |
 */

import { ConfigError } from './errors';

export type LogLevelName = 'none' | 'error' | 'warn' | 'info' | 'debug';

export interface LayoutConfig {
  /**
   * Byte width recorded for reference-like element kinds (`string`, `object`).
   * This is a bookkeeping placeholder, not the size of any real allocation;
   * 16 matches a typical object header on 64-bit managed runtimes.
   */
  readonly referenceElementSize: number;
  /** Whether `toCoordinates` rejects flat indices outside the shape */
  readonly checkBounds: boolean;
  /** Largest rank accepted by shape validation */
  readonly maxRank: number;
  readonly logLevel: LogLevelName;
}

export const DEFAULT_CONFIG: LayoutConfig = Object.freeze({
  referenceElementSize: 16,
  checkBounds: true,
  maxRank: 32,
  logLevel: 'warn',
});

export const ENV_KEYS = Object.freeze({
  referenceElementSize: 'STRIDEKIT_REFERENCE_ELEMENT_SIZE',
  checkBounds: 'STRIDEKIT_CHECK_BOUNDS',
  maxRank: 'STRIDEKIT_MAX_RANK',
  logLevel: 'STRIDEKIT_LOG_LEVEL',
} as const satisfies Record<keyof LayoutConfig, string>);

const LOG_LEVEL_NAMES: readonly LogLevelName[] = ['none', 'error', 'warn', 'info', 'debug'];

function isLogLevelName(value: string): value is LogLevelName {
  return (LOG_LEVEL_NAMES as readonly string[]).includes(value);
}

function parsePositiveInteger(key: string, raw: string): number {
  const trimmed = raw.trim();
  const value = Number(trimmed);
  if (trimmed === '' || !Number.isSafeInteger(value) || value <= 0) {
    throw new ConfigError(key, raw, 'a positive integer');
  }
  return value;
}

function parseBoolean(key: string, raw: string): boolean {
  switch (raw.trim().toLowerCase()) {
    case 'true':
    case '1':
      return true;
    case 'false':
    case '0':
      return false;
    default:
      throw new ConfigError(key, raw, 'one of true, false, 1, 0');
  }
}

function parseLogLevel(key: string, raw: string): LogLevelName {
  const value = raw.trim().toLowerCase();
  if (!isLogLevelName(value)) {
    throw new ConfigError(key, raw, `one of ${LOG_LEVEL_NAMES.join(', ')}`);
  }
  return value;
}

/**
 * Build a configuration from environment variables
 *
 * Unset or empty variables keep their default. Values that do not parse throw
 * a ConfigError rather than falling back.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): LayoutConfig {
  const read = (key: string): string | undefined => {
    const raw = env[key];
    return raw === undefined || raw === '' ? undefined : raw;
  };

  const referenceElementSize = read(ENV_KEYS.referenceElementSize);
  const checkBounds = read(ENV_KEYS.checkBounds);
  const maxRank = read(ENV_KEYS.maxRank);
  const logLevel = read(ENV_KEYS.logLevel);

  return Object.freeze({
    referenceElementSize:
      referenceElementSize === undefined
        ? DEFAULT_CONFIG.referenceElementSize
        : parsePositiveInteger(ENV_KEYS.referenceElementSize, referenceElementSize),
    checkBounds:
      checkBounds === undefined
        ? DEFAULT_CONFIG.checkBounds
        : parseBoolean(ENV_KEYS.checkBounds, checkBounds),
    maxRank:
      maxRank === undefined
        ? DEFAULT_CONFIG.maxRank
        : parsePositiveInteger(ENV_KEYS.maxRank, maxRank),
    logLevel:
      logLevel === undefined ? DEFAULT_CONFIG.logLevel : parseLogLevel(ENV_KEYS.logLevel, logLevel),
  });
}

/**
 * Configuration in effect for this process
 */
export const CONFIG: LayoutConfig = loadConfig();
