import {ConfigurationError} from './diagnostics.js';

export interface ParserOptions {
  /**
   * Version that `if` conditions over version tuples are compared against.
   * Defaults to `[3, 6]`.
   */
  targetVersion?: readonly number[];
  /** Value that `if` conditions over names are compared against. */
  platform?: string;
}

export interface ResolvedParserOptions {
  targetVersion: readonly number[];
  platform: string;
}

export const DEFAULT_TARGET_VERSION: readonly number[] = [3, 6];
export const DEFAULT_PLATFORM = 'linux';

export const resolveOptions = (
  options: ParserOptions = {},
): ResolvedParserOptions => {
  const targetVersion = options.targetVersion ?? DEFAULT_TARGET_VERSION;
  if (targetVersion.length === 0) {
    throw new ConfigurationError('targetVersion must not be empty.');
  }
  for (const part of targetVersion) {
    if (!Number.isInteger(part) || part < 0) {
      throw new ConfigurationError(
        `targetVersion parts must be non-negative integers, got ${part}.`,
      );
    }
  }
  return {
    targetVersion: [...targetVersion],
    platform: options.platform ?? DEFAULT_PLATFORM,
  };
};
