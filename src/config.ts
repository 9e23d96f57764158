/**
 * Configuration Management
 * Filter thresholds from defaults, environment variables and CLI overrides
 */

import { z } from 'zod';
import {
  DEFAULT_EXCLUDE_FLAGS,
  DEFAULT_MIN_PC_IDENT,
  DEFAULT_MIN_REF_BASE_ASSEMBLED,
  DEFAULT_REQUIRE_KNOWN_VARIANT,
} from './constants';
import { ConfigError } from './errors';
import { parseFlagNames, type FlagName } from './report';

/**
 * Thresholds every surviving record must meet
 */
export interface EssentialFilterConfig {
  minPcIdent: number;
  minRefBaseAssembled: number;
  excludeFlags: readonly FlagName[];
}

/**
 * Softer criteria; a group failing them on every record keeps one demoted record
 */
export interface NonEssentialFilterConfig {
  requireKnownVariant: boolean;
}

export interface FilterConfig {
  essential: EssentialFilterConfig;
  nonEssential: NonEssentialFilterConfig;
}

export const DEFAULT_ESSENTIAL_CONFIG: EssentialFilterConfig = {
  minPcIdent: DEFAULT_MIN_PC_IDENT,
  minRefBaseAssembled: DEFAULT_MIN_REF_BASE_ASSEMBLED,
  excludeFlags: DEFAULT_EXCLUDE_FLAGS,
};

export const DEFAULT_NON_ESSENTIAL_CONFIG: NonEssentialFilterConfig = {
  requireKnownVariant: DEFAULT_REQUIRE_KNOWN_VARIANT,
};

export const numberFromString = z
  .string()
  .trim()
  .regex(/^[+-]?(\d+(\.\d*)?|\.\d+)$/, 'must be a decimal number')
  .transform(Number);

const booleanFromString = z
  .enum(['true', 'false', '1', '0', 'yes', 'no'])
  .transform(value => value === 'true' || value === '1' || value === 'yes');

export const flagListFromString = z
  .string()
  .transform(value => value.split(',').map(name => name.trim()).filter(name => name.length > 0));

const filterEnvSchema = z.object({
  REPORT_FILTER_MIN_PC_IDENT: numberFromString.optional(),
  REPORT_FILTER_MIN_REF_BASE_ASSEMBLED: numberFromString.optional(),
  REPORT_FILTER_REQUIRE_KNOWN_VARIANT: booleanFromString.optional(),
  REPORT_FILTER_EXCLUDE_FLAGS: flagListFromString.optional(),
});

export type FilterEnv = z.infer<typeof filterEnvSchema>;

export interface FilterOverrides {
  minPcIdent?: number;
  minRefBaseAssembled?: number;
  requireKnownVariant?: boolean;
  excludeFlags?: readonly string[];
}

/**
 * Read filter overrides from environment variables
 */
export function loadFilterEnv(env: NodeJS.ProcessEnv = process.env): FilterOverrides {
  const parseResult = filterEnvSchema.safeParse(env);

  if (!parseResult.success) {
    const errors = parseResult.error.issues
      .map(e => `  - ${e.path.join('.')}: ${e.message}`)
      .join('\n');
    throw new ConfigError(`Configuration validation failed:\n${errors}`);
  }

  const parsed = parseResult.data;
  return {
    minPcIdent: parsed.REPORT_FILTER_MIN_PC_IDENT,
    minRefBaseAssembled: parsed.REPORT_FILTER_MIN_REF_BASE_ASSEMBLED,
    requireKnownVariant: parsed.REPORT_FILTER_REQUIRE_KNOWN_VARIANT,
    excludeFlags: parsed.REPORT_FILTER_EXCLUDE_FLAGS,
  };
}

/**
 * Build the filter configuration. Later sources win: defaults, then each
 * override in order (typically environment, then CLI).
 */
export function resolveFilterConfig(...overrides: FilterOverrides[]): FilterConfig {
  const pick = <K extends keyof FilterOverrides>(key: K): FilterOverrides[K] => {
    for (let i = overrides.length - 1; i >= 0; i--) {
      const value = overrides[i][key];
      if (value !== undefined) return value;
    }
    return undefined;
  };

  const excludeFlags = pick('excludeFlags');

  return {
    essential: {
      minPcIdent: pick('minPcIdent') ?? DEFAULT_ESSENTIAL_CONFIG.minPcIdent,
      minRefBaseAssembled: pick('minRefBaseAssembled') ?? DEFAULT_ESSENTIAL_CONFIG.minRefBaseAssembled,
      excludeFlags: excludeFlags ? parseFlagNames(excludeFlags) : DEFAULT_ESSENTIAL_CONFIG.excludeFlags,
    },
    nonEssential: {
      requireKnownVariant: pick('requireKnownVariant') ?? DEFAULT_NON_ESSENTIAL_CONFIG.requireKnownVariant,
    },
  };
}
