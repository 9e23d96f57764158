/**
 * Report flag bitset
 *
 * The flag column stores an integer; each named condition owns one bit,
 * in the order below (bit value 2^index).
 */

import { ConfigError } from '../errors';

export const FLAG_NAMES = [
  'assembled',
  'assembled_into_one_contig',
  'region_assembled_twice',
  'complete_gene',
  'unique_contig',
  'scaffold_graph_bad',
  'assembly_fail',
  'variants_suggest_collapsed_repeat',
  'hit_both_strands',
  'has_variant',
  'ref_seq_choose_fail',
] as const;

export type FlagName = (typeof FLAG_NAMES)[number];

export function isFlagName(name: string): name is FlagName {
  return FLAG_NAMES.some(flagName => flagName === name);
}

function bitOf(name: FlagName): number {
  return 1 << FLAG_NAMES.indexOf(name);
}

/**
 * Validate a list of flag names coming from configuration
 */
export function parseFlagNames(names: readonly string[]): FlagName[] {
  const unknown = names.filter(n => !isFlagName(n));
  if (unknown.length > 0) {
    throw new ConfigError(
      `Unknown flag name(s): ${unknown.join(', ')}. Known flags: ${FLAG_NAMES.join(', ')}`,
      { unknown }
    );
  }
  return names.filter(isFlagName);
}

export class Flag {
  readonly value: number;

  constructor(value: number = 0) {
    if (!Number.isInteger(value) || value < 0 || value > 0x7fffffff) {
      throw new RangeError(`Invalid flag value: ${value}`);
    }
    this.value = value;
  }

  static of(...names: FlagName[]): Flag {
    return names.reduce((flag, name) => flag.add(name), new Flag());
  }

  has(name: FlagName): boolean {
    return (this.value & bitOf(name)) !== 0;
  }

  /** Returns a new flag with the named bit set */
  add(name: FlagName): Flag {
    return new Flag(this.value | bitOf(name));
  }

  names(): FlagName[] {
    return FLAG_NAMES.filter(name => this.has(name));
  }

  toString(): string {
    return String(this.value);
  }

  /** One `name<TAB>0|1` line per bit */
  toLongString(): string {
    return FLAG_NAMES.map(name => `${name}\t${this.has(name) ? 1 : 0}`).join('\n');
  }
}
