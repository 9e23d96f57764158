/**
 * Main entry point for filter-report
 */

import {
  flagListFromString,
  loadFilterEnv,
  numberFromString,
  resolveFilterConfig,
  type FilterOverrides,
} from '../config';
import { ConfigError } from '../errors';
import { getFilterRegistry } from './pipeline';
import { runReportFilter } from './run';

export { filterReport, selectGroup, partitionGroup, type GroupOutcome, type GroupSelection, type FilterReportResult } from './select';
export { formatReportTsv, writeReportTsv, buildReportWorkbook, writeReportXls } from './output';
export { runReportFilter, type RunReportFilterOptions, type RunReportFilterSummary } from './run';

// ============ CLI Arguments ============

export interface FilterCLIOptions {
  help: boolean;
  verbose: boolean;
  keepUnknownVariants: boolean;
  minPcIdent?: string;
  minRefBaseAssembled?: string;
  excludeFlags?: string;
  positional: string[];
}

const VALUE_OPTIONS = {
  '--min-pc-ident': 'minPcIdent',
  '--min-ref-base-assembled': 'minRefBaseAssembled',
  '--exclude-flags': 'excludeFlags',
} as const;

type ValueOption = keyof typeof VALUE_OPTIONS;

function isValueOption(arg: string): arg is ValueOption {
  return Object.hasOwn(VALUE_OPTIONS, arg);
}

export function parseArgs(args: string[] = process.argv.slice(2)): FilterCLIOptions {
  const options: FilterCLIOptions = {
    help: false,
    verbose: false,
    keepUnknownVariants: false,
    positional: [],
  };

  for (let i = 0; i < args.length; i++) {
    const arg = args[i];
    const eq = arg.startsWith('--') ? arg.indexOf('=') : -1;
    const name = eq >= 0 ? arg.slice(0, eq) : arg;
    const inlineValue = eq >= 0 ? arg.slice(eq + 1) : undefined;

    if (name === '--help' || name === '-h') {
      options.help = true;
    } else if (name === '--verbose') {
      options.verbose = true;
    } else if (name === '--keep-unknown-variants') {
      options.keepUnknownVariants = true;
    } else if (isValueOption(name)) {
      const value = inlineValue ?? args[++i];
      if (value === undefined) {
        throw new ConfigError(`Option ${name} requires a value`, { option: name });
      }
      options[VALUE_OPTIONS[name]] = value;
    } else if (name.startsWith('-') && name !== '-') {
      throw new ConfigError(`Unknown option: ${name}`, { option: name });
    } else {
      options.positional.push(arg);
    }
  }

  return options;
}

function parseOption<T>(name: string, value: string | undefined, parse: (v: string) => T): T | undefined {
  if (value === undefined) return undefined;
  try {
    return parse(value);
  } catch (error) {
    throw new ConfigError(`Invalid value for ${name}: "${value}"`, {
      option: name,
      cause: error instanceof Error ? error.message : String(error),
    });
  }
}

/**
 * Threshold overrides given on the command line
 */
export function cliOverrides(options: FilterCLIOptions): FilterOverrides {
  return {
    minPcIdent: parseOption('--min-pc-ident', options.minPcIdent, v => numberFromString.parse(v)),
    minRefBaseAssembled: parseOption('--min-ref-base-assembled', options.minRefBaseAssembled, v => numberFromString.parse(v)),
    excludeFlags: parseOption('--exclude-flags', options.excludeFlags, v => flagListFromString.parse(v)),
    requireKnownVariant: options.keepUnknownVariants ? false : undefined,
  };
}

export function showHelp(): void {
  console.log(`
Usage: tsx filter-report.ts [options] <infile> <outprefix>

Filters an assembly report by quality thresholds and writes <outprefix>.xls and <outprefix>.tsv.
Within each reference/contig group, records passing every filter are kept. If none do,
the first record passing the essential filters is kept with its variant columns set to ".".

Options:
  --min-pc-ident <n>             Minimum percent identity (default: 90)
  --min-ref-base-assembled <n>   Minimum reference bases assembled (default: 1)
  --exclude-flags <a,b,...>      Drop records with any of these flags
                                 (default: assembly_fail,ref_seq_choose_fail)
  --keep-unknown-variants        Do not require has_known_var == 1
  --verbose                      Print per-filter statistics
  --help, -h                     Show this help message

Environment Variables (overridden by options):
  REPORT_FILTER_MIN_PC_IDENT
  REPORT_FILTER_MIN_REF_BASE_ASSEMBLED
  REPORT_FILTER_REQUIRE_KNOWN_VARIANT   true/false
  REPORT_FILTER_EXCLUDE_FLAGS           comma-separated flag names

Examples:
  tsx filter-report.ts report.tsv filtered
  tsx filter-report.ts --min-pc-ident 95 --keep-unknown-variants report.tsv.gz filtered
`);
}

// ============ Main ============

export function main(args: string[] = process.argv.slice(2)): void {
  try {
    const options = parseArgs(args);

    if (options.help) {
      showHelp();
      return;
    }

    if (options.positional.length !== 2) {
      throw new ConfigError(
        `Expected <infile> <outprefix> but got ${options.positional.length} argument(s). Use --help for usage.`
      );
    }
    const [infile, outprefix] = options.positional;

    const config = resolveFilterConfig(loadFilterEnv(), cliOverrides(options));

    if (options.verbose) {
      for (const { pipeline, filters } of getFilterRegistry(config.essential, config.nonEssential)) {
        console.log(`[Config] ${pipeline}: ${filters.map(f => f.name).join(', ') || '(none)'}`);
      }
    }

    runReportFilter({
      infile,
      outprefix,
      essential: config.essential,
      nonEssential: config.nonEssential,
      verbose: options.verbose,
    });
  } catch (error) {
    console.error('Error:', error instanceof Error ? error.message : String(error));
    process.exitCode = 1;
  }
}
