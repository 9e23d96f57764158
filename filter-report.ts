#!/usr/bin/env tsx
/// <reference types="node" />
/**
 * Filter an assembly report and export the surviving rows
 *
 * Groups report rows by reference and contig, keeps rows passing the quality
 * thresholds and writes <outprefix>.xls and <outprefix>.tsv.
 *
 * Usage:
 *   tsx filter-report.ts <infile> <outprefix>
 *   tsx filter-report.ts --help
 */

import 'dotenv/config';
import { main } from './src/filter';

main();
