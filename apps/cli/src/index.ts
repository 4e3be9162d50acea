#!/usr/bin/env node
/* eslint-disable no-console */

// Load environment variables from .env file
import 'dotenv/config';

import { Command } from 'commander';
import { mkdir, writeFile } from 'fs/promises';
import { availableParallelism } from 'os';
import { basename, dirname, resolve } from 'path';
import { BankIdentifier, loadDefaultKeywordMapping, type BankIdentification } from '@bankstmt/bank-identifier';
import { exportCsv, exportCsvByGroup, exportJson, exportXlsx } from '@bankstmt/output';
import {
  createDefaultRegistry,
  processBatch,
  scanDirectoryForPdfs,
  validateDirectory,
  type BatchFile,
  type ParseError,
} from '@bankstmt/statement-parser';
import {
  ACCOUNT_TYPE_FIELD,
  FUZZY_SCORE_THRESHOLD,
  TOOLKIT_VERSION,
  createLogger,
  formatValidationErrors,
  validateOutput,
  type CanonicalTransactionRecord,
} from '@bankstmt/types';
import { loadConfig, resolveBankMapping, resolveConfigPath, saveConfig, type CliConfig } from './config.js';

const AVAILABLE_FORMATS = ['json', 'csv', 'xlsx'] as const;
type OutputFormat = typeof AVAILABLE_FORMATS[number];

const program = new Command();
const logger = createLogger('cli');

// Helper to parse boolean env vars
const envBool = (key: string, defaultVal: boolean): boolean => {
  const val = process.env[key];
  if (val === undefined || val === '') return defaultVal;
  return val === 'true' || val === '1';
};

function isOutputFormat(value: string): value is OutputFormat {
  return (AVAILABLE_FORMATS as readonly string[]).includes(value);
}

function parseScore(value: string): number {
  const score = Number(value);
  if (!Number.isFinite(score) || score < 0 || score > 100) {
    throw new Error(`Fuzzy score must be a number between 0 and 100, got "${value}"`);
  }
  return score;
}

function parseConcurrency(value: string): number {
  const concurrency = Number(value);
  if (!Number.isInteger(concurrency) || concurrency < 1) {
    throw new Error(`Concurrency must be a positive integer, got "${value}"`);
  }
  return concurrency;
}

interface ParseOptions {
  inputDir?: string;
  recursive: boolean;
  concurrency: string;
  out?: string;
  verbose: boolean;
  strict: boolean;
  pretty: boolean;
  format: string;
  splitAccounts: boolean;
  mapping?: string;
  bank?: string;
  strictMatch: boolean;
  minFuzzyScore?: string;
  saveConfig: boolean;
}

interface DetectOptions {
  mapping?: string;
  strictMatch: boolean;
  minFuzzyScore?: string;
  verbose: boolean;
}

function fuzzyScore(options: { strictMatch: boolean; minFuzzyScore?: string }): number | undefined {
  if (options.minFuzzyScore !== undefined) return parseScore(options.minFuzzyScore);
  return options.strictMatch ? FUZZY_SCORE_THRESHOLD : undefined;
}

function reportFailure(error: unknown, verbose: boolean): never {
  const message = error instanceof Error ? error.message : String(error);
  console.error(`[ERROR] ${message}`);
  if (verbose && error instanceof Error && error.stack !== undefined) {
    console.error(error.stack);
  }
  process.exit(1);
}

// Parse command (default)
program
  .name('bankstmt')
  .description('Identify the bank behind statement PDFs and export their transactions as normalized records')
  .version(TOOLKIT_VERSION)
  .argument('[pdf-file]', 'Path to a statement PDF')
  .option('-d, --inputDir <directory>', 'Directory containing multiple PDF files to process', process.env['BANKSTMT_INPUT_DIR'])
  .option('-r, --recursive', 'Also scan subdirectories of --inputDir', envBool('BANKSTMT_RECURSIVE', false))
  .option(
    '-j, --concurrency <n>',
    'Number of PDFs processed at the same time',
    process.env['BANKSTMT_CONCURRENCY'] ?? String(availableParallelism())
  )
  .option('-o, --out <file>', 'Output file path, or directory with --split-accounts (default: stdout)', process.env['BANKSTMT_OUTPUT_FILE'])
  .option('-v, --verbose', 'Enable verbose output', envBool('BANKSTMT_VERBOSE', false))
  .option('-s, --strict', 'Validate records against the output schema before writing', envBool('BANKSTMT_STRICT', false))
  .option('--pretty', 'Pretty-print JSON output', envBool('BANKSTMT_PRETTY', true))
  .option('--no-pretty', 'Disable pretty-printing')
  .option(
    '-f, --format <format>',
    `Output format (${AVAILABLE_FORMATS.join(', ')})`,
    process.env['BANKSTMT_FORMAT'] ?? 'json'
  )
  .option(
    '--split-accounts',
    'Write one CSV per account type (only with --format csv)',
    envBool('BANKSTMT_SPLIT_ACCOUNTS', false)
  )
  .option('-m, --mapping <file>', 'JSON file of bank keywords checked before the built-in table')
  .option('-b, --bank <name>', 'Skip identification and parse every file as this bank')
  .option('--strict-match', `Only accept fuzzy bank matches scoring above ${FUZZY_SCORE_THRESHOLD}`, envBool('BANKSTMT_STRICT_MATCH', false))
  .option('--min-fuzzy-score <score>', 'Fuzzy bank matches must score above this (0-100)')
  .option('--no-save-config', 'Do not remember the input directory and output file')
  .action(async (pdfFile: string | undefined, options: ParseOptions) => {
    try {
      await runParse(pdfFile, options);
    } catch (error) {
      reportFailure(error, options.verbose);
    }
  });

// Detect subcommand
program
  .command('detect')
  .description('Identify the issuing bank of one or more statement PDFs')
  .argument('<pdf-files...>', 'Statement PDFs to identify')
  .option('-m, --mapping <file>', 'JSON file of bank keywords checked before the built-in table')
  .option('--strict-match', `Only accept fuzzy bank matches scoring above ${FUZZY_SCORE_THRESHOLD}`, envBool('BANKSTMT_STRICT_MATCH', false))
  .option('--min-fuzzy-score <score>', 'Fuzzy bank matches must score above this (0-100)')
  .option('-v, --verbose', 'Enable verbose output', envBool('BANKSTMT_VERBOSE', false))
  .action(async (pdfFiles: string[], options: DetectOptions) => {
    try {
      await runDetect(pdfFiles, options);
    } catch (error) {
      reportFailure(error, options.verbose);
    }
  });

// Banks subcommand
program
  .command('banks')
  .description('List the banks the built-in keyword table and the parser registry know')
  .action(() => {
    const registry = createDefaultRegistry();
    const parsers = new Set(registry.banks());
    for (const entry of loadDefaultKeywordMapping()) {
      const parser = parsers.has(entry.bank) ? 'dedicated parser' : 'generic parser';
      console.log(`${entry.bank}\t${parser}\t${entry.keywords.join(', ')}`);
    }
  });

async function resolveFiles(
  pdfFile: string | undefined,
  options: ParseOptions,
  config: CliConfig
): Promise<{ files: BatchFile[]; inputDir?: string }> {
  if (pdfFile !== undefined) {
    const filePath = resolve(pdfFile);
    return { files: [{ filePath, fileName: basename(filePath) }] };
  }

  const inputDir = options.inputDir ?? config.lastInputDir;
  if (inputDir === undefined) {
    throw new Error('Either a PDF file or --inputDir must be specified');
  }
  if (options.inputDir === undefined) {
    console.error(`[INFO] Using last input directory: ${inputDir}`);
  }

  const dirPath = resolve(inputDir);
  const validation = await validateDirectory(dirPath);
  if (!validation.valid) {
    throw new Error(validation.error);
  }

  const scanResult = await scanDirectoryForPdfs(dirPath, { recursive: options.recursive });
  if (scanResult.files.length === 0) {
    for (const skip of scanResult.skipped) {
      console.error(`  - ${skip.fileName}: ${skip.reason}`);
    }
    throw new Error('No PDF files found in directory');
  }

  if (options.verbose) {
    console.error(`[INFO] Found ${scanResult.files.length} PDF file(s)`);
    if (scanResult.skipped.length > 0) {
      console.error(`[INFO] Skipped ${scanResult.skipped.length} file(s)`);
    }
  }
  return { files: scanResult.files, inputDir: dirPath };
}

async function writeOutput(
  records: CanonicalTransactionRecord[],
  format: OutputFormat,
  options: ParseOptions
): Promise<string | undefined> {
  if (format === 'csv' && options.splitAccounts) {
    const groups = exportCsvByGroup(records, ACCOUNT_TYPE_FIELD, { bom: true });
    const outDir = options.out !== undefined ? resolve(options.out) : process.cwd();
    await mkdir(outDir, { recursive: true });

    if (options.verbose) {
      console.error(`[INFO] Splitting CSV into ${groups.length} account file(s)`);
    }
    for (const group of groups) {
      const filePath = resolve(outDir, group.filename);
      await writeFile(filePath, group.content, 'utf-8');
      console.error(`[INFO] Written: ${filePath} (${group.group}, ${group.recordCount} record(s))`);
    }
    return undefined;
  }

  if (format === 'xlsx') {
    if (options.out === undefined) {
      throw new Error('--format xlsx writes a binary file and needs --out');
    }
    const outPath = resolve(options.out);
    await mkdir(dirname(outPath), { recursive: true });
    await writeFile(outPath, exportXlsx(records));
    console.error(`[INFO] Output written to: ${outPath} (one sheet per account type)`);
    return outPath;
  }

  const toFile = options.out !== undefined;
  const content =
    format === 'csv' ? exportCsv(records, { bom: toFile }) : exportJson(records, options.pretty);

  if (options.out === undefined) {
    console.log(content);
    return undefined;
  }

  const outPath = resolve(options.out);
  await mkdir(dirname(outPath), { recursive: true });
  await writeFile(outPath, content, 'utf-8');
  console.error(`[INFO] Output written to: ${outPath}`);
  return outPath;
}

async function runParse(pdfFile: string | undefined, options: ParseOptions): Promise<void> {
  const format = options.format.toLowerCase();
  if (!isOutputFormat(format)) {
    throw new Error(`Unknown format "${options.format}". Expected one of: ${AVAILABLE_FORMATS.join(', ')}`);
  }
  if (format === 'xlsx' && options.out === undefined) {
    throw new Error('--format xlsx writes a binary file and needs --out');
  }
  if (options.splitAccounts && format !== 'csv') {
    console.error('[WARN] --split-accounts only applies to --format csv; writing a single file');
  }

  const configPath = resolveConfigPath();
  const config = await loadConfig(configPath, logger);
  const bankMapping = await resolveBankMapping({ mappingFile: options.mapping, config });
  const { files, inputDir } = await resolveFiles(pdfFile, options, config);

  if (options.verbose) {
    console.error(`[INFO] Toolkit version: ${TOOLKIT_VERSION}`);
    console.error(`[INFO] Config file: ${configPath}`);
    console.error(`[INFO] User bank mapping: ${bankMapping !== undefined ? `${bankMapping.size} bank(s)` : 'none'}`);
    console.error(`[INFO] Output format: ${format}`);
    console.error(`[INFO] Concurrency: ${options.concurrency}`);
  }

  const minFuzzyScore = fuzzyScore(options);
  const result = await processBatch(files, {
    concurrency: parseConcurrency(options.concurrency),
    bank: options.bank,
    bankMapping,
    identifier: new BankIdentifier({ minFuzzyScore, logger: logger.child('bank-identifier') }),
    logger,
    onProgress: (current, total, filename) => {
      console.error(`[INFO] Parsing ${current}/${total}: ${filename}`);
    },
    onError: (error: ParseError) => {
      console.error(`[ERROR] Failed to parse ${error.filename}: ${error.error}`);
    },
  });

  if (files.length > 1 || options.verbose) {
    console.error('');
    console.error('=== Batch Processing Summary ===');
    console.error(`Total PDFs found:       ${result.summary.totalPdfsFound}`);
    console.error(`PDFs succeeded:         ${result.summary.pdfsSucceeded}`);
    console.error(`PDFs failed:            ${result.summary.pdfsFailed}`);
    console.error(`Unknown bank:           ${result.summary.unknownBank}`);
    console.error(`Records:                ${result.summary.totalRecords}`);
    console.error('================================');
  }

  // Exit with error if ALL PDFs failed
  if (result.summary.pdfsSucceeded === 0) {
    process.exit(1);
  }

  if (options.strict) {
    const validation = validateOutput(result.records);
    if (!validation.valid) {
      for (const line of formatValidationErrors(validation.errors).slice(0, 10)) {
        console.error(`[ERROR] ${line}`);
      }
      throw new Error('Records failed schema validation');
    }
  }

  const outPath = await writeOutput(result.records, format, options);

  if (options.saveConfig) {
    const next: CliConfig = {
      ...config,
      ...(inputDir !== undefined ? { lastInputDir: inputDir } : {}),
      ...(outPath !== undefined ? { lastOutputFile: outPath } : {}),
    };
    try {
      await saveConfig(configPath, next);
    } catch (error) {
      logger.warn('Could not save config file', {
        path: configPath,
        reason: error instanceof Error ? error.message : String(error),
      });
    }
  }
}

function describeIdentification(result: BankIdentification): string {
  switch (result.status) {
    case 'matched':
      return result.score !== null
        ? `${result.source} "${result.keyword}" (score ${result.score})`
        : `${result.source} "${result.keyword}"`;
    case 'no-match':
      return 'no keyword matched';
    case 'extraction-failed':
      return `text extraction failed: ${result.failure.message}`;
  }
}

async function runDetect(pdfFiles: string[], options: DetectOptions): Promise<void> {
  const config = await loadConfig(resolveConfigPath(), logger);
  const bankMapping = await resolveBankMapping({ mappingFile: options.mapping, config });
  const identifier = new BankIdentifier({
    minFuzzyScore: fuzzyScore(options),
    logger: logger.child('bank-identifier'),
  });

  for (const pdfFile of pdfFiles) {
    const filePath = resolve(pdfFile);
    const result = await identifier.identify(filePath, bankMapping);
    console.log(`${basename(filePath)}\t${result.bank}`);
    if (options.verbose) {
      console.error(`[INFO] ${basename(filePath)}: ${describeIdentification(result)}`);
    }
  }
}

await program.parseAsync();
