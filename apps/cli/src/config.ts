/**
 * Persistent CLI settings.
 *
 * A small JSON file remembers the user's bank keyword mapping and the last
 * input directory and output file. A missing or unreadable file means
 * defaults; it never stops a run.
 */
import { mkdir, readFile, writeFile } from 'fs/promises';
import { homedir } from 'os';
import { dirname, join } from 'path';
import { z } from 'zod';
import { KeywordMapping, loadKeywordMappingFile } from '@bankstmt/bank-identifier';
import { KeywordMappingError, KeywordMappingInputSchema, describeError, silentLogger } from '@bankstmt/types';
import type { Logger } from '@bankstmt/types';

export const CONFIG_PATH_ENV = 'BANKSTMT_CONFIG';
export const BANK_MAPPING_ENV = 'BANKSTMT_BANK_MAPPING';

export const CliConfigSchema = z.object({
  bankMapping: KeywordMappingInputSchema.optional(),
  lastInputDir: z.string().optional(),
  lastOutputFile: z.string().optional(),
});
export type CliConfig = z.infer<typeof CliConfigSchema>;

type Env = Record<string, string | undefined>;

export function resolveConfigPath(env: Env = process.env): string {
  const override = env[CONFIG_PATH_ENV];
  if (override !== undefined && override !== '') {
    return override;
  }
  return join(homedir(), '.bankstmt', 'config.json');
}

function isMissingFile(error: unknown): boolean {
  return typeof error === 'object' && error !== null && 'code' in error && error.code === 'ENOENT';
}

export async function loadConfig(configPath: string, logger: Logger = silentLogger): Promise<CliConfig> {
  let text: string;
  try {
    text = await readFile(configPath, 'utf-8');
  } catch (error) {
    if (!isMissingFile(error)) {
      logger.warn('Cannot read config file, using defaults', { path: configPath, reason: describeError(error) });
    }
    return {};
  }

  let data: unknown;
  try {
    data = JSON.parse(text);
  } catch (error) {
    logger.warn('Config file is not valid JSON, using defaults', { path: configPath, reason: describeError(error) });
    return {};
  }

  const parsed = CliConfigSchema.safeParse(data);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.') || '(root)'}: ${issue.message}`);
    logger.warn('Config file has invalid settings, using defaults', { path: configPath, issues });
    return {};
  }
  return parsed.data;
}

export async function saveConfig(configPath: string, config: CliConfig): Promise<void> {
  await mkdir(dirname(configPath), { recursive: true });
  await writeFile(configPath, `${JSON.stringify(config, null, 2)}\n`, 'utf-8');
}

export interface MappingSources {
  /** --mapping <file> */
  mappingFile?: string | undefined;
  env?: Env;
  config?: CliConfig;
}

/**
 * Pick the user keyword mapping: `--mapping` file first, then
 * BANKSTMT_BANK_MAPPING (inline JSON, or a path to a JSON file), then the
 * config file. Returns undefined when none is set.
 */
export async function resolveBankMapping(sources: MappingSources): Promise<KeywordMapping | undefined> {
  if (sources.mappingFile !== undefined && sources.mappingFile !== '') {
    return loadKeywordMappingFile(sources.mappingFile);
  }

  const fromEnv = (sources.env ?? process.env)[BANK_MAPPING_ENV]?.trim();
  if (fromEnv !== undefined && fromEnv !== '') {
    if (fromEnv.startsWith('{') || fromEnv.startsWith('[')) {
      let inline: unknown;
      try {
        inline = JSON.parse(fromEnv);
      } catch (error) {
        throw new KeywordMappingError([`${BANK_MAPPING_ENV}: ${describeError(error)}`]);
      }
      return KeywordMapping.from(inline);
    }
    return loadKeywordMappingFile(fromEnv);
  }

  if (sources.config?.bankMapping !== undefined) {
    return KeywordMapping.from(sources.config.bankMapping);
  }
  return undefined;
}
