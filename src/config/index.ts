/**
 * Configuration management
 * Defaults come from environment variables; CLI flags override them
 */

export interface Config {
  // Input / Output
  urlsFile: string;
  outputPath: string;
  reportPath?: string;

  // HTTP Behavior
  politeDelayMs: number;
  maxRetries: number;
  retryBackoffMs: number;
  requestTimeoutMs: number;
  userAgent: string;

  // Output Shape
  dedupe: boolean;
  includeSourceColumns: boolean;
}

export const DEFAULT_USER_AGENT =
  'Mozilla/5.0 (Windows NT 10.0; Win64; x64) AppleWebKit/537.36 (KHTML, like Gecko) Chrome/120.0.0.0 Safari/537.36';

function parseBoolean(value: string | undefined, defaultValue: boolean = false): boolean {
  if (!value) return defaultValue;
  return value.toLowerCase() === 'true';
}

function parseNumber(value: string | undefined, defaultValue: number): number {
  if (!value) return defaultValue;
  const parsed = parseInt(value, 10);
  return isNaN(parsed) || parsed < 0 ? defaultValue : parsed;
}

function parseOptionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed ? trimmed : undefined;
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): Config {
  return {
    urlsFile: parseOptionalString(env.URLS_FILE) ?? 'input.txt',
    outputPath: parseOptionalString(env.OUTPUT_PATH) ?? 'company_names.csv',
    reportPath: parseOptionalString(env.REPORT_PATH),
    politeDelayMs: parseNumber(env.POLITE_DELAY_MS, 1000),
    maxRetries: parseNumber(env.MAX_RETRIES, 3),
    retryBackoffMs: parseNumber(env.RETRY_BACKOFF_MS, 700),
    requestTimeoutMs: parseNumber(env.REQUEST_TIMEOUT_MS, 25000),
    userAgent: parseOptionalString(env.USER_AGENT) ?? DEFAULT_USER_AGENT,
    dedupe: parseBoolean(env.DEDUPE, true),
    includeSourceColumns: parseBoolean(env.INCLUDE_SOURCE_COLUMNS, false),
  };
}

/**
 * Applies overrides on top of a base config, ignoring undefined values
 */
export function mergeConfig(base: Config, overrides: Partial<Config>): Config {
  const merged: Config = { ...base };
  for (const [key, value] of Object.entries(overrides)) {
    if (value !== undefined) {
      Object.assign(merged, { [key]: value });
    }
  }
  return merged;
}
