import { z } from 'zod';
import type { FetchLike } from './http.js';
import type { ProviderSecrets } from './providers/types.js';

const booleanFlag = z
  .string()
  .optional()
  .transform((value) => ['1', 'true', 'yes', 'on'].includes((value ?? '').trim().toLowerCase()));

const optionalSecret = z
  .string()
  .optional()
  .transform((value) => {
    const trimmed = value?.trim();
    return trimmed ? trimmed : undefined;
  });

const EnvSchema = z.object({
  PORT: z.coerce.number().int().positive().default(8000),
  STORE_BACKEND: z.enum(['sheets', 'memory']).default('sheets'),
  SHEET_URL: optionalSecret,
  SHEET_ID: optionalSecret,
  GOOGLE_CLIENT_ID: optionalSecret,
  GOOGLE_CLIENT_SECRET: optionalSecret,
  GOOGLE_REFRESH_TOKEN: optionalSecret,
  PERPLEXITY_API_KEY: optionalSecret,
  PERPLEXITY_BASE_URL: z.string().url().default('https://api.perplexity.ai'),
  SAM_API_KEY: optionalSecret,
  CONTRACTS_FINDER_API_KEY: optionalSecret,
  FETCH_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  TIMEZONE: z.string().default('America/Sao_Paulo'),
  RESOLVE_REDIRECTS: booleanFlag,
});

export type AppEnv = z.infer<typeof EnvSchema>;

export interface GoogleCredentials {
  clientId: string;
  clientSecret: string;
  refreshToken: string;
}

export function loadEnv(source: NodeJS.ProcessEnv = process.env): AppEnv {
  return EnvSchema.parse(source);
}

/**
 * Accepts either a bare spreadsheet id or the browser URL of the sheet.
 */
export function resolveSheetId(env: AppEnv): string {
  if (env.SHEET_ID) return env.SHEET_ID;
  if (!env.SHEET_URL) {
    throw new Error('SHEET_URL is not set. Fill it in the .env file at the project root.');
  }
  const match = env.SHEET_URL.match(/\/spreadsheets\/d\/([a-zA-Z0-9-_]+)/);
  if (!match?.[1]) {
    throw new Error(`Could not find a spreadsheet id in SHEET_URL: ${env.SHEET_URL}`);
  }
  return match[1];
}

export function requireGoogleCredentials(env: AppEnv): GoogleCredentials {
  const missing: string[] = [];
  if (!env.GOOGLE_CLIENT_ID) missing.push('GOOGLE_CLIENT_ID');
  if (!env.GOOGLE_CLIENT_SECRET) missing.push('GOOGLE_CLIENT_SECRET');
  if (!env.GOOGLE_REFRESH_TOKEN) missing.push('GOOGLE_REFRESH_TOKEN');

  if (!env.GOOGLE_CLIENT_ID || !env.GOOGLE_CLIENT_SECRET || !env.GOOGLE_REFRESH_TOKEN) {
    throw new Error(`Missing Google OAuth environment variables: ${missing.join(', ')}`);
  }

  return {
    clientId: env.GOOGLE_CLIENT_ID,
    clientSecret: env.GOOGLE_CLIENT_SECRET,
    refreshToken: env.GOOGLE_REFRESH_TOKEN,
  };
}

/**
 * What the collector, diagnostics and link repair need from the environment.
 * Tests build one directly with a stubbed `fetchImpl` and clock.
 */
export interface RuntimeOptions {
  timeZone: string;
  fetchTimeoutMs: number;
  resolveRedirects: boolean;
  secrets: ProviderSecrets;
  fetchImpl?: FetchLike;
  now: () => Date;
}

export function runtimeFromEnv(env: AppEnv): RuntimeOptions {
  return {
    timeZone: env.TIMEZONE,
    fetchTimeoutMs: env.FETCH_TIMEOUT_MS,
    resolveRedirects: env.RESOLVE_REDIRECTS,
    secrets: {
      samApiKey: env.SAM_API_KEY,
      contractsFinderApiKey: env.CONTRACTS_FINDER_API_KEY,
    },
    now: () => new Date(),
  };
}

// Keys stored in the `config` sheet
export const CONFIG_KEYS = {
  minDays: 'MIN_DAYS',
  usdBrl: 'USD_BRL',
  minDaysPreset: 'MIN_DAYS_PRESET',
  grantsStatus: 'GRANTS_STATUS',
} as const;

export const DEFAULT_MIN_DAYS = 21;
export const DEFAULT_USD_BRL = 5.2;

export const STATUS_CHOICES = ['pendente', 'verificando', 'submetido', 'não submetido'] as const;
export const DEFAULT_STATUS = 'pendente';

const STATUS_SET: ReadonlySet<string> = new Set(STATUS_CHOICES);

export const STATUS_BG: Record<string, string> = {
  pendente: '#111111',
  verificando: '#001a66',
  submetido: '#0b3d1b',
  'não submetido': '#4a0b0f',
};

export const STATUS_COLORS: Record<string, string> = {
  pendente: '#FFD166',
  verificando: '#118AB2',
  submetido: '#06D6A0',
  'não submetido': '#EF476F',
};

export function normalizeStatus(value: string | undefined | null): string {
  const trimmed = (value ?? '').trim();
  return STATUS_SET.has(trimmed) ? trimmed : DEFAULT_STATUS;
}

/**
 * Reads a positive integer setting, falling back when the stored value is
 * blank or malformed.
 */
export function parseMinDays(
  value: string | number | undefined | null,
  fallback = DEFAULT_MIN_DAYS,
): number {
  if (typeof value === 'number') {
    return Number.isInteger(value) && value >= 0 ? value : fallback;
  }
  const trimmed = (value ?? '').trim();
  if (!/^\d+$/.test(trimmed)) return fallback;
  return parseInt(trimmed, 10);
}

export function parseRate(value: string | undefined | null, fallback = DEFAULT_USD_BRL): number {
  const parsed = Number.parseFloat((value ?? '').replace(',', '.'));
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}
