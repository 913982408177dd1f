import { z } from 'zod';

import { logWarn } from '../observability/logger';

const numberFromEnv = (fallback: number, options: { positive?: boolean } = {}) =>
  z
    .string()
    .trim()
    .optional()
    .transform((value, ctx) => {
      if (value === undefined || value === '') return fallback;
      const n = Number(value);
      if (!Number.isFinite(n) || n < 0 || (options.positive && n === 0)) {
        const expected = options.positive ? 'a positive number' : 'a non-negative number';
        ctx.addIssue({ code: z.ZodIssueCode.custom, message: `expected ${expected}, got "${value}"` });
        return z.NEVER;
      }
      return n;
    });

const envSchema = z.object({
  APP_ID: z.string().default(''),
  APP_SECRET: z.string().default(''),
  GOOGLE_API_KEY: z.string().default(''),
  ASTRONOMY_API_URL: z.string().url().default('https://api.astronomyapi.com/api/v2'),
  GOOGLE_MAPS_API_URL: z.string().url().default('https://maps.googleapis.com/maps/api'),
  ASTRONOMY_TIMEOUT_MS: numberFromEnv(120_000),
  GOOGLE_TIMEOUT_MS: numberFromEnv(0),
  // 0 désactiverait l'expiration : la map des sessions grossirait sans fin.
  SESSION_TTL_MS: numberFromEnv(30 * 60 * 1000, { positive: true }),
  PORT: numberFromEnv(3000),
  CLIENT_DIST: z.string().optional()
});

export interface AstronomyConfig {
  readonly baseUrl: string;
  readonly authorization: string;
  readonly timeoutMs: number;
}

export interface GoogleConfig {
  readonly baseUrl: string;
  readonly apiKey: string;
  readonly timeoutMs: number;
}

export interface AppConfig {
  readonly astronomy: AstronomyConfig;
  readonly google: GoogleConfig;
  readonly sessionTtlMs: number;
  readonly port: number;
  readonly clientDist?: string;
}

export function basicAuthorization(appId: string, appSecret: string): string {
  return `Basic ${Buffer.from(`${appId}:${appSecret}`).toString('base64')}`;
}

/**
 * Construit la configuration une seule fois au démarrage.
 * L'en-tête Basic est dérivé ici et n'est plus recalculé ensuite.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.parse(env);

  const missing = (['APP_ID', 'APP_SECRET', 'GOOGLE_API_KEY'] as const).filter((key) => !parsed[key]);
  if (missing.length) {
    logWarn('config_credentials_missing', { missing });
  }

  return Object.freeze({
    astronomy: Object.freeze({
      baseUrl: parsed.ASTRONOMY_API_URL,
      authorization: basicAuthorization(parsed.APP_ID, parsed.APP_SECRET),
      timeoutMs: parsed.ASTRONOMY_TIMEOUT_MS
    }),
    google: Object.freeze({
      baseUrl: parsed.GOOGLE_MAPS_API_URL,
      apiKey: parsed.GOOGLE_API_KEY,
      timeoutMs: parsed.GOOGLE_TIMEOUT_MS
    }),
    sessionTtlMs: parsed.SESSION_TTL_MS,
    port: parsed.PORT,
    clientDist: parsed.CLIENT_DIST
  });
}
