import { z } from 'zod';
import { ValidationError } from '../../domain/errors/AepError.js';

export const DEFAULT_API_BASE_URL = 'https://platform.adobe.io';
export const DEFAULT_IMS_TOKEN_URL = 'https://ims-na1.adobelogin.com/ims/token/v3';
export const DEFAULT_IMS_SCOPES = 'openid,AdobeID,read_organizations,additional_info.projectedProductContext';

const intFromEnv = (fallback: number, min: number) => z.coerce.number().int().min(min).default(fallback);

const EnvSchema = z.object({
    AEP_CLIENT_ID: z.string().min(1, 'is required'),
    AEP_CLIENT_SECRET: z.string().min(1).optional(),
    AEP_ORG_ID: z.string().min(1, 'is required'),
    AEP_SANDBOX_NAME: z.string().min(1).default('prod'),
    AEP_ACCESS_TOKEN: z.string().min(1).optional(),
    AEP_API_BASE_URL: z.string().url().default(DEFAULT_API_BASE_URL),
    AEP_IMS_TOKEN_URL: z.string().url().default(DEFAULT_IMS_TOKEN_URL),
    AEP_IMS_SCOPES: z.string().min(1).default(DEFAULT_IMS_SCOPES),
    AEP_MAX_ATTEMPTS: intFromEnv(5, 1),
    AEP_RETRY_DELAY_MS: intFromEnv(1000, 0),
    AEP_TIMEOUT_MS: intFromEnv(30000, 1),
    LOG_LEVEL: z.enum(['error', 'warn', 'info', 'http', 'verbose', 'debug', 'silly']).default('info'),
});

// Checked apart from EnvSchema: zod skips object refinements once a field has failed.
const CredentialsSchema = z
  .object({ AEP_ACCESS_TOKEN: z.unknown(), AEP_CLIENT_SECRET: z.unknown() })
  .refine((env) => isSet(env.AEP_ACCESS_TOKEN) || isSet(env.AEP_CLIENT_SECRET), {
    message: 'either AEP_ACCESS_TOKEN or AEP_CLIENT_SECRET must be set',
    path: ['AEP_CLIENT_SECRET'],
  });

function isSet(value: unknown): boolean {
  return typeof value === 'string' && value.length > 0;
}

/** Connection, credential and retry settings for one AEP sandbox. */
export interface AepConfig {
  readonly clientId: string;
  readonly clientSecret?: string;
  readonly orgId: string;
  readonly sandboxName: string;
  /** Pre-issued token. When set, no IMS exchange happens. */
  readonly accessToken?: string;
  readonly apiBaseUrl: string;
  readonly imsTokenUrl: string;
  readonly imsScopes: string;
  /** Requests per call, the first one included. */
  readonly maxAttempts: number;
  readonly retryDelayMs: number;
  readonly timeoutMs: number;
  readonly logLevel: string;
}

/**
 * Read configuration from environment variables.
 *
 * @throws ValidationError listing every missing or malformed variable.
 */
export function loadConfig(env: Readonly<Record<string, string | undefined>> = process.env): AepConfig {
  const parsed = EnvSchema.safeParse(env);
  const credentials = CredentialsSchema.safeParse(env);

  const issues = [...(parsed.success ? [] : parsed.error.issues), ...(credentials.success ? [] : credentials.error.issues)];
  if (!parsed.success || issues.length > 0) {
    const problems = issues.map((issue) => `${issue.path.join('.')} ${issue.message}`);
    throw new ValidationError(`Invalid configuration: ${problems.join('; ')}`);
  }

  const e = parsed.data;
  return Object.freeze({
    clientId: e.AEP_CLIENT_ID,
    clientSecret: e.AEP_CLIENT_SECRET,
    orgId: e.AEP_ORG_ID,
    sandboxName: e.AEP_SANDBOX_NAME,
    accessToken: e.AEP_ACCESS_TOKEN,
    apiBaseUrl: e.AEP_API_BASE_URL.replace(/\/+$/, ''),
    imsTokenUrl: e.AEP_IMS_TOKEN_URL,
    imsScopes: e.AEP_IMS_SCOPES,
    maxAttempts: e.AEP_MAX_ATTEMPTS,
    retryDelayMs: e.AEP_RETRY_DELAY_MS,
    timeoutMs: e.AEP_TIMEOUT_MS,
    logLevel: e.LOG_LEVEL,
  });
}
