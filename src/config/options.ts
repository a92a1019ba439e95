import { z } from 'zod';
import { ConfigError } from '../lister/errors.js';

export const LOG_LEVELS = ['error', 'warn', 'info', 'verbose', 'debug', 'silly'] as const;

export const ListerConfig = z.object({
  token: z.string({
    required_error: 'Access token is required: pass --token or set SMARTSHEET_ACCESS_TOKEN',
  }),
  sheetId: z
    .string({
      required_error: 'Sheet id is required: pass --sheet-id or set SMARTSHEET_SHEET_ID',
    })
    .regex(/^\d+$/, 'Sheet id must contain only digits (--sheet-id / SMARTSHEET_SHEET_ID)')
    .refine(
      (id) => !/^\d+$/.test(id) || Number.isSafeInteger(Number(id)),
      'Sheet id is too large (--sheet-id / SMARTSHEET_SHEET_ID)'
    ),
  baseUrl: z
    .string()
    .url('Base URL must be an absolute URL (--base-url / SMARTSHEET_BASE_URL)')
    .transform((url) => (url.endsWith('/') ? url : `${url}/`))
    .optional(),
  logLevel: z
    .enum(LOG_LEVELS, {
      errorMap: () => ({
        message: `Log level must be one of ${LOG_LEVELS.join(', ')} (--log-level / SMARTSHEET_LOG_LEVEL)`,
      }),
    })
    .optional(),
});

export type ListerConfig = z.infer<typeof ListerConfig>;

/** Raw option values as commander hands them over. */
export type ConfigFlags = {
  token?: string;
  sheetId?: string;
  baseUrl?: string;
  logLevel?: string;
};

// Blank values count as unset, so an empty flag falls through to the environment.
function pick(...values: (string | undefined)[]): string | undefined {
  for (const value of values) {
    const trimmed = value?.trim();
    if (trimmed) {
      return trimmed;
    }
  }
  return undefined;
}

/**
 * Resolve the run configuration. Flags win over environment variables;
 * `.env` values reach us through the environment (dotenv never overrides
 * variables that are already set).
 */
export function resolveConfig(
  flags: ConfigFlags,
  env: NodeJS.ProcessEnv = process.env
): ListerConfig {
  const result = ListerConfig.safeParse({
    token: pick(flags.token, env.SMARTSHEET_ACCESS_TOKEN),
    sheetId: pick(flags.sheetId, env.SMARTSHEET_SHEET_ID),
    baseUrl: pick(flags.baseUrl, env.SMARTSHEET_BASE_URL),
    logLevel: pick(flags.logLevel, env.SMARTSHEET_LOG_LEVEL),
  });

  if (!result.success) {
    throw new ConfigError(result.error.issues.map((issue) => issue.message).join('; '));
  }

  return result.data;
}
