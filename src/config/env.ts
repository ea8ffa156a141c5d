import { z } from 'zod';

const emptyToUndefined = (value: unknown) =>
  typeof value === 'string' && value.trim() === '' ? undefined : value;

const OptionalString = z.preprocess(emptyToUndefined, z.string().optional());

const Flag = z
  .string()
  .default('false')
  .transform((v) => v.toLowerCase() === 'true');

export const EnvSchema = z
  .object({
    HOST: z.string().default('127.0.0.1'),
    PORT: z.coerce.number().int().min(1).max(65535).default(3000),
    MCP_TITLE: z.string().default('Agent Tools'),
    MCP_INSTRUCTIONS: OptionalString,
    MCP_VERSION: z.string().default('0.1.0'),
    // Comma-separated browser origins; empty means loopback only
    ALLOWED_ORIGINS: z
      .string()
      .default('')
      .transform((v) =>
        v
          .split(',')
          .map((o) => o.trim())
          .filter((o) => o.length > 0),
      ),
    // Also echo structured JSON as a second text part (debugging clients without structuredContent)
    TOOLS_INCLUDE_JSON_IN_CONTENT: Flag,

    HTTP_TIMEOUT_MS: z.coerce.number().int().positive().default(20_000),
    HTTP_RETRIES: z.coerce.number().int().min(1).max(5).default(1),

    GOOGLE_ACCESS_TOKEN: OptionalString,
    GOOGLE_REFRESH_TOKEN: OptionalString,
    GOOGLE_CLIENT_ID: OptionalString,
    GOOGLE_CLIENT_SECRET: OptionalString,
    GOOGLE_TOKEN_URL: z.string().url().default('https://oauth2.googleapis.com/token'),
    GMAIL_API_URL: z
      .string()
      .url()
      .default('https://gmail.googleapis.com/gmail/v1/users/me/'),
    CALENDAR_API_URL: z
      .string()
      .url()
      .default('https://www.googleapis.com/calendar/v3/'),
    CALENDAR_DEFAULT_TIMEZONE: z.string().default('UTC'),

    SPOTIFY_CLIENT_ID: OptionalString,
    SPOTIFY_CLIENT_SECRET: OptionalString,
    SPOTIFY_ACCESS_TOKEN: OptionalString,
    SPOTIFY_REFRESH_TOKEN: OptionalString,
    SPOTIFY_ACCOUNTS_URL: z.string().url().default('https://accounts.spotify.com'),
    SPOTIFY_SEARCH_LIMIT: z.coerce.number().int().min(1).max(50).default(20),
    SPOTIFY_LAUNCH_DELAY_MS: z.coerce.number().int().min(0).default(5000),
    // Overrides the per-platform command used to start the desktop client
    SPOTIFY_DESKTOP_COMMAND: OptionalString,

    WEATHER_API_KEY: OptionalString,
    WEATHER_API_URL: z.string().url().default('https://api.weatherapi.com/v1/'),
    IPINFO_URL: z.string().url().default('https://ipinfo.io/'),
    IPINFO_TOKEN: OptionalString,

    LOG_LEVEL: z.enum(['debug', 'info', 'warning', 'error']).default('info'),
    NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),
  })
  .passthrough();

export type Config = z.infer<typeof EnvSchema>;

export function parseConfig(env: Record<string, unknown>): Config {
  return Object.freeze(EnvSchema.parse(env));
}

export const config = parseConfig(process.env);
