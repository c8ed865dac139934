import dotenv from 'dotenv';
import { z } from 'zod';

dotenv.config();

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length > 0 ? value.trim() : undefined));

const EnvSchema = z.object({
  ENVIRONMENT: z
    .string()
    .default('PRODUCTION')
    .transform((value) => value.toUpperCase())
    .pipe(z.enum(['PRODUCTION', 'DEBUG'])),
  PORT: z.coerce.number().int().positive().default(3000),
  LOG_LEVEL: z.enum(['trace', 'debug', 'info', 'warn', 'error', 'fatal']).default('info'),
  DEFAULT_TIMEZONE: z.string().default('UTC'),

  WHATSAPP_API_TOKEN: optionalString,
  WHATSAPP_PHONE_NUMBER_ID: optionalString,
  WHATSAPP_WEBHOOK_VERIFY_TOKEN: optionalString,

  GOOGLE_CLIENT_ID: optionalString,
  GOOGLE_CLIENT_SECRET: optionalString,
  GOOGLE_REFRESH_TOKEN: optionalString,
  GOOGLE_CALENDAR_ID: z.string().default('primary'),
  OAUTH_REDIRECT_URL: z.string().default('http://localhost:3000/oauth/callback'),

  OPENAI_API_KEY: optionalString,
  OPENAI_MODEL: z.string().default('gpt-4o-mini'),
  OPENAI_EMBEDDING_MODEL: z.string().default('text-embedding-3-small'),

  DB_HOST: optionalString,
  DB_PORT: z.coerce.number().int().positive().default(5432),
  DB_NAME: optionalString,
  DB_USER: optionalString,
  DB_PASSWORD: optionalString,

  COLLABORATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(10000),
  CONVERSATION_TTL_MINUTES: z.coerce.number().positive().default(30),
  DEFAULT_MEETING_MINUTES: z.coerce.number().int().positive().default(30)
});

export type Env = z.infer<typeof EnvSchema>;

export function loadEnvironment(source: NodeJS.ProcessEnv = process.env): Env {
  const parsed = EnvSchema.safeParse(source);
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new Error(`Invalid environment configuration: ${details}`);
  }
  return parsed.data;
}

export const env: Env = loadEnvironment();
