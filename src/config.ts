import { z } from 'zod';

export class ConfigError extends Error {
  constructor(message: string) {
    super(message);
    this.name = 'ConfigError';
  }
}

const optionalString = z
  .string()
  .optional()
  .transform((value) => (value && value.trim().length ? value.trim() : undefined));

const EnvSchema = z.object({
  NODE_ENV: z.string().default('development'),
  PORT: z.coerce.number().int().min(1).max(65_535).default(8080),
  DATABASE_URL: optionalString,
  LEAGUE_DATA_DIR: z.string().min(1).default('data'),
  SCHEDULE_FILE: z.string().min(1).default('data/tournaments.txt'),
  RESULTS_BASE_URL: z.string().url().default('https://www.pdga.com'),
  RESULTS_DIVISION: z.string().min(1).default('MPO'),
  UPDATE_DAYS_BACK: z.coerce.number().int().min(1).default(14),
  REQUEST_DELAY_MS: z.coerce.number().int().min(0).default(3_000),
  HTTP_TIMEOUT_MS: z.coerce.number().int().min(1).default(15_000),
  HTTP_RETRIES: z.coerce.number().int().min(1).max(10).default(3),
  AUTH_DISABLE: optionalString,
  AUTH_SHARED_SECRET: optionalString,
  AUTH_AUDIENCE: optionalString,
  AUTH_ISSUER: optionalString,
});

export interface AppConfig {
  env: string;
  port: number;
  databaseUrl?: string;
  dataDir: string;
  scheduleFile: string;
  results: {
    baseUrl: string;
    division: string;
    timeoutMs: number;
    retries: number;
  };
  update: {
    daysBack: number;
    requestDelayMs: number;
  };
  auth: {
    disabled: boolean;
    sharedSecret?: string;
    audience?: string;
    issuer?: string;
  };
}

export const loadConfig = (env: NodeJS.ProcessEnv = process.env): AppConfig => {
  const parsed = EnvSchema.safeParse(env);
  if (!parsed.success) {
    const details = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`).join('; ');
    throw new ConfigError(`invalid configuration: ${details}`);
  }

  const values = parsed.data;
  return {
    env: values.NODE_ENV,
    port: values.PORT,
    databaseUrl: values.DATABASE_URL,
    dataDir: values.LEAGUE_DATA_DIR,
    scheduleFile: values.SCHEDULE_FILE,
    results: {
      baseUrl: values.RESULTS_BASE_URL,
      division: values.RESULTS_DIVISION,
      timeoutMs: values.HTTP_TIMEOUT_MS,
      retries: values.HTTP_RETRIES,
    },
    update: {
      daysBack: values.UPDATE_DAYS_BACK,
      requestDelayMs: values.REQUEST_DELAY_MS,
    },
    auth: {
      disabled: values.AUTH_DISABLE === '1' || !values.AUTH_SHARED_SECRET,
      sharedSecret: values.AUTH_SHARED_SECRET,
      audience: values.AUTH_AUDIENCE,
      issuer: values.AUTH_ISSUER,
    },
  };
};
