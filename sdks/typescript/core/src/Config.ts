/**
 * Environment-driven configuration shared by the client, the markdown
 * processor and the CLI.
 */

import { config as loadDotenv } from 'dotenv';
import { z } from 'zod';
import { InvalidParameterException } from './EgeriaException.js';

const ConfigSchema = z.object({
  EGERIA_PLATFORM_URL: z.string().url().default('https://localhost:9443'),
  EGERIA_VIEW_SERVER: z.string().min(1).default('view-server'),
  EGERIA_VIEW_SERVER_URL: z.string().url().default('https://localhost:9443'),
  EGERIA_USER: z.string().min(1).default('erinoverview'),
  EGERIA_USER_PASSWORD: z.string().default('secret'),
  API_KEY: z.string().min(1).optional(),
  EGERIA_ROOT_PATH: z.string().optional(),
  EGERIA_INBOX_PATH: z.string().default('md_processing/dr_egeria_inbox'),
  EGERIA_OUTBOX_PATH: z.string().default('md_processing/dr_egeria_outbox'),
  EGERIA_LOCAL_QUALIFIER: z.string().default('PDR'),
  EGERIA_WIDTH: z.coerce.number().int().positive().default(200),
  EGERIA_PAGE_SIZE: z.coerce.number().int().nonnegative().default(0),
});

/**
 * Resolved configuration.
 */
export interface EgeriaConfig {
  readonly platformUrl: string;
  readonly viewServer: string;
  readonly viewServerUrl: string;
  readonly userId: string;
  readonly userPassword: string;
  readonly apiKey?: string;
  readonly rootPath: string;
  readonly inboxPath: string;
  readonly outboxPath: string;
  readonly localQualifier: string;
  readonly width: number;
  readonly pageSize: number;
}

/**
 * Builds the configuration from environment variables.
 * Empty variables count as unset.
 * @throws InvalidParameterException when a variable has an invalid value
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): EgeriaConfig {
  const present: Record<string, string> = {};
  for (const [key, value] of Object.entries(env)) {
    if (value !== undefined && value !== '') {
      present[key] = value;
    }
  }

  const parsed = ConfigSchema.safeParse(present);
  if (!parsed.success) {
    const issues = parsed.error.issues.map((issue) => `${issue.path.join('.')}: ${issue.message}`);
    throw new InvalidParameterException(issues.join('; '), {
      context: { className: 'Config', callerMethod: 'loadConfig' },
    });
  }

  const values = parsed.data;
  return Object.freeze({
    platformUrl: values.EGERIA_PLATFORM_URL.replace(/\/$/, ''),
    viewServer: values.EGERIA_VIEW_SERVER,
    viewServerUrl: values.EGERIA_VIEW_SERVER_URL.replace(/\/$/, ''),
    userId: values.EGERIA_USER,
    userPassword: values.EGERIA_USER_PASSWORD,
    apiKey: values.API_KEY,
    rootPath: values.EGERIA_ROOT_PATH ?? process.cwd(),
    inboxPath: values.EGERIA_INBOX_PATH,
    outboxPath: values.EGERIA_OUTBOX_PATH,
    localQualifier: values.EGERIA_LOCAL_QUALIFIER,
    width: values.EGERIA_WIDTH,
    pageSize: values.EGERIA_PAGE_SIZE,
  });
}

/**
 * Loads a .env file into process.env. Existing variables win.
 */
export function loadEnvFile(path?: string): void {
  loadDotenv(path === undefined ? {} : { path });
}
