import { z } from 'zod';
import type { ArchiverConfig, ResolvedArchiverConfig } from './types.js';
import { ConfigError } from './errors.js';

export const MAX_UIDS = 256;

export const USERNAME_ENV = 'IMAP_USERNAME';
export const PASSWORD_ENV = 'IMAP_PASSWORD';

const DEFAULT_PORT = 143;
const DEFAULT_MAILBOX = 'INBOX';

const ImapConnectionSchema = z.object({
  host: z.string().trim().min(1, 'IMAP server address is required'),
  port: z.number().int().min(1).max(65535).default(DEFAULT_PORT),
  secure: z.boolean().default(false),
  starttls: z.boolean().default(true),
  auth: z.object({
    user: z.string().min(1, 'IMAP username is required'),
    pass: z.string().min(1, 'IMAP password is required'),
  }),
});

const ArchiverConfigSchema = z.object({
  imap: ImapConnectionSchema,
  mailbox: z.string().min(1).default(DEFAULT_MAILBOX),
  batchSize: z.number().int().min(1).max(MAX_UIDS).default(MAX_UIDS),
});

export function resolveConfig(config: ArchiverConfig): ResolvedArchiverConfig {
  const parsed = ArchiverConfigSchema.safeParse({
    imap: config.imap,
    mailbox: config.mailbox,
    batchSize: config.batchSize,
  });
  if (!parsed.success) {
    const details = parsed.error.issues
      .map((issue) => `${issue.path.join('.')}: ${issue.message}`)
      .join('; ');
    throw new ConfigError(`Invalid configuration: ${details}`);
  }

  return {
    ...parsed.data,
    session: config.session,
    now: config.now ?? (() => new Date()),
  };
}

/**
 * Builds a config from the CLI's positional server address and the
 * credential environment variables. Nothing touches the network here.
 */
export function loadConfigFromEnv(
  server: string | undefined,
  env: NodeJS.ProcessEnv = process.env,
): ArchiverConfig {
  if (!server || !server.trim()) {
    throw new ConfigError('Missing IMAP server address argument');
  }

  const user = env[USERNAME_ENV];
  if (!user) {
    throw new ConfigError(`Missing or invalid env var: ${USERNAME_ENV}`);
  }
  const pass = env[PASSWORD_ENV];
  if (!pass) {
    throw new ConfigError(`Missing or invalid env var: ${PASSWORD_ENV}`);
  }

  return {
    imap: {
      host: server.trim(),
      auth: { user, pass },
    },
  };
}
