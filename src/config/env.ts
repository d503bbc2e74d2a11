import { z } from 'zod';

// ── Remote grid credentials ─────────────────────────────────

export const remoteCredentialsSchema = z.object({
  username: z.string().min(1),
  accessKey: z.string().min(1),
});

export type RemoteCredentials = z.infer<typeof remoteCredentialsSchema>;

/**
 * Read BrowserStack credentials from the environment.
 * The short `BS_USER` / `BS_KEY` names are accepted as a fallback.
 */
export function loadRemoteCredentials(
  env: NodeJS.ProcessEnv = process.env,
): RemoteCredentials {
  const result = remoteCredentialsSchema.safeParse({
    username: env['BROWSERSTACK_USERNAME'] ?? env['BS_USER'],
    accessKey: env['BROWSERSTACK_ACCESS_KEY'] ?? env['BS_KEY'],
  });

  if (!result.success) {
    throw new ConfigError(
      'BrowserStack credentials are not set. Define BROWSERSTACK_USERNAME and BROWSERSTACK_ACCESS_KEY (or BS_USER and BS_KEY) in the environment or a .env file.',
    );
  }

  return result.data;
}

// ── Error ───────────────────────────────────────────────────

export class ConfigError extends Error {
  readonly exitCode = 4;

  constructor(message: string, options?: ErrorOptions) {
    super(message, options);
    this.name = 'ConfigError';
  }
}
