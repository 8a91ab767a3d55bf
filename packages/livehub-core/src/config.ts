import { z } from 'zod';
import { LiveHubConfigError } from './errors.js';
import { OVERFLOW_POLICIES, type HubOptions } from './types.js';

// Unset and empty variables both fall back to the default
const emptyAsUndefined = (value: unknown): unknown => (value === '' ? undefined : value);

const hubEnvSchema = z.object({
  LIVEHUB_BUFFER_SIZE: z.preprocess(emptyAsUndefined, z.coerce.number().int().positive().default(256)),
  LIVEHUB_OVERFLOW_POLICY: z.preprocess(emptyAsUndefined, z.enum(OVERFLOW_POLICIES).default('drop-oldest')),
  LIVEHUB_KEEP_ALIVE: z.preprocess(
    emptyAsUndefined,
    z
      .enum(['true', 'false', '1', '0'])
      .default('true')
      .transform((value) => value === 'true' || value === '1'),
  ),
});

export type HubEnv = z.infer<typeof hubEnvSchema>;

/**
 * Parse `env` against `schema`, reporting the first invalid variable by name
 */
export function parseEnv<S extends z.ZodTypeAny>(schema: S, env: NodeJS.ProcessEnv): z.infer<S> {
  const result = schema.safeParse(env);
  if (result.success) {
    return result.data;
  }

  const [issue] = result.error.issues;
  const variable = issue?.path.join('.') || 'environment';
  throw new LiveHubConfigError(variable, issue?.message ?? result.error.message);
}

/**
 * Hub defaults from the environment
 *
 * | Variable                  | Default       |
 * |---------------------------|---------------|
 * | `LIVEHUB_BUFFER_SIZE`     | `256`         |
 * | `LIVEHUB_OVERFLOW_POLICY` | `drop-oldest` |
 * | `LIVEHUB_KEEP_ALIVE`      | `true`        |
 *
 * Explicit `overrides` win over the environment.
 *
 * @throws LiveHubConfigError naming the offending variable
 */
export function resolveHubOptions(
  overrides: HubOptions = {},
  env: NodeJS.ProcessEnv = process.env,
): HubOptions {
  const parsed = parseEnv(hubEnvSchema, env);

  return {
    bufferSize: parsed.LIVEHUB_BUFFER_SIZE,
    overflow: parsed.LIVEHUB_OVERFLOW_POLICY,
    keepAlive: parsed.LIVEHUB_KEEP_ALIVE,
    ...overrides,
  };
}
