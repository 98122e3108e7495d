/**
 * TrustSQL Configuration: zod-validated connection options
 */

import { z } from 'zod';
import { TrustSQLError } from './errors.js';
import { SecurityPolicy } from './guardrails.js';
import { DEFAULT_TOKEN_FORMAT, MAX_TOKEN_LENGTH, MIN_TOKEN_LENGTH } from './token.js';

export const configSchema = z.object({
  uri: z.string().min(1),
  label: z.string().default('TrustSQL'),
  dbName: z.string().optional(),

  /** Token prefix; must start with a letter so it cannot glue onto a number. */
  tokenPrefix: z.string().regex(/^[A-Za-z][A-Za-z0-9_]{0,15}$/).default(DEFAULT_TOKEN_FORMAT.prefix),
  /** Random suffix length. Values under the minimum are raised to it. */
  tokenLength: z
    .number()
    .int()
    .max(MAX_TOKEN_LENGTH)
    .default(DEFAULT_TOKEN_FORMAT.length)
    .transform(n => Math.max(n, MIN_TOKEN_LENGTH)),

  /**
   * 'statement' forgets every token registered before a statement started once
   * it finishes; tokens registered while it was pending are kept.
   */
  registryScope: z.enum(['connection', 'statement']).default('connection'),
  guardrails: z.boolean().default(true),
  securityPolicy: z.instanceof(SecurityPolicy).optional(),

  errorLevel: z
    .enum(['release', 'develop', 'debug'])
    .default(process.env['NODE_ENV'] === 'production' ? 'release' : 'develop'),
  logging: z.union([z.boolean(), z.literal('verbose')]).default(true),
  slowQueryMs: z.number().int().nonnegative().default(1000),
});

export type TrustSQLConfig = z.input<typeof configSchema>;
export type ResolvedConfig = z.output<typeof configSchema>;

export function resolveConfig(config: TrustSQLConfig): ResolvedConfig {
  const result = configSchema.safeParse(config);
  if (result.success) return result.data;

  throw new TrustSQLError({
    code: 'INVALID_CONFIG',
    message: `Invalid TrustSQL config: ${result.error.issues.map(i => `${i.path.join('.') || '(root)'}: ${i.message}`).join(', ')}`,
    fix: 'Fix the listed options and open the connection again.',
  });
}
