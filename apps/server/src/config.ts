/**
 * Server configuration, read from environment variables.
 */

import { z } from 'zod';

/**
 * Schema for the environment.
 *
 * - ENV: "production" or "development" (default development)
 * - PORT: TCP port (default 3000)
 * - DATE_SEGMENT_ORDER: YMD, MDY or DMY (default YMD)
 * - STRICT: "true" or "false" (default true)
 * - ABBREVIATIONS_PATH / ABBREVIATION_PRECEDENCE_PATH: override the bundled dataset
 */
export const serverConfigSchema = z
  .object({
    ENV: z.enum(['production', 'development']).default('development'),
    PORT: z.coerce.number().int().min(0).max(65535).default(3000),
    DATE_SEGMENT_ORDER: z.enum(['YMD', 'MDY', 'DMY']).default('YMD'),
    STRICT: z
      .enum(['true', 'false'])
      .default('true')
      .transform((value) => value === 'true'),
    ABBREVIATIONS_PATH: z.string().min(1).optional(),
    ABBREVIATION_PRECEDENCE_PATH: z.string().min(1).optional(),
  })
  .transform((env) => ({
    env: env.ENV,
    port: env.PORT,
    // Production listens on all interfaces, development on loopback only
    host: env.ENV === 'production' ? '0.0.0.0' : '127.0.0.1',
    resolver: {
      dateSegmentOrder: env.DATE_SEGMENT_ORDER,
      strict: env.STRICT,
    },
    abbreviationsPath: env.ABBREVIATIONS_PATH,
    precedencePath: env.ABBREVIATION_PRECEDENCE_PATH,
  }));

export type ServerConfig = z.output<typeof serverConfigSchema>;

export type Environment = ServerConfig['env'];

/**
 * Parses the server configuration.
 *
 * @throws ZodError if a variable is present but invalid
 *
 * @example
 * loadServerConfig({ ENV: 'production', PORT: '8080' })
 * // { env: 'production', port: 8080, host: '0.0.0.0', ... }
 */
export function loadServerConfig(env: NodeJS.ProcessEnv = process.env): ServerConfig {
  return serverConfigSchema.parse(env);
}
