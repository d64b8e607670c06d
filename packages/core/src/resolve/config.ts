/**
 * Resolver configuration.
 */

import { z } from 'zod';

/**
 * Schema for ResolverConfig. Every field has a default, so `{}` is valid.
 *
 * - dateSegmentOrder: order of the three leading date segments
 * - strict: when false, input is trimmed and zone abbreviations are
 *   upper-cased before lookup
 */
export const resolverConfigSchema = z.object({
  dateSegmentOrder: z.enum(['YMD', 'MDY', 'DMY']).default('YMD'),
  strict: z.boolean().default(true),
});

export type ResolverConfig = z.infer<typeof resolverConfigSchema>;

export const DEFAULT_RESOLVER_CONFIG: ResolverConfig = resolverConfigSchema.parse({});
