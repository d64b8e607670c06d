import type { AbbreviationTable } from '../zones/abbreviations.js';
import { resolverConfigSchema, type ResolverConfig } from './config.js';

/**
 * Everything resolution reads. Built once at startup and passed to every
 * call; the resolver holds no state of its own.
 */
export interface ResolverContext {
  readonly abbreviations: AbbreviationTable;
  readonly config: ResolverConfig;
  /** Clock sampled once per resolution */
  readonly now: () => Date;
}

export interface CreateResolverContextOptions {
  abbreviations: AbbreviationTable;
  /** Raw configuration, validated against resolverConfigSchema */
  config?: unknown;
  now?: () => Date;
}

/**
 * Builds a ResolverContext, validating the configuration.
 *
 * @throws ZodError if the configuration is invalid
 */
export function createResolverContext(options: CreateResolverContextOptions): ResolverContext {
  return {
    abbreviations: options.abbreviations,
    config: resolverConfigSchema.parse(options.config ?? {}),
    now: options.now ?? (() => new Date()),
  };
}
