/**
 * Configuration module
 *
 * Provides type-safe environment configuration validation
 * using Zod schemas. Follows 12-Factor App principles.
 *
 * @example
 * ```typescript
 * import { parseEnvConfig, type PorticoEnv } from '@portico/core/config';
 *
 * const config = parseEnvConfig();
 *
 * console.log(`Listening on ${config.LISTEN}:${config.PORT}`);
 * console.log(`Max connections: ${config.MAX_CONS || 'unlimited'}`);
 * ```
 *
 * @module @portico/core/config
 */

export {
    PorticoEnvSchema,
    LogLevelSchema,
    NodeEnvSchema,
    BooleanFromStringSchema,
    parseEnvConfig,
    safeParseEnvConfig,
    type PorticoEnv,
} from "./envSchema.ts";
