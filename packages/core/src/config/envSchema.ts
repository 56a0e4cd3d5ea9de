/**
 * Environment configuration validation with Zod
 *
 * Provides type-safe configuration from environment variables
 * following 12-Factor App principles.
 *
 * @module @portico/core/config
 */

import { z } from "zod";

/**
 * Log level schema with validation
 */
export const LogLevelSchema = z.enum(["debug", "info", "warn", "error"]).default("info");

/**
 * Node environment schema
 */
export const NodeEnvSchema = z.enum(["development", "production", "test"]).default("development");

/**
 * Boolean from string schema (for ENV variables)
 */
export const BooleanFromStringSchema = z
    .enum(["true", "false", "1", "0", "yes", "no"])
    .default("false")
    .transform((v) => v === "true" || v === "1" || v === "yes");

/**
 * portico environment configuration schema
 *
 * @example
 * ```typescript
 * const config = PorticoEnvSchema.parse(process.env);
 * console.log(config.PORT); // 2121 (default)
 * console.log(config.MAX_CONS); // 512 (default)
 * ```
 */
export const PorticoEnvSchema = z.object({
    /**
     * Listening port
     * @default 2121
     */
    PORT: z.coerce.number().int().min(0).max(65535).default(2121),

    /**
     * Listen address
     * @default '0.0.0.0'
     */
    LISTEN: z.string().default("0.0.0.0"),

    /**
     * Accept queue depth
     * @default 100
     */
    BACKLOG: z.coerce.number().int().min(1).default(100),

    /**
     * Maximum simultaneous connections, 0 = unlimited
     * @default 512
     */
    MAX_CONS: z.coerce.number().int().min(0).default(512),

    /**
     * Maximum simultaneous connections from one address, 0 = unlimited
     * @default 0
     */
    MAX_CONS_PER_IP: z.coerce.number().int().min(0).default(0),

    /**
     * Pre-forked worker processes; 1 = inline, 0 = one per CPU
     * @default 1
     */
    WORKER_PROCESSES: z.coerce.number().int().default(1),

    /**
     * Upper bound of one non-blocking loop iteration in milliseconds
     */
    LOOP_TIMEOUT_MS: z.coerce.number().min(0).optional(),

    /**
     * Turn SIGINT/SIGTERM into an orderly shutdown
     * @default true
     */
    HANDLE_INTERRUPT: z
        .enum(["true", "false", "1", "0", "yes", "no"])
        .default("true")
        .transform((v) => v === "true" || v === "1" || v === "yes"),

    /**
     * Terminate TLS on accepted sockets
     * @default false
     */
    TLS_ENABLED: BooleanFromStringSchema,

    /**
     * Directory holding server.key and server.crt
     */
    TLS_DIR_PATH: z.string().optional(),

    /**
     * Log level
     * @default 'info'
     */
    LOG_LEVEL: LogLevelSchema,

    /**
     * Node environment
     * @default 'development'
     */
    NODE_ENV: NodeEnvSchema,
});

/**
 * portico environment configuration type
 */
export type PorticoEnv = z.infer<typeof PorticoEnvSchema>;

/**
 * Parse and validate environment configuration
 *
 * @example
 * ```typescript
 * const config = parseEnvConfig();
 * // or with custom env
 * const config = parseEnvConfig({ PORT: '8021' });
 * ```
 */
export function parseEnvConfig(env: Record<string, string | undefined> = process.env): PorticoEnv {
    return PorticoEnvSchema.parse(env);
}

/**
 * Safely parse environment configuration (returns result object)
 *
 * @example
 * ```typescript
 * const result = safeParseEnvConfig();
 * if (result.success) {
 *   console.log(result.data.PORT);
 * } else {
 *   console.error(result.error.format());
 * }
 * ```
 */
export function safeParseEnvConfig(env: Record<string, string | undefined> = process.env) {
    return PorticoEnvSchema.safeParse(env);
}
