/**
 * @portico/core
 *
 * Connection-accepting server front end.
 *
 * Provides:
 * - createServer: bind a listener and dispatch connections to a handler class
 * - BaseHandler: channel bookkeeping for protocol handlers
 * - IOLoop: channel registry around the Node event loop
 * - AdmissionController / ConnectionDispatcher: admission control and dispatch
 * - ProcessPool: pre-fork worker supervision
 *
 * @module @portico/core
 */

// =============================================================================
// SERVER API
// =============================================================================

export { createServer, DEFAULT_BACKLOG, DEFAULT_MAX_CONS, DEFAULT_MAX_CONS_PER_IP } from "./Server.ts";
export { BaseHandler } from "./BaseHandler.ts";
export { IOLoop } from "./IOLoop.ts";
export type { IOLoopOptions } from "./IOLoop.ts";
export { AdmissionController } from "./AdmissionController.ts";
export type { AdmissionLimits } from "./AdmissionController.ts";
export { ConnectionDispatcher } from "./ConnectionDispatcher.ts";
export type { DispatcherOptions, DispatchObserver } from "./ConnectionDispatcher.ts";
export { ProcessPool, createClusterAdapter } from "./ProcessPool.ts";
export type { ClusterAdapter, ProcessPoolOptions, WorkerExitListener, WorkerProcess } from "./ProcessPool.ts";
export { createTransport } from "./channels.ts";
export type { Transport, TransportKind } from "./channels.ts";

// =============================================================================
// ERRORS AND LOGGING
// =============================================================================

export { BindError, ConfigError } from "./errors.ts";
export { errorAttributes, noopLogger, withAttributes } from "./logger.ts";
export type { LogAttributes, ServerLogger } from "./logger.ts";

// =============================================================================
// UTILITIES
// =============================================================================

export { getTLSPath, loadSecureContext, readTLSCertificates } from "./TLSConfig.ts";

// =============================================================================
// TYPES
// =============================================================================

export { ServerState, LifecycleEvent } from "./types.ts";

export type {
    Server,
    CreateServerOptions,
    ServeOptions,
    ConcurrencyModel,
    RejectionReason,
    Channel,
    EventLoop,
    ConnectionHandler,
    HandlerClass,
    HandlerHost,
    ListenAddress,
    InheritedSocket,
    ListenTarget,
    TLSOptions,
} from "./types.ts";

// =============================================================================
// CONFIGURATION
// =============================================================================

export {
    PorticoEnvSchema,
    LogLevelSchema,
    NodeEnvSchema,
    BooleanFromStringSchema,
    parseEnvConfig,
    safeParseEnvConfig,
    type PorticoEnv,
} from "./config/index.ts";
