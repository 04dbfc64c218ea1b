/**
 * MCP Module - Public API
 *
 * Model Context Protocol surface over the indicator and registry modules.
 */

// ─────────────────────────────────────────────────────────────────────────────
// Core Types
// ─────────────────────────────────────────────────────────────────────────────

export type {
  McpSession,
  McpConfig,
  TimeSeriesOutput,
  CompareStatesOutput,
  EstablishmentsOutput,
  CoordinatesOutput,
  CountEstablishmentsOutput,
} from './core/types.js';

export { DEFAULT_MCP_CONFIG } from './core/types.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Errors
// ─────────────────────────────────────────────────────────────────────────────

export type { McpError, McpErrorCode } from './core/errors.js';

export { MCP_ERROR_CODES, toMcpError, failedResult, successResult } from './core/errors.js';

// ─────────────────────────────────────────────────────────────────────────────
// Core Ports
// ─────────────────────────────────────────────────────────────────────────────

export type { McpSessionStore, McpToolDeps } from './core/ports.js';

// ─────────────────────────────────────────────────────────────────────────────
// Shell
// ─────────────────────────────────────────────────────────────────────────────

export {
  createMcpServer,
  runMcpServerStdio,
  SERVER_NAME,
  SERVER_VERSION,
  type CreateMcpServerDeps,
} from './shell/server/mcp-server.js';
export { makeMcpRoutes, type MakeMcpRoutesDeps } from './shell/rest/routes.js';
export { makeInMemorySessionStore } from './shell/session/in-memory-session-store.js';
