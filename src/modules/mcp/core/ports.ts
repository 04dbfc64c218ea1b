/**
 * MCP Module - Ports (Dependency Interfaces)
 *
 * Defines the interfaces for external dependencies.
 * These are implemented by adapters in the shell layer.
 */

import type { McpSession } from './types.js';
import type { IndicatorApi } from '@/modules/indicators/index.js';
import type { RegistryApi } from '@/modules/registry/index.js';
import type { Logger } from 'pino';

// ─────────────────────────────────────────────────────────────────────────────
// MCP-Specific Ports
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Session store interface for MCP sessions on the HTTP transport.
 */
export interface McpSessionStore {
  /**
   * Get a session by ID.
   * Returns null if session doesn't exist or is expired.
   */
  get(sessionId: string): Promise<McpSession | null>;

  /**
   * Create or update a session.
   */
  set(session: McpSession): Promise<void>;

  /**
   * Delete a session.
   */
  delete(sessionId: string): Promise<void>;

  /**
   * Update last accessed time (touch).
   */
  touch(sessionId: string): Promise<void>;

  /**
   * Drop expired sessions and return their IDs.
   */
  sweep(): Promise<string[]>;
}

// ─────────────────────────────────────────────────────────────────────────────
// Aggregated Dependencies
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Everything the tools need. Injected into the MCP server factory.
 */
export interface McpToolDeps {
  indicatorApi: IndicatorApi;
  registryApi: RegistryApi;
  /** Records requested per registry page */
  pageSize: number;
  logger: Logger;
}
