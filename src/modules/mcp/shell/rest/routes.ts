/**
 * MCP HTTP Routes
 *
 * Provides HTTP endpoints for MCP protocol communication.
 * Supports session management via StreamableHTTPServerTransport.
 */

import { randomUUID } from 'node:crypto';

import { StreamableHTTPServerTransport } from '@modelcontextprotocol/sdk/server/streamableHttp.js';
import { isInitializeRequest } from '@modelcontextprotocol/sdk/types.js';

import type { McpSessionStore } from '../../core/ports.js';
import type { McpConfig, McpSession } from '../../core/types.js';
import type { McpServer } from '@modelcontextprotocol/sdk/server/mcp.js';
import type { FastifyInstance, FastifyRequest, FastifyReply } from 'fastify';

// ─────────────────────────────────────────────────────────────────────────────
// Types
// ─────────────────────────────────────────────────────────────────────────────

export interface MakeMcpRoutesDeps {
  /** One server per session: a server holds a single transport */
  createServer: () => McpServer;
  sessionStore: McpSessionStore;
  config: McpConfig;
}

interface LiveSession {
  transport: StreamableHTTPServerTransport;
  server: McpServer;
}

const SESSION_HEADER = 'mcp-session-id';
const REINIT_HEADERS = { 'Mcp-Reinit-Required': 'true' };

// ─────────────────────────────────────────────────────────────────────────────
// Helpers
// ─────────────────────────────────────────────────────────────────────────────

/** Single-valued header, or undefined */
function headerValue(request: FastifyRequest, name: string): string | undefined {
  const value = request.headers[name];
  return typeof value === 'string' && value !== '' ? value : undefined;
}

/**
 * Verifies API key if configured.
 */
function verifyApiKey(request: FastifyRequest, config: McpConfig): boolean {
  const configuredApiKey = config.apiKey;
  if (configuredApiKey === undefined || configuredApiKey === '') {
    return true; // No API key configured, allow all
  }
  return headerValue(request, 'x-api-key') === configuredApiKey;
}

/**
 * Sends an MCP JSON-RPC error response.
 */
function sendMcpError(
  reply: FastifyReply,
  code: number,
  message: string,
  httpStatus: number,
  headers?: Record<string, string>
): void {
  if (headers !== undefined) {
    for (const [key, value] of Object.entries(headers)) {
      reply.header(key, value);
    }
  }
  void reply.code(httpStatus).type('application/json').send({
    jsonrpc: '2.0',
    error: { code, message },
    id: null,
  });
}

// ─────────────────────────────────────────────────────────────────────────────
// Route Factory
// ─────────────────────────────────────────────────────────────────────────────

/**
 * Creates MCP HTTP routes for Fastify.
 */
export async function makeMcpRoutes(
  fastify: FastifyInstance,
  deps: MakeMcpRoutesDeps
): Promise<void> {
  const { createServer, sessionStore, config } = deps;

  // Transports are not serializable, so they stay beside the session store
  const live = new Map<string, LiveSession>();

  const closeSession = async (sessionId: string): Promise<void> => {
    const session = live.get(sessionId);
    live.delete(sessionId);
    await sessionStore.delete(sessionId);
    if (session !== undefined) {
      await session.transport.close();
    }
  };

  /**
   * Live transport for a request, or undefined when the session is unknown
   * or has been idle past its TTL.
   */
  const findSession = async (sessionId: string): Promise<LiveSession | undefined> => {
    const session = live.get(sessionId);
    if (session === undefined) {
      return undefined;
    }
    const stored = await sessionStore.get(sessionId);
    if (stored === null) {
      await closeSession(sessionId);
      return undefined;
    }
    await sessionStore.touch(sessionId);
    return session;
  };

  const closeExpired = async (): Promise<void> => {
    for (const sessionId of await sessionStore.sweep()) {
      await closeSession(sessionId);
    }
    for (const sessionId of [...live.keys()]) {
      if ((await sessionStore.get(sessionId)) === null) {
        await closeSession(sessionId);
      }
    }
  };

  const sweepTimer = setInterval(
    () => {
      closeExpired().catch((error: unknown) => {
        fastify.log.warn({ err: error }, 'Failed to close expired MCP sessions');
      });
    },
    Math.max(config.sessionTtlSeconds * 500, 1000)
  );
  sweepTimer.unref();

  fastify.addHook('onClose', async () => {
    clearInterval(sweepTimer);
    for (const sessionId of [...live.keys()]) {
      await closeSession(sessionId);
    }
  });

  const checkAuth = (request: FastifyRequest, reply: FastifyReply): boolean => {
    if (config.authRequired && !verifyApiKey(request, config)) {
      sendMcpError(reply, -32001, 'Unauthorized', 401);
      return false;
    }
    return true;
  };

  // ─────────────────────────────────────────────────────────────────────────
  // POST /mcp - Initialize session or handle MCP requests
  // ─────────────────────────────────────────────────────────────────────────

  fastify.post('/mcp', async (request, reply) => {
    if (!checkAuth(request, reply)) {
      return;
    }

    const body = request.body;
    const sessionIdHeader = headerValue(request, SESSION_HEADER);
    const existing =
      sessionIdHeader !== undefined ? await findSession(sessionIdHeader) : undefined;

    if (existing === undefined) {
      if (!isInitializeRequest(body)) {
        // Session required but not found
        sendMcpError(
          reply,
          -32002,
          'MCP connection session not found or expired. Please reinitialize.',
          409,
          REINIT_HEADERS
        );
        return;
      }

      // Create new transport and server; the session exists once the transport accepts it
      const server = createServer();

      const newTransport = new StreamableHTTPServerTransport({
        sessionIdGenerator: () => randomUUID(),
        onsessioninitialized: (id: string) => {
          live.set(id, { transport: newTransport, server });
          const now = Date.now();
          const session: McpSession = { id, createdAt: now, lastAccessedAt: now };
          sessionStore.set(session).catch((error: unknown) => {
            fastify.log.warn({ err: error, sessionId: id }, 'Failed to store MCP session');
          });
        },
      });

      newTransport.onclose = () => {
        const id = newTransport.sessionId;
        if (id !== undefined) {
          live.delete(id);
          sessionStore.delete(id).catch((error: unknown) => {
            fastify.log.warn({ err: error, sessionId: id }, 'Failed to delete MCP session');
          });
        }
      };

      await server.connect(newTransport);

      reply.hijack();
      await newTransport.handleRequest(request.raw, reply.raw, body);

      // Rejected initialize (bad headers, malformed body): nothing to keep
      const id = newTransport.sessionId;
      if (id === undefined || !live.has(id)) {
        await server.close();
      }
      return;
    }

    // Hijack the response and let transport handle it
    reply.hijack();
    await existing.transport.handleRequest(request.raw, reply.raw, body);
  });

  // ─────────────────────────────────────────────────────────────────────────
  // GET /mcp - Handle SSE streaming for existing session
  // ─────────────────────────────────────────────────────────────────────────

  fastify.get('/mcp', async (request, reply) => {
    if (!checkAuth(request, reply)) {
      return;
    }

    const sessionId = headerValue(request, SESSION_HEADER);
    if (sessionId === undefined) {
      sendMcpError(reply, -32002, 'Session ID required', 409, REINIT_HEADERS);
      return;
    }

    const session = await findSession(sessionId);
    if (session === undefined) {
      sendMcpError(reply, -32002, 'Session not found or expired', 409, REINIT_HEADERS);
      return;
    }

    // Hijack and handle streaming
    reply.hijack();
    await session.transport.handleRequest(request.raw, reply.raw);
  });

  // ─────────────────────────────────────────────────────────────────────────
  // DELETE /mcp - Terminate session
  // ─────────────────────────────────────────────────────────────────────────

  fastify.delete('/mcp', async (request, reply) => {
    if (!checkAuth(request, reply)) {
      return;
    }

    const sessionId = headerValue(request, SESSION_HEADER);
    if (sessionId === undefined) {
      void reply.code(400).send({ error: 'Session ID required' });
      return;
    }

    await closeSession(sessionId);
    void reply.code(204).send();
  });
}
