/**
 * Integration tests for the streamable HTTP MCP endpoint
 */

import { describe, expect, it, afterEach, vi } from 'vitest';

import { createApp } from '@/app/build-app.js';
import { makeInMemorySessionStore } from '@/modules/mcp/index.js';

import { makeTestConfig } from '../fixtures/builders.js';
import { makeFakeToolDeps } from '../fixtures/fakes.js';

import type { McpSessionStore } from '@/modules/mcp/index.js';
import type { FastifyInstance } from 'fastify';

const makeApp = (env: NodeJS.ProcessEnv = {}, sessionStore?: McpSessionStore) =>
  createApp({
    fastifyOptions: { logger: false },
    deps: { tools: makeFakeToolDeps(), config: makeTestConfig(env), sessionStore },
  });

const toolsListRequest = { jsonrpc: '2.0', id: 1, method: 'tools/list', params: {} };

const initializeRequest = {
  jsonrpc: '2.0',
  id: 0,
  method: 'initialize',
  params: {
    protocolVersion: '2025-03-26',
    capabilities: {},
    clientInfo: { name: 'test-client', version: '1.0.0' },
  },
};

describe('MCP HTTP endpoint', () => {
  let app: FastifyInstance | undefined;

  afterEach(async () => {
    await app?.close();
    app = undefined;
  });

  it('asks for a new session when a request has none', async () => {
    app = await makeApp();

    const response = await app.inject({ method: 'POST', url: '/mcp', payload: toolsListRequest });

    expect(response.statusCode).toBe(409);
    expect(response.headers['mcp-reinit-required']).toBe('true');
    expect(response.json()).toEqual({
      jsonrpc: '2.0',
      error: {
        code: -32002,
        message: 'MCP connection session not found or expired. Please reinitialize.',
      },
      id: null,
    });
  });

  it('treats an unknown session id as expired', async () => {
    app = await makeApp();

    const response = await app.inject({
      method: 'GET',
      url: '/mcp',
      headers: { 'mcp-session-id': 'unknown-session' },
    });

    expect(response.statusCode).toBe(409);
    expect(response.json().error.message).toBe('Session not found or expired');
  });

  it('requires the API key when one is configured', async () => {
    app = await makeApp({ MCP_API_KEY: 'test-secret' });

    const denied = await app.inject({ method: 'POST', url: '/mcp', payload: toolsListRequest });
    const allowed = await app.inject({
      method: 'POST',
      url: '/mcp',
      headers: { 'x-api-key': 'test-secret' },
      payload: toolsListRequest,
    });

    expect(denied.statusCode).toBe(401);
    expect(denied.json().error).toEqual({ code: -32001, message: 'Unauthorized' });
    // Past auth, the missing session is the next failure
    expect(allowed.statusCode).toBe(409);
  });

  it('requires a session id to delete a session', async () => {
    app = await makeApp();

    const response = await app.inject({ method: 'DELETE', url: '/mcp' });

    expect(response.statusCode).toBe(400);
    expect(response.json()).toEqual({ error: 'Session ID required' });
  });

  it('deletes an unknown session without error', async () => {
    app = await makeApp();

    const response = await app.inject({
      method: 'DELETE',
      url: '/mcp',
      headers: { 'mcp-session-id': 'unknown-session' },
    });

    expect(response.statusCode).toBe(204);
  });

  it('stores nothing when the transport rejects an initialize request', async () => {
    let now = 1_000_000;
    const sessionStore = makeInMemorySessionStore({ ttlSeconds: 60, now: () => now });
    const setSpy = vi.spyOn(sessionStore, 'set');
    app = await makeApp({}, sessionStore);

    const statuses: number[] = [];
    for (let attempt = 0; attempt < 3; attempt += 1) {
      const response = await app.inject({
        method: 'POST',
        url: '/mcp',
        headers: { accept: 'application/json' },
        payload: initializeRequest,
      });
      statuses.push(response.statusCode);
    }

    expect(statuses).toEqual([406, 406, 406]);
    expect(setSpy).not.toHaveBeenCalled();
    now += 61_000;
    expect(await sessionStore.sweep()).toEqual([]);
  });

  it('stores the session once initialize succeeds', async () => {
    const sessionStore = makeInMemorySessionStore({ ttlSeconds: 60 });
    app = await makeApp({}, sessionStore);

    const response = await app.inject({
      method: 'POST',
      url: '/mcp',
      headers: { accept: 'application/json, text/event-stream' },
      payload: initializeRequest,
    });

    expect(response.statusCode).toBe(200);
    const sessionId = response.headers['mcp-session-id'];
    expect(typeof sessionId).toBe('string');
    expect(await sessionStore.get(String(sessionId))).toMatchObject({ id: sessionId });
  });
});
