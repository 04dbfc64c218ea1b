/**
 * Unit tests for the logger factories
 */

import { describe, expect, it } from 'vitest';

import { createChildLogger, createLogger, createSilentLogger } from '@/infra/logger/index.js';

describe('createChildLogger', () => {
  it('binds the component context and keeps the parent level', () => {
    const parent = createSilentLogger();

    const child = createChildLogger(parent, { component: 'denue' });

    expect(child.bindings()).toMatchObject({ component: 'denue' });
    expect(child.level).toBe('silent');
  });
});

describe('createLogger', () => {
  it('uses the configured name and level', () => {
    const logger = createLogger({ level: 'warn', name: 'test-logger', pretty: false });

    expect(logger.level).toBe('warn');
    expect(logger.bindings()).toMatchObject({ name: 'test-logger' });
  });
});
