import { describe, expect, it, vi } from 'vitest';
import { createRequestContext, generateCorrelationId } from '../src/lib/correlation.js';
import { getHealthStatus } from '../src/lib/health.js';

describe('correlation ids', () => {
  it('generates v4 UUIDs', () => {
    expect(generateCorrelationId()).toMatch(
      /^[0-9a-f]{8}-[0-9a-f]{4}-4[0-9a-f]{3}-[89ab][0-9a-f]{3}-[0-9a-f]{12}$/
    );
  });

  it('does not repeat across many requests', () => {
    const ids = new Set(Array.from({ length: 1000 }, () => generateCorrelationId()));
    expect(ids.size).toBe(1000);
  });

  it('binds the id into a frozen context with a child logger', () => {
    const child = { debug: vi.fn(), info: vi.fn(), warn: vi.fn(), error: vi.fn() };
    const parent = { child: vi.fn(() => child) };

    const ctx = createRequestContext(parent, 'fixed-id');

    expect(parent.child).toHaveBeenCalledWith({ correlationId: 'fixed-id' });
    expect(ctx.correlationId).toBe('fixed-id');
    expect(ctx.log).toBe(child);
    expect(Object.isFrozen(ctx)).toBe(true);
  });
});

describe('getHealthStatus', () => {
  it('reports the service identity and the current time', () => {
    expect(getHealthStatus({ name: 'items', version: '2.0.0' }, new Date('2026-03-01T12:00:00.000Z'))).toEqual({
      status: 'healthy',
      timestamp: '2026-03-01T12:00:00.000Z',
      service: 'items',
      version: '2.0.0',
    });
  });
});
