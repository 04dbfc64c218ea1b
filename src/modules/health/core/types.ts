import { Type, type Static } from '@sinclair/typebox';

export const CheckStatusSchema = Type.Union([Type.Literal('healthy'), Type.Literal('unhealthy')]);

export const ReadinessStatusSchema = Type.Union([
  Type.Literal('ok'),
  Type.Literal('degraded'),
  Type.Literal('unhealthy'),
]);

export type ReadinessStatus = Static<typeof ReadinessStatusSchema>;

/**
 * One checker's verdict. Checks are critical unless they say otherwise.
 */
export const HealthCheckResultSchema = Type.Object({
  name: Type.String({ description: 'Checked component, e.g. an upstream API' }),
  status: CheckStatusSchema,
  message: Type.Optional(Type.String()),
  latencyMs: Type.Optional(Type.Number({ description: 'Time the check took' })),
  critical: Type.Optional(
    Type.Boolean({ description: 'false: an unhealthy result only degrades readiness' })
  ),
});

export type HealthCheckResult = Static<typeof HealthCheckResultSchema>;

export const LivenessResponseSchema = Type.Object({
  status: Type.Literal('ok'),
});

export type LivenessResponse = Static<typeof LivenessResponseSchema>;

export const ReadinessResponseSchema = Type.Object({
  status: ReadinessStatusSchema,
  timestamp: Type.String({ format: 'date-time' }),
  version: Type.Optional(Type.String()),
  uptime: Type.Number({ description: 'Seconds since the routes were registered' }),
  checks: Type.Array(HealthCheckResultSchema),
});

export type ReadinessResponse = Static<typeof ReadinessResponseSchema>;
