/**
 * Prometheus metrics for the negotiation core
 * Turn outcomes, escalations, generator fallbacks and audit delivery
 */

import client from 'prom-client';

export const registry = new client.Registry();

const turnsTotal = new client.Counter({
  name: 'negotiation_turns_total',
  help: 'Turns handled, by outcome',
  labelNames: ['outcome'],
  registers: [registry]
});

const turnDuration = new client.Histogram({
  name: 'negotiation_turn_duration_seconds',
  help: 'Wall time of a turn including the generator call',
  labelNames: ['outcome'],
  buckets: [0.01, 0.1, 0.5, 1, 2, 5, 10, 30],
  registers: [registry]
});

const escalationsTotal = new client.Counter({
  name: 'negotiation_escalations_total',
  help: 'Conversations moved to escalated, by cause',
  labelNames: ['cause'],
  registers: [registry]
});

const generatorFallbacksTotal = new client.Counter({
  name: 'negotiation_generator_fallbacks_total',
  help: 'Turns answered with the fallback proposal, by failure kind',
  labelNames: ['kind'],
  registers: [registry]
});

const auditDroppedTotal = new client.Counter({
  name: 'negotiation_audit_dropped_total',
  help: 'Audit events dropped because the channel was full',
  registers: [registry]
});

const auditSinkFailuresTotal = new client.Counter({
  name: 'negotiation_audit_sink_failures_total',
  help: 'Audit sink write failures, by sink',
  labelNames: ['sink'],
  registers: [registry]
});

export type TurnOutcome = 'responded' | 'blocked' | 'opted_out' | 'handed_off' | 'cancelled' | 'failed';
export type EscalationCause = 'proposal' | 'validation' | 'plan_policy' | 'generator_failure' | 'verification_lockout' | 'manual' | 'debt_validation';

export function recordTurn(outcome: TurnOutcome, durationMs: number) {
  turnsTotal.labels(outcome).inc();
  turnDuration.labels(outcome).observe(durationMs / 1000);
}

export function recordEscalation(cause: EscalationCause) {
  escalationsTotal.labels(cause).inc();
}

export function recordGeneratorFallback(kind: string) {
  generatorFallbacksTotal.labels(kind).inc();
}

export function recordAuditDrop() {
  auditDroppedTotal.inc();
}

export function recordAuditSinkFailure(sink: string) {
  auditSinkFailuresTotal.labels(sink).inc();
}

export function metricsSnapshot(): Promise<string> {
  return registry.metrics();
}
