import { describe, it, expect } from 'vitest';
import { extractJsonObject, parseGeneratorOutput } from '../../negotiation/proposal-parser';

describe('extractJsonObject', () => {
  it('prefers a fenced json block', () => {
    const raw = 'Here you go:\n```json\n{"action": "inform"}\n```\nThanks {not json}';
    expect(extractJsonObject(raw)).toBe('{"action": "inform"}');
  });

  it('falls back to the outermost braces', () => {
    expect(extractJsonObject('prefix {"a": {"b": 1}} suffix')).toBe('{"a": {"b": 1}}');
  });

  it('returns null when there is no object', () => {
    expect(extractJsonObject('no structured output')).toBeNull();
  });
});

describe('parseGeneratorOutput', () => {
  it('maps an installment plan with a per-installment amount', () => {
    const raw = JSON.stringify({
      action: 'propose_plan',
      message_to_user: 'I can set up six monthly payments.',
      structured_plan: { type: 'installment', amount: 200, installments: 6, first_due_date: '2025-11-10' },
      confidence: 0.92,
      escalation: false,
      compliance_checks: ['payment_plan_within_policy']
    });

    expect(parseGeneratorOutput(raw)).toEqual({
      ok: true,
      proposal: {
        kind: 'propose_plan',
        message: 'I can set up six monthly payments.',
        confidence: 0.92,
        escalate: false,
        complianceChecks: ['payment_plan_within_policy'],
        plan: { kind: 'installment', installmentAmount: 200, installments: 6, frequency: 'monthly', firstDueDate: '2025-11-10' }
      }
    });
  });

  it('fills defaults for confidence, escalation and checks', () => {
    const result = parseGeneratorOutput('```json\n{"action": "acknowledge", "message_to_user": "Noted."}\n```');

    expect(result).toEqual({
      ok: true,
      proposal: { kind: 'acknowledge', message: 'Noted.', confidence: 0.5, escalate: false, complianceChecks: [] }
    });
  });

  it('reports an unknown action as invalid output', () => {
    const result = parseGeneratorOutput('{"action": "threaten", "message_to_user": "..."}');

    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.kind).toBe('invalid_output');
  });

  it('requires an installment count for installment plans', () => {
    const raw = JSON.stringify({
      action: 'propose_plan',
      message_to_user: 'Plan',
      structured_plan: { type: 'installment', amount: 100 }
    });
    const result = parseGeneratorOutput(raw);

    expect(result).toEqual({
      ok: false,
      error: { kind: 'invalid_output', message: 'structured_plan.installments: Required for installment plans.' }
    });
  });

  it('reports malformed JSON', () => {
    const result = parseGeneratorOutput('{"action": "inform",}');
    expect(result.ok).toBe(false);
    if (result.ok) return;
    expect(result.error.message.startsWith('Malformed JSON')).toBe(true);
  });
});
