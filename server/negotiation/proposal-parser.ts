import { z } from 'zod';
import { mapZodError } from './errors';
import type { GenerationResult } from './proposal-generator';
import type { PlanProposal, ProposedAction } from './types';

const isoDate = z.string().regex(/^\d{4}-\d{2}-\d{2}$/, 'Use YYYY-MM-DD');

const structuredPlanSchema = z
  .object({
    type: z.enum(['installment', 'settlement', 'one_time']),
    amount: z.number().finite(),
    installments: z.number().int().nullish(),
    first_due_date: isoDate.nullish(),
    frequency: z.enum(['weekly', 'bi-weekly', 'monthly']).nullish()
  })
  .superRefine((plan, ctx) => {
    if (plan.type === 'installment' && (plan.installments === null || plan.installments === undefined)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, path: ['installments'], message: 'Required for installment plans.' });
    }
  });

const generatorOutputSchema = z.object({
  action: z.enum([
    'inform',
    'collect_payment',
    'propose_plan',
    'acknowledge',
    'request_info',
    'escalate',
    'close',
    'verify_identity'
  ]),
  message_to_user: z.string().min(1),
  structured_plan: structuredPlanSchema.nullish(),
  confidence: z.number().min(0).max(1).default(0.5),
  escalation: z.boolean().default(false),
  compliance_checks: z.array(z.string()).default([]),
  reason: z.string().nullish()
});

type GeneratorOutput = z.infer<typeof generatorOutputSchema>;

const FENCED_JSON = /```(?:json)?\s*(\{[\s\S]*?\})\s*```/i;

/** Pull the JSON object out of generator text, fenced or bare */
export function extractJsonObject(raw: string): string | null {
  const fenced = FENCED_JSON.exec(raw);
  if (fenced) return fenced[1];
  const start = raw.indexOf('{');
  const end = raw.lastIndexOf('}');
  return start >= 0 && end > start ? raw.slice(start, end + 1) : null;
}

function toPlan(plan: NonNullable<GeneratorOutput['structured_plan']>): PlanProposal {
  const firstDueDate = plan.first_due_date ?? undefined;
  switch (plan.type) {
    case 'installment':
      return {
        kind: 'installment',
        installmentAmount: plan.amount,
        installments: plan.installments ?? 0,
        frequency: plan.frequency ?? 'monthly',
        firstDueDate
      };
    case 'settlement':
      return { kind: 'settlement', amount: plan.amount, firstDueDate };
    case 'one_time':
      return { kind: 'one_time', amount: plan.amount, firstDueDate };
  }
}

function toProposal(output: GeneratorOutput): ProposedAction {
  const base = {
    message: output.message_to_user,
    confidence: output.confidence,
    escalate: output.escalation,
    complianceChecks: output.compliance_checks
  };

  switch (output.action) {
    case 'propose_plan':
    case 'collect_payment':
      return {
        ...base,
        kind: output.action,
        plan: output.structured_plan ? toPlan(output.structured_plan) : undefined
      };
    case 'escalate':
      return { ...base, kind: 'escalate', reason: output.reason ?? undefined };
    default:
      return { ...base, kind: output.action };
  }
}

/**
 * Parse raw generator text into a proposal. Anything that does not carry a valid JSON object
 * comes back as an `invalid_output` failure.
 */
export function parseGeneratorOutput(raw: string): GenerationResult {
  const json = extractJsonObject(raw);
  if (json === null) {
    return { ok: false, error: { kind: 'invalid_output', message: 'No JSON object found in generator output' } };
  }

  let value: unknown;
  try {
    value = JSON.parse(json);
  } catch (error) {
    const reason = error instanceof Error ? error.message : String(error);
    return { ok: false, error: { kind: 'invalid_output', message: `Malformed JSON: ${reason}` } };
  }

  const parsed = generatorOutputSchema.safeParse(value);
  if (!parsed.success) {
    return { ok: false, error: { kind: 'invalid_output', message: mapZodError(parsed.error).message } };
  }

  return { ok: true, proposal: toProposal(parsed.data) };
}
