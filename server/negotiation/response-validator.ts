/**
 * Response Validator
 *
 * Last gate before a generated proposal reaches the debtor. Every check runs; when any
 * of them fails the proposal is swapped for a hand-off to a human agent.
 */

import type { NegotiationPolicy } from '../bootstrap/config';
import { checkPlanPolicy } from './plan-policy';
import {
  planOf,
  requestsEscalation,
  type ComplianceCheck,
  type EscalateProposal,
  type Money,
  type PolicyViolation,
  type ProposedAction,
  type SafeProposal
} from './types';

export const HANDOFF_MESSAGE =
  'I need to connect you with a specialist who can better assist with your request. They will contact you shortly.';

export const VALIDATION_FAILED_TAG = 'validation_failed';

export const PROHIBITED_PHRASES: readonly string[] = [
  'threaten',
  'sue',
  'arrest',
  'jail',
  'garnish',
  'seize',
  'ruin credit',
  'legal action',
  'court',
  'lawsuit'
];

const escapeRegExp = (s: string) => s.replace(/[.*+?^${}()|[\]\\]/g, '\\$&');

// Anchored at word starts only: "sued" and "courts" match, "pursue" does not
const PROHIBITED_PATTERNS = PROHIBITED_PHRASES.map((phrase) => ({
  phrase,
  pattern: new RegExp(`\\b${escapeRegExp(phrase).replace(/ /g, '\\s+')}`, 'i')
}));

const DISCLOSURE_PATTERN = /\bbalance|\bamounts?\b|[$€£]|\busd\b|\bdollars?\b/i;

export interface ValidationContext {
  identityVerified: boolean;
  currentBalance: Money;
}

export interface ValidationResult {
  proposal: SafeProposal;
  checks: ComplianceCheck[];
  violations: PolicyViolation[];
}

export function findProhibitedPhrases(text: string): string[] {
  return PROHIBITED_PATTERNS.filter(({ pattern }) => pattern.test(text)).map(({ phrase }) => phrase);
}

const confidenceInRange = (value: number) => Number.isFinite(value) && value >= 0 && value <= 1;

export function mentionsAmounts(text: string): boolean {
  return DISCLOSURE_PATTERN.test(text);
}

/**
 * Hand-off proposal used in place of anything that cannot be sent as is.
 * Compliance labels of the source proposal are kept.
 */
export function escalateProposal(
  source: Pick<ProposedAction, 'complianceChecks' | 'confidence'>,
  reason: string,
  extraTags: readonly string[] = [VALIDATION_FAILED_TAG]
): EscalateProposal {
  const tags = [...source.complianceChecks];
  for (const tag of extraTags) {
    if (!tags.includes(tag)) tags.push(tag);
  }
  return {
    kind: 'escalate',
    message: HANDOFF_MESSAGE,
    confidence: confidenceInRange(source.confidence) ? source.confidence : 0,
    escalate: true,
    complianceChecks: tags,
    reason
  };
}

export class ResponseValidator {
  constructor(private readonly policy: NegotiationPolicy) {}

  validate(proposal: ProposedAction, context: ValidationContext): ValidationResult {
    const checks: ComplianceCheck[] = [];
    const violations: PolicyViolation[] = [];

    const plan = planOf(proposal);
    if (plan) {
      const planResult = checkPlanPolicy(plan, context.currentBalance, this.policy);
      checks.push(...planResult.checks);
      violations.push(...planResult.violations);
    }

    const phrases = findProhibitedPhrases(proposal.message);
    if (phrases.length > 0) {
      const message = `Prohibited language detected: ${phrases.join(', ')}`;
      checks.push({ name: 'prohibited_language', passed: false, severity: 'critical', details: message });
      violations.push({ code: 'prohibited_language', message, severity: 'critical' });
    } else {
      checks.push({ name: 'prohibited_language', passed: true, severity: 'info', details: 'No prohibited language' });
    }

    if (!context.identityVerified && proposal.kind !== 'verify_identity') {
      if (mentionsAmounts(proposal.message)) {
        const message = 'Account details disclosed before identity verification';
        checks.push({ name: 'identity_verification', passed: false, severity: 'error', details: message });
        violations.push({ code: 'identity_verification', message, severity: 'error' });
      } else {
        checks.push({ name: 'identity_verification', passed: true, severity: 'info', details: 'No account details disclosed' });
      }
    }

    if (confidenceInRange(proposal.confidence)) {
      checks.push({ name: 'confidence', passed: true, severity: 'info', details: 'Confidence within [0, 1]' });
    } else {
      const message = `Confidence ${proposal.confidence} is outside [0, 1]`;
      checks.push({ name: 'confidence', passed: false, severity: 'error', details: message });
      violations.push({ code: 'invalid_confidence', message, severity: 'error' });
    }

    if (violations.length === 0 || requestsEscalation(proposal)) {
      return { proposal: { ...proposal, validated: true }, checks, violations };
    }

    const codes = [...new Set(violations.map((v) => v.code))];
    const replacement = escalateProposal(proposal, `Response failed validation: ${codes.join(', ')}`);
    return { proposal: { ...replacement, validated: true }, checks, violations };
  }
}
