/**
 * Identity Verifier
 * Multi-attempt identity check with lockout after the configured number of failures
 */

import Decimal from 'decimal.js';
import { z } from 'zod';
import type { NegotiationPolicy } from '../bootstrap/config';
import { ErrorCode, ValidationError } from './errors';
import type { Account, ComplianceCheck, Conversation, Debtor } from './types';

export const LOCKOUT_REASON = 'Maximum verification attempts exceeded';

const PAYMENT_TOLERANCE = new Decimal('0.01');

export const identityClaimsSchema = z.object({
  identifierLastDigits: z.string().trim().min(1).max(8).optional(),
  lastPaymentAmount: z.union([z.string().trim().min(1), z.number()]).optional()
}).strict();

export type IdentityClaims = z.infer<typeof identityClaimsSchema>;

export type VerificationOutcome =
  | { status: 'verified'; attemptsRemaining: number }
  | { status: 'failed'; attemptsRemaining: number }
  | { status: 'locked'; attemptsRemaining: 0 };

export interface VerificationResult {
  outcome: VerificationOutcome;
  conversation: Conversation;
  checks: ComplianceCheck[];
}

export class IdentityVerifier {
  constructor(private readonly policy: NegotiationPolicy) {}

  /**
   * Check `claims` against the system of record. Returns the conversation as it should be
   * persisted; the input conversation is left untouched.
   */
  verify(
    conversation: Conversation,
    debtor: Pick<Debtor, 'ssnLastFour'>,
    account: Pick<Account, 'lastPaymentAmount'>,
    claims: IdentityClaims,
    now: Date
  ): VerificationResult {
    const max = this.policy.maxVerificationAttempts;

    if (conversation.state === 'closed' || conversation.state === 'opted_out') {
      throw new ValidationError(
        `Conversation ${conversation.id} is ${conversation.state}`,
        { conversationId: conversation.id, state: conversation.state },
        ErrorCode.INVALID_STATE
      );
    }

    if (!conversation.identityVerified && conversation.verificationAttempts >= max) {
      return {
        outcome: { status: 'locked', attemptsRemaining: 0 },
        conversation: this.lock(conversation, now),
        checks: [{ name: 'identity_verification', passed: false, severity: 'critical', details: LOCKOUT_REASON }]
      };
    }

    if (conversation.state === 'escalated') {
      throw new ValidationError(
        `Conversation ${conversation.id} has been escalated to an agent`,
        { conversationId: conversation.id, state: conversation.state },
        ErrorCode.INVALID_STATE
      );
    }

    const checks = this.matchClaims(debtor, account, claims);
    const passed = checks.every((c) => c.passed);
    const attempts = Math.min(conversation.verificationAttempts + 1, max);
    const attemptsRemaining = max - attempts;

    if (passed) {
      return {
        outcome: { status: 'verified', attemptsRemaining },
        conversation: {
          ...conversation,
          verificationAttempts: attempts,
          identityVerified: true,
          state: 'active_negotiation',
          lastActivityAt: now
        },
        checks
      };
    }

    const attempted: Conversation = { ...conversation, verificationAttempts: attempts, lastActivityAt: now };
    if (attemptsRemaining === 0) {
      return {
        outcome: { status: 'locked', attemptsRemaining: 0 },
        conversation: this.lock(attempted, now),
        checks
      };
    }

    return { outcome: { status: 'failed', attemptsRemaining }, conversation: attempted, checks };
  }

  private matchClaims(
    debtor: Pick<Debtor, 'ssnLastFour'>,
    account: Pick<Account, 'lastPaymentAmount'>,
    claims: IdentityClaims
  ): ComplianceCheck[] {
    const checks: ComplianceCheck[] = [];

    // Facts missing from the claim are not checked
    if (claims.identifierLastDigits !== undefined) {
      const ok = debtor.ssnLastFour !== null && claims.identifierLastDigits === debtor.ssnLastFour;
      checks.push({
        name: 'identifier_last_digits',
        passed: ok,
        severity: ok ? 'info' : 'error',
        details: ok ? 'Identifier digits matched' : 'Identifier digits did not match'
      });
    }

    if (claims.lastPaymentAmount !== undefined) {
      const ok = amountMatches(claims.lastPaymentAmount, account.lastPaymentAmount ?? '0');
      checks.push({
        name: 'last_payment_amount',
        passed: ok,
        severity: ok ? 'info' : 'error',
        details: ok ? 'Last payment amount matched' : 'Last payment amount did not match'
      });
    }

    return checks;
  }

  private lock(conversation: Conversation, now: Date): Conversation {
    if (conversation.state === 'escalated') return conversation;
    return {
      ...conversation,
      state: 'escalated',
      escalationReason: LOCKOUT_REASON,
      escalationDate: now,
      lastActivityAt: now
    };
  }
}

function amountMatches(claimed: string | number, recorded: string): boolean {
  let provided: Decimal;
  try {
    provided = new Decimal(typeof claimed === 'string' ? claimed.replace(/[$,\s]/g, '') : claimed);
  } catch {
    return false;
  }
  if (!provided.isFinite()) return false;
  return provided.minus(recorded).abs().lte(PAYMENT_TOLERANCE);
}
