/**
 * Negotiation Service
 *
 * Operations surface of the negotiation core. Turns go through the state machine; the other
 * operations change conversations, plans and accounts directly under the same
 * per-conversation lock so they never interleave with a turn.
 */

import Decimal from 'decimal.js';
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import { ulid } from 'ulid';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { NegotiationPolicy } from '../bootstrap/config';
import { maskAccountNumber } from '../logging/redact';
import { recordEscalation } from '../observability/metrics';
import {
  insertAccountSchema,
  insertDebtorSchema,
  type ComplianceEventRecord,
  type PaymentTransaction
} from '../../shared/schema';
import type { AuditChannel } from './audit-channel';
import { ErrorCode, ValidationError, parseInput } from './errors';
import { IdentityVerifier, identityClaimsSchema, type IdentityClaims, type VerificationOutcome } from './identity-verifier';
import { KeyedMutex } from './keyed-mutex';
import { allocatePayment } from './payment-allocation';
import type { NegotiationRepository } from './repository';
import {
  ConversationStateMachine,
  checksToAudit,
  transition,
  type NegotiationDeps,
  type TurnInput,
  type TurnOptions,
  type TurnResponse
} from './state-machine';
import type {
  Account,
  Clock,
  Conversation,
  ConversationState,
  Debtor,
  Money,
  PaymentPlan,
  ScheduledPayment
} from './types';

dayjs.extend(utc);

export const DEBT_VALIDATION_REASON = 'Debt validation requested';

const priorities = ['low', 'normal', 'high', 'urgent'] as const;
export type EscalationPriority = (typeof priorities)[number];

const escalationSchema = z.object({
  reason: z.string().trim().min(1).max(500),
  priority: z.enum(priorities).default('normal'),
  notes: z.string().max(2000).optional()
});

const moneySchema = z
  .union([z.string().trim(), z.number()])
  .transform((v, ctx) => {
    const raw = typeof v === 'number' ? String(v) : v;
    if (!/^\d+(\.\d{1,2})?$/.test(raw)) {
      ctx.addIssue({ code: z.ZodIssueCode.custom, message: 'Must be a positive amount with at most two decimals.' });
      return z.NEVER;
    }
    return new Decimal(raw).toFixed(2);
  })
  .refine((v) => new Decimal(v).gt(0), 'Must be greater than zero.');

const paymentSchema = z.object({
  accountId: z.string().trim().min(1),
  amount: moneySchema,
  method: z.string().trim().min(1).max(50),
  conversationId: z.string().trim().min(1).optional()
});

export type RecordPaymentInput = z.input<typeof paymentSchema>;

export function estimatedResponseTime(priority: EscalationPriority): string {
  return priority === 'high' || priority === 'urgent' ? '2-4 hours' : '24-48 hours';
}

export interface VerifyIdentityResult {
  conversationId: string;
  outcome: VerificationOutcome;
  state: ConversationState;
}

export interface EscalationResult {
  conversationId: string;
  state: ConversationState;
  priority: EscalationPriority;
  estimatedResponseTime: string;
}

export interface OptOutResult {
  debtorId: string;
  optOutDate: Date;
  conversationIds: string[];
}

export interface PaymentResult {
  transactionId: string;
  accountId: string;
  amount: Money;
  newBalance: Money;
  plan?: { id: string; status: PaymentPlan['status']; installmentsUpdated: number[] };
}

export type ComplianceStatus = 'passed' | 'warning' | 'failed';

export interface ComplianceReport {
  conversationId: string;
  status: ComplianceStatus;
  requiresHumanReview: boolean;
  totalEvents: number;
  failedChecks: Array<Pick<ComplianceEventRecord, 'eventType' | 'severity' | 'description' | 'createdAt'>>;
}

export function summarizeCompliance(conversationId: string, events: readonly ComplianceEventRecord[]): ComplianceReport {
  const failed = events.filter((e) => !e.passed);
  const critical = events.some((e) => e.severity === 'critical' && !e.passed);
  const serious = failed.some((e) => e.severity === 'error' || e.severity === 'critical');

  let status: ComplianceStatus = 'passed';
  if (critical) {
    status = 'failed';
  } else if (failed.some((e) => e.severity === 'error' || e.severity === 'warning')) {
    status = 'warning';
  }

  return {
    conversationId,
    status,
    requiresHumanReview: serious,
    totalEvents: events.length,
    failedChecks: failed.map(({ eventType, severity, description, createdAt }) => ({ eventType, severity, description, createdAt }))
  };
}

export class NegotiationService {
  private readonly repository: NegotiationRepository;
  private readonly audit: AuditChannel;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly mutex: KeyedMutex;
  private readonly activePolicy: NegotiationPolicy;
  private readonly verifier: IdentityVerifier;
  private readonly stateMachine: ConversationStateMachine;

  constructor(deps: NegotiationDeps) {
    this.repository = deps.repository;
    this.audit = deps.audit;
    this.logger = deps.logger.child({ component: 'negotiation-service' });
    this.clock = deps.clock ?? (() => new Date());
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.activePolicy = deps.policy;
    this.verifier = new IdentityVerifier(deps.policy);
    this.stateMachine = new ConversationStateMachine({ ...deps, mutex: this.mutex, clock: this.clock });
  }

  policy(): NegotiationPolicy {
    return this.activePolicy;
  }

  handleTurn(input: TurnInput, options: TurnOptions = {}): Promise<TurnResponse> {
    return this.stateMachine.handleTurn(input, options);
  }

  async registerDebtor(input: unknown): Promise<Debtor> {
    const debtor = await this.repository.insertDebtor(parseInput(insertDebtorSchema, input));
    this.logger.info({ debtorId: debtor.id }, '[Service] Debtor registered');
    return debtor;
  }

  async registerAccount(input: unknown): Promise<Account> {
    const data = parseInput(insertAccountSchema, input);
    const debtor = await this.repository.getDebtor(data.debtorId);
    if (!debtor) throw ValidationError.notFound('Debtor', data.debtorId);

    const account = await this.repository.insertAccount(data);
    this.logger.info(
      { accountId: account.id, debtorId: debtor.id, accountNumber: maskAccountNumber(account.accountNumber) },
      '[Service] Account registered'
    );
    return account;
  }

  async verifyIdentity(conversationId: string, claims: IdentityClaims): Promise<VerifyIdentityResult> {
    const parsedClaims = parseInput(identityClaimsSchema, claims);

    return this.mutex.runExclusive(conversationId, async () => {
      const conversation = await this.requireConversation(conversationId);
      const account = await this.requireAccount(conversation.accountId);
      const debtor = await this.requireDebtor(conversation.debtorId);
      const now = this.clock();

      const result = this.verifier.verify(conversation, debtor, account, parsedClaims, now);
      await this.repository.commitConversations([result.conversation]);

      const ids = { conversationId, accountId: account.id, debtorId: debtor.id };
      const events = checksToAudit('identity_verification', result.checks, ids, now);
      events.push({
        eventType: 'identity_verification',
        severity: result.outcome.status === 'locked' ? 'critical' : result.outcome.status === 'failed' ? 'warning' : 'info',
        passed: result.outcome.status === 'verified',
        description: `Identity verification ${result.outcome.status}, ${result.outcome.attemptsRemaining} attempts remaining`,
        ...ids,
        metadata: { attempts: result.conversation.verificationAttempts },
        createdAt: now
      });
      this.audit.publishAll(events);

      if (result.outcome.status === 'locked' && conversation.state !== 'escalated') {
        recordEscalation('verification_lockout');
      }
      this.logger.info({ conversationId, outcome: result.outcome.status }, '[Service] Identity verification attempt');

      return { conversationId, outcome: result.outcome, state: result.conversation.state };
    });
  }

  /**
   * Record the debtor's opt-out and close off every conversation of theirs that is still open.
   */
  async requestOptOut(conversationId: string): Promise<OptOutResult> {
    const seed = await this.requireConversation(conversationId);
    const listed = () => this.repository.listConversationsByDebtor(seed.debtorId);

    return this.withConversationLocks(conversationId, listed, async (conversations) => {
      const now = this.clock();
      const updated = conversations
        .filter((c) => c.state !== 'closed' && c.state !== 'opted_out')
        .map((c) => transition(c, 'opted_out', now));

      await this.repository.commitOptOut({ debtorId: seed.debtorId, optOutDate: now, conversations: updated });

      this.audit.publish({
        eventType: 'opt_out',
        severity: 'info',
        passed: true,
        description: `Debtor opted out of communications, ${updated.length} conversations closed to contact`,
        conversationId,
        accountId: seed.accountId,
        debtorId: seed.debtorId,
        metadata: { conversationIds: updated.map((c) => c.id) },
        createdAt: now
      });
      this.logger.info({ debtorId: seed.debtorId, conversations: updated.length }, '[Service] Opt-out recorded');

      return { debtorId: seed.debtorId, optOutDate: now, conversationIds: updated.map((c) => c.id) };
    });
  }

  async requestDebtValidation(conversationId: string): Promise<{ escalatedConversationIds: string[] }> {
    const seed = await this.requireConversation(conversationId);
    const listed = () => this.repository.listConversationsByAccount(seed.accountId);

    return this.withConversationLocks(conversationId, listed, async (conversations) => {
      const now = this.clock();
      const updated = conversations
        .filter((c) => c.debtorId === seed.debtorId && c.state === 'active_negotiation')
        .map((c) => transition(c, 'escalated', now, DEBT_VALIDATION_REASON));

      if (updated.length > 0) {
        await this.repository.commitConversations(updated);
        updated.forEach(() => recordEscalation('debt_validation'));
      }

      this.audit.publish({
        eventType: 'debt_validation_requested',
        severity: 'warning',
        passed: true,
        description: `Debt validation requested, ${updated.length} conversations escalated`,
        conversationId,
        accountId: seed.accountId,
        debtorId: seed.debtorId,
        metadata: { conversationIds: updated.map((c) => c.id) },
        createdAt: now
      });

      return { escalatedConversationIds: updated.map((c) => c.id) };
    });
  }

  async escalateToHuman(
    conversationId: string,
    reason: string,
    priority: EscalationPriority = 'normal',
    notes?: string
  ): Promise<EscalationResult> {
    const input = parseInput(escalationSchema, { reason, priority, notes });

    return this.mutex.runExclusive(conversationId, async () => {
      const conversation = await this.requireConversation(conversationId);
      const result: EscalationResult = {
        conversationId,
        state: 'escalated',
        priority: input.priority,
        estimatedResponseTime: estimatedResponseTime(input.priority)
      };
      if (conversation.state === 'escalated') {
        return result;
      }

      const now = this.clock();
      const escalated = transition(conversation, 'escalated', now, input.reason);
      escalated.sessionData = {
        ...escalated.sessionData,
        escalation: { priority: input.priority, notes: input.notes ?? null }
      };
      await this.repository.commitConversations([escalated]);
      recordEscalation('manual');

      this.audit.publish({
        eventType: 'escalation',
        severity: input.priority === 'urgent' ? 'warning' : 'info',
        passed: true,
        description: `Conversation escalated: ${input.reason}`,
        conversationId,
        accountId: conversation.accountId,
        debtorId: conversation.debtorId,
        metadata: { cause: 'manual', priority: input.priority },
        createdAt: now
      });
      this.logger.info({ conversationId, priority: input.priority }, '[Service] Escalated to human agent');

      return result;
    });
  }

  async acceptPlan(planId: string): Promise<{ plan: PaymentPlan; schedule: ScheduledPayment[] }> {
    const initial = await this.repository.getPlan(planId);
    if (!initial) throw ValidationError.notFound('Payment plan', planId);

    const accept = async () => {
      const plan = await this.repository.getPlan(planId);
      if (!plan) throw ValidationError.notFound('Payment plan', planId);
      if (plan.status !== 'proposed') {
        throw new ValidationError(`Payment plan ${planId} is ${plan.status}`, { planId, status: plan.status }, ErrorCode.INVALID_STATE);
      }

      const now = this.clock();
      let conversation: Conversation | undefined;
      if (plan.conversationId) {
        const current = await this.requireConversation(plan.conversationId);
        conversation = transition(current, 'payment_processing', now);
      }

      await this.repository.updatePlanStatus({ planId, status: 'accepted', acceptedAt: now, conversation });

      this.audit.publish({
        eventType: 'payment_plan_accepted',
        severity: 'info',
        passed: true,
        description: `${plan.kind} plan accepted: ${plan.installmentCount} x ${plan.installmentAmount}`,
        conversationId: plan.conversationId,
        accountId: plan.accountId,
        metadata: { planId },
        createdAt: now
      });

      return {
        plan: { ...plan, status: 'accepted' as const, acceptedAt: now },
        schedule: await this.repository.getSchedule(planId)
      };
    };

    return initial.conversationId ? this.mutex.runExclusive(initial.conversationId, accept) : accept();
  }

  /**
   * Record a payment against the account. No money moves here; the balance, last-payment
   * fields and the open plan's schedule are updated in one write.
   */
  async recordPayment(input: RecordPaymentInput): Promise<PaymentResult> {
    const data = parseInput(paymentSchema, input);

    return this.mutex.runExclusive(`account:${data.accountId}`, async () => {
      const account = await this.requireAccount(data.accountId);
      const balance = new Decimal(account.currentBalance);
      if (new Decimal(data.amount).gt(balance)) {
        throw new ValidationError(
          `Payment ${data.amount} exceeds the outstanding balance ${balance.toFixed(2)}`,
          { accountId: account.id, amount: data.amount, balance: balance.toFixed(2) }
        );
      }
      if (data.conversationId) {
        const conversation = await this.requireConversation(data.conversationId);
        if (conversation.accountId !== account.id) {
          throw new ValidationError(`Conversation ${data.conversationId} belongs to a different account`, {
            conversationId: data.conversationId,
            accountId: account.id
          });
        }
      }

      const now = this.clock();
      const newBalance = balance.minus(data.amount).toFixed(2);
      const transaction: PaymentTransaction = {
        id: ulid(),
        accountId: account.id,
        planId: null,
        conversationId: data.conversationId ?? null,
        amount: data.amount,
        method: data.method,
        recordedAt: now
      };

      const openPlan = await this.repository.findOpenPlan(account.id);
      let allocation: ReturnType<typeof allocatePayment> | undefined;
      if (openPlan) {
        allocation = allocatePayment(openPlan, await this.repository.getSchedule(openPlan.id), data.amount, transaction.id, now);
        transaction.planId = openPlan.id;
      }

      const updatedAccount: Account = {
        ...account,
        currentBalance: newBalance,
        lastPaymentAmount: data.amount,
        lastPaymentDate: dayjs.utc(now).format('YYYY-MM-DD'),
        status: new Decimal(newBalance).isZero() ? 'paid' : account.status,
        updatedAt: now
      };

      await this.repository.commitPayment({
        transaction,
        account: updatedAccount,
        plan: allocation?.plan,
        schedule: allocation?.updated ?? []
      });

      this.audit.publish({
        eventType: 'payment_recorded',
        severity: 'info',
        passed: true,
        description: `Payment of ${data.amount} recorded via ${data.method}`,
        conversationId: data.conversationId ?? null,
        accountId: account.id,
        debtorId: account.debtorId,
        metadata: { transactionId: transaction.id, planId: transaction.planId, newBalance },
        createdAt: now
      });
      this.logger.info(
        { accountId: account.id, accountNumber: maskAccountNumber(account.accountNumber), planId: transaction.planId },
        '[Service] Payment recorded'
      );

      return {
        transactionId: transaction.id,
        accountId: account.id,
        amount: data.amount,
        newBalance,
        plan: allocation
          ? {
              id: allocation.plan.id,
              status: allocation.plan.status,
              installmentsUpdated: allocation.updated.map((row) => row.installmentNo)
            }
          : undefined
      };
    });
  }

  async getConversation(conversationId: string): Promise<Conversation> {
    return this.requireConversation(conversationId);
  }

  async listAccountConversations(accountId: string): Promise<Conversation[]> {
    await this.requireAccount(accountId);
    return this.repository.listConversationsByAccount(accountId);
  }

  async complianceReport(conversationId: string): Promise<ComplianceReport> {
    await this.requireConversation(conversationId);
    const events = await this.repository.listComplianceEvents(conversationId);
    return summarizeCompliance(conversationId, events);
  }

  /**
   * Run `task` while holding the lock of every conversation `list` returns. A conversation that
   * appears between taking the locks and reading the list is added to the set and the locks are
   * taken again, so the task never sees a conversation another turn may still write.
   */
  private async withConversationLocks<T>(
    seedId: string,
    list: () => Promise<Conversation[]>,
    task: (conversations: Conversation[]) => Promise<T>
  ): Promise<T> {
    let keys = [seedId, ...(await list()).map((c) => c.id)];
    for (;;) {
      const held = new Set(keys);
      const outcome = await this.mutex.runExclusiveAll(
        keys,
        async (): Promise<{ done: true; value: T } | { done: false; keys: string[] }> => {
          const conversations = await list();
          const missing = conversations.filter((c) => !held.has(c.id));
          if (missing.length > 0) {
            return { done: false, keys: [...held, ...missing.map((c) => c.id)] };
          }
          return { done: true, value: await task(conversations) };
        }
      );
      if (outcome.done) {
        return outcome.value;
      }
      this.logger.debug({ seedId, keys: outcome.keys.length }, '[Service] Conversation set grew, relocking');
      keys = outcome.keys;
    }
  }

  private async requireConversation(id: string): Promise<Conversation> {
    const conversation = await this.repository.getConversation(id);
    if (!conversation) throw ValidationError.notFound('Conversation', id);
    return conversation;
  }

  private async requireAccount(id: string): Promise<Account> {
    const account = await this.repository.getAccount(id);
    if (!account) throw ValidationError.notFound('Account', id);
    return account;
  }

  private async requireDebtor(id: string): Promise<Debtor> {
    const debtor = await this.repository.getDebtor(id);
    if (!debtor) throw ValidationError.notFound('Debtor', id);
    return debtor;
  }
}
