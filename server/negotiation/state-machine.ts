/**
 * Conversation State Machine
 *
 * Drives one inbound message through compliance gating, response generation, validation and
 * state transition, then commits the result in a single write. Turns are serialized per
 * conversation; turns for different conversations run concurrently.
 *
 *   initiated -> identity_verification -> active_negotiation -> payment_processing
 *   any non-terminal state -> escalated | closed | opted_out
 *   escalated -> opted_out
 */

import dayjs from 'dayjs';
import { ulid } from 'ulid';
import { z } from 'zod';
import type { Logger } from 'pino';
import type { NegotiationPolicy } from '../bootstrap/config';
import { withCorrelation } from '../bootstrap/logger';
import {
  recordEscalation,
  recordGeneratorFallback,
  recordTurn,
  type EscalationCause,
  type TurnOutcome
} from '../observability/metrics';
import type { AuditChannel, AuditEventInput } from './audit-channel';
import { ContactComplianceGate } from './contact-gate';
import type { ContextRetriever } from './context-retriever';
import { ErrorCode, PersistenceError, TurnCancelledError, ValidationError, isAppError, parseInput } from './errors';
import { KeyedMutex } from './keyed-mutex';
import { PaymentPlanBuilder } from './plan-builder';
import { FALLBACK_PROPOSAL, invokeGenerator, type ProposalGenerator } from './proposal-generator';
import type { NegotiationRepository, TurnCommit } from './repository';
import { ResponseValidator, VALIDATION_FAILED_TAG, escalateProposal } from './response-validator';
import {
  TERMINAL_STATES,
  planOf,
  requestsEscalation,
  type Account,
  type ActionKind,
  type Clock,
  type ComplianceCheck,
  type ComplianceSeverity,
  type Conversation,
  type ConversationContext,
  type ConversationState,
  type Debtor,
  type DerivedPlan,
  type Message,
  type PaymentPlan,
  type PolicyViolation,
  type ReferenceSnippet,
  type SafeProposal,
  type ScheduleRow,
  type ScheduledPayment
} from './types';

export const OPTED_OUT_MESSAGE = 'This contact has opted out of communications. No further messages will be sent.';
export const ESCALATED_MESSAGE = 'Your conversation has been transferred to a specialist, who will follow up with you shortly.';
export const CLOSED_MESSAGE = 'This conversation has been closed. Please start a new conversation if you need further assistance.';

export const blockedMessage = (reason: string) => `Contact not allowed at this time: ${reason}`;

// Window the contact history is read over: the trailing week plus a day of timezone slack
const CONTACT_HISTORY_DAYS = 8;
const REFERENCE_TOP_K = 2;

const TRANSITIONS: Record<ConversationState, readonly ConversationState[]> = {
  initiated: ['identity_verification', 'active_negotiation', 'escalated', 'closed', 'opted_out'],
  identity_verification: ['active_negotiation', 'escalated', 'closed', 'opted_out'],
  active_negotiation: ['identity_verification', 'payment_processing', 'escalated', 'closed', 'opted_out'],
  payment_processing: ['identity_verification', 'active_negotiation', 'escalated', 'closed', 'opted_out'],
  escalated: ['opted_out'],
  closed: [],
  opted_out: []
};

export function canTransition(from: ConversationState, to: ConversationState): boolean {
  if (from === to) return !TERMINAL_STATES.includes(from);
  return TRANSITIONS[from].includes(to);
}

/**
 * Move `conversation` to `to`, stamping escalation details when it is escalated.
 * Throws INVALID_STATE for a transition the lifecycle does not allow.
 */
export function transition(conversation: Conversation, to: ConversationState, now: Date, reason?: string): Conversation {
  if (!canTransition(conversation.state, to)) {
    throw new ValidationError(
      `Conversation ${conversation.id} cannot move from ${conversation.state} to ${to}`,
      { conversationId: conversation.id, from: conversation.state, to },
      ErrorCode.INVALID_STATE
    );
  }
  const next: Conversation = { ...conversation, state: to, lastActivityAt: now };
  if (to === 'escalated') {
    next.escalationReason = reason ?? 'Escalated';
    next.escalationDate = now;
  }
  return next;
}

export function draftConversation(sessionId: string, account: Account, channel: Conversation['channel'], now: Date): Conversation {
  return {
    id: sessionId,
    accountId: account.id,
    debtorId: account.debtorId,
    state: 'initiated',
    channel,
    sessionData: {},
    identityVerified: false,
    verificationAttempts: 0,
    escalationReason: null,
    escalationDate: null,
    lastActivityAt: now,
    openedAt: now
  };
}

export const turnInputSchema = z.object({
  sessionId: z.string().trim().min(1).max(128),
  accountId: z.string().trim().min(1),
  message: z.string().trim().min(1).max(4000),
  channel: z.enum(['chat', 'sms', 'email', 'voice']).default('chat'),
  metadata: z.record(z.unknown()).optional()
});

export type TurnInput = z.input<typeof turnInputSchema>;

export interface ProposedPlanView extends DerivedPlan {
  id: string;
  status: PaymentPlan['status'];
  schedule: ScheduleRow[];
}

export type TurnResponse =
  | {
      status: 'responded';
      conversationId: string;
      state: ConversationState;
      message: string;
      action: ActionKind;
      confidence: number;
      complianceTags: string[];
      escalated: boolean;
      plan?: ProposedPlanView;
      violations: PolicyViolation[];
    }
  | { status: 'blocked'; conversationId: string; message: string; reason: string; severity: ComplianceSeverity }
  | { status: 'opted_out'; conversationId: string; message: string }
  | { status: 'handed_off'; conversationId: string; state: ConversationState; message: string };

export interface TurnOptions {
  signal?: AbortSignal;
}

export interface NegotiationDeps {
  repository: NegotiationRepository;
  generator: ProposalGenerator;
  retriever?: ContextRetriever;
  audit: AuditChannel;
  policy: NegotiationPolicy;
  logger: Logger;
  clock?: Clock;
  mutex?: KeyedMutex;
  generatorTimeoutMs?: number;
  recentMessageLimit?: number;
}

export function checksToAudit(
  prefix: string,
  checks: readonly ComplianceCheck[],
  ids: { conversationId: string; accountId: string; debtorId: string },
  createdAt: Date
): AuditEventInput[] {
  return checks.map((check) => ({
    eventType: `${prefix}.${check.name}`,
    severity: check.severity,
    passed: check.passed,
    description: check.details,
    ...ids,
    createdAt
  }));
}

interface TurnScope {
  account: Account;
  debtor: Debtor;
  conversation: Conversation;
  isNew: boolean;
  now: Date;
}

export class ConversationStateMachine {
  private readonly repository: NegotiationRepository;
  private readonly generator: ProposalGenerator;
  private readonly retriever?: ContextRetriever;
  private readonly audit: AuditChannel;
  private readonly logger: Logger;
  private readonly clock: Clock;
  private readonly mutex: KeyedMutex;
  private readonly generatorTimeoutMs: number;
  private readonly recentMessageLimit: number;
  private readonly gate: ContactComplianceGate;
  private readonly validator: ResponseValidator;
  private readonly planBuilder: PaymentPlanBuilder;

  constructor(deps: NegotiationDeps) {
    this.repository = deps.repository;
    this.generator = deps.generator;
    this.retriever = deps.retriever;
    this.audit = deps.audit;
    this.logger = deps.logger.child({ component: 'state-machine' });
    this.clock = deps.clock ?? (() => new Date());
    this.mutex = deps.mutex ?? new KeyedMutex();
    this.generatorTimeoutMs = deps.generatorTimeoutMs ?? 30_000;
    this.recentMessageLimit = deps.recentMessageLimit ?? 10;
    this.gate = new ContactComplianceGate(deps.policy, deps.logger.child({ component: 'contact-gate' }));
    this.validator = new ResponseValidator(deps.policy);
    this.planBuilder = new PaymentPlanBuilder(deps.policy);
  }

  async handleTurn(rawInput: TurnInput, options: TurnOptions = {}): Promise<TurnResponse> {
    const input = parseInput(turnInputSchema, rawInput);
    const started = Date.now();

    try {
      const response = await this.mutex.runExclusive(input.sessionId, () =>
        withCorrelation(ulid(), () => this.runTurn(input, options.signal))
      );
      recordTurn(response.status, Date.now() - started);
      return response;
    } catch (error) {
      const outcome: TurnOutcome = error instanceof TurnCancelledError ? 'cancelled' : 'failed';
      recordTurn(outcome, Date.now() - started);
      throw error;
    }
  }

  private async runTurn(input: z.output<typeof turnInputSchema>, signal?: AbortSignal): Promise<TurnResponse> {
    const scope = await this.loadScope(input);
    const { account, debtor, now } = scope;
    let { conversation } = scope;
    const ids = { conversationId: conversation.id, accountId: account.id, debtorId: debtor.id };

    if (conversation.state === 'opted_out') {
      this.logger.info({ conversationId: conversation.id }, '[Turn] Conversation opted out, not responding');
      this.audit.publish({
        eventType: 'contact_attempt_after_opt_out',
        severity: 'warning',
        passed: true,
        description: 'Inbound message on an opted-out conversation was not answered',
        ...ids,
        createdAt: now
      });
      return { status: 'opted_out', conversationId: conversation.id, message: OPTED_OUT_MESSAGE };
    }

    const since = dayjs(now).subtract(CONTACT_HISTORY_DAYS, 'day').toDate();
    const history = await this.repository.listContactHistory(debtor.id, since, conversation.id);
    const gate = this.gate.evaluate(debtor, history, now);
    const auditTrail: AuditEventInput[] = checksToAudit('contact_gate', gate.checks, ids, now);

    if (!gate.allowed) {
      this.logger.info({ conversationId: conversation.id, reason: gate.reason }, '[Turn] Contact blocked');
      this.audit.publishAll(auditTrail);
      return {
        status: 'blocked',
        conversationId: conversation.id,
        message: blockedMessage(gate.reason),
        reason: gate.reason,
        severity: gate.severity
      };
    }

    const inbound = this.message(conversation.id, 'user', input.message, now, { metadata: input.metadata ?? {} });

    if (conversation.state === 'escalated' || conversation.state === 'closed') {
      const updated: Conversation = { ...conversation, lastActivityAt: now };
      await this.commit({ conversation: updated, messages: [inbound] });
      this.audit.publishAll(auditTrail);
      return {
        status: 'handed_off',
        conversationId: conversation.id,
        state: updated.state,
        message: conversation.state === 'escalated' ? ESCALATED_MESSAGE : CLOSED_MESSAGE
      };
    }

    const stored = scope.isNew ? [] : await this.repository.listRecentMessages(conversation.id, this.recentMessageLimit);
    const recentMessages = [...stored, inbound]
      .slice(-this.recentMessageLimit)
      .map(({ role, content, createdAt }) => ({ role, content, createdAt }));
    const context: ConversationContext = {
      conversationId: conversation.id,
      state: conversation.state,
      channel: conversation.channel,
      identityVerified: conversation.identityVerified,
      verificationAttempts: conversation.verificationAttempts,
      sessionData: conversation.sessionData,
      recentMessages,
      account: {
        id: account.id,
        currentBalance: account.currentBalance,
        currency: account.currency,
        daysOverdue: account.daysOverdue
      }
    };
    const references = await this.retrieveReferences(input.message, account, debtor);

    const generation = await invokeGenerator(
      this.generator,
      { message: input.message, context, references },
      this.generatorTimeoutMs,
      signal
    );
    if (signal?.aborted || (!generation.ok && generation.error.kind === 'cancelled')) {
      throw new TurnCancelledError(conversation.id);
    }

    let fellBack = false;
    const proposal = generation.ok ? generation.proposal : { ...FALLBACK_PROPOSAL, complianceChecks: [...FALLBACK_PROPOSAL.complianceChecks] };
    if (!generation.ok) {
      fellBack = true;
      recordGeneratorFallback(generation.error.kind);
      this.logger.warn({ conversationId: conversation.id, error: generation.error }, '[Turn] Generator failed, using fallback');
      auditTrail.push({
        eventType: 'generator_failure',
        severity: 'error',
        passed: false,
        description: `Response generation failed (${generation.error.kind}): ${generation.error.message}`,
        ...ids,
        createdAt: now
      });
    }

    const validation = this.validator.validate(proposal, {
      identityVerified: conversation.identityVerified,
      currentBalance: account.currentBalance
    });
    auditTrail.push(...checksToAudit('response_validation', validation.checks, ids, now));
    let safe: SafeProposal = validation.proposal;
    const violations = [...validation.violations];
    let cause: EscalationCause | undefined;
    if (violations.length > 0 && !requestsEscalation(proposal)) {
      cause = 'validation';
    }

    let plan: { plan: PaymentPlan; schedule: ScheduledPayment[]; rows: ScheduleRow[] } | undefined;
    let next: Conversation = { ...conversation, lastActivityAt: now };

    if (!requestsEscalation(safe)) {
      switch (safe.kind) {
        case 'verify_identity':
          if (conversation.state !== 'identity_verification') {
            next = transition(next, 'identity_verification', now);
          }
          break;
        case 'propose_plan':
        case 'collect_payment': {
          if (conversation.state !== 'active_negotiation') {
            next = transition(next, 'active_negotiation', now);
          }
          const proposed = planOf(safe);
          if (proposed) {
            const built = this.planBuilder.build(account.currentBalance, proposed, now);
            if (built.ok) {
              plan = this.planRecord(account, conversation.id, built.plan, built.schedule, now);
            } else {
              // Guard only: the validator applies the same checkPlanPolicy first
              violations.push(...built.violations);
              const codes = [...new Set(built.violations.map((v) => v.code))];
              safe = { ...escalateProposal(safe, `Payment plan outside policy: ${codes.join(', ')}`, ['plan_policy_violation', VALIDATION_FAILED_TAG]), validated: true };
              cause = 'plan_policy';
            }
          }
          break;
        }
        case 'close':
          next = transition(next, 'closed', now);
          break;
        default:
          break;
      }
    }

    if (requestsEscalation(safe)) {
      cause = cause ?? (fellBack ? 'generator_failure' : 'proposal');
      const reason = safe.kind === 'escalate' && safe.reason ? safe.reason : 'Escalation requested by response';
      next = transition(next, 'escalated', now, reason);
      auditTrail.push({
        eventType: 'escalation',
        severity: cause === 'proposal' ? 'info' : 'warning',
        passed: true,
        description: `Conversation escalated: ${reason}`,
        ...ids,
        metadata: { cause, violations: violations.map((v) => v.code) },
        createdAt: now
      });
    }

    if (plan) {
      auditTrail.push({
        eventType: 'payment_plan_proposed',
        severity: 'info',
        passed: true,
        description: `${plan.plan.kind} plan proposed: ${plan.plan.installmentCount} x ${plan.plan.installmentAmount}`,
        ...ids,
        metadata: { planId: plan.plan.id, totalAmount: plan.plan.totalAmount },
        createdAt: now
      });
    }

    // Outbound sorts after inbound even when both carry the same clock reading
    const outbound = this.message(conversation.id, 'assistant', safe.message, new Date(now.getTime() + 1), {
      confidence: safe.confidence,
      complianceTags: [...safe.complianceChecks],
      metadata: {
        action: safe.kind,
        ...(plan ? { planId: plan.plan.id } : {}),
        ...(violations.length > 0 ? { violations: violations.map((v) => v.code) } : {})
      }
    });

    if (signal?.aborted) {
      throw new TurnCancelledError(conversation.id);
    }

    await this.commit({
      conversation: next,
      messages: [inbound, outbound],
      plan: plan ? { plan: plan.plan, schedule: plan.schedule } : undefined
    });
    conversation = next;

    if (cause) recordEscalation(cause);
    this.audit.publishAll(auditTrail);

    this.logger.info(
      { conversationId: conversation.id, action: safe.kind, state: conversation.state, violations: violations.length },
      '[Turn] Turn committed'
    );

    return {
      status: 'responded',
      conversationId: conversation.id,
      state: conversation.state,
      message: safe.message,
      action: safe.kind,
      confidence: safe.confidence,
      complianceTags: [...safe.complianceChecks],
      escalated: conversation.state === 'escalated',
      plan: plan
        ? {
            id: plan.plan.id,
            status: plan.plan.status,
            kind: plan.plan.kind,
            totalAmount: plan.plan.totalAmount,
            installmentAmount: plan.plan.installmentAmount,
            installmentCount: plan.plan.installmentCount,
            firstDueDate: plan.plan.firstDueDate,
            frequency: plan.plan.frequency,
            schedule: plan.rows
          }
        : undefined,
      violations
    };
  }

  private async loadScope(input: z.output<typeof turnInputSchema>): Promise<TurnScope> {
    const account = await this.repository.getAccount(input.accountId);
    if (!account) throw ValidationError.notFound('Account', input.accountId);

    const debtor = await this.repository.getDebtor(account.debtorId);
    if (!debtor) throw ValidationError.notFound('Debtor', account.debtorId);

    const now = this.clock();
    const existing = await this.repository.getConversation(input.sessionId);
    if (existing && existing.accountId !== account.id) {
      throw new ValidationError(
        `Session ${input.sessionId} belongs to a different account`,
        { sessionId: input.sessionId, accountId: account.id }
      );
    }

    return {
      account,
      debtor,
      conversation: existing ?? draftConversation(input.sessionId, account, input.channel, now),
      isNew: existing === null,
      now
    };
  }

  private async retrieveReferences(query: string, account: Account, debtor: Debtor): Promise<ReferenceSnippet[]> {
    if (!this.retriever) return [];
    try {
      return await this.retriever.retrieve({ query, accountId: account.id, debtorId: debtor.id, topK: REFERENCE_TOP_K });
    } catch (error) {
      this.logger.warn({ err: error, accountId: account.id }, '[Turn] Reference retrieval failed, continuing without');
      return [];
    }
  }

  private async commit(commit: TurnCommit): Promise<void> {
    try {
      await this.repository.commitTurn(commit);
    } catch (error) {
      this.logger.error({ err: error, conversationId: commit.conversation.id }, '[Turn] Commit failed, turn rolled back');
      if (isAppError(error)) throw error;
      throw new PersistenceError('Failed to commit turn', error);
    }
  }

  private message(
    conversationId: string,
    role: Message['role'],
    content: string,
    createdAt: Date,
    extra: Partial<Pick<Message, 'confidence' | 'complianceTags' | 'metadata'>> = {}
  ): Message {
    return {
      id: ulid(),
      conversationId,
      role,
      content,
      confidence: extra.confidence ?? null,
      complianceTags: extra.complianceTags ?? [],
      metadata: extra.metadata ?? {},
      createdAt
    };
  }

  private planRecord(
    account: Account,
    conversationId: string,
    derived: DerivedPlan,
    rows: ScheduleRow[],
    now: Date
  ): { plan: PaymentPlan; schedule: ScheduledPayment[]; rows: ScheduleRow[] } {
    const plan: PaymentPlan = {
      id: ulid(),
      accountId: account.id,
      conversationId,
      kind: derived.kind,
      totalAmount: derived.totalAmount,
      installmentAmount: derived.installmentAmount,
      installmentCount: derived.installmentCount,
      firstDueDate: derived.firstDueDate,
      frequency: derived.frequency,
      status: 'proposed',
      acceptedAt: null,
      completedAt: null,
      createdAt: now
    };
    const schedule: ScheduledPayment[] = rows.map((row) => ({
      id: ulid(),
      planId: plan.id,
      installmentNo: row.installmentNo,
      dueDate: row.dueDate,
      amount: row.amount,
      paidAmount: '0.00',
      status: 'pending',
      paidAt: null,
      transactionId: null
    }));
    return { plan, schedule, rows };
  }
}
