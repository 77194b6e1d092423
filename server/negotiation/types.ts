/**
 * Negotiation domain types
 */

import type {
  Account,
  ComplianceSeverity,
  Conversation,
  ConversationChannel,
  ConversationState,
  Debtor,
  Message,
  PaymentPlan,
  PlanFrequency,
  ScheduledPayment
} from '../../shared/schema';

export type {
  Account,
  ComplianceSeverity,
  Conversation,
  ConversationChannel,
  ConversationState,
  Debtor,
  Message,
  PaymentPlan,
  PlanFrequency,
  ScheduledPayment
};

/** Decimal amount with two fractional digits, e.g. "1200.00" */
export type Money = string;

/** Calendar date, YYYY-MM-DD */
export type IsoDate = string;

export type Clock = () => Date;

export const TERMINAL_STATES: readonly ConversationState[] = ['escalated', 'closed', 'opted_out'];

// Structured plans as proposed by the generator

interface PlanProposalBase {
  firstDueDate?: IsoDate;
}

export interface SettlementProposal extends PlanProposalBase {
  kind: 'settlement';
  amount: number;
}

export interface InstallmentProposal extends PlanProposalBase {
  kind: 'installment';
  installmentAmount: number;
  installments: number;
  frequency?: PlanFrequency;
}

export interface OneTimeProposal extends PlanProposalBase {
  kind: 'one_time';
  amount: number;
}

export type PlanProposal = SettlementProposal | InstallmentProposal | OneTimeProposal;

// Proposed next actions, one variant per action kind

export type ActionKind =
  | 'inform'
  | 'collect_payment'
  | 'propose_plan'
  | 'acknowledge'
  | 'request_info'
  | 'escalate'
  | 'close'
  | 'verify_identity';

interface ProposalBase {
  message: string;
  confidence: number;
  escalate: boolean;
  complianceChecks: readonly string[];
}

export interface PlanBearingProposal extends ProposalBase {
  kind: 'propose_plan' | 'collect_payment';
  plan?: PlanProposal;
}

export interface EscalateProposal extends ProposalBase {
  kind: 'escalate';
  reason?: string;
}

export interface PlainProposal extends ProposalBase {
  kind: 'inform' | 'acknowledge' | 'request_info' | 'close' | 'verify_identity';
}

export type ProposedAction = PlanBearingProposal | EscalateProposal | PlainProposal;

/** A proposal that has been through the response validator */
export type SafeProposal = ProposedAction & { readonly validated: true };

export function planOf(proposal: ProposedAction): PlanProposal | undefined {
  return proposal.kind === 'propose_plan' || proposal.kind === 'collect_payment' ? proposal.plan : undefined;
}

export function requestsEscalation(proposal: ProposedAction): boolean {
  return proposal.kind === 'escalate' || proposal.escalate;
}

// Compliance outcomes

export interface ComplianceCheck {
  name: string;
  passed: boolean;
  severity: ComplianceSeverity;
  details: string;
}

export type PolicyViolationCode =
  | 'settlement_percentage'
  | 'installment_duration'
  | 'minimum_payment'
  | 'non_positive_amount'
  | 'invalid_due_date'
  | 'prohibited_language'
  | 'identity_verification'
  | 'invalid_confidence';

export interface PolicyViolation {
  code: PolicyViolationCode;
  message: string;
  severity: ComplianceSeverity;
}

// Derived plans

export interface ScheduleRow {
  installmentNo: number;
  dueDate: IsoDate;
  amount: Money;
}

export interface DerivedPlan {
  kind: PaymentPlan['kind'];
  totalAmount: Money;
  installmentAmount: Money;
  installmentCount: number;
  firstDueDate: IsoDate;
  frequency: PlanFrequency;
}

export interface ContactRecord {
  conversationId: string;
  openedAt: Date;
}

export interface ReferenceSnippet {
  source: string;
  content: string;
  score: number;
}

/** Context handed to the proposal generator for one turn */
export interface ConversationContext {
  conversationId: string;
  state: ConversationState;
  channel: ConversationChannel;
  identityVerified: boolean;
  verificationAttempts: number;
  sessionData: Record<string, unknown>;
  recentMessages: Array<Pick<Message, 'role' | 'content' | 'createdAt'>>;
  account: {
    id: string;
    currentBalance: Money;
    currency: string;
    daysOverdue: number;
  };
}
