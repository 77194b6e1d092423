/**
 * Persistence contract for the negotiation core.
 *
 * Every `commit*` and `update*` method is all-or-nothing: it either applies every change it
 * was given or none of them, and reports failure with a PersistenceError.
 */

import type {
  ComplianceEventRecord,
  InsertAccount,
  InsertDebtor,
  PaymentTransaction,
  PlanStatus
} from '../../shared/schema';
import type {
  Account,
  ContactRecord,
  Conversation,
  Debtor,
  Message,
  PaymentPlan,
  ScheduledPayment
} from './types';

export interface TurnCommit {
  /** Inserted when new, otherwise replaced */
  conversation: Conversation;
  messages: Message[];
  plan?: { plan: PaymentPlan; schedule: ScheduledPayment[] };
}

export interface OptOutCommit {
  debtorId: string;
  optOutDate: Date;
  conversations: Conversation[];
}

export interface PaymentCommit {
  transaction: PaymentTransaction;
  account: Account;
  plan?: PaymentPlan;
  schedule: ScheduledPayment[];
}

export interface PlanStatusUpdate {
  planId: string;
  status: PlanStatus;
  acceptedAt?: Date;
  completedAt?: Date;
  conversation?: Conversation;
}

export interface NegotiationRepository {
  getDebtor(id: string): Promise<Debtor | null>;
  getAccount(id: string): Promise<Account | null>;
  insertDebtor(debtor: InsertDebtor): Promise<Debtor>;
  insertAccount(account: InsertAccount): Promise<Account>;

  getConversation(id: string): Promise<Conversation | null>;
  listConversationsByDebtor(debtorId: string): Promise<Conversation[]>;
  listConversationsByAccount(accountId: string): Promise<Conversation[]>;
  /** Opened-at timestamps of the debtor's conversations since `since`, excluding one conversation */
  listContactHistory(debtorId: string, since: Date, excludeConversationId: string): Promise<ContactRecord[]>;
  /** The newest `limit` messages, oldest first */
  listRecentMessages(conversationId: string, limit: number): Promise<Message[]>;

  getPlan(id: string): Promise<PaymentPlan | null>;
  getSchedule(planId: string): Promise<ScheduledPayment[]>;
  /** Oldest accepted or active plan of the account */
  findOpenPlan(accountId: string): Promise<PaymentPlan | null>;

  commitTurn(commit: TurnCommit): Promise<void>;
  commitConversations(conversations: Conversation[]): Promise<void>;
  commitOptOut(commit: OptOutCommit): Promise<void>;
  commitPayment(commit: PaymentCommit): Promise<void>;
  updatePlanStatus(update: PlanStatusUpdate): Promise<void>;

  appendComplianceEvents(events: ComplianceEventRecord[]): Promise<void>;
  listComplianceEvents(conversationId: string): Promise<ComplianceEventRecord[]>;
}
