/**
 * In-memory repository. Used by tests and single-process runs without a database.
 * Rows are cloned on the way in and out so callers never share state with the store.
 */

import type { ComplianceEventRecord, InsertAccount, InsertDebtor, PaymentTransaction } from '../../shared/schema';
import { PersistenceError } from './errors';
import type {
  NegotiationRepository,
  OptOutCommit,
  PaymentCommit,
  PlanStatusUpdate,
  TurnCommit
} from './repository';
import type {
  Account,
  ContactRecord,
  Conversation,
  Debtor,
  Message,
  PaymentPlan,
  ScheduledPayment
} from './types';

const clone = <T>(value: T): T => structuredClone(value);

const byCreated = (a: { createdAt: Date }, b: { createdAt: Date }) => a.createdAt.getTime() - b.createdAt.getTime();

export class MemoryRepository implements NegotiationRepository {
  private debtors = new Map<string, Debtor>();
  private accounts = new Map<string, Account>();
  private conversations = new Map<string, Conversation>();
  private messages = new Map<string, Message[]>();
  private plans = new Map<string, PaymentPlan>();
  private schedules = new Map<string, ScheduledPayment[]>();
  private transactions: PaymentTransaction[] = [];
  private events: ComplianceEventRecord[] = [];
  private pendingFailures: Error[] = [];

  /** Make the next write fail with `cause`; nothing of that write is applied */
  failNextWrite(cause: Error = new Error('simulated write failure')): void {
    this.pendingFailures.push(cause);
  }

  private beginWrite(operation: string): void {
    const cause = this.pendingFailures.shift();
    if (cause) {
      throw new PersistenceError(`${operation} failed: ${cause.message}`, cause);
    }
  }

  async getDebtor(id: string): Promise<Debtor | null> {
    const row = this.debtors.get(id);
    return row ? clone(row) : null;
  }

  async getAccount(id: string): Promise<Account | null> {
    const row = this.accounts.get(id);
    return row ? clone(row) : null;
  }

  async insertDebtor(debtor: InsertDebtor): Promise<Debtor> {
    this.beginWrite('insertDebtor');
    if (this.debtors.has(debtor.id)) {
      throw new PersistenceError(`insertDebtor failed: debtor ${debtor.id} already exists`);
    }
    const now = new Date();
    const row: Debtor = {
      id: debtor.id,
      name: debtor.name,
      email: debtor.email ?? null,
      phone: debtor.phone ?? null,
      ssnLastFour: debtor.ssnLastFour ?? null,
      consentStatus: debtor.consentStatus ?? 'pending',
      consentDate: debtor.consentDate ?? null,
      optOutDate: debtor.optOutDate ?? null,
      preferredChannel: debtor.preferredChannel ?? 'email',
      contactHoursStart: debtor.contactHoursStart ?? null,
      contactHoursEnd: debtor.contactHoursEnd ?? null,
      timezone: debtor.timezone ?? 'UTC',
      createdAt: now,
      updatedAt: now
    };
    this.debtors.set(row.id, row);
    return clone(row);
  }

  async insertAccount(account: InsertAccount): Promise<Account> {
    this.beginWrite('insertAccount');
    if (this.accounts.has(account.id)) {
      throw new PersistenceError(`insertAccount failed: account ${account.id} already exists`);
    }
    if (!this.debtors.has(account.debtorId)) {
      throw new PersistenceError(`insertAccount failed: debtor ${account.debtorId} does not exist`);
    }
    const now = new Date();
    const row: Account = {
      id: account.id,
      debtorId: account.debtorId,
      accountNumber: account.accountNumber,
      principalAmount: account.principalAmount,
      currentBalance: account.currentBalance,
      currency: account.currency ?? 'USD',
      daysOverdue: account.daysOverdue ?? 0,
      lastPaymentDate: account.lastPaymentDate ?? null,
      lastPaymentAmount: account.lastPaymentAmount ?? null,
      status: account.status ?? 'active',
      createdAt: now,
      updatedAt: now
    };
    this.accounts.set(row.id, row);
    return clone(row);
  }

  async getConversation(id: string): Promise<Conversation | null> {
    const row = this.conversations.get(id);
    return row ? clone(row) : null;
  }

  async listConversationsByDebtor(debtorId: string): Promise<Conversation[]> {
    return this.sortedConversations((c) => c.debtorId === debtorId);
  }

  async listConversationsByAccount(accountId: string): Promise<Conversation[]> {
    return this.sortedConversations((c) => c.accountId === accountId);
  }

  async listContactHistory(debtorId: string, since: Date, excludeConversationId: string): Promise<ContactRecord[]> {
    return [...this.conversations.values()]
      .filter((c) => c.debtorId === debtorId && c.id !== excludeConversationId && c.openedAt >= since)
      .map((c) => ({ conversationId: c.id, openedAt: new Date(c.openedAt) }));
  }

  async listRecentMessages(conversationId: string, limit: number): Promise<Message[]> {
    const all = this.messages.get(conversationId) ?? [];
    return clone(all.slice(Math.max(0, all.length - limit)));
  }

  /** Every stored message of a conversation, oldest first */
  async listMessages(conversationId: string): Promise<Message[]> {
    return clone(this.messages.get(conversationId) ?? []);
  }

  async getPlan(id: string): Promise<PaymentPlan | null> {
    const row = this.plans.get(id);
    return row ? clone(row) : null;
  }

  async listPlans(accountId: string): Promise<PaymentPlan[]> {
    return clone([...this.plans.values()].filter((p) => p.accountId === accountId).sort(byCreated));
  }

  async getSchedule(planId: string): Promise<ScheduledPayment[]> {
    return clone(this.schedules.get(planId) ?? []);
  }

  async findOpenPlan(accountId: string): Promise<PaymentPlan | null> {
    const open = [...this.plans.values()]
      .filter((p) => p.accountId === accountId && (p.status === 'accepted' || p.status === 'active'))
      .sort(byCreated);
    return open.length > 0 ? clone(open[0]) : null;
  }

  async listTransactions(accountId: string): Promise<PaymentTransaction[]> {
    return clone(this.transactions.filter((t) => t.accountId === accountId));
  }

  async commitTurn(commit: TurnCommit): Promise<void> {
    this.beginWrite('commitTurn');
    this.conversations.set(commit.conversation.id, clone(commit.conversation));
    if (commit.messages.length > 0) {
      const existing = this.messages.get(commit.conversation.id) ?? [];
      this.messages.set(commit.conversation.id, [...existing, ...clone(commit.messages)]);
    }
    if (commit.plan) {
      this.plans.set(commit.plan.plan.id, clone(commit.plan.plan));
      this.schedules.set(commit.plan.plan.id, clone(commit.plan.schedule));
    }
  }

  async commitConversations(conversations: Conversation[]): Promise<void> {
    this.beginWrite('commitConversations');
    for (const conversation of conversations) {
      this.conversations.set(conversation.id, clone(conversation));
    }
  }

  async commitOptOut(commit: OptOutCommit): Promise<void> {
    this.beginWrite('commitOptOut');
    const debtor = this.debtors.get(commit.debtorId);
    if (!debtor) {
      throw new PersistenceError(`commitOptOut failed: debtor ${commit.debtorId} does not exist`);
    }
    this.debtors.set(debtor.id, { ...debtor, optOutDate: new Date(commit.optOutDate), updatedAt: new Date(commit.optOutDate) });
    for (const conversation of commit.conversations) {
      this.conversations.set(conversation.id, clone(conversation));
    }
  }

  async commitPayment(commit: PaymentCommit): Promise<void> {
    this.beginWrite('commitPayment');
    this.transactions.push(clone(commit.transaction));
    this.accounts.set(commit.account.id, clone(commit.account));
    if (commit.plan) {
      this.plans.set(commit.plan.id, clone(commit.plan));
      const rows = this.schedules.get(commit.plan.id) ?? [];
      const updated = new Map(commit.schedule.map((row) => [row.id, row]));
      this.schedules.set(commit.plan.id, rows.map((row) => clone(updated.get(row.id) ?? row)));
    }
  }

  async updatePlanStatus(update: PlanStatusUpdate): Promise<void> {
    this.beginWrite('updatePlanStatus');
    const plan = this.plans.get(update.planId);
    if (!plan) {
      throw new PersistenceError(`updatePlanStatus failed: plan ${update.planId} does not exist`);
    }
    this.plans.set(plan.id, {
      ...plan,
      status: update.status,
      acceptedAt: update.acceptedAt ?? plan.acceptedAt,
      completedAt: update.completedAt ?? plan.completedAt
    });
    if (update.conversation) {
      this.conversations.set(update.conversation.id, clone(update.conversation));
    }
  }

  async appendComplianceEvents(events: ComplianceEventRecord[]): Promise<void> {
    this.beginWrite('appendComplianceEvents');
    this.events.push(...clone(events));
  }

  async listComplianceEvents(conversationId: string): Promise<ComplianceEventRecord[]> {
    return clone(this.events.filter((e) => e.conversationId === conversationId).sort(byCreated));
  }

  private sortedConversations(predicate: (c: Conversation) => boolean): Conversation[] {
    return clone(
      [...this.conversations.values()]
        .filter(predicate)
        .sort((a, b) => a.openedAt.getTime() - b.openedAt.getTime())
    );
  }
}
