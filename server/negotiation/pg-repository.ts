/**
 * PostgreSQL repository on drizzle-orm. Each write runs in one `db.transaction`, so a
 * failure anywhere rolls back the whole operation.
 */

import { and, asc, desc, eq, gte, inArray, ne } from 'drizzle-orm';
import type { Logger } from 'pino';
import type { Database } from '../db';
import {
  accounts,
  complianceEvents,
  conversations,
  debtors,
  messages,
  paymentPlans,
  paymentTransactions,
  scheduledPayments,
  type ComplianceEventRecord,
  type InsertAccount,
  type InsertDebtor
} from '../../shared/schema';
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

type Tx = Parameters<Parameters<Database['transaction']>[0]>[0];

function conversationChanges(c: Conversation) {
  return {
    state: c.state,
    sessionData: c.sessionData,
    identityVerified: c.identityVerified,
    verificationAttempts: c.verificationAttempts,
    escalationReason: c.escalationReason,
    escalationDate: c.escalationDate,
    lastActivityAt: c.lastActivityAt
  };
}

export class PgRepository implements NegotiationRepository {
  constructor(
    private readonly db: Database,
    private readonly logger: Logger
  ) {}

  private async guard<T>(operation: string, fn: () => Promise<T>): Promise<T> {
    try {
      return await fn();
    } catch (error) {
      this.logger.error({ err: error, operation }, '[Repository] Database operation failed');
      throw new PersistenceError(`${operation} failed: ${error instanceof Error ? error.message : String(error)}`, error);
    }
  }

  private write(operation: string, fn: (tx: Tx) => Promise<void>): Promise<void> {
    return this.guard(operation, () => this.db.transaction(fn));
  }

  async getDebtor(id: string): Promise<Debtor | null> {
    return this.guard('getDebtor', async () => {
      const [row] = await this.db.select().from(debtors).where(eq(debtors.id, id)).limit(1);
      return row ?? null;
    });
  }

  async getAccount(id: string): Promise<Account | null> {
    return this.guard('getAccount', async () => {
      const [row] = await this.db.select().from(accounts).where(eq(accounts.id, id)).limit(1);
      return row ?? null;
    });
  }

  async insertDebtor(debtor: InsertDebtor): Promise<Debtor> {
    return this.guard('insertDebtor', async () => {
      const [row] = await this.db.insert(debtors).values(debtor).returning();
      return row;
    });
  }

  async insertAccount(account: InsertAccount): Promise<Account> {
    return this.guard('insertAccount', async () => {
      const [row] = await this.db.insert(accounts).values(account).returning();
      return row;
    });
  }

  async getConversation(id: string): Promise<Conversation | null> {
    return this.guard('getConversation', async () => {
      const [row] = await this.db.select().from(conversations).where(eq(conversations.id, id)).limit(1);
      return row ?? null;
    });
  }

  async listConversationsByDebtor(debtorId: string): Promise<Conversation[]> {
    return this.guard('listConversationsByDebtor', () =>
      this.db.select().from(conversations).where(eq(conversations.debtorId, debtorId)).orderBy(asc(conversations.openedAt))
    );
  }

  async listConversationsByAccount(accountId: string): Promise<Conversation[]> {
    return this.guard('listConversationsByAccount', () =>
      this.db.select().from(conversations).where(eq(conversations.accountId, accountId)).orderBy(asc(conversations.openedAt))
    );
  }

  async listContactHistory(debtorId: string, since: Date, excludeConversationId: string): Promise<ContactRecord[]> {
    return this.guard('listContactHistory', () =>
      this.db
        .select({ conversationId: conversations.id, openedAt: conversations.openedAt })
        .from(conversations)
        .where(and(
          eq(conversations.debtorId, debtorId),
          ne(conversations.id, excludeConversationId),
          gte(conversations.openedAt, since)
        ))
    );
  }

  async listRecentMessages(conversationId: string, limit: number): Promise<Message[]> {
    return this.guard('listRecentMessages', async () => {
      const rows = await this.db
        .select()
        .from(messages)
        .where(eq(messages.conversationId, conversationId))
        .orderBy(desc(messages.createdAt))
        .limit(limit);
      return rows.reverse();
    });
  }

  async getPlan(id: string): Promise<PaymentPlan | null> {
    return this.guard('getPlan', async () => {
      const [row] = await this.db.select().from(paymentPlans).where(eq(paymentPlans.id, id)).limit(1);
      return row ?? null;
    });
  }

  async getSchedule(planId: string): Promise<ScheduledPayment[]> {
    return this.guard('getSchedule', () =>
      this.db
        .select()
        .from(scheduledPayments)
        .where(eq(scheduledPayments.planId, planId))
        .orderBy(asc(scheduledPayments.installmentNo))
    );
  }

  async findOpenPlan(accountId: string): Promise<PaymentPlan | null> {
    return this.guard('findOpenPlan', async () => {
      const [row] = await this.db
        .select()
        .from(paymentPlans)
        .where(and(eq(paymentPlans.accountId, accountId), inArray(paymentPlans.status, ['accepted', 'active'])))
        .orderBy(asc(paymentPlans.createdAt))
        .limit(1);
      return row ?? null;
    });
  }

  async commitTurn(commit: TurnCommit): Promise<void> {
    return this.write('commitTurn', async (tx) => {
      await this.upsertConversation(tx, commit.conversation);
      if (commit.messages.length > 0) {
        await tx.insert(messages).values(commit.messages);
      }
      if (commit.plan) {
        await tx.insert(paymentPlans).values(commit.plan.plan);
        if (commit.plan.schedule.length > 0) {
          await tx.insert(scheduledPayments).values(commit.plan.schedule);
        }
      }
    });
  }

  async commitConversations(list: Conversation[]): Promise<void> {
    return this.write('commitConversations', async (tx) => {
      for (const conversation of list) {
        await this.upsertConversation(tx, conversation);
      }
    });
  }

  async commitOptOut(commit: OptOutCommit): Promise<void> {
    return this.write('commitOptOut', async (tx) => {
      await tx
        .update(debtors)
        .set({ optOutDate: commit.optOutDate, updatedAt: commit.optOutDate })
        .where(eq(debtors.id, commit.debtorId));
      for (const conversation of commit.conversations) {
        await this.upsertConversation(tx, conversation);
      }
    });
  }

  async commitPayment(commit: PaymentCommit): Promise<void> {
    return this.write('commitPayment', async (tx) => {
      await tx.insert(paymentTransactions).values(commit.transaction);
      await tx
        .update(accounts)
        .set({
          currentBalance: commit.account.currentBalance,
          lastPaymentDate: commit.account.lastPaymentDate,
          lastPaymentAmount: commit.account.lastPaymentAmount,
          status: commit.account.status,
          updatedAt: commit.account.updatedAt
        })
        .where(eq(accounts.id, commit.account.id));

      if (commit.plan) {
        await tx
          .update(paymentPlans)
          .set({ status: commit.plan.status, completedAt: commit.plan.completedAt })
          .where(eq(paymentPlans.id, commit.plan.id));
      }
      for (const row of commit.schedule) {
        await tx
          .update(scheduledPayments)
          .set({ paidAmount: row.paidAmount, status: row.status, paidAt: row.paidAt, transactionId: row.transactionId })
          .where(eq(scheduledPayments.id, row.id));
      }
    });
  }

  async updatePlanStatus(update: PlanStatusUpdate): Promise<void> {
    return this.write('updatePlanStatus', async (tx) => {
      await tx
        .update(paymentPlans)
        .set({
          status: update.status,
          ...(update.acceptedAt ? { acceptedAt: update.acceptedAt } : {}),
          ...(update.completedAt ? { completedAt: update.completedAt } : {})
        })
        .where(eq(paymentPlans.id, update.planId));
      if (update.conversation) {
        await this.upsertConversation(tx, update.conversation);
      }
    });
  }

  async appendComplianceEvents(events: ComplianceEventRecord[]): Promise<void> {
    if (events.length === 0) return;
    return this.guard('appendComplianceEvents', async () => {
      await this.db.insert(complianceEvents).values(events);
    });
  }

  async listComplianceEvents(conversationId: string): Promise<ComplianceEventRecord[]> {
    return this.guard('listComplianceEvents', () =>
      this.db
        .select()
        .from(complianceEvents)
        .where(eq(complianceEvents.conversationId, conversationId))
        .orderBy(asc(complianceEvents.createdAt))
    );
  }

  private async upsertConversation(tx: Tx, conversation: Conversation): Promise<void> {
    await tx
      .insert(conversations)
      .values(conversation)
      .onConflictDoUpdate({ target: conversations.id, set: conversationChanges(conversation) });
  }
}
