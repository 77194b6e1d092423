import { pgTable, pgEnum, text, varchar, integer, decimal, date, boolean, timestamp, jsonb, real, index, uniqueIndex } from "drizzle-orm/pg-core";
import { createInsertSchema } from "drizzle-zod";
import { z } from "zod";

// Enums
export const consentStatusEnum = pgEnum("consent_status", ["pending", "granted", "revoked", "expired"]);
export const accountStatusEnum = pgEnum("account_status", [
  "active",
  "overdue",
  "settled",
  "paid",
  "written_off",
  "in_litigation"
]);
export const conversationStateEnum = pgEnum("conversation_state", [
  "initiated",
  "identity_verification",
  "active_negotiation",
  "payment_processing",
  "escalated",
  "closed",
  "opted_out"
]);
export const channelEnum = pgEnum("conversation_channel", ["chat", "sms", "email", "voice"]);
export const messageRoleEnum = pgEnum("message_role", ["user", "assistant", "system"]);
export const planKindEnum = pgEnum("payment_plan_kind", ["settlement", "installment", "one_time"]);
export const planFrequencyEnum = pgEnum("payment_frequency", ["weekly", "bi-weekly", "monthly"]);
export const planStatusEnum = pgEnum("payment_plan_status", ["proposed", "accepted", "active", "completed", "defaulted"]);
export const scheduledPaymentStatusEnum = pgEnum("scheduled_payment_status", ["pending", "partial", "paid"]);
export const complianceSeverityEnum = pgEnum("compliance_severity", ["info", "warning", "error", "critical"]);

// Debtors - owned by the system of record, only opt-out is written here
export const debtors = pgTable("debtors", {
  id: text("id").primaryKey(),
  name: text("name").notNull(),
  email: text("email"),
  phone: varchar("phone", { length: 20 }),
  ssnLastFour: varchar("ssn_last_four", { length: 4 }),
  consentStatus: consentStatusEnum("consent_status").notNull().default("pending"),
  consentDate: timestamp("consent_date"),
  optOutDate: timestamp("opt_out_date"),
  preferredChannel: channelEnum("preferred_channel").notNull().default("email"),
  // HH:MM, falls back to the policy window when null
  contactHoursStart: varchar("contact_hours_start", { length: 5 }),
  contactHoursEnd: varchar("contact_hours_end", { length: 5 }),
  timezone: text("timezone").notNull().default("UTC"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull()
});

export const accounts = pgTable("accounts", {
  id: text("id").primaryKey(),
  debtorId: text("debtor_id").references(() => debtors.id).notNull(),
  accountNumber: text("account_number").notNull(),
  principalAmount: decimal("principal_amount", { precision: 15, scale: 2 }).notNull(),
  currentBalance: decimal("current_balance", { precision: 15, scale: 2 }).notNull(),
  currency: varchar("currency", { length: 3 }).notNull().default("USD"),
  daysOverdue: integer("days_overdue").notNull().default(0),
  lastPaymentDate: date("last_payment_date"),
  lastPaymentAmount: decimal("last_payment_amount", { precision: 15, scale: 2 }),
  status: accountStatusEnum("status").notNull().default("active"),
  createdAt: timestamp("created_at").defaultNow().notNull(),
  updatedAt: timestamp("updated_at").defaultNow().notNull()
}, (table) => ({
  accountNumberIdx: uniqueIndex("accounts_account_number_idx").on(table.accountNumber),
  debtorIdx: index("accounts_debtor_idx").on(table.debtorId)
}));

// Conversations are keyed by the channel session id
export const conversations = pgTable("conversations", {
  id: text("id").primaryKey(),
  accountId: text("account_id").references(() => accounts.id).notNull(),
  debtorId: text("debtor_id").references(() => debtors.id).notNull(),
  state: conversationStateEnum("state").notNull().default("initiated"),
  channel: channelEnum("channel").notNull(),
  sessionData: jsonb("session_data").$type<Record<string, unknown>>().notNull().default({}),
  identityVerified: boolean("identity_verified").notNull().default(false),
  verificationAttempts: integer("verification_attempts").notNull().default(0),
  escalationReason: text("escalation_reason"),
  escalationDate: timestamp("escalation_date"),
  lastActivityAt: timestamp("last_activity_at").notNull(),
  openedAt: timestamp("opened_at").notNull()
}, (table) => ({
  debtorOpenedIdx: index("conversations_debtor_opened_idx").on(table.debtorId, table.openedAt),
  accountIdx: index("conversations_account_idx").on(table.accountId)
}));

export const messages = pgTable("messages", {
  id: text("id").primaryKey(),
  conversationId: text("conversation_id").references(() => conversations.id).notNull(),
  role: messageRoleEnum("role").notNull(),
  content: text("content").notNull(),
  confidence: real("confidence"),
  complianceTags: jsonb("compliance_tags").$type<string[]>().notNull().default([]),
  metadata: jsonb("metadata").$type<Record<string, unknown>>().notNull().default({}),
  createdAt: timestamp("created_at").notNull()
}, (table) => ({
  conversationCreatedIdx: index("messages_conversation_created_idx").on(table.conversationId, table.createdAt)
}));

export const paymentPlans = pgTable("payment_plans", {
  id: text("id").primaryKey(),
  accountId: text("account_id").references(() => accounts.id).notNull(),
  conversationId: text("conversation_id").references(() => conversations.id),
  kind: planKindEnum("kind").notNull(),
  totalAmount: decimal("total_amount", { precision: 15, scale: 2 }).notNull(),
  installmentAmount: decimal("installment_amount", { precision: 15, scale: 2 }).notNull(),
  installmentCount: integer("installment_count").notNull(),
  firstDueDate: date("first_due_date").notNull(),
  frequency: planFrequencyEnum("frequency").notNull().default("monthly"),
  status: planStatusEnum("status").notNull().default("proposed"),
  acceptedAt: timestamp("accepted_at"),
  completedAt: timestamp("completed_at"),
  createdAt: timestamp("created_at").notNull()
}, (table) => ({
  accountIdx: index("payment_plans_account_idx").on(table.accountId)
}));

export const scheduledPayments = pgTable("scheduled_payments", {
  id: text("id").primaryKey(),
  planId: text("plan_id").references(() => paymentPlans.id).notNull(),
  installmentNo: integer("installment_no").notNull(),
  dueDate: date("due_date").notNull(),
  amount: decimal("amount", { precision: 15, scale: 2 }).notNull(),
  paidAmount: decimal("paid_amount", { precision: 15, scale: 2 }).notNull().default("0.00"),
  status: scheduledPaymentStatusEnum("status").notNull().default("pending"),
  paidAt: timestamp("paid_at"),
  transactionId: text("transaction_id")
}, (table) => ({
  planInstallmentIdx: uniqueIndex("scheduled_payments_plan_installment_idx").on(table.planId, table.installmentNo)
}));

// Recorded amounts only, no money movement happens here
export const paymentTransactions = pgTable("payment_transactions", {
  id: text("id").primaryKey(),
  accountId: text("account_id").references(() => accounts.id).notNull(),
  planId: text("plan_id").references(() => paymentPlans.id),
  conversationId: text("conversation_id").references(() => conversations.id),
  amount: decimal("amount", { precision: 15, scale: 2 }).notNull(),
  method: text("method").notNull(),
  recordedAt: timestamp("recorded_at").notNull()
});

export const complianceEvents = pgTable("compliance_events", {
  id: text("id").primaryKey(),
  eventType: text("event_type").notNull(),
  conversationId: text("conversation_id"),
  accountId: text("account_id"),
  debtorId: text("debtor_id"),
  severity: complianceSeverityEnum("severity").notNull().default("info"),
  passed: boolean("passed").notNull().default(true),
  description: text("description").notNull(),
  metadata: jsonb("metadata").$type<Record<string, unknown>>().notNull().default({}),
  createdAt: timestamp("created_at").notNull()
}, (table) => ({
  conversationIdx: index("compliance_events_conversation_idx").on(table.conversationId, table.createdAt)
}));

// Insert schemas
export const insertDebtorSchema = createInsertSchema(debtors, {
  ssnLastFour: z.string().regex(/^\d{4}$/, "Must be exactly four digits").nullish(),
  contactHoursStart: z.string().regex(/^\d{2}:\d{2}$/, "Use HH:MM").nullish(),
  contactHoursEnd: z.string().regex(/^\d{2}:\d{2}$/, "Use HH:MM").nullish()
}).omit({ createdAt: true, updatedAt: true });

export const insertAccountSchema = createInsertSchema(accounts, {
  principalAmount: z.string().regex(/^\d+(\.\d{1,2})?$/, "Must be a decimal amount"),
  currentBalance: z.string().regex(/^\d+(\.\d{1,2})?$/, "Must be a decimal amount"),
  lastPaymentAmount: z.string().regex(/^\d+(\.\d{1,2})?$/, "Must be a decimal amount").nullish(),
  lastPaymentDate: z.string().regex(/^\d{4}-\d{2}-\d{2}$/, "Use YYYY-MM-DD").nullish()
}).omit({ createdAt: true, updatedAt: true });

// Types
export type Debtor = typeof debtors.$inferSelect;
export type InsertDebtor = z.infer<typeof insertDebtorSchema>;
export type Account = typeof accounts.$inferSelect;
export type InsertAccount = z.infer<typeof insertAccountSchema>;
export type Conversation = typeof conversations.$inferSelect;
export type Message = typeof messages.$inferSelect;
export type PaymentPlan = typeof paymentPlans.$inferSelect;
export type ScheduledPayment = typeof scheduledPayments.$inferSelect;
export type PaymentTransaction = typeof paymentTransactions.$inferSelect;
export type ComplianceEventRecord = typeof complianceEvents.$inferSelect;

export type ConversationState = Conversation["state"];
export type ConversationChannel = Conversation["channel"];
export type MessageRole = Message["role"];
export type PlanKind = PaymentPlan["kind"];
export type PlanFrequency = PaymentPlan["frequency"];
export type PlanStatus = PaymentPlan["status"];
export type ComplianceSeverity = ComplianceEventRecord["severity"];
