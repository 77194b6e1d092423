import { z } from "zod";

export type NodeEnv = "local" | "dev" | "staging" | "prod" | "test";

const WEEKDAYS = ["sunday", "monday", "tuesday", "wednesday", "thursday", "friday", "saturday"] as const;
export type Weekday = (typeof WEEKDAYS)[number];

/**
 * Negotiation policy. One frozen instance is built at startup and handed to every
 * component that enforces a limit.
 */
export interface NegotiationPolicy {
  readonly maxSettlementPercentage: number;
  readonly maxInstallmentMonths: number;
  readonly minimumInstallmentAmount: number;
  readonly contactHoursStart: string;
  readonly contactHoursEnd: string;
  readonly prohibitedContactDays: readonly Weekday[];
  readonly maxDailyContactAttempts: number;
  readonly maxWeeklyContactAttempts: number;
  readonly maxVerificationAttempts: number;
}

export interface AppConfig {
  nodeEnv: NodeEnv;
  serviceName: string;
  logLevel: "trace" | "debug" | "info" | "warn" | "error" | "fatal" | "silent";
  logPretty: boolean;
  dbUrl?: string;
  generatorTimeoutMs: number;
  recentMessageLimit: number;
  auditQueueCapacity: number;
  policy: NegotiationPolicy;
}

const weekdayList = z
  .string()
  .transform((raw) => raw.split(",").map((d) => d.trim().toLowerCase()).filter((d) => d.length > 0))
  .pipe(z.array(z.enum(WEEKDAYS)));

const booleanFlag = z
  .enum(["true", "false", "1", "0"])
  .transform((v) => v === "true" || v === "1");

// Contact hours stay plain strings here: a malformed window is handled by the gate, which fails open
const envSchema = z.object({
  NODE_ENV: z.enum(["local", "dev", "staging", "prod", "test"]).default("local"),
  SERVICE_NAME: z.string().min(1).default("debt-negotiation-core"),
  LOG_LEVEL: z.enum(["trace", "debug", "info", "warn", "error", "fatal", "silent"]).default("info"),
  LOG_PRETTY: booleanFlag.default("false"),
  DATABASE_URL: z.string().url().optional(),
  GENERATOR_TIMEOUT_MS: z.coerce.number().int().positive().default(30000),
  RECENT_MESSAGE_LIMIT: z.coerce.number().int().positive().default(10),
  AUDIT_QUEUE_CAPACITY: z.coerce.number().int().positive().default(1000),
  MAX_SETTLEMENT_PERCENTAGE: z.coerce.number().gt(0).max(1).default(0.7),
  MAX_INSTALLMENT_MONTHS: z.coerce.number().int().positive().default(12),
  MINIMUM_INSTALLMENT_AMOUNT: z.coerce.number().nonnegative().default(25),
  CONTACT_HOURS_START: z.string().default("08:00"),
  CONTACT_HOURS_END: z.string().default("21:00"),
  PROHIBITED_CONTACT_DAYS: weekdayList.default("sunday"),
  MAX_DAILY_CONTACT_ATTEMPTS: z.coerce.number().int().positive().default(3),
  MAX_WEEKLY_CONTACT_ATTEMPTS: z.coerce.number().int().positive().default(7),
  MAX_VERIFICATION_ATTEMPTS: z.coerce.number().int().positive().default(3)
});

const DEFAULT_PROHIBITED_DAYS: readonly Weekday[] = ["sunday"];

export const DEFAULT_POLICY: NegotiationPolicy = Object.freeze({
  maxSettlementPercentage: 0.7,
  maxInstallmentMonths: 12,
  minimumInstallmentAmount: 25,
  contactHoursStart: "08:00",
  contactHoursEnd: "21:00",
  prohibitedContactDays: Object.freeze(DEFAULT_PROHIBITED_DAYS),
  maxDailyContactAttempts: 3,
  maxWeeklyContactAttempts: 7,
  maxVerificationAttempts: 3
});

export function definePolicy(overrides: Partial<NegotiationPolicy> = {}): NegotiationPolicy {
  const merged = { ...DEFAULT_POLICY, ...overrides };
  return Object.freeze({
    ...merged,
    prohibitedContactDays: Object.freeze([...merged.prohibitedContactDays])
  });
}

export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  const parsed = envSchema.safeParse(env);
  if (!parsed.success) {
    const msgs = parsed.error.issues.map((i) => `${i.path.join(".")} ${i.message}`).join("; ");
    throw new Error(`Invalid configuration: ${msgs}`);
  }
  const e = parsed.data;

  return {
    nodeEnv: e.NODE_ENV,
    serviceName: e.SERVICE_NAME,
    logLevel: e.LOG_LEVEL,
    logPretty: e.LOG_PRETTY,
    dbUrl: e.DATABASE_URL,
    generatorTimeoutMs: e.GENERATOR_TIMEOUT_MS,
    recentMessageLimit: e.RECENT_MESSAGE_LIMIT,
    auditQueueCapacity: e.AUDIT_QUEUE_CAPACITY,
    policy: definePolicy({
      maxSettlementPercentage: e.MAX_SETTLEMENT_PERCENTAGE,
      maxInstallmentMonths: e.MAX_INSTALLMENT_MONTHS,
      minimumInstallmentAmount: e.MINIMUM_INSTALLMENT_AMOUNT,
      contactHoursStart: e.CONTACT_HOURS_START,
      contactHoursEnd: e.CONTACT_HOURS_END,
      prohibitedContactDays: e.PROHIBITED_CONTACT_DAYS,
      maxDailyContactAttempts: e.MAX_DAILY_CONTACT_ATTEMPTS,
      maxWeeklyContactAttempts: e.MAX_WEEKLY_CONTACT_ATTEMPTS,
      maxVerificationAttempts: e.MAX_VERIFICATION_ATTEMPTS
    })
  };
}
