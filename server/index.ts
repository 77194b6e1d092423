import type { Pool } from "pg";
import { loadConfig, type AppConfig } from "./bootstrap/config";
import { getLogger, type Logger } from "./bootstrap/logger";
import { createDatabase, createDbPool, pingDb } from "./db";
import {
  AuditChannel,
  KeywordPolicyRetriever,
  LogAuditSink,
  MemoryRepository,
  NegotiationService,
  PgRepository,
  RepositoryAuditSink,
  type AuditSink,
  type ContextRetriever,
  type NegotiationRepository,
  type ProposalGenerator
} from "./negotiation";

export * from "./negotiation";
export { loadConfig, definePolicy, DEFAULT_POLICY, type AppConfig, type NegotiationPolicy } from "./bootstrap/config";
export { getLogger, silentLogger } from "./bootstrap/logger";
export { metricsSnapshot } from "./observability/metrics";

export interface RuntimeOptions {
  generator: ProposalGenerator;
  config?: AppConfig;
  logger?: Logger;
  retriever?: ContextRetriever;
  /** Overrides the repository picked from the configuration */
  repository?: NegotiationRepository;
}

export interface NegotiationRuntime {
  service: NegotiationService;
  audit: AuditChannel;
  logger: Logger;
  /** True when the backing store answers; always true in memory */
  healthy(): Promise<boolean>;
  close(): Promise<void>;
}

/**
 * Wire the negotiation core from configuration. A PostgreSQL repository is used when
 * DATABASE_URL is set, otherwise everything stays in memory.
 */
export function createNegotiationRuntime(options: RuntimeOptions): NegotiationRuntime {
  const cfg = options.config ?? loadConfig();
  const log = options.logger ?? getLogger(cfg.logLevel, cfg.logPretty);

  let pool: Pool | undefined;
  let repository = options.repository;
  if (!repository) {
    if (cfg.dbUrl) {
      pool = createDbPool(cfg.dbUrl);
      repository = new PgRepository(createDatabase(pool), log.child({ component: "repository" }));
      log.info("Database pool initialized");
    } else {
      repository = new MemoryRepository();
      log.warn("DATABASE_URL not set, using in-memory repository");
    }
  }

  const sinks: AuditSink[] = [new LogAuditSink(log.child({ component: "audit" })), new RepositoryAuditSink(repository)];
  const audit = new AuditChannel(sinks, log.child({ component: "audit-channel" }), cfg.auditQueueCapacity);

  const service = new NegotiationService({
    repository,
    generator: options.generator,
    retriever: options.retriever ?? new KeywordPolicyRetriever(),
    audit,
    policy: cfg.policy,
    logger: log,
    generatorTimeoutMs: cfg.generatorTimeoutMs,
    recentMessageLimit: cfg.recentMessageLimit
  });

  log.info({ service: cfg.serviceName, env: cfg.nodeEnv }, "Negotiation core ready");

  let closed = false;
  return {
    service,
    audit,
    logger: log,
    async healthy() {
      return pool ? pingDb(pool) : true;
    },
    async close() {
      if (closed) return;
      closed = true;
      await audit.close();
      if (pool) await pool.end();
      log.info("Shutdown complete");
    }
  };
}
