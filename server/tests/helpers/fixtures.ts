/**
 * Shared fixtures for negotiation tests: seeded in-memory repository, scripted generators
 */

import { vi } from 'vitest';
import type { InsertDebtor } from '../../../shared/schema';
import { silentLogger } from '../../bootstrap/logger';
import { definePolicy, type NegotiationPolicy } from '../../bootstrap/config';
import { AuditChannel, RepositoryAuditSink } from '../../negotiation/audit-channel';
import { MemoryRepository } from '../../negotiation/memory-repository';
import { NegotiationService } from '../../negotiation/negotiation-service';
import type { GenerationInput, GenerationResult, ProposalGenerator } from '../../negotiation/proposal-generator';
import type { Debtor, PlainProposal, PlanBearingProposal, PlanProposal, ProposedAction } from '../../negotiation/types';

// Monday, inside the default 08:00-21:00 window in UTC
export const MONDAY_AFTERNOON = new Date('2025-11-03T15:00:00Z');

export const DEBTOR_ID = 'debtor-1';
export const ACCOUNT_ID = 'account-1';

export function makeDebtor(overrides: Partial<Debtor> = {}): Debtor {
  return {
    id: DEBTOR_ID,
    name: 'Test Debtor',
    email: null,
    phone: null,
    ssnLastFour: '1234',
    consentStatus: 'granted',
    consentDate: null,
    optOutDate: null,
    preferredChannel: 'chat',
    contactHoursStart: null,
    contactHoursEnd: null,
    timezone: 'UTC',
    createdAt: new Date('2025-01-01T00:00:00Z'),
    updatedAt: new Date('2025-01-01T00:00:00Z'),
    ...overrides
  };
}

export async function seedRepository(
  balance = '1200.00',
  debtorOverrides: Partial<InsertDebtor> = {}
): Promise<MemoryRepository> {
  const repository = new MemoryRepository();
  await repository.insertDebtor({ id: DEBTOR_ID, name: 'Test Debtor', ssnLastFour: '1234', timezone: 'UTC', ...debtorOverrides });
  await repository.insertAccount({
    id: ACCOUNT_ID,
    debtorId: DEBTOR_ID,
    accountNumber: 'ACC-0001',
    principalAmount: balance,
    currentBalance: balance,
    daysOverdue: 90,
    lastPaymentAmount: '150.00',
    lastPaymentDate: '2025-06-01'
  });
  return repository;
}

interface ProposalExtras {
  message?: string;
  confidence?: number;
  escalate?: boolean;
  complianceChecks?: string[];
}

const BASE_PROPOSAL = { message: 'Thank you for reaching out.', confidence: 0.9, escalate: false, complianceChecks: [] };

export function plainProposal(kind: PlainProposal['kind'], extras: ProposalExtras = {}): ProposedAction {
  return { ...BASE_PROPOSAL, ...extras, kind };
}

export function planProposal(
  plan: PlanProposal | undefined,
  extras: ProposalExtras & { kind?: PlanBearingProposal['kind'] } = {}
): ProposedAction {
  return { ...BASE_PROPOSAL, ...extras, kind: extras.kind ?? 'propose_plan', plan };
}

export function escalationProposal(reason?: string, extras: ProposalExtras = {}): ProposedAction {
  return { ...BASE_PROPOSAL, ...extras, kind: 'escalate', escalate: true, reason };
}

/** Generator that answers each call with the next scripted result */
export class ScriptedGenerator implements ProposalGenerator {
  readonly calls: GenerationInput[] = [];
  private readonly script: Array<GenerationResult | (() => Promise<GenerationResult>)>;

  constructor(...script: Array<GenerationResult | (() => Promise<GenerationResult>)>) {
    this.script = script;
  }

  async generate(input: GenerationInput): Promise<GenerationResult> {
    this.calls.push(input);
    const next = this.script.shift();
    if (next === undefined) {
      return { ok: true, proposal: plainProposal('acknowledge') };
    }
    return typeof next === 'function' ? next() : next;
  }
}

export const ok = (p: ProposedAction): GenerationResult => ({ ok: true, proposal: p });

export interface Harness {
  repository: MemoryRepository;
  audit: AuditChannel;
  service: NegotiationService;
  generator: ProposalGenerator;
  now: { value: Date };
}

export async function createHarness(
  generator: ProposalGenerator,
  options: { policy?: NegotiationPolicy; balance?: string; repository?: MemoryRepository; timeoutMs?: number } = {}
): Promise<Harness> {
  const repository = options.repository ?? (await seedRepository(options.balance));
  const logger = silentLogger();
  const audit = new AuditChannel([new RepositoryAuditSink(repository)], logger);
  const now = { value: MONDAY_AFTERNOON };
  const service = new NegotiationService({
    repository,
    generator,
    audit,
    policy: options.policy ?? definePolicy(),
    logger,
    clock: () => now.value,
    generatorTimeoutMs: options.timeoutMs ?? 1000
  });
  return { repository, audit, service, generator, now };
}

export const spyWarn = () => {
  const logger = silentLogger();
  const warn = vi.spyOn(logger, 'warn');
  return { logger, warn };
};
