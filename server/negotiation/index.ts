export * from './types';
export * from './errors';
export { ContactComplianceGate, parseClock, type GateResult } from './contact-gate';
export { IdentityVerifier, LOCKOUT_REASON, identityClaimsSchema, type IdentityClaims, type VerificationOutcome } from './identity-verifier';
export { PaymentPlanBuilder, buildSchedule, dueDateAt, type PlanBuildResult } from './plan-builder';
export { checkPlanPolicy } from './plan-policy';
export { ResponseValidator, HANDOFF_MESSAGE, PROHIBITED_PHRASES, escalateProposal, type ValidationResult } from './response-validator';
export {
  ConversationStateMachine,
  canTransition,
  transition,
  type NegotiationDeps,
  type TurnInput,
  type TurnOptions,
  type TurnResponse
} from './state-machine';
export * from './negotiation-service';
export { FALLBACK_PROPOSAL, invokeGenerator, type GenerationInput, type GenerationResult, type ProposalGenerator } from './proposal-generator';
export { parseGeneratorOutput } from './proposal-parser';
export { KeywordPolicyRetriever, NoopRetriever, type ContextRetriever } from './context-retriever';
export { AuditChannel, LogAuditSink, RepositoryAuditSink, type AuditSink } from './audit-channel';
export { KeyedMutex } from './keyed-mutex';
export type { NegotiationRepository } from './repository';
export { MemoryRepository } from './memory-repository';
export { PgRepository } from './pg-repository';
