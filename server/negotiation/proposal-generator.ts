/**
 * Proposal generator seam. Text generation lives outside this package; the state machine
 * only sees a typed result.
 */

import type { ConversationContext, EscalateProposal, ProposedAction, ReferenceSnippet } from './types';

export type GenerationErrorKind = 'timeout' | 'invalid_output' | 'provider_error' | 'cancelled';

export interface GenerationError {
  kind: GenerationErrorKind;
  message: string;
}

export type GenerationResult =
  | { ok: true; proposal: ProposedAction }
  | { ok: false; error: GenerationError };

export interface GenerationInput {
  message: string;
  context: ConversationContext;
  references: ReferenceSnippet[];
}

export interface ProposalGenerator {
  generate(input: GenerationInput, signal: AbortSignal): Promise<GenerationResult>;
}

export const TECHNICAL_FAILURE_TAG = 'technical_failure_escalation';

export const FALLBACK_PROPOSAL: Readonly<EscalateProposal> = Object.freeze({
  kind: 'escalate',
  message:
    "I'm experiencing technical difficulties and want to ensure you receive the best service. Let me connect you with a specialist who can assist you immediately.",
  confidence: 1.0,
  escalate: true,
  complianceChecks: Object.freeze([TECHNICAL_FAILURE_TAG]),
  reason: 'Response generation failed'
});

/**
 * Run the generator under a deadline. Thrown errors and timeouts come back as failed results;
 * only a caller abort is reported as `cancelled` so the turn can be dropped.
 */
export async function invokeGenerator(
  generator: ProposalGenerator,
  input: GenerationInput,
  timeoutMs: number,
  callerSignal?: AbortSignal
): Promise<GenerationResult> {
  if (callerSignal?.aborted) {
    return { ok: false, error: { kind: 'cancelled', message: 'Turn cancelled before generation' } };
  }

  const controller = new AbortController();
  let timer: NodeJS.Timeout | undefined;
  let onAbort: (() => void) | undefined;

  const deadline = new Promise<GenerationResult>((resolve) => {
    timer = setTimeout(() => {
      controller.abort();
      resolve({ ok: false, error: { kind: 'timeout', message: `Generator did not respond within ${timeoutMs}ms` } });
    }, timeoutMs);
  });

  const cancelled = new Promise<GenerationResult>((resolve) => {
    if (!callerSignal) return;
    onAbort = () => {
      controller.abort();
      resolve({ ok: false, error: { kind: 'cancelled', message: 'Turn cancelled by caller' } });
    };
    callerSignal.addEventListener('abort', onAbort, { once: true });
  });

  const attempt = generator.generate(input, controller.signal).catch(
    (error: unknown): GenerationResult => ({
      ok: false,
      error: { kind: 'provider_error', message: error instanceof Error ? error.message : String(error) }
    })
  );

  try {
    return await Promise.race([attempt, deadline, cancelled]);
  } finally {
    if (timer) clearTimeout(timer);
    if (onAbort && callerSignal) callerSignal.removeEventListener('abort', onAbort);
  }
}
