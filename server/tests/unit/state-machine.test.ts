/**
 * Unit Tests: Conversation State Machine
 * Full turns against the in-memory repository with scripted generators
 */

import { describe, it, expect } from 'vitest';
import { ErrorCode, PersistenceError, TurnCancelledError, ValidationError } from '../../negotiation/errors';
import { FALLBACK_PROPOSAL } from '../../negotiation/proposal-generator';
import { HANDOFF_MESSAGE } from '../../negotiation/response-validator';
import { CLOSED_MESSAGE, ESCALATED_MESSAGE, OPTED_OUT_MESSAGE, canTransition } from '../../negotiation/state-machine';
import type { GenerationResult } from '../../negotiation/proposal-generator';
import {
  ACCOUNT_ID,
  DEBTOR_ID,
  ScriptedGenerator,
  createHarness,
  ok,
  planProposal,
  plainProposal
} from '../helpers/fixtures';

const SESSION = 'session-1';
const turn = (message = 'Hello, I got your letter.') => ({ sessionId: SESSION, accountId: ACCOUNT_ID, message, channel: 'chat' as const });

const identityRequest = plainProposal('verify_identity', { message: 'Please confirm the last four digits of your identifier.' });

describe('canTransition', () => {
  it('follows the conversation lifecycle', () => {
    expect(canTransition('initiated', 'identity_verification')).toBe(true);
    expect(canTransition('active_negotiation', 'payment_processing')).toBe(true);
    expect(canTransition('escalated', 'opted_out')).toBe(true);
    expect(canTransition('escalated', 'active_negotiation')).toBe(false);
    expect(canTransition('opted_out', 'active_negotiation')).toBe(false);
    expect(canTransition('closed', 'closed')).toBe(false);
  });
});

describe('ConversationStateMachine', () => {
  it('creates the conversation on the first committed turn', async () => {
    const generator = new ScriptedGenerator(ok(identityRequest));
    const { service, repository } = await createHarness(generator);

    const response = await service.handleTurn(turn());

    expect(response).toMatchObject({
      status: 'responded',
      conversationId: SESSION,
      state: 'identity_verification',
      action: 'verify_identity',
      escalated: false
    });
    const stored = await repository.getConversation(SESSION);
    expect(stored).toMatchObject({ accountId: ACCOUNT_ID, debtorId: DEBTOR_ID, state: 'identity_verification' });
    const messages = await repository.listMessages(SESSION);
    expect(messages.map((m) => m.role)).toEqual(['user', 'assistant']);
    expect(messages[1].confidence).toBe(0.9);
  });

  it('hands the generator recent messages and an account summary', async () => {
    const generator = new ScriptedGenerator(ok(identityRequest), ok(identityRequest));
    const { service } = await createHarness(generator);

    await service.handleTurn(turn('first'));
    await service.handleTurn(turn('second'));

    const context = generator.calls[1].context;
    expect(context.recentMessages.map((m) => m.content)).toEqual([
      'first',
      'Please confirm the last four digits of your identifier.',
      'second'
    ]);
    expect(context.account).toEqual({ id: ACCOUNT_ID, currentBalance: '1200.00', currency: 'USD', daysOverdue: 90 });
  });

  it('stores a proposed plan and its schedule once identity is verified', async () => {
    const plan = planProposal(
      { kind: 'installment', installmentAmount: 200, installments: 6, frequency: 'monthly', firstDueDate: '2025-11-10' },
      { message: 'I can set up six monthly payments of $200 to resolve your $1,200 balance.' }
    );
    const generator = new ScriptedGenerator(ok(identityRequest), ok(plan));
    const { service, repository } = await createHarness(generator);

    await service.handleTurn(turn());
    await service.verifyIdentity(SESSION, { identifierLastDigits: '1234' });
    const response = await service.handleTurn(turn('Can I pay monthly?'));

    expect(response.status).toBe('responded');
    if (response.status !== 'responded') return;
    expect(response.state).toBe('active_negotiation');
    expect(response.plan?.schedule.map((r) => r.dueDate)).toEqual([
      '2025-11-10',
      '2025-12-10',
      '2026-01-10',
      '2026-02-10',
      '2026-03-10',
      '2026-04-10'
    ]);

    const plans = await repository.listPlans(ACCOUNT_ID);
    expect(plans).toHaveLength(1);
    expect(plans[0]).toMatchObject({ status: 'proposed', totalAmount: '1200.00', conversationId: SESSION });
    expect(await repository.getSchedule(plans[0].id)).toHaveLength(6);
  });

  it('escalates when an unverified response would disclose the balance', async () => {
    const generator = new ScriptedGenerator(ok(plainProposal('inform', { message: 'You owe $1,200.' })));
    const { service, repository } = await createHarness(generator);

    const response = await service.handleTurn(turn());

    expect(response).toMatchObject({
      status: 'responded',
      action: 'escalate',
      message: HANDOFF_MESSAGE,
      state: 'escalated',
      escalated: true
    });
    const stored = await repository.getConversation(SESSION);
    expect(stored?.escalationReason).toBe('Response failed validation: identity_verification');
  });

  it.each<[string, GenerationResult | (() => Promise<GenerationResult>)]>([
    ['a typed failure', { ok: false, error: { kind: 'provider_error', message: 'upstream unavailable' } }],
    ['a thrown error', async () => { throw new Error('connection reset'); }],
    ['a timeout', () => new Promise<GenerationResult>(() => undefined)]
  ])('falls back to a technical hand-off on %s', async (_label, step) => {
    const generator = new ScriptedGenerator(step);
    const { service, repository } = await createHarness(generator, { timeoutMs: 20 });

    const response = await service.handleTurn(turn());

    expect(response).toMatchObject({
      status: 'responded',
      action: 'escalate',
      message: FALLBACK_PROPOSAL.message,
      confidence: 1,
      complianceTags: ['technical_failure_escalation'],
      state: 'escalated'
    });
    expect((await repository.getConversation(SESSION))?.escalationReason).toBe('Response generation failed');
  });

  it('answers an escalated conversation without calling the generator', async () => {
    const generator = new ScriptedGenerator({ ok: false, error: { kind: 'provider_error', message: 'down' } });
    const { service, repository } = await createHarness(generator);

    await service.handleTurn(turn());
    const response = await service.handleTurn(turn('Anyone there?'));

    expect(response).toEqual({ status: 'handed_off', conversationId: SESSION, state: 'escalated', message: ESCALATED_MESSAGE });
    expect(generator.calls).toHaveLength(1);
    expect((await repository.listMessages(SESSION)).map((m) => m.content)).toEqual([
      'Hello, I got your letter.',
      FALLBACK_PROPOSAL.message,
      'Anyone there?'
    ]);
  });

  it('closes the conversation on a close action', async () => {
    const generator = new ScriptedGenerator(ok(plainProposal('close', { message: 'Thank you, goodbye.' })));
    const { service } = await createHarness(generator);

    expect(await service.handleTurn(turn())).toMatchObject({ state: 'closed' });
    expect(await service.handleTurn(turn('one more thing'))).toMatchObject({ status: 'handed_off', message: CLOSED_MESSAGE });
  });

  it('blocks contact outside the allowed days without recording anything', async () => {
    const generator = new ScriptedGenerator(ok(identityRequest));
    const { service, repository, audit, now } = await createHarness(generator);
    now.value = new Date('2025-11-02T15:00:00Z');

    const response = await service.handleTurn(turn());

    expect(response).toEqual({
      status: 'blocked',
      conversationId: SESSION,
      message: 'Contact not allowed at this time: Contact not allowed on sunday',
      reason: 'Contact not allowed on sunday',
      severity: 'warning'
    });
    expect(generator.calls).toHaveLength(0);
    expect(await repository.getConversation(SESSION)).toBeNull();

    await audit.flush();
    const events = await repository.listComplianceEvents(SESSION);
    expect(events.map((e) => [e.eventType, e.passed])).toEqual([
      ['contact_gate.opt_out_status', true],
      ['contact_gate.contact_time', false]
    ]);
  });

  it('stops answering once the debtor opts out', async () => {
    const generator = new ScriptedGenerator(ok(identityRequest));
    const { service } = await createHarness(generator);

    await service.handleTurn(turn());
    await service.requestOptOut(SESSION);
    const response = await service.handleTurn(turn('hello?'));

    expect(response).toEqual({ status: 'opted_out', conversationId: SESSION, message: OPTED_OUT_MESSAGE });
    expect(generator.calls).toHaveLength(1);
  });

  it('rolls the whole turn back when the commit fails', async () => {
    const generator = new ScriptedGenerator(ok(identityRequest), ok(identityRequest));
    const { service, repository } = await createHarness(generator);
    repository.failNextWrite(new Error('connection lost'));

    const failure = service.handleTurn(turn());
    await expect(failure).rejects.toBeInstanceOf(PersistenceError);
    await expect(failure).rejects.toMatchObject({ retryable: true });
    expect(await repository.getConversation(SESSION)).toBeNull();
    expect(await repository.listMessages(SESSION)).toEqual([]);

    expect(await service.handleTurn(turn())).toMatchObject({ status: 'responded' });
  });

  it('commits nothing when the caller cancels during generation', async () => {
    const generator = new ScriptedGenerator(() => new Promise<GenerationResult>(() => undefined));
    const { service, repository } = await createHarness(generator, { timeoutMs: 5000 });
    const controller = new AbortController();

    const pending = service.handleTurn(turn(), { signal: controller.signal });
    setTimeout(() => controller.abort(), 10);

    await expect(pending).rejects.toBeInstanceOf(TurnCancelledError);
    expect(await repository.getConversation(SESSION)).toBeNull();
  });

  it('serializes concurrent turns on one conversation', async () => {
    const delayed = (result: GenerationResult) => () =>
      new Promise<GenerationResult>((resolve) => setTimeout(() => resolve(result), 15));
    const generator = new ScriptedGenerator(delayed(ok(identityRequest)), delayed(ok(identityRequest)));
    const { service, repository } = await createHarness(generator);

    await Promise.all([service.handleTurn(turn('one')), service.handleTurn(turn('two'))]);

    expect((await repository.listMessages(SESSION)).map((m) => m.role)).toEqual(['user', 'assistant', 'user', 'assistant']);
    expect(generator.calls[1].context.recentMessages).toHaveLength(3);
  });

  it('rejects unknown accounts and foreign sessions', async () => {
    const generator = new ScriptedGenerator(ok(identityRequest));
    const { service, repository } = await createHarness(generator);
    await service.handleTurn(turn());
    await repository.insertAccount({
      id: 'account-2',
      debtorId: DEBTOR_ID,
      accountNumber: 'ACC-0002',
      principalAmount: '300.00',
      currentBalance: '300.00'
    });

    await expect(service.handleTurn({ ...turn(), accountId: 'missing' })).rejects.toMatchObject({
      code: ErrorCode.NOT_FOUND,
      message: 'Account missing not found'
    });
    await expect(service.handleTurn({ ...turn(), accountId: 'account-2' })).rejects.toBeInstanceOf(ValidationError);
  });

  it('rejects malformed input before touching state', async () => {
    const { service } = await createHarness(new ScriptedGenerator());

    await expect(service.handleTurn(turn('   '))).rejects.toMatchObject({
      code: ErrorCode.VALIDATION_ERROR,
      message: 'message: Must be at least 1 characters.'
    });
  });
});
