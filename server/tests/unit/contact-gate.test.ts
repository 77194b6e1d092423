/**
 * Unit Tests: Contact Compliance Gate
 * Opt-out, contact window, daily and weekly frequency limits
 */

import { describe, it, expect } from 'vitest';
import { definePolicy } from '../../bootstrap/config';
import { silentLogger } from '../../bootstrap/logger';
import { ContactComplianceGate, parseClock } from '../../negotiation/contact-gate';
import type { ContactRecord } from '../../negotiation/types';
import { MONDAY_AFTERNOON, makeDebtor, spyWarn } from '../helpers/fixtures';

const policy = definePolicy();
const gate = new ContactComplianceGate(policy, silentLogger());

const contactsAt = (...isoTimes: string[]): ContactRecord[] =>
  isoTimes.map((iso, i) => ({ conversationId: `c-${i}`, openedAt: new Date(iso) }));

describe('parseClock', () => {
  it('parses HH:MM into minutes since midnight', () => {
    expect(parseClock('08:00')).toBe(480);
    expect(parseClock('21:30')).toBe(1290);
  });

  it('rejects malformed values', () => {
    expect(parseClock('8am')).toBeNull();
    expect(parseClock('24:00')).toBeNull();
    expect(parseClock('12:60')).toBeNull();
  });
});

describe('ContactComplianceGate', () => {
  it('allows contact inside the window with no history', () => {
    const result = gate.evaluate(makeDebtor(), [], MONDAY_AFTERNOON);

    expect(result.allowed).toBe(true);
    expect(result.checks.map((c) => c.name)).toEqual([
      'opt_out_status',
      'contact_time',
      'daily_contact_frequency',
      'weekly_contact_frequency'
    ]);
    expect(result.checks.every((c) => c.passed)).toBe(true);
  });

  it('blocks an opted-out debtor with critical severity and stops there', () => {
    const debtor = makeDebtor({ optOutDate: new Date('2025-10-01T00:00:00Z') });
    const result = gate.evaluate(debtor, [], MONDAY_AFTERNOON);

    expect(result.allowed).toBe(false);
    if (result.allowed) return;
    expect(result.severity).toBe('critical');
    expect(result.reason).toBe('Debtor opted out on 2025-10-01T00:00:00.000Z');
    expect(result.checks).toHaveLength(1);
  });

  it('blocks contact on a prohibited weekday', () => {
    const sunday = new Date('2025-11-02T15:00:00Z');
    const result = gate.evaluate(makeDebtor(), [], sunday);

    expect(result).toMatchObject({ allowed: false, reason: 'Contact not allowed on sunday', severity: 'warning' });
  });

  it('treats the window as start-inclusive and end-exclusive', () => {
    const atStart = gate.evaluate(makeDebtor(), [], new Date('2025-11-03T08:00:00Z'));
    const atEnd = gate.evaluate(makeDebtor(), [], new Date('2025-11-03T21:00:00Z'));

    expect(atStart.allowed).toBe(true);
    expect(atEnd).toMatchObject({ allowed: false, reason: 'Contact only allowed between 08:00 and 21:00' });
  });

  it('evaluates the window in the debtor timezone', () => {
    const debtor = makeDebtor({ timezone: 'America/New_York' });

    // 12:00Z is 07:00 in New York after the November clock change
    expect(gate.evaluate(debtor, [], new Date('2025-11-03T12:00:00Z')).allowed).toBe(false);
    expect(gate.evaluate(debtor, [], new Date('2025-11-03T13:00:00Z')).allowed).toBe(true);
  });

  it('applies a per-debtor overnight window', () => {
    const debtor = makeDebtor({ contactHoursStart: '22:00', contactHoursEnd: '06:00' });

    expect(gate.evaluate(debtor, [], new Date('2025-11-03T23:30:00Z')).allowed).toBe(true);
    expect(gate.evaluate(debtor, [], new Date('2025-11-04T05:59:00Z')).allowed).toBe(true);
    expect(gate.evaluate(debtor, [], MONDAY_AFTERNOON)).toMatchObject({
      allowed: false,
      reason: 'Contact only allowed between 22:00 and 06:00'
    });
  });

  it('fails open on an unknown timezone and logs a warning', () => {
    const { logger, warn } = spyWarn();
    const lenient = new ContactComplianceGate(policy, logger);
    const result = lenient.evaluate(makeDebtor({ timezone: 'Not/AZone' }), [], MONDAY_AFTERNOON);

    expect(result.allowed).toBe(true);
    const windowCheck = result.checks.find((c) => c.name === 'contact_time');
    expect(windowCheck).toMatchObject({ passed: true, severity: 'warning' });
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('fails open on an unparsable window', () => {
    const { logger, warn } = spyWarn();
    const lenient = new ContactComplianceGate(policy, logger);
    const result = lenient.evaluate(makeDebtor({ contactHoursStart: '8am' }), [], new Date('2025-11-03T23:00:00Z'));

    expect(result.allowed).toBe(true);
    expect(result.checks[1].details).toBe('Contact window not enforced: unparsable contact window "8am"-"21:00"');
    expect(warn).toHaveBeenCalledTimes(1);
  });

  it('blocks once the daily limit is reached', () => {
    const history = contactsAt('2025-11-03T09:00:00Z', '2025-11-03T11:00:00Z', '2025-11-03T13:00:00Z');
    const result = gate.evaluate(makeDebtor(), history, MONDAY_AFTERNOON);

    expect(result).toMatchObject({ allowed: false, reason: 'Maximum daily contact attempts (3) exceeded', severity: 'warning' });
    expect(result.checks).toHaveLength(3);
  });

  it('counts the daily limit by local calendar day', () => {
    // 02:00Z on the 3rd is still the 2nd in New York
    const debtor = makeDebtor({ timezone: 'America/New_York' });
    const history = contactsAt('2025-11-03T02:00:00Z', '2025-11-03T03:00:00Z', '2025-11-03T14:00:00Z');

    expect(gate.evaluate(debtor, history, MONDAY_AFTERNOON).allowed).toBe(true);
  });

  it('blocks once the trailing seven-day limit is reached', () => {
    const history = contactsAt(
      '2025-10-28T10:00:00Z',
      '2025-10-29T10:00:00Z',
      '2025-10-30T10:00:00Z',
      '2025-10-31T10:00:00Z',
      '2025-11-01T10:00:00Z',
      '2025-11-01T12:00:00Z',
      '2025-11-02T10:00:00Z'
    );
    const result = gate.evaluate(makeDebtor(), history, MONDAY_AFTERNOON);

    expect(result).toMatchObject({ allowed: false, reason: 'Maximum weekly contact attempts (7) exceeded' });
    expect(result.checks).toHaveLength(4);
  });

  it('ignores contacts older than seven days', () => {
    const history = contactsAt(
      '2025-10-26T10:00:00Z',
      '2025-10-27T10:00:00Z',
      '2025-10-29T10:00:00Z',
      '2025-10-30T10:00:00Z',
      '2025-10-31T10:00:00Z',
      '2025-11-01T10:00:00Z',
      '2025-11-02T10:00:00Z'
    );

    expect(gate.evaluate(makeDebtor(), history, MONDAY_AFTERNOON).allowed).toBe(true);
  });
});
