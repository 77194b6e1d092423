/**
 * Contact Compliance Gate
 *
 * Decides whether the debtor may be contacted right now. Checks run in a fixed order and
 * stop at the first failure: opt-out, contact window, daily frequency, weekly frequency.
 * Every check that ran is returned so the caller can audit it.
 */

import dayjs, { type Dayjs } from 'dayjs';
import utc from 'dayjs/plugin/utc';
import timezone from 'dayjs/plugin/timezone';
import type { Logger } from 'pino';
import type { NegotiationPolicy, Weekday } from '../bootstrap/config';
import type { ComplianceCheck, ComplianceSeverity, ContactRecord, Debtor } from './types';

dayjs.extend(utc);
dayjs.extend(timezone);

const WEEKDAY_BY_INDEX: readonly Weekday[] = ['sunday', 'monday', 'tuesday', 'wednesday', 'thursday', 'friday', 'saturday'];

export type GateResult =
  | { allowed: true; checks: ComplianceCheck[] }
  | { allowed: false; reason: string; severity: ComplianceSeverity; checks: ComplianceCheck[] };

type GateDebtor = Pick<Debtor, 'id' | 'optOutDate' | 'contactHoursStart' | 'contactHoursEnd' | 'timezone'>;

/** Minutes since midnight for an HH:MM string, or null when it does not parse */
export function parseClock(value: string): number | null {
  const match = /^([01]\d|2[0-3]):([0-5]\d)$/.exec(value.trim());
  if (!match) return null;
  return Number(match[1]) * 60 + Number(match[2]);
}

function inWindow(minutes: number, start: number, end: number): boolean {
  if (start <= end) return minutes >= start && minutes < end;
  // overnight window, e.g. 22:00-06:00
  return minutes >= start || minutes < end;
}

export class ContactComplianceGate {
  constructor(
    private readonly policy: NegotiationPolicy,
    private readonly logger: Logger
  ) {}

  evaluate(debtor: GateDebtor, recentContactHistory: readonly ContactRecord[], now: Date): GateResult {
    const checks: ComplianceCheck[] = [];

    const steps = [
      () => this.checkOptOut(debtor),
      () => this.checkContactWindow(debtor, now),
      () => this.checkDailyFrequency(debtor, recentContactHistory, now),
      () => this.checkWeeklyFrequency(recentContactHistory, now)
    ];

    for (const step of steps) {
      const check = step();
      checks.push(check);
      if (!check.passed) {
        return { allowed: false, reason: check.details, severity: check.severity, checks };
      }
    }

    return { allowed: true, checks };
  }

  private checkOptOut(debtor: GateDebtor): ComplianceCheck {
    if (debtor.optOutDate) {
      return {
        name: 'opt_out_status',
        passed: false,
        severity: 'critical',
        details: `Debtor opted out on ${debtor.optOutDate.toISOString()}`
      };
    }
    return { name: 'opt_out_status', passed: true, severity: 'info', details: 'Debtor has not opted out' };
  }

  private checkContactWindow(debtor: GateDebtor, now: Date): ComplianceCheck {
    const local = this.localTime(debtor, now);
    if (!local) {
      return this.failOpen(debtor, `unknown timezone "${debtor.timezone}"`);
    }

    const weekday = WEEKDAY_BY_INDEX[local.day()];
    if (this.policy.prohibitedContactDays.includes(weekday)) {
      return {
        name: 'contact_time',
        passed: false,
        severity: 'warning',
        details: `Contact not allowed on ${weekday}`
      };
    }

    const startRaw = debtor.contactHoursStart ?? this.policy.contactHoursStart;
    const endRaw = debtor.contactHoursEnd ?? this.policy.contactHoursEnd;
    const start = parseClock(startRaw);
    const end = parseClock(endRaw);
    if (start === null || end === null) {
      return this.failOpen(debtor, `unparsable contact window "${startRaw}"-"${endRaw}"`);
    }

    const minutes = local.hour() * 60 + local.minute();
    if (!inWindow(minutes, start, end)) {
      return {
        name: 'contact_time',
        passed: false,
        severity: 'warning',
        details: `Contact only allowed between ${startRaw} and ${endRaw}`
      };
    }

    return { name: 'contact_time', passed: true, severity: 'info', details: 'Contact time is within allowed hours' };
  }

  private checkDailyFrequency(debtor: GateDebtor, history: readonly ContactRecord[], now: Date): ComplianceCheck {
    const max = this.policy.maxDailyContactAttempts;
    const tz = this.localTime(debtor, now) ? debtor.timezone : 'UTC';
    const today = dayjs(now).tz(tz).format('YYYY-MM-DD');
    const count = history.filter((c) => dayjs(c.openedAt).tz(tz).format('YYYY-MM-DD') === today).length;

    if (count >= max) {
      return {
        name: 'daily_contact_frequency',
        passed: false,
        severity: 'warning',
        details: `Maximum daily contact attempts (${max}) exceeded`
      };
    }
    return { name: 'daily_contact_frequency', passed: true, severity: 'info', details: `Daily contact attempts: ${count}/${max}` };
  }

  private checkWeeklyFrequency(history: readonly ContactRecord[], now: Date): ComplianceCheck {
    const max = this.policy.maxWeeklyContactAttempts;
    const since = dayjs(now).subtract(7, 'day');
    const count = history.filter((c) => !dayjs(c.openedAt).isBefore(since) && !dayjs(c.openedAt).isAfter(now)).length;

    if (count >= max) {
      return {
        name: 'weekly_contact_frequency',
        passed: false,
        severity: 'warning',
        details: `Maximum weekly contact attempts (${max}) exceeded`
      };
    }
    return { name: 'weekly_contact_frequency', passed: true, severity: 'info', details: `Weekly contact attempts: ${count}/${max}` };
  }

  private localTime(debtor: GateDebtor, now: Date): Dayjs | null {
    try {
      return dayjs(now).tz(debtor.timezone);
    } catch {
      return null;
    }
  }

  // Unusable window configuration passes with a warning
  private failOpen(debtor: GateDebtor, problem: string): ComplianceCheck {
    this.logger.warn({ debtorId: debtor.id }, `[ContactGate] ${problem}; allowing contact`);
    return {
      name: 'contact_time',
      passed: true,
      severity: 'warning',
      details: `Contact window not enforced: ${problem}`
    };
  }
}
