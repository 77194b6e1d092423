/**
 * Payment Plan Builder
 * Validates a proposed plan against policy and derives its payment schedule
 */

import Decimal from 'decimal.js';
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import type { NegotiationPolicy } from '../bootstrap/config';
import { checkPlanPolicy } from './plan-policy';
import type {
  ComplianceCheck,
  DerivedPlan,
  IsoDate,
  Money,
  PlanFrequency,
  PlanProposal,
  PolicyViolation,
  ScheduleRow
} from './types';

dayjs.extend(utc);

export const DEFAULT_FIRST_DUE_OFFSET_DAYS = 7;

export type PlanBuildResult =
  | { ok: true; plan: DerivedPlan; schedule: ScheduleRow[]; checks: ComplianceCheck[] }
  | { ok: false; violations: PolicyViolation[]; checks: ComplianceCheck[] };

/**
 * Due date of the installment at `index` (0-based). Each date is derived from the first one,
 * so month-end clamping never accumulates across the schedule.
 */
export function dueDateAt(firstDueDate: IsoDate, frequency: PlanFrequency, index: number): IsoDate {
  const first = dayjs.utc(firstDueDate);
  switch (frequency) {
    case 'weekly':
      return first.add(index * 7, 'day').format('YYYY-MM-DD');
    case 'bi-weekly':
      return first.add(index * 14, 'day').format('YYYY-MM-DD');
    case 'monthly':
      return first.add(index, 'month').format('YYYY-MM-DD');
  }
}

export function buildSchedule(
  firstDueDate: IsoDate,
  frequency: PlanFrequency,
  installments: number,
  installmentAmount: Money
): ScheduleRow[] {
  const rows: ScheduleRow[] = [];
  for (let i = 0; i < installments; i++) {
    rows.push({
      installmentNo: i + 1,
      dueDate: dueDateAt(firstDueDate, frequency, i),
      amount: installmentAmount
    });
  }
  return rows;
}

export class PaymentPlanBuilder {
  constructor(private readonly policy: NegotiationPolicy) {}

  /**
   * Validate `proposal` against the balance as it stands now and derive the schedule.
   * Violations are returned as data; deciding what to do about them is the caller's job.
   */
  build(currentBalance: Money, proposal: PlanProposal, now: Date): PlanBuildResult {
    const { checks, violations } = checkPlanPolicy(proposal, currentBalance, this.policy);
    if (violations.length > 0) {
      return { ok: false, violations, checks };
    }

    const firstDueDate = proposal.firstDueDate
      ?? dayjs.utc(now).add(DEFAULT_FIRST_DUE_OFFSET_DAYS, 'day').format('YYYY-MM-DD');

    let plan: DerivedPlan;
    if (proposal.kind === 'installment') {
      const installmentAmount = new Decimal(proposal.installmentAmount).toDecimalPlaces(2);
      plan = {
        kind: 'installment',
        installmentAmount: installmentAmount.toFixed(2),
        installmentCount: proposal.installments,
        totalAmount: installmentAmount.times(proposal.installments).toFixed(2),
        firstDueDate,
        frequency: proposal.frequency ?? 'monthly'
      };
    } else {
      const amount = new Decimal(proposal.amount).toFixed(2);
      plan = {
        kind: proposal.kind,
        installmentAmount: amount,
        installmentCount: 1,
        totalAmount: amount,
        firstDueDate,
        frequency: 'monthly'
      };
    }

    return {
      ok: true,
      plan,
      schedule: buildSchedule(plan.firstDueDate, plan.frequency, plan.installmentCount, plan.installmentAmount),
      checks
    };
  }
}
