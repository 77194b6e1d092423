/**
 * Payment plan ceilings shared by the plan builder and the response validator
 */

import Decimal from 'decimal.js';
import dayjs from 'dayjs';
import utc from 'dayjs/plugin/utc';
import type { NegotiationPolicy } from '../bootstrap/config';
import type { ComplianceCheck, Money, PlanProposal, PolicyViolation, PolicyViolationCode } from './types';

dayjs.extend(utc);

export interface PlanPolicyResult {
  checks: ComplianceCheck[];
  violations: PolicyViolation[];
}

const pct = (d: Decimal) => `${d.times(100).toFixed(1)}%`;

// NaN and infinite amounts compare false against every ceiling, so they are rejected up front
const notFinite = (label: string, amount: Decimal) => `${label} amount ${amount.toString()} is not a finite number`;

export function isValidIsoDate(value: string): boolean {
  if (!/^\d{4}-\d{2}-\d{2}$/.test(value)) return false;
  const parsed = dayjs.utc(value);
  return parsed.isValid() && parsed.format('YYYY-MM-DD') === value;
}

export function checkPlanPolicy(
  plan: PlanProposal,
  currentBalance: Money,
  policy: NegotiationPolicy
): PlanPolicyResult {
  const checks: ComplianceCheck[] = [];
  const violations: PolicyViolation[] = [];

  const record = (name: PolicyViolationCode, passed: boolean, details: string) => {
    checks.push({ name, passed, severity: passed ? 'info' : 'error', details });
    if (!passed) violations.push({ code: name, message: details, severity: 'error' });
  };

  switch (plan.kind) {
    case 'settlement': {
      const amount = new Decimal(plan.amount);
      const balance = new Decimal(currentBalance);
      if (!amount.isFinite()) {
        record('non_positive_amount', false, notFinite('Settlement', amount));
      } else if (amount.lte(0)) {
        record('non_positive_amount', false, `Settlement amount ${amount.toFixed(2)} must be positive`);
      }
      if (balance.lte(0)) {
        record('settlement_percentage', false, 'Settlement offered on an account with no outstanding balance');
      } else if (amount.isFinite()) {
        const ratio = amount.div(balance);
        const max = new Decimal(policy.maxSettlementPercentage);
        if (ratio.gt(max)) {
          record('settlement_percentage', false, `Settlement percentage ${pct(ratio)} exceeds maximum ${pct(max)}`);
        } else {
          record('settlement_percentage', true, `Settlement percentage ${pct(ratio)} is within limits`);
        }
      }
      break;
    }

    case 'installment': {
      const count = plan.installments;
      const max = policy.maxInstallmentMonths;
      if (!Number.isInteger(count) || count < 1) {
        record('installment_duration', false, `Installment count ${count} must be a whole number between 1 and ${max}`);
      } else if (count > max) {
        record('installment_duration', false, `Installment plan duration ${count} exceeds maximum ${max}`);
      } else {
        record('installment_duration', true, `Installment plan duration ${count} is within limits`);
      }

      const amount = new Decimal(plan.installmentAmount);
      const minimum = new Decimal(policy.minimumInstallmentAmount);
      if (!amount.isFinite()) {
        record('non_positive_amount', false, notFinite('Installment', amount));
      } else if (amount.lt(minimum)) {
        record('minimum_payment', false, `Installment amount ${amount.toFixed(2)} is below minimum ${minimum.toFixed(2)}`);
      } else {
        record('minimum_payment', true, `Installment amount ${amount.toFixed(2)} meets minimum requirements`);
      }
      break;
    }

    case 'one_time': {
      const amount = new Decimal(plan.amount);
      if (!amount.isFinite()) {
        record('non_positive_amount', false, notFinite('Payment', amount));
      } else {
        record('non_positive_amount', amount.gt(0), amount.gt(0)
          ? `Payment amount ${amount.toFixed(2)} is positive`
          : `Payment amount ${amount.toFixed(2)} must be positive`);
      }
      break;
    }
  }

  if (plan.firstDueDate !== undefined && !isValidIsoDate(plan.firstDueDate)) {
    record('invalid_due_date', false, `First due date "${plan.firstDueDate}" is not a YYYY-MM-DD date`);
  }

  return { checks, violations };
}
