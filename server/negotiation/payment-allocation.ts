import Decimal from 'decimal.js';
import type { Money, PaymentPlan, ScheduledPayment } from './types';

export interface AllocationResult {
  /** Schedule rows that received part of the payment */
  updated: ScheduledPayment[];
  plan: PaymentPlan;
  /** Amount left over after every installment was covered */
  unapplied: Money;
}

/**
 * Apply `amount` to the oldest unpaid installments of `plan`, in installment order.
 * A plan moves accepted -> active on its first payment and to completed once every row is paid.
 */
export function allocatePayment(
  plan: PaymentPlan,
  schedule: readonly ScheduledPayment[],
  amount: Money,
  transactionId: string,
  now: Date
): AllocationResult {
  let remaining = new Decimal(amount);
  const updated: ScheduledPayment[] = [];

  const ordered = [...schedule].sort((a, b) => a.installmentNo - b.installmentNo);
  const rows = ordered.map((row) => {
    if (row.status === 'paid' || remaining.lte(0)) return row;

    const paid = new Decimal(row.paidAmount);
    const unpaid = new Decimal(row.amount).minus(paid);
    const apply = Decimal.min(remaining, unpaid);
    remaining = remaining.minus(apply);

    const newPaid = paid.plus(apply);
    const fullyPaid = newPaid.gte(row.amount);
    const next: ScheduledPayment = {
      ...row,
      paidAmount: newPaid.toFixed(2),
      status: fullyPaid ? 'paid' : 'partial',
      paidAt: fullyPaid ? now : row.paidAt,
      transactionId
    };
    updated.push(next);
    return next;
  });

  const complete = rows.length > 0 && rows.every((row) => row.status === 'paid');
  let status = plan.status;
  if (complete) {
    status = 'completed';
  } else if (updated.length > 0 && status === 'accepted') {
    status = 'active';
  }

  return {
    updated,
    plan: { ...plan, status, completedAt: complete ? now : plan.completedAt },
    unapplied: remaining.toFixed(2)
  };
}
