/**
 * Pure set arithmetic behind membership reconciliation.
 */

export interface ReconciliationPlan {
  /** Desired members not yet in the collection */
  toAdd: string[];
  /** Current members no longer desired; empty in additive mode */
  toRemove: string[];
}

export interface PlanOptions {
  /** When false, current members are never removed */
  prune: boolean;
}

/**
 * ToAdd = desired - current, ToRemove = current - desired.
 * Output order follows the enumeration order of the inputs.
 */
export function computeReconciliationPlan(
  current: Iterable<string>,
  desired: Iterable<string>,
  options: PlanOptions
): ReconciliationPlan {
  const currentSet = new Set(current);
  const desiredSet = new Set(desired);

  const toAdd = [...desiredSet].filter((id) => !currentSet.has(id));
  const toRemove = options.prune ? [...currentSet].filter((id) => !desiredSet.has(id)) : [];

  return { toAdd, toRemove };
}

export function isEmptyPlan(plan: ReconciliationPlan): boolean {
  return plan.toAdd.length === 0 && plan.toRemove.length === 0;
}

export function chunk<T>(items: readonly T[], size: number): T[][] {
  if (!Number.isInteger(size) || size < 1) {
    throw new RangeError(`Chunk size must be a positive integer, got ${size}`);
  }
  const chunks: T[][] = [];
  for (let i = 0; i < items.length; i += size) {
    chunks.push(items.slice(i, i + size));
  }
  return chunks;
}
