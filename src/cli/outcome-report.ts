import { ReconciliationOutcome } from '../reconcile/set-reconciler.js';

export interface SelectionSummary {
  unmatched: string[];
  complete: boolean;
}

function describeTarget(outcome: ReconciliationOutcome): string {
  const id = outcome.target.id ? ` (${outcome.target.id})` : '';
  if (outcome.target.created) return `${outcome.target.displayName}${id} [created]`;
  if (outcome.target.wouldCreate) return `${outcome.target.displayName} [would be created]`;
  return `${outcome.target.displayName}${id}`;
}

export function formatOutcomeText(outcome: ReconciliationOutcome, selection: SelectionSummary): string {
  const lines: string[] = [
    `Group: ${describeTarget(outcome)}`,
    `Mode: ${outcome.mode} (${outcome.prune ? 'prune' : 'additive'})`,
    `Planned: +${outcome.plan.toAdd.length} / -${outcome.plan.toRemove.length}`,
    `Added: ${outcome.addedCount}  Removed: ${outcome.removedCount}  Unresolved: ${outcome.unresolvedCount}  Failed batches: ${outcome.failedBatchCount}`,
  ];

  if (!outcome.membershipComplete) {
    lines.push('Warning: current membership was read incompletely; no members were removed');
  }
  if (!selection.complete) {
    lines.push('Warning: the device selection was read incompletely');
  }

  if (outcome.unresolved.length > 0) {
    lines.push('', 'Unresolved devices:');
    for (const entry of outcome.unresolved) {
      lines.push(`  - ${entry.label} (${entry.reason}): ${entry.detail}`);
    }
  }

  if (selection.unmatched.length > 0) {
    lines.push('', 'Unmatched selections:');
    for (const value of selection.unmatched) {
      lines.push(`  - ${value}`);
    }
  }

  if (outcome.failedBatches.length > 0) {
    lines.push('', 'Failed batches:');
    for (const batch of outcome.failedBatches) {
      lines.push(`  - ${batch.kind} ${batch.members.length} member(s): ${batch.error.message}`);
    }
  }

  return lines.join('\n');
}

export function formatOutcomeJson(outcome: ReconciliationOutcome, selection: SelectionSummary): string {
  return JSON.stringify({ ...outcome, selection }, null, 2);
}
