import { createLogger } from '../utils/logger.js';
import { NotFoundError, TargetCollectionError } from '../utils/errors.js';
import { ErrorContext, buildErrorContext, toGraphApiError } from '../utils/error-handler.js';
import { ThrottleController } from '../utils/throttle.js';
import { parseEntity, stringField } from '../graph/entity.js';
import { GraphEndpoints, odataEquals } from '../graph/endpoints.js';
import { PagedFetcher } from '../graph/paged-fetcher.js';
import { GraphTransport } from '../graph/transport.js';
import {
  DesiredDevice,
  IdentityKey,
  IdentityResolver,
  NotFoundReason,
  describeDevice,
} from '../graph/identity-resolver.js';
import { ReconciliationPlan, chunk, computeReconciliationPlan } from './plan.js';

const logger = createLogger('set-reconciler');

/** Hard ceiling of the members@odata.bind list per request */
export const MAX_BATCH_SIZE = 20;

export type ReconcileMode = 'CreateOnly' | 'CreateOrUpdate' | 'DryRun';

export interface TargetCollection {
  /** Known group id; otherwise the group is looked up by exact display name */
  id?: string;
  displayName: string;
  description?: string;
}

export interface ReconcileOptions {
  mode: ReconcileMode;
  /** Remove members that are not desired (default true); false = additive */
  prune?: boolean;
  /** Use the batched identity lookup variant */
  batchedLookups?: boolean;
}

export interface SetReconcilerOptions {
  batchSize?: number;
}

export interface UnresolvedEntry {
  label: string;
  key: IdentityKey;
  reason: NotFoundReason;
  detail: string;
}

export interface FailedBatch {
  kind: 'add' | 'remove';
  members: string[];
  error: ErrorContext;
}

export interface ReconciliationOutcome {
  target: {
    id?: string;
    displayName: string;
    created: boolean;
    /** DryRun against a group that does not exist yet */
    wouldCreate: boolean;
  };
  mode: ReconcileMode;
  prune: boolean;
  plan: ReconciliationPlan;
  addedCount: number;
  removedCount: number;
  unresolvedCount: number;
  failedBatchCount: number;
  unresolved: UnresolvedEntry[];
  failedBatches: FailedBatch[];
  /** False when current membership could only be read partially */
  membershipComplete: boolean;
  startedAt: string;
  finishedAt: string;
}

interface LocatedTarget {
  id: string;
  displayName: string;
}

/** Non-zero when the run made only partial progress */
export function outcomeExitCode(outcome: ReconciliationOutcome): number {
  return outcome.unresolvedCount > 0 || outcome.failedBatchCount > 0 || !outcome.membershipComplete ? 1 : 0;
}

export function mailNicknameFor(displayName: string): string {
  const nickname = displayName.replace(/[^A-Za-z0-9]/g, '').slice(0, 64);
  return nickname.length > 0 ? nickname : 'devicegroup';
}

/**
 * Moves a group's membership to a desired device set with the fewest writes:
 * adds in bounded PATCH batches, removals one reference at a time.
 *
 * A failed batch is recorded and the remaining batches still run. Only an
 * unusable target (conflict, ambiguity, lookup failure) aborts the run.
 */
export class SetReconciler {
  private readonly batchSize: number;

  constructor(
    private readonly transport: GraphTransport,
    private readonly fetcher: PagedFetcher,
    private readonly resolver: IdentityResolver,
    private readonly throttle: ThrottleController,
    private readonly endpoints: GraphEndpoints,
    options: SetReconcilerOptions = {}
  ) {
    this.batchSize = Math.min(MAX_BATCH_SIZE, Math.max(1, Math.floor(options.batchSize ?? MAX_BATCH_SIZE)));
  }

  async reconcile(
    target: TargetCollection,
    desired: readonly DesiredDevice[],
    options: ReconcileOptions
  ): Promise<ReconciliationOutcome> {
    const startedAt = new Date().toISOString();
    const prune = options.prune ?? true;
    const dryRun = options.mode === 'DryRun';

    const located = await this.locateTarget(target);
    if (located && options.mode === 'CreateOnly') {
      throw new TargetCollectionError(
        `Group "${located.displayName}" already exists`,
        'TARGET_EXISTS',
        { groupId: located.id },
        ['Run in CreateOrUpdate mode to update the existing group']
      );
    }

    const resolution = await this.resolver.resolveMany(desired, { batched: options.batchedLookups });
    const unresolved = resolution.unresolved.map(
      (entry): UnresolvedEntry => ({
        label: describeDevice(entry.device),
        key: entry.device.key,
        reason: entry.reason,
        detail: entry.detail,
      })
    );
    const desiredIds = resolution.resolved.map((entry) => entry.directoryObjectId);

    let groupId = located?.id;
    let created = false;
    if (!located && !dryRun) {
      groupId = await this.createTarget(target);
      created = true;
    }

    let current: string[] = [];
    let membershipComplete = true;
    if (located) {
      const fetched = await this.fetcher.fetchAllDetailed(this.endpoints.groupDeviceMembers(located.id, { select: ['id'] }));
      current = fetched.entities.map((entity) => entity.id);
      membershipComplete = fetched.complete;
      if (!fetched.complete && prune) {
        logger.warn('Current membership read incompletely; removals suppressed for this run', {
          groupId: located.id,
          membersRead: current.length,
        });
      }
    }

    const plan = computeReconciliationPlan(current, desiredIds, { prune: prune && membershipComplete });
    logger.info('Reconciliation plan computed', {
      group: target.displayName,
      mode: options.mode,
      current: current.length,
      desired: desired.length,
      resolved: desiredIds.length,
      unresolved: unresolved.length,
      toAdd: plan.toAdd.length,
      toRemove: plan.toRemove.length,
    });

    const failedBatches: FailedBatch[] = [];
    let addedCount = 0;
    let removedCount = 0;

    if (!dryRun && groupId !== undefined) {
      addedCount = await this.applyAdds(groupId, plan.toAdd, failedBatches);
      removedCount = await this.applyRemovals(groupId, plan.toRemove, failedBatches);
    }

    const outcome: ReconciliationOutcome = {
      target: {
        id: groupId,
        displayName: located?.displayName ?? target.displayName,
        created,
        wouldCreate: dryRun && !located,
      },
      mode: options.mode,
      prune,
      plan,
      addedCount,
      removedCount,
      unresolvedCount: unresolved.length,
      failedBatchCount: failedBatches.length,
      unresolved,
      failedBatches,
      membershipComplete,
      startedAt,
      finishedAt: new Date().toISOString(),
    };

    logger.info('Reconciliation finished', {
      group: outcome.target.displayName,
      added: addedCount,
      removed: removedCount,
      unresolved: outcome.unresolvedCount,
      failedBatches: outcome.failedBatchCount,
    });
    return outcome;
  }

  private async locateTarget(target: TargetCollection): Promise<LocatedTarget | null> {
    if (target.id) {
      const uri = this.endpoints.group(target.id);
      try {
        const entity = parseEntity(
          await this.throttle.run(() => this.transport.get(uri), { operation: 'getGroup', uri })
        );
        return { id: entity.id, displayName: stringField(entity, 'displayName') ?? target.displayName };
      } catch (error) {
        if (error instanceof NotFoundError) {
          throw new TargetCollectionError(`Group ${target.id} does not exist`, 'TARGET_NOT_FOUND', { groupId: target.id });
        }
        throw toGraphApiError(error, { operation: 'getGroup', uri });
      }
    }

    const fetched = await this.fetcher.fetchAllDetailed(
      this.endpoints.groups({ filter: odataEquals('displayName', target.displayName), select: ['id', 'displayName'] })
    );
    if (!fetched.complete) {
      throw new TargetCollectionError(
        `Lookup of group "${target.displayName}" failed: ${fetched.failure?.message ?? 'incomplete result'}`,
        'TARGET_LOOKUP_FAILED',
        { displayName: target.displayName }
      );
    }
    if (fetched.entities.length > 1) {
      throw new TargetCollectionError(
        `${fetched.entities.length} groups are named "${target.displayName}"`,
        'TARGET_AMBIGUOUS',
        { displayName: target.displayName, groupIds: fetched.entities.map((entity) => entity.id) },
        ['Pass the group id instead of its name']
      );
    }
    if (fetched.entities.length === 0) {
      return null;
    }
    const [entity] = fetched.entities;
    return { id: entity.id, displayName: stringField(entity, 'displayName') ?? target.displayName };
  }

  private async createTarget(target: TargetCollection): Promise<string> {
    const uri = this.endpoints.groups();
    const body = {
      displayName: target.displayName,
      ...(target.description ? { description: target.description } : {}),
      mailEnabled: false,
      mailNickname: mailNicknameFor(target.displayName),
      securityEnabled: true,
    };
    const entity = parseEntity(await this.throttle.run(() => this.transport.post(uri, body), { operation: 'createGroup', uri }));
    logger.info('Created group', { groupId: entity.id, displayName: target.displayName });
    return entity.id;
  }

  private async applyAdds(groupId: string, toAdd: readonly string[], failed: FailedBatch[]): Promise<number> {
    const uri = this.endpoints.group(groupId);
    let added = 0;

    for (const members of chunk(toAdd, this.batchSize)) {
      const body = { 'members@odata.bind': members.map((id) => this.endpoints.directoryObjectRef(id)) };
      try {
        await this.throttle.run(() => this.transport.patch(uri, body), { operation: 'addMembers', uri, count: members.length });
        added += members.length;
      } catch (error) {
        const context = buildErrorContext(error, 'addMembers', 'set-reconciler', { uri, members });
        logger.error('Add batch failed; continuing with remaining batches', { uri, count: members.length, error: context.message });
        failed.push({ kind: 'add', members, error: context });
      }
    }
    return added;
  }

  private async applyRemovals(groupId: string, toRemove: readonly string[], failed: FailedBatch[]): Promise<number> {
    let removed = 0;

    for (const memberId of toRemove) {
      const uri = this.endpoints.groupMemberRef(groupId, memberId);
      try {
        await this.throttle.run(() => this.transport.delete(uri), { operation: 'removeMember', uri });
        removed++;
      } catch (error) {
        if (error instanceof NotFoundError) {
          // Already gone; the end state is what we wanted.
          logger.debug('Member already absent', { uri });
          removed++;
          continue;
        }
        const context = buildErrorContext(error, 'removeMember', 'set-reconciler', { uri, memberId });
        logger.error('Member removal failed; continuing', { uri, error: context.message });
        failed.push({ kind: 'remove', members: [memberId], error: context });
      }
    }
    return removed;
  }
}
