import { createLogger } from '../utils/logger.js';
import { NotFoundError } from '../utils/errors.js';
import { buildErrorContext, toGraphApiError } from '../utils/error-handler.js';
import { ThrottleController } from '../utils/throttle.js';
import { chunk } from '../reconcile/plan.js';
import {
  Entity,
  ManagedDeviceFields,
  DirectoryDeviceFields,
  parseEntity,
  readDirectoryDevice,
  readManagedDevice,
} from './entity.js';
import { GraphEndpoints, odataEquals, odataIn } from './endpoints.js';
import { FetchResult, PagedFetcher } from './paged-fetcher.js';
import { GraphTransport } from './transport.js';

const logger = createLogger('identity-resolver');

export type IdentifierNamespace = 'managementId' | 'hardwareSerial' | 'directoryObjectId';

export const IDENTIFIER_NAMESPACES: readonly IdentifierNamespace[] = ['managementId', 'hardwareSerial', 'directoryObjectId'];

export interface IdentityKey {
  namespace: IdentifierNamespace;
  value: string;
}

export interface DesiredDevice {
  key: IdentityKey;
  /** Management catalogue record when the caller already has it */
  record?: Entity;
  /** Human-readable name for reports */
  label?: string;
}

export type NotFoundReason = 'missing' | 'ambiguous' | 'lookupFailed';

export type Resolution =
  | { status: 'resolved'; namespace: IdentifierNamespace; value: string }
  | { status: 'notFound'; namespace: IdentifierNamespace; reason: NotFoundReason; detail: string };

export interface UnresolvedDevice {
  device: DesiredDevice;
  reason: NotFoundReason;
  detail: string;
}

export interface ResolveManyResult {
  resolved: Array<{ device: DesiredDevice; directoryObjectId: string }>;
  unresolved: UnresolvedDevice[];
}

export interface ResolveManyOptions {
  /** Group directory lookups into `deviceId in (...)` queries */
  batched?: boolean;
}

/** Values per `in (...)` filter in batched mode */
export const BATCHED_LOOKUP_SIZE = 15;

const DIRECTORY_DEVICE_SELECT = ['id', DirectoryDeviceFields.platformDeviceId, DirectoryDeviceFields.displayName];

type Lookup<T> = { ok: true; value: T } | { ok: false; reason: NotFoundReason; detail: string };

const miss = <T>(reason: NotFoundReason, detail: string): Lookup<T> => ({ ok: false, reason, detail });

export function describeDevice(device: DesiredDevice): string {
  return device.label ?? `${device.key.namespace}:${device.key.value}`;
}

/**
 * Translates devices between the management catalogue id, the hardware
 * serial and the directory object id.
 *
 * The management record is the pivot: it carries the serial and the
 * platform device id, and the platform id finds the directory object.
 */
export class IdentityResolver {
  constructor(
    private readonly transport: GraphTransport,
    private readonly fetcher: PagedFetcher,
    private readonly throttle: ThrottleController,
    private readonly endpoints: GraphEndpoints
  ) {}

  async resolve(
    device: DesiredDevice,
    fromNamespace: IdentifierNamespace = device.key.namespace,
    toNamespace: IdentifierNamespace = 'directoryObjectId'
  ): Promise<Resolution> {
    const lookup = await this.lookup(device, fromNamespace, toNamespace);
    if (lookup.ok) {
      return { status: 'resolved', namespace: toNamespace, value: lookup.value };
    }
    this.warnUnresolved(device, lookup.reason, lookup.detail);
    return { status: 'notFound', namespace: toNamespace, reason: lookup.reason, detail: lookup.detail };
  }

  /**
   * Resolve every device to a directory object id, one lookup per device
   * unless `batched` is set. Failures are collected, never thrown.
   */
  async resolveMany(devices: readonly DesiredDevice[], options: ResolveManyOptions = {}): Promise<ResolveManyResult> {
    if (options.batched) {
      return this.resolveManyBatched(devices);
    }

    const result: ResolveManyResult = { resolved: [], unresolved: [] };
    for (const device of devices) {
      const resolution = await this.resolve(device, device.key.namespace, 'directoryObjectId');
      if (resolution.status === 'resolved') {
        result.resolved.push({ device, directoryObjectId: resolution.value });
      } else {
        result.unresolved.push({ device, reason: resolution.reason, detail: resolution.detail });
      }
    }
    return result;
  }

  private async resolveManyBatched(devices: readonly DesiredDevice[]): Promise<ResolveManyResult> {
    const result: ResolveManyResult = { resolved: [], unresolved: [] };
    const pendingByPlatformId = new Map<string, DesiredDevice[]>();

    for (const device of devices) {
      if (device.key.namespace === 'directoryObjectId') {
        result.resolved.push({ device, directoryObjectId: device.key.value });
        continue;
      }

      const managed = await this.managedRecord(device, device.key.namespace);
      if (!managed.ok) {
        this.recordUnresolved(result, device, managed.reason, managed.detail);
        continue;
      }

      const view = readManagedDevice(managed.value);
      if (view.directoryObjectId) {
        result.resolved.push({ device, directoryObjectId: view.directoryObjectId });
      } else if (!view.platformDeviceId) {
        this.recordUnresolved(result, device, 'missing', `Managed device ${view.managementId} has no directory device id`);
      } else {
        const waiting = pendingByPlatformId.get(view.platformDeviceId) ?? [];
        waiting.push(device);
        pendingByPlatformId.set(view.platformDeviceId, waiting);
      }
    }

    for (const platformIds of chunk([...pendingByPlatformId.keys()], BATCHED_LOOKUP_SIZE)) {
      const uri = this.endpoints.directoryDevices({
        filter: odataIn(DirectoryDeviceFields.platformDeviceId, platformIds),
        select: DIRECTORY_DEVICE_SELECT,
      });
      const fetched = await this.query(uri);

      const matches = new Map<string, string[]>();
      for (const entity of fetched.entities) {
        const view = readDirectoryDevice(entity);
        if (!view.platformDeviceId) continue;
        const ids = matches.get(view.platformDeviceId.toLowerCase()) ?? [];
        ids.push(view.directoryObjectId);
        matches.set(view.platformDeviceId.toLowerCase(), ids);
      }

      for (const platformId of platformIds) {
        const waiting = pendingByPlatformId.get(platformId) ?? [];
        const ids = matches.get(platformId.toLowerCase()) ?? [];
        for (const device of waiting) {
          if (ids.length === 1) {
            result.resolved.push({ device, directoryObjectId: ids[0] });
          } else if (ids.length > 1) {
            this.recordUnresolved(result, device, 'ambiguous', `${ids.length} directory devices share device id ${platformId}`);
          } else if (!fetched.complete) {
            this.recordUnresolved(result, device, 'lookupFailed', fetched.failure?.message ?? 'Directory lookup incomplete');
          } else {
            this.recordUnresolved(result, device, 'missing', `No directory device with device id ${platformId}`);
          }
        }
      }
    }

    return result;
  }

  private recordUnresolved(result: ResolveManyResult, device: DesiredDevice, reason: NotFoundReason, detail: string): void {
    this.warnUnresolved(device, reason, detail);
    result.unresolved.push({ device, reason, detail });
  }

  private warnUnresolved(device: DesiredDevice, reason: NotFoundReason, detail: string): void {
    if (reason === 'ambiguous') {
      logger.warn('Identity lookup matched more than one device; skipping', { device: describeDevice(device), detail });
    } else {
      logger.warn('Device could not be resolved; skipping', { device: describeDevice(device), reason, detail });
    }
  }

  private async lookup(
    device: DesiredDevice,
    from: IdentifierNamespace,
    to: IdentifierNamespace
  ): Promise<Lookup<string>> {
    if (from === to && from === device.key.namespace) {
      return { ok: true, value: device.key.value };
    }

    if (from === 'directoryObjectId') {
      const directoryObjectId = this.valueIn(device, from);
      if (!directoryObjectId) return miss('missing', 'No directory object id known for device');
      if (to === 'directoryObjectId') return { ok: true, value: directoryObjectId };

      const managed = await this.managedRecordForDirectoryObject(directoryObjectId);
      if (!managed.ok) return managed;
      return this.fieldOf(managed.value, to);
    }

    const managed = await this.managedRecord(device, from);
    if (!managed.ok) return managed;
    if (to !== 'directoryObjectId') return this.fieldOf(managed.value, to);

    const view = readManagedDevice(managed.value);
    if (view.directoryObjectId) {
      return { ok: true, value: view.directoryObjectId };
    }
    if (!view.platformDeviceId) {
      return miss('missing', `Managed device ${view.managementId} has no directory device id`);
    }
    return this.directoryObjectIdForPlatformId(view.platformDeviceId);
  }

  private fieldOf(record: Entity, namespace: Exclude<IdentifierNamespace, 'directoryObjectId'>): Lookup<string> {
    const view = readManagedDevice(record);
    if (namespace === 'managementId') return { ok: true, value: view.managementId };
    return view.serialNumber
      ? { ok: true, value: view.serialNumber }
      : miss('missing', `Managed device ${view.managementId} has no serial number`);
  }

  /** Value of `namespace` for the device, from its key or its record */
  private valueIn(device: DesiredDevice, namespace: IdentifierNamespace): string | undefined {
    if (device.key.namespace === namespace) return device.key.value;
    if (!device.record) return undefined;
    const view = readManagedDevice(device.record);
    switch (namespace) {
      case 'managementId':
        return view.managementId;
      case 'hardwareSerial':
        return view.serialNumber;
      case 'directoryObjectId':
        return view.directoryObjectId;
    }
  }

  private async managedRecord(device: DesiredDevice, from: IdentifierNamespace): Promise<Lookup<Entity>> {
    if (device.record) {
      return { ok: true, value: device.record };
    }

    const value = this.valueIn(device, from);
    if (!value) return miss('missing', `No ${from} known for device`);

    if (from === 'managementId') {
      return this.managedRecordById(value);
    }
    if (from === 'hardwareSerial') {
      return this.single(
        this.endpoints.managedDevices({ filter: odataEquals(ManagedDeviceFields.serialNumber, value) }),
        `managed device with serial number ${value}`
      );
    }
    return this.managedRecordForDirectoryObject(value);
  }

  private async managedRecordById(managementId: string): Promise<Lookup<Entity>> {
    const uri = this.endpoints.managedDevice(managementId);
    try {
      const payload = await this.throttle.run(() => this.transport.get(uri), { operation: 'getManagedDevice', uri });
      return { ok: true, value: parseEntity(payload) };
    } catch (error) {
      if (error instanceof NotFoundError) {
        return miss('missing', `No managed device with id ${managementId}`);
      }
      return miss('lookupFailed', toGraphApiError(error).message);
    }
  }

  private async managedRecordForDirectoryObject(directoryObjectId: string): Promise<Lookup<Entity>> {
    const uri = this.endpoints.directoryDevice(directoryObjectId);
    let platformDeviceId: string | undefined;
    try {
      const payload = await this.throttle.run(() => this.transport.get(uri), { operation: 'getDirectoryDevice', uri });
      platformDeviceId = readDirectoryDevice(parseEntity(payload)).platformDeviceId;
    } catch (error) {
      if (error instanceof NotFoundError) {
        return miss('missing', `No directory device with object id ${directoryObjectId}`);
      }
      return miss('lookupFailed', toGraphApiError(error).message);
    }

    if (!platformDeviceId) {
      return miss('missing', `Directory device ${directoryObjectId} has no device id`);
    }
    return this.single(
      this.endpoints.managedDevices({ filter: odataEquals(ManagedDeviceFields.platformDeviceId, platformDeviceId) }),
      `managed device with directory device id ${platformDeviceId}`
    );
  }

  private async directoryObjectIdForPlatformId(platformDeviceId: string): Promise<Lookup<string>> {
    const found = await this.single(
      this.endpoints.directoryDevices({
        filter: odataEquals(DirectoryDeviceFields.platformDeviceId, platformDeviceId),
        select: DIRECTORY_DEVICE_SELECT,
      }),
      `directory device with device id ${platformDeviceId}`
    );
    return found.ok ? { ok: true, value: found.value.id } : found;
  }

  /**
   * Lookup listing for one device or one batch. The fetcher throws when the
   * first request cannot reach the host; here that only fails this lookup.
   */
  private async query(uri: string): Promise<FetchResult> {
    try {
      return await this.fetcher.fetchAllDetailed(uri);
    } catch (error) {
      const failure = buildErrorContext(error, 'identityLookup', 'identity-resolver', { uri });
      return { entities: [], complete: false, pageCount: 0, failure };
    }
  }

  /** Run an equality-filter query expected to match zero or one entity */
  private async single(uri: string, what: string): Promise<Lookup<Entity>> {
    const fetched = await this.query(uri);
    if (fetched.entities.length > 1) {
      return miss('ambiguous', `${fetched.entities.length} matches for ${what}`);
    }
    if (fetched.entities.length === 1) {
      return { ok: true, value: fetched.entities[0] };
    }
    if (!fetched.complete) {
      return miss('lookupFailed', fetched.failure?.message ?? `Lookup of ${what} did not complete`);
    }
    return miss('missing', `No ${what}`);
  }
}
