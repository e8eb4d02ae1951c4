import { createLogger } from '../utils/logger.js';
import { Entity, ManagedDeviceFields, readManagedDevice, stringField } from '../graph/entity.js';
import { GraphEndpoints, odataEquals } from '../graph/endpoints.js';
import { PagedFetcher } from '../graph/paged-fetcher.js';
import { DesiredDevice, IdentifierNamespace } from '../graph/identity-resolver.js';

const logger = createLogger('device-selector');

const MANAGED_DEVICE_SELECT = [
  'id',
  ManagedDeviceFields.deviceName,
  ManagedDeviceFields.serialNumber,
  ManagedDeviceFields.platformDeviceId,
  ManagedDeviceFields.operatingSystem,
];

export interface Selection {
  devices: DesiredDevice[];
  /** Inputs that matched nothing in the catalogue */
  unmatched: string[];
  /** False when any listing behind the selection was cut short */
  complete: boolean;
}

export function desiredFromManagedDevice(record: Entity): DesiredDevice {
  const view = readManagedDevice(record);
  return {
    key: { namespace: 'managementId', value: view.managementId },
    record,
    label: view.deviceName ?? view.managementId,
  };
}

/** Identifiers taken as-is in one namespace; resolution happens later */
export function desiredFromIdentifiers(namespace: IdentifierNamespace, values: readonly string[]): DesiredDevice[] {
  return values.map((value) => ({ key: { namespace, value }, label: value }));
}

function dedupeById(records: Entity[]): Entity[] {
  const byId = new Map<string, Entity>();
  for (const record of records) {
    if (!byId.has(record.id)) byId.set(record.id, record);
  }
  return [...byId.values()];
}

/**
 * Builds desired device sets from the management catalogue. URI shapes for
 * each criterion live here; the core only sees DesiredDevice lists.
 */
export class DeviceSelector {
  constructor(
    private readonly fetcher: PagedFetcher,
    private readonly endpoints: GraphEndpoints
  ) {}

  async byDeviceNames(names: readonly string[]): Promise<Selection> {
    const records: Entity[] = [];
    const unmatched: string[] = [];
    let complete = true;

    for (const name of names) {
      const fetched = await this.fetcher.fetchAllDetailed(
        this.endpoints.managedDevices({
          filter: odataEquals(ManagedDeviceFields.deviceName, name),
          select: MANAGED_DEVICE_SELECT,
        })
      );
      complete = complete && fetched.complete;
      if (fetched.entities.length === 0) {
        logger.warn('No managed device with this name', { name });
        unmatched.push(name);
        continue;
      }
      if (fetched.entities.length > 1) {
        logger.info('Several managed devices share a name; all are selected', { name, count: fetched.entities.length });
      }
      records.push(...fetched.entities);
    }

    return { devices: dedupeById(records).map(desiredFromManagedDevice), unmatched, complete };
  }

  bySerialNumbers(serials: readonly string[]): Selection {
    return { devices: desiredFromIdentifiers('hardwareSerial', serials), unmatched: [], complete: true };
  }

  async withDetectedApp(appDisplayName: string): Promise<Selection> {
    const apps = await this.fetcher.fetchAllDetailed(
      this.endpoints.detectedApps({ filter: odataEquals('displayName', appDisplayName) })
    );
    if (apps.entities.length === 0) {
      logger.warn('No detected app with this display name', { appDisplayName });
      return { devices: [], unmatched: apps.complete ? [appDisplayName] : [], complete: apps.complete };
    }

    const records: Entity[] = [];
    let complete = apps.complete;
    for (const app of apps.entities) {
      const fetched = await this.fetcher.fetchAllDetailed(
        this.endpoints.detectedAppDevices(app.id, { select: MANAGED_DEVICE_SELECT })
      );
      complete = complete && fetched.complete;
      logger.debug('Devices with detected app version', {
        appId: app.id,
        version: stringField(app, 'version'),
        devices: fetched.entities.length,
      });
      records.push(...fetched.entities);
    }

    return { devices: dedupeById(records).map(desiredFromManagedDevice), unmatched: [], complete };
  }

  async byOperatingSystem(operatingSystem: string): Promise<Selection> {
    const fetched = await this.fetcher.fetchAllDetailed(
      this.endpoints.managedDevices({
        filter: odataEquals(ManagedDeviceFields.operatingSystem, operatingSystem),
        select: MANAGED_DEVICE_SELECT,
      })
    );
    return { devices: dedupeById(fetched.entities).map(desiredFromManagedDevice), unmatched: [], complete: fetched.complete };
  }
}
