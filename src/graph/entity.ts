import { z } from 'zod';
import { ValidationError } from '../utils/errors.js';

export const EntitySchema = z.object({ id: z.string().min(1) }).passthrough();

/**
 * A record from a listing endpoint: a stable id plus whatever fields the
 * endpoint returned. Read fields through the accessors below.
 */
export type Entity = z.infer<typeof EntitySchema>;

export const DEFAULT_CONTINUATION_FIELD = '@odata.nextLink';

export interface Page {
  entities: Entity[];
  nextLink?: string;
}

const ListingSchema = z.object({ value: z.array(EntitySchema) }).passthrough();

/**
 * Validate a listing payload. A missing continuation field means last page.
 */
export function parsePage(payload: unknown, continuationField: string = DEFAULT_CONTINUATION_FIELD): Page {
  const result = ListingSchema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError('Listing response is not a { value: [...] } page', {
      issues: result.error.errors.map((issue) => `${issue.path.join('.')}: ${issue.message}`),
    });
  }

  const next: unknown = result.data[continuationField];
  if (next !== undefined && next !== null && typeof next !== 'string') {
    throw new ValidationError(`Continuation field ${continuationField} is not a string`);
  }

  return {
    entities: result.data.value,
    nextLink: typeof next === 'string' && next.length > 0 ? next : undefined,
  };
}

export function parseEntity(payload: unknown): Entity {
  const result = EntitySchema.safeParse(payload);
  if (!result.success) {
    throw new ValidationError('Response is not an entity with a string id');
  }
  return result.data;
}

const EMPTY_GUID = /^0{8}-0{4}-0{4}-0{4}-0{12}$/;

/** Non-empty string value of a field, ignoring the all-zero GUID placeholder */
export function stringField(entity: Entity, field: string): string | undefined {
  const value: unknown = entity[field];
  if (typeof value !== 'string') return undefined;
  const trimmed = value.trim();
  if (trimmed.length === 0 || EMPTY_GUID.test(trimmed)) return undefined;
  return trimmed;
}

export function requireStringField(entity: Entity, field: string): string {
  const value = stringField(entity, field);
  if (value === undefined) {
    throw new ValidationError(`Entity ${entity.id} has no ${field}`, { entityId: entity.id, field });
  }
  return value;
}

/** Field names on the management catalogue's device records */
export const ManagedDeviceFields = {
  deviceName: 'deviceName',
  serialNumber: 'serialNumber',
  platformDeviceId: 'azureADDeviceId',
  directoryObjectId: 'azureADObjectId',
  operatingSystem: 'operatingSystem',
} as const;

/** Field names on directory device objects */
export const DirectoryDeviceFields = {
  displayName: 'displayName',
  platformDeviceId: 'deviceId',
} as const;

export interface ManagedDeviceView {
  managementId: string;
  deviceName?: string;
  serialNumber?: string;
  platformDeviceId?: string;
  directoryObjectId?: string;
  operatingSystem?: string;
}

export function readManagedDevice(entity: Entity): ManagedDeviceView {
  return {
    managementId: entity.id,
    deviceName: stringField(entity, ManagedDeviceFields.deviceName),
    serialNumber: stringField(entity, ManagedDeviceFields.serialNumber),
    platformDeviceId: stringField(entity, ManagedDeviceFields.platformDeviceId),
    directoryObjectId: stringField(entity, ManagedDeviceFields.directoryObjectId),
    operatingSystem: stringField(entity, ManagedDeviceFields.operatingSystem),
  };
}

export interface DirectoryDeviceView {
  directoryObjectId: string;
  displayName?: string;
  platformDeviceId?: string;
}

export function readDirectoryDevice(entity: Entity): DirectoryDeviceView {
  return {
    directoryObjectId: entity.id,
    displayName: stringField(entity, DirectoryDeviceFields.displayName),
    platformDeviceId: stringField(entity, DirectoryDeviceFields.platformDeviceId),
  };
}
