import { describe, expect, test, beforeEach } from '@jest/globals';
import { DesiredDevice } from '../../graph/identity-resolver.js';
import { GraphApiError, NetworkError } from '../../utils/errors.js';
import { desiredFromIdentifiers, desiredFromManagedDevice } from '../../sources/device-selector.js';
import { SyncStack } from '../../sync-stack.js';
import { FakeGraph, createTestStack, recordingSleep } from '../helpers/fake-graph.js';

const bySerial = (value: string): DesiredDevice => ({ key: { namespace: 'hardwareSerial', value } });
const byManagementId = (value: string): DesiredDevice => ({ key: { namespace: 'managementId', value } });
const byObjectId = (value: string): DesiredDevice => ({ key: { namespace: 'directoryObjectId', value } });

describe('IdentityResolver', () => {
  let graph: FakeGraph;
  let stack: SyncStack;

  beforeEach(() => {
    graph = new FakeGraph();
    stack = createTestStack(graph, recordingSleep().sleep);
  });

  describe('resolve', () => {
    test('resolves a serial number through the management record', async () => {
      graph.addDevice({ name: 'PC1', serial: 'SER1' });

      const resolution = await stack.resolver.resolve(bySerial('SER1'));

      expect(resolution).toEqual({ status: 'resolved', namespace: 'directoryObjectId', value: 'obj-PC1' });
      expect(graph.calls.map((call) => call.url)).toEqual([
        "https://graph.test/v1.0/deviceManagement/managedDevices?$filter=serialNumber%20eq%20'SER1'",
        "https://graph.test/v1.0/devices?$filter=deviceId%20eq%20'aad-PC1'&$select=id,deviceId,displayName",
      ]);
    });

    test('resolves a management id', async () => {
      graph.addDevice({ name: 'PC1' });

      await expect(stack.resolver.resolve(byManagementId('md-PC1'))).resolves.toEqual({
        status: 'resolved',
        namespace: 'directoryObjectId',
        value: 'obj-PC1',
      });
    });

    test('uses the object id already on the record', async () => {
      const device: DesiredDevice = {
        key: { namespace: 'managementId', value: 'md-PC1' },
        record: { id: 'md-PC1', azureADDeviceId: 'aad-PC1', azureADObjectId: 'obj-PC1' },
      };

      await expect(stack.resolver.resolve(device)).resolves.toMatchObject({ status: 'resolved', value: 'obj-PC1' });
      expect(graph.calls).toHaveLength(0);
    });

    test('translates a directory object id back to a serial number', async () => {
      graph.addDevice({ name: 'PC1' });

      await expect(stack.resolver.resolve(byObjectId('obj-PC1'), 'directoryObjectId', 'hardwareSerial')).resolves.toEqual({
        status: 'resolved',
        namespace: 'hardwareSerial',
        value: 'SN-PC1',
      });
    });

    test('translates a management id to a serial number without a directory lookup', async () => {
      graph.addDevice({ name: 'PC1', serial: 'SER1' });

      await expect(stack.resolver.resolve(byManagementId('md-PC1'), 'managementId', 'hardwareSerial')).resolves.toMatchObject({
        value: 'SER1',
      });
      expect(graph.callsTo('GET', /\/devices/)).toHaveLength(0);
    });

    test('returns the key unchanged when no translation is needed', async () => {
      await expect(stack.resolver.resolve(byObjectId('obj-X'))).resolves.toMatchObject({ value: 'obj-X' });
      expect(graph.calls).toHaveLength(0);
    });

    test('reports an unknown management id as missing', async () => {
      await expect(stack.resolver.resolve(byManagementId('md-ghost'))).resolves.toEqual({
        status: 'notFound',
        namespace: 'directoryObjectId',
        reason: 'missing',
        detail: 'No managed device with id md-ghost',
      });
    });

    test('reports a device absent from the directory as missing', async () => {
      graph.addDevice({ name: 'PC2', inDirectory: false });

      await expect(stack.resolver.resolve(byManagementId('md-PC2'))).resolves.toMatchObject({
        reason: 'missing',
        detail: 'No directory device with device id aad-PC2',
      });
    });

    test('treats the all-zero platform id as absent', async () => {
      const device: DesiredDevice = {
        key: { namespace: 'managementId', value: 'md-x' },
        record: { id: 'md-x', azureADDeviceId: '00000000-0000-0000-0000-000000000000' },
      };

      await expect(stack.resolver.resolve(device)).resolves.toMatchObject({
        reason: 'missing',
        detail: 'Managed device md-x has no directory device id',
      });
    });

    test('never guesses between several matching serials', async () => {
      graph.addDevice({ name: 'PC1', serial: 'DUP' });
      graph.addDevice({ name: 'PC2', serial: 'DUP' });

      await expect(stack.resolver.resolve(bySerial('DUP'))).resolves.toMatchObject({
        reason: 'ambiguous',
        detail: '2 matches for managed device with serial number DUP',
      });
    });

    test('never guesses between several directory objects', async () => {
      graph.addDevice({ name: 'PC3' });
      graph.addDirectoryDevice('obj-dup', 'aad-PC3', 'PC3');

      await expect(stack.resolver.resolve(byManagementId('md-PC3'))).resolves.toMatchObject({ reason: 'ambiguous' });
    });

    test('reports a failed directory query as lookupFailed', async () => {
      graph.addDevice({ name: 'PC1' });
      graph.failNext('GET', /\/devices\?/, () => new GraphApiError('Service unavailable', 503));

      await expect(stack.resolver.resolve(byManagementId('md-PC1'))).resolves.toMatchObject({
        reason: 'lookupFailed',
        detail: 'Service unavailable',
      });
    });
  });

  describe('resolveMany', () => {
    test('keeps going when one lookup cannot reach the service', async () => {
      for (const name of ['A', 'B', 'C', 'D', 'E']) graph.addDevice({ name });
      graph.failNext('GET', /serialNumber%20eq%20'SN-C'/, () => new NetworkError('timeout of 30000ms exceeded'));
      const devices = desiredFromIdentifiers('hardwareSerial', ['SN-A', 'SN-B', 'SN-C', 'SN-D', 'SN-E']);

      const result = await stack.resolver.resolveMany(devices);

      expect(result.resolved.map((entry) => entry.directoryObjectId)).toEqual(['obj-A', 'obj-B', 'obj-D', 'obj-E']);
      expect(result.unresolved).toEqual([
        { device: devices[2], reason: 'lookupFailed', detail: 'timeout of 30000ms exceeded' },
      ]);
    });

    test('fails only the affected batch when a batched query cannot reach the service', async () => {
      graph.addDevice({ name: 'PC1' });
      graph.failNext('GET', /deviceId%20in%20/, () => new NetworkError('socket hang up'));
      const devices = [
        desiredFromManagedDevice({ id: 'md-PC1', deviceName: 'PC1', azureADDeviceId: 'aad-PC1' }),
        byObjectId('obj-direct'),
      ];

      const result = await stack.resolver.resolveMany(devices, { batched: true });

      expect(result.resolved.map((entry) => entry.directoryObjectId)).toEqual(['obj-direct']);
      expect(result.unresolved.map((entry) => [entry.device.label, entry.reason, entry.detail])).toEqual([
        ['PC1', 'lookupFailed', 'socket hang up'],
      ]);
    });

    test('collects failures without stopping', async () => {
      for (const name of ['PC1', 'PC2', 'PC3', 'PC4']) graph.addDevice({ name });
      const devices = desiredFromIdentifiers('managementId', ['md-PC1', 'md-PC2', 'md-ghost', 'md-PC3', 'md-PC4']);

      const result = await stack.resolver.resolveMany(devices);

      expect(result.resolved.map((entry) => entry.directoryObjectId)).toEqual(['obj-PC1', 'obj-PC2', 'obj-PC3', 'obj-PC4']);
      expect(result.unresolved).toEqual([
        { device: devices[2], reason: 'missing', detail: 'No managed device with id md-ghost' },
      ]);
    });

    test('groups directory lookups into in-filters of fifteen when batched', async () => {
      const devices: DesiredDevice[] = [];
      for (let i = 1; i <= 17; i++) {
        const seeded = graph.addDevice({ name: `PC${i}` });
        devices.push(
          desiredFromManagedDevice({ id: seeded.managementId, deviceName: `PC${i}`, azureADDeviceId: seeded.platformDeviceId })
        );
      }

      const result = await stack.resolver.resolveMany(devices, { batched: true });

      expect(result.resolved).toHaveLength(17);
      expect(result.unresolved).toHaveLength(0);
      expect(graph.calls).toHaveLength(2);
      expect(graph.calls.every((call) => call.url.includes('$filter=deviceId%20in%20('))).toBe(true);
    });

    test('classifies batched misses the same way as single lookups', async () => {
      graph.addDirectoryDevice('obj-upper', 'AAD-UPPER', 'Upper');
      graph.addDirectoryDevice('obj-twin-1', 'aad-twin', 'Twin');
      graph.addDirectoryDevice('obj-twin-2', 'aad-twin', 'Twin');
      const devices = [
        desiredFromManagedDevice({ id: 'md-upper', deviceName: 'Upper', azureADDeviceId: 'aad-upper' }),
        desiredFromManagedDevice({ id: 'md-twin', deviceName: 'Twin', azureADDeviceId: 'aad-twin' }),
        desiredFromManagedDevice({ id: 'md-none', deviceName: 'None', azureADDeviceId: 'aad-none' }),
        byObjectId('obj-direct'),
      ];

      const result = await stack.resolver.resolveMany(devices, { batched: true });

      expect(result.resolved.map((entry) => entry.directoryObjectId).sort()).toEqual(['obj-direct', 'obj-upper']);
      expect(result.unresolved.map((entry) => [entry.device.label, entry.reason])).toEqual([
        ['Twin', 'ambiguous'],
        ['None', 'missing'],
      ]);
    });
  });
});
