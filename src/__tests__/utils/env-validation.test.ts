import { describe, expect, test } from '@jest/globals';
import { hasClientCredentials, validateSyncConfig } from '../../utils/env-validation.js';

describe('validateSyncConfig', () => {
  test('applies defaults around a pre-acquired token', () => {
    const result = validateSyncConfig({ GRAPH_ACCESS_TOKEN: 'test-token' });

    expect(result.valid).toBe(true);
    expect(result.config).toMatchObject({
      GRAPH_BASE_URL: 'https://graph.microsoft.com/v1.0',
      GRAPH_AUTHORITY_URL: 'https://login.microsoftonline.com',
      GRAPH_ACCESS_TOKEN: 'test-token',
      SYNC_PAGE_DELAY_MS: 100,
      SYNC_THROTTLE_BACKOFF_MS: 60_000,
      SYNC_BATCH_SIZE: 20,
      SYNC_REQUEST_TIMEOUT_MS: 30_000,
    });
    expect(result.config?.SYNC_MAX_THROTTLE_RETRIES).toBeUndefined();
  });

  test('accepts client credentials', () => {
    const result = validateSyncConfig({
      GRAPH_TENANT_ID: 'tenant-1',
      GRAPH_CLIENT_ID: 'client-1',
      GRAPH_CLIENT_SECRET: 'test-secret',
    });

    expect(result.valid).toBe(true);
    expect(result.config && hasClientCredentials(result.config)).toBe(true);
  });

  test('treats blank credentials as missing', () => {
    const result = validateSyncConfig({ GRAPH_TENANT_ID: '', GRAPH_CLIENT_ID: ' ', GRAPH_CLIENT_SECRET: '' });

    expect(result.valid).toBe(false);
    expect(result.error?.message).toBe('Missing authentication credentials');
    expect(result.error?.suggestions).toHaveLength(2);
  });

  test('parses tuning values', () => {
    const result = validateSyncConfig({
      GRAPH_ACCESS_TOKEN: 'test-token',
      SYNC_PAGE_DELAY_MS: '0',
      SYNC_MAX_THROTTLE_RETRIES: '0',
      SYNC_BATCH_SIZE: '5',
    });

    expect(result.config).toMatchObject({ SYNC_PAGE_DELAY_MS: 0, SYNC_MAX_THROTTLE_RETRIES: 0, SYNC_BATCH_SIZE: 5 });
  });

  test('rejects a batch size above the service limit', () => {
    const result = validateSyncConfig({ GRAPH_ACCESS_TOKEN: 'test-token', SYNC_BATCH_SIZE: '25' });

    expect(result.valid).toBe(false);
    expect(result.error?.suggestions).toEqual(['SYNC_BATCH_SIZE must be between 1 and 20']);
    expect(result.error?.format()).toContain('  - SYNC_BATCH_SIZE: ');
  });

  test('rejects non-numeric delays and malformed URLs', () => {
    const result = validateSyncConfig({
      GRAPH_ACCESS_TOKEN: 'test-token',
      SYNC_PAGE_DELAY_MS: 'soon',
      GRAPH_BASE_URL: 'graph',
    });

    expect(result.valid).toBe(false);
    expect(result.error?.suggestions).toEqual([
      'GRAPH_BASE_URL must be an absolute URL such as https://graph.microsoft.com/v1.0',
      'SYNC_PAGE_DELAY_MS must be between 0 and 10000 ms',
    ]);
  });
});
