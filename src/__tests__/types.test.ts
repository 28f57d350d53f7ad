import { describe, it, expect } from 'vitest';
import {
  BulkImportOptions,
  bulkImportTotal,
  isInherited,
  isServiceTokenExpired,
  isServiceTokenPrincipal,
  isUserPrincipal,
  type CurrentUserResponse,
  type ServiceToken,
} from '../index.js';

const token = (expires_at: string | null): ServiceToken => ({
  id: 'tok-1',
  name: 'deploy',
  permissions: ['read'],
  expires_at,
});

describe('derived predicates', () => {
  it('isInherited is true only for a non-empty inherited_from', () => {
    expect(isInherited({ inherited_from: 'env-parent' })).toBe(true);
    expect(isInherited({ inherited_from: '' })).toBe(false);
    expect(isInherited({ inherited_from: null })).toBe(false);
    expect(isInherited({})).toBe(false);
  });

  it('isServiceTokenExpired compares expiry with now', () => {
    const now = new Date('2024-06-01T00:00:00Z');
    expect(isServiceTokenExpired(token('2024-05-31T23:59:59Z'), now)).toBe(true);
    expect(isServiceTokenExpired(token('2024-06-01T00:00:01Z'), now)).toBe(false);
    expect(isServiceTokenExpired(token(null), now)).toBe(false);
  });

  it('bulkImportTotal sums all counts', () => {
    expect(bulkImportTotal({ created: 3, updated: 2, skipped: 1 })).toBe(6);
  });

  it('narrows the current principal by its tag', () => {
    const response: CurrentUserResponse = { type: 'service_token', service_token: token(null) };
    expect(isServiceTokenPrincipal(response)).toBe(true);
    expect(isUserPrincipal(response)).toBe(false);
  });

  it('exposes bulk import presets', () => {
    expect(BulkImportOptions.overwrite).toEqual({ overwrite: true });
    expect(BulkImportOptions.skipExisting).toEqual({ overwrite: false });
  });
});
