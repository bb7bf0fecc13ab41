/**
 * Tenant key formatting.
 */

import type { TenantKey } from './types.js';

/**
 * Format a tenant as the `project:branch:pathHash` key used by storage.
 */
export function formatTenantKey(tenant: TenantKey): string {
  return `${tenant.projectName}:${tenant.branchName}:${tenant.pathHash}`;
}
