import {
  cidrSetSize,
  networkSize,
  SubnetCapacityRow,
  TenantCounts,
  UsedIpRow,
} from '@ipam-report/shared';

/**
 * Used addresses per tenant. Rows for the same tenant are summed.
 */
export function sumUsedIps(rows: readonly UsedIpRow[]): TenantCounts {
  const totals = new Map<string, number>();

  for (const row of rows) {
    totals.set(row.tenant_id, (totals.get(row.tenant_id) ?? 0) + row.used);
  }

  return Object.fromEntries(totals);
}

/**
 * Capacity of one subnet: network size minus the addresses its policy excludes
 */
export function subnetCapacity(row: SubnetCapacityRow): number {
  return networkSize(row.cidr) - cidrSetSize(row.excluded_cidrs);
}

/**
 * Unused addresses per tenant.
 *
 * The key set is exactly the set of tenants with a qualifying subnet: a
 * tenant that only appears in `usedIps` is left out. Results are not clamped
 * at zero.
 */
export function computeUnusedIps(
  subnets: readonly SubnetCapacityRow[],
  usedIps: TenantCounts,
): TenantCounts {
  const totals = new Map<string, number>();

  for (const subnet of subnets) {
    totals.set(subnet.tenant_id, (totals.get(subnet.tenant_id) ?? 0) + subnetCapacity(subnet));
  }

  for (const [tenantId, used] of Object.entries(usedIps)) {
    const total = totals.get(tenantId);
    if (total !== undefined) {
      totals.set(tenantId, total - used);
    }
  }

  return Object.fromEntries(totals);
}
