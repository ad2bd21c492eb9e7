import { Injectable } from '@nestjs/common';
import { z } from 'zod';
import { Queryable } from '@ipam-report/database';
import {
  SubnetCapacityRow,
  subnetCapacityRowSchema,
  UsedIpRow,
  usedIpRowSchema,
} from '@ipam-report/shared';

/**
 * Subnets considered by the report
 */
export interface SubnetFilter {
  networkId: string;
  providerTenant: string;
}

// $1 = network id, $2 = provider tenant
const QUALIFYING_SUBNET = `
      s.network_id = $1
      AND s.ip_version = 4
      AND (s.do_not_use IS NULL OR s.do_not_use = FALSE)
      AND (s.tenant_id LIKE '%-%' OR s.tenant_id = $2)`;

/**
 * Addresses in use per tenant. The reuse condition lives in the join so
 * that a qualifying subnet without addresses still yields a zero count.
 * $3 = reuse cutoff as an ISO-8601 UTC instant; `deallocated_at` holds UTC
 * wall-clock time without a zone.
 */
export const USED_IPS_QUERY = `
    SELECT s.tenant_id, COUNT(ip.id)::int AS used
    FROM subnets s
    LEFT OUTER JOIN ip_addresses ip
      ON ip.subnet_id = s.id
      AND (ip.deallocated IS NULL OR ip.deallocated = FALSE OR ip.deallocated_at > ($3::timestamptz AT TIME ZONE 'UTC'))
    WHERE ${QUALIFYING_SUBNET}
    GROUP BY s.tenant_id
  `;

/**
 * One row per qualifying subnet with the CIDRs excluded by its IP policy
 */
export const SUBNET_CAPACITIES_QUERY = `
    SELECT
      s.id::text AS subnet_id,
      s.tenant_id,
      s.cidr::text AS cidr,
      COALESCE(
        array_agg(pc.cidr::text) FILTER (WHERE pc.cidr IS NOT NULL),
        '{}'
      ) AS excluded_cidrs
    FROM subnets s
    LEFT OUTER JOIN ip_policy_cidrs pc
      ON pc.ip_policy_id = s.ip_policy_id
    WHERE ${QUALIFYING_SUBNET}
    GROUP BY s.id, s.tenant_id, s.cidr
  `;

@Injectable()
export class IpamUsageRepository {
  async countUsedIps(db: Queryable, filter: SubnetFilter, reuseCutoff: Date): Promise<UsedIpRow[]> {
    const result = await db.query(USED_IPS_QUERY, [
      filter.networkId,
      filter.providerTenant,
      reuseCutoff.toISOString(),
    ]);

    return z.array(usedIpRowSchema).parse(result.rows);
  }

  async findSubnetCapacities(db: Queryable, filter: SubnetFilter): Promise<SubnetCapacityRow[]> {
    const result = await db.query(SUBNET_CAPACITIES_QUERY, [
      filter.networkId,
      filter.providerTenant,
    ]);

    return z.array(subnetCapacityRowSchema).parse(result.rows);
  }
}
