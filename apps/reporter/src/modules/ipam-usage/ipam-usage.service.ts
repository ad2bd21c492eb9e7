import { Injectable, Logger } from '@nestjs/common';
import { Queryable } from '@ipam-report/database';
import {
  calculateReuseCutoff,
  TenantCounts,
  UsageReport,
  usageReportSchema,
} from '@ipam-report/shared';

import { AppConfigService, IpamUsageOptions } from '../../config/app.config';
import { DatabaseService } from '../../database/database.service';
import { computeUnusedIps, sumUsedIps } from './ipam-usage.calculator';
import { IpamUsageRepository } from './ipam-usage.repository';

@Injectable()
export class IpamUsageService {
  private readonly logger = new Logger(IpamUsageService.name);

  constructor(
    private readonly database: DatabaseService,
    private readonly repository: IpamUsageRepository,
    private readonly config: AppConfigService,
  ) {}

  /**
   * Addresses allocated, or deallocated less than `reuseAfterSeconds` before
   * `now`, per tenant
   */
  async getUsedIps(
    db: Queryable,
    options: IpamUsageOptions,
    now: Date = new Date(),
  ): Promise<TenantCounts> {
    const cutoff = calculateReuseCutoff(options.reuseAfterSeconds, now);
    this.logger.debug(
      `Counting used IPs on network ${options.networkId} (reuse cutoff ${cutoff.toISOString()})`,
    );

    const rows = await this.repository.countUsedIps(db, options, cutoff);
    return sumUsedIps(rows);
  }

  /**
   * Subnet capacity minus policy exclusions minus `usedIps`, per tenant
   */
  async getUnusedIps(
    db: Queryable,
    usedIps: TenantCounts,
    options: IpamUsageOptions,
  ): Promise<TenantCounts> {
    this.logger.debug(`Summing subnet capacity on network ${options.networkId}`);

    const subnets = await this.repository.findSubnetCapacities(db, options);
    this.logger.debug(`Found ${subnets.length} qualifying subnets`);

    return computeUnusedIps(subnets, usedIps);
  }

  /**
   * Runs both counts in one read-only transaction
   */
  async generateReport(now: Date = new Date()): Promise<UsageReport> {
    const options = this.config.ipam;

    const report = await this.database.readOnly(async (db) => {
      const used = await this.getUsedIps(db, options, now);
      const unused = await this.getUnusedIps(db, used, options);
      return { used, unused };
    });

    this.logger.log(
      `Usage report for ${Object.keys(report.unused).length} tenants on network ${options.networkId}`,
    );

    return usageReportSchema.parse(report);
  }
}
