import { Module } from '@nestjs/common';

import { DatabaseModule } from '../../database/database.module';
import { IpamUsageRepository } from './ipam-usage.repository';
import { IpamUsageService } from './ipam-usage.service';

@Module({
  imports: [DatabaseModule],
  providers: [IpamUsageService, IpamUsageRepository],
  exports: [IpamUsageService],
})
export class IpamUsageModule {}
