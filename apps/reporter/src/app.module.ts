import { DynamicModule, Module } from '@nestjs/common';

// Configuration
import { ConfigModule } from './config/config.module';

// Modules
import { IpamUsageModule } from './modules/ipam-usage/ipam-usage.module';

@Module({})
export class AppModule {
  static forConfigFile(configFile: string): DynamicModule {
    return {
      module: AppModule,
      imports: [ConfigModule.forRoot(configFile), IpamUsageModule],
    };
  }
}
