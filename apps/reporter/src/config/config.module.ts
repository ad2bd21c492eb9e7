/**
 * Configuration Module
 *
 * Loads the dotenv-format configuration file resolved by the CLI and
 * validates it together with the process environment (which takes
 * precedence over the file).
 */

import { DynamicModule, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { AppConfigService, validateEnvironment } from './app.config';

@Module({})
export class ConfigModule {
  static forRoot(configFile: string): DynamicModule {
    return {
      module: ConfigModule,
      global: true,
      imports: [
        NestConfigModule.forRoot({
          envFilePath: configFile,
          validate: validateEnvironment,
        }),
      ],
      providers: [AppConfigService],
      exports: [AppConfigService],
    };
  }
}
