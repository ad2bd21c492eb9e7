import { Injectable, LogLevel } from '@nestjs/common';
import { ConfigService } from '@nestjs/config';
import { IsIn, IsInt, IsNotEmpty, IsOptional, IsString, Min, validateSync } from 'class-validator';
import { plainToInstance, Transform, TransformFnParams } from 'class-transformer';
import { DEFAULT_REUSE_AFTER_SECONDS } from '@ipam-report/shared';

export const DEFAULT_NETWORK_ID = '00000000-0000-0000-0000-000000000000';
export const DEFAULT_PROVIDER_TENANT = 'provider';

/**
 * Níveis aceitos em LOG_LEVEL, do mais para o menos verboso
 */
export const LOG_LEVELS: LogLevel[] = ['verbose', 'debug', 'log', 'warn', 'error', 'fatal'];

const toInteger = ({ value }: TransformFnParams): unknown =>
  typeof value === 'string' ? parseInt(value, 10) : value;

/**
 * Validação das variáveis de configuração
 */
export class EnvironmentVariables {
  // Database
  @IsString()
  @IsNotEmpty()
  DATABASE_URL!: string;

  @IsOptional()
  @Transform(toInteger)
  @IsInt()
  @Min(0)
  DATABASE_STATEMENT_TIMEOUT_MS: number = 0;

  // IPAM
  @IsOptional()
  @Transform(toInteger)
  @IsInt()
  @Min(0)
  IPAM_REUSE_AFTER: number = DEFAULT_REUSE_AFTER_SECONDS;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  IPAM_NETWORK_ID: string = DEFAULT_NETWORK_ID;

  @IsOptional()
  @IsString()
  @IsNotEmpty()
  IPAM_PROVIDER_TENANT: string = DEFAULT_PROVIDER_TENANT;

  // Logging
  @IsOptional()
  @IsIn(LOG_LEVELS)
  LOG_LEVEL: LogLevel = 'warn';
}

/**
 * Valida e transforma a configuração carregada pelo ConfigModule
 * (arquivo de configuração + variáveis de ambiente)
 */
export function validateEnvironment(config: Record<string, unknown>): EnvironmentVariables {
  const validated = plainToInstance(EnvironmentVariables, config, {
    exposeDefaultValues: true,
  });

  const errors = validateSync(validated, {
    skipMissingProperties: false,
  });

  if (errors.length > 0) {
    const errorMessages = errors
      .map((error) => Object.values(error.constraints || {}).join(', '))
      .join('; ');

    throw new Error(`Invalid configuration: ${errorMessages}`);
  }

  return validated;
}

/**
 * Filtro e janela de reuso passados explicitamente às contagens
 */
export interface IpamUsageOptions {
  networkId: string;
  providerTenant: string;
  reuseAfterSeconds: number;
}

/**
 * Typed access to the validated configuration
 */
@Injectable()
export class AppConfigService {
  constructor(private readonly configService: ConfigService) {}

  get database() {
    return {
      url: this.configService.getOrThrow<string>('DATABASE_URL'),
      statementTimeoutMs: this.configService.get<number>('DATABASE_STATEMENT_TIMEOUT_MS', 0),
    };
  }

  get ipam(): IpamUsageOptions {
    return {
      networkId: this.configService.get<string>('IPAM_NETWORK_ID', DEFAULT_NETWORK_ID),
      providerTenant: this.configService.get<string>('IPAM_PROVIDER_TENANT', DEFAULT_PROVIDER_TENANT),
      reuseAfterSeconds: this.configService.get<number>(
        'IPAM_REUSE_AFTER',
        DEFAULT_REUSE_AFTER_SECONDS,
      ),
    };
  }

  /**
   * Níveis habilitados a partir de LOG_LEVEL (o nível e os mais severos)
   */
  get logLevels(): LogLevel[] {
    const level = this.configService.get<LogLevel>('LOG_LEVEL', 'warn');
    const index = LOG_LEVELS.indexOf(level);

    return LOG_LEVELS.slice(index === -1 ? LOG_LEVELS.indexOf('warn') : index);
  }

  /**
   * Retorna todas as configurações (para debug)
   */
  getAll() {
    return {
      database: {
        ...this.database,
        url: this.maskConnectionString(this.database.url),
      },
      ipam: this.ipam,
      logLevels: this.logLevels,
    };
  }

  /**
   * Mascara a senha da connection string para logging
   */
  private maskConnectionString(url: string): string {
    return url.replace(/(\/\/[^:/@]+:)[^@]*@/, '$1***@');
  }
}
