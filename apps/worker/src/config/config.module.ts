import { Global, Module } from '@nestjs/common';
import { ConfigModule as NestConfigModule } from '@nestjs/config';
import { WorkerConfigService } from './config.service';
import { validateEnv } from './env.validation';

/**
 * Env files for a NODE_ENV, most specific first. The first file that sets a
 * variable wins; the process environment overrides all of them.
 */
export function envFilePaths(nodeEnv: string | undefined): string[] {
  const environment = nodeEnv || 'development';
  return [`.env.${environment}.local`, `.env.${environment}`, '.env'];
}

/**
 * Worker configuration: validated environment exposed through
 * WorkerConfigService. Tests read the process environment only.
 */
@Global()
@Module({
  imports: [
    NestConfigModule.forRoot({
      isGlobal: true,
      cache: true,
      envFilePath: envFilePaths(process.env.NODE_ENV),
      ignoreEnvFile: process.env.NODE_ENV === 'test',
      validate: validateEnv,
    }),
  ],
  providers: [WorkerConfigService],
  exports: [WorkerConfigService],
})
export class ConfigModule {}
