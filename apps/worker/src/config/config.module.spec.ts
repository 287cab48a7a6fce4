import { Test } from '@nestjs/testing';
import { ConfigModule, envFilePaths } from './config.module';
import { WorkerConfigService } from './config.service';

describe('envFilePaths', () => {
  it('should list the environment files most specific first', () => {
    expect(envFilePaths('production')).toEqual(['.env.production.local', '.env.production', '.env']);
  });

  it('should default to development', () => {
    expect(envFilePaths(undefined)).toEqual(['.env.development.local', '.env.development', '.env']);
    expect(envFilePaths('')).toEqual(['.env.development.local', '.env.development', '.env']);
  });
});

describe('ConfigModule', () => {
  it('should expose the validated environment', async () => {
    const moduleRef = await Test.createTestingModule({ imports: [ConfigModule] }).compile();
    const config = moduleRef.get(WorkerConfigService);

    expect(config.environment.nodeEnv).toBe('test');
    expect(config.priceHistoryLimit).toBe(500);
    expect(config.validation).toEqual({ minConfidence: 0.6, maxPriceChangePercent: 50, warningPenalty: 0.05 });

    await moduleRef.close();
  });
});
