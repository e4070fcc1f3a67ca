import { mkdirSync } from 'node:fs';
import { dirname } from 'node:path';
import { Module } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { TypeOrmModule } from '@nestjs/typeorm';
import { AdminApplicantService, ApplicantService, HealthService, IdentityService } from './application/services';
import { EnvironmentVariables, validate } from './infrastructure/config';
import { ENTITIES } from './infrastructure/database/entities';
import { TypeOrmLogger } from './infrastructure/database/typeorm-logger';
import { loggerProviders } from './infrastructure/logger';
import { repositoriesProviders } from './infrastructure/repositories';
import { accessPolicyProviders, ServiceRoleAuthority } from './infrastructure/security';
import { sequenceProviders } from './infrastructure/sequence';
import { AdminController, ApplicantController, HealthController } from './presentation/controllers';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      validate,
    }),
    TypeOrmModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables>) => {
        const loggingEnabled = configService.get('TYPEORM_LOGGING', true, { infer: true });
        const database = configService.get('DATABASE_PATH', './data/database.sqlite', { infer: true });

        if (database !== ':memory:') {
          mkdirSync(dirname(database), { recursive: true });
        }

        return {
          type: 'better-sqlite3',
          database,
          entities: ENTITIES,
          synchronize: configService.get('NODE_ENV', { infer: true }) !== 'production',
          logging: loggingEnabled,
          logger: loggingEnabled ? new TypeOrmLogger() : undefined,
        };
      },
    }),
    TypeOrmModule.forFeature(ENTITIES),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<EnvironmentVariables>) => [
        {
          ttl: configService.get('RATE_LIMIT_TTL', 60, { infer: true }) * 1000,
          limit: configService.get('RATE_LIMIT_MAX', 100, { infer: true }),
        },
      ],
    }),
  ],
  controllers: [ApplicantController, AdminController, HealthController],
  providers: [
    ...repositoriesProviders,
    ...sequenceProviders,
    ...accessPolicyProviders,
    ...loggerProviders,
    { provide: APP_GUARD, useClass: ThrottlerGuard },
    ServiceRoleAuthority,
    IdentityService,
    ApplicantService,
    AdminApplicantService,
    HealthService,
  ],
})
export class AppModule {}
