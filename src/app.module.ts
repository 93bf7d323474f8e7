import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ScheduleModule } from '@nestjs/schedule';
import { ThrottlerGuard, ThrottlerModule } from '@nestjs/throttler';
import { DataSource, DataSourceOptions } from 'typeorm';
import appConfig from './config/app.config';
import throttlerConfig from './config/throttler.config';
import authConfig from './auth/config/auth.config';
import databaseConfig from './database/config/database.config';
import complianceConfig from './compliance/config/compliance.config';
import { AllConfigType } from './config/config.type';
import { TypeOrmConfigService } from './database/typeorm-config.service';
import { HttpsEnforcementMiddleware } from './utils/https-enforcement.middleware';
import { ClockModule } from './clock/clock.module';
import { AuthModule } from './auth/auth.module';
import { AuditModule } from './audit/audit.module';
import { PeopleModule } from './people/people.module';
import { TrainingModule } from './training/training.module';
import { FacilitiesModule } from './facilities/facilities.module';
import { DocumentsModule } from './documents/documents.module';
import { ComplianceModule } from './compliance/compliance.module';
import { AuthorizationsModule } from './authorizations/authorizations.module';
import { AutocheckModule } from './autocheck/autocheck.module';
import { ReportsModule } from './reports/reports.module';

const infrastructureDatabaseModule = TypeOrmModule.forRootAsync({
  useClass: TypeOrmConfigService,
  dataSourceFactory: async (options?: DataSourceOptions) => {
    if (!options) {
      throw new Error('Missing TypeORM data source options');
    }
    return new DataSource(options).initialize();
  },
});

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [
        appConfig,
        authConfig,
        databaseConfig,
        throttlerConfig,
        complianceConfig,
      ],
      envFilePath: ['.env'],
    }),
    infrastructureDatabaseModule,
    ScheduleModule.forRoot(),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService<AllConfigType>) => [
        {
          ttl: configService.getOrThrow('throttler.ttl', { infer: true }),
          limit: configService.getOrThrow('throttler.limit', { infer: true }),
        },
      ],
    }),
    ClockModule,
    AuthModule,
    AuditModule,
    PeopleModule,
    TrainingModule,
    FacilitiesModule,
    DocumentsModule,
    ComplianceModule,
    AuthorizationsModule,
    AutocheckModule,
    ReportsModule,
  ],
  providers: [
    {
      provide: APP_GUARD,
      useClass: ThrottlerGuard,
    },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(HttpsEnforcementMiddleware).forRoutes('*');
  }
}
