import { Module } from '@nestjs/common';
import { ConfigModule } from '@nestjs/config';
import { APP_FILTER } from '@nestjs/core';
import { appConfig } from './config/app.config';
import { ApiExceptionFilter } from './lib/errors/api-exception.filter';
import { AuditModule } from './modules/audit/audit.module';
import { ContentsModule } from './modules/contents/contents.module';
import { DevicesModule } from './modules/devices/devices.module';
import { EmailsModule } from './modules/emails/emails.module';
import { EventsModule } from './modules/events/events.module';
import { HealthModule } from './modules/health/health.module';
import { MetricsModule } from './modules/metrics/metrics.module';
import { OrganizationsModule } from './modules/organizations/organizations.module';
import { StoreModule } from './modules/store/store.module';
import { TokensModule } from './modules/tokens/tokens.module';
import { UsersModule } from './modules/users/users.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, load: [appConfig] }),
    StoreModule,
    AuditModule,
    HealthModule,
    ContentsModule,
    UsersModule,
    OrganizationsModule,
    EmailsModule,
    DevicesModule,
    TokensModule,
    MetricsModule,
    EventsModule,
  ],
  providers: [{ provide: APP_FILTER, useClass: ApiExceptionFilter }],
})
export class AppModule {}
