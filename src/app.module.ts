import { MiddlewareConsumer, Module, NestModule } from '@nestjs/common';
import { APP_GUARD } from '@nestjs/core';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { ThrottlerGuard, ThrottlerModule, seconds } from '@nestjs/throttler';
import { LoggerModule } from 'nestjs-pino';
import { AppController } from './app.controller';
import { CommonModule } from './common/common.module';
import { ApiKeyGuard } from './common/guards/api-key.guard';
import { CorrelationIdMiddleware } from './common/middleware/correlation-id.middleware';
import { EnvShape, validateEnv } from './config/env.validation';
import { SupabaseModule } from './supabase/supabase.module';
import { HealthModule } from './health/health.module';
import { UsersModule } from './users/users.module';
import { ProductsModule } from './products/products.module';
import { OrdersModule } from './orders/orders.module';
import { MessagesModule } from './messages/messages.module';
import { TicketsModule } from './tickets/tickets.module';
import { NotificationsModule } from './notifications/notifications.module';
import { DeliveryBoysModule } from './delivery-boys/delivery-boys.module';
import { SettingsModule } from './settings/settings.module';
import { ChatModule } from './chat/chat.module';
import { AnalyticsModule } from './analytics/analytics.module';
import { PaymentsModule } from './payments/payments.module';

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate: validateEnv, expandVariables: true }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvShape, true>) => {
        const env = config.get('NODE_ENV', { infer: true });
        return {
          pinoHttp: {
            level:
              config.get('LOG_LEVEL', { infer: true }) ||
              (env === 'production' ? 'info' : env === 'test' ? 'silent' : 'debug'),
            redact: [
              'req.headers.authorization',
              'req.headers["x-api-key"]',
              'req.headers["stripe-signature"]',
            ],
            transport:
              env === 'development'
                ? {
                    target: 'pino-pretty',
                    options: { colorize: true, singleLine: true },
                  }
                : undefined,
          },
        };
      },
    }),
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (config: ConfigService<EnvShape, true>) => [
        {
          ttl: seconds(config.get('RATE_LIMIT_TTL', { infer: true })),
          limit: config.get('RATE_LIMIT_MAX', { infer: true }),
        },
      ],
    }),
    CommonModule,
    SupabaseModule,
    HealthModule,
    UsersModule,
    ProductsModule,
    OrdersModule,
    MessagesModule,
    TicketsModule,
    NotificationsModule,
    DeliveryBoysModule,
    SettingsModule,
    ChatModule,
    AnalyticsModule,
    PaymentsModule,
  ],
  controllers: [AppController],
  providers: [
    { provide: APP_GUARD, useExisting: ApiKeyGuard },
    { provide: APP_GUARD, useClass: ThrottlerGuard },
  ],
})
export class AppModule implements NestModule {
  configure(consumer: MiddlewareConsumer) {
    consumer.apply(CorrelationIdMiddleware).forRoutes('*');
  }
}
