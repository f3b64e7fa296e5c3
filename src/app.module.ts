import { Module } from '@nestjs/common';
import { TypeOrmModule } from '@nestjs/typeorm';
import { LoggerModule } from 'nestjs-pino';
import { AppConfigModule } from './shared/config/app-config.module';
import type { AppConfig } from './shared/config/app.config';
import { INJECTION_TOKENS } from './shared/constants/injection-tokens';
import { RevenueModule } from './revenue/revenue.module';
import { buildDatabaseOptions } from './revenue/infrastructure/persistence/database.options';

@Module({
  imports: [
    AppConfigModule,

    // Structured logging
    LoggerModule.forRootAsync({
      imports: [AppConfigModule],
      inject: [INJECTION_TOKENS.APP_CONFIG],
      useFactory: (config: AppConfig) => ({
        pinoHttp: {
          transport:
            config.nodeEnv !== 'production' && config.nodeEnv !== 'test'
              ? { target: 'pino-pretty', options: { colorize: true } }
              : undefined,
          level: config.logLevel,
        },
      }),
    }),

    // SQLite data warehouse holding fact_sales
    TypeOrmModule.forRootAsync({
      imports: [AppConfigModule],
      inject: [INJECTION_TOKENS.APP_CONFIG],
      useFactory: (config: AppConfig) => buildDatabaseOptions(config),
    }),

    // Feature modules
    RevenueModule,
  ],
})
export class AppModule {}
