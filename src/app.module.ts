import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { TypeOrmModule } from '@nestjs/typeorm';
import { ScheduleModule } from '@nestjs/schedule';
import { WinstonModule } from 'nest-winston';
import { join } from 'path';

import { createWinstonConfig } from './infrastructure/logger/logger.config';
import { appConfig } from './config/app.config';
import { databaseConfig } from './config/database.config';
import { rabbitmqConfig } from './config/rabbitmq.config';
import { redisConfig } from './config/redis.config';
import { reservationConfig } from './config/reservation.config';
import { ClockModule } from './common/clock/clock.module';
import { RedisModule } from './infrastructure/redis/redis.module';
import { MessagingModule } from './modules/messaging/messaging.module';
import { CatalogModule } from './modules/catalog/catalog.module';
import { AvailabilityModule } from './modules/availability/availability.module';
import { ReservationsModule } from './modules/reservations/reservations.module';
import { BookingsModule } from './modules/bookings/bookings.module';
import { HealthModule } from './health/health.module';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      envFilePath: '.env',
      load: [appConfig, databaseConfig, redisConfig, rabbitmqConfig, reservationConfig],
    }),

    WinstonModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) =>
        createWinstonConfig({
          nodeEnv: configService.get<string>('app.nodeEnv') ?? 'development',
          logDir: configService.get<string>('app.logDir') ?? 'logs',
        }),
    }),

    ScheduleModule.forRoot(),

    TypeOrmModule.forRootAsync({
      imports: [ConfigModule],
      useFactory: (configService: ConfigService) => ({
        type: 'postgres',
        host: configService.get<string>('database.host'),
        port: configService.get<number>('database.port'),
        username: configService.get<string>('database.user'),
        password: configService.get<string>('database.password'),
        database: configService.get<string>('database.name'),
        poolSize: configService.get<number>('database.poolSize'),
        autoLoadEntities: true,
        synchronize: false,
        migrationsRun: true,
        migrations: [join(__dirname, 'infrastructure/database/migrations/*{.ts,.js}')],
        logging: configService.get<string>('app.nodeEnv') === 'development',
      }),
      inject: [ConfigService],
    }),

    ClockModule,
    RedisModule,
    MessagingModule,

    CatalogModule,
    AvailabilityModule,
    ReservationsModule,
    BookingsModule,
    HealthModule,
  ],
})
export class AppModule {}
