import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { ThrottlerModule } from '@nestjs/throttler';
import { ScheduleModule } from '@nestjs/schedule';
import { APP_GUARD } from '@nestjs/core';
import { LoggerModule } from 'nestjs-pino';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { ModelsModule } from './models/models.module';
import { ApiModule } from './api/api.module';
import { AuthModule } from './auth/auth.module';
import { RedisLockModule } from './services/redis-lock/redis-lock.module';
import { KeeperModule } from './services/keeper/keeper.module';
import configuration from './config/configuration';
import { SkipGetThrottleGuard } from './common/guards/skip-get-throttle.guard';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      envFilePath: ['.env.local', '.env'],
    }),
    LoggerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        pinoHttp: {
          level: configService.get<string>('logging.level', 'info'),
          transport:
            configService.get<string>('nodeEnv') === 'development'
              ? {
                  target: 'pino-pretty',
                  options: {
                    colorize: true,
                    singleLine: false,
                    translateTime: 'SYS:standard',
                  },
                }
              : undefined,
        },
      }),
    }),
    MongooseModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        uri: configService.get<string>('mongodb.uri'),
        // Transactions need a replica set; every settlement runs in one
        retryWrites: true,
        retryReads: true,
        maxPoolSize: configService.get<number>('mongodb.maxPoolSize', 50),
        minPoolSize: configService.get<number>('mongodb.minPoolSize', 5),
        maxIdleTimeMS: configService.get<number>('mongodb.maxIdleTimeMS', 30000),
        serverSelectionTimeoutMS: 5000,
        socketTimeoutMS: 45000,
        heartbeatFrequencyMS: 10000,
      }),
    }),
    ScheduleModule.forRoot(),
    ModelsModule,
    RedisLockModule, // subject locks; Redis optional, per-process guard always on
    AuthModule,
    ApiModule,
    KeeperModule, // expired offerings and listings, off unless KEEPER_ENABLED
    ThrottlerModule.forRootAsync({
      inject: [ConfigService],
      useFactory: (configService: ConfigService) => ({
        throttlers: [
          {
            name: 'short',
            ttl: configService.get<number>('throttle.shortTtl', 1000),
            limit: configService.get<number>('throttle.shortLimit', 10),
          },
          {
            name: 'medium',
            ttl: configService.get<number>('throttle.mediumTtl', 10000),
            limit: configService.get<number>('throttle.mediumLimit', 50),
          },
          {
            name: 'long',
            ttl: configService.get<number>('throttle.longTtl', 60000),
            limit: configService.get<number>('throttle.longLimit', 200),
          },
        ],
      }),
    }),
  ],
  controllers: [AppController],
  providers: [
    AppService,
    {
      provide: APP_GUARD,
      useClass: SkipGetThrottleGuard,
    },
  ],
})
export class AppModule {}
