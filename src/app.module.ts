import { Module } from '@nestjs/common';
import { ConfigModule, ConfigService } from '@nestjs/config';
import { MongooseModule } from '@nestjs/mongoose';
import { ThrottlerModule } from '@nestjs/throttler';
import { APP_GUARD } from '@nestjs/core';
import { LoggerModule } from 'nestjs-pino';
import { AppController } from './app.controller';
import { AppService } from './app.service';
import { ModelsModule } from './models/models.module';
import { SchedulerModule } from './services/scheduler/scheduler.module';
import { ApiModule } from './api/api.module';
import { RedisLockModule } from './services/redis-lock/redis-lock.module';
import configuration from './config/configuration';
import { loggerOptions, mongooseOptions, throttlerOptions } from './config/module-options';
import { SkipGetThrottleGuard } from './common/guards/skip-get-throttle.guard';

@Module({
  imports: [
    ConfigModule.forRoot({
      isGlobal: true,
      load: [configuration],
      envFilePath: ['.env.local', '.env'],
    }),
    LoggerModule.forRootAsync({ inject: [ConfigService], useFactory: loggerOptions }),
    MongooseModule.forRootAsync({ inject: [ConfigService], useFactory: mongooseOptions }),
    ThrottlerModule.forRootAsync({ inject: [ConfigService], useFactory: throttlerOptions }),
    ModelsModule,
    RedisLockModule,
    SchedulerModule,
    ApiModule,
  ],
  controllers: [AppController],
  providers: [AppService, { provide: APP_GUARD, useClass: SkipGetThrottleGuard }],
})
export class AppModule {}
