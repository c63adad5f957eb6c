import { Injectable } from '@nestjs/common';
import { InjectConnection } from '@nestjs/mongoose';
import { Connection } from 'mongoose';
import { RedisLockService } from './services/redis-lock/redis-lock.service';

@Injectable()
export class AppService {
  constructor(
    @InjectConnection() private connection: Connection,
    private redisLockService: RedisLockService,
  ) {}

  getHealth() {
    const mongoStatus = this.connection.readyState === 1 ? 'connected' : 'disconnected';
    return {
      status: 'ok',
      timestamp: new Date().toISOString(),
      uptime: process.uptime(),
      database: {
        mongodb: mongoStatus,
      },
      locks: {
        redis: this.redisLockService.isLockServiceAvailable() ? 'enabled' : 'transactions-only',
      },
    };
  }
}
