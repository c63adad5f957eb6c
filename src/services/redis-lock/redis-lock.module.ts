import { Module, Global } from '@nestjs/common';
import { RedisLockService } from './redis-lock.service';

/**
 * RedisLockModule
 *
 * Optional per-asset and per-account locks shared by every instance
 */
@Global()
@Module({
  providers: [RedisLockService],
  exports: [RedisLockService],
})
export class RedisLockModule {}
