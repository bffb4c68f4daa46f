import { Module, Global } from '@nestjs/common';
import { RedisLockService } from './redis-lock.service';

/**
 * RedisLockModule
 *
 * Subject locks for every mutating operation; global so each feature
 * module can inject RedisLockService
 */
@Global()
@Module({
  providers: [RedisLockService],
  exports: [RedisLockService],
})
export class RedisLockModule {}
