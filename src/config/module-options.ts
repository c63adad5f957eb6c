import { ConfigService } from '@nestjs/config';
import { MongooseModuleFactoryOptions } from '@nestjs/mongoose';
import { ThrottlerModuleOptions } from '@nestjs/throttler';
import { Params } from 'nestjs-pino';

/**
 * Options of the infrastructure modules, built from the loaded configuration
 */

export function loggerOptions(config: ConfigService): Params {
  const pretty = config.get<string>('nodeEnv') === 'development';

  return {
    pinoHttp: {
      level: config.get<string>('logging.level', 'info'),
      transport: pretty
        ? {
            target: 'pino-pretty',
            options: { colorize: true, translateTime: 'SYS:standard' },
          }
        : undefined,
    },
  };
}

// транзакции требуют replica set
export function mongooseOptions(config: ConfigService): MongooseModuleFactoryOptions {
  return {
    uri: config.get<string>('mongodb.uri'),
    retryWrites: true,
    retryReads: true,
    maxPoolSize: config.get<number>('mongodb.maxPoolSize', 50),
    minPoolSize: config.get<number>('mongodb.minPoolSize', 5),
    maxIdleTimeMS: config.get<number>('mongodb.maxIdleTimeMS', 30000),
    serverSelectionTimeoutMS: 5000,
  };
}

/**
 * Three windows: burst (short), sustained (medium) and per-minute (long)
 * Bids add a tighter limit of their own on the route
 */
export function throttlerOptions(config: ConfigService): ThrottlerModuleOptions {
  const window = (name: 'short' | 'medium' | 'long', ttl: number, limit: number) => ({
    name,
    ttl: config.get<number>(`throttle.${name}Ttl`, ttl),
    limit: config.get<number>(`throttle.${name}Limit`, limit),
  });

  return {
    throttlers: [window('short', 1000, 10), window('medium', 10000, 50), window('long', 60000, 200)],
  };
}
