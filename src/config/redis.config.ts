import type { RedisOptions } from 'ioredis';
import { GLOBAL_ENV } from '@/utils/constants';

class RedisConnection {
    private static instance: RedisConnection;

    private constructor() {}

    public static getInstance(): RedisConnection {
        if (!RedisConnection.instance) {
            RedisConnection.instance = new RedisConnection();
        }
        return RedisConnection.instance;
    }

    public getConnectionOptions(): RedisOptions {
        const redisOptions: RedisOptions = {
            host: GLOBAL_ENV.REDIS_HOST,
            port: GLOBAL_ENV.REDIS_PORT,
            db: GLOBAL_ENV.REDIS_DB,
            retryStrategy: (times: number) => Math.min(times * 50, 2000),
            maxRetriesPerRequest: null, // BullMQ requiere null para manejar los reintentos
        };

        if (GLOBAL_ENV.REDIS_PASSWORD) {
            redisOptions.password = GLOBAL_ENV.REDIS_PASSWORD;
        }

        return redisOptions;
    }
}

export default RedisConnection;
