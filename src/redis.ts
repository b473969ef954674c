import Redis from "ioredis";
import { logger } from "./logger";

const MAX_RECONNECT_ATTEMPTS = 10;

/**
 * Create the shared Redis connection used by the store and BullMQ.
 */
export function createRedisClient(url: string): Redis {
	const client = new Redis(url, {
		maxRetriesPerRequest: null, // Required for BullMQ
		enableReadyCheck: true,

		retryStrategy: (times: number) => {
			if (times > MAX_RECONNECT_ATTEMPTS) {
				logger.error(
					`Redis connection failed after ${MAX_RECONNECT_ATTEMPTS} retries`,
				);
				return null;
			}
			const delay = Math.min(Math.exp(times) * 100, 20000);
			logger.warn({ attempt: times, delayMs: delay }, "Redis reconnecting");
			return delay;
		},
	});

	client.on("connect", () => logger.info("Redis connected"));
	client.on("ready", () => logger.info("Redis ready"));
	client.on("error", (err) => logger.error({ err }, "Redis error"));
	client.on("close", () => logger.warn("Redis connection closed"));

	return client;
}
