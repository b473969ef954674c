/**
 * Pulseboard - Backlog and Slack project reporting
 * Entry point that wires everything together.
 */

import { Queue } from "bullmq";
import { createAnswerGenerator } from "./ai";
import { BacklogClient } from "./backlog";
import { type AppConfig, loadConfig } from "./config";
import { ConfigurationError } from "./errors";
import { checkHealth } from "./health";
import { createJobHandlers } from "./jobs";
import { logger } from "./logger";
import { Notifier } from "./notifier";
import { ProgressExtractor } from "./progress-extractor";
import { QueryService } from "./query";
import { createRedisClient } from "./redis";
import { ReportService } from "./report-service";
import { createHttpServer, createRoutes } from "./routes";
import { JobOrchestrator, schedulePatterns } from "./scheduler";
import { ShutdownRegistry } from "./shutdown";
import { SlackClient } from "./slack";
import { CacheStore } from "./store";
import { TaskCache } from "./task-cache";
import { syncUserMappings } from "./user-mappings";
import { BullJobQueue, createWorker, type JobPayload, QUEUE_NAME } from "./worker";

async function start(config: AppConfig, shutdown: ShutdownRegistry): Promise<void> {
	const redis = createRedisClient(config.redisUrl);
	// Registered first so it closes after everything else
	shutdown.register("redis", async () => {
		await redis.quit();
	});

	const store = new CacheStore(redis);
	const tracker = new BacklogClient({
		spaceKey: config.backlog.spaceKey,
		apiKey: config.backlog.apiKey,
		domain: config.backlog.domain,
		timezone: config.timezone,
	});
	const chat = new SlackClient({ botToken: config.slack.botToken });

	const tasks = new TaskCache(store, tracker, {
		projectIds: config.backlog.projectIds,
		ttlMs: config.cacheTtlMs,
		timezone: config.timezone,
	});
	const progress = new ProgressExtractor(chat, store, {
		channelId: config.slack.channelId,
		timezone: config.timezone,
	});
	const reports = new ReportService(tasks, progress, store, { timezone: config.timezone });
	const notifier = new Notifier(chat, store, {
		channelId: config.slack.channelId,
		adminUserId: config.slack.adminUserId,
		timezone: config.timezone,
		issueUrl: (key) => tracker.issueUrl(key),
	});
	const query = new QueryService(tasks, store, createAnswerGenerator(config.ai), {
		timezone: config.timezone,
		issueUrl: (key) => tracker.issueUrl(key),
	});

	const queue = new Queue<JobPayload>(QUEUE_NAME, { connection: redis });
	shutdown.register("queue", () => queue.close());

	const orchestrator = new JobOrchestrator(
		new BullJobQueue(queue),
		createJobHandlers({
			reports,
			progress,
			notifier,
			chat,
			channelId: config.slack.channelId,
			timezone: config.timezone,
		}),
		notifier,
		{
			timezone: config.timezone,
			patterns: schedulePatterns(config.schedules),
			retryDelayMs: config.retryDelayMs,
		},
	);

	const worker = createWorker(orchestrator, redis);
	shutdown.register("worker", () => worker.close());

	await orchestrator.start();

	const server = createHttpServer(
		createRoutes({
			orchestrator,
			reports,
			notifier,
			store,
			tasks,
			query,
			progress,
			health: () => checkHealth({ store, tracker, chat }),
			syncUsers: () =>
				syncUserMappings({
					tracker,
					chat,
					store,
					projectIds: config.backlog.projectIds,
					channelId: config.slack.channelId,
				}),
		}),
	);
	shutdown.register(
		"http",
		() => new Promise<void>((resolve) => server.close(() => resolve())),
	);

	server.listen(config.port, () => {
		logger.info({ port: config.port, timezone: config.timezone }, "Pulseboard is running");
		logger.info(`Health check: http://localhost:${config.port}/health`);
	});
}

async function main(): Promise<void> {
	logger.info("Starting Pulseboard...");

	const shutdown = new ShutdownRegistry();
	shutdown.listen();

	let config: AppConfig;
	try {
		config = loadConfig();
	} catch (error) {
		if (error instanceof ConfigurationError) {
			for (const issue of error.issues) logger.fatal({ issue }, "Invalid configuration");
		}
		throw error;
	}

	await start(config, shutdown);
}

main().catch((error: unknown) => {
	logger.fatal({ err: error }, "Failed to start Pulseboard");
	process.exit(1);
});
