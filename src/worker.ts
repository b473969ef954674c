/**
 * BullMQ backend for the job orchestrator: a queue adapter for schedules and
 * retries, and the worker that executes fired jobs.
 */

import type Redis from "ioredis";
import { type Job, type Queue, UnrecoverableError, Worker } from "bullmq";
import { schedulerLogger } from "./logger";
import {
	isJobId,
	type JobId,
	type JobOrchestrator,
	type JobQueue,
	type JobRunResult,
	type PendingRetry,
	type ScheduleInfo,
} from "./scheduler";

export const QUEUE_NAME = "pulseboard";

export interface JobPayload {
	jobId: string;
	/** Set on one-shot retry runs */
	retry?: boolean;
}

const COMPLETED_JOB_AGE_S = 86400; // 24 hours
const FAILED_JOB_AGE_S = 604800; // 7 days

export class BullJobQueue implements JobQueue {
	constructor(private readonly queue: Queue<JobPayload>) {}

	async upsertSchedule(jobId: JobId, pattern: string, timezone: string): Promise<void> {
		await this.queue.upsertJobScheduler(
			jobId,
			{ pattern, tz: timezone },
			{
				name: jobId,
				data: { jobId },
				opts: {
					attempts: 1,
					removeOnComplete: { age: COMPLETED_JOB_AGE_S },
					removeOnFail: { age: FAILED_JOB_AGE_S },
				},
			},
		);
	}

	async listSchedules(): Promise<ScheduleInfo[]> {
		const schedulers = await this.queue.getJobSchedulers();
		return schedulers.map((scheduler) => ({
			id: scheduler.key,
			next: scheduler.next ?? null,
		}));
	}

	async scheduleRetry(jobId: JobId, retryId: string, delayMs: number): Promise<void> {
		await this.queue.add(
			jobId,
			{ jobId, retry: true },
			{
				jobId: retryId,
				delay: delayMs,
				attempts: 1,
				removeOnComplete: true,
				removeOnFail: { age: FAILED_JOB_AGE_S },
			},
		);
	}

	async listPendingRetries(): Promise<PendingRetry[]> {
		const delayed = await this.queue.getDelayed();
		const retries: PendingRetry[] = [];
		for (const job of delayed) {
			if (!job.id || !job.data.retry || !isJobId(job.data.jobId)) continue;
			retries.push({
				id: job.id,
				jobId: job.data.jobId,
				runAt: job.timestamp + (job.opts.delay ?? 0),
			});
		}
		return retries;
	}
}

/**
 * Route a fired job to the orchestrator.
 * Fails fast with UnrecoverableError for unknown job ids.
 */
export async function processJob(
	orchestrator: Pick<JobOrchestrator, "runJob">,
	job: Pick<Job<JobPayload>, "data">,
): Promise<JobRunResult> {
	const { jobId } = job.data;
	if (!isJobId(jobId)) {
		throw new UnrecoverableError(`Unknown job: ${jobId}`);
	}
	// Handler failures are reported by the orchestrator, not rethrown
	return orchestrator.runJob(jobId, job.data.retry ? "retry" : "scheduled");
}

/**
 * Create and start the BullMQ worker.
 */
export function createWorker(
	orchestrator: JobOrchestrator,
	connection: Redis,
): Worker<JobPayload, JobRunResult> {
	const worker = new Worker<JobPayload, JobRunResult>(
		QUEUE_NAME,
		(job) => processJob(orchestrator, job),
		{
			connection,
			// Different jobs run in parallel; the orchestrator locks per job id
			concurrency: 5,
		},
	);

	worker.on("completed", (job, result) => {
		schedulerLogger.debug(
			{
				bullJobId: job.id,
				status: result.status,
				duration: Date.now() - job.timestamp,
			},
			"Queue job completed",
		);
	});

	worker.on("failed", (job, error) => {
		schedulerLogger.error(
			{ bullJobId: job?.id, err: error, attempts: job?.attemptsMade },
			"Queue job failed",
		);
	});

	worker.on("stalled", (jobId) => {
		schedulerLogger.warn({ bullJobId: jobId }, "Queue job stalled");
	});

	worker.on("error", (error) => {
		schedulerLogger.error({ err: error }, "Worker error");
	});

	schedulerLogger.info("Job worker started");

	return worker;
}
