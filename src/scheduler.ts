/**
 * Job orchestration: cron registration, execution with a per-job lock,
 * failure alerts and one-shot retries for report jobs.
 *
 * Timing is delegated to a JobQueue (BullMQ in production, see worker.ts);
 * every run, whether cron-fired, a retry or a manual trigger, goes through
 * runJob so the lock and run history apply to all of them.
 */

import type { JobSchedules } from "./config";
import { formatDateTime } from "./core/dates";
import { describeSchedule } from "./core/schedule";
import { toError } from "./errors";
import { type JobContext, type JobHandlers, SyncThreadState } from "./jobs";
import { schedulerLogger } from "./logger";

export const JOB_IDS = [
	"daily_sync_prompt",
	"daily_sync_reminder",
	"daily_sync_summary",
	"daily_report",
	"weekly_report",
] as const;

export type JobId = (typeof JOB_IDS)[number];

export const JOB_NAMES: Record<JobId, string> = {
	daily_sync_prompt: "Daily sync prompt",
	daily_sync_reminder: "Daily sync reminder",
	daily_sync_summary: "Daily sync summary",
	daily_report: "Daily report",
	weekly_report: "Weekly report",
};

/** Only report jobs get an automatic retry after a scheduled failure */
const RETRYABLE_JOBS: ReadonlySet<JobId> = new Set(["daily_report", "weekly_report"]);

export function isJobId(value: string): value is JobId {
	return JOB_IDS.some((id) => id === value);
}

export function schedulePatterns(schedules: JobSchedules): Record<JobId, string> {
	return {
		daily_sync_prompt: schedules.dailySyncPrompt,
		daily_sync_reminder: schedules.dailySyncReminder,
		daily_sync_summary: schedules.dailySyncSummary,
		daily_report: schedules.dailyReport,
		weekly_report: schedules.weeklyReport,
	};
}

// =============================================================================
// Types
// =============================================================================

export type JobSource = "scheduled" | "retry" | "manual";

export type JobRunResult =
	| { status: "succeeded" }
	| { status: "failed"; error: string }
	| { status: "skipped"; reason: string };

export interface JobRunRecord {
	source: JobSource;
	status: "succeeded" | "failed";
	startedAt: string;
	finishedAt: string;
	error: string | null;
}

export interface JobStatus {
	id: string;
	name: string;
	/** "YYYY-MM-DD HH:mm:ss" in the team timezone, or "unscheduled" */
	nextRun: string;
	active: boolean;
	trigger: string;
	lastRun: JobRunRecord | null;
}

export interface ScheduleInfo {
	id: string;
	/** Epoch milliseconds of the next run */
	next: number | null;
}

export interface PendingRetry {
	id: string;
	jobId: JobId;
	runAt: number;
}

/**
 * Timing backend: recurring schedules plus delayed one-shot runs.
 */
export interface JobQueue {
	upsertSchedule(jobId: JobId, pattern: string, timezone: string): Promise<void>;
	listSchedules(): Promise<ScheduleInfo[]>;
	scheduleRetry(jobId: JobId, retryId: string, delayMs: number): Promise<void>;
	listPendingRetries(): Promise<PendingRetry[]>;
}

export interface FailureNotifier {
	notifyJobFailure(jobId: string, errorMessage: string, retryAt: string | null): Promise<void>;
}

export interface JobOrchestratorOptions {
	timezone: string;
	patterns: Record<JobId, string>;
	retryDelayMs: number;
	now?: () => Date;
}

// =============================================================================
// Orchestrator
// =============================================================================

export class JobOrchestrator {
	private readonly running = new Set<JobId>();
	private readonly lastRuns = new Map<JobId, JobRunRecord>();
	private readonly syncThread = new SyncThreadState();
	private readonly timezone: string;
	private readonly patterns: Record<JobId, string>;
	private readonly retryDelayMs: number;
	private readonly now: () => Date;

	constructor(
		private readonly queue: JobQueue,
		private readonly handlers: JobHandlers,
		private readonly alerts: FailureNotifier,
		options: JobOrchestratorOptions,
	) {
		this.timezone = options.timezone;
		this.patterns = options.patterns;
		this.retryDelayMs = options.retryDelayMs;
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Register (or update) the cron schedule of every job.
	 */
	async start(): Promise<void> {
		for (const jobId of JOB_IDS) {
			await this.queue.upsertSchedule(jobId, this.patterns[jobId], this.timezone);
			schedulerLogger.info(
				{ jobId, pattern: this.patterns[jobId], timezone: this.timezone },
				"Job scheduled",
			);
		}
	}

	/**
	 * Execute a job now. Overlapping runs of the same job are skipped.
	 * Failures of scheduled and retry runs alert the admin; scheduled report
	 * jobs are also retried once after the retry delay.
	 */
	async runJob(jobId: JobId, source: JobSource): Promise<JobRunResult> {
		const log = schedulerLogger.child({ jobId, source });

		if (this.running.has(jobId)) {
			log.warn("Job already running, skipping this run");
			return { status: "skipped", reason: "already running" };
		}

		this.running.add(jobId);
		const startedAt = this.now();
		const context: JobContext = { syncThread: this.syncThread, source };

		try {
			log.info("Job started");
			await this.handlers[jobId](context);
			this.record(jobId, source, startedAt, null);
			log.info({ durationMs: this.now().getTime() - startedAt.getTime() }, "Job succeeded");
			return { status: "succeeded" };
		} catch (error) {
			const message = toError(error).message;
			this.record(jobId, source, startedAt, message);
			log.error({ err: error }, "Job failed");
			if (source !== "manual") {
				await this.handleFailure(jobId, source, message);
			}
			return { status: "failed", error: message };
		} finally {
			this.running.delete(jobId);
		}
	}

	/**
	 * Run a job by id outside its schedule. Returns false for an unknown id,
	 * a failed run, or a run skipped because the job is already running.
	 */
	async triggerJobManually(id: string): Promise<boolean> {
		if (!isJobId(id)) {
			schedulerLogger.warn({ jobId: id }, "Manual trigger for unknown job");
			return false;
		}
		const result = await this.runJob(id, "manual");
		return result.status === "succeeded";
	}

	async getJobStatus(): Promise<JobStatus[]> {
		let schedules: ScheduleInfo[] = [];
		try {
			schedules = await this.queue.listSchedules();
		} catch (error) {
			schedulerLogger.warn({ err: error }, "Could not read job schedules");
		}
		const nextById = new Map(schedules.map((schedule) => [schedule.id, schedule.next]));

		const statuses: JobStatus[] = JOB_IDS.map((jobId) => {
			const next = nextById.get(jobId) ?? null;
			return {
				id: jobId,
				name: JOB_NAMES[jobId],
				nextRun: next === null ? "unscheduled" : formatDateTime(new Date(next), this.timezone),
				active: next !== null,
				trigger: describeSchedule(this.patterns[jobId], this.timezone),
				lastRun: this.lastRuns.get(jobId) ?? null,
			};
		});

		let retries: PendingRetry[] = [];
		try {
			retries = await this.queue.listPendingRetries();
		} catch (error) {
			schedulerLogger.warn({ err: error }, "Could not read pending retries");
		}
		for (const retry of retries) {
			const runAt = formatDateTime(new Date(retry.runAt), this.timezone);
			statuses.push({
				id: retry.id,
				name: `${JOB_NAMES[retry.jobId]} (retry)`,
				nextRun: runAt,
				active: true,
				trigger: `once at ${runAt} (${this.timezone})`,
				lastRun: null,
			});
		}

		return statuses;
	}

	private record(
		jobId: JobId,
		source: JobSource,
		startedAt: Date,
		error: string | null,
	): void {
		this.lastRuns.set(jobId, {
			source,
			status: error === null ? "succeeded" : "failed",
			startedAt: startedAt.toISOString(),
			finishedAt: this.now().toISOString(),
			error,
		});
	}

	private async handleFailure(
		jobId: JobId,
		source: JobSource,
		message: string,
	): Promise<void> {
		const log = schedulerLogger.child({ jobId, source });
		let retryAt: string | null = null;

		if (source === "scheduled" && RETRYABLE_JOBS.has(jobId)) {
			const now = this.now();
			const retryId = `${jobId}_retry_${now.getTime()}`;
			try {
				await this.queue.scheduleRetry(jobId, retryId, this.retryDelayMs);
				retryAt = formatDateTime(new Date(now.getTime() + this.retryDelayMs), this.timezone);
				log.info({ retryId, retryAt }, "Retry scheduled");
			} catch (error) {
				log.error({ err: error, retryId }, "Failed to schedule retry");
			}
		}

		try {
			await this.alerts.notifyJobFailure(jobId, message, retryAt);
		} catch (error) {
			log.error({ err: error }, "Failed to notify admin of job failure");
		}
	}
}
