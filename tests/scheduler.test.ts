import { beforeEach, describe, expect, it, type Mock, vi } from "vitest";
import type { JobContext, JobHandler, JobHandlers } from "../src/jobs";
import { JobOrchestrator, type JobId } from "../src/scheduler";
import { FakeJobQueue } from "./fixtures/fakes";

const TZ = "Asia/Tokyo";
// 18:00 on 2024-01-10 in Tokyo
const NOW = new Date("2024-01-10T09:00:00.000Z");
const RETRY_DELAY_MS = 30 * 60 * 1000;

const PATTERNS: Record<JobId, string> = {
	daily_sync_prompt: "0 9 * * 1-5",
	daily_sync_reminder: "0 11 * * 1-5",
	daily_sync_summary: "0 12 * * 1-5",
	daily_report: "0 18 * * 1-5",
	weekly_report: "0 17 * * 5",
};

describe("JobOrchestrator", () => {
	let queue: FakeJobQueue;
	let handlers: Record<JobId, Mock<JobHandler>>;
	let notifyJobFailure: Mock<
		(jobId: string, errorMessage: string, retryAt: string | null) => Promise<void>
	>;
	let orchestrator: JobOrchestrator;

	beforeEach(() => {
		queue = new FakeJobQueue();
		const ok = () => vi.fn<JobHandler>(async () => {});
		handlers = {
			daily_sync_prompt: ok(),
			daily_sync_reminder: ok(),
			daily_sync_summary: ok(),
			daily_report: ok(),
			weekly_report: ok(),
		};
		notifyJobFailure = vi.fn(async () => {});
		const jobHandlers: JobHandlers = handlers;
		orchestrator = new JobOrchestrator(queue, jobHandlers, { notifyJobFailure }, {
			timezone: TZ,
			patterns: PATTERNS,
			retryDelayMs: RETRY_DELAY_MS,
			now: () => NOW,
		});
	});

	it("registers every job's cron pattern in the team timezone", async () => {
		await orchestrator.start();

		expect([...queue.schedules.entries()]).toEqual([
			["daily_sync_prompt", { pattern: "0 9 * * 1-5", timezone: TZ }],
			["daily_sync_reminder", { pattern: "0 11 * * 1-5", timezone: TZ }],
			["daily_sync_summary", { pattern: "0 12 * * 1-5", timezone: TZ }],
			["daily_report", { pattern: "0 18 * * 1-5", timezone: TZ }],
			["weekly_report", { pattern: "0 17 * * 5", timezone: TZ }],
		]);
	});

	it("runs the handler with the shared job context", async () => {
		expect(await orchestrator.runJob("daily_report", "scheduled")).toEqual({
			status: "succeeded",
		});

		const context: JobContext | undefined = handlers.daily_report.mock.calls[0]?.[0];
		expect(context?.source).toBe("scheduled");
		expect(context?.syncThread.get()).toBeNull();
	});

	it("skips a run while the same job is still running", async () => {
		let finish = () => {};
		handlers.daily_report.mockImplementationOnce(
			() =>
				new Promise<void>((resolve) => {
					finish = () => resolve();
				}),
		);

		const first = orchestrator.runJob("daily_report", "scheduled");
		expect(await orchestrator.runJob("daily_report", "scheduled")).toEqual({
			status: "skipped",
			reason: "already running",
		});
		expect(await orchestrator.triggerJobManually("daily_report")).toBe(false);
		// Other jobs are not blocked
		expect(await orchestrator.triggerJobManually("weekly_report")).toBe(true);

		finish();
		expect(await first).toEqual({ status: "succeeded" });
		expect(handlers.daily_report).toHaveBeenCalledTimes(1);
		expect(await orchestrator.triggerJobManually("daily_report")).toBe(true);
	});

	it("retries a failed scheduled report once and alerts the admin", async () => {
		handlers.daily_report.mockRejectedValueOnce(new Error("boom"));

		expect(await orchestrator.runJob("daily_report", "scheduled")).toEqual({
			status: "failed",
			error: "boom",
		});

		expect(queue.retries).toEqual([
			{
				jobId: "daily_report",
				retryId: `daily_report_retry_${NOW.getTime()}`,
				delayMs: RETRY_DELAY_MS,
			},
		]);
		expect(notifyJobFailure).toHaveBeenCalledWith("daily_report", "boom", "2024-01-10 18:30:00");
	});

	it("alerts without retrying for sync jobs and retry runs", async () => {
		handlers.daily_sync_prompt.mockRejectedValueOnce(new Error("slack down"));
		handlers.weekly_report.mockRejectedValueOnce(new Error("still failing"));

		await orchestrator.runJob("daily_sync_prompt", "scheduled");
		await orchestrator.runJob("weekly_report", "retry");

		expect(queue.retries).toEqual([]);
		expect(notifyJobFailure.mock.calls).toEqual([
			["daily_sync_prompt", "slack down", null],
			["weekly_report", "still failing", null],
		]);
	});

	it("still alerts when the retry cannot be scheduled", async () => {
		queue.retryError = new Error("queue unavailable");
		handlers.weekly_report.mockRejectedValueOnce(new Error("boom"));

		await orchestrator.runJob("weekly_report", "scheduled");

		expect(notifyJobFailure).toHaveBeenCalledWith("weekly_report", "boom", null);
	});

	it("reports manual failures to the caller only", async () => {
		handlers.daily_report.mockRejectedValueOnce(new Error("boom"));

		expect(await orchestrator.triggerJobManually("daily_report")).toBe(false);
		expect(queue.retries).toEqual([]);
		expect(notifyJobFailure).not.toHaveBeenCalled();
	});

	it("refuses unknown job ids", async () => {
		expect(await orchestrator.triggerJobManually("nonexistent_job")).toBe(false);
		for (const handler of Object.values(handlers)) {
			expect(handler).not.toHaveBeenCalled();
		}
	});

	it("lists schedules, last runs and pending retries", async () => {
		await orchestrator.start();
		queue.nextRuns.set("daily_report", NOW.getTime());
		queue.pending = [
			{
				id: "daily_report_retry_1",
				jobId: "daily_report",
				runAt: NOW.getTime() + RETRY_DELAY_MS,
			},
		];
		await orchestrator.triggerJobManually("daily_report");

		const statuses = await orchestrator.getJobStatus();

		expect(statuses).toHaveLength(6);
		expect(statuses[0]).toEqual({
			id: "daily_sync_prompt",
			name: "Daily sync prompt",
			nextRun: "unscheduled",
			active: false,
			trigger: "weekdays at 09:00 (Asia/Tokyo)",
			lastRun: null,
		});
		expect(statuses[3]).toEqual({
			id: "daily_report",
			name: "Daily report",
			nextRun: "2024-01-10 18:00:00",
			active: true,
			trigger: "weekdays at 18:00 (Asia/Tokyo)",
			lastRun: {
				source: "manual",
				status: "succeeded",
				startedAt: NOW.toISOString(),
				finishedAt: NOW.toISOString(),
				error: null,
			},
		});
		expect(statuses[5]).toEqual({
			id: "daily_report_retry_1",
			name: "Daily report (retry)",
			nextRun: "2024-01-10 18:30:00",
			active: true,
			trigger: "once at 2024-01-10 18:30:00 (Asia/Tokyo)",
			lastRun: null,
		});
	});
});
