import { UnrecoverableError } from "bullmq";
import { describe, expect, it, vi } from "vitest";
import type { JobId, JobRunResult, JobSource } from "../src/scheduler";
import { processJob } from "../src/worker";

describe("processJob", () => {
	const runJob = vi.fn(async (_jobId: JobId, _source: JobSource): Promise<JobRunResult> => ({
		status: "succeeded",
	}));

	it("runs cron-fired jobs as scheduled and retry jobs as retries", async () => {
		await processJob({ runJob }, { data: { jobId: "daily_report" } });
		await processJob({ runJob }, { data: { jobId: "daily_report", retry: true } });

		expect(runJob.mock.calls).toEqual([
			["daily_report", "scheduled"],
			["daily_report", "retry"],
		]);
	});

	it("fails unknown jobs without retrying", async () => {
		runJob.mockClear();

		await expect(processJob({ runJob }, { data: { jobId: "nonexistent_job" } })).rejects.toThrow(
			UnrecoverableError,
		);
		expect(runJob).not.toHaveBeenCalled();
	});
});
