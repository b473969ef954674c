import { describe, expect, test } from "vitest";
import {
	analyzeTrends,
	computeAverageCompletionTime,
	computeOverdueTrend,
	extractBlockers,
	extractKeyAchievements,
	findRecurringBlockers,
	generateRecommendations,
	overdueBacklogRecommendation,
	RECOMMENDATIONS,
	truncate,
} from "../../src/core/trends";
import {
	makeDailyReport,
	makeIssue,
	makeSignal,
	makeSyncUpdate,
	overdueIssues,
} from "../fixtures/fakes";

const week = (overdueCounts: number[]) =>
	overdueCounts.map((count, index) =>
		makeDailyReport({
			date: `2024-01-0${index + 1}`,
			overdueTasks: overdueIssues(count),
		}),
	);

describe("computeOverdueTrend", () => {
	test("a single report has no trend", () => {
		expect(computeOverdueTrend(week([5]))).toBe(0);
	});

	test("percent change from first to last day", () => {
		expect(computeOverdueTrend(week([2, 2, 2, 2, 2, 2, 4]))).toBe(100);
		expect(computeOverdueTrend(week([4, 3, 2, 1]))).toBe(-75);
	});

	test("starting from zero", () => {
		expect(computeOverdueTrend(week([0, 1, 3]))).toBe(100);
		expect(computeOverdueTrend(week([0, 2, 0]))).toBe(0);
	});
});

describe("findRecurringBlockers", () => {
	test("keeps blockers seen at least twice, never none values", () => {
		const reports = [
			makeDailyReport({
				syncUpdates: [
					makeSyncUpdate({ blockers: ["waiting on design", "none"] }),
					makeSyncUpdate({ userId: "U2", blockers: ["flaky CI", "None"] }),
				],
			}),
			makeDailyReport({
				date: "2024-01-11",
				syncUpdates: [makeSyncUpdate({ blockers: ["waiting on design", "", "NONE"] })],
			}),
		];
		expect(findRecurringBlockers(reports)).toEqual(["waiting on design"]);
	});
});

describe("computeAverageCompletionTime", () => {
	const window = {
		start: new Date("2024-01-01T00:00:00.000Z"),
		end: new Date("2024-01-07T23:59:59.999Z"),
	};

	test("mean days from creation to completion, one decimal", () => {
		const issues = [
			makeIssue({
				status: "resolved",
				createdAt: "2024-01-01T00:00:00.000Z",
				updatedAt: "2024-01-03T00:00:00.000Z",
			}),
			makeIssue({
				status: "closed",
				createdAt: "2024-01-01T00:00:00.000Z",
				updatedAt: "2024-01-04T12:00:00.000Z",
			}),
			// Still open
			makeIssue({ createdAt: "2023-12-01T00:00:00.000Z", updatedAt: "2024-01-05T00:00:00.000Z" }),
			// Completed before the window
			makeIssue({
				status: "closed",
				createdAt: "2023-12-01T00:00:00.000Z",
				updatedAt: "2023-12-20T00:00:00.000Z",
			}),
		];
		// (2 + 3.5) / 2 = 2.75
		expect(computeAverageCompletionTime(issues, window)).toBe(2.8);
	});

	test("0 when nothing was completed in the window", () => {
		expect(computeAverageCompletionTime([makeIssue()], window)).toBe(0);
	});
});

describe("analyzeTrends", () => {
	test("completion rate is the mean of daily rates", () => {
		const reports = [
			makeDailyReport({ completionRate: 40 }),
			makeDailyReport({ completionRate: 60 }),
		];
		expect(analyzeTrends(reports, 1.5)).toEqual({
			completionRate: 50,
			overdueTrend: 0,
			averageCompletionTime: 1.5,
			recurringBlockers: [],
		});
	});
});

describe("achievements and blockers", () => {
	test("distinct completed items first, then up to three positive signals", () => {
		const reports = [
			makeDailyReport({
				syncUpdates: [makeSyncUpdate({ completedYesterday: ["A", "B", "none"] })],
				progressSignals: [
					makeSignal({ content: "shipped PROJ-1" }),
					makeSignal({ content: "blocked on review", sentiment: "negative" }),
				],
			}),
			makeDailyReport({
				syncUpdates: [makeSyncUpdate({ completedYesterday: ["B", "C"] })],
				progressSignals: [
					makeSignal({ content: "done with PROJ-2" }),
					makeSignal({ content: "fixed PROJ-3" }),
					makeSignal({ content: "merged PROJ-4" }),
				],
			}),
		];

		expect(extractKeyAchievements(reports)).toEqual([
			"A",
			"B",
			"C",
			"shipped PROJ-1",
			"done with PROJ-2",
			"fixed PROJ-3",
		]);
		expect(extractBlockers(reports)).toEqual(["blocked on review"]);
	});

	test("caps completed items at five", () => {
		const report = makeDailyReport({
			syncUpdates: [makeSyncUpdate({ completedYesterday: ["1", "2", "3", "4", "5", "6"] })],
		});
		expect(extractKeyAchievements([report])).toEqual(["1", "2", "3", "4", "5"]);
	});

	test("signal content is truncated to 100 characters", () => {
		const long = "x".repeat(150);
		const report = makeDailyReport({
			progressSignals: [makeSignal({ content: long, sentiment: "negative" })],
		});
		expect(extractBlockers([report])).toEqual([`${"x".repeat(97)}...`]);
		expect(truncate("short")).toBe("short");
	});
});

describe("generateRecommendations", () => {
	test("on track when nothing needs attention", () => {
		const reports = [makeDailyReport()];
		expect(generateRecommendations(reports, analyzeTrends(reports, 0))).toEqual([
			RECOMMENDATIONS.onTrack,
		]);
	});

	test("ignores an average below one overdue task a day", () => {
		const reports = week([1, 0, 0, 0, 0, 0, 0]).map((report) => ({
			...report,
			completionRate: 90,
		}));
		expect(generateRecommendations(reports, analyzeTrends(reports, 0))).toEqual([
			RECOMMENDATIONS.onTrack,
		]);
	});

	test("checks are independent and ordered", () => {
		const reports = week([2, 2, 2, 2, 2, 2, 4]).map((report) => ({
			...report,
			completionRate: 30,
		}));
		reports[0] = {
			...makeDailyReport({ date: "2024-01-01", completionRate: 30, overdueTasks: overdueIssues(2) }),
			dueToday: [makeIssue({ id: "PROJ-9", assigneeId: null })],
			syncUpdates: [makeSyncUpdate({ blockers: ["flaky CI"] }), makeSyncUpdate({ blockers: ["flaky CI"] })],
		};

		// Mean overdue is 16 / 7, shown floored
		expect(generateRecommendations(reports, analyzeTrends(reports, 0))).toEqual([
			overdueBacklogRecommendation(2),
			RECOMMENDATIONS.lowCompletion,
			RECOMMENDATIONS.worseningTrend,
			RECOMMENDATIONS.recurringBlockers,
			RECOMMENDATIONS.unassigned,
		]);
	});
});
