import { afterEach, beforeEach, describe, expect, it, vi } from "vitest";
import { PersistenceError } from "../src/errors";
import { CacheStore } from "../src/store";
import {
	makeDailyReport,
	makeIssue,
	makeSyncUpdate,
	resetTestRedis,
	testRedis,
} from "./fixtures/fakes";

const CACHED_AT = new Date("2024-01-10T00:00:00.000Z");
const BEFORE = new Date("2024-01-09T23:00:00.000Z");
const AFTER = new Date("2024-01-10T01:00:00.000Z");

describe("CacheStore", () => {
	let store: CacheStore;

	beforeEach(async () => {
		await resetTestRedis();
		store = new CacheStore(testRedis);
	});

	afterEach(() => {
		vi.restoreAllMocks();
	});

	describe("tasks", () => {
		it("returns tasks only while fresh", async () => {
			const issue = makeIssue({ id: "PROJ-1" });
			await store.upsertTasks([issue], CACHED_AT);

			expect(await store.getTask("PROJ-1", BEFORE)).toEqual(issue);
			expect(await store.getTask("PROJ-1", AFTER)).toBeNull();
			expect(await store.getTask("PROJ-404", BEFORE)).toBeNull();
		});

		it("upserts by id, last write wins", async () => {
			await store.upsertTasks([makeIssue({ id: "PROJ-1", summary: "old" })], CACHED_AT);
			await store.upsertTasks([makeIssue({ id: "PROJ-1", summary: "new" })], CACHED_AT);

			const tasks = await store.getTasksByProject("100", BEFORE);
			expect(tasks.map((task) => task.summary)).toEqual(["new"]);
		});

		it("queries by due range, project, assignee and status", async () => {
			await store.upsertTasks(
				[
					makeIssue({ id: "A-1", dueDate: "2024-01-05T00:00:00.000Z" }),
					makeIssue({ id: "A-2", dueDate: "2024-01-12T00:00:00.000Z", assigneeId: "2" }),
					makeIssue({ id: "A-3", dueDate: "2024-01-12T00:00:00.000Z", status: "closed" }),
					makeIssue({ id: "B-1", projectId: "200", dueDate: "2024-01-12T00:00:00.000Z" }),
					makeIssue({ id: "A-4", dueDate: null }),
				],
				CACHED_AT,
			);

			const dueRange = {
				freshSince: BEFORE,
				dueFrom: new Date("2024-01-10T00:00:00.000Z").getTime(),
				dueTo: new Date("2024-01-15T00:00:00.000Z").getTime(),
			};
			const ids = async (query: Parameters<CacheStore["queryTasks"]>[0]) =>
				(await store.queryTasks(query)).map((task) => task.id).sort();

			expect(await ids(dueRange)).toEqual(["A-2", "A-3", "B-1"]);
			expect(await ids({ ...dueRange, projectIds: ["100"] })).toEqual(["A-2", "A-3"]);
			expect(await ids({ ...dueRange, excludeStatuses: ["resolved", "closed"] })).toEqual([
				"A-2",
				"B-1",
			]);
			expect(await ids({ ...dueRange, assigneeId: "2" })).toEqual(["A-2"]);
			expect(await ids({ freshSince: BEFORE })).toEqual(["A-1", "A-2", "A-3", "A-4", "B-1"]);
		});

		it("drops a task from the due index when its due date is cleared", async () => {
			await store.upsertTasks([makeIssue({ id: "A-1", dueDate: "2024-01-05T00:00:00.000Z" })], CACHED_AT);
			await store.upsertTasks([makeIssue({ id: "A-1", dueDate: null })], CACHED_AT);

			const tasks = await store.queryTasks({ freshSince: BEFORE, dueTo: Date.now() });
			expect(tasks).toEqual([]);
		});

		it("tracks when each project was last fetched in full", async () => {
			expect(await store.isProjectFresh("100", BEFORE)).toBe(false);

			await store.markProjectFetched("100", CACHED_AT);

			expect(await store.isProjectFresh("100", BEFORE)).toBe(true);
			expect(await store.isProjectFresh("100", AFTER)).toBe(false);
			expect(await store.isProjectFresh("200", BEFORE)).toBe(false);
		});

		it("skips records that fail to decode", async () => {
			await store.upsertTasks([makeIssue({ id: "A-1" }), makeIssue({ id: "A-2" })], CACHED_AT);
			await testRedis.set("pulseboard:task:A-1", "{not json");
			await testRedis.set("pulseboard:task:A-2", JSON.stringify({ v: 2, issue: {} }));

			expect(await store.getTasksByProject("100", BEFORE)).toEqual([]);
		});
	});

	describe("reports", () => {
		it("upserts daily reports by date and reads ranges in order", async () => {
			await store.saveDailyReport(makeDailyReport({ date: "2024-01-02", completionRate: 10 }));
			await store.saveDailyReport(makeDailyReport({ date: "2024-01-01", completionRate: 20 }));
			await store.saveDailyReport(makeDailyReport({ date: "2024-01-02", completionRate: 30 }));

			expect((await store.getDailyReport("2024-01-02"))?.completionRate).toBe(30);
			expect(await store.getDailyReport("2024-01-03")).toBeNull();

			const range = await store.getDailyReportsInRange("2024-01-01", "2024-01-07");
			expect(range.map((report) => [report.date, report.completionRate])).toEqual([
				["2024-01-01", 20],
				["2024-01-02", 30],
			]);
		});

		it("stores weekly reports by week start and end", async () => {
			const report = {
				weekStart: "2024-01-01",
				weekEnd: "2024-01-07",
				dailyReports: [makeDailyReport()],
				trends: {
					completionRate: 80,
					overdueTrend: 0,
					averageCompletionTime: 0,
					recurringBlockers: [],
				},
				keyAchievements: [],
				blockers: [],
				recommendations: ["on track"],
			};
			await store.saveWeeklyReport(report);

			expect(await store.getWeeklyReport("2024-01-01", "2024-01-07")).toEqual(report);
			expect(await store.getWeeklyReport("2024-01-08", "2024-01-14")).toBeNull();
		});
	});

	describe("sync updates and progress", () => {
		it("saving the same update id twice keeps one record", async () => {
			await store.saveSyncUpdate(makeSyncUpdate({ plannedToday: ["A"] }));
			await store.saveSyncUpdate(makeSyncUpdate({ plannedToday: ["B"] }));

			const updates = await store.getSyncUpdates(
				new Date("2024-01-10T00:00:00.000Z"),
				new Date("2024-01-10T23:59:59.999Z"),
			);
			expect(updates.map((update) => update.plannedToday)).toEqual([["B"]]);
		});

		it("filters sync updates by submission time", async () => {
			await store.saveSyncUpdate(makeSyncUpdate({ id: "a", submittedAt: "2024-01-09T10:00:00.000Z" }));
			await store.saveSyncUpdate(makeSyncUpdate({ id: "b", submittedAt: "2024-01-10T10:00:00.000Z" }));

			const updates = await store.getSyncUpdates(
				new Date("2024-01-10T00:00:00.000Z"),
				new Date("2024-01-10T23:59:59.999Z"),
			);
			expect(updates.map((update) => update.id)).toEqual(["b"]);
		});

		it("appends progress signals and reads them by extraction time", async () => {
			const signal = {
				userId: "U1",
				taskReference: "PROJ-1",
				content: "done with PROJ-1",
				sentiment: "positive" as const,
				extractedAt: "2024-01-09T02:00:00.000Z",
				userName: null,
				channelId: "C1",
				messageTs: "1704765600.000100",
			};
			await store.appendProgressSignal(signal);
			await store.appendProgressSignal({ ...signal, extractedAt: "2024-01-11T02:00:00.000Z" });

			expect(
				await store.getProgressSignals(
					new Date("2024-01-09T00:00:00.000Z"),
					new Date("2024-01-09T23:59:59.999Z"),
				),
			).toEqual([signal]);
		});
	});

	describe("user mappings", () => {
		it("keys mappings by tracker user id", async () => {
			await store.saveUserMapping({ backlogUserId: "1", slackUserId: "U1", displayName: "Alice" });
			await store.saveUserMapping({ backlogUserId: "1", slackUserId: "U9", displayName: "Alice" });

			const mappings = await store.getUserMappings();
			expect([...mappings.entries()]).toEqual([
				["1", { backlogUserId: "1", slackUserId: "U9", displayName: "Alice" }],
			]);
		});
	});

	it("wraps Redis failures in PersistenceError", async () => {
		vi.spyOn(testRedis, "get").mockRejectedValueOnce(new Error("connection lost"));

		await expect(store.getDailyReport("2024-01-10")).rejects.toBeInstanceOf(PersistenceError);
	});
});
