import { beforeEach, describe, expect, it, vi } from "vitest";
import { cacheLogger } from "../src/logger";
import { CacheStore } from "../src/store";
import { TaskCache } from "../src/task-cache";
import { FakeIssueTracker, makeIssue, resetTestRedis, testRedis } from "./fixtures/fakes";

const TZ = "Asia/Tokyo";
const TTL_MS = 30 * 60 * 1000;
// 12:00 on 2024-01-10 in Tokyo
const START = new Date("2024-01-10T03:00:00.000Z");

const overdue = makeIssue({ id: "PROJ-1", dueDate: "2024-01-08T14:59:59.999Z" });
const dueToday = makeIssue({ id: "PROJ-2", dueDate: "2024-01-10T14:59:59.999Z" });
const dueLater = makeIssue({ id: "PROJ-3", dueDate: "2024-01-15T14:59:59.999Z", assigneeId: null });
const done = makeIssue({ id: "PROJ-4", dueDate: "2024-01-08T14:59:59.999Z", status: "resolved" });

describe("TaskCache", () => {
	let tracker: FakeIssueTracker;
	let store: CacheStore;
	let now: Date;
	let cache: TaskCache;

	beforeEach(async () => {
		await resetTestRedis();
		tracker = new FakeIssueTracker();
		tracker.setIssues("100", [overdue, dueToday, dueLater, done]);
		store = new CacheStore(testRedis);
		now = START;
		cache = new TaskCache(store, tracker, {
			projectIds: ["100"],
			ttlMs: TTL_MS,
			timezone: TZ,
			now: () => now,
		});
	});

	it("hits the tracker once within the TTL and again after it", async () => {
		await cache.getAllTasks();
		now = new Date(START.getTime() + 10 * 60 * 1000);
		await cache.getAllTasks();
		expect(tracker.listIssuesCalls).toHaveLength(1);

		now = new Date(START.getTime() + TTL_MS + 1);
		await cache.getAllTasks();
		expect(tracker.listIssuesCalls).toHaveLength(2);
	});

	it("useCache=false always goes to the tracker", async () => {
		await cache.getAllTasks();
		await cache.getAllTasks(undefined, false);
		expect(tracker.listIssuesCalls).toHaveLength(2);
	});

	it("buckets tasks by urgency", async () => {
		const ids = (issues: { id: string }[]) => issues.map((issue) => issue.id).sort();

		expect(ids(await cache.getOverdueTasks())).toEqual(["PROJ-1"]);
		expect(ids(await cache.getTasksDueToday())).toEqual(["PROJ-2"]);
		expect(ids(await cache.getTasksDueThisWeek())).toEqual(["PROJ-2", "PROJ-3"]);
		expect(ids(await cache.getUnassignedTasks())).toEqual(["PROJ-3"]);
		expect(ids(await cache.getTasksByAssignee("1"))).toEqual(["PROJ-1", "PROJ-2"]);
		expect(await cache.getCompletionRate()).toBe(25);
	});

	it("asks the tracker for a due-date range on a cache miss", async () => {
		await cache.getTasksDueThisWeek();
		expect(tracker.listIssuesCalls).toEqual([
			{ projectId: "100", query: { dueDateSince: "2024-01-10", dueDateUntil: "2024-01-17" } },
		]);
	});

	it("answers from the cache once it is warm", async () => {
		await cache.getAllTasks();
		tracker.listIssuesCalls = [];

		expect((await cache.getOverdueTasks()).map((issue) => issue.id)).toEqual(["PROJ-1"]);
		expect(tracker.listIssuesCalls).toEqual([]);
	});

	it("returns [] and logs once per project when every fetch fails", async () => {
		const errorLog = vi.spyOn(cacheLogger, "error");
		tracker.failingProjects.add("100");
		tracker.failingProjects.add("200");
		const failing = new TaskCache(store, tracker, {
			projectIds: ["100", "200"],
			ttlMs: TTL_MS,
			timezone: TZ,
			now: () => now,
		});

		expect(await failing.getOverdueTasks()).toEqual([]);
		expect(tracker.listIssuesCalls.map((call) => call.projectId)).toEqual(["100", "200"]);
		expect(errorLog).toHaveBeenCalledTimes(2);
		errorLog.mockRestore();
	});

	it("skips a failing project and keeps the others", async () => {
		tracker.setIssues("200", [makeIssue({ id: "OTHER-1", projectId: "200" })]);
		tracker.failingProjects.add("100");

		const tasks = await cache.getAllTasks(["100", "200"]);
		expect(tasks.map((issue) => issue.id)).toEqual(["OTHER-1"]);
	});

	it("falls back to the tracker when the store fails", async () => {
		await cache.getAllTasks();
		tracker.listIssuesCalls = [];
		vi.spyOn(store, "queryTasks").mockRejectedValueOnce(new Error("redis down"));

		expect((await cache.getOverdueTasks()).map((issue) => issue.id)).toEqual(["PROJ-1"]);
		expect(tracker.listIssuesCalls).toEqual([
			{ projectId: "100", query: { dueDateUntil: "2024-01-10" } },
		]);
	});

	it("computes the completion rate over every task after range queries", async () => {
		tracker.setIssues("100", [
			makeIssue({ id: "P-1", dueDate: "2024-01-08T14:59:59.999Z" }),
			makeIssue({ id: "P-2", status: "closed" }),
			makeIssue({ id: "P-3", status: "closed" }),
			makeIssue({ id: "P-4", status: "resolved" }),
		]);

		expect((await cache.getOverdueTasks()).map((issue) => issue.id)).toEqual(["P-1"]);
		expect(await cache.getTasksDueToday()).toEqual([]);
		expect(await cache.getTasksDueThisWeek()).toEqual([]);
		expect(await cache.getCompletionRate()).toBe(75);
		expect((await cache.getAllTasks()).map((issue) => issue.id).sort()).toEqual([
			"P-1",
			"P-2",
			"P-3",
			"P-4",
		]);
	});

	it("trusts an empty range from a fully cached project", async () => {
		await cache.getAllTasks();
		tracker.listIssuesCalls = [];

		expect(await cache.getTasksByAssignee("2")).toEqual([]);
		expect(tracker.listIssuesCalls).toEqual([]);
	});

	it("refetches everything once the full fetch is older than the TTL", async () => {
		await cache.getAllTasks();
		now = new Date(START.getTime() + TTL_MS + 1);
		tracker.listIssuesCalls = [];

		await cache.getTasksDueToday();
		await cache.getCompletionRate();
		expect(tracker.listIssuesCalls).toEqual([
			{ projectId: "100", query: { dueDateSince: "2024-01-10", dueDateUntil: "2024-01-10" } },
			{ projectId: "100", query: {} },
		]);
	});

	it("getTaskById fetches and caches a single task", async () => {
		expect(await cache.getTaskById("PROJ-2")).toEqual(dueToday);
		expect(await store.getTask("PROJ-2", new Date(START.getTime() - 1))).toEqual(dueToday);
		expect(await cache.getTaskById("PROJ-404")).toBeNull();
	});

	it("getTaskById returns null when the tracker fails", async () => {
		vi.spyOn(tracker, "getIssue").mockRejectedValueOnce(new Error("timeout"));
		expect(await cache.getTaskById("PROJ-9")).toBeNull();
	});
});
