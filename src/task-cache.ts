/**
 * Cache-first task queries over the issue tracker.
 *
 * A project is served from the Redis store only while its last full fetch is
 * younger than the TTL. Otherwise the tracker is queried per project, results
 * are written back, and a failing project is logged and skipped so the others
 * still report.
 */

import type { IssueQuery, IssueTrackerClient } from "./backlog";
import { addDays, endOfDay, startOfDay, toDateString } from "./core/dates";
import {
	completionRate,
	DUE_THIS_WEEK_DAYS,
	isCompleted,
	isDueThisWeek,
	isDueToday,
	isOverdue,
} from "./core/issues";
import type { Issue } from "./core/schemas";
import { cacheLogger } from "./logger";
import type { CacheStore, TaskQuery } from "./store";

export interface TaskCacheOptions {
	projectIds: string[];
	ttlMs: number;
	timezone: string;
	now?: () => Date;
}

export class TaskCache {
	private readonly projectIds: string[];
	private readonly ttlMs: number;
	private readonly timezone: string;
	private readonly now: () => Date;

	constructor(
		private readonly store: CacheStore,
		private readonly tracker: IssueTrackerClient,
		options: TaskCacheOptions,
	) {
		this.projectIds = options.projectIds;
		this.ttlMs = options.ttlMs;
		this.timezone = options.timezone;
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Every task in the given projects.
	 */
	async getAllTasks(
		projectIds: string[] = this.projectIds,
		useCache = true,
	): Promise<Issue[]> {
		const freshSince = this.freshSince();
		const tasks: Issue[] = [];

		for (const projectId of projectIds) {
			if (useCache && (await this.isFullyCached(projectId, freshSince))) {
				const cached = await this.readCache(
					() => this.store.getTasksByProject(projectId, freshSince),
					{ projectId },
				);
				if (cached) {
					tasks.push(...cached);
					continue;
				}
			}
			tasks.push(...(await this.fetchProject(projectId)));
		}

		return tasks;
	}

	/**
	 * Tasks past their due date that are not resolved or closed.
	 */
	async getOverdueTasks(
		projectIds: string[] = this.projectIds,
		useCache = true,
	): Promise<Issue[]> {
		const now = this.now();
		const matches = (issue: Issue) => isOverdue(issue, now);

		return this.query(projectIds, useCache, {
			cache: { dueTo: now.getTime() - 1 },
			remote: { dueDateUntil: toDateString(now, this.timezone) },
			matches,
		});
	}

	async getTasksDueToday(
		projectIds: string[] = this.projectIds,
		useCache = true,
	): Promise<Issue[]> {
		const now = this.now();
		const today = toDateString(now, this.timezone);

		return this.query(projectIds, useCache, {
			cache: {
				dueFrom: startOfDay(today, this.timezone).getTime(),
				dueTo: endOfDay(today, this.timezone).getTime(),
			},
			remote: { dueDateSince: today, dueDateUntil: today },
			matches: (issue) => isDueToday(issue, now, this.timezone),
		});
	}

	/**
	 * Tasks due between today and seven days from now, inclusive.
	 */
	async getTasksDueThisWeek(
		projectIds: string[] = this.projectIds,
		useCache = true,
	): Promise<Issue[]> {
		const now = this.now();
		const today = toDateString(now, this.timezone);
		const lastDay = addDays(today, DUE_THIS_WEEK_DAYS);

		return this.query(projectIds, useCache, {
			cache: {
				dueFrom: startOfDay(today, this.timezone).getTime(),
				dueTo: endOfDay(lastDay, this.timezone).getTime(),
			},
			remote: { dueDateSince: today, dueDateUntil: lastDay },
			matches: (issue) => isDueThisWeek(issue, now, this.timezone),
		});
	}

	/**
	 * Open work assigned to a tracker user.
	 */
	async getTasksByAssignee(
		assigneeId: string,
		projectIds: string[] = this.projectIds,
		useCache = true,
	): Promise<Issue[]> {
		return this.query(projectIds, useCache, {
			cache: { assigneeId, excludeStatuses: ["resolved", "closed"] },
			remote: { assigneeIds: [assigneeId] },
			matches: (issue) => issue.assigneeId === assigneeId && !isCompleted(issue),
		});
	}

	async getUnassignedTasks(
		projectIds: string[] = this.projectIds,
		useCache = true,
	): Promise<Issue[]> {
		const tasks = await this.getAllTasks(projectIds, useCache);
		return tasks.filter((issue) => issue.assigneeId === null && !isCompleted(issue));
	}

	/**
	 * A single task, or null when it cannot be found or fetched.
	 */
	async getTaskById(id: string, useCache = true): Promise<Issue | null> {
		if (useCache) {
			const cached = await this.readCache(
				async () => {
					const issue = await this.store.getTask(id, this.freshSince());
					return issue ? [issue] : [];
				},
				{ id },
			);
			const hit = cached?.[0];
			if (hit) return hit;
		}

		try {
			const issue = await this.tracker.getIssue(id);
			if (issue) await this.writeThrough([issue]);
			return issue;
		} catch (error) {
			cacheLogger.error({ err: error, id }, "Failed to fetch task");
			return null;
		}
	}

	/**
	 * Percentage of tasks resolved or closed, 0 when there are none.
	 */
	async getCompletionRate(
		projectIds: string[] = this.projectIds,
		useCache = true,
	): Promise<number> {
		return completionRate(await this.getAllTasks(projectIds, useCache));
	}

	// ===========================================================================
	// Helpers
	// ===========================================================================

	private freshSince(): Date {
		return new Date(this.now().getTime() - this.ttlMs);
	}

	private async query(
		projectIds: string[],
		useCache: boolean,
		plan: {
			cache: Omit<TaskQuery, "freshSince" | "projectIds">;
			remote: IssueQuery;
			matches: (issue: Issue) => boolean;
		},
	): Promise<Issue[]> {
		const freshSince = this.freshSince();
		const tasks: Issue[] = [];

		for (const projectId of projectIds) {
			if (useCache && (await this.isFullyCached(projectId, freshSince))) {
				const cached = await this.readCache(
					() =>
						this.store.queryTasks({
							...plan.cache,
							projectIds: [projectId],
							freshSince,
						}),
					{ projectId },
				);
				if (cached) {
					tasks.push(...cached.filter(plan.matches));
					continue;
				}
			}
			const fetched = await this.fetchProject(projectId, plan.remote);
			tasks.push(...fetched.filter(plan.matches));
		}
		return tasks;
	}

	/**
	 * A range query only returns a subset, so only an unfiltered fetch marks
	 * the project as fully cached.
	 */
	private async fetchProject(projectId: string, query?: IssueQuery): Promise<Issue[]> {
		try {
			const fetchedAt = this.now();
			const issues = await this.tracker.listIssues(projectId, query);
			await this.writeThrough(issues);
			if (!query) await this.markFetched(projectId, fetchedAt);
			return issues;
		} catch (error) {
			cacheLogger.error({ err: error, projectId }, "Failed to fetch project tasks, skipping");
			return [];
		}
	}

	private async isFullyCached(projectId: string, freshSince: Date): Promise<boolean> {
		try {
			return await this.store.isProjectFresh(projectId, freshSince);
		} catch (error) {
			cacheLogger.warn({ err: error, projectId }, "Cache read failed, using tracker");
			return false;
		}
	}

	/** null when the store cannot be read */
	private async readCache(
		read: () => Promise<Issue[]>,
		context: Record<string, unknown>,
	): Promise<Issue[] | null> {
		try {
			return await read();
		} catch (error) {
			cacheLogger.warn({ err: error, ...context }, "Cache read failed, using tracker");
			return null;
		}
	}

	private async markFetched(projectId: string, fetchedAt: Date): Promise<void> {
		try {
			await this.store.markProjectFetched(projectId, fetchedAt);
		} catch (error) {
			cacheLogger.warn({ err: error, projectId }, "Cache write failed");
		}
	}

	private async writeThrough(issues: Issue[]): Promise<void> {
		try {
			await this.store.upsertTasks(issues, this.now());
		} catch (error) {
			cacheLogger.warn({ err: error, count: issues.length }, "Cache write failed");
		}
	}
}
