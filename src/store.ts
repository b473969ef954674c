/**
 * Redis-backed persistence for cached tasks, reports, sync updates, progress
 * signals and user mappings.
 *
 * Every value is a versioned JSON document decoded with zod on read. Records
 * that fail to decode are logged and skipped; Redis failures surface as
 * PersistenceError.
 */

import type Redis from "ioredis";
import type { z } from "zod";
import { dateRange } from "./core/dates";
import {
	type DailyReport,
	DailyReportDocumentSchema,
	DOCUMENT_VERSION,
	type Issue,
	type IssueStatus,
	ProgressSignalDocumentSchema,
	type StoredProgressSignal,
	type SyncUpdate,
	SyncUpdateDocumentSchema,
	TaskDocumentSchema,
	type UserMapping,
	UserMappingDocumentSchema,
	type WeeklyReport,
	WeeklyReportDocumentSchema,
} from "./core/schemas";
import { PersistenceError, toError } from "./errors";
import { storeLogger } from "./logger";

const DEFAULT_KEY_PREFIX = "pulseboard";

export interface TaskQuery {
	/** Only tasks cached after this instant are returned */
	freshSince: Date;
	/** Inclusive due-date bounds in epoch milliseconds */
	dueFrom?: number;
	dueTo?: number;
	projectIds?: string[];
	assigneeId?: string;
	excludeStatuses?: IssueStatus[];
}

export interface CacheStoreOptions {
	keyPrefix?: string;
}

export class CacheStore {
	private readonly prefix: string;

	constructor(
		private readonly redis: Redis,
		options: CacheStoreOptions = {},
	) {
		this.prefix = options.keyPrefix ?? DEFAULT_KEY_PREFIX;
	}

	// ===========================================================================
	// Keys
	// ===========================================================================

	private taskKey(id: string): string {
		return `${this.prefix}:task:${id}`;
	}

	private allTasksKey(): string {
		return `${this.prefix}:tasks`;
	}

	private projectTasksKey(projectId: string): string {
		return `${this.prefix}:project:${projectId}:tasks`;
	}

	private projectFetchedKey(projectId: string): string {
		return `${this.prefix}:project:${projectId}:fetched-at`;
	}

	private tasksByDueKey(): string {
		return `${this.prefix}:tasks:by-due`;
	}

	private dailyReportKey(date: string): string {
		return `${this.prefix}:report:daily:${date}`;
	}

	private weeklyReportKey(weekStart: string, weekEnd: string): string {
		return `${this.prefix}:report:weekly:${weekStart}:${weekEnd}`;
	}

	private syncUpdatesKey(): string {
		return `${this.prefix}:sync-updates`;
	}

	private syncUpdatesByTimeKey(): string {
		return `${this.prefix}:sync-updates:by-time`;
	}

	private progressKey(): string {
		return `${this.prefix}:progress`;
	}

	private userMappingsKey(): string {
		return `${this.prefix}:user-mappings`;
	}

	// ===========================================================================
	// Tasks
	// ===========================================================================

	/**
	 * Insert or replace tasks, stamping them with cachedAt.
	 */
	async upsertTasks(issues: Issue[], cachedAt: Date): Promise<void> {
		if (issues.length === 0) return;

		await this.run("upsertTasks", async () => {
			const pipeline = this.redis.multi();
			for (const issue of issues) {
				const document = {
					v: DOCUMENT_VERSION,
					issue,
					cachedAt: cachedAt.toISOString(),
				};
				pipeline.set(this.taskKey(issue.id), JSON.stringify(document));
				pipeline.sadd(this.allTasksKey(), issue.id);
				pipeline.sadd(this.projectTasksKey(issue.projectId), issue.id);
				if (issue.dueDate) {
					pipeline.zadd(
						this.tasksByDueKey(),
						new Date(issue.dueDate).getTime(),
						issue.id,
					);
				} else {
					pipeline.zrem(this.tasksByDueKey(), issue.id);
				}
			}
			await pipeline.exec();
		});
	}

	async getTask(id: string, freshSince: Date): Promise<Issue | null> {
		const raw = await this.run("getTask", () => this.redis.get(this.taskKey(id)));
		if (raw === null) return null;
		const document = this.decode(TaskDocumentSchema, raw, { id });
		if (!document || !isFresh(document.cachedAt, freshSince)) return null;
		return document.issue;
	}

	async getTasksByProject(projectId: string, freshSince: Date): Promise<Issue[]> {
		const ids = await this.run("getTasksByProject", () =>
			this.redis.smembers(this.projectTasksKey(projectId)),
		);
		const issues = await this.loadTasks(ids, freshSince);
		return issues.filter((issue) => issue.projectId === projectId);
	}

	/**
	 * Record that every task of a project was fetched at `fetchedAt`.
	 * Range fetches must not call this: they only cache a subset.
	 */
	async markProjectFetched(projectId: string, fetchedAt: Date): Promise<void> {
		await this.run("markProjectFetched", () =>
			this.redis.set(this.projectFetchedKey(projectId), fetchedAt.toISOString()),
		);
	}

	/**
	 * Whether the cached tasks of a project came from a full fetch made after
	 * freshSince.
	 */
	async isProjectFresh(projectId: string, freshSince: Date): Promise<boolean> {
		const fetchedAt = await this.run("isProjectFresh", () =>
			this.redis.get(this.projectFetchedKey(projectId)),
		);
		return fetchedAt !== null && isFresh(fetchedAt, freshSince);
	}

	/**
	 * Fresh tasks matching every given filter.
	 */
	async queryTasks(query: TaskQuery): Promise<Issue[]> {
		const ids = await this.run("queryTasks", () => {
			if (query.dueFrom !== undefined || query.dueTo !== undefined) {
				return this.redis.zrangebyscore(
					this.tasksByDueKey(),
					query.dueFrom ?? "-inf",
					query.dueTo ?? "+inf",
				);
			}
			return this.redis.smembers(this.allTasksKey());
		});

		const issues = await this.loadTasks(ids, query.freshSince);
		const projects = query.projectIds ? new Set(query.projectIds) : null;
		const excluded = new Set(query.excludeStatuses ?? []);

		return issues.filter(
			(issue) =>
				(!projects || projects.has(issue.projectId)) &&
				(query.assigneeId === undefined || issue.assigneeId === query.assigneeId) &&
				!excluded.has(issue.status),
		);
	}

	private async loadTasks(ids: string[], freshSince: Date): Promise<Issue[]> {
		if (ids.length === 0) return [];
		const raws = await this.run("loadTasks", () =>
			this.redis.mget(ids.map((id) => this.taskKey(id))),
		);

		const issues: Issue[] = [];
		for (const raw of raws) {
			if (raw === null) continue;
			const document = this.decode(TaskDocumentSchema, raw);
			if (document && isFresh(document.cachedAt, freshSince)) {
				issues.push(document.issue);
			}
		}
		return issues;
	}

	// ===========================================================================
	// Reports
	// ===========================================================================

	/**
	 * Upsert the daily report for report.date.
	 */
	async saveDailyReport(report: DailyReport, createdAt = new Date()): Promise<void> {
		const document = {
			v: DOCUMENT_VERSION,
			report,
			createdAt: createdAt.toISOString(),
		};
		await this.run("saveDailyReport", () =>
			this.redis.set(this.dailyReportKey(report.date), JSON.stringify(document)),
		);
	}

	async getDailyReport(date: string): Promise<DailyReport | null> {
		const raw = await this.run("getDailyReport", () =>
			this.redis.get(this.dailyReportKey(date)),
		);
		if (raw === null) return null;
		return this.decode(DailyReportDocumentSchema, raw, { date })?.report ?? null;
	}

	/**
	 * Stored daily reports for each date in [start, end], ascending. Missing
	 * dates are simply absent.
	 */
	async getDailyReportsInRange(start: string, end: string): Promise<DailyReport[]> {
		const dates = dateRange(start, end);
		if (dates.length === 0) return [];

		const raws = await this.run("getDailyReportsInRange", () =>
			this.redis.mget(dates.map((date) => this.dailyReportKey(date))),
		);

		const reports: DailyReport[] = [];
		for (const raw of raws) {
			if (raw === null) continue;
			const document = this.decode(DailyReportDocumentSchema, raw);
			if (document) reports.push(document.report);
		}
		return reports;
	}

	async saveWeeklyReport(report: WeeklyReport, createdAt = new Date()): Promise<void> {
		const document = {
			v: DOCUMENT_VERSION,
			report,
			createdAt: createdAt.toISOString(),
		};
		await this.run("saveWeeklyReport", () =>
			this.redis.set(
				this.weeklyReportKey(report.weekStart, report.weekEnd),
				JSON.stringify(document),
			),
		);
	}

	async getWeeklyReport(weekStart: string, weekEnd: string): Promise<WeeklyReport | null> {
		const raw = await this.run("getWeeklyReport", () =>
			this.redis.get(this.weeklyReportKey(weekStart, weekEnd)),
		);
		if (raw === null) return null;
		return this.decode(WeeklyReportDocumentSchema, raw, { weekStart })?.report ?? null;
	}

	// ===========================================================================
	// Sync Updates
	// ===========================================================================

	/**
	 * Insert or replace a sync update by id.
	 */
	async saveSyncUpdate(update: SyncUpdate): Promise<void> {
		const document = { v: DOCUMENT_VERSION, update };
		await this.run("saveSyncUpdate", async () => {
			await this.redis
				.multi()
				.hset(this.syncUpdatesKey(), update.id, JSON.stringify(document))
				.zadd(
					this.syncUpdatesByTimeKey(),
					new Date(update.submittedAt).getTime(),
					update.id,
				)
				.exec();
		});
	}

	/**
	 * Sync updates submitted within [from, to], oldest first.
	 */
	async getSyncUpdates(from: Date, to: Date): Promise<SyncUpdate[]> {
		const ids = await this.run("getSyncUpdates", () =>
			this.redis.zrangebyscore(
				this.syncUpdatesByTimeKey(),
				from.getTime(),
				to.getTime(),
			),
		);
		if (ids.length === 0) return [];

		const raws = await this.run("getSyncUpdates", () =>
			this.redis.hmget(this.syncUpdatesKey(), ...ids),
		);

		const updates: SyncUpdate[] = [];
		for (const raw of raws) {
			if (raw === null) continue;
			const document = this.decode(SyncUpdateDocumentSchema, raw);
			if (document) updates.push(document.update);
		}
		return updates;
	}

	// ===========================================================================
	// Progress Signals
	// ===========================================================================

	/**
	 * Append-only; scored by extraction time.
	 */
	async appendProgressSignal(signal: StoredProgressSignal): Promise<void> {
		const document = { v: DOCUMENT_VERSION, signal };
		await this.run("appendProgressSignal", () =>
			this.redis.zadd(
				this.progressKey(),
				new Date(signal.extractedAt).getTime(),
				JSON.stringify(document),
			),
		);
	}

	async getProgressSignals(from: Date, to: Date): Promise<StoredProgressSignal[]> {
		const raws = await this.run("getProgressSignals", () =>
			this.redis.zrangebyscore(this.progressKey(), from.getTime(), to.getTime()),
		);
		const signals: StoredProgressSignal[] = [];
		for (const raw of raws) {
			const document = this.decode(ProgressSignalDocumentSchema, raw);
			if (document) signals.push(document.signal);
		}
		return signals;
	}

	// ===========================================================================
	// User Mappings
	// ===========================================================================

	async saveUserMapping(mapping: UserMapping, updatedAt = new Date()): Promise<void> {
		const document = {
			v: DOCUMENT_VERSION,
			mapping,
			updatedAt: updatedAt.toISOString(),
		};
		await this.run("saveUserMapping", () =>
			this.redis.hset(
				this.userMappingsKey(),
				mapping.backlogUserId,
				JSON.stringify(document),
			),
		);
	}

	/**
	 * All mappings keyed by tracker user id.
	 */
	async getUserMappings(): Promise<Map<string, UserMapping>> {
		const raw = await this.run("getUserMappings", () =>
			this.redis.hgetall(this.userMappingsKey()),
		);
		const mappings = new Map<string, UserMapping>();
		for (const [backlogUserId, value] of Object.entries(raw)) {
			const document = this.decode(UserMappingDocumentSchema, value, {
				backlogUserId,
			});
			if (document) mappings.set(backlogUserId, document.mapping);
		}
		return mappings;
	}

	// ===========================================================================
	// Health
	// ===========================================================================

	async ping(): Promise<void> {
		await this.run("ping", () => this.redis.ping());
	}

	// ===========================================================================
	// Helpers
	// ===========================================================================

	private async run<T>(operation: string, fn: () => Promise<T>): Promise<T> {
		try {
			return await fn();
		} catch (error) {
			storeLogger.error({ err: error, operation }, "Redis operation failed");
			throw new PersistenceError(
				`Redis operation ${operation} failed: ${toError(error).message}`,
				toError(error),
			);
		}
	}

	private decode<S extends z.ZodTypeAny>(
		schema: S,
		raw: string,
		context: Record<string, string> = {},
	): z.output<S> | null {
		let value: unknown;
		try {
			value = JSON.parse(raw);
		} catch (error) {
			storeLogger.warn({ err: error, ...context }, "Skipping unreadable record");
			return null;
		}

		const result = schema.safeParse(value);
		if (!result.success) {
			storeLogger.warn(
				{ issues: result.error.issues, ...context },
				"Skipping record that does not match its schema",
			);
			return null;
		}
		return result.data;
	}
}

function isFresh(cachedAt: string, freshSince: Date): boolean {
	return new Date(cachedAt).getTime() > freshSince.getTime();
}
