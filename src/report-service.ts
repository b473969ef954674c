/**
 * Daily and weekly report generation.
 *
 * Gathering inputs degrades gracefully: a failing source contributes an empty
 * result. Persisting the report does not: a report that cannot be saved fails
 * the call with ReportServiceError.
 */

import { addDays, dateRange, endOfDay, startOfDay, toDateString } from "./core/dates";
import type {
	DailyReport,
	Issue,
	ProgressSignal,
	SyncUpdate,
	WeeklyReport,
} from "./core/schemas";
import {
	analyzeTrends,
	computeAverageCompletionTime,
	extractBlockers,
	extractKeyAchievements,
	generateRecommendations,
} from "./core/trends";
import { ReportServiceError, toError } from "./errors";
import { reportLogger } from "./logger";
import type { ProgressExtractor } from "./progress-extractor";
import type { CacheStore } from "./store";
import type { TaskCache } from "./task-cache";

export const WEEK_LENGTH_DAYS = 7;

export interface ReportServiceOptions {
	timezone: string;
	now?: () => Date;
}

export class ReportService {
	private readonly timezone: string;
	private readonly now: () => Date;

	constructor(
		private readonly tasks: TaskCache,
		private readonly progress: ProgressExtractor,
		private readonly store: CacheStore,
		options: ReportServiceOptions,
	) {
		this.timezone = options.timezone;
		this.now = options.now ?? (() => new Date());
	}

	today(): string {
		return toDateString(this.now(), this.timezone);
	}

	/**
	 * Build and store the daily report for `date` (default: today).
	 */
	async generateDailyReport(date: string = this.today()): Promise<DailyReport> {
		const log = reportLogger.child({ operation: "daily", date });
		log.info("Generating daily report");

		try {
			const overdueTasks = await this.gather<Issue[]>("overdue tasks", [], () =>
				this.tasks.getOverdueTasks(),
			);
			const dueToday = await this.gather<Issue[]>("tasks due today", [], () =>
				this.tasks.getTasksDueToday(),
			);
			const dueThisWeek = await this.gather<Issue[]>("tasks due this week", [], () =>
				this.tasks.getTasksDueThisWeek(),
			);
			const completionRate = await this.gather("completion rate", 0, () =>
				this.tasks.getCompletionRate(),
			);
			// Chat activity from the previous day feeds today's report
			const progressSignals = await this.gather<ProgressSignal[]>(
				"progress signals",
				[],
				() => this.progress.extractProgress(addDays(date, -1)),
			);
			const syncUpdates = await this.gather<SyncUpdate[]>("sync updates", [], () =>
				this.progress.getSyncUpdates(date),
			);

			const report: DailyReport = {
				date,
				overdueTasks,
				dueToday,
				dueThisWeek,
				progressSignals,
				syncUpdates,
				completionRate,
			};

			await this.store.saveDailyReport(report, this.now());

			log.info(
				{
					overdue: overdueTasks.length,
					dueToday: dueToday.length,
					dueThisWeek: dueThisWeek.length,
					signals: progressSignals.length,
					syncUpdates: syncUpdates.length,
				},
				"Daily report generated",
			);
			return report;
		} catch (error) {
			log.error({ err: error }, "Daily report generation failed");
			throw new ReportServiceError(
				`Failed to generate daily report for ${date}`,
				toError(error),
			);
		}
	}

	/**
	 * Build and store the weekly report for the seven days ending at `endDate`
	 * (default: today). Missing daily reports are generated first.
	 */
	async generateWeeklyReport(endDate: string = this.today()): Promise<WeeklyReport> {
		const weekStart = addDays(endDate, -(WEEK_LENGTH_DAYS - 1));
		const log = reportLogger.child({ operation: "weekly", weekStart, weekEnd: endDate });
		log.info("Generating weekly report");

		try {
			let dailyReports = await this.loadDailyReports(weekStart, endDate);

			if (dailyReports.length < WEEK_LENGTH_DAYS) {
				const present = new Set(dailyReports.map((report) => report.date));
				const missing = dateRange(weekStart, endDate).filter((date) => !present.has(date));
				log.info({ missing }, "Generating missing daily reports");

				for (const date of missing) {
					try {
						await this.generateDailyReport(date);
					} catch (error) {
						log.error({ err: error, date }, "Could not fill in daily report");
					}
				}
				dailyReports = await this.loadDailyReports(weekStart, endDate);
			}

			const averageCompletionTime = await this.gather(
				"average completion time",
				0,
				async () =>
					computeAverageCompletionTime(await this.tasks.getAllTasks(), {
						start: startOfDay(weekStart, this.timezone),
						end: endOfDay(endDate, this.timezone),
					}),
			);

			const trends = analyzeTrends(dailyReports, averageCompletionTime);
			const report: WeeklyReport = {
				weekStart,
				weekEnd: endDate,
				dailyReports,
				trends,
				keyAchievements: extractKeyAchievements(dailyReports),
				blockers: extractBlockers(dailyReports),
				recommendations: generateRecommendations(dailyReports, trends),
			};

			await this.store.saveWeeklyReport(report, this.now());

			log.info(
				{
					days: dailyReports.length,
					completionRate: trends.completionRate,
					overdueTrend: trends.overdueTrend,
				},
				"Weekly report generated",
			);
			return report;
		} catch (error) {
			log.error({ err: error }, "Weekly report generation failed");
			throw new ReportServiceError(
				`Failed to generate weekly report for ${weekStart}..${endDate}`,
				toError(error),
			);
		}
	}

	private async loadDailyReports(start: string, end: string): Promise<DailyReport[]> {
		return this.gather<DailyReport[]>("stored daily reports", [], () =>
			this.store.getDailyReportsInRange(start, end),
		);
	}

	private async gather<T>(
		label: string,
		fallback: T,
		fn: () => Promise<T>,
	): Promise<T> {
		try {
			return await fn();
		} catch (error) {
			reportLogger.warn({ err: error, source: label }, "Report input unavailable, using empty result");
			return fallback;
		}
	}
}
