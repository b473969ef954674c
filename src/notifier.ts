/**
 * Delivers reports, sync prompts and alerts to Slack.
 */

import {
	formatDailyReport,
	formatJobFailureAlert,
	formatReminder,
	formatSyncPrompt,
	formatSyncSummary,
	formatWeeklyReport,
	type SyncSummaryEntry,
} from "./core/formatting";
import type { DailyReport, WeeklyReport } from "./core/schemas";
import { reportLogger } from "./logger";
import type { ChatClient } from "./slack";
import type { CacheStore } from "./store";

export interface NotifierOptions {
	channelId: string;
	adminUserId: string;
	timezone: string;
	issueUrl: (issueKey: string) => string;
}

export class Notifier {
	constructor(
		private readonly chat: ChatClient,
		private readonly store: CacheStore,
		private readonly options: NotifierOptions,
	) {}

	async postDailyReport(report: DailyReport): Promise<void> {
		const content = formatDailyReport(report, {
			issueUrl: this.options.issueUrl,
			mentions: await this.loadMentions(),
			timezone: this.options.timezone,
		});
		await this.chat.postMessage(this.options.channelId, content);
		reportLogger.info({ date: report.date }, "Daily report delivered");
	}

	async postWeeklyReport(report: WeeklyReport): Promise<void> {
		await this.chat.postMessage(this.options.channelId, formatWeeklyReport(report));
		reportLogger.info(
			{ weekStart: report.weekStart, weekEnd: report.weekEnd },
			"Weekly report delivered",
		);
	}

	/**
	 * Post the daily sync prompt. Returns the thread timestamp.
	 */
	async postSyncPrompt(date: string): Promise<string> {
		const { ts } = await this.chat.postMessage(
			this.options.channelId,
			formatSyncPrompt(date),
		);
		return ts;
	}

	async postReminder(userIds: string[], threadTs: string): Promise<void> {
		await this.chat.postMessage(this.options.channelId, formatReminder(userIds), threadTs);
	}

	async postSyncSummary(
		date: string,
		entries: SyncSummaryEntry[],
		threadTs: string,
	): Promise<void> {
		await this.chat.postMessage(
			this.options.channelId,
			formatSyncSummary(date, entries),
			threadTs,
		);
	}

	/**
	 * Direct message to the admin user.
	 */
	async notifyJobFailure(
		jobId: string,
		errorMessage: string,
		retryAt: string | null,
	): Promise<void> {
		await this.chat.postMessage(
			this.options.adminUserId,
			formatJobFailureAlert(jobId, errorMessage, retryAt),
		);
	}

	/**
	 * Tracker user id -> Slack user id. Without mappings reports omit mentions.
	 */
	private async loadMentions(): Promise<Map<string, string>> {
		try {
			const mappings = await this.store.getUserMappings();
			return new Map(
				[...mappings.values()].map((mapping) => [
					mapping.backlogUserId,
					mapping.slackUserId,
				]),
			);
		} catch (error) {
			reportLogger.warn({ err: error }, "User mappings unavailable, skipping mentions");
			return new Map();
		}
	}
}
