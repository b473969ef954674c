/**
 * Handlers for the scheduled jobs.
 */

import { toDateString } from "./core/dates";
import { schedulerLogger } from "./logger";
import type { Notifier } from "./notifier";
import type { ProgressExtractor } from "./progress-extractor";
import type { ReportService } from "./report-service";
import type { JobId, JobSource } from "./scheduler";
import type { ChatClient } from "./slack";

export interface SyncThread {
	ts: string;
	date: string;
}

/**
 * The thread opened by today's sync prompt, read by the reminder and summary.
 */
export class SyncThreadState {
	private current: SyncThread | null = null;

	get(): SyncThread | null {
		return this.current;
	}

	set(thread: SyncThread): void {
		this.current = thread;
	}

	clear(): void {
		this.current = null;
	}
}

export interface JobContext {
	syncThread: SyncThreadState;
	source: JobSource;
}

export type JobHandler = (context: JobContext) => Promise<void>;

export type JobHandlers = Record<JobId, JobHandler>;

export interface JobHandlerDeps {
	reports: ReportService;
	progress: ProgressExtractor;
	notifier: Notifier;
	chat: ChatClient;
	channelId: string;
	timezone: string;
	now?: () => Date;
}

export function createJobHandlers(deps: JobHandlerDeps): JobHandlers {
	const now = deps.now ?? (() => new Date());

	return {
		daily_sync_prompt: async ({ syncThread }) => {
			const date = toDateString(now(), deps.timezone);
			syncThread.clear();
			const ts = await deps.notifier.postSyncPrompt(date);
			syncThread.set({ ts, date });
			schedulerLogger.info({ date, threadTs: ts }, "Daily sync prompt posted");
		},

		daily_sync_reminder: async ({ syncThread }) => {
			const thread = syncThread.get();
			if (!thread) {
				schedulerLogger.warn("No active sync thread, skipping reminder");
				return;
			}

			const members = await deps.chat.getChannelMembers(deps.channelId);
			const replies = await deps.chat.getThreadReplies(deps.channelId, thread.ts);
			const replied = new Set(
				replies.flatMap((reply) => (reply.userId ? [reply.userId] : [])),
			);

			const pending: string[] = [];
			for (const memberId of members) {
				if (replied.has(memberId)) continue;
				const user = await deps.chat.getUserInfo(memberId);
				if (user?.isBot || user?.deleted) continue;
				pending.push(memberId);
			}

			if (pending.length === 0) {
				schedulerLogger.info("Every member has replied to the sync thread");
				return;
			}
			await deps.notifier.postReminder(pending, thread.ts);
			schedulerLogger.info({ reminded: pending.length }, "Sync reminder posted");
		},

		daily_sync_summary: async ({ syncThread }) => {
			const thread = syncThread.get();
			if (!thread) {
				schedulerLogger.warn("No active sync thread, skipping summary");
				return;
			}

			const entries = await deps.progress.collectSyncReplies(thread.ts);
			if (entries.length === 0) {
				schedulerLogger.info("No sync replies to summarize");
				return;
			}
			await deps.notifier.postSyncSummary(thread.date, entries, thread.ts);
			schedulerLogger.info({ replies: entries.length }, "Sync summary posted");
		},

		daily_report: async () => {
			const report = await deps.reports.generateDailyReport();
			await deps.notifier.postDailyReport(report);
		},

		weekly_report: async () => {
			const report = await deps.reports.generateWeeklyReport();
			await deps.notifier.postWeeklyReport(report);
		},
	};
}
