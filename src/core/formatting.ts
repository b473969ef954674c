/**
 * Slack message rendering for reports, sync prompts and alerts.
 * Pure functions returning fallback text plus Block Kit blocks.
 */

import type { SlackBlock, SlackMessageContent } from "../slack";
import { hasIssues } from "./reports";
import type { DailyReport, Issue, ProgressSignal, WeeklyReport } from "./schemas";
import type { ParsedSyncUpdate } from "./sync-parser";
import { truncate } from "./trends";

/** Tasks listed per section before collapsing the rest into a count */
export const MAX_TASKS_PER_SECTION = 10;

export const MAX_SIGNALS_IN_DAILY = 5;

export const STATUS_LABELS: Record<Issue["status"], string> = {
	open: "Open",
	in_progress: "In Progress",
	resolved: "Resolved",
	closed: "Closed",
	pending: "Pending",
};

export const PRIORITY_LABELS: Record<Issue["priority"], string> = {
	high: "High",
	normal: "Normal",
	low: "Low",
};

export interface TaskFormatContext {
	issueUrl: (issueKey: string) => string;
	/** Tracker user id -> chat user id */
	mentions: ReadonlyMap<string, string>;
	timezone: string;
}

// =============================================================================
// Helpers
// =============================================================================

export function formatPercent(value: number): string {
	return `${value.toFixed(1)}%`;
}

export function formatSignedPercent(value: number): string {
	return value > 0 ? `+${value.toFixed(1)}%` : `${value.toFixed(1)}%`;
}

export function mention(userId: string): string {
	return `<@${userId}>`;
}

function header(text: string): SlackBlock {
	return { type: "header", text: { type: "plain_text", text } };
}

function section(text: string): SlackBlock {
	return { type: "section", text: { type: "mrkdwn", text } };
}

function bulletList(items: string[]): string {
	return items.map((item) => `• ${item}`).join("\n");
}

/**
 * One line per task: linked key, summary, assignee mention and due date.
 */
export function formatTaskLine(issue: Issue, context: TaskFormatContext): string {
	const parts = [`<${context.issueUrl(issue.id)}|${issue.id}> ${issue.summary}`];

	if (issue.priority === "high") {
		parts.push(`[${PRIORITY_LABELS.high}]`);
	}

	if (issue.assigneeId) {
		const slackId = context.mentions.get(issue.assigneeId);
		if (slackId) parts.push(`(${mention(slackId)})`);
	} else {
		parts.push("(unassigned)");
	}

	if (issue.dueDate) {
		const due = new Date(issue.dueDate).toLocaleDateString("en-CA", {
			timeZone: context.timezone,
		});
		parts.push(`due ${due}`);
	}

	return parts.join(" ");
}

function taskSection(
	title: string,
	issues: Issue[],
	context: TaskFormatContext,
): SlackBlock | null {
	if (issues.length === 0) return null;

	const lines = issues
		.slice(0, MAX_TASKS_PER_SECTION)
		.map((issue) => formatTaskLine(issue, context));
	const remaining = issues.length - MAX_TASKS_PER_SECTION;
	if (remaining > 0) lines.push(`...and ${remaining} more`);

	return section(`*${title} (${issues.length})*\n${bulletList(lines)}`);
}

function signalLine(signal: ProgressSignal): string {
	const who = signal.userName ?? mention(signal.userId);
	return `${who}: ${truncate(signal.content)}`;
}

function compact(blocks: Array<SlackBlock | null>): SlackBlock[] {
	return blocks.filter((block): block is SlackBlock => block !== null);
}

// =============================================================================
// Reports
// =============================================================================

export function formatDailyReport(
	report: DailyReport,
	context: TaskFormatContext,
): SlackMessageContent {
	const text = hasIssues(report)
		? `Daily report ${report.date}: ${report.overdueTasks.length} overdue, ${report.dueToday.length} due today`
		: `Daily report ${report.date}: nothing overdue or due today`;

	// Today's tasks already have their own section
	const dueTodayIds = new Set(report.dueToday.map((issue) => issue.id));
	const dueLater = report.dueThisWeek.filter((issue) => !dueTodayIds.has(issue.id));

	const blocks = compact([
		header(`📊 Daily report: ${report.date}`),
		taskSection("⚠️ Overdue", report.overdueTasks, context),
		taskSection("📌 Due today", report.dueToday, context),
		taskSection("🗓️ Due this week", dueLater, context),
		report.progressSignals.length > 0
			? section(
					`*💬 Progress (${report.progressSignals.length})*\n${bulletList(
						report.progressSignals.slice(0, MAX_SIGNALS_IN_DAILY).map(signalLine),
					)}`,
				)
			: null,
		hasIssues(report) ? null : section("✅ Nothing overdue or due today."),
		{
			type: "context",
			elements: [
				{
					type: "mrkdwn",
					text: `Completion rate: ${formatPercent(report.completionRate)} | Sync updates: ${report.syncUpdates.length}`,
				},
			],
		},
	]);

	return { text, blocks };
}

export function formatWeeklyReport(report: WeeklyReport): SlackMessageContent {
	const { trends } = report;
	const text = `Weekly report ${report.weekStart} to ${report.weekEnd}: completion ${formatPercent(trends.completionRate)}, overdue trend ${formatSignedPercent(trends.overdueTrend)}`;

	const listSection = (title: string, items: string[]): SlackBlock | null =>
		items.length > 0 ? section(`*${title}*\n${bulletList(items)}`) : null;

	const blocks = compact([
		header(`📈 Weekly report: ${report.weekStart} to ${report.weekEnd}`),
		section(
			[
				`*Completion rate:* ${formatPercent(trends.completionRate)}`,
				`*Overdue trend:* ${formatSignedPercent(trends.overdueTrend)}`,
				`*Average completion time:* ${trends.averageCompletionTime.toFixed(1)} days`,
				`*Days reported:* ${report.dailyReports.length}`,
			].join("\n"),
		),
		listSection("🏆 Key achievements", report.keyAchievements),
		listSection("🚧 Blockers", report.blockers),
		listSection("🔁 Recurring blockers", trends.recurringBlockers),
		{ type: "divider" },
		listSection("💡 Recommendations", report.recommendations),
	]);

	return { text, blocks };
}

// =============================================================================
// Daily Sync
// =============================================================================

export function formatSyncPrompt(date: string): SlackMessageContent {
	const text = `Good morning! Time for the daily sync (${date}). Reply in this thread.`;
	return {
		text,
		blocks: [
			section(`*${text}*`),
			section("```yesterday: what you finished\ntoday: what you plan to do\nblockers: anything in your way (or none)```"),
		],
	};
}

export function formatReminder(userIds: string[]): SlackMessageContent {
	return {
		text: `${userIds.map(mention).join(" ")} please post your daily sync update in this thread.`,
	};
}

function formatSyncFields(update: ParsedSyncUpdate): string {
	const list = (items: string[]) => (items.length > 0 ? items.join(", ") : "-");
	return [
		`Yesterday: ${list(update.completedYesterday)}`,
		`Today: ${list(update.plannedToday)}`,
		`Blockers: ${list(update.blockers)}`,
	].join("\n");
}

export interface SyncSummaryEntry {
	userId: string;
	userName: string | null;
	text: string;
	update: ParsedSyncUpdate | null;
}

export function formatSyncSummary(
	date: string,
	entries: SyncSummaryEntry[],
): SlackMessageContent {
	const text = `Daily sync summary ${date}: ${entries.length} ${entries.length === 1 ? "reply" : "replies"}`;
	const blocks: SlackBlock[] = [header(`📝 Daily sync summary: ${date}`)];

	for (const entry of entries) {
		const who = entry.userName ?? mention(entry.userId);
		const body = entry.update ? formatSyncFields(entry.update) : truncate(entry.text, 300);
		blocks.push(section(`*${who}*\n${body}`));
	}

	return { text, blocks };
}

// =============================================================================
// Alerts
// =============================================================================

export function formatJobFailureAlert(
	jobId: string,
	errorMessage: string,
	retryAt: string | null,
): SlackMessageContent {
	const lines = [`🚨 Job ${jobId} failed: ${errorMessage}`];
	if (retryAt) lines.push(`A retry is scheduled for ${retryAt}.`);
	return { text: lines.join("\n") };
}
