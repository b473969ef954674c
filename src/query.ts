/**
 * Natural-language questions about the project.
 *
 * Recognized intents are answered from the task cache; anything else is
 * handed to the configured AnswerGenerator with a snapshot of project data.
 */

import type { AnswerGenerator } from "./ai";
import { addDays, startOfDay, toDateString } from "./core/dates";
import { formatPercent, mention, STATUS_LABELS } from "./core/formatting";
import { completionRate } from "./core/issues";
import type { ProjectSnapshot } from "./core/prompts";
import type { Issue } from "./core/schemas";
import { AIProviderError } from "./errors";
import { aiLogger } from "./logger";
import type { CacheStore } from "./store";
import type { TaskCache } from "./task-cache";

export type QueryIntent =
	| "tasks_due_today"
	| "tasks_due_this_week"
	| "tasks_overdue"
	| "tasks_by_assignee"
	| "project_status"
	| "unknown";

const TASK_WORDS = "(タスク|課題|作業|やること|tasks?|issues?)";

/** Checked in order; the first match wins */
const INTENT_PATTERNS: Array<[QueryIntent, RegExp[]]> = [
	[
		"tasks_due_today",
		[
			new RegExp(`(今日|本日)[\\sのにはが]*${TASK_WORDS}`),
			/today'?s?\s*(tasks?|issues?)|due\s+today/,
		],
	],
	[
		"tasks_due_this_week",
		[
			new RegExp(`今週中?[\\sのにはが中]*${TASK_WORDS}`),
			/this\s*week'?s?\s*(tasks?|issues?)|due\s+this\s+week/,
		],
	],
	[
		"tasks_overdue",
		[/(期限|締め切り)[\sがは]*切れ/, new RegExp(`遅延(している|した|の)?\\s*${TASK_WORDS}`), /overdue/],
	],
	[
		"tasks_by_assignee",
		[
			new RegExp(`<@[a-z0-9]+>[\\sのが担当]*${TASK_WORDS}`),
			new RegExp(`(誰|だれ|担当者|アサイン)[\\sがのは]*${TASK_WORDS}`),
			/(tasks?|issues?)\s+(for|of|assigned to)\s+<@/,
		],
	],
	[
		"project_status",
		[/(プロジェクト|案件|全体)[\sの]*(状況|ステータス|進捗|状態)/, /project\s*status/],
	],
];

const MENTION_PATTERN = /<@([A-Z0-9]+)>/g;

/** Tasks listed in a structured answer */
const MAX_TASKS_IN_ANSWER = 15;

const RECENT_PROGRESS_DAYS = 3;

export const FALLBACK_ANSWER = [
	"Sorry, I could not answer that. Try asking:",
	"• What tasks are due today?",
	"• What tasks are due this week?",
	"• Which tasks are overdue?",
	"• What is the project status?",
].join("\n");

export function detectIntent(question: string): QueryIntent {
	const lower = question.toLowerCase();
	for (const [intent, patterns] of INTENT_PATTERNS) {
		if (patterns.some((pattern) => pattern.test(lower))) return intent;
	}
	return "unknown";
}

/**
 * Slack user ids mentioned as <@U123>.
 */
export function extractMentionedUsers(question: string): string[] {
	return [...question.matchAll(MENTION_PATTERN)].flatMap((match) =>
		match[1] ? [match[1]] : [],
	);
}

const LIST_HEADERS: Record<string, string> = {
	tasks_due_today: "📅 *Tasks due today*",
	tasks_due_this_week: "📆 *Tasks due this week*",
	tasks_overdue: "⚠️ *Overdue tasks*",
};

export interface QueryServiceOptions {
	timezone: string;
	issueUrl: (issueKey: string) => string;
	now?: () => Date;
}

export class QueryService {
	private readonly now: () => Date;

	constructor(
		private readonly tasks: TaskCache,
		private readonly store: CacheStore,
		private readonly answers: AnswerGenerator,
		private readonly options: QueryServiceOptions,
	) {
		this.now = options.now ?? (() => new Date());
	}

	async answer(question: string): Promise<{ intent: QueryIntent; answer: string }> {
		const intent = detectIntent(question);
		aiLogger.info({ intent }, "Query received");

		switch (intent) {
			case "tasks_due_today":
				return { intent, answer: this.formatTaskList(intent, await this.tasks.getTasksDueToday()) };
			case "tasks_due_this_week":
				return {
					intent,
					answer: this.formatTaskList(intent, await this.tasks.getTasksDueThisWeek()),
				};
			case "tasks_overdue":
				return { intent, answer: this.formatTaskList(intent, await this.tasks.getOverdueTasks()) };
			case "tasks_by_assignee":
				return { intent, answer: await this.answerByAssignee(question) };
			case "project_status":
				return { intent, answer: await this.projectStatus() };
			case "unknown":
				return { intent, answer: await this.askModel(question) };
		}
	}

	formatTaskList(intent: QueryIntent, issues: Issue[], header?: string): string {
		if (issues.length === 0) return "No matching tasks.";

		const now = this.now();
		const lines = issues.slice(0, MAX_TASKS_IN_ANSWER).map((issue) => {
			const due = issue.dueDate
				? toDateString(new Date(issue.dueDate), this.options.timezone)
				: "no due date";
			const marker =
				issue.dueDate && new Date(issue.dueDate) < now
					? "🔴"
					: due === toDateString(now, this.options.timezone)
						? "🟡"
						: "🟢";
			return `${marker} <${this.options.issueUrl(issue.id)}|${issue.id}> *${issue.summary}* (due: ${due}, status: ${STATUS_LABELS[issue.status]})`;
		});
		if (issues.length > MAX_TASKS_IN_ANSWER) {
			lines.push(`...and ${issues.length - MAX_TASKS_IN_ANSWER} more`);
		}

		const title = header ?? LIST_HEADERS[intent] ?? "📋 *Tasks*";
		return `${title}\n${lines.join("\n")}\n\nTotal: ${issues.length} task${issues.length === 1 ? "" : "s"}`;
	}

	private async answerByAssignee(question: string): Promise<string> {
		const mentioned = extractMentionedUsers(question);
		if (mentioned.length === 0) {
			return "No assignee given. Mention a user, for example: tasks for @someone";
		}

		const mappings = await this.store.getUserMappings();
		const bySlackId = new Map(
			[...mappings.values()].map((mapping) => [mapping.slackUserId, mapping.backlogUserId]),
		);

		const sections: string[] = [];
		for (const slackUserId of mentioned) {
			const backlogUserId = bySlackId.get(slackUserId);
			if (!backlogUserId) {
				sections.push(`${mention(slackUserId)} is not linked to a Backlog user yet.`);
				continue;
			}
			const issues = await this.tasks.getTasksByAssignee(backlogUserId);
			sections.push(
				this.formatTaskList("tasks_by_assignee", issues, `👤 *Tasks for ${mention(slackUserId)}*`),
			);
		}
		return sections.join("\n\n");
	}

	private async projectStatus(): Promise<string> {
		const [overdue, dueToday, dueThisWeek, rate] = await Promise.all([
			this.tasks.getOverdueTasks(),
			this.tasks.getTasksDueToday(),
			this.tasks.getTasksDueThisWeek(),
			this.tasks.getCompletionRate(),
		]);

		return [
			"*Project status*",
			`• Completion rate: ${formatPercent(rate)}`,
			`• Overdue: ${overdue.length}`,
			`• Due today: ${dueToday.length}`,
			`• Due this week: ${dueThisWeek.length}`,
		].join("\n");
	}

	private async askModel(question: string): Promise<string> {
		try {
			return await this.answers.generateAnswer(question, await this.snapshot());
		} catch (error) {
			if (error instanceof AIProviderError) {
				aiLogger.warn({ err: error, provider: this.answers.provider }, "Falling back to canned answer");
				return FALLBACK_ANSWER;
			}
			throw error;
		}
	}

	private async snapshot(): Promise<ProjectSnapshot> {
		const now = this.now();
		const today = toDateString(now, this.options.timezone);
		const [all, overdue, dueThisWeek] = await Promise.all([
			this.tasks.getAllTasks(),
			this.tasks.getOverdueTasks(),
			this.tasks.getTasksDueThisWeek(),
		]);

		let recentProgress: string[] = [];
		try {
			const since = startOfDay(addDays(today, -RECENT_PROGRESS_DAYS), this.options.timezone);
			const signals = await this.store.getProgressSignals(since, now);
			recentProgress = signals.map(
				(signal) => `${signal.userName ?? signal.userId}: ${signal.content}`,
			);
		} catch (error) {
			aiLogger.warn({ err: error }, "Could not load recent progress for query context");
		}

		return {
			today,
			timezone: this.options.timezone,
			totalTasks: all.length,
			completionRate: completionRate(all),
			overdue,
			dueThisWeek,
			recentProgress,
		};
	}
}
