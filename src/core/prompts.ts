/**
 * Pure functions for building AI prompts.
 */

import { formatPercent } from "./formatting";
import type { Issue } from "./schemas";

const MAX_TASKS_IN_PROMPT = 20;
const MAX_NOTES_IN_PROMPT = 10;

export interface ProjectSnapshot {
	today: string;
	timezone: string;
	totalTasks: number;
	completionRate: number;
	overdue: Issue[];
	dueThisWeek: Issue[];
	/** Recent progress messages from chat */
	recentProgress: string[];
}

function taskLines(issues: Issue[]): string {
	if (issues.length === 0) return "(none)";
	const lines = issues
		.slice(0, MAX_TASKS_IN_PROMPT)
		.map(
			(issue) =>
				`- ${issue.id}: ${issue.summary} [status: ${issue.status}, priority: ${issue.priority}, assignee: ${issue.assigneeId ?? "unassigned"}, due: ${issue.dueDate?.slice(0, 10) ?? "none"}]`,
		);
	if (issues.length > MAX_TASKS_IN_PROMPT) {
		lines.push(`- ...and ${issues.length - MAX_TASKS_IN_PROMPT} more`);
	}
	return lines.join("\n");
}

/**
 * Prompt for answering a free-form question about project status.
 */
export function buildQueryAnswerPrompt(
	question: string,
	snapshot: ProjectSnapshot,
): { system: string; user: string } {
	const system = `You are a project assistant answering questions from a software team in Slack.

Answer only from the project data provided. If the data does not contain the answer, say so briefly.
Keep answers under 120 words. Use Slack mrkdwn (*bold*, bullet lists). Answer in the language of the question.`;

	const notes =
		snapshot.recentProgress.length > 0
			? snapshot.recentProgress
					.slice(0, MAX_NOTES_IN_PROMPT)
					.map((note) => `- ${note}`)
					.join("\n")
			: "(none)";

	const user = `Project data as of ${snapshot.today} (${snapshot.timezone}):
Total tasks: ${snapshot.totalTasks}
Completion rate: ${formatPercent(snapshot.completionRate)}

Overdue tasks:
${taskLines(snapshot.overdue)}

Due within 7 days:
${taskLines(snapshot.dueThisWeek)}

Recent progress messages:
${notes}

Question: ${question}`;

	return { system, user };
}
