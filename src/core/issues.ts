/**
 * Task predicates. All are pure: "now" and the team timezone are passed in.
 */

import { diffInDays, toDateString } from "./dates";
import type { Issue, IssueStatus } from "./schemas";

/** Days after today still counted as "this week" (inclusive). */
export const DUE_THIS_WEEK_DAYS = 7;

const COMPLETED_STATUSES: ReadonlySet<IssueStatus> = new Set([
	"resolved",
	"closed",
]);

export function isCompleted(issue: Issue): boolean {
	return COMPLETED_STATUSES.has(issue.status);
}

/**
 * Has a due date that has passed and is not resolved or closed.
 */
export function isOverdue(issue: Issue, now: Date): boolean {
	if (!issue.dueDate || isCompleted(issue)) return false;
	return new Date(issue.dueDate).getTime() < now.getTime();
}

export function isDueToday(issue: Issue, now: Date, timezone: string): boolean {
	if (!issue.dueDate || isCompleted(issue)) return false;
	return (
		toDateString(new Date(issue.dueDate), timezone) ===
		toDateString(now, timezone)
	);
}

/**
 * Due between today and today + 7 days, inclusive on both ends.
 */
export function isDueThisWeek(
	issue: Issue,
	now: Date,
	timezone: string,
): boolean {
	if (!issue.dueDate || isCompleted(issue)) return false;
	const delta = diffInDays(
		toDateString(now, timezone),
		toDateString(new Date(issue.dueDate), timezone),
	);
	return delta >= 0 && delta <= DUE_THIS_WEEK_DAYS;
}

/**
 * Percentage (0-100) of issues in resolved or closed status.
 */
export function completionRate(issues: Issue[]): number {
	if (issues.length === 0) return 0;
	const completed = issues.filter(isCompleted).length;
	return (completed / issues.length) * 100;
}
