/**
 * Weekly trend analysis over a window of daily reports.
 * Pure functions: the report service loads the inputs and persists the output.
 */

import type { TimeWindow } from "./dates";
import { isCompleted } from "./issues";
import type {
	DailyReport,
	Issue,
	ProgressSignal,
	Sentiment,
	TrendAnalysis,
} from "./schemas";
import { isNoneValue } from "./sync-parser";

export const MAX_ACHIEVEMENT_ITEMS = 5;
export const MAX_SIGNAL_ITEMS = 3;
export const MAX_SIGNAL_LENGTH = 100;

const LOW_COMPLETION_RATE = 50;
const WORSENING_OVERDUE_TREND = 10;
const DAY_MS = 24 * 60 * 60 * 1000;

export const RECOMMENDATIONS = {
	lowCompletion:
		"Completion rate is below 50%. Review scope and resourcing for the coming week.",
	worseningTrend:
		"Overdue work is growing. Re-prioritize tasks so the most urgent ones are finished first.",
	recurringBlockers:
		"The same blockers keep coming up. Schedule a session to resolve them.",
	unassigned: "Some tasks have no assignee. Triage and assign an owner to each.",
	onTrack: "The project is on track. Keep up the current pace.",
} as const;

export function overdueBacklogRecommendation(meanOverdue: number): string {
	return `An average of ${meanOverdue} tasks were overdue each day. Prioritize clearing the overdue backlog.`;
}

/**
 * Cut text to `max` characters, ending in "..." when shortened.
 */
export function truncate(text: string, max: number = MAX_SIGNAL_LENGTH): string {
	return text.length > max ? `${text.slice(0, max - 3)}...` : text;
}

function mean(values: number[]): number {
	if (values.length === 0) return 0;
	return values.reduce((sum, value) => sum + value, 0) / values.length;
}

/**
 * Signed percent change in overdue count between the first and last report.
 */
export function computeOverdueTrend(reports: DailyReport[]): number {
	const first = reports[0];
	const last = reports[reports.length - 1];
	if (!first || !last || reports.length < 2) return 0;

	const firstCount = first.overdueTasks.length;
	const lastCount = last.overdueTasks.length;
	if (firstCount > 0) {
		return ((lastCount - firstCount) / firstCount) * 100;
	}
	return lastCount === 0 ? 0 : 100;
}

function weekBlockers(reports: DailyReport[]): string[] {
	return reports.flatMap((report) =>
		report.syncUpdates.flatMap((update) =>
			update.blockers.filter((blocker) => !isNoneValue(blocker)),
		),
	);
}

/**
 * Blocker strings reported at least twice across the week.
 */
export function findRecurringBlockers(reports: DailyReport[]): string[] {
	const counts = new Map<string, number>();
	for (const blocker of weekBlockers(reports)) {
		counts.set(blocker, (counts.get(blocker) ?? 0) + 1);
	}
	return [...counts.entries()]
		.filter(([, count]) => count >= 2)
		.map(([blocker]) => blocker);
}

/**
 * Mean days from creation to last update over issues completed in the window.
 * Returns 0 when no issue was completed in the window.
 */
export function computeAverageCompletionTime(
	issues: Issue[],
	window: TimeWindow,
): number {
	const durations = issues
		.filter(isCompleted)
		.filter((issue) => {
			const updated = new Date(issue.updatedAt).getTime();
			return (
				updated >= window.start.getTime() && updated <= window.end.getTime()
			);
		})
		.map(
			(issue) =>
				(new Date(issue.updatedAt).getTime() -
					new Date(issue.createdAt).getTime()) /
				DAY_MS,
		);
	return Math.round(mean(durations) * 10) / 10;
}

export function analyzeTrends(
	reports: DailyReport[],
	averageCompletionTime: number,
): TrendAnalysis {
	return {
		completionRate: mean(reports.map((report) => report.completionRate)),
		overdueTrend: computeOverdueTrend(reports),
		averageCompletionTime,
		recurringBlockers: findRecurringBlockers(reports),
	};
}

function signalContents(
	reports: DailyReport[],
	sentiment: Sentiment,
): string[] {
	return reports
		.flatMap((report) => report.progressSignals)
		.filter((signal: ProgressSignal) => signal.sentiment === sentiment)
		.slice(0, MAX_SIGNAL_ITEMS)
		.map((signal) => truncate(signal.content));
}

/**
 * Distinct completed items (at most 5), then up to 3 positive signals.
 */
export function extractKeyAchievements(reports: DailyReport[]): string[] {
	const completed = new Set<string>();
	for (const report of reports) {
		for (const update of report.syncUpdates) {
			for (const item of update.completedYesterday) {
				if (!isNoneValue(item)) completed.add(item);
			}
		}
	}
	return [
		...[...completed].slice(0, MAX_ACHIEVEMENT_ITEMS),
		...signalContents(reports, "positive"),
	];
}

/**
 * Distinct sync-reported blockers, then up to 3 negative signals.
 */
export function extractBlockers(reports: DailyReport[]): string[] {
	return [
		...new Set(weekBlockers(reports)),
		...signalContents(reports, "negative"),
	];
}

export function generateRecommendations(
	reports: DailyReport[],
	trends: TrendAnalysis,
): string[] {
	const recommendations: string[] = [];

	// Mean in whole tasks
	const meanOverdue = Math.floor(
		mean(reports.map((report) => report.overdueTasks.length)),
	);
	if (meanOverdue > 0) {
		recommendations.push(overdueBacklogRecommendation(meanOverdue));
	}

	if (trends.completionRate < LOW_COMPLETION_RATE) {
		recommendations.push(RECOMMENDATIONS.lowCompletion);
	}

	if (trends.overdueTrend > WORSENING_OVERDUE_TREND) {
		recommendations.push(RECOMMENDATIONS.worseningTrend);
	}

	if (trends.recurringBlockers.length > 0) {
		recommendations.push(RECOMMENDATIONS.recurringBlockers);
	}

	const hasUnassigned = reports.some((report) =>
		[...report.overdueTasks, ...report.dueToday, ...report.dueThisWeek].some(
			(issue) => issue.assigneeId === null,
		),
	);
	if (hasUnassigned) {
		recommendations.push(RECOMMENDATIONS.unassigned);
	}

	if (recommendations.length === 0) {
		recommendations.push(RECOMMENDATIONS.onTrack);
	}

	return recommendations;
}
