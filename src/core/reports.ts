/**
 * Small views over daily reports.
 */

import type { DailyReport } from "./schemas";

export function hasIssues(report: DailyReport): boolean {
	return report.overdueTasks.length > 0 || report.dueToday.length > 0;
}

export interface DailyReportSummary {
	date: string;
	overdueTasks: string[];
	dueToday: string[];
	dueThisWeek: string[];
	completionRate: number;
	progressCount: number;
	syncUpdatesCount: number;
	hasIssues: boolean;
}

/**
 * Flat summary with task ids instead of full tasks, for API responses.
 */
export function toDailyReportSummary(report: DailyReport): DailyReportSummary {
	return {
		date: report.date,
		overdueTasks: report.overdueTasks.map((issue) => issue.id),
		dueToday: report.dueToday.map((issue) => issue.id),
		dueThisWeek: report.dueThisWeek.map((issue) => issue.id),
		completionRate: report.completionRate,
		progressCount: report.progressSignals.length,
		syncUpdatesCount: report.syncUpdates.length,
		hasIssues: hasIssues(report),
	};
}
