/**
 * Report routes: generate on demand (and deliver to Slack), or read stored ones.
 */

import { addDays } from "../core/dates";
import { toDailyReportSummary } from "../core/reports";
import { toError } from "../errors";
import { httpLogger } from "../logger";
import type { Notifier } from "../notifier";
import type { ReportService } from "../report-service";
import { WEEK_LENGTH_DAYS } from "../report-service";
import type { CacheStore } from "../store";
import { json, optionalDate, requiredDate, type Route } from "./http";

export interface ReportRouteDeps {
	reports: ReportService;
	notifier: Notifier;
	store: CacheStore;
}

async function deliver(send: () => Promise<void>, what: string): Promise<string | null> {
	try {
		await send();
		return null;
	} catch (error) {
		httpLogger.error({ err: error }, `Failed to deliver ${what}`);
		return toError(error).message;
	}
}

export function reportRoutes(deps: ReportRouteDeps): Route[] {
	return [
		{
			method: "POST",
			path: "/api/reports/daily",
			handler: async ({ query }) => {
				const date = optionalDate(query.get("date"), "date");
				const report = await deps.reports.generateDailyReport(date);
				const deliveryError = await deliver(
					() => deps.notifier.postDailyReport(report),
					"daily report",
				);
				return json({
					posted: deliveryError === null,
					deliveryError,
					report: toDailyReportSummary(report),
				});
			},
		},
		{
			method: "POST",
			path: "/api/reports/weekly",
			handler: async ({ query }) => {
				const endDate = optionalDate(query.get("endDate"), "endDate");
				const report = await deps.reports.generateWeeklyReport(endDate);
				const deliveryError = await deliver(
					() => deps.notifier.postWeeklyReport(report),
					"weekly report",
				);
				return json({ posted: deliveryError === null, deliveryError, report });
			},
		},
		{
			method: "GET",
			path: "/api/reports/daily/:date",
			handler: async ({ params }) => {
				const date = requiredDate(params.date, "date");
				const report = await deps.store.getDailyReport(date);
				if (!report) return json({ error: `No daily report for ${date}` }, 404);
				return json(report);
			},
		},
		{
			method: "GET",
			path: "/api/reports/weekly/:endDate",
			handler: async ({ params }) => {
				const weekEnd = requiredDate(params.endDate, "endDate");
				const weekStart = addDays(weekEnd, -(WEEK_LENGTH_DAYS - 1));
				const report = await deps.store.getWeeklyReport(weekStart, weekEnd);
				if (!report) return json({ error: `No weekly report ending ${weekEnd}` }, 404);
				return json(report);
			},
		},
	];
}
