/**
 * Health check route handler.
 */

import type { HealthReport } from "../health";
import { json, type RouteHandler } from "./http";

export function healthRoute(check: () => Promise<HealthReport>): RouteHandler {
	return async () => {
		const report = await check();
		return json(report, report.status === "unhealthy" ? 503 : 200);
	};
}
