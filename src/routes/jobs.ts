/**
 * Job status and manual triggers.
 */

import type { JobOrchestrator } from "../scheduler";
import { isJobId } from "../scheduler";
import { json, type Route } from "./http";

export function jobRoutes(orchestrator: JobOrchestrator): Route[] {
	return [
		{
			method: "GET",
			path: "/api/jobs",
			handler: async () => json({ jobs: await orchestrator.getJobStatus() }),
		},
		{
			method: "POST",
			path: "/api/jobs/:id/trigger",
			handler: async ({ params }) => {
				const id = params.id ?? "";
				if (!isJobId(id)) return json({ error: `Unknown job: ${id}` }, 404);
				const result = await orchestrator.runJob(id, "manual");
				switch (result.status) {
					case "succeeded":
						return json({ jobId: id, success: true });
					case "failed":
						return json({ jobId: id, success: false, error: result.error }, 500);
					case "skipped":
						return json({ jobId: id, success: false, reason: result.reason }, 409);
				}
			},
		},
	];
}
