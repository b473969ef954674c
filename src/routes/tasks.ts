/**
 * Task queries, natural-language questions, sync updates and user mapping.
 */

import { z } from "zod";
import type { UserMapping } from "../core/schemas";
import type { ProgressExtractor } from "../progress-extractor";
import type { QueryService } from "../query";
import type { TaskCache } from "../task-cache";
import { json, parseBody, type Route } from "./http";

export interface TaskRouteDeps {
	tasks: TaskCache;
	query: QueryService;
	progress: ProgressExtractor;
	syncUsers: () => Promise<UserMapping[]>;
}

const QueryBodySchema = z.object({
	question: z.string().trim().min(1),
});

const SyncUpdateBodySchema = z.object({
	userId: z.string().min(1),
	text: z.string().min(1),
	userName: z.string().optional(),
});

/** `?refresh=true` bypasses the cache */
function useCache(query: URLSearchParams): boolean {
	return query.get("refresh") !== "true";
}

export function taskRoutes(deps: TaskRouteDeps): Route[] {
	return [
		{
			method: "GET",
			path: "/api/tasks/overdue",
			handler: async ({ query }) =>
				json({ tasks: await deps.tasks.getOverdueTasks(undefined, useCache(query)) }),
		},
		{
			method: "GET",
			path: "/api/tasks/today",
			handler: async ({ query }) =>
				json({ tasks: await deps.tasks.getTasksDueToday(undefined, useCache(query)) }),
		},
		{
			method: "GET",
			path: "/api/tasks/week",
			handler: async ({ query }) =>
				json({ tasks: await deps.tasks.getTasksDueThisWeek(undefined, useCache(query)) }),
		},
		{
			method: "GET",
			path: "/api/tasks/completion-rate",
			handler: async ({ query }) =>
				json({ completionRate: await deps.tasks.getCompletionRate(undefined, useCache(query)) }),
		},
		{
			method: "POST",
			path: "/api/query",
			handler: async ({ body }) => {
				const { question } = parseBody(QueryBodySchema, body);
				return json(await deps.query.answer(question));
			},
		},
		{
			method: "POST",
			path: "/api/sync-updates",
			handler: async ({ body }) => {
				const input = parseBody(SyncUpdateBodySchema, body);
				const update = await deps.progress.submitSyncUpdate(input);
				return json(update, 201);
			},
		},
		{
			method: "POST",
			path: "/api/users/sync",
			handler: async () => {
				const mappings = await deps.syncUsers();
				return json({ count: mappings.length, mappings });
			},
		},
	];
}
