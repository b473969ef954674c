/**
 * Route aggregation and the node:http server.
 */

import { createServer, type IncomingMessage, type Server, type ServerResponse } from "node:http";
import { ValidationError, toError } from "../errors";
import { httpLogger } from "../logger";
import { healthRoute } from "./health";
import { json, readJsonBody, type Route, type RouteResponse } from "./http";
import { jobRoutes } from "./jobs";
import { type ReportRouteDeps, reportRoutes } from "./reports";
import { type TaskRouteDeps, taskRoutes } from "./tasks";
import type { HealthReport } from "../health";
import type { JobOrchestrator } from "../scheduler";

export interface ApiDeps extends ReportRouteDeps, TaskRouteDeps {
	orchestrator: JobOrchestrator;
	health: () => Promise<HealthReport>;
}

export function createRoutes(deps: ApiDeps): Route[] {
	return [
		{ method: "GET", path: "/health", handler: healthRoute(deps.health) },
		...reportRoutes(deps),
		...jobRoutes(deps.orchestrator),
		...taskRoutes(deps),
	];
}

/**
 * Match a path against a route pattern, returning captured parameters.
 */
export function matchPath(pattern: string, pathname: string): Record<string, string> | null {
	const expected = pattern.split("/").filter(Boolean);
	const actual = pathname.split("/").filter(Boolean);
	if (expected.length !== actual.length) return null;

	const params: Record<string, string> = {};
	for (const [index, segment] of expected.entries()) {
		const value = actual[index];
		if (value === undefined) return null;
		if (segment.startsWith(":")) {
			params[segment.slice(1)] = decodeURIComponent(value);
		} else if (segment !== value) {
			return null;
		}
	}
	return params;
}

function errorResponse(error: unknown): RouteResponse {
	if (error instanceof ValidationError) {
		return json({ error: error.message, help: error.helpText }, 400);
	}
	return json({ error: toError(error).message }, 500);
}

export interface IncomingRequest {
	method: string;
	url: string;
	/** Called only when a route matches */
	readBody: () => Promise<unknown>;
}

/**
 * Dispatch a request to the first matching route.
 */
export async function dispatch(routes: Route[], request: IncomingRequest): Promise<RouteResponse> {
	const url = new URL(request.url, "http://localhost");
	let pathMatched = false;

	for (const route of routes) {
		const params = matchPath(route.path, url.pathname);
		if (!params) continue;
		pathMatched = true;
		if (route.method !== request.method) continue;

		try {
			const body = request.method === "POST" ? await request.readBody() : undefined;
			return await route.handler({ params, query: url.searchParams, body });
		} catch (error) {
			const response = errorResponse(error);
			if (response.status >= 500) {
				httpLogger.error({ err: error, path: url.pathname }, "Request failed");
			}
			return response;
		}
	}

	return pathMatched
		? json({ error: "Method Not Allowed" }, 405)
		: json({ error: "Not Found" }, 404);
}

function send(res: ServerResponse, response: RouteResponse): void {
	res.writeHead(response.status, { "Content-Type": "application/json" });
	res.end(JSON.stringify(response.body));
}

/**
 * Create the HTTP server. The caller is responsible for listen().
 */
export function createHttpServer(routes: Route[]): Server {
	return createServer((req: IncomingMessage, res: ServerResponse) => {
		const startedAt = Date.now();
		dispatch(routes, {
			method: req.method ?? "GET",
			url: req.url ?? "/",
			readBody: () => readJsonBody(req),
		})
			.then((response) => {
				send(res, response);
				httpLogger.debug(
					{ method: req.method, url: req.url, status: response.status, durationMs: Date.now() - startedAt },
					"Request handled",
				);
			})
			.catch((error: unknown) => {
				httpLogger.error({ err: error }, "Unhandled request error");
				send(res, json({ error: "Internal Server Error" }, 500));
			});
	});
}
