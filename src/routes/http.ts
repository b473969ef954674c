/**
 * Request/response shapes shared by the route handlers.
 * Handlers are plain async functions so they can be called without a server.
 */

import type { IncomingMessage } from "node:http";
import { z } from "zod";
import { isDateString } from "../core/dates";
import { ValidationError } from "../errors";

export interface RouteRequest {
	params: Record<string, string>;
	query: URLSearchParams;
	body: unknown;
}

export interface RouteResponse {
	status: number;
	body: unknown;
}

export type RouteHandler = (request: RouteRequest) => Promise<RouteResponse>;

export interface Route {
	method: "GET" | "POST";
	/** Segments starting with ":" capture a path parameter */
	path: string;
	handler: RouteHandler;
}

const MAX_BODY_BYTES = 64 * 1024;

export function json(body: unknown, status = 200): RouteResponse {
	return { status, body };
}

/**
 * Read and parse a JSON request body. An empty body parses as undefined.
 */
export async function readJsonBody(req: IncomingMessage): Promise<unknown> {
	const chunks: Buffer[] = [];
	let size = 0;
	for await (const chunk of req) {
		const buffer = Buffer.isBuffer(chunk) ? chunk : Buffer.from(String(chunk));
		size += buffer.length;
		if (size > MAX_BODY_BYTES) {
			throw new ValidationError("Request body too large", `Send at most ${MAX_BODY_BYTES} bytes.`);
		}
		chunks.push(buffer);
	}

	const raw = Buffer.concat(chunks).toString("utf8").trim();
	if (raw === "") return undefined;
	try {
		return JSON.parse(raw);
	} catch {
		throw new ValidationError("Request body is not valid JSON", "Send a JSON object.");
	}
}

/**
 * Validate a body against a schema, mapping zod issues to a ValidationError.
 */
export function parseBody<S extends z.ZodTypeAny>(schema: S, body: unknown): z.infer<S> {
	const result = schema.safeParse(body);
	if (!result.success) {
		const issues = result.error.issues.map(
			(issue) => `${issue.path.join(".") || "body"} ${issue.message}`,
		);
		throw new ValidationError(`Invalid request: ${issues.join("; ")}`, issues.join("\n"));
	}
	return result.data;
}

/**
 * An optional YYYY-MM-DD value from the query string or path.
 */
export function optionalDate(value: string | null | undefined, name: string): string | undefined {
	if (value === null || value === undefined || value === "") return undefined;
	if (!isDateString(value)) {
		throw new ValidationError(`Invalid ${name}: ${value}`, `${name} must be a date in YYYY-MM-DD format.`);
	}
	return value;
}

export function requiredDate(value: string | undefined, name: string): string {
	const date = optionalDate(value, name);
	if (date === undefined) {
		throw new ValidationError(`Missing ${name}`, `${name} must be a date in YYYY-MM-DD format.`);
	}
	return date;
}
