/**
 * Backlog issue tracker client (REST API v2).
 */

import { z } from "zod";
import { HTTP_TIMEOUT_MS } from "./config";
import { endOfDay } from "./core/dates";
import {
	DEFAULT_RETRY_POLICY,
	parseRetryAfter,
	type RetryPolicy,
	withRetry,
} from "./core/retry";
import type { Issue, IssueStatus, Priority } from "./core/schemas";
import { ExternalAPIError, toError } from "./errors";
import { backlogLogger } from "./logger";

const PAGE_SIZE = 100;
const MAX_PAGES = 50;

// =============================================================================
// Client Interface
// =============================================================================

export interface IssueQuery {
	/** Inclusive, YYYY-MM-DD */
	dueDateSince?: string;
	/** Inclusive, YYYY-MM-DD */
	dueDateUntil?: string;
	assigneeIds?: string[];
}

export interface TrackerUser {
	id: string;
	userId: string | null;
	name: string;
}

export interface IssueTrackerClient {
	/** Every issue in the project matching the query, across all pages. */
	listIssues(projectId: string, query?: IssueQuery): Promise<Issue[]>;
	/** Null when the issue does not exist. */
	getIssue(issueKey: string): Promise<Issue | null>;
	listProjectUsers(projectId: string): Promise<TrackerUser[]>;
	getSpace(): Promise<{ spaceKey: string; name: string }>;
}

// =============================================================================
// Payload Mapping
// =============================================================================

const NamedSchema = z.object({ id: z.number(), name: z.string() });

const BacklogIssueSchema = z.object({
	id: z.number(),
	issueKey: z.string(),
	projectId: z.number(),
	summary: z.string(),
	description: z.string().nullish(),
	assignee: NamedSchema.nullish(),
	dueDate: z.string().nullish(),
	status: NamedSchema.nullish(),
	priority: NamedSchema.nullish(),
	created: z.string(),
	updated: z.string().nullish(),
});

const BacklogUserSchema = z.object({
	id: z.number(),
	userId: z.string().nullish(),
	name: z.string(),
});

const BacklogSpaceSchema = z.object({
	spaceKey: z.string(),
	name: z.string(),
});

type BacklogIssue = z.infer<typeof BacklogIssueSchema>;

/** Built-in Backlog status ids. Projects may add custom statuses. */
const STATUS_BY_ID: Record<number, IssueStatus> = {
	1: "open",
	2: "in_progress",
	3: "resolved",
	4: "closed",
};

const STATUS_BY_NAME: Record<string, IssueStatus> = {
	未対応: "open",
	処理中: "in_progress",
	処理済み: "resolved",
	完了: "closed",
	保留: "pending",
	open: "open",
	"in progress": "in_progress",
	resolved: "resolved",
	closed: "closed",
	pending: "pending",
};

const PRIORITY_BY_ID: Record<number, Priority> = {
	2: "high",
	3: "normal",
	4: "low",
};

const PRIORITY_BY_NAME: Record<string, Priority> = {
	高: "high",
	中: "normal",
	低: "low",
	high: "high",
	normal: "normal",
	low: "low",
};

function mapStatus(status: BacklogIssue["status"]): IssueStatus {
	if (!status) return "open";
	return (
		STATUS_BY_NAME[status.name.toLowerCase()] ?? STATUS_BY_ID[status.id] ?? "open"
	);
}

function mapPriority(priority: BacklogIssue["priority"]): Priority {
	if (!priority) return "normal";
	return (
		PRIORITY_BY_NAME[priority.name.toLowerCase()] ??
		PRIORITY_BY_ID[priority.id] ??
		"normal"
	);
}

/**
 * Convert a Backlog issue payload. Backlog due dates are calendar dates, so
 * they become the last instant of that date in the team timezone.
 */
export function toIssue(payload: BacklogIssue, timezone: string): Issue {
	const createdAt = new Date(payload.created).toISOString();
	return {
		id: payload.issueKey,
		projectId: String(payload.projectId),
		summary: payload.summary,
		assigneeId: payload.assignee ? String(payload.assignee.id) : null,
		dueDate: payload.dueDate
			? endOfDay(payload.dueDate.slice(0, 10), timezone).toISOString()
			: null,
		status: mapStatus(payload.status),
		priority: mapPriority(payload.priority),
		createdAt,
		updatedAt: payload.updated ? new Date(payload.updated).toISOString() : createdAt,
		description: payload.description ?? null,
		projectName: null,
	};
}

// =============================================================================
// Fetch Implementation
// =============================================================================

export interface BacklogClientOptions {
	spaceKey: string;
	apiKey: string;
	domain: string;
	timezone: string;
	timeoutMs?: number;
	retry?: Partial<RetryPolicy>;
	fetch?: typeof fetch;
	sleep?: (ms: number) => Promise<void>;
}

export class BacklogClient implements IssueTrackerClient {
	private readonly baseUrl: string;
	private readonly apiKey: string;
	private readonly timezone: string;
	private readonly timeoutMs: number;
	private readonly retry: RetryPolicy;
	private readonly fetchFn: typeof fetch;
	private readonly sleep?: (ms: number) => Promise<void>;

	constructor(options: BacklogClientOptions) {
		this.baseUrl = `https://${options.spaceKey}.${options.domain}/api/v2`;
		this.apiKey = options.apiKey;
		this.timezone = options.timezone;
		this.timeoutMs = options.timeoutMs ?? HTTP_TIMEOUT_MS;
		this.retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };
		this.fetchFn = options.fetch ?? fetch;
		this.sleep = options.sleep;
	}

	/**
	 * Backlog issue links for chat messages.
	 */
	issueUrl(issueKey: string): string {
		return `${this.baseUrl.replace(/\/api\/v2$/, "")}/view/${issueKey}`;
	}

	async listIssues(projectId: string, query: IssueQuery = {}): Promise<Issue[]> {
		const issues: Issue[] = [];

		for (let page = 0; page < MAX_PAGES; page++) {
			const params = new URLSearchParams();
			params.append("projectId[]", projectId);
			params.set("count", String(PAGE_SIZE));
			params.set("offset", String(page * PAGE_SIZE));
			params.set("sort", "dueDate");
			if (query.dueDateSince) params.set("dueDateSince", query.dueDateSince);
			if (query.dueDateUntil) params.set("dueDateUntil", query.dueDateUntil);
			for (const assigneeId of query.assigneeIds ?? []) {
				params.append("assigneeId[]", assigneeId);
			}

			const batch = await this.get("/issues", params, z.array(BacklogIssueSchema));
			issues.push(...batch.map((payload) => toIssue(payload, this.timezone)));

			if (batch.length < PAGE_SIZE) {
				backlogLogger.debug({ projectId, count: issues.length }, "Fetched issues");
				return issues;
			}
		}

		backlogLogger.warn(
			{ projectId, count: issues.length },
			"Stopped paginating issues at page limit",
		);
		return issues;
	}

	async getIssue(issueKey: string): Promise<Issue | null> {
		try {
			const payload = await this.get(
				`/issues/${encodeURIComponent(issueKey)}`,
				new URLSearchParams(),
				BacklogIssueSchema,
			);
			return toIssue(payload, this.timezone);
		} catch (error) {
			if (error instanceof ExternalAPIError && error.status === 404) {
				return null;
			}
			throw error;
		}
	}

	async listProjectUsers(projectId: string): Promise<TrackerUser[]> {
		const users = await this.get(
			`/projects/${encodeURIComponent(projectId)}/users`,
			new URLSearchParams(),
			z.array(BacklogUserSchema),
		);
		return users.map((user) => ({
			id: String(user.id),
			userId: user.userId ?? null,
			name: user.name,
		}));
	}

	async getSpace(): Promise<{ spaceKey: string; name: string }> {
		return this.get("/space", new URLSearchParams(), BacklogSpaceSchema);
	}

	private async get<S extends z.ZodTypeAny>(
		path: string,
		params: URLSearchParams,
		schema: S,
	): Promise<z.output<S>> {
		const url = new URL(`${this.baseUrl}${path}`);
		for (const [key, value] of params) {
			url.searchParams.append(key, value);
		}
		url.searchParams.set("apiKey", this.apiKey);

		// Never log the URL itself: it carries the API key
		const log = backlogLogger.child({ path });

		try {
			return await withRetry(
				async () => {
					let response: Response;
					try {
						response = await this.fetchFn(url, {
							headers: { Accept: "application/json" },
							signal: AbortSignal.timeout(this.timeoutMs),
						});
					} catch (error) {
						throw new ExternalAPIError(`Backlog request to ${path} failed`, {
							service: "backlog",
							transient: true,
							cause: toError(error),
						});
					}

					if (response.status === 429) {
						throw new ExternalAPIError(`Backlog rate limit hit for ${path}`, {
							service: "backlog",
							status: 429,
							transient: true,
							retryAfterMs: parseRetryAfter(response.headers.get("Retry-After")),
						});
					}

					if (!response.ok) {
						throw new ExternalAPIError(
							`Backlog API error for ${path}: ${response.status} ${response.statusText}`,
							{
								service: "backlog",
								status: response.status,
								transient: response.status >= 500,
							},
						);
					}

					const parsed = schema.safeParse(await response.json());
					if (!parsed.success) {
						throw new ExternalAPIError(`Unexpected Backlog response for ${path}`, {
							service: "backlog",
							transient: false,
							cause: parsed.error,
						});
					}
					return parsed.data;
				},
				{
					...this.retry,
					sleep: this.sleep,
					shouldRetry: (error) =>
						error instanceof ExternalAPIError && error.transient,
					onRetry: ({ attempt, delayMs, error }) =>
						log.warn({ err: error, attempt, delayMs }, "Backlog request failed, retrying"),
				},
			);
		} catch (error) {
			if (!(error instanceof ExternalAPIError && error.status === 404)) {
				log.error({ err: error }, "Backlog request failed");
			}
			throw error;
		}
	}
}
