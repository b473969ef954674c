/**
 * Slack access through the Web API SDK.
 *
 * The SDK handles transport, rate limits and retries; this module narrows its
 * responses to the shapes the reports need and maps its errors onto
 * ExternalAPIError.
 */

import {
	ErrorCode,
	type Logger,
	LogLevel,
	type WebAPICallError,
	WebClient,
} from "@slack/web-api";
import { z } from "zod";
import { HTTP_TIMEOUT_MS } from "./config";
import { DEFAULT_RETRY_POLICY, type RetryPolicy } from "./core/retry";
import { ExternalAPIError, toError } from "./errors";
import { slackLogger } from "./logger";

const PAGE_LIMIT = 200;
const MAX_PAGES = 50;

// =============================================================================
// Block Kit Types
// =============================================================================

export interface SlackTextObject {
	type: "plain_text" | "mrkdwn";
	text: string;
}

/**
 * The subset of Block Kit blocks the reports use.
 * @see https://api.slack.com/reference/block-kit/blocks
 */
export type SlackBlock =
	| { type: "header"; text: SlackTextObject }
	| { type: "section"; text: SlackTextObject }
	| { type: "context"; elements: SlackTextObject[] }
	| { type: "divider" };

export interface SlackMessageContent {
	/** Fallback text shown in notifications */
	text: string;
	blocks?: SlackBlock[];
}

// =============================================================================
// Client Interface
// =============================================================================

export interface ChatMessage {
	userId: string | null;
	text: string;
	ts: string;
	threadTs: string | null;
	replyCount: number;
	isBot: boolean;
}

export interface ChatUser {
	id: string;
	name: string;
	displayName: string | null;
	realName: string | null;
	isBot: boolean;
	deleted: boolean;
}

export interface HistoryRange {
	oldest: Date;
	latest: Date;
}

export interface ChatClient {
	/** Channel messages in the range, oldest first. */
	getChannelHistory(channel: string, range: HistoryRange): Promise<ChatMessage[]>;
	/** Replies in a thread, excluding the parent message. */
	getThreadReplies(channel: string, threadTs: string): Promise<ChatMessage[]>;
	getChannelMembers(channel: string): Promise<string[]>;
	/** Null when the user cannot be looked up. */
	getUserInfo(userId: string): Promise<ChatUser | null>;
	postMessage(
		channel: string,
		content: SlackMessageContent,
		threadTs?: string,
	): Promise<{ ts: string }>;
	authTest(): Promise<{ userId: string; team: string }>;
}

// =============================================================================
// Response Schemas
// =============================================================================

const SlackMessageSchema = z.object({
	user: z.string().optional(),
	bot_id: z.string().optional(),
	subtype: z.string().optional(),
	text: z.string().default(""),
	ts: z.string(),
	thread_ts: z.string().optional(),
	reply_count: z.number().optional(),
});

const MessagesPageSchema = z.object({
	messages: z.array(SlackMessageSchema).default([]),
});

const MembersPageSchema = z.object({
	members: z.array(z.string()).default([]),
});

const UserInfoResponseSchema = z.object({
	user: z.object({
		id: z.string(),
		name: z.string(),
		real_name: z.string().optional(),
		deleted: z.boolean().optional(),
		is_bot: z.boolean().optional(),
		is_app_user: z.boolean().optional(),
		profile: z
			.object({
				display_name: z.string().optional(),
				real_name: z.string().optional(),
			})
			.optional(),
	}),
});

const PostMessageResponseSchema = z.object({ ts: z.string() });

const AuthTestResponseSchema = z.object({
	user_id: z.string(),
	team: z.string(),
});

type SlackMessagePayload = z.infer<typeof SlackMessageSchema>;

function toChatMessage(message: SlackMessagePayload): ChatMessage {
	return {
		userId: message.user ?? null,
		text: message.text,
		ts: message.ts,
		threadTs: message.thread_ts ?? null,
		replyCount: message.reply_count ?? 0,
		isBot: message.bot_id !== undefined || message.subtype === "bot_message",
	};
}

function toSlackTimestamp(instant: Date): string {
	return (instant.getTime() / 1000).toFixed(6);
}

/**
 * Slack `ts` values are seconds since the epoch with a microsecond suffix.
 */
export function slackTsToDate(ts: string): Date {
	return new Date(Math.round(Number.parseFloat(ts) * 1000));
}

// =============================================================================
// Errors
// =============================================================================

const SDK_ERROR_CODES = new Set<unknown>(Object.values(ErrorCode));

function isWebAPICallError(error: unknown): error is WebAPICallError {
	return error instanceof Error && "code" in error && SDK_ERROR_CODES.has(error.code);
}

/**
 * Map an SDK failure onto ExternalAPIError. Platform errors (`ok: false`) are
 * final; the SDK has already retried transport and HTTP failures.
 */
export function toSlackError(method: string, error: unknown): ExternalAPIError {
	if (error instanceof ExternalAPIError) return error;

	if (isWebAPICallError(error)) {
		switch (error.code) {
			case ErrorCode.PlatformError:
				return new ExternalAPIError(`Slack ${method} error: ${error.data.error}`, {
					service: "slack",
					transient: error.data.error === "ratelimited",
				});
			case ErrorCode.RateLimitedError:
				return new ExternalAPIError(`Slack ${method} rate limited`, {
					service: "slack",
					status: 429,
					transient: true,
					retryAfterMs: error.retryAfter * 1000,
				});
			case ErrorCode.HTTPError:
				return new ExternalAPIError(
					`Slack ${method} failed: ${error.statusCode} ${error.statusMessage}`,
					{
						service: "slack",
						status: error.statusCode,
						transient: error.statusCode >= 500,
					},
				);
			case ErrorCode.RequestError:
				return new ExternalAPIError(`Slack ${method} request failed`, {
					service: "slack",
					transient: true,
					cause: error.original,
				});
		}
	}

	return new ExternalAPIError(`Slack ${method} failed`, {
		service: "slack",
		transient: false,
		cause: toError(error),
	});
}

/**
 * Routes the SDK's own log output through the component logger.
 */
class SdkLogger implements Logger {
	private level = LogLevel.WARN;

	debug(...msg: unknown[]): void {
		slackLogger.debug(msg.map(String).join(" "));
	}

	info(...msg: unknown[]): void {
		slackLogger.info(msg.map(String).join(" "));
	}

	warn(...msg: unknown[]): void {
		slackLogger.warn(msg.map(String).join(" "));
	}

	error(...msg: unknown[]): void {
		slackLogger.error(msg.map(String).join(" "));
	}

	setLevel(level: LogLevel): void {
		this.level = level;
	}

	getLevel(): LogLevel {
		return this.level;
	}

	setName(_name: string): void {}
}

// =============================================================================
// SDK Implementation
// =============================================================================

export interface SlackClientOptions {
	botToken: string;
	timeoutMs?: number;
	retry?: Partial<RetryPolicy>;
	/** Prebuilt SDK client; botToken and the transport options are then ignored */
	webClient?: WebClient;
}

export function createWebClient(options: SlackClientOptions): WebClient {
	const retry = { ...DEFAULT_RETRY_POLICY, ...options.retry };

	return new WebClient(options.botToken, {
		timeout: options.timeoutMs ?? HTTP_TIMEOUT_MS,
		// Wait out Retry-After and try again instead of failing the call
		rejectRateLimitedCalls: false,
		retryConfig: {
			retries: retry.attempts - 1,
			factor: 2,
			minTimeout: retry.baseDelayMs,
			maxTimeout: retry.maxDelayMs,
		},
		logger: new SdkLogger(),
	});
}

export class SlackClient implements ChatClient {
	private readonly client: WebClient;

	constructor(options: SlackClientOptions) {
		this.client = options.webClient ?? createWebClient(options);
	}

	async getChannelHistory(
		channel: string,
		range: HistoryRange,
	): Promise<ChatMessage[]> {
		const messages = await this.collectPages(
			"conversations.history",
			{
				channel,
				oldest: toSlackTimestamp(range.oldest),
				latest: toSlackTimestamp(range.latest),
				inclusive: true,
			},
			(page) => MessagesPageSchema.parse(page).messages,
		);
		// Slack returns newest first
		return messages.reverse().map(toChatMessage);
	}

	async getThreadReplies(channel: string, threadTs: string): Promise<ChatMessage[]> {
		const messages = await this.collectPages(
			"conversations.replies",
			{ channel, ts: threadTs },
			(page) => MessagesPageSchema.parse(page).messages,
		);
		return messages
			.filter((message) => message.ts !== threadTs)
			.map(toChatMessage);
	}

	async getChannelMembers(channel: string): Promise<string[]> {
		return this.collectPages(
			"conversations.members",
			{ channel },
			(page) => MembersPageSchema.parse(page).members,
		);
	}

	async getUserInfo(userId: string): Promise<ChatUser | null> {
		try {
			const { user } = await this.call("users.info", UserInfoResponseSchema, () =>
				this.client.users.info({ user: userId }),
			);
			return {
				id: user.id,
				name: user.name,
				displayName: user.profile?.display_name || null,
				realName: user.real_name ?? user.profile?.real_name ?? null,
				isBot: Boolean(user.is_bot || user.is_app_user),
				deleted: Boolean(user.deleted),
			};
		} catch (error) {
			slackLogger.warn({ err: error, userId }, "Failed to look up Slack user");
			return null;
		}
	}

	async postMessage(
		channel: string,
		content: SlackMessageContent,
		threadTs?: string,
	): Promise<{ ts: string }> {
		const response = await this.call("chat.postMessage", PostMessageResponseSchema, () =>
			this.client.chat.postMessage({
				channel,
				text: content.text,
				blocks: content.blocks,
				thread_ts: threadTs,
			}),
		);
		slackLogger.debug({ channel, ts: response.ts }, "Message posted");
		return { ts: response.ts };
	}

	async authTest(): Promise<{ userId: string; team: string }> {
		const response = await this.call("auth.test", AuthTestResponseSchema, () =>
			this.client.auth.test(),
		);
		return { userId: response.user_id, team: response.team };
	}

	/**
	 * Follow next_cursor through a cursor-paginated method, up to MAX_PAGES.
	 */
	private async collectPages<T>(
		method: string,
		options: Record<string, unknown>,
		read: (page: unknown) => T[],
	): Promise<T[]> {
		const items: T[] = [];
		let pages = 0;

		try {
			for await (const page of this.client.paginate(method, {
				...options,
				limit: PAGE_LIMIT,
			})) {
				items.push(...read(page));
				if (++pages >= MAX_PAGES) {
					slackLogger.warn({ method, maxPages: MAX_PAGES }, "Stopped paginating at page limit");
					break;
				}
			}
		} catch (error) {
			throw toSlackError(method, error);
		}
		return items;
	}

	private async call<S extends z.ZodTypeAny>(
		method: string,
		schema: S,
		request: () => Promise<unknown>,
	): Promise<z.output<S>> {
		let response: unknown;
		try {
			response = await request();
		} catch (error) {
			throw toSlackError(method, error);
		}

		const parsed = schema.safeParse(response);
		if (!parsed.success) {
			throw new ExternalAPIError(`Unexpected Slack ${method} response`, {
				service: "slack",
				transient: false,
				cause: parsed.error,
			});
		}
		return parsed.data;
	}
}
