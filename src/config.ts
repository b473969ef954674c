/**
 * Centralized configuration constants and environment loading.
 * All defaults that appear across multiple files should live here.
 */

import { z } from "zod";
import { ConfigurationError } from "./errors";

// =============================================================================
// Defaults
// =============================================================================

/** Default timezone for reports when TEAM_TIMEZONE is not set */
export const DEFAULT_TIMEZONE = "Asia/Tokyo";

/** Default Redis URL when REDIS_URL is not set */
export const DEFAULT_REDIS_URL = "redis://localhost:6379";

/** Default HTTP port */
export const DEFAULT_PORT = 3000;

/** How long a cached task stays fresh */
export const DEFAULT_CACHE_TTL_MINUTES = 30;

/** Delay before a failed report job is retried once */
export const DEFAULT_RETRY_DELAY_MINUTES = 30;

/** Timeout for a single Backlog or Slack HTTP request */
export const HTTP_TIMEOUT_MS = 10000;

/** Default cron schedules, evaluated in the team timezone */
export const DEFAULT_SCHEDULES = {
	dailySyncPrompt: "0 9 * * 1-5",
	dailySyncReminder: "15 9 * * 1-5",
	dailySyncSummary: "30 9 * * 1-5",
	dailyReport: "0 10 * * *",
	weeklyReport: "0 11 * * 1",
} as const;

export const DEFAULT_AI_MODELS = {
	gemini: "gemini-1.5-flash",
	bedrock: "anthropic.claude-3-haiku-20240307-v1:0",
} as const;

// =============================================================================
// Types
// =============================================================================

export type AIProviderName = keyof typeof DEFAULT_AI_MODELS;

export type JobSchedules = Record<keyof typeof DEFAULT_SCHEDULES, string>;

export interface AppConfig {
	backlog: {
		spaceKey: string;
		apiKey: string;
		domain: string;
		projectIds: string[];
	};
	slack: {
		botToken: string;
		channelId: string;
		adminUserId: string;
	};
	ai: {
		provider: AIProviderName;
		apiKey: string | undefined;
		model: string;
		region: string;
	};
	timezone: string;
	redisUrl: string;
	cacheTtlMs: number;
	retryDelayMs: number;
	port: number;
	schedules: JobSchedules;
}

// =============================================================================
// Loading
// =============================================================================

function isValidTimezone(timezone: string): boolean {
	try {
		new Intl.DateTimeFormat("en-US", { timeZone: timezone });
		return true;
	} catch {
		return false;
	}
}

const csvList = z
	.string()
	.transform((value) =>
		value
			.split(",")
			.map((item) => item.trim())
			.filter((item) => item.length > 0),
	);

const cron = (fallback: string) =>
	z
		.string()
		.trim()
		.regex(/^\S+(\s+\S+){4}$/, "must be a five-field cron pattern")
		.default(fallback);

const EnvSchema = z
	.object({
		BACKLOG_SPACE_KEY: z.string().min(1),
		BACKLOG_API_KEY: z.string().min(1),
		BACKLOG_DOMAIN: z.string().min(1).default("backlog.com"),
		BACKLOG_PROJECT_IDS: csvList.pipe(
			z
				.array(z.string().regex(/^\d+$/, "must be a numeric project ID"))
				.min(1, "at least one project ID is required"),
		),
		SLACK_BOT_TOKEN: z.string().min(1),
		SLACK_CHANNEL_ID: z.string().min(1),
		SLACK_ADMIN_USER_ID: z.string().min(1),
		AI_PROVIDER: z.enum(["gemini", "bedrock"]).default("gemini"),
		AI_API_KEY: z.string().min(1).optional(),
		AI_MODEL: z.string().min(1).optional(),
		AWS_REGION: z.string().min(1).default("us-east-1"),
		TEAM_TIMEZONE: z
			.string()
			.default(DEFAULT_TIMEZONE)
			.refine(isValidTimezone, "must be an IANA timezone name"),
		REDIS_URL: z.string().url().default(DEFAULT_REDIS_URL),
		CACHE_TTL_MINUTES: z.coerce
			.number()
			.int()
			.positive()
			.default(DEFAULT_CACHE_TTL_MINUTES),
		RETRY_DELAY_MINUTES: z.coerce
			.number()
			.int()
			.positive()
			.default(DEFAULT_RETRY_DELAY_MINUTES),
		PORT: z.coerce.number().int().positive().default(DEFAULT_PORT),
		SCHEDULE_DAILY_SYNC_PROMPT: cron(DEFAULT_SCHEDULES.dailySyncPrompt),
		SCHEDULE_DAILY_SYNC_REMINDER: cron(DEFAULT_SCHEDULES.dailySyncReminder),
		SCHEDULE_DAILY_SYNC_SUMMARY: cron(DEFAULT_SCHEDULES.dailySyncSummary),
		SCHEDULE_DAILY_REPORT: cron(DEFAULT_SCHEDULES.dailyReport),
		SCHEDULE_WEEKLY_REPORT: cron(DEFAULT_SCHEDULES.weeklyReport),
	})
	.superRefine((env, ctx) => {
		if (env.AI_PROVIDER === "gemini" && !env.AI_API_KEY) {
			ctx.addIssue({
				code: z.ZodIssueCode.custom,
				path: ["AI_API_KEY"],
				message: "is required when AI_PROVIDER is gemini",
			});
		}
	});

/**
 * Parse and validate configuration from environment variables.
 * Throws ConfigurationError listing every invalid or missing variable.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
	// Empty strings count as unset so defaults apply
	const present = Object.fromEntries(
		Object.entries(env).filter(([, value]) => value !== undefined && value !== ""),
	);
	const result = EnvSchema.safeParse(present);

	if (!result.success) {
		throw new ConfigurationError(
			result.error.issues.map(
				(issue) => `${issue.path.join(".") || "env"} ${issue.message}`,
			),
		);
	}

	const parsed = result.data;
	return {
		backlog: {
			spaceKey: parsed.BACKLOG_SPACE_KEY,
			apiKey: parsed.BACKLOG_API_KEY,
			domain: parsed.BACKLOG_DOMAIN,
			projectIds: parsed.BACKLOG_PROJECT_IDS,
		},
		slack: {
			botToken: parsed.SLACK_BOT_TOKEN,
			channelId: parsed.SLACK_CHANNEL_ID,
			adminUserId: parsed.SLACK_ADMIN_USER_ID,
		},
		ai: {
			provider: parsed.AI_PROVIDER,
			apiKey: parsed.AI_API_KEY,
			model: parsed.AI_MODEL ?? DEFAULT_AI_MODELS[parsed.AI_PROVIDER],
			region: parsed.AWS_REGION,
		},
		timezone: parsed.TEAM_TIMEZONE,
		redisUrl: parsed.REDIS_URL,
		cacheTtlMs: parsed.CACHE_TTL_MINUTES * 60 * 1000,
		retryDelayMs: parsed.RETRY_DELAY_MINUTES * 60 * 1000,
		port: parsed.PORT,
		schedules: {
			dailySyncPrompt: parsed.SCHEDULE_DAILY_SYNC_PROMPT,
			dailySyncReminder: parsed.SCHEDULE_DAILY_SYNC_REMINDER,
			dailySyncSummary: parsed.SCHEDULE_DAILY_SYNC_SUMMARY,
			dailyReport: parsed.SCHEDULE_DAILY_REPORT,
			weeklyReport: parsed.SCHEDULE_WEEKLY_REPORT,
		},
	};
}
