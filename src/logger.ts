import pino from "pino";

const env = process.env.NODE_ENV;
const isDevelopment = env !== "production" && env !== "test";

function defaultLevel(): string {
	if (env === "test") return "silent";
	return isDevelopment ? "debug" : "info";
}

export const logger = pino({
	level: process.env.LOG_LEVEL || defaultLevel(),

	// Pretty print in development
	transport: isDevelopment
		? {
				target: "pino-pretty",
				options: { colorize: true },
			}
		: undefined,

	base: {
		service: "pulseboard",
	},

	redact: {
		paths: [
			"req.headers.authorization",
			"*.apiKey",
			"*.botToken",
			"*.BACKLOG_API_KEY",
			"*.SLACK_BOT_TOKEN",
			"*.AI_API_KEY",
		],
		censor: "[REDACTED]",
	},
});

// Child loggers for different components
export const cacheLogger = logger.child({ component: "cache" });
export const storeLogger = logger.child({ component: "store" });
export const progressLogger = logger.child({ component: "progress" });
export const reportLogger = logger.child({ component: "report" });
export const schedulerLogger = logger.child({ component: "scheduler" });
export const backlogLogger = logger.child({ component: "backlog" });
export const slackLogger = logger.child({ component: "slack" });
export const aiLogger = logger.child({ component: "ai" });
export const httpLogger = logger.child({ component: "http" });
