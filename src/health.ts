/**
 * Dependency health: Redis, the issue tracker and Slack.
 */

import type { IssueTrackerClient } from "./backlog";
import { toError } from "./errors";
import { httpLogger } from "./logger";
import type { ChatClient } from "./slack";
import type { CacheStore } from "./store";

export type HealthState = "healthy" | "degraded" | "unhealthy";

export interface ComponentHealth {
	status: HealthState;
	message: string;
}

export interface HealthReport {
	status: HealthState;
	components: {
		redis: ComponentHealth;
		backlog: ComponentHealth;
		slack: ComponentHealth;
	};
	timestamp: string;
}

export interface HealthDeps {
	store: Pick<CacheStore, "ping">;
	tracker: Pick<IssueTrackerClient, "getSpace">;
	chat: Pick<ChatClient, "authTest">;
	now?: () => Date;
}

async function probe(
	name: string,
	check: () => Promise<string>,
	failure: HealthState,
): Promise<ComponentHealth> {
	try {
		return { status: "healthy", message: await check() };
	} catch (error) {
		httpLogger.warn({ err: error, component: name }, "Health check failed");
		return { status: failure, message: toError(error).message };
	}
}

/**
 * Redis is required to run jobs, so its failure makes the service unhealthy.
 * A remote API failure only degrades it: cached data and stored reports still work.
 */
export async function checkHealth(deps: HealthDeps): Promise<HealthReport> {
	const [redis, backlog, slack] = await Promise.all([
		probe(
			"redis",
			async () => {
				await deps.store.ping();
				return "Connected";
			},
			"unhealthy",
		),
		probe(
			"backlog",
			async () => {
				const space = await deps.tracker.getSpace();
				return `Connected to space ${space.spaceKey}`;
			},
			"degraded",
		),
		probe(
			"slack",
			async () => {
				const auth = await deps.chat.authTest();
				return `Connected to ${auth.team} as ${auth.userId}`;
			},
			"degraded",
		),
	]);

	const states = [redis.status, backlog.status, slack.status];
	const status: HealthState = states.includes("unhealthy")
		? "unhealthy"
		: states.includes("degraded")
			? "degraded"
			: "healthy";

	return {
		status,
		components: { redis, backlog, slack },
		timestamp: (deps.now ?? (() => new Date()))().toISOString(),
	};
}
