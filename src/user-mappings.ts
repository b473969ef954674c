/**
 * Links Backlog users to Slack users so reports can mention assignees.
 */

import type { IssueTrackerClient, TrackerUser } from "./backlog";
import type { UserMapping } from "./core/schemas";
import { logger } from "./logger";
import type { ChatClient, ChatUser } from "./slack";
import type { CacheStore } from "./store";

const log = logger.child({ component: "user-mappings" });

export interface UserMappingDeps {
	tracker: IssueTrackerClient;
	chat: ChatClient;
	store: CacheStore;
	projectIds: string[];
	channelId: string;
}

function normalize(name: string | null | undefined): string | null {
	const trimmed = name?.trim().toLowerCase();
	return trimmed ? trimmed : null;
}

function chatNames(user: ChatUser): string[] {
	return [user.name, user.displayName, user.realName]
		.map(normalize)
		.filter((name): name is string => name !== null);
}

function trackerNames(user: TrackerUser): string[] {
	return [user.userId, user.name]
		.map(normalize)
		.filter((name): name is string => name !== null);
}

/**
 * Match tracker project members to channel members by login or display name
 * (case-insensitive) and persist each match. Returns the stored mappings.
 */
export async function syncUserMappings(deps: UserMappingDeps): Promise<UserMapping[]> {
	const slackByName = new Map<string, ChatUser>();
	for (const memberId of await deps.chat.getChannelMembers(deps.channelId)) {
		const user = await deps.chat.getUserInfo(memberId);
		if (!user || user.isBot || user.deleted) continue;
		for (const name of chatNames(user)) {
			if (!slackByName.has(name)) slackByName.set(name, user);
		}
	}

	const trackerUsers = new Map<string, TrackerUser>();
	for (const projectId of deps.projectIds) {
		try {
			for (const user of await deps.tracker.listProjectUsers(projectId)) {
				trackerUsers.set(user.id, user);
			}
		} catch (error) {
			log.error({ err: error, projectId }, "Failed to list project users, skipping");
		}
	}

	const mappings: UserMapping[] = [];
	for (const user of trackerUsers.values()) {
		const match = trackerNames(user)
			.map((name) => slackByName.get(name))
			.find((candidate) => candidate !== undefined);
		if (!match) continue;

		const mapping: UserMapping = {
			backlogUserId: user.id,
			slackUserId: match.id,
			displayName: match.displayName ?? match.realName ?? match.name,
		};
		await deps.store.saveUserMapping(mapping);
		mappings.push(mapping);
	}

	log.info(
		{ trackerUsers: trackerUsers.size, mapped: mappings.length },
		"User mappings synced",
	);
	return mappings;
}
