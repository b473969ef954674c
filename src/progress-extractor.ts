/**
 * Turns chat messages into progress signals and daily sync updates.
 */

import { randomUUID } from "node:crypto";
import { dayWindow } from "./core/dates";
import type { SyncSummaryEntry } from "./core/formatting";
import {
	classifySentiment,
	extractTaskReference,
	isProgressMessage,
} from "./core/progress";
import type { ProgressSignal, SyncUpdate } from "./core/schemas";
import { parseSyncUpdate, SYNC_FORMAT_HELP } from "./core/sync-parser";
import { ValidationError } from "./errors";
import { progressLogger } from "./logger";
import { type ChatClient, type ChatMessage, slackTsToDate } from "./slack";
import type { CacheStore } from "./store";

export interface ProgressExtractorOptions {
	channelId: string;
	timezone: string;
	now?: () => Date;
}

export interface SubmitSyncUpdateInput {
	userId: string;
	text: string;
	userName?: string | null;
	/** Chat message timestamp; makes resubmission of the same message idempotent */
	messageTs?: string;
	submittedAt?: Date;
}

export class ProgressExtractor {
	private readonly channelId: string;
	private readonly timezone: string;
	private readonly now: () => Date;

	constructor(
		private readonly chat: ChatClient,
		private readonly store: CacheStore,
		options: ProgressExtractorOptions,
	) {
		this.channelId = options.channelId;
		this.timezone = options.timezone;
		this.now = options.now ?? (() => new Date());
	}

	/**
	 * Progress signals from the channel's messages (and thread replies) posted
	 * on the given date. Each signal is also appended to the store.
	 */
	async extractProgress(date: string): Promise<ProgressSignal[]> {
		const log = progressLogger.child({ date, channel: this.channelId });
		const window = dayWindow(date, this.timezone);
		const messages = await this.chat.getChannelHistory(this.channelId, {
			oldest: window.start,
			latest: window.end,
		});

		const names = new Map<string, string | null>();
		const signals: ProgressSignal[] = [];

		for (const message of messages) {
			const signal = await this.toSignal(message, names);
			if (signal) signals.push(signal);

			if (message.replyCount > 0) {
				let replies: ChatMessage[] = [];
				try {
					replies = await this.chat.getThreadReplies(this.channelId, message.ts);
				} catch (error) {
					log.warn({ err: error, threadTs: message.ts }, "Skipping thread replies");
				}
				for (const reply of replies) {
					const replySignal = await this.toSignal(reply, names);
					if (replySignal) signals.push(replySignal);
				}
			}
		}

		log.info(
			{ messages: messages.length, signals: signals.length },
			"Progress extracted",
		);
		return signals;
	}

	/**
	 * Parse and store a sync update. Throws ValidationError with format help
	 * when the text has no recognized section.
	 */
	async submitSyncUpdate(input: SubmitSyncUpdateInput): Promise<SyncUpdate> {
		const parsed = parseSyncUpdate(input.text);
		if (!parsed) {
			throw new ValidationError(
				"Sync update has no yesterday, today or blockers section",
				SYNC_FORMAT_HELP,
			);
		}

		const submittedAt =
			input.submittedAt ??
			(input.messageTs ? slackTsToDate(input.messageTs) : this.now());
		const update: SyncUpdate = {
			id: input.messageTs ? `${input.userId}:${input.messageTs}` : randomUUID(),
			userId: input.userId,
			...parsed,
			submittedAt: submittedAt.toISOString(),
			userName: input.userName ?? null,
		};

		await this.store.saveSyncUpdate(update);
		progressLogger.info({ userId: update.userId, id: update.id }, "Sync update saved");
		return update;
	}

	/**
	 * Sync updates submitted on the given date.
	 */
	async getSyncUpdates(date: string): Promise<SyncUpdate[]> {
		const window = dayWindow(date, this.timezone);
		return this.store.getSyncUpdates(window.start, window.end);
	}

	/**
	 * Human replies in a sync thread. Replies in the sync format are stored as
	 * sync updates; a reply that fails to store is still returned.
	 */
	async collectSyncReplies(threadTs: string): Promise<SyncSummaryEntry[]> {
		const replies = await this.chat.getThreadReplies(this.channelId, threadTs);
		const names = new Map<string, string | null>();
		const results: SyncSummaryEntry[] = [];

		for (const reply of replies) {
			if (reply.isBot || !reply.userId || !reply.text.trim()) continue;

			const userName = await this.resolveName(reply.userId, names);
			const update = parseSyncUpdate(reply.text);
			if (update) {
				try {
					await this.submitSyncUpdate({
						userId: reply.userId,
						text: reply.text,
						userName,
						messageTs: reply.ts,
					});
				} catch (error) {
					progressLogger.warn(
						{ err: error, userId: reply.userId },
						"Failed to store sync reply",
					);
				}
			}
			results.push({ userId: reply.userId, userName, text: reply.text, update });
		}

		return results;
	}

	private async toSignal(
		message: ChatMessage,
		names: Map<string, string | null>,
	): Promise<ProgressSignal | null> {
		if (message.isBot || !message.userId || !message.text) return null;
		if (!isProgressMessage(message.text)) return null;

		const signal: ProgressSignal = {
			userId: message.userId,
			taskReference: extractTaskReference(message.text),
			content: message.text,
			sentiment: classifySentiment(message.text),
			extractedAt: this.now().toISOString(),
			userName: await this.resolveName(message.userId, names),
		};

		try {
			await this.store.appendProgressSignal({
				...signal,
				channelId: this.channelId,
				messageTs: message.ts,
			});
		} catch (error) {
			progressLogger.warn({ err: error, messageTs: message.ts }, "Failed to store signal");
		}
		return signal;
	}

	private async resolveName(
		userId: string,
		names: Map<string, string | null>,
	): Promise<string | null> {
		if (names.has(userId)) return names.get(userId) ?? null;
		const user = await this.chat.getUserInfo(userId);
		const name = user ? (user.displayName ?? user.realName ?? user.name) : null;
		names.set(userId, name);
		return name;
	}
}
