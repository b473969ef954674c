import { beforeEach, describe, expect, it } from "vitest";
import { CacheStore } from "../src/store";
import { syncUserMappings } from "../src/user-mappings";
import {
	FakeChatClient,
	FakeIssueTracker,
	makeUser,
	resetTestRedis,
	testRedis,
} from "./fixtures/fakes";

describe("syncUserMappings", () => {
	let tracker: FakeIssueTracker;
	let chat: FakeChatClient;
	let store: CacheStore;

	beforeEach(async () => {
		await resetTestRedis();
		tracker = new FakeIssueTracker();
		chat = new FakeChatClient();
		store = new CacheStore(testRedis);

		chat.members = ["U1", "U2", "U3"];
		chat.addUser(makeUser());
		chat.addUser(makeUser({ id: "U2", name: "carol", displayName: null, realName: null, isBot: true }));
		chat.addUser(makeUser({ id: "U3", name: "bob", displayName: null, realName: "Bob Builder" }));

		tracker.usersByProject.set("100", [
			{ id: "1", userId: "ALICE", name: "Alice A" },
			{ id: "2", userId: null, name: "Bob Builder" },
			{ id: "3", userId: "carol", name: "Carol" },
		]);
		tracker.failingProjects.add("200");
	});

	const sync = () =>
		syncUserMappings({ tracker, chat, store, projectIds: ["100", "200"], channelId: "C1" });

	it("matches members by login or name, ignoring case and bots", async () => {
		const mappings = await sync();

		expect(mappings).toEqual([
			{ backlogUserId: "1", slackUserId: "U1", displayName: "Alice" },
			{ backlogUserId: "2", slackUserId: "U3", displayName: "Bob Builder" },
		]);
	});

	it("stores the mappings by tracker user id", async () => {
		await sync();

		const stored = await store.getUserMappings();
		expect([...stored.keys()].sort()).toEqual(["1", "2"]);
		expect(stored.get("2")?.slackUserId).toBe("U3");
	});
});
