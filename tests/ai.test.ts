import { beforeEach, describe, expect, it, vi } from "vitest";
import { createAnswerGenerator, GeminiAnswerGenerator } from "../src/ai";
import { buildQueryAnswerPrompt, type ProjectSnapshot } from "../src/core/prompts";
import { AIProviderError, AIProviderTimeoutError } from "../src/errors";

const generateText = vi.hoisted(() =>
	vi.fn(async (_options: unknown) => ({ text: "", usage: { totalTokens: 0 } })),
);

vi.mock("ai", () => ({ generateText }));

const snapshot: ProjectSnapshot = {
	today: "2024-01-10",
	timezone: "Asia/Tokyo",
	totalTasks: 0,
	completionRate: 0,
	overdue: [],
	dueThisWeek: [],
	recentProgress: [],
};

describe("GeminiAnswerGenerator", () => {
	const generator = new GeminiAnswerGenerator({ apiKey: "test-secret", model: "gemini-test" });

	beforeEach(() => {
		generateText.mockReset();
	});

	it("sends the built prompt and trims the answer", async () => {
		generateText.mockResolvedValueOnce({ text: "  All on track.\n", usage: { totalTokens: 12 } });

		expect(await generator.generateAnswer("How are we doing?", snapshot)).toBe("All on track.");

		const prompt = buildQueryAnswerPrompt("How are we doing?", snapshot);
		expect(generateText).toHaveBeenCalledWith(
			expect.objectContaining({
				system: prompt.system,
				prompt: prompt.user,
				temperature: 0.2,
			}),
		);
	});

	it("maps an aborted request to a timeout error", async () => {
		generateText.mockRejectedValueOnce(Object.assign(new Error("aborted"), { name: "AbortError" }));

		const error = await generator.generateAnswer("?", snapshot).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(AIProviderTimeoutError);
		expect(error).toMatchObject({ message: "AI request timed out after 30000ms" });
	});

	it("wraps provider failures", async () => {
		generateText.mockRejectedValueOnce(new Error("quota exceeded"));

		const error = await generator.generateAnswer("?", snapshot).catch((e: unknown) => e);

		expect(error).toBeInstanceOf(AIProviderError);
		expect(error).toMatchObject({ message: "AI answer generation failed: quota exceeded" });
	});
});

describe("createAnswerGenerator", () => {
	it("picks the configured provider", () => {
		expect(
			createAnswerGenerator({
				provider: "bedrock",
				apiKey: undefined,
				model: "bedrock-test",
				region: "us-east-1",
			}).provider,
		).toBe("bedrock");
		expect(
			createAnswerGenerator({
				provider: "gemini",
				apiKey: "test-secret",
				model: "gemini-test",
				region: "us-east-1",
			}).provider,
		).toBe("gemini");
	});
});
