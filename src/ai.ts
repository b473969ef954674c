/**
 * AI answer generation using the Vercel AI SDK.
 * Gemini and Bedrock are interchangeable behind AnswerGenerator.
 */

import { createAmazonBedrock } from "@ai-sdk/amazon-bedrock";
import { createGoogleGenerativeAI } from "@ai-sdk/google";
import { generateText, type LanguageModel } from "ai";
import type { AIProviderName, AppConfig } from "./config";
import { buildQueryAnswerPrompt, type ProjectSnapshot } from "./core/prompts";
import { AIProviderError, AIProviderTimeoutError, toError } from "./errors";
import { aiLogger } from "./logger";

const AI_TIMEOUT_MS = 30000; // 30 seconds

export interface AnswerGenerator {
	readonly provider: AIProviderName;
	generateAnswer(question: string, snapshot: ProjectSnapshot): Promise<string>;
}

/**
 * Shared generateText call with timeout and error mapping.
 */
abstract class ModelAnswerGenerator implements AnswerGenerator {
	abstract readonly provider: AIProviderName;

	protected abstract model(): LanguageModel;

	async generateAnswer(question: string, snapshot: ProjectSnapshot): Promise<string> {
		const log = aiLogger.child({ operation: "answer", provider: this.provider });
		const prompt = buildQueryAnswerPrompt(question, snapshot);

		const controller = new AbortController();
		const timeout = setTimeout(() => controller.abort(), AI_TIMEOUT_MS);

		try {
			const { text, usage } = await generateText({
				model: this.model(),
				system: prompt.system,
				prompt: prompt.user,
				temperature: 0.2,
				abortSignal: controller.signal,
			});

			log.debug({ tokens: usage?.totalTokens }, "Answer generated");
			return text.trim();
		} catch (error) {
			if (toError(error).name === "AbortError") {
				throw new AIProviderTimeoutError(AI_TIMEOUT_MS, toError(error));
			}
			log.error({ err: error }, "Answer generation failed");
			throw new AIProviderError(
				`AI answer generation failed: ${toError(error).message}`,
				undefined,
				toError(error),
			);
		} finally {
			clearTimeout(timeout);
		}
	}
}

export class GeminiAnswerGenerator extends ModelAnswerGenerator {
	readonly provider = "gemini";
	private readonly languageModel: LanguageModel;

	constructor(options: { apiKey: string | undefined; model: string }) {
		super();
		this.languageModel = createGoogleGenerativeAI({ apiKey: options.apiKey })(options.model);
	}

	protected model(): LanguageModel {
		return this.languageModel;
	}
}

export class BedrockAnswerGenerator extends ModelAnswerGenerator {
	readonly provider = "bedrock";
	private readonly languageModel: LanguageModel;

	constructor(options: { region: string; model: string }) {
		super();
		this.languageModel = createAmazonBedrock({ region: options.region })(options.model);
	}

	protected model(): LanguageModel {
		return this.languageModel;
	}
}

/**
 * Pick the configured provider.
 */
export function createAnswerGenerator(config: AppConfig["ai"]): AnswerGenerator {
	switch (config.provider) {
		case "gemini":
			return new GeminiAnswerGenerator({ apiKey: config.apiKey, model: config.model });
		case "bedrock":
			return new BedrockAnswerGenerator({ region: config.region, model: config.model });
	}
}
