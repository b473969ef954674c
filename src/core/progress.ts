/**
 * Keyword contract for recognizing progress messages in chat.
 * Japanese phrases come first; English equivalents follow.
 */

import type { Sentiment } from "./schemas";

const PROGRESS_PATTERNS: RegExp[] = [
	/完了しました/,
	/進捗[：:]/,
	/進めています/,
	/作業中/,
	/取り組んでいます/,
	/ブロック(されて|している)/,
	/遅延/,
	/問題[がは]/,
	/課題[がは]/,
	/\b(done|completed|finished|shipped|merged)\b/i,
	/\bprogress\s*[:：]/i,
	/\b(working on|in progress|wip)\b/i,
	/\bblock(ed|ing)\b/i,
	/\b(delayed|behind schedule|slipping)\b/i,
	/\b(stuck|problem with|issue with)\b/i,
];

const POSITIVE_PATTERN =
	/完了|成功|解決|\b(done|completed|finished|shipped|resolved|fixed|success(ful)?)\b/i;

const NEGATIVE_PATTERN =
	/ブロック|遅延|問題|課題|失敗|\b(block(ed|ing|er)?|delay(ed)?|problem|fail(ed|ing|ure)?|stuck|behind)\b/i;

const TASK_REFERENCE_PATTERN = /[A-Z0-9]+-[0-9]+/;

export function isProgressMessage(text: string): boolean {
	return PROGRESS_PATTERNS.some((pattern) => pattern.test(text));
}

/**
 * Positive keywords win over negative ones when both appear.
 */
export function classifySentiment(text: string): Sentiment {
	if (POSITIVE_PATTERN.test(text)) return "positive";
	if (NEGATIVE_PATTERN.test(text)) return "negative";
	return "neutral";
}

/**
 * First tracker key in the text, e.g. "PROJ-12".
 */
export function extractTaskReference(text: string): string | null {
	return TASK_REFERENCE_PATTERN.exec(text)?.[0] ?? null;
}
