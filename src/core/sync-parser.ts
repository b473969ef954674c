/**
 * Parser for daily sync replies.
 *
 * A reply has up to three labeled sections, usually one per line:
 *
 *   yesterday: finished login form, reviewed PROJ-3
 *   today: start on signup
 *   blockers: none
 *
 * Japanese labels (昨日/完了, 今日/予定, ブロッカー/障害) work the same way.
 */

export const NO_BLOCKERS = "none";

export interface ParsedSyncUpdate {
	completedYesterday: string[];
	plannedToday: string[];
	blockers: string[];
}

type Section = keyof ParsedSyncUpdate;

const SECTION_LABELS: Record<Section, string[]> = {
	completedYesterday: ["yesterday", "completed", "done", "昨日", "完了"],
	plannedToday: ["today", "planned", "plan", "今日", "予定"],
	blockers: ["blockers", "blocker", "ブロッカー", "障害"],
};

const NONE_TOKENS = new Set(["none", "なし", "無し", "n/a", "na", "nothing", "特になし"]);

const SECTIONS: Section[] = ["completedYesterday", "plannedToday", "blockers"];

// Longest first so "planned" is not read as "plan"
const LABELS = SECTIONS.flatMap((section) =>
	SECTION_LABELS[section].map((label) => ({ label, section })),
).sort((a, b) => b.label.length - a.label.length);

/** A label at the start of the text or after whitespace or a separator, then a colon */
const LABEL_PATTERN = new RegExp(
	`(^|[\\s/|、。])(${LABELS.map((entry) => entry.label).join("|")})\\s*[:：]`,
	"gi",
);

const LINE_BREAK = /\r?\n\s*(?:[-*•・]\s*)?/g;
const TRAILING_SEPARATORS = /[\s/|\-*•・]+$/;

export const SYNC_FORMAT_HELP = [
	"Please post your daily sync in this format:",
	"yesterday: what you finished",
	"today: what you plan to do",
	"blockers: anything in your way (or none)",
].join("\n");

/**
 * A blank value or a "none" token (case-insensitive).
 */
export function isNoneValue(value: string): boolean {
	const normalized = value.trim().toLowerCase();
	return normalized.length === 0 || NONE_TOKENS.has(normalized);
}

function sectionOf(label: string): Section | undefined {
	const lower = label.toLowerCase();
	return LABELS.find((entry) => entry.label === lower)?.section;
}

/**
 * Items are comma-separated; a value spanning several lines counts each line
 * (bullets stripped) as an item.
 */
function splitItems(value: string): string[] {
	return value
		.replace(LINE_BREAK, ",")
		.replace(TRAILING_SEPARATORS, "")
		.split(/[,、]/)
		.map((item) => item.trim())
		.filter((item) => item.length > 0)
		.map((item) => (isNoneValue(item) ? NO_BLOCKERS : item));
}

/**
 * Returns null unless at least one section label followed by a colon is found.
 * Sections may be on separate lines or inline ("yesterday: A / today: B").
 */
export function parseSyncUpdate(text: string): ParsedSyncUpdate | null {
	const markers = [...text.matchAll(LABEL_PATTERN)].flatMap((match) => {
		const section = sectionOf(match[2] ?? "");
		if (!section || match.index === undefined) return [];
		return [{ section, start: match.index, valueStart: match.index + match[0].length }];
	});
	if (markers.length === 0) return null;

	const result: ParsedSyncUpdate = {
		completedYesterday: [],
		plannedToday: [],
		blockers: [],
	};
	for (const [index, marker] of markers.entries()) {
		const end = markers[index + 1]?.start ?? text.length;
		result[marker.section].push(...splitItems(text.slice(marker.valueStart, end)));
	}
	return result;
}
