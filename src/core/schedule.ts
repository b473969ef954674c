/**
 * Human-readable descriptions of cron patterns, for job status output.
 */

const DAY_NAMES = [
	"Sundays",
	"Mondays",
	"Tuesdays",
	"Wednesdays",
	"Thursdays",
	"Fridays",
	"Saturdays",
];

function describeDays(field: string): string | null {
	if (field === "*") return "every day";
	if (field === "1-5") return "weekdays";
	if (field === "0,6" || field === "6,0") return "weekends";

	const names: string[] = [];
	for (const part of field.split(",")) {
		if (!/^\d$/.test(part)) return null;
		// 7 is also Sunday in cron
		const name = DAY_NAMES[Number(part) % 7];
		if (!name) return null;
		names.push(name);
	}
	return names.join(", ");
}

/**
 * Describe a five-field cron pattern, e.g. "weekdays at 09:00 (Asia/Tokyo)".
 * Patterns outside the simple daily/weekly shape are shown verbatim.
 */
export function describeSchedule(pattern: string, timezone: string): string {
	const fallback = `cron "${pattern}" (${timezone})`;
	const [minute, hour, dayOfMonth, month, dayOfWeek, ...rest] = pattern
		.trim()
		.split(/\s+/);

	if (
		minute === undefined ||
		hour === undefined ||
		dayOfWeek === undefined ||
		rest.length > 0 ||
		dayOfMonth !== "*" ||
		month !== "*" ||
		!/^\d{1,2}$/.test(minute) ||
		!/^\d{1,2}$/.test(hour)
	) {
		return fallback;
	}

	const days = describeDays(dayOfWeek);
	if (!days) return fallback;

	return `${days} at ${hour.padStart(2, "0")}:${minute.padStart(2, "0")} (${timezone})`;
}
