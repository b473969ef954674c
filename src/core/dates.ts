/**
 * Calendar helpers for the team timezone.
 * Dates are "YYYY-MM-DD" strings; instants are Date objects.
 */

const DATE_PATTERN = /^(\d{4})-(\d{2})-(\d{2})$/;
const DAY_MS = 24 * 60 * 60 * 1000;

function parseDate(date: string): { year: number; month: number; day: number } {
	const match = DATE_PATTERN.exec(date);
	if (!match) {
		throw new RangeError(`Invalid date "${date}", expected YYYY-MM-DD`);
	}
	return {
		year: Number(match[1]),
		month: Number(match[2]),
		day: Number(match[3]),
	};
}

export function isDateString(value: string): boolean {
	return DATE_PATTERN.test(value);
}

/**
 * Get the calendar date of an instant in the given timezone.
 * Uses en-CA locale which formats as YYYY-MM-DD.
 */
export function toDateString(instant: Date, timezone: string): string {
	return instant.toLocaleDateString("en-CA", { timeZone: timezone });
}

/**
 * Add (or subtract) whole calendar days.
 */
export function addDays(date: string, days: number): string {
	const { year, month, day } = parseDate(date);
	return new Date(Date.UTC(year, month - 1, day + days))
		.toISOString()
		.slice(0, 10);
}

/**
 * Number of calendar days from `from` to `to` (negative when `to` is earlier).
 */
export function diffInDays(from: string, to: string): number {
	const a = parseDate(from);
	const b = parseDate(to);
	return Math.round(
		(Date.UTC(b.year, b.month - 1, b.day) - Date.UTC(a.year, a.month - 1, a.day)) /
			DAY_MS,
	);
}

/**
 * Inclusive list of dates from start to end.
 */
export function dateRange(start: string, end: string): string[] {
	const days = diffInDays(start, end);
	const dates: string[] = [];
	for (let i = 0; i <= days; i++) {
		dates.push(addDays(start, i));
	}
	return dates;
}

/**
 * Offset of the timezone from UTC at the given instant, in milliseconds.
 */
function timezoneOffsetMs(instant: Date, timezone: string): number {
	const parts = new Intl.DateTimeFormat("en-US", {
		timeZone: timezone,
		hourCycle: "h23",
		year: "numeric",
		month: "2-digit",
		day: "2-digit",
		hour: "2-digit",
		minute: "2-digit",
		second: "2-digit",
	}).formatToParts(instant);

	const get = (type: Intl.DateTimeFormatPartTypes): number =>
		Number(parts.find((part) => part.type === type)?.value ?? 0);

	const asUtc = Date.UTC(
		get("year"),
		get("month") - 1,
		get("day"),
		get("hour"),
		get("minute"),
		get("second"),
	);
	return asUtc - (instant.getTime() - instant.getUTCMilliseconds());
}

/**
 * The first instant of a calendar date in the given timezone.
 */
export function startOfDay(date: string, timezone: string): Date {
	const { year, month, day } = parseDate(date);
	const utcMidnight = Date.UTC(year, month - 1, day);
	// Resolve twice so a DST transition near midnight lands on the right offset
	const guess = utcMidnight - timezoneOffsetMs(new Date(utcMidnight), timezone);
	return new Date(utcMidnight - timezoneOffsetMs(new Date(guess), timezone));
}

/**
 * The last instant (millisecond precision) of a calendar date in the timezone.
 */
export function endOfDay(date: string, timezone: string): Date {
	return new Date(startOfDay(addDays(date, 1), timezone).getTime() - 1);
}

export interface TimeWindow {
	start: Date;
	end: Date;
}

export function dayWindow(date: string, timezone: string): TimeWindow {
	return { start: startOfDay(date, timezone), end: endOfDay(date, timezone) };
}

/**
 * Format an instant as "YYYY-MM-DD HH:mm:ss" in the given timezone.
 */
export function formatDateTime(instant: Date, timezone: string): string {
	const time = instant.toLocaleTimeString("en-GB", {
		timeZone: timezone,
		hourCycle: "h23",
		hour: "2-digit",
		minute: "2-digit",
		second: "2-digit",
	});
	return `${toDateString(instant, timezone)} ${time}`;
}
