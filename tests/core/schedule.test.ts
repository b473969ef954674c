import { describe, expect, test } from "vitest";
import { describeSchedule } from "../../src/core/schedule";

describe("describeSchedule", () => {
	test("weekday, weekly and daily patterns", () => {
		expect(describeSchedule("0 9 * * 1-5", "Asia/Tokyo")).toBe("weekdays at 09:00 (Asia/Tokyo)");
		expect(describeSchedule("0 11 * * 1", "Asia/Tokyo")).toBe("Mondays at 11:00 (Asia/Tokyo)");
		expect(describeSchedule("30 9 * * *", "UTC")).toBe("every day at 09:30 (UTC)");
		expect(describeSchedule("0 10 * * 0,6", "UTC")).toBe("weekends at 10:00 (UTC)");
		expect(describeSchedule("5 8 * * 2,4", "UTC")).toBe("Tuesdays, Thursdays at 08:05 (UTC)");
	});

	test("7 is Sunday", () => {
		expect(describeSchedule("0 9 * * 7", "UTC")).toBe("Sundays at 09:00 (UTC)");
	});

	test("anything else is shown verbatim", () => {
		expect(describeSchedule("*/15 * * * *", "UTC")).toBe('cron "*/15 * * * *" (UTC)');
		expect(describeSchedule("0 9 1 * *", "UTC")).toBe('cron "0 9 1 * *" (UTC)');
	});
});
