import { describe, expect, test } from "vitest";
import {
	completionRate,
	isDueThisWeek,
	isDueToday,
	isOverdue,
} from "../../src/core/issues";
import { makeIssue } from "../fixtures/fakes";

const TZ = "Asia/Tokyo";
// 12:00 on 2024-01-10 in Tokyo
const NOW = new Date("2024-01-10T03:00:00.000Z");

// Due dates are stored as the last instant of the day in the team timezone
const dueOn = (date: string) => `${date}T14:59:59.999Z`;

describe("urgency predicates", () => {
	test("no due date makes every predicate false", () => {
		const issue = makeIssue({ dueDate: null });
		expect(isOverdue(issue, NOW)).toBe(false);
		expect(isDueToday(issue, NOW, TZ)).toBe(false);
		expect(isDueThisWeek(issue, NOW, TZ)).toBe(false);
	});

	test("resolved and closed issues are never urgent", () => {
		for (const status of ["resolved", "closed"] as const) {
			for (const dueDate of [dueOn("2024-01-09"), dueOn("2024-01-10"), dueOn("2024-01-12")]) {
				const issue = makeIssue({ status, dueDate });
				expect(isOverdue(issue, NOW)).toBe(false);
				expect(isDueToday(issue, NOW, TZ)).toBe(false);
				expect(isDueThisWeek(issue, NOW, TZ)).toBe(false);
			}
		}
	});

	test("yesterday's due date is overdue", () => {
		const issue = makeIssue({ dueDate: dueOn("2024-01-09") });
		expect(isOverdue(issue, NOW)).toBe(true);
		expect(isDueToday(issue, NOW, TZ)).toBe(false);
		expect(isDueThisWeek(issue, NOW, TZ)).toBe(false);
	});

	test("a task due today is also due this week but not overdue", () => {
		const issue = makeIssue({ status: "in_progress", dueDate: dueOn("2024-01-10") });
		expect(isOverdue(issue, NOW)).toBe(false);
		expect(isDueToday(issue, NOW, TZ)).toBe(true);
		expect(isDueThisWeek(issue, NOW, TZ)).toBe(true);
	});

	test("this week covers today through seven days ahead", () => {
		expect(isDueThisWeek(makeIssue({ dueDate: dueOn("2024-01-17") }), NOW, TZ)).toBe(true);
		expect(isDueThisWeek(makeIssue({ dueDate: dueOn("2024-01-18") }), NOW, TZ)).toBe(false);
	});
});

describe("completionRate", () => {
	test("percentage of resolved or closed issues", () => {
		const issues = [
			makeIssue({ status: "open" }),
			makeIssue({ status: "resolved" }),
			makeIssue({ status: "closed" }),
			makeIssue({ status: "pending" }),
		];
		expect(completionRate(issues)).toBe(50);
	});

	test("empty set is 0", () => {
		expect(completionRate([])).toBe(0);
	});
});
