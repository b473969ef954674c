/**
 * Zod schemas for the domain model and the documents persisted in Redis.
 * Every stored document carries a version tag and is decoded through these
 * schemas on read.
 */

import { z } from "zod";

// =============================================================================
// Domain model
// =============================================================================

export const IssueStatusSchema = z.enum([
	"open",
	"in_progress",
	"resolved",
	"closed",
	"pending",
]);

export const PrioritySchema = z.enum(["high", "normal", "low"]);

export const IssueSchema = z.object({
	/** Tracker key, e.g. "PROJ-12" */
	id: z.string(),
	projectId: z.string(),
	summary: z.string(),
	assigneeId: z.string().nullable(),
	/** ISO timestamp; the last instant of the due date in the team timezone */
	dueDate: z.string().nullable(),
	status: IssueStatusSchema,
	priority: PrioritySchema,
	createdAt: z.string(),
	updatedAt: z.string(),
	description: z.string().nullable(),
	projectName: z.string().nullable(),
});

export const SentimentSchema = z.enum(["positive", "negative", "neutral"]);

export const ProgressSignalSchema = z.object({
	userId: z.string(),
	taskReference: z.string().nullable(),
	content: z.string(),
	sentiment: SentimentSchema,
	extractedAt: z.string(),
	userName: z.string().nullable(),
});

export const StoredProgressSignalSchema = ProgressSignalSchema.extend({
	channelId: z.string(),
	messageTs: z.string(),
});

export const SyncUpdateSchema = z.object({
	id: z.string(),
	userId: z.string(),
	completedYesterday: z.array(z.string()),
	plannedToday: z.array(z.string()),
	blockers: z.array(z.string()),
	submittedAt: z.string(),
	userName: z.string().nullable(),
});

export const DailyReportSchema = z.object({
	date: z.string(),
	overdueTasks: z.array(IssueSchema),
	dueToday: z.array(IssueSchema),
	dueThisWeek: z.array(IssueSchema),
	progressSignals: z.array(ProgressSignalSchema),
	syncUpdates: z.array(SyncUpdateSchema),
	completionRate: z.number(),
});

export const TrendAnalysisSchema = z.object({
	completionRate: z.number(),
	overdueTrend: z.number(),
	averageCompletionTime: z.number(),
	recurringBlockers: z.array(z.string()),
});

export const WeeklyReportSchema = z.object({
	weekStart: z.string(),
	weekEnd: z.string(),
	dailyReports: z.array(DailyReportSchema),
	trends: TrendAnalysisSchema,
	keyAchievements: z.array(z.string()),
	blockers: z.array(z.string()),
	recommendations: z.array(z.string()),
});

export const UserMappingSchema = z.object({
	backlogUserId: z.string(),
	slackUserId: z.string(),
	displayName: z.string().nullable(),
});

export type IssueStatus = z.infer<typeof IssueStatusSchema>;
export type Priority = z.infer<typeof PrioritySchema>;
export type Issue = z.infer<typeof IssueSchema>;
export type Sentiment = z.infer<typeof SentimentSchema>;
export type ProgressSignal = z.infer<typeof ProgressSignalSchema>;
export type StoredProgressSignal = z.infer<typeof StoredProgressSignalSchema>;
export type SyncUpdate = z.infer<typeof SyncUpdateSchema>;
export type DailyReport = z.infer<typeof DailyReportSchema>;
export type TrendAnalysis = z.infer<typeof TrendAnalysisSchema>;
export type WeeklyReport = z.infer<typeof WeeklyReportSchema>;
export type UserMapping = z.infer<typeof UserMappingSchema>;

// =============================================================================
// Stored documents (version 1)
// =============================================================================

export const DOCUMENT_VERSION = 1;

export const TaskDocumentSchema = z.object({
	v: z.literal(DOCUMENT_VERSION),
	issue: IssueSchema,
	cachedAt: z.string(),
});

export const DailyReportDocumentSchema = z.object({
	v: z.literal(DOCUMENT_VERSION),
	report: DailyReportSchema,
	createdAt: z.string(),
});

export const WeeklyReportDocumentSchema = z.object({
	v: z.literal(DOCUMENT_VERSION),
	report: WeeklyReportSchema,
	createdAt: z.string(),
});

export const SyncUpdateDocumentSchema = z.object({
	v: z.literal(DOCUMENT_VERSION),
	update: SyncUpdateSchema,
});

export const ProgressSignalDocumentSchema = z.object({
	v: z.literal(DOCUMENT_VERSION),
	signal: StoredProgressSignalSchema,
});

export const UserMappingDocumentSchema = z.object({
	v: z.literal(DOCUMENT_VERSION),
	mapping: UserMappingSchema,
	updatedAt: z.string(),
});
