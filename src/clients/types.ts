/**
 * API Response Schemas
 *
 * Zod schemas for the raw GitHub, JIRA, InfluxDB and Grafana responses the
 * clients read. Only the fields the collector uses are declared; everything
 * else passes through untouched.
 */

import { z } from 'zod';

// ─── GitHub API Responses ────────────────────────────────────

export const GitHubApiUserSchema = z.object({
  login: z.string(),
  name: z.string().nullable(),
});

export const GitHubApiSearchCountSchema = z.object({
  total_count: z.number(),
  incomplete_results: z.boolean(),
});

// ─── JIRA API Responses ──────────────────────────────────────

export const JiraApiUserSchema = z.object({
  displayName: z.string(),
  accountId: z.string().optional(),
  name: z.string().optional(),
});

export const JiraApiFilterSchema = z.object({
  id: z.string(),
  name: z.string(),
  jql: z.string(),
});

export const JiraApiSearchResultSchema = z.object({
  total: z.number(),
  maxResults: z.number(),
  startAt: z.number(),
  issues: z.array(
    z.object({
      key: z.string(),
      fields: z.record(z.unknown()).default({}),
    })
  ),
});

export const JiraApiSprintSchema = z.object({
  id: z.number(),
  name: z.string(),
  state: z.string(),
  startDate: z.string().optional(),
  endDate: z.string().optional(),
  completeDate: z.string().optional(),
});

export type JiraApiSprint = z.infer<typeof JiraApiSprintSchema>;

export const JiraApiSprintListSchema = z.object({
  maxResults: z.number(),
  startAt: z.number(),
  isLast: z.boolean().optional(),
  values: z.array(JiraApiSprintSchema),
});

/**
 * Sprint report from the legacy board charts endpoint. The estimate sum
 * is missing (or lacks a value) when the board has no estimation field.
 */
export const JiraApiSprintReportSchema = z.object({
  contents: z.object({
    completedIssuesEstimateSum: z
      .object({
        value: z.number().optional(),
      })
      .optional(),
  }),
});

// ─── Grafana API Responses ───────────────────────────────────

export const GrafanaImportResultSchema = z.object({
  id: z.number().optional(),
  uid: z.string(),
  url: z.string(),
  status: z.string(),
  version: z.number().optional(),
});

export type GrafanaImportResult = z.infer<typeof GrafanaImportResultSchema>;
