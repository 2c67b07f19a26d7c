import { z } from "zod";

// Wire fields stay snake_case; clients of the job API read them as-is.

/* ─────────────────────────── Research ─────────────────────────── */

export const outputFormatSchema = z.enum(["pdf", "pptx"]);
export const themeSchema = z.enum(["navy-teal", "navy-gold", "charcoal-blue"]);

export const researchRequestSchema = z.object({
  query: z.string().trim().min(1, "Query is required"),
  output_formats: z.array(outputFormatSchema).min(1).default(["pdf", "pptx"]),
  theme: themeSchema.default("navy-teal"),
  include_visualization: z.boolean().default(false),
});

export const researchResponseSchema = z.object({
  topic: z.string(),
  summary: z.string(),
  sources: z.array(z.string()),
  tools_used: z.array(z.string()),
});

/* ─────────────────────────── Jobs ─────────────────────────── */

export const jobStatusSchema = z.enum(["pending", "running", "completed", "failed"]);

export const fileUrlsSchema = z.object({
  pdf: z.string().optional(),
  pptx: z.string().optional(),
  visualization: z.string().optional(),
});

export const jobStatusResponseSchema = z.object({
  job_id: z.string(),
  status: jobStatusSchema,
  progress: z.string(),
  result: researchResponseSchema.nullable(),
  file_urls: fileUrlsSchema.nullable(),
  error: z.string().nullable(),
});

export const jobSubmitResponseSchema = z.object({
  job_id: z.string(),
  status: jobStatusSchema,
  message: z.string(),
});

/* ─────────────────────────── Visualization ─────────────────────────── */

export const slideLayoutSchema = z.enum(["full-chart", "chart-insight"]);

export const chartSpecSchema = z.object({
  chart_type: z.enum(["bar", "line", "pie", "doughnut", "area"]),
  title: z.string(),
  data: z.array(z.number()).min(1),
  labels: z.array(z.string()),
  colors: z.array(z.string()).optional(),
  show_legend: z.boolean().default(false),
  show_data_labels: z.boolean().default(true),
  layout: slideLayoutSchema.default("full-chart"),
  insight_text: z.string().optional(),
});

export const tableSpecSchema = z.object({
  title: z.string(),
  headers: z.array(z.string()).min(1),
  rows: z.array(z.array(z.union([z.string(), z.number()]))),
  highlight_rows: z.array(z.number().int().nonnegative()).optional(),
  column_widths: z.array(z.number().positive()).optional(),
});

export const visualizationRequestSchema = z.object({
  presentation_title: z.string().trim().min(1),
  theme: themeSchema.default("navy-teal"),
  charts: z.array(chartSpecSchema).default([]),
  tables: z.array(tableSpecSchema).default([]),
  executive_summary: z.array(z.string()).optional(),
  section_dividers: z.array(z.string()).optional(),
});

export const visualizationResponseSchema = z.object({
  pptx_path: z.string(),
  charts_created: z.number().int(),
  tables_created: z.number().int(),
  slide_count: z.number().int(),
});

/* ─────────────────────────── Types ─────────────────────────── */

export type OutputFormat = z.infer<typeof outputFormatSchema>;
export type Theme = z.infer<typeof themeSchema>;
export type ResearchRequest = z.infer<typeof researchRequestSchema>;
export type ResearchResponse = z.infer<typeof researchResponseSchema>;
export type JobStatus = z.infer<typeof jobStatusSchema>;
export type FileUrls = z.infer<typeof fileUrlsSchema>;
export type JobStatusResponse = z.infer<typeof jobStatusResponseSchema>;
export type JobSubmitResponse = z.infer<typeof jobSubmitResponseSchema>;
export type ChartSpec = z.infer<typeof chartSpecSchema>;
export type TableSpec = z.infer<typeof tableSpecSchema>;
export type VisualizationRequest = z.infer<typeof visualizationRequestSchema>;
export type VisualizationResponse = z.infer<typeof visualizationResponseSchema>;
