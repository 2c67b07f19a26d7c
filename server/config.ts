// server/config.ts
import path from "path";
import { z } from "zod";
import type { Theme } from "@shared/schema";

/* ─────────────────────────── Environment ─────────────────────────── */

const EnvSchema = z.object({
  NODE_ENV: z.string().default("development"),
  PORT: z.coerce.number().int().positive().default(8000),
  OUTPUT_DIR: z.string().default(path.join(process.cwd(), "output")),
  LOGS_DIR: z.string().default(path.join(process.cwd(), "logs")),
  OPENAI_API_KEY: z.string().default(""),
  OPENAI_MODEL: z.string().default("gpt-4o-mini"),
  SERP_API_KEY: z.string().optional(),
  MAX_AGENT_TURNS: z.coerce.number().int().positive().default(12),
  MAX_CONCURRENT_JOBS: z.coerce.number().int().positive().default(2),
  REPORT_AUTHOR: z.string().default("Research Agent"),
});

export function loadConfig(source: NodeJS.ProcessEnv = process.env) {
  const env = EnvSchema.parse(source);
  return {
    env: env.NODE_ENV,
    isTest: env.NODE_ENV === "test",
    port: env.PORT,
    outputDir: path.resolve(env.OUTPUT_DIR),
    logsDir: path.resolve(env.LOGS_DIR),
    openaiApiKey: env.OPENAI_API_KEY,
    model: env.OPENAI_MODEL,
    serpApiKey: env.SERP_API_KEY,
    maxAgentTurns: env.MAX_AGENT_TURNS,
    maxConcurrentJobs: env.MAX_CONCURRENT_JOBS,
    reportAuthor: env.REPORT_AUTHOR,
  };
}

export type AppConfig = ReturnType<typeof loadConfig>;

export const config: AppConfig = loadConfig();

/* ─────────────────────────── Presentation tables ─────────────────────────── */

export interface CorporateTheme {
  primary: string;
  secondary: string;
  accent: string;
  highlight: string;
  background: string;
  text: string;
}

export const CORPORATE_THEMES = {
  "navy-teal": {
    primary: "1F4788",
    secondary: "00A9A5",
    accent: "93A8AC",
    highlight: "F7C548",
    background: "FFFFFF",
    text: "333333",
  },
  "navy-gold": {
    primary: "1E2761",
    secondary: "C5A572",
    accent: "6E7C8F",
    highlight: "E8B449",
    background: "FFFFFF",
    text: "333333",
  },
  "charcoal-blue": {
    primary: "2C3E50",
    secondary: "3498DB",
    accent: "95A5A6",
    highlight: "E74C3C",
    background: "FFFFFF",
    text: "2C3E50",
  },
} satisfies Record<Theme, CorporateTheme>;

// pptxgenjs chart options shared by every visualization slide
export const CHART_DEFAULTS = {
  showLegend: false,
  showTitle: false,
  showValue: true,
  dataLabelFontSize: 10,
  catAxisLabelFontSize: 11,
  valAxisLabelFontSize: 11,
  showCatAxisTitle: false,
  showValAxisTitle: false,
  valGridLine: { style: "none" as const },
};

export const FONT_HIERARCHY = {
  title: { size: 28, bold: true, font: "Arial" },
  subtitle: { size: 18, bold: false, font: "Arial" },
  body: { size: 14, bold: false, font: "Arial" },
  chartTitle: { size: 20, bold: true, font: "Arial" },
  dataLabel: { size: 10, bold: false, font: "Arial" },
};
