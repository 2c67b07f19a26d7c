// server/services/visualization.ts
import { visualizationRequestSchema, type Theme } from "@shared/schema";
import { getErrorMessage } from "../utils/errors";
import { parseJsonLoose } from "./openai";
import { pptxService, type PptxService, type VisualizationDeckResult } from "./pptx";

export type VisualizationOutcome =
  | { ok: true; result: VisualizationDeckResult; message: string }
  | { ok: false; message: string };

/** Validates a chart/table request (JSON text or object) and renders the chart deck. */
export class VisualizationService {
  constructor(private readonly decks: Pick<PptxService, "buildVisualizationDeck"> = pptxService) {}

  async visualize(input: unknown, fallbackTheme?: Theme): Promise<VisualizationOutcome> {
    let raw = input;
    if (typeof input === "string") {
      try {
        raw = parseJsonLoose(input);
      } catch (err) {
        return { ok: false, message: `Error: Invalid JSON format. ${getErrorMessage(err)}` };
      }
    }

    if (fallbackTheme && isRecord(raw) && raw.theme === undefined) {
      raw = { ...raw, theme: fallbackTheme };
    }

    const parsed = visualizationRequestSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((i) => `${i.path.join(".") || "request"}: ${i.message}`).join("; ");
      return { ok: false, message: `Error generating visualization: ${issues}` };
    }

    try {
      const result = await this.decks.buildVisualizationDeck(parsed.data);
      return {
        ok: true,
        result,
        message:
          `Professional visualization presentation with ${result.charts_created} charts and ` +
          `${result.tables_created} tables (${result.slide_count} slides) saved to ${result.pptx_path}`,
      };
    } catch (err) {
      return { ok: false, message: `Error generating visualization: ${getErrorMessage(err)}` };
    }
  }
}

function isRecord(v: unknown): v is Record<string, unknown> {
  return typeof v === "object" && v !== null && !Array.isArray(v);
}

export const visualizationService = new VisualizationService();
