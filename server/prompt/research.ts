// server/prompt/research.ts
// Prompt builder for the research agent. Instructions follow the tools that
// are actually offered for the request.

import type { ResearchRequest } from "@shared/schema";

const VISUALIZATION_GUIDE = [
  "OPTIONAL VISUALIZATION:",
  "- If the research contains numerical comparisons, time-based trends, proportions or rankings, call visualize_data.",
  "- Skip it for purely qualitative research (narratives, concept explanations).",
  "- The data argument is a JSON string with:",
  "  presentation_title; theme (navy-teal for tech/general, navy-gold for finance, charcoal-blue for modern topics);",
  "  executive_summary: 3-5 key findings, most important first;",
  "  charts: [{chart_type: bar|line|pie|doughnut|area, title, data: number[], labels: string[], layout: full-chart|chart-insight, insight_text}];",
  "  tables: [{title, headers, rows, highlight_rows}] (optional);",
  "  section_dividers: section titles shown before charts (optional).",
  "- Chart titles state the insight (\"AWS leads with 32% market share\"), not a label (\"Market Share 2024\").",
  "- chart-insight layout requires insight_text.",
].join("\n");

export function buildSystemMessage(request: ResearchRequest): string {
  const exports: string[] = [];
  if (request.output_formats.includes("pdf")) {
    exports.push("- save_to_pdf: the full report as a PDF, with a descriptive title.");
  }
  if (request.output_formats.includes("pptx")) {
    exports.push("- save_to_pptx: the same report as a slide deck, with a descriptive title.");
  }

  return [
    "You are a research assistant that writes research reports.",
    "Answer the user query and use the tools you need: search_web for current sources, wikipedia_lookup for background.",
    "",
    "REQUIRED EXPORTS after research is complete:",
    ...exports,
    "The data argument of every export is the complete report in markdown:",
    "# / ## / ### headings, - bullets, | tables |, ``` code fences, and source URLs written out in full.",
    "Use --- on its own line for a page break.",
    "",
    ...(request.include_visualization ? [VISUALIZATION_GUIDE, ""] : []),
    "FINISH by calling submit_research exactly once with topic, summary, sources (URLs you used) and tools_used.",
  ].join("\n");
}

export function buildUserMessage(request: ResearchRequest): string {
  return [
    request.query,
    "",
    `Preferred deck theme: ${request.theme}.`,
  ].join("\n");
}
