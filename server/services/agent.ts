// server/services/agent.ts
// Research agent: a function-calling loop over search, Wikipedia and the
// export tools. Files produced by tool calls are recorded in a per-run ledger;
// any requested format still missing at the end is exported from the final answer.

import { z } from "zod";
import {
  researchResponseSchema,
  type OutputFormat,
  type ResearchRequest,
  type ResearchResponse,
} from "@shared/schema";
import { config } from "../config";
import { buildSystemMessage, buildUserMessage } from "../prompt/research";
import { getErrorMessage } from "../utils/errors";
import { fileStorage, type FileStorage } from "../utils/fileStorage";
import { logger as defaultLogger, type Logger } from "../utils/logger";
import type { ResearchOutcome } from "./jobs";
import { openaiService, parseJsonLoose, type ChatBackend, type ChatMessage, type ToolCall, type ToolDefinition } from "./openai";
import { exportPdf } from "./pdf/compositor";
import { pptxService, type PptxService } from "./pptx";
import { searcherService, type SearcherService } from "./searcher";
import { visualizationService, type VisualizationService } from "./visualization";
import { wikipediaService, type WikipediaService } from "./wikipedia";

/* ─────────────────────────── Types ─────────────────────────── */

export interface ResearchAgentDeps {
  chat: ChatBackend;
  searcher: Pick<SearcherService, "searchForAgent">;
  wikipedia: Pick<WikipediaService, "lookup">;
  decks: Pick<PptxService, "buildResearchDeck">;
  visualizer: Pick<VisualizationService, "visualize">;
  storage: FileStorage;
  logger: Logger;
  maxTurns: number;
}

interface ArtifactLedger {
  pdfPath?: string;
  pptxPath?: string;
  visualizationPath?: string;
}

interface RunContext {
  jobId: string;
  request: ResearchRequest;
  ledger: ArtifactLedger;
}

interface AgentTool {
  definition: ToolDefinition;
  run(args: unknown, ctx: RunContext): Promise<string>;
}

export const SUBMIT_TOOL = "submit_research";

const QueryArgs = z.object({ query: z.string().min(1) });
const SaveArgs = z.object({ data: z.string(), title: z.string(), filename: z.string().optional() });
const VisualizeArgs = z.object({ data: z.union([z.string(), z.record(z.unknown())]) });

const SAVE_PARAMETERS = {
  type: "object",
  properties: {
    data: { type: "string", description: "The complete report in markdown." },
    title: { type: "string", description: "Descriptive report title." },
    filename: { type: "string", description: "Optional output filename." },
  },
  required: ["data", "title"],
};

const QUERY_PARAMETERS = {
  type: "object",
  properties: { query: { type: "string" } },
  required: ["query"],
};

/* ─────────────────────────── Agent ─────────────────────────── */

export class ResearchAgent {
  private readonly deps: ResearchAgentDeps;

  constructor(deps: Partial<ResearchAgentDeps> = {}) {
    this.deps = {
      chat: deps.chat ?? openaiService,
      searcher: deps.searcher ?? searcherService,
      wikipedia: deps.wikipedia ?? wikipediaService,
      decks: deps.decks ?? pptxService,
      visualizer: deps.visualizer ?? visualizationService,
      storage: deps.storage ?? fileStorage,
      logger: deps.logger ?? defaultLogger,
      maxTurns: deps.maxTurns ?? config.maxAgentTurns,
    };
  }

  /** Tools offered for a request: exports only for requested formats, charts only on request. */
  toolsFor(request: ResearchRequest): Map<string, AgentTool> {
    const tools = new Map<string, AgentTool>();
    const add = (tool: AgentTool) => tools.set(tool.definition.name, tool);

    add(this.searchTool());
    add(this.wikipediaTool());
    if (request.output_formats.includes("pdf")) add(this.pdfTool());
    if (request.output_formats.includes("pptx")) add(this.pptxTool());
    if (request.include_visualization) add(this.visualizeTool());
    return tools;
  }

  async run(request: ResearchRequest, jobId: string): Promise<ResearchOutcome> {
    const { chat, logger, maxTurns } = this.deps;
    const ctx: RunContext = { jobId, request, ledger: {} };
    const tools = this.toolsFor(request);
    const definitions = [...[...tools.values()].map((t) => t.definition), SUBMIT_DEFINITION];
    const used = new Set<string>();

    const messages: ChatMessage[] = [
      { role: "system", content: buildSystemMessage(request) },
      { role: "user", content: buildUserMessage(request) },
    ];

    await logger.stepStart(jobId, "Agent loop");
    let response: ResearchResponse | undefined;

    for (let turn = 1; turn <= maxTurns && !response; turn++) {
      const reply = await chat.complete(messages, definitions, jobId);
      messages.push({ role: "assistant", content: reply.content, toolCalls: reply.toolCalls });

      if (!reply.toolCalls.length) {
        response = parseFinalAnswer(reply.content);
        if (!response) {
          messages.push({ role: "user", content: `Finish by calling ${SUBMIT_TOOL} with your findings.` });
        }
        continue;
      }

      for (const call of reply.toolCalls) {
        if (call.name === SUBMIT_TOOL) {
          const submitted = parseSubmission(call);
          response = submitted.response ?? response;
          messages.push({ role: "tool", toolCallId: call.id, content: submitted.message });
          continue;
        }
        const content = await this.invoke(tools, call, ctx);
        if (tools.has(call.name)) used.add(call.name);
        messages.push({ role: "tool", toolCallId: call.id, content });
      }
    }

    if (!response) {
      await logger.trace(jobId, `No final answer after ${maxTurns} turns`);
      throw new Error("Research agent failed to generate response");
    }
    await logger.stepEnd(jobId, "Agent loop");

    const final: ResearchResponse = {
      ...response,
      tools_used: [...new Set([...response.tools_used, ...used])],
    };
    await this.exportMissing(final, ctx);

    return { response: final, ...ctx.ledger };
  }

  /* ---------------- tool dispatch ---------------- */

  private async invoke(tools: Map<string, AgentTool>, call: ToolCall, ctx: RunContext): Promise<string> {
    const tool = tools.get(call.name);
    if (!tool) return `Error: unknown tool "${call.name}"`;

    let args: unknown;
    try {
      args = parseJsonLoose(call.arguments || "{}");
    } catch (err) {
      return `Error: invalid arguments for ${call.name}: ${getErrorMessage(err)}`;
    }

    await this.deps.logger.trace(ctx.jobId, `Tool call: ${call.name}`);
    try {
      return await tool.run(args, ctx);
    } catch (err) {
      const message = getErrorMessage(err);
      await this.deps.logger.trace(ctx.jobId, `Tool ${call.name} failed: ${message}`);
      return `Error running ${call.name}: ${message}`;
    }
  }

  private searchTool(): AgentTool {
    return {
      definition: {
        name: "search_web",
        description: "Search the web for information. Returns results with titles, snippets, and URLs.",
        parameters: QUERY_PARAMETERS,
      },
      run: async (args) => this.deps.searcher.searchForAgent(QueryArgs.parse(args).query),
    };
  }

  private wikipediaTool(): AgentTool {
    return {
      definition: {
        name: "wikipedia_lookup",
        description: "Search Wikipedia for information. Returns a short summary with the article URL.",
        parameters: QUERY_PARAMETERS,
      },
      run: async (args) => this.deps.wikipedia.lookup(QueryArgs.parse(args).query),
    };
  }

  private pdfTool(): AgentTool {
    return {
      definition: {
        name: "save_to_pdf",
        description:
          "Save the research report as a paginated PDF with cover page, table of contents, numbered sections and references.",
        parameters: SAVE_PARAMETERS,
      },
      run: async (args, ctx) => {
        const { data, title, filename } = SaveArgs.parse(args);
        const result = await exportPdf({ data, title, filename }, { storage: this.deps.storage });
        ctx.ledger.pdfPath = result.filePath;
        await this.deps.logger.delivery(ctx.jobId, result.filename);
        return `Research report (${result.pageCount} pages) successfully saved to ${result.filePath}`;
      },
    };
  }

  private pptxTool(): AgentTool {
    return {
      definition: {
        name: "save_to_pptx",
        description: "Convert the research report into a PowerPoint presentation, one slide per section.",
        parameters: SAVE_PARAMETERS,
      },
      run: async (args, ctx) => {
        const { data, title, filename } = SaveArgs.parse(args);
        const result = await this.deps.decks.buildResearchDeck({ data, title, filename });
        ctx.ledger.pptxPath = result.filePath;
        await this.deps.logger.delivery(ctx.jobId, result.filename);
        return `Professional presentation successfully saved to ${result.filePath}`;
      },
    };
  }

  private visualizeTool(): AgentTool {
    return {
      definition: {
        name: "visualize_data",
        description:
          "Create a chart presentation from numerical findings. data is a JSON string with presentation_title, theme, executive_summary, charts, tables and section_dividers.",
        parameters: {
          type: "object",
          properties: { data: { type: "string", description: "Visualization request as JSON." } },
          required: ["data"],
        },
      },
      run: async (args, ctx) => {
        const outcome = await this.deps.visualizer.visualize(VisualizeArgs.parse(args).data, ctx.request.theme);
        if (outcome.ok) {
          ctx.ledger.visualizationPath = outcome.result.pptx_path;
          await this.deps.logger.delivery(ctx.jobId, outcome.result.filename);
        }
        return outcome.message;
      },
    };
  }

  /* ---------------- fallback exports ---------------- */

  private async exportMissing(response: ResearchResponse, ctx: RunContext) {
    const missing = ctx.request.output_formats.filter((f) => !producedFormat(ctx.ledger, f));
    if (!missing.length) return;

    const title = response.topic.trim() || ctx.request.query;
    const body = fallbackReport(title, response);
    await this.deps.logger.trace(ctx.jobId, `Exporting fallback ${missing.join(", ")} from the final answer`);

    for (const format of missing) {
      try {
        if (format === "pdf") {
          const result = await exportPdf({ data: body, title }, { storage: this.deps.storage });
          ctx.ledger.pdfPath = result.filePath;
          await this.deps.logger.delivery(ctx.jobId, result.filename);
        } else {
          const result = await this.deps.decks.buildResearchDeck({ data: body, title });
          ctx.ledger.pptxPath = result.filePath;
          await this.deps.logger.delivery(ctx.jobId, result.filename);
        }
      } catch (err) {
        await this.deps.logger.trace(ctx.jobId, `Fallback ${format} export failed: ${getErrorMessage(err)}`);
      }
    }
  }
}

/* ─────────────────────────── Helpers ─────────────────────────── */

export const SUBMIT_DEFINITION: ToolDefinition = {
  name: SUBMIT_TOOL,
  description: "Submit the final structured research answer. Call exactly once, after exporting.",
  parameters: {
    type: "object",
    properties: {
      topic: { type: "string" },
      summary: { type: "string" },
      sources: { type: "array", items: { type: "string" } },
      tools_used: { type: "array", items: { type: "string" } },
    },
    required: ["topic", "summary", "sources", "tools_used"],
  },
};

function parseSubmission(call: ToolCall): { response?: ResearchResponse; message: string } {
  try {
    const parsed = researchResponseSchema.safeParse(parseJsonLoose(call.arguments));
    if (parsed.success) return { response: parsed.data, message: "Research submitted." };
    return { message: `Error: ${parsed.error.issues.map((i) => `${i.path.join(".")}: ${i.message}`).join("; ")}` };
  } catch (err) {
    return { message: `Error: invalid arguments for ${SUBMIT_TOOL}: ${getErrorMessage(err)}` };
  }
}

/** A final message without tool calls counts when it is the structured answer as JSON. */
export function parseFinalAnswer(content: string | null): ResearchResponse | undefined {
  if (!content?.trim()) return undefined;
  try {
    const parsed = researchResponseSchema.safeParse(parseJsonLoose(content));
    return parsed.success ? parsed.data : undefined;
  } catch {
    return undefined;
  }
}

function producedFormat(ledger: ArtifactLedger, format: OutputFormat): boolean {
  return format === "pdf" ? Boolean(ledger.pdfPath) : Boolean(ledger.pptxPath);
}

export function fallbackReport(title: string, response: ResearchResponse): string {
  const lines = [`# ${title}`, "", "## Summary", response.summary.trim()];
  if (response.sources.length) {
    lines.push("", "## Sources", ...response.sources.map((s) => `- ${s}`));
  }
  return lines.join("\n");
}

export const researchAgent = new ResearchAgent();
