// server/services/openai.ts
// Chat Completions + function calling. The agent talks to ChatBackend; this
// module maps those messages onto the OpenAI SDK types.

import OpenAI from "openai";
import type {
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import { config } from "../config";
import { ExternalServiceError, PreconditionError, getErrorMessage } from "../utils/errors";
import { logger } from "../utils/logger";

const MAX_COMPLETION_TOKENS = 9000;

/* ─────────────────────────── Types ─────────────────────────── */

export interface ToolCall {
  id: string;
  name: string;
  arguments: string;
}

export type ChatMessage =
  | { role: "system"; content: string }
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; toolCalls?: ToolCall[] }
  | { role: "tool"; toolCallId: string; content: string };

export interface ToolDefinition {
  name: string;
  description: string;
  parameters: Record<string, unknown>;
}

export interface AssistantTurn {
  content: string | null;
  toolCalls: ToolCall[];
}

export interface ChatBackend {
  complete(messages: ChatMessage[], tools: ToolDefinition[], traceId?: string): Promise<AssistantTurn>;
}

/* ─────────────────────────── Service ─────────────────────────── */

export class OpenAIService implements ChatBackend {
  private client: OpenAI | null = null;

  constructor(
    private apiKey: string = config.openaiApiKey,
    private model: string = config.model,
  ) {}

  initialize(apiKey: string, model?: string) {
    if (!apiKey) throw new PreconditionError("OpenAI API key missing");
    this.apiKey = apiKey;
    this.client = null;
    if (model) this.model = model;
  }

  private getClient(): OpenAI {
    if (!this.apiKey) throw new PreconditionError("OPENAI_API_KEY is not configured");
    if (!this.client) this.client = new OpenAI({ apiKey: this.apiKey });
    return this.client;
  }

  async complete(messages: ChatMessage[], tools: ToolDefinition[], traceId = "openaiService"): Promise<AssistantTurn> {
    const client = this.getClient();
    await logger.trace(traceId, `chat model=${this.model} tools=${tools.map((t) => t.name).join(",")}`);

    try {
      const resp = await client.chat.completions.create({
        model: this.model,
        messages: messages.map(toOpenAIMessage),
        tools: tools.length ? tools.map(toOpenAITool) : undefined,
        max_completion_tokens: MAX_COMPLETION_TOKENS,
      });

      const message = resp.choices[0]?.message;
      return {
        content: message?.content ?? null,
        toolCalls: (message?.tool_calls ?? []).map((tc) => ({
          id: tc.id,
          name: tc.function.name,
          arguments: tc.function.arguments,
        })),
      };
    } catch (err) {
      throw new ExternalServiceError("OpenAI", getErrorMessage(err));
    }
  }
}

/* ─────────────────────────── Mapping ─────────────────────────── */

function toOpenAIMessage(m: ChatMessage): ChatCompletionMessageParam {
  switch (m.role) {
    case "system":
      return { role: "system", content: m.content };
    case "user":
      return { role: "user", content: m.content };
    case "tool":
      return { role: "tool", tool_call_id: m.toolCallId, content: m.content };
    case "assistant":
      return m.toolCalls?.length
        ? {
            role: "assistant",
            content: m.content,
            tool_calls: m.toolCalls.map((tc) => ({
              id: tc.id,
              type: "function" as const,
              function: { name: tc.name, arguments: tc.arguments },
            })),
          }
        : { role: "assistant", content: m.content };
  }
}

function toOpenAITool(t: ToolDefinition): ChatCompletionTool {
  return {
    type: "function",
    function: { name: t.name, description: t.description, parameters: t.parameters },
  };
}

/* ─────────────────────────── Helpers ─────────────────────────── */

export function stripFence(s: string): string {
  return s.replace(/^```(?:json)?\s*|\s*```$/g, "").trim();
}

/** JSON.parse with fence stripping and a trailing-comma fixup. */
export function parseJsonLoose(raw: string): unknown {
  const s = stripFence(raw);
  try {
    return JSON.parse(s);
  } catch {
    // remove trailing commas before } or ]
    return JSON.parse(s.replace(/,\s*([}\]])/g, "$1"));
  }
}

export const openaiService = new OpenAIService();
