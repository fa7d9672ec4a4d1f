// api/src/llm.ts
// Generative backend contract and its OpenAI chat-completions implementation.

import OpenAI from "openai";
import type {
  ChatCompletion,
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions";
import { config } from "./config.js";
import { errorMessage } from "./middleware/errorHandler.js";

// ============================================================================
// CONTRACT
// ============================================================================

export type JsonSchemaObject = {
  type: "object";
  properties: Record<string, unknown>;
  required?: string[];
};

export type ToolSpec = {
  name: string;
  description: string;
  parameters: JsonSchemaObject;
};

export type ToolCall = {
  id: string;
  name: string;
  input: Record<string, unknown>;
};

/** Turns that follow the initial prompt in a multi-step exchange. */
export type ChatTurn =
  | { role: "user"; content: string }
  | { role: "assistant"; content: string | null; toolCall?: ToolCall }
  | { role: "tool"; toolCallId: string; content: string };

export type GenerateRequest = {
  prompt: string;
  system?: string;
  tools?: ToolSpec[];
  history?: ChatTurn[];
  /** ask for a bare JSON object (ignored when tools are offered) */
  json?: boolean;
  temperature?: number;
  maxOutputTokens?: number;
};

export type LlmUsage = {
  model: string;
  latencyMs: number;
  promptTokens: number | null;
  completionTokens: number | null;
};

export type GenerateResult =
  | { success: true; text: string | null; toolCall: ToolCall | null; usage?: LlmUsage }
  | { success: false; error: string };

export interface GenerativeBackend {
  readonly supportsTools: boolean;
  generate(req: GenerateRequest): Promise<GenerateResult>;
}

// ============================================================================
// OPENAI
// ============================================================================

export function createOpenAIClient(apiKey: string | undefined = config.openaiApiKey): OpenAI | null {
  if (!apiKey) return null;
  // no SDK retries: one failed call ends the attempt
  return new OpenAI({ apiKey, timeout: config.llmTimeoutMs, maxRetries: 0 });
}

export function safeParseObject(raw: string): Record<string, unknown> {
  try {
    const v: unknown = JSON.parse(raw || "{}");
    if (typeof v === "object" && v !== null && !Array.isArray(v)) {
      return Object.fromEntries(Object.entries(v));
    }
  } catch (err) {
    console.warn("[LLM] tool arguments are not valid JSON:", errorMessage(err));
  }
  return {};
}

function toMessages(req: GenerateRequest): ChatCompletionMessageParam[] {
  const messages: ChatCompletionMessageParam[] = [];
  if (req.system) messages.push({ role: "system", content: req.system });
  messages.push({ role: "user", content: req.prompt });

  for (const turn of req.history ?? []) {
    switch (turn.role) {
      case "user":
        messages.push({ role: "user", content: turn.content });
        break;
      case "assistant":
        if (turn.toolCall) {
          messages.push({
            role: "assistant",
            content: turn.content,
            tool_calls: [
              {
                id: turn.toolCall.id,
                type: "function",
                function: { name: turn.toolCall.name, arguments: JSON.stringify(turn.toolCall.input) },
              },
            ],
          });
        } else {
          messages.push({ role: "assistant", content: turn.content ?? "" });
        }
        break;
      case "tool":
        messages.push({ role: "tool", tool_call_id: turn.toolCallId, content: turn.content });
        break;
    }
  }
  return messages;
}

function toTools(tools: ToolSpec[]): ChatCompletionTool[] {
  return tools.map((t) => ({
    type: "function",
    function: { name: t.name, description: t.description, parameters: t.parameters },
  }));
}

function statusOf(err: unknown): number | null {
  if (err instanceof OpenAI.APIError) return typeof err.status === "number" ? err.status : null;
  return null;
}

function isUnsupportedParam(err: unknown, param: string): boolean {
  if (statusOf(err) !== 400) return false;
  const msg = errorMessage(err).toLowerCase();
  return msg.includes(param) && (msg.includes("unsupported parameter") || msg.includes("unsupported value"));
}

export class OpenAIGenerativeBackend implements GenerativeBackend {
  readonly supportsTools = true;

  constructor(
    private readonly client: OpenAI | null,
    private readonly model: string = config.llmModel
  ) {}

  async generate(req: GenerateRequest): Promise<GenerateResult> {
    if (!this.client) return { success: false, error: "OPENAI_API_KEY is not set" };

    const tools = req.tools?.length ? toTools(req.tools) : undefined;
    const params: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: toMessages(req),
      temperature: req.temperature ?? 0.7,
      max_tokens: req.maxOutputTokens ?? 2000,
      ...(tools ? { tools, tool_choice: "auto" as const } : {}),
      ...(!tools && req.json ? { response_format: { type: "json_object" as const } } : {}),
    };

    const t0 = Date.now();
    try {
      const completion = await this.create(params);
      const usage: LlmUsage = {
        model: this.model,
        latencyMs: Date.now() - t0,
        promptTokens: completion.usage?.prompt_tokens ?? null,
        completionTokens: completion.usage?.completion_tokens ?? null,
      };
      const message = completion.choices[0]?.message;
      if (!message) return { success: false, error: "empty completion" };

      const call = message.tool_calls?.find((tc) => tc.type === "function");
      if (call) {
        return {
          success: true,
          text: message.content?.trim() || null,
          toolCall: { id: call.id, name: call.function.name, input: safeParseObject(call.function.arguments) },
          usage,
        };
      }
      const text = (message.content ?? message.refusal ?? "").trim();
      console.log(`[LLM] ${this.model} ok in ${usage.latencyMs}ms (tokens=${usage.completionTokens ?? "?"})`);
      return { success: true, text: text || null, toolCall: null, usage };
    } catch (err) {
      console.error(`[LLM] ${this.model} call failed:`, errorMessage(err));
      return { success: false, error: errorMessage(err) };
    }
  }

  // Some models reject temperature or max_tokens; retry once without them.
  private async create(params: ChatCompletionCreateParamsNonStreaming): Promise<ChatCompletion> {
    if (!this.client) throw new Error("OpenAI client is not configured");
    try {
      return await this.client.chat.completions.create(params);
    } catch (err) {
      if (isUnsupportedParam(err, "temperature")) {
        const { temperature: _t, ...rest } = params;
        return this.client.chat.completions.create(rest);
      }
      if (isUnsupportedParam(err, "max_tokens")) {
        const { max_tokens, ...rest } = params;
        return this.client.chat.completions.create({ ...rest, max_completion_tokens: max_tokens });
      }
      throw err;
    }
  }
}
