// ============================================
// LLM Client — OpenAI Chat Completions adapter
// ============================================

import OpenAI from "openai";
import type {
  ChatCompletionCreateParamsNonStreaming,
  ChatCompletionMessageParam,
  ChatCompletionTool,
} from "openai/resources/chat/completions.js";
import { generationError } from "../lib/errors.js";
import { logger } from "../lib/logger.js";
import type {
  AssistantMessage,
  ChatMessage,
  GenerationRequest,
  GenerationResult,
  TextGenerator,
  ToolCall,
  ToolDeclaration,
} from "./types.js";

/**
 * LLM model configuration.
 * Pin versions for reproducibility.
 */
export const DEFAULT_CHAT_MODEL = "gpt-4o-mini";

export function createOpenAIClient(apiKey: string): OpenAI {
  return new OpenAI({ apiKey });
}

interface CompletionToolCall {
  id: string;
  type: string;
  function: { name: string; arguments: string };
}

interface CompletionResponse {
  choices: Array<{
    finish_reason: string | null;
    message: {
      content: string | null;
      tool_calls?: CompletionToolCall[];
    };
  }>;
}

/** The slice of the OpenAI client this module calls */
export interface ChatCompletionsClient {
  chat: {
    completions: {
      create(body: ChatCompletionCreateParamsNonStreaming): Promise<CompletionResponse>;
    };
  };
}

export interface OpenAIGeneratorOptions {
  model?: string;
  temperature?: number;
  maxTokens?: number;
}

export class OpenAITextGenerator implements TextGenerator {
  private readonly model: string;
  private readonly temperature: number;
  private readonly maxTokens: number;

  constructor(
    private readonly client: ChatCompletionsClient,
    options: OpenAIGeneratorOptions = {}
  ) {
    this.model = options.model ?? DEFAULT_CHAT_MODEL;
    this.temperature = options.temperature ?? 0.2;
    this.maxTokens = options.maxTokens ?? 1000;
  }

  async generate(request: GenerationRequest): Promise<GenerationResult> {
    const body: ChatCompletionCreateParamsNonStreaming = {
      model: this.model,
      messages: request.messages.map(toOpenAIMessage),
      temperature: request.temperature ?? this.temperature,
      max_tokens: request.maxTokens ?? this.maxTokens,
      ...(request.tools && request.tools.length > 0
        ? {
            tools: request.tools.map(toOpenAITool),
            tool_choice: request.toolChoice ?? "auto",
            // One call per turn; each call id needs its own tool result message
            parallel_tool_calls: false,
          }
        : {}),
    };

    let response: CompletionResponse;
    try {
      response = await this.client.chat.completions.create(body);
    } catch (err) {
      logger.error("LLM completion failed", {
        stage: "llm",
        model: this.model,
        error: err,
      });
      throw generationError("Chat completion request failed", err);
    }

    const choice = response.choices[0];
    if (!choice) {
      throw generationError("No response choice from LLM");
    }

    const toolCalls: ToolCall[] = (choice.message.tool_calls ?? [])
      .filter((tc) => tc.type === "function")
      .map((tc) => ({
        id: tc.id,
        name: tc.function.name,
        arguments: tc.function.arguments,
      }));

    const text = choice.message.content ?? "";
    const message: AssistantMessage = {
      role: "assistant",
      content: text,
      ...(toolCalls.length > 0 && { toolCalls }),
    };

    logger.debug("LLM completion received", {
      stage: "llm",
      model: this.model,
      finishReason: choice.finish_reason,
      toolCalls: toolCalls.map((tc) => tc.name),
      textLength: text.length,
    });

    return { text, toolCall: toolCalls[0], message };
  }
}

function toOpenAITool(tool: ToolDeclaration): ChatCompletionTool {
  return {
    type: "function",
    function: {
      name: tool.name,
      description: tool.description,
      parameters: {
        type: tool.parameters.type,
        properties: tool.parameters.properties,
        required: tool.parameters.required,
      },
    },
  };
}

function toOpenAIMessage(message: ChatMessage): ChatCompletionMessageParam {
  switch (message.role) {
    case "system":
      return { role: "system", content: message.content };
    case "user":
      return { role: "user", content: message.content };
    case "assistant":
      if (message.toolCalls && message.toolCalls.length > 0) {
        return {
          role: "assistant",
          content: message.content || null,
          tool_calls: message.toolCalls.map((tc) => ({
            id: tc.id,
            type: "function",
            function: { name: tc.name, arguments: tc.arguments },
          })),
        };
      }
      return { role: "assistant", content: message.content };
    case "tool":
      return { role: "tool", tool_call_id: message.toolCallId, content: message.content };
  }
}
