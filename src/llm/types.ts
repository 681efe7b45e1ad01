// ============================================
// Generation protocol — vendor-neutral message and tool shapes
// Adapters translate these to a concrete SDK
// ============================================

/** JSON Schema subset used for tool parameters */
export interface JsonSchemaProperty {
  type: "string" | "number" | "integer" | "boolean";
  description?: string;
  enum?: string[];
}

export interface ToolParameters {
  type: "object";
  properties: Record<string, JsonSchemaProperty>;
  required: string[];
}

/** A callable the model may request instead of answering in text */
export interface ToolDeclaration {
  name: string;
  description: string;
  parameters: ToolParameters;
}

/** A structured invocation request emitted by the model */
export interface ToolCall {
  id: string;
  name: string;
  /** Raw JSON arguments as produced by the model; may be malformed */
  arguments: string;
}

export interface SystemMessage {
  role: "system";
  content: string;
}

export interface UserMessage {
  role: "user";
  content: string;
}

export interface AssistantMessage {
  role: "assistant";
  content: string;
  toolCalls?: ToolCall[];
}

/** Second round-trip: the result of executing a tool call */
export interface ToolResultMessage {
  role: "tool";
  toolCallId: string;
  name: string;
  content: string;
}

export type ChatMessage = SystemMessage | UserMessage | AssistantMessage | ToolResultMessage;

export type ToolChoice = "auto" | "none";

export interface GenerationRequest {
  messages: ChatMessage[];
  tools?: ToolDeclaration[];
  toolChoice?: ToolChoice;
  temperature?: number;
  maxTokens?: number;
}

export interface GenerationResult {
  text: string;
  /** First tool call, when the model asked for one */
  toolCall?: ToolCall;
  /** The model's raw reply, to be echoed back before a tool result */
  message: AssistantMessage;
}

/** prompt/conversation → generated text or tool call */
export interface TextGenerator {
  generate(request: GenerationRequest): Promise<GenerationResult>;
}
