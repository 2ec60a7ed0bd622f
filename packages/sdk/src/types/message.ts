/**
 * Core message types for the conversation history.
 */

export type MessageRole = "system" | "human" | "ai" | "tool-result";

/** A segment of mixed text/image content. */
export type ContentPart =
  | { type: "text"; text: string }
  | { type: "image"; url: string; detail?: "auto" | "low" | "high" };

/** Message payload: plain text or a list of content parts. */
export type MessageContent = string | ContentPart[];

/** A structured tool invocation carried by an `ai` message. */
export interface ToolInvocation {
  id: string;
  name: string;
  args: Record<string, unknown>;
}

export interface SystemMessage {
  role: "system";
  content: MessageContent;
}

/** State or observation fed to the model. */
export interface HumanMessage {
  role: "human";
  content: MessageContent;
}

/** Model output, optionally carrying tool invocations. */
export interface AiMessage {
  role: "ai";
  content: MessageContent;
  toolCalls?: ToolInvocation[];
}

/** Acknowledgment of a tool invocation, addressed by its id. */
export interface ToolResultMessage {
  role: "tool-result";
  content: MessageContent;
  toolCallId: string;
}

/** A single message in the history, discriminated by role. */
export type HistoryMessage =
  | SystemMessage
  | HumanMessage
  | AiMessage
  | ToolResultMessage;

/**
 * A structured decision produced by the model. Wrapped verbatim into a
 * tool invocation; never inspected beyond the summary label.
 */
export type AgentDecision = Record<string, unknown>;
