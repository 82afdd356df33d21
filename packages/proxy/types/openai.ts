import type {
  ChatCompletion,
  ChatCompletionChunk,
  CompletionUsage,
} from "openai/resources";

export type Usage = CompletionUsage;

// The backend may report finish reasons outside OpenAI's enum, and a failed
// stream ends with "error", so finish_reason is widened to string.
export interface LinegateChunkDelta {
  role?: "assistant";
  content?: string;
  reasoning_content?: string;
}

export interface LinegateChunkChoice {
  index: number;
  delta: LinegateChunkDelta;
  finish_reason: string | null;
}

export type LinegateChatCompletionChunk = Omit<
  ChatCompletionChunk,
  "choices" | "usage"
> & {
  choices: Array<LinegateChunkChoice>;
  usage: Usage;
};

export interface LinegateCompletionMessage {
  role: "assistant";
  content: string;
  reasoning_content?: string;
}

export interface LinegateCompletionChoice {
  index: number;
  message: LinegateCompletionMessage;
  finish_reason: string;
  logprobs: null;
}

export type LinegateChatCompletion = Omit<
  ChatCompletion,
  "choices" | "usage"
> & {
  choices: Array<LinegateCompletionChoice>;
  usage: Usage;
};
