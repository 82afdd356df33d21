import type { ChatMessage } from "@schema";
import type { Usage } from "../types/openai";

// An approximation of BPE token density; not any real tokenizer.
export interface TokenEstimatorConfig {
  wordWeight: number;
  punctuationWeight: number;
  multibyteWeight: number;
  messageOverhead: number;
  requestOverhead: number;
  // Relative deviation above which the local estimate replaces the backend's figure.
  deviationThreshold: number;
}

export const DEFAULT_TOKEN_ESTIMATOR: TokenEstimatorConfig = {
  wordWeight: 1.3,
  punctuationWeight: 1.0,
  multibyteWeight: 1.5,
  messageOverhead: 4,
  requestOverhead: 3,
  deviationThreshold: 0.2,
};

const PUNCTUATION = new Set(".,;:!?()[]{}-_=+*/\\\"'`~@#$%^&<>|");
// Other Unicode spaces count as multibyte characters.
const WHITESPACE = new Set(" \t\n\r\f\v");

export function estimateTokens(
  text: string,
  config: TokenEstimatorConfig = DEFAULT_TOKEN_ESTIMATOR,
): number {
  if (text.trim() === "") {
    return 0;
  }

  let words = 0;
  let punctuation = 0;
  let multibyte = 0;
  let inWord = false;
  for (const ch of text) {
    if (WHITESPACE.has(ch)) {
      inWord = false;
    } else if (PUNCTUATION.has(ch)) {
      punctuation++;
      inWord = false;
    } else if (ch.charCodeAt(0) > 0x7f) {
      multibyte++;
      inWord = false;
    } else if (!inWord) {
      words++;
      inWord = true;
    }
  }

  const total = Math.floor(
    words * config.wordWeight +
      punctuation * config.punctuationWeight +
      multibyte * config.multibyteWeight,
  );
  return Math.max(total, 1);
}

export function estimateMessageTokens(
  messages: readonly ChatMessage[],
  config: TokenEstimatorConfig = DEFAULT_TOKEN_ESTIMATOR,
): number {
  let total = config.requestOverhead;
  for (const message of messages) {
    total +=
      estimateTokens(message.role, config) +
      estimateTokens(message.content, config) +
      config.messageOverhead;
  }
  return total;
}

export function makeUsage(
  promptTokens: number,
  completionTokens: number,
  details: Pick<Usage, "prompt_tokens_details" | "completion_tokens_details"> = {},
): Usage {
  return {
    prompt_tokens: promptTokens,
    completion_tokens: completionTokens,
    total_tokens: promptTokens + completionTokens,
    ...details,
  };
}

function reconcileField(
  name: string,
  server: number,
  local: number,
  threshold: number,
): number {
  if (server === 0 && local > 0) {
    return local;
  }
  if (server > 0 && local > 0) {
    const deviation = (server - local) / local;
    if (Math.abs(deviation) > threshold) {
      console.warn(
        `${name} deviates more than ${threshold * 100}% from the local estimate, using the estimate: server=${server}, local=${local}`,
      );
      return local;
    }
  }
  return server;
}

export function reconcileUsage(
  server: Usage,
  local: Usage,
  threshold: number = DEFAULT_TOKEN_ESTIMATOR.deviationThreshold,
): Usage {
  const details: Pick<
    Usage,
    "prompt_tokens_details" | "completion_tokens_details"
  > = {};
  if (server.prompt_tokens_details) {
    details.prompt_tokens_details = server.prompt_tokens_details;
  }
  if (server.completion_tokens_details) {
    details.completion_tokens_details = server.completion_tokens_details;
  }
  return makeUsage(
    reconcileField(
      "prompt_tokens",
      server.prompt_tokens,
      local.prompt_tokens,
      threshold,
    ),
    reconcileField(
      "completion_tokens",
      server.completion_tokens,
      local.completion_tokens,
      threshold,
    ),
    details,
  );
}

// Per-request accumulator. One instance per request, never shared.
export class TokenCounter {
  inputTokens = 0;
  outputTokens = 0;
  serverUsage: Usage | null = null;

  constructor(
    private readonly config: TokenEstimatorConfig = DEFAULT_TOKEN_ESTIMATOR,
  ) {}

  countInput(messages: readonly ChatMessage[]) {
    this.inputTokens = estimateMessageTokens(messages, this.config);
  }

  countOutput(text: string) {
    this.outputTokens += estimateTokens(text, this.config);
  }

  snapshot(): Usage {
    return makeUsage(this.inputTokens, this.outputTokens);
  }

  finalUsage(): Usage {
    return reconcileUsage(
      this.serverUsage ?? makeUsage(0, 0),
      this.snapshot(),
      this.config.deviationThreshold,
    );
  }
}
