import type { ChatRequest } from "@schema";
import type { LinegateChatCompletion, Usage } from "../types/openai";
import type { ResponseCache } from "./cache";
import { translateLine } from "./providers/backend";
import type { TokenCounter } from "./tokens";
import type { UpstreamResponse } from "./transport";

export interface AssembleOptions {
  upstream: UpstreamResponse;
  signal: AbortSignal;
  counter: TokenCounter;
  id: string;
  created: number;
  // Client-facing model name.
  model: string;
  request: ChatRequest;
  cache?: ResponseCache;
}

export interface AssembledCompletion {
  completion: LinegateChatCompletion;
  body: string;
}

// Returns null when the client went away before the body was assembled.
export async function assembleCompletion({
  upstream,
  signal,
  counter,
  id,
  created,
  model,
  request,
  cache,
}: AssembleOptions): Promise<AssembledCompletion | null> {
  const text = await upstream.text();

  let content = "";
  let reasoning = "";
  let finishReason = "stop";
  let serverUsage: Usage | null = null;
  for (const line of text.split("\n")) {
    if (signal.aborted) {
      console.info("Client disconnected during response processing");
      return null;
    }

    const event = translateLine(line);
    switch (event.type) {
      case "content":
        content += event.text;
        break;
      case "reasoning":
        reasoning += event.text;
        break;
      case "finish":
        if (event.finishReason) {
          finishReason = event.finishReason;
        }
        break;
      case "usage":
        serverUsage = event.usage;
        break;
      case "ignored":
        break;
    }
  }
  if (signal.aborted) {
    return null;
  }

  counter.countOutput(content);
  if (reasoning) {
    counter.countOutput(reasoning);
  }
  counter.serverUsage = serverUsage;
  const usage = counter.finalUsage();
  console.log(
    `Token usage: server=${JSON.stringify(serverUsage)}, local=${JSON.stringify(counter.snapshot())}, reported=${JSON.stringify(usage)}`,
  );

  const completion: LinegateChatCompletion = {
    id,
    object: "chat.completion",
    created,
    model,
    choices: [
      {
        index: 0,
        message: {
          role: "assistant",
          content,
          ...(reasoning ? { reasoning_content: reasoning } : {}),
        },
        finish_reason: finishReason,
        logprobs: null,
      },
    ],
    usage,
  };
  const body = JSON.stringify(completion);
  await cache?.set(request, body);
  return { completion, body };
}
