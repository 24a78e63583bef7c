// lib/completion.ts
import OpenAI, {
  APIConnectionError,
  APIConnectionTimeoutError,
  APIError,
  APIUserAbortError,
} from "openai";
import { ServiceUnavailableError } from "./errors";

export type CompletionRequest = {
  system?: string;
  prompt: string;
  /** ask for a JSON object (response_format json_object) */
  json?: boolean;
  temperature?: number;
  maxTokens?: number;
};

export type CompletionOptions = { signal?: AbortSignal };

/** An opaque remote text-completion service. Resolves to the completion text. */
export interface CompletionService {
  readonly model: string;
  complete(req: CompletionRequest, opts?: CompletionOptions): Promise<string>;
}

/** The slice of the OpenAI client this module calls. */
export interface ChatClient {
  chat: {
    completions: {
      create(
        body: OpenAI.Chat.ChatCompletionCreateParamsNonStreaming,
        options?: { signal?: AbortSignal; maxRetries?: number; timeout?: number }
      ): Promise<OpenAI.Chat.ChatCompletion>;
    };
  };
}

export type OpenAICompletionOptions = {
  apiKey?: string;
  model: string;
  timeoutMs?: number;
  /** injected in tests; built from apiKey otherwise */
  client?: ChatClient;
};

export function toServiceUnavailable(err: unknown): ServiceUnavailableError {
  if (err instanceof ServiceUnavailableError) return err;
  // timeout subclasses connection error, so it goes first
  if (err instanceof APIConnectionTimeoutError || err instanceof APIUserAbortError) {
    return new ServiceUnavailableError("timeout", "Completion service timed out", { cause: err });
  }
  if (err instanceof APIConnectionError) {
    return new ServiceUnavailableError("network", `Cannot reach completion service: ${err.message}`, {
      cause: err,
    });
  }
  if (err instanceof APIError) {
    if (err.status === 401 || err.status === 403) {
      return new ServiceUnavailableError("auth", "Completion service rejected the API key", { cause: err });
    }
    if (err.status === 429) {
      return new ServiceUnavailableError("rate_limit", "Completion service rate limit reached", { cause: err });
    }
    return new ServiceUnavailableError(
      "upstream",
      `Completion service error${err.status ? ` ${err.status}` : ""}: ${err.message}`,
      { cause: err }
    );
  }
  if (err instanceof Error && err.name === "AbortError") {
    return new ServiceUnavailableError("timeout", "Completion service timed out", { cause: err });
  }
  const msg = err instanceof Error ? err.message : "request failed";
  return new ServiceUnavailableError("network", `Completion request failed: ${msg}`, { cause: err });
}

export function createOpenAICompletionService(opts: OpenAICompletionOptions): CompletionService {
  let client: ChatClient | undefined = opts.client;

  const getClient = (): ChatClient => {
    if (client) return client;
    if (!opts.apiKey) {
      throw new ServiceUnavailableError("auth", "OPENAI_API_KEY is not configured");
    }
    client = new OpenAI({ apiKey: opts.apiKey, maxRetries: 0, timeout: opts.timeoutMs });
    return client;
  };

  return {
    model: opts.model,
    async complete(req, callOpts) {
      const c = getClient();

      const messages: OpenAI.Chat.ChatCompletionMessageParam[] = [];
      if (req.system) messages.push({ role: "system", content: req.system });
      messages.push({ role: "user", content: req.prompt });

      let completion: OpenAI.Chat.ChatCompletion;
      try {
        completion = await c.chat.completions.create(
          {
            model: opts.model,
            messages,
            temperature: req.temperature ?? 0.7,
            ...(req.maxTokens ? { max_tokens: req.maxTokens } : {}),
            ...(req.json ? { response_format: { type: "json_object" as const } } : {}),
          },
          // retry policy lives in the dispatcher
          { signal: callOpts?.signal, maxRetries: 0, timeout: opts.timeoutMs }
        );
      } catch (err) {
        throw toServiceUnavailable(err);
      }

      const text = completion.choices?.[0]?.message?.content ?? "";
      if (!text.trim()) {
        throw new ServiceUnavailableError("upstream", "Completion service returned empty content");
      }
      return text;
    },
  };
}
