import { STATUS_CODES } from "node:http";
import { performance } from "node:perf_hooks";
import OpenAI, { APIConnectionError, APIConnectionTimeoutError, APIError } from "openai";
import type { ChatRequest, GatewayState } from "../types.js";
import { describeErrorChain } from "../utils/errors.js";
import { buildEndpointCandidates, normalizeBaseUrl, uniqueInOrder } from "../utils/endpoint-candidates.js";
import { logDebug } from "../utils/logger.js";
import { decodeChatStream, readLines } from "./stream-decoder.js";

export const DEFAULT_BASE_URL = "http://127.0.0.1:1234/v1";
export const FALLBACK_API_KEY = "lm-studio";
export const DEFAULT_MODELS_TTL = 15_000;
const DEFAULT_MODELS_TIMEOUT = 5_000;
const DEFAULT_CHAT_TIMEOUT = 60_000;
const CHAT_TEMPERATURE = 0.3;
const CHAT_MAX_TOKENS = 500;
const CHAT_SYSTEM_PROMPT =
  "You are a concise assistant helping with git operations. Be brief and direct.";
const CONNECT_ERROR_MESSAGE = "Cannot connect to the inference server. Is it running?";
const NO_MODELS_MESSAGE = "No models returned.";
const UNKNOWN_ERROR_MESSAGE = "Unknown error";
const TIMEOUT_MESSAGE = "Request timed out";
const ERROR_PREFIX = "Error: ";

type GatewayFetch = NonNullable<ConstructorParameters<typeof OpenAI>[0]>["fetch"];

export interface GatewayClientOptions {
  baseURL?: string;
  apiKey?: string;
  modelsTtlMs?: number;
  modelsTimeoutMs?: number;
  chatTimeoutMs?: number;
  /** Monotonic clock in milliseconds. */
  now?: () => number;
  fetch?: GatewayFetch;
}

/** Why a candidate was given up on. Only `connect` and `http` move on to the next one. */
export type GatewayFailure =
  | { kind: "connect"; detail: string }
  | { kind: "http"; status: number; reason: string }
  | { kind: "other"; message: string };

class MalformedResponseError extends Error {
  constructor(message: string) {
    super(message);
    this.name = "MalformedResponseError";
  }
}

interface ChatMessage {
  role: "system" | "user";
  content: string;
}

interface ChatCompletionBody {
  messages: ChatMessage[];
  temperature: number;
  max_tokens: number;
  stream: boolean;
  model?: string;
}

function isRecord(value: unknown): value is Record<string, unknown> {
  return typeof value === "object" && value !== null && !Array.isArray(value);
}

function isAuthStatus(error: unknown): boolean {
  return error instanceof APIError && (error.status === 401 || error.status === 403);
}

export function classifyFailure(error: unknown): GatewayFailure {
  // Timeouts stop probing: the request already reached a server.
  if (error instanceof APIConnectionTimeoutError) {
    return { kind: "other", message: TIMEOUT_MESSAGE };
  }
  if (error instanceof APIConnectionError) {
    return { kind: "connect", detail: describeErrorChain(error) };
  }
  if (error instanceof APIError && typeof error.status === "number") {
    return { kind: "http", status: error.status, reason: STATUS_CODES[error.status] ?? "" };
  }
  return { kind: "other", message: describeErrorChain(error) };
}

export function formatFailure(failure: GatewayFailure | null): string {
  if (!failure) {
    return UNKNOWN_ERROR_MESSAGE;
  }
  switch (failure.kind) {
    case "connect":
      return CONNECT_ERROR_MESSAGE;
    case "http":
      return `${failure.status} ${failure.reason}`.trim();
    case "other":
    default:
      return failure.message || UNKNOWN_ERROR_MESSAGE;
  }
}

function isRetryable(failure: GatewayFailure): boolean {
  return failure.kind === "connect" || failure.kind === "http";
}

/**
 * Accepts either a bare list or `{ data: [...] }`; each entry contributes its
 * `id`, `name` or `model`, whichever is set first.
 */
export function isModelListPayload(payload: unknown): boolean {
  return Array.isArray(payload) || (isRecord(payload) && Array.isArray(payload.data));
}

export function extractModelIds(payload: unknown): string[] {
  const items: unknown = isRecord(payload) ? payload.data : payload;
  if (!Array.isArray(items)) {
    return [];
  }

  const models: string[] = [];
  for (const item of items) {
    if (!isRecord(item)) {
      continue;
    }
    const modelId: unknown = item.id || item.name || item.model;
    if (typeof modelId === "string" && modelId) {
      models.push(modelId);
    }
  }
  return models;
}

export function extractMessageContent(payload: unknown): string {
  if (isRecord(payload) && Array.isArray(payload.choices)) {
    const choice: unknown = payload.choices[0];
    if (isRecord(choice) && isRecord(choice.message)) {
      const content = choice.message.content;
      if (typeof content === "string") {
        return content;
      }
    }
  }
  throw new MalformedResponseError("Malformed chat completion response");
}

export function buildChatBody(request: ChatRequest, stream: boolean): ChatCompletionBody {
  const body: ChatCompletionBody = {
    messages: [
      { role: "system", content: CHAT_SYSTEM_PROMPT },
      { role: "user", content: `${request.prompt}\n\n\`\`\`\n${request.context}\n\`\`\`` }
    ],
    temperature: CHAT_TEMPERATURE,
    max_tokens: CHAT_MAX_TOKENS,
    stream
  };
  if (request.model) {
    body.model = request.model;
  }
  return body;
}

export class GatewayClient {
  private readonly configuredBaseURL: string;
  private readonly apiKey: string;
  private readonly modelsTtlMs: number;
  private readonly modelsTimeoutMs: number;
  private readonly chatTimeoutMs: number;
  private readonly now: () => number;
  private readonly fetchImpl?: GatewayFetch;
  private readonly clients = new Map<string, OpenAI>();

  private stickyBaseURL: string;
  private catalog: string[] = [];
  private refreshedAt: number | null = null;
  private refreshInFlight: Promise<string[]> | null = null;
  private isConnected = false;
  private error: string | null = null;

  constructor(options: GatewayClientOptions = {}) {
    this.configuredBaseURL = normalizeBaseUrl(options.baseURL?.trim() || DEFAULT_BASE_URL);
    this.stickyBaseURL = this.configuredBaseURL;
    this.apiKey = options.apiKey?.trim() || FALLBACK_API_KEY;
    this.modelsTtlMs = options.modelsTtlMs ?? DEFAULT_MODELS_TTL;
    this.modelsTimeoutMs = options.modelsTimeoutMs ?? DEFAULT_MODELS_TIMEOUT;
    this.chatTimeoutMs = options.chatTimeoutMs ?? DEFAULT_CHAT_TIMEOUT;
    this.now = options.now ?? (() => performance.now());
    this.fetchImpl = options.fetch;
  }

  get connected(): boolean {
    return this.isConnected;
  }

  get lastError(): string | null {
    return this.error;
  }

  get models(): string[] {
    return [...this.catalog];
  }

  get baseURL(): string {
    return this.stickyBaseURL;
  }

  get state(): GatewayState {
    return {
      connected: this.isConnected,
      lastError: this.error,
      baseURL: this.stickyBaseURL,
      models: this.models,
      refreshedAt: this.refreshedAt
    };
  }

  /** Sticky URL first, then every variant of the configured URL. */
  candidates(): string[] {
    return uniqueInOrder([this.stickyBaseURL, ...buildEndpointCandidates(this.configuredBaseURL)]);
  }

  isCatalogStale(): boolean {
    if (this.refreshedAt === null) {
      return true;
    }
    return this.now() - this.refreshedAt > this.modelsTtlMs;
  }

  async refreshModels(force = false): Promise<string[]> {
    if (!force && !this.isCatalogStale()) {
      return this.models;
    }

    while (this.refreshInFlight) {
      await this.refreshInFlight;
      if (!force && !this.isCatalogStale()) {
        return this.models;
      }
    }

    this.refreshInFlight = this.probeModels();
    try {
      return await this.refreshInFlight;
    } finally {
      this.refreshInFlight = null;
    }
  }

  async chat(request: ChatRequest): Promise<string> {
    const body = buildChatBody(request, false);
    let lastFailure: GatewayFailure | null = null;

    for (const candidate of this.candidates()) {
      try {
        const payload = await this.withAuthRetry(candidate, (headers) =>
          this.clientFor(candidate).post<unknown>("/chat/completions", {
            body,
            headers,
            timeout: this.chatTimeoutMs
          })
        );
        const content = extractMessageContent(payload);
        this.stickyBaseURL = candidate;
        return content;
      } catch (error) {
        lastFailure = classifyFailure(error);
        logDebug(`chat via ${candidate} failed: ${formatFailure(lastFailure)}`);
        if (!isRetryable(lastFailure)) {
          break;
        }
      }
    }

    return `${ERROR_PREFIX}${formatFailure(lastFailure)}`;
  }

  /**
   * Streams content deltas. Credentials are sent on the first request since a
   * stream cannot be replayed once bytes have arrived; a 401/403 skips to the
   * next candidate.
   */
  async *chatStream(request: ChatRequest): AsyncGenerator<string, void, void> {
    const body = buildChatBody(request, true);
    let lastFailure: GatewayFailure | null = null;

    for (const candidate of this.candidates()) {
      let response: Response;
      try {
        response = await this.clientFor(candidate)
          .post<unknown>("/chat/completions", {
            body,
            timeout: this.chatTimeoutMs
          })
          .asResponse();
      } catch (error) {
        lastFailure = classifyFailure(error);
        logDebug(`stream via ${candidate} failed: ${formatFailure(lastFailure)}`);
        if (isRetryable(lastFailure)) {
          continue;
        }
        break;
      }

      this.stickyBaseURL = candidate;
      try {
        yield* decodeChatStream(readLines(response.body));
      } catch (error) {
        yield `${ERROR_PREFIX}${formatFailure(classifyFailure(error))}`;
      }
      return;
    }

    yield `${ERROR_PREFIX}${formatFailure(lastFailure)}`;
  }

  private clientFor(baseURL: string): OpenAI {
    let client = this.clients.get(baseURL);
    if (!client) {
      client = new OpenAI({
        baseURL,
        apiKey: this.apiKey,
        maxRetries: 0,
        fetch: this.fetchImpl
      });
      this.clients.set(baseURL, client);
    }
    return client;
  }

  /**
   * Runs the request without credentials, then once more with the bearer
   * token if the server answered 401/403.
   */
  private async withAuthRetry<T>(
    candidate: string,
    send: (headers: Record<string, string | null>) => PromiseLike<T>
  ): Promise<T> {
    try {
      return await send({ Authorization: null });
    } catch (error) {
      if (!isAuthStatus(error)) {
        throw error;
      }
      logDebug(`${candidate} requires authorization, retrying with bearer token`);
      return send({});
    }
  }

  private async probeModels(): Promise<string[]> {
    let lastFailure: GatewayFailure | null = null;

    for (const candidate of this.candidates()) {
      try {
        const payload = await this.withAuthRetry(candidate, (headers) =>
          this.clientFor(candidate).get<unknown>("/models", {
            headers,
            timeout: this.modelsTimeoutMs
          })
        );
        if (!isModelListPayload(payload)) {
          throw new MalformedResponseError("Malformed models response");
        }
        const models = extractModelIds(payload);
        this.catalog = models;
        this.isConnected = true;
        this.error = models.length > 0 ? null : NO_MODELS_MESSAGE;
        this.refreshedAt = this.now();
        this.stickyBaseURL = candidate;
        return this.models;
      } catch (error) {
        lastFailure = classifyFailure(error);
        logDebug(`models via ${candidate} failed: ${formatFailure(lastFailure)}`);
        if (!isRetryable(lastFailure)) {
          break;
        }
      }
    }

    this.catalog = [];
    this.isConnected = false;
    this.error = formatFailure(lastFailure);
    this.refreshedAt = this.now();
    return this.models;
  }
}
