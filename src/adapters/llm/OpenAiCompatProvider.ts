import type {
  HealthStatus,
  LlmProviderPort,
  LlmResponse,
  ModelListing,
  ProviderEndpoint,
} from "../../ports/llm/LlmProviderPort";
import { describeError } from "../../shared/errors";
import { isRecord } from "../../shared/json";
import { defaultFetch, joinUrl, uniqueSorted, type FetchFn } from "./http";

// 401/403 still prove something is listening; 404 only means no model listing.
const REACHABLE_STATUSES = new Set([200, 401, 403, 404]);

function firstChoiceContent(data: unknown): string | null {
  if (!isRecord(data) || !Array.isArray(data.choices)) return null;
  const choice: unknown = data.choices[0];
  if (!isRecord(choice) || !isRecord(choice.message)) return null;
  const content = choice.message.content;
  return typeof content === "string" ? content : null;
}

/** Any server speaking the OpenAI REST dialect (llama.cpp, vLLM, LM Studio...). */
export class OpenAiCompatProvider implements LlmProviderPort {
  readonly id = "openai_compat";
  readonly displayName = "OpenAI-compatible server";

  constructor(
    private baseUrl = "http://127.0.0.1:8080",
    private apiKey = "",
    private readonly fetchFn: FetchFn = defaultFetch
  ) {}

  configure({ baseUrl, apiKey }: ProviderEndpoint): void {
    if (baseUrl !== undefined) this.baseUrl = baseUrl;
    if (apiKey !== undefined) this.apiKey = apiKey;
  }

  private headers(): Record<string, string> {
    const key = this.apiKey.trim();
    return key ? { Authorization: `Bearer ${key}` } : {};
  }

  async isHealthy(): Promise<HealthStatus> {
    try {
      const res = await this.fetchFn(joinUrl(this.baseUrl, "/v1/models"), {
        headers: this.headers(),
        signal: AbortSignal.timeout(3_000),
      });
      if (!REACHABLE_STATUSES.has(res.status)) {
        return { ok: false, message: `HTTP ${res.status}` };
      }
      return {
        ok: true,
        message: res.status === 404 ? "No /v1/models endpoint (404)." : "",
      };
    } catch (err) {
      return { ok: false, message: describeError(err) };
    }
  }

  async listModels(): Promise<ModelListing> {
    try {
      const res = await this.fetchFn(joinUrl(this.baseUrl, "/v1/models"), {
        headers: this.headers(),
        signal: AbortSignal.timeout(8_000),
      });
      if (res.status === 404) {
        return { models: [], error: "Server does not expose /v1/models (404)." };
      }
      if (!res.ok) {
        throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
      }
      const data = await res.json();
      const entries = isRecord(data) && Array.isArray(data.data) ? data.data : [];
      const ids: string[] = [];
      for (const entry of entries) {
        const id = isRecord(entry) && typeof entry.id === "string" ? entry.id.trim() : "";
        if (id) ids.push(id);
      }
      return { models: uniqueSorted(ids), error: "" };
    } catch (err) {
      return { models: [], error: describeError(err) };
    }
  }

  async generate(prompt: string, model: string, temperature = 0.7): Promise<LlmResponse> {
    try {
      const res = await this.fetchFn(joinUrl(this.baseUrl, "/v1/chat/completions"), {
        method: "POST",
        headers: { "Content-Type": "application/json", ...this.headers() },
        body: JSON.stringify({
          model,
          messages: [{ role: "user", content: prompt }],
          temperature,
        }),
        signal: AbortSignal.timeout(60_000),
      });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
      }
      const data = await res.json();
      return { text: firstChoiceContent(data) ?? JSON.stringify(data), raw: data };
    } catch (err) {
      return { text: `[Compat error] ${describeError(err)}` };
    }
  }
}
