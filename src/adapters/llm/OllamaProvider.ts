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

export class OllamaProvider implements LlmProviderPort {
  readonly id = "ollama";
  readonly displayName = "Ollama (local)";

  constructor(
    private baseUrl = "http://127.0.0.1:11434",
    private readonly fetchFn: FetchFn = defaultFetch
  ) {}

  /** Ollama has no auth; only the base URL applies. */
  configure({ baseUrl }: Pick<ProviderEndpoint, "baseUrl">): void {
    if (baseUrl !== undefined) this.baseUrl = baseUrl;
  }

  async isHealthy(): Promise<HealthStatus> {
    try {
      const res = await this.fetchFn(joinUrl(this.baseUrl, "/api/tags"), {
        signal: AbortSignal.timeout(3_000),
      });
      if (res.status >= 400) {
        return { ok: false, message: `HTTP ${res.status}` };
      }
      return { ok: true, message: "" };
    } catch (err) {
      return { ok: false, message: describeError(err) };
    }
  }

  async listModels(): Promise<ModelListing> {
    try {
      const res = await this.fetchFn(joinUrl(this.baseUrl, "/api/tags"), {
        signal: AbortSignal.timeout(8_000),
      });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
      }
      const data = await res.json();
      const entries = isRecord(data) && Array.isArray(data.models) ? data.models : [];
      const names: string[] = [];
      for (const entry of entries) {
        const name = isRecord(entry) && typeof entry.name === "string" ? entry.name.trim() : "";
        if (name) names.push(name);
      }
      return { models: uniqueSorted(names), error: "" };
    } catch (err) {
      return { models: [], error: describeError(err) };
    }
  }

  async generate(prompt: string, model: string, temperature = 0.7): Promise<LlmResponse> {
    try {
      const res = await this.fetchFn(joinUrl(this.baseUrl, "/api/generate"), {
        method: "POST",
        headers: { "Content-Type": "application/json" },
        body: JSON.stringify({ model, prompt, stream: false, options: { temperature } }),
        signal: AbortSignal.timeout(60_000),
      });
      if (!res.ok) {
        throw new Error(`HTTP ${res.status} ${res.statusText}`.trim());
      }
      const data = await res.json();
      const text = isRecord(data) && data.response ? String(data.response) : "";
      return { text, raw: data };
    } catch (err) {
      return { text: `[Ollama error] ${describeError(err)}` };
    }
  }
}
