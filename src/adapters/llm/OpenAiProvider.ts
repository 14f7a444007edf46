import OpenAI from "openai";
import type {
  HealthStatus,
  LlmProviderPort,
  LlmResponse,
  ModelListing,
  ProviderEndpoint,
} from "../../ports/llm/LlmProviderPort";
import { describeError } from "../../shared/errors";
import { uniqueSorted } from "./http";

export class OpenAiProvider implements LlmProviderPort {
  readonly id = "openai";
  readonly displayName = "OpenAI";

  private client: OpenAI | null = null;

  constructor(
    private apiKey = "",
    private baseUrl = ""
  ) {}

  configure({ apiKey, baseUrl }: ProviderEndpoint): void {
    if (apiKey !== undefined) this.apiKey = apiKey.trim();
    if (baseUrl !== undefined) this.baseUrl = baseUrl.trim();
    this.client = null;
  }

  private getClient(): OpenAI {
    if (this.client) return this.client;
    if (!this.apiKey) {
      throw new Error("OpenAI API key is not set.");
    }
    this.client = new OpenAI({
      apiKey: this.apiKey,
      ...(this.baseUrl ? { baseURL: this.baseUrl } : {}),
    });
    return this.client;
  }

  async isHealthy(): Promise<HealthStatus> {
    try {
      this.getClient();
      return { ok: true, message: "" };
    } catch (err) {
      return { ok: false, message: describeError(err) };
    }
  }

  async listModels(): Promise<ModelListing> {
    try {
      const page = await this.getClient().models.list();
      const ids = page.data.map((model) => model.id).filter((id) => id.length > 0);
      return { models: uniqueSorted(ids), error: "" };
    } catch (err) {
      return { models: [], error: describeError(err) };
    }
  }

  async generate(prompt: string, model: string, temperature = 0.7): Promise<LlmResponse> {
    try {
      const resp = await this.getClient().chat.completions.create({
        model,
        messages: [{ role: "user", content: prompt }],
        temperature,
      });
      const text = resp.choices[0]?.message?.content ?? "";
      return { text, raw: resp };
    } catch (err) {
      return { text: `[OpenAI error] ${describeError(err)}` };
    }
  }
}
