export interface HealthStatus {
  ok: boolean;
  message: string;
}

export interface ModelListing {
  models: string[];
  /** Empty when listing succeeded. */
  error: string;
}

export interface LlmResponse {
  text: string;
  raw?: unknown;
}

/** Connection fields; whatever is left out keeps its current value. */
export interface ProviderEndpoint {
  baseUrl?: string;
  apiKey?: string;
}

/**
 * None of these calls reject: failures come back as `ok: false`, an `error`
 * string, or a bracketed error text from `generate`.
 */
export interface LlmProviderPort {
  readonly id: string;
  readonly displayName: string;
  isHealthy(): Promise<HealthStatus>;
  listModels(): Promise<ModelListing>;
  generate(prompt: string, model: string, temperature?: number): Promise<LlmResponse>;
  configure(endpoint: ProviderEndpoint): void;
}
