import type { LlmProviderPort } from "../ports/llm/LlmProviderPort";

export class ProviderRegistry {
  private readonly providers = new Map<string, LlmProviderPort>();

  register(provider: LlmProviderPort): void {
    this.providers.set(provider.id, provider);
  }

  get(id: string): LlmProviderPort | undefined {
    return this.providers.get(id);
  }

  listIds(): string[] {
    return Array.from(this.providers.keys()).sort();
  }

  listProviders(): LlmProviderPort[] {
    return this.listIds().flatMap((id) => {
      const provider = this.providers.get(id);
      return provider ? [provider] : [];
    });
  }

  /** Next id in sorted order, wrapping; an unknown `current` yields the first id. */
  nextId(current: string): string | null {
    const ids = this.listIds();
    if (!ids.length) return null;
    const index = ids.indexOf(current);
    return index < 0 ? ids[0] : ids[(index + 1) % ids.length];
  }
}
