import { ProviderRegistry } from '../../src/app/ProviderRegistry';
import type { LlmProviderPort } from '../../src/ports/llm/LlmProviderPort';

function makeProvider(id: string): LlmProviderPort {
  return {
    id,
    displayName: id,
    isHealthy: jest.fn().mockResolvedValue({ ok: true, message: '' }),
    listModels: jest.fn().mockResolvedValue({ models: [], error: '' }),
    generate: jest.fn().mockResolvedValue({ text: '' }),
    configure: jest.fn(),
  };
}

describe('ProviderRegistry', () => {
  const registry = new ProviderRegistry();
  registry.register(makeProvider('openai_compat'));
  registry.register(makeProvider('openai'));
  registry.register(makeProvider('ollama'));

  test('lists ids sorted', () => {
    expect(registry.listIds()).toEqual(['ollama', 'openai', 'openai_compat']);
    expect(registry.listProviders().map((p) => p.id)).toEqual(['ollama', 'openai', 'openai_compat']);
  });

  test('nextId cycles through sorted ids and wraps', () => {
    expect(registry.nextId('ollama')).toBe('openai');
    expect(registry.nextId('openai')).toBe('openai_compat');
    expect(registry.nextId('openai_compat')).toBe('ollama');
  });

  test('nextId falls back to the first id for an unknown provider', () => {
    expect(registry.nextId('anthropic')).toBe('ollama');
  });

  test('nextId is null when nothing is registered', () => {
    expect(new ProviderRegistry().nextId('openai')).toBeNull();
  });

  test('get returns undefined for unknown ids', () => {
    expect(registry.get('openai')?.id).toBe('openai');
    expect(registry.get('missing')).toBeUndefined();
  });
});
