import { OpenAiProvider } from '../../../src/adapters/llm/OpenAiProvider';

const mockList = jest.fn();
const mockCreate = jest.fn();
const mockConstructor = jest.fn();

jest.mock('openai', () => ({
  __esModule: true,
  default: jest.fn().mockImplementation((options: unknown) => {
    mockConstructor(options);
    return {
      models: { list: mockList },
      chat: { completions: { create: mockCreate } },
    };
  }),
}));

describe('OpenAiProvider', () => {
  beforeEach(() => {
    mockList.mockReset();
    mockCreate.mockReset();
    mockConstructor.mockReset();
  });

  test('is unhealthy without an API key', async () => {
    const provider = new OpenAiProvider('');

    await expect(provider.isHealthy()).resolves.toEqual({
      ok: false,
      message: 'OpenAI API key is not set.',
    });
    await expect(provider.generate('hi', 'gpt-4o-mini')).resolves.toEqual({
      text: '[OpenAI error] OpenAI API key is not set.',
    });
    expect(mockConstructor).not.toHaveBeenCalled();
  });

  test('generate sends one user message and returns the reply', async () => {
    mockCreate.mockResolvedValue({ choices: [{ message: { role: 'assistant', content: 'Hello!' } }] });
    const provider = new OpenAiProvider('test-secret');

    const result = await provider.generate('hi', 'gpt-4o-mini', 0.4);

    expect(result.text).toBe('Hello!');
    expect(mockCreate).toHaveBeenCalledWith({
      model: 'gpt-4o-mini',
      messages: [{ role: 'user', content: 'hi' }],
      temperature: 0.4,
    });
    expect(mockConstructor).toHaveBeenCalledWith({ apiKey: 'test-secret' });
  });

  test('passes a custom base URL and reuses the client', async () => {
    mockList.mockResolvedValue({ data: [{ id: 'gpt-4o' }, { id: 'gpt-4o-mini' }, { id: 'gpt-4o' }] });
    const provider = new OpenAiProvider('test-secret', 'https://proxy.example/v1');

    await expect(provider.listModels()).resolves.toEqual({ models: ['gpt-4o', 'gpt-4o-mini'], error: '' });
    await provider.listModels();

    expect(mockConstructor).toHaveBeenCalledTimes(1);
    expect(mockConstructor).toHaveBeenCalledWith({
      apiKey: 'test-secret',
      baseURL: 'https://proxy.example/v1',
    });
  });

  test('configure drops the cached client', async () => {
    mockList.mockResolvedValue({ data: [] });
    const provider = new OpenAiProvider('test-secret');
    await provider.listModels();

    provider.configure({ apiKey: 'other-secret' });
    await provider.listModels();

    expect(mockConstructor).toHaveBeenCalledTimes(2);
    expect(mockConstructor).toHaveBeenLastCalledWith({ apiKey: 'other-secret' });
  });

  test('API failures become error text', async () => {
    mockCreate.mockRejectedValue(new Error('429 Rate limit reached'));
    mockList.mockRejectedValue(new Error('401 Incorrect API key'));
    const provider = new OpenAiProvider('test-secret');

    await expect(provider.generate('hi', 'gpt-4o-mini')).resolves.toEqual({
      text: '[OpenAI error] 429 Rate limit reached',
    });
    await expect(provider.listModels()).resolves.toEqual({ models: [], error: '401 Incorrect API key' });
  });

  test('an empty reply yields empty text', async () => {
    mockCreate.mockResolvedValue({ choices: [] });
    const provider = new OpenAiProvider('test-secret');

    await expect(provider.generate('hi', 'gpt-4o-mini')).resolves.toMatchObject({ text: '' });
  });
});
