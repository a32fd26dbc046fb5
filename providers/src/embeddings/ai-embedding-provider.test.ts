import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import { createAiEmbeddingProvider } from './ai-embedding-provider.js';

const mocks = vi.hoisted(() => ({
  embedMany: vi.fn(),
  createOpenAI: vi.fn(),
  embedding: vi.fn(),
}));

vi.mock('@ai-sdk/openai', () => ({
  createOpenAI: mocks.createOpenAI,
}));

vi.mock('ai', () => ({
  embedMany: (...args: unknown[]) => mocks.embedMany(...args),
}));

describe('createAiEmbeddingProvider', () => {
  beforeEach(() => {
    vi.clearAllMocks();
    mocks.embedding.mockReturnValue('embedding-model');
    mocks.createOpenAI.mockReturnValue({ embedding: mocks.embedding });
    mocks.embedMany.mockResolvedValue({ embeddings: [[1, 0], [0, 1]] });
  });

  afterEach(() => {
    vi.unstubAllEnvs();
  });

  it('embeds texts with the configured model', async () => {
    const provider = createAiEmbeddingProvider({ apiKey: 'test-secret', model: 'text-embedding-3-large' });

    const vectors = await provider.embed(['first', 'second']);

    expect(provider.name).toBe('openai:text-embedding-3-large');
    expect(vectors).toEqual([[1, 0], [0, 1]]);
    expect(mocks.createOpenAI).toHaveBeenCalledWith({ apiKey: 'test-secret' });
    expect(mocks.embedding).toHaveBeenCalledWith('text-embedding-3-large');
    expect(mocks.embedMany).toHaveBeenCalledWith({ model: 'embedding-model', values: ['first', 'second'] });
  });

  it('defaults to the small embedding model and the environment key', async () => {
    vi.stubEnv('OPENAI_API_KEY', 'test-env-secret');
    const provider = createAiEmbeddingProvider();

    await provider.embed(['hello']);
    await provider.embed(['again']);

    expect(provider.name).toBe('openai:text-embedding-3-small');
    expect(mocks.createOpenAI).toHaveBeenCalledTimes(1);
    expect(mocks.createOpenAI).toHaveBeenCalledWith({ apiKey: 'test-env-secret' });
  });

  it('skips the request for an empty batch', async () => {
    const provider = createAiEmbeddingProvider({ apiKey: 'test-secret' });

    await expect(provider.embed([])).resolves.toEqual([]);
    expect(mocks.embedMany).not.toHaveBeenCalled();
  });

  it('fails with S002 when no key is available', async () => {
    vi.stubEnv('OPENAI_API_KEY', '');
    const provider = createAiEmbeddingProvider();

    await expect(provider.embed(['hello'])).rejects.toMatchObject({ code: 'S002' });
  });
});
