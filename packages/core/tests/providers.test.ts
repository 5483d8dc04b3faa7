import { beforeEach, describe, expect, it, vi } from 'vitest';
import {
  AnthropicVisionProvider,
  OpenAIVisionProvider,
  createSdkProvider,
  type VisionRequest,
} from '../src/vision';

const mocks = vi.hoisted(() => ({
  anthropicCreate: vi.fn(),
  openaiCreate: vi.fn(),
  clientOptions: vi.fn(),
}));

vi.mock('@anthropic-ai/sdk', () => ({
  default: vi.fn(function (options: unknown) {
    mocks.clientOptions('anthropic', options);
    return { messages: { create: mocks.anthropicCreate } };
  }),
}));

vi.mock('openai', () => ({
  default: vi.fn(function (options: unknown) {
    mocks.clientOptions('openai', options);
    return { chat: { completions: { create: mocks.openaiCreate } } };
  }),
}));

const request: VisionRequest = {
  imageBase64: 'aGVsbG8=',
  mediaType: 'image/jpeg',
  prompt: 'Convert this',
};

beforeEach(() => {
  vi.clearAllMocks();
});

describe('AnthropicVisionProvider', () => {
  it('sends the image before the prompt and joins text blocks', async () => {
    mocks.anthropicCreate.mockResolvedValue({
      content: [
        { type: 'text', text: '$a' },
        { type: 'text', text: '+b$' },
      ],
    });
    const provider = new AnthropicVisionProvider({ apiKey: 'test-secret', model: 'claude-test' });

    await expect(provider.call(request)).resolves.toBe('$a+b$');
    expect(mocks.clientOptions).toHaveBeenCalledWith('anthropic', { apiKey: 'test-secret' });
    expect(mocks.anthropicCreate).toHaveBeenCalledWith({
      model: 'claude-test',
      max_tokens: 4096,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'image', source: { type: 'base64', media_type: 'image/jpeg', data: 'aGVsbG8=' } },
            { type: 'text', text: 'Convert this' },
          ],
        },
      ],
    });
  });

  it('rejects an empty reply', async () => {
    mocks.anthropicCreate.mockResolvedValue({ content: [] });
    const provider = new AnthropicVisionProvider({ apiKey: 'test-secret', model: 'claude-test' });

    await expect(provider.call(request)).rejects.toThrow('Anthropic API returned empty content');
  });
});

describe('OpenAIVisionProvider', () => {
  it('sends the prompt and a data URL', async () => {
    mocks.openaiCreate.mockResolvedValue({ choices: [{ message: { content: '\\alpha' } }] });
    const provider = new OpenAIVisionProvider({ apiKey: 'test-secret', model: 'gpt-test', maxTokens: 100 });

    await expect(provider.call(request)).resolves.toBe('\\alpha');
    expect(mocks.openaiCreate).toHaveBeenCalledWith({
      model: 'gpt-test',
      max_tokens: 100,
      messages: [
        {
          role: 'user',
          content: [
            { type: 'text', text: 'Convert this' },
            { type: 'image_url', image_url: { url: 'data:image/jpeg;base64,aGVsbG8=' } },
          ],
        },
      ],
    });
  });

  it('rejects a reply without content', async () => {
    mocks.openaiCreate.mockResolvedValue({ choices: [{ message: { content: null } }] });
    const provider = new OpenAIVisionProvider({ apiKey: 'test-secret', model: 'gpt-test' });

    await expect(provider.call(request)).rejects.toThrow('OpenAI API returned empty content');
  });
});

describe('createSdkProvider', () => {
  it('builds the provider matching the name', () => {
    const provider = createSdkProvider('openai', { apiKey: 'test-secret', model: 'gpt-test' });

    expect(provider).toBeInstanceOf(OpenAIVisionProvider);
    expect(provider.model).toBe('gpt-test');
  });
});
