import Anthropic from '@anthropic-ai/sdk';
import type { ProviderSettings, VisionProvider, VisionRequest } from '../types';
import { DEFAULT_MAX_TOKENS } from '../types';

export class AnthropicVisionProvider implements VisionProvider {
  readonly name = 'anthropic' as const;
  readonly model: string;
  private client: Anthropic;
  private maxTokens: number;

  constructor(settings: ProviderSettings, client?: Anthropic) {
    this.model = settings.model;
    this.maxTokens = settings.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.client = client ?? new Anthropic({ apiKey: settings.apiKey });
  }

  async call(request: VisionRequest): Promise<string> {
    const message = await this.client.messages.create({
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'image',
              source: {
                type: 'base64',
                media_type: request.mediaType,
                data: request.imageBase64,
              },
            },
            {
              type: 'text',
              text: request.prompt,
            },
          ],
        },
      ],
    });

    const text = message.content
      .map((block) => (block.type === 'text' ? block.text : ''))
      .join('');

    if (!text.trim()) {
      throw new Error('Anthropic API returned empty content');
    }

    return text;
  }
}
