import OpenAI from 'openai';
import type { ProviderSettings, VisionProvider, VisionRequest } from '../types';
import { DEFAULT_MAX_TOKENS } from '../types';

export class OpenAIVisionProvider implements VisionProvider {
  readonly name = 'openai' as const;
  readonly model: string;
  private client: OpenAI;
  private maxTokens: number;

  constructor(settings: ProviderSettings, client?: OpenAI) {
    this.model = settings.model;
    this.maxTokens = settings.maxTokens ?? DEFAULT_MAX_TOKENS;
    this.client = client ?? new OpenAI({ apiKey: settings.apiKey });
  }

  async call(request: VisionRequest): Promise<string> {
    const response = await this.client.chat.completions.create({
      model: this.model,
      max_tokens: this.maxTokens,
      messages: [
        {
          role: 'user',
          content: [
            {
              type: 'text',
              text: request.prompt,
            },
            {
              type: 'image_url',
              image_url: {
                url: `data:${request.mediaType};base64,${request.imageBase64}`,
              },
            },
          ],
        },
      ],
    });

    const content = response.choices[0]?.message.content;
    if (!content) {
      throw new Error('OpenAI API returned empty content');
    }

    return content;
  }
}
