import OpenAI from 'openai';
import type { ChatMessage, InferenceClient } from './inference.js';

export interface OpenAIClientOptions {
  apiKey: string;
  model: string;
  baseURL?: string;
  temperature?: number;
}

export function createOpenAIClient(opts: OpenAIClientOptions): InferenceClient {
  const client = new OpenAI({ apiKey: opts.apiKey, baseURL: opts.baseURL });
  return {
    model: opts.model,
    async complete(messages: ChatMessage[]): Promise<string> {
      const completion = await client.chat.completions.create({
        model: opts.model,
        messages,
        temperature: opts.temperature ?? 0.1,
        max_tokens: 300,
        response_format: { type: 'json_object' },
      });
      return completion.choices[0]?.message?.content?.trim() ?? '';
    },
  };
}
