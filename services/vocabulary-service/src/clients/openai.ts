import OpenAI from 'openai';
import { config } from '../config/environment';

let client: OpenAI | null = null;

export function getOpenAI(): OpenAI {
  if (!client) {
    client = new OpenAI({
      apiKey: config.openai.apiKey,
      timeout: config.openai.timeoutMs
    });
  }
  return client;
}

/** Single-turn completion; resolves the trimmed reply text or '' when empty. */
export async function complete(openai: OpenAI, system: string, user: string, maxTokens: number): Promise<string> {
  const completion = await openai.chat.completions.create({
    model: config.openai.model,
    messages: [
      { role: 'system', content: system },
      { role: 'user', content: user }
    ],
    max_tokens: maxTokens,
    temperature: 0.2
  });
  return completion.choices[0]?.message?.content?.trim() || '';
}
