import OpenAI from 'openai';
import { TranslationProvider } from '../types/collaborators';
import { complete } from './openai';

const SYSTEM_PROMPT =
  'You translate single Spanish words or short phrases into English for a vocabulary list. ' +
  'Reply with the English gloss only, at most five words, no punctuation around it.';

/**
 * Spanish → English glosses for words missing from the frequency list.
 */
export class OpenAiTranslationProvider implements TranslationProvider {
  private cache: Map<string, string> = new Map();
  private readonly CACHE_SIZE_LIMIT = 1000;

  constructor(private readonly openai: OpenAI) {}

  async translate(text: string): Promise<string> {
    const key = text.trim().toLowerCase();
    const cached = this.cache.get(key);
    if (cached !== undefined) {
      return cached;
    }

    const reply = await complete(this.openai, SYSTEM_PROMPT, key, 30);
    const translation = reply.replace(/^["'«]+|["'»\s.]+$/g, '');
    this.remember(key, translation);
    return translation;
  }

  private remember(key: string, value: string): void {
    if (this.cache.size >= this.CACHE_SIZE_LIMIT) {
      const oldest = this.cache.keys().next();
      if (!oldest.done) {
        this.cache.delete(oldest.value);
      }
    }
    this.cache.set(key, value);
  }
}
