import { LLMConfig } from '../config';
import { LLMProvider } from './types';
import { GoogleProvider } from './googleProvider';
import { OpenAIProvider } from './openaiProvider';
import { AnthropicProvider } from './anthropicProvider';

export class LLMFactory {
    /**
     * A fresh provider per call; the digest service owns and closes it.
     */
    static create(config: LLMConfig): LLMProvider {
        console.log(`🧠 Initializing LLM Provider: ${config.provider}`);

        switch (config.provider) {
            case 'groq':
                return new OpenAIProvider(config, 'groq');
            case 'openai':
                return new OpenAIProvider(config, 'openai');
            case 'anthropic':
                return new AnthropicProvider(config);
            case 'google':
                return new GoogleProvider(config);
            default: {
                const unknown: never = config.provider;
                throw new Error(`Unknown LLM provider: ${String(unknown)}`);
            }
        }
    }
}
