import Anthropic from '@anthropic-ai/sdk';
import { LLMConfig } from '../config';
import { LLMRequestError } from '../errors';
import { readHeader } from './headers';
import { CompletionRequest, LLMProvider } from './types';

export class AnthropicProvider implements LLMProvider {
    name = 'anthropic';
    private client: Anthropic;
    private abort = new AbortController();

    constructor(private config: LLMConfig) {
        this.client = new Anthropic({
            apiKey: config.apiKey,
            timeout: config.requestTimeoutMs,
            maxRetries: 0,
        });
    }

    async complete(request: CompletionRequest): Promise<string> {
        try {
            const msg = await this.client.messages.create(
                {
                    model: this.config.model || 'claude-3-5-haiku-20241022',
                    max_tokens: this.config.maxOutputTokens,
                    temperature: this.config.temperature,
                    system: request.system,
                    messages: [{ role: 'user', content: request.user }],
                },
                { signal: this.abort.signal }
            );

            // Anthropic returns an array of content blocks
            return msg.content
                .map(block => (block.type === 'text' ? block.text : ''))
                .join('');
        } catch (error) {
            if (error instanceof Anthropic.APIError) {
                throw new LLMRequestError(`anthropic request failed: ${error.message}`, {
                    status: error.status,
                    retryAfter: readHeader(error.headers, 'retry-after'),
                    cause: error,
                });
            }
            throw new LLMRequestError(`anthropic request failed: ${String(error)}`, { cause: error });
        }
    }

    close(): void {
        this.abort.abort();
    }
}
