import OpenAI from 'openai';
import { LLMConfig } from '../config';
import { LLMRequestError } from '../errors';
import { readHeader } from './headers';
import { CompletionRequest, LLMProvider } from './types';

const GROQ_BASE_URL = 'https://api.groq.com/openai/v1';

const DEFAULT_MODELS = {
    groq: 'llama-3.3-70b-versatile',
    openai: 'gpt-4o-mini',
} as const;

/**
 * Chat completions over the OpenAI wire format. Groq speaks the same
 * protocol, so it shares this provider with a different base URL.
 */
export class OpenAIProvider implements LLMProvider {
    name: 'openai' | 'groq';
    private client: OpenAI;
    private model: string;
    private abort = new AbortController();

    constructor(private config: LLMConfig, flavour: 'openai' | 'groq' = 'openai') {
        this.name = flavour;
        this.model = config.model || DEFAULT_MODELS[flavour];
        this.client = new OpenAI({
            apiKey: config.apiKey,
            baseURL: flavour === 'groq' ? GROQ_BASE_URL : undefined,
            timeout: config.requestTimeoutMs,
            maxRetries: 0,
        });
    }

    async complete(request: CompletionRequest): Promise<string> {
        try {
            const response = await this.client.chat.completions.create(
                {
                    model: this.model,
                    messages: [
                        { role: 'system', content: request.system },
                        { role: 'user', content: request.user },
                    ],
                    temperature: this.config.temperature,
                    max_tokens: this.config.maxOutputTokens,
                },
                { signal: this.abort.signal }
            );

            const content = response.choices[0]?.message?.content;
            if (typeof content !== 'string') {
                throw new LLMRequestError(`${this.name} returned no message content`, { status: 502 });
            }
            return content;
        } catch (error) {
            if (error instanceof LLMRequestError) throw error;
            if (error instanceof OpenAI.APIError) {
                throw new LLMRequestError(`${this.name} request failed: ${error.message}`, {
                    status: error.status,
                    retryAfter: readHeader(error.headers, 'retry-after'),
                    cause: error,
                });
            }
            throw new LLMRequestError(`${this.name} request failed: ${String(error)}`, { cause: error });
        }
    }

    close(): void {
        this.abort.abort();
    }
}
