import { GenerativeModel, GoogleGenerativeAI, GoogleGenerativeAIFetchError } from '@google/generative-ai';
import { LLMConfig } from '../config';
import { LLMRequestError } from '../errors';
import { CompletionRequest, LLMProvider } from './types';

export class GoogleProvider implements LLMProvider {
    name = 'google';
    private genAI: GoogleGenerativeAI;
    private abort = new AbortController();

    constructor(private config: LLMConfig) {
        this.genAI = new GoogleGenerativeAI(config.apiKey);
    }

    private model(system: string): GenerativeModel {
        return this.genAI.getGenerativeModel(
            {
                model: this.config.model || 'gemini-2.0-flash',
                systemInstruction: system,
                generationConfig: {
                    temperature: this.config.temperature,
                    maxOutputTokens: this.config.maxOutputTokens,
                },
            },
            { timeout: this.config.requestTimeoutMs }
        );
    }

    async complete(request: CompletionRequest): Promise<string> {
        try {
            const result = await this.model(request.system).generateContent(request.user, {
                signal: this.abort.signal,
            });
            return result.response.text();
        } catch (error) {
            if (error instanceof GoogleGenerativeAIFetchError) {
                throw new LLMRequestError(`google request failed: ${error.message}`, {
                    status: error.status,
                    cause: error,
                });
            }
            throw new LLMRequestError(`google request failed: ${String(error)}`, { cause: error });
        }
    }

    close(): void {
        this.abort.abort();
    }
}
