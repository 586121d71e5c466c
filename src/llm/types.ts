export interface CompletionRequest {
    system: string;
    user: string;
}

export interface LLMProvider {
    /**
     * meaningful name for the provider
     */
    name: string;

    /**
     * Run one chat completion. Failures are thrown as `LLMRequestError`;
     * the caller owns retries.
     */
    complete(request: CompletionRequest): Promise<string>;

    /**
     * Count tokens with the backend's own tokenizer, where one is available
     * locally.
     */
    countTokens?(text: string): number;

    /**
     * Release sockets and pending requests.
     */
    close(): void;
}
