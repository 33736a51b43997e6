export interface CompletionOptions {
  // Aborted when the caller gives up or the call times out
  signal?: AbortSignal;
}

// A remote text-completion endpoint. Implementations throw ProviderError on failure.
export interface ProviderAdapter {
  readonly name: string;
  complete(prompt: string, systemPrompt: string, options?: CompletionOptions): Promise<string>;
}
