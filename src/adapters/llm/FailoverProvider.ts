import { ProviderError, errorMessage } from '../../core/errors';
import { Logger } from '../../core/services/Logger';
import { CompletionOptions, ProviderAdapter } from '../../core/services/ProviderAdapter';

// Tries each adapter in order until one answers. A cancelled call is not retried elsewhere.
export class FailoverProvider implements ProviderAdapter {
  readonly name: string;

  constructor(
    private providers: ProviderAdapter[],
    private logger: Logger
  ) {
    if (providers.length === 0) throw new Error('FailoverProvider needs at least one provider');
    this.name = providers.map((provider) => provider.name).join(' -> ');
  }

  async complete(prompt: string, systemPrompt: string, options: CompletionOptions = {}): Promise<string> {
    let lastError: ProviderError | undefined;

    for (const [index, provider] of this.providers.entries()) {
      try {
        return await provider.complete(prompt, systemPrompt, options);
      } catch (error) {
        const failure =
          error instanceof ProviderError ? error : new ProviderError('transport', errorMessage(error), { cause: error });
        if (failure.kind === 'cancelled' || options.signal?.aborted) throw failure;

        lastError = failure;
        const next = this.providers[index + 1];
        if (next) this.logger.warn(`${provider.name} failed (${failure.kind}), trying ${next.name}`);
      }
    }

    throw lastError ?? new ProviderError('transport', 'No provider answered');
  }
}
