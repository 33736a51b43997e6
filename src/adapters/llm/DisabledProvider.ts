import { ProviderError } from '../../core/errors';
import { ProviderAdapter } from '../../core/services/ProviderAdapter';

// Stands in when no LLM is configured; every operation then returns a synthesized result.
export class DisabledProvider implements ProviderAdapter {
  readonly name = 'disabled';

  async complete(): Promise<string> {
    throw new ProviderError('transport', 'LLM provider is disabled');
  }
}
