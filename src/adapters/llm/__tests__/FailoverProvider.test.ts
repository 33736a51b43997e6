import { ProviderError } from '../../../core/errors';
import { createMockLogger, createMockProvider } from '../../../test/mocks';
import { FailoverProvider } from '../FailoverProvider';

describe('FailoverProvider', () => {
  let primary: ReturnType<typeof createMockProvider>;
  let secondary: ReturnType<typeof createMockProvider>;
  let logger: ReturnType<typeof createMockLogger>;
  let failover: FailoverProvider;

  beforeEach(() => {
    primary = createMockProvider('groq');
    secondary = createMockProvider('ollama');
    logger = createMockLogger();
    failover = new FailoverProvider([primary, secondary], logger);
  });

  it('should be named after its chain', () => {
    expect(failover.name).toBe('groq -> ollama');
  });

  it('should need at least one provider', () => {
    expect(() => new FailoverProvider([], logger)).toThrow('FailoverProvider needs at least one provider');
  });

  it('should return the first answer', async () => {
    primary.complete.mockResolvedValue('{"a": 1}');

    await expect(failover.complete('p', 's')).resolves.toBe('{"a": 1}');
    expect(secondary.complete).not.toHaveBeenCalled();
  });

  it('should try the next provider after a failure', async () => {
    primary.complete.mockRejectedValue(new ProviderError('rate_limited', 'groq: slow down'));
    secondary.complete.mockResolvedValue('{"a": 2}');

    await expect(failover.complete('p', 's')).resolves.toBe('{"a": 2}');
    expect(secondary.complete).toHaveBeenCalledWith('p', 's', {});
    expect(logger.warn).toHaveBeenCalledWith('groq failed (rate_limited), trying ollama');
  });

  it('should throw the last failure when every provider fails', async () => {
    primary.complete.mockRejectedValue(new ProviderError('auth', 'groq: bad key'));
    secondary.complete.mockRejectedValue(new Error('connection refused'));

    await expect(failover.complete('p', 's')).rejects.toMatchObject({
      kind: 'transport',
      message: 'connection refused',
    });
  });

  it('should not retry a cancelled call', async () => {
    primary.complete.mockRejectedValue(new ProviderError('cancelled', 'groq: aborted'));

    await expect(failover.complete('p', 's')).rejects.toMatchObject({ kind: 'cancelled' });
    expect(secondary.complete).not.toHaveBeenCalled();
  });

  it('should stop once the caller signal has fired', async () => {
    const controller = new AbortController();
    primary.complete.mockImplementation(async () => {
      controller.abort();
      throw new ProviderError('timeout', 'groq: timed out');
    });

    await expect(failover.complete('p', 's', { signal: controller.signal })).rejects.toMatchObject({ kind: 'timeout' });
    expect(secondary.complete).not.toHaveBeenCalled();
  });
});
