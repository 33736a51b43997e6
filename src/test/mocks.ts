import { Logger } from '../core/services/Logger';
import { ProviderAdapter } from '../core/services/ProviderAdapter';

export function createMockLogger(): jest.Mocked<Logger> {
  const logger: jest.Mocked<Logger> = {
    debug: jest.fn(),
    info: jest.fn(),
    warn: jest.fn(),
    error: jest.fn(),
    child: jest.fn(),
  };
  logger.child.mockReturnValue(logger);
  return logger;
}

export function createMockProvider(name = 'fake'): jest.Mocked<ProviderAdapter> {
  return {
    name,
    complete: jest.fn(),
  };
}
