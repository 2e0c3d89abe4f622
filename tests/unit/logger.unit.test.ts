import { createLogger, createSilentLogger } from '../../src/logger.js';

describe('createLogger', () => {
  it('applies the configured level to the logger and its children', () => {
    const logger = createLogger({ logLevel: 'warn', name: 'prompt-catalog', prettyLogs: false });

    expect(logger.level).toBe('warn');
    expect(logger.isLevelEnabled('info')).toBe(false);
    expect(logger.child({ component: 'catalog-service' }).level).toBe('warn');
  });

  it('creates a silent logger', () => {
    const logger = createSilentLogger();

    expect(logger.level).toBe('silent');
    expect(logger.isLevelEnabled('error')).toBe(false);
  });
});
