import { LogLevel, Logger, MemorySink, parseLogLevel } from '../src/shared/utils/logger';

describe('Logger', () => {
  it('drops entries below the configured level', () => {
    const sink = new MemorySink();
    const logger = new Logger({}, { level: 'warn', sink });

    logger.debug('hidden');
    logger.info('hidden too');
    logger.warn('Source degraded, using default values');

    expect(sink.messages()).toEqual(['Source degraded, using default values']);
  });

  it('merges context into child loggers and shares the sink', () => {
    const sink = new MemorySink();
    const logger = new Logger({ functionName: 'analyze-field' }, { level: LogLevel.DEBUG, sink });

    logger.child({ fieldId: 'field-1' }).info('Metrics acquired');

    expect(sink.entries[0].context).toEqual({ functionName: 'analyze-field', fieldId: 'field-1' });
  });

  it('redacts credential keys in context and data', () => {
    const sink = new MemorySink();
    const logger = new Logger({ clientSecret: 'test-secret' }, { level: LogLevel.INFO, sink });

    logger.info('Token requested', { accessToken: 'test-token', clientId: 'client-1' });

    expect(sink.entries[0].context).toEqual({ clientSecret: '[REDACTED]' });
    expect(sink.entries[0].data).toEqual({ accessToken: '[REDACTED]', clientId: 'client-1' });
  });

  it('serializes errors with their cause', () => {
    const sink = new MemorySink();
    const logger = new Logger({}, { level: LogLevel.INFO, sink });
    const cause = new Error('conditional check failed');

    logger.error('Persistence failure', new Error('write rejected', { cause }), { fieldId: 'field-1' });

    expect(sink.entries[0].data).toMatchObject({
      fieldId: 'field-1',
      error: {
        name: 'Error',
        message: 'write rejected',
        cause: { name: 'Error', message: 'conditional check failed' },
      },
    });
  });

  it('flags audit entries', () => {
    const sink = new MemorySink();
    const logger = new Logger({}, { level: LogLevel.INFO, sink });

    logger.audit('field.create', 'field-1', 'user-1', { areaHa: 2 });

    expect(sink.messages(LogLevel.INFO)).toEqual(['Audit: field.create']);
    expect(sink.entries[0].data).toEqual({
      action: 'field.create',
      resource: 'field-1',
      userId: 'user-1',
      auditEvent: true,
      areaHa: 2,
    });
  });

  it('falls back to INFO for unknown level names', () => {
    expect(parseLogLevel('verbose')).toBe(LogLevel.INFO);
    expect(parseLogLevel(undefined)).toBe(LogLevel.INFO);
    expect(parseLogLevel('error')).toBe(LogLevel.ERROR);
  });
});
