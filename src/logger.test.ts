import { LogLevel, logger, parseLogLevel } from './logger.js';

describe('parseLogLevel', () => {
  it('accepts level names in any case', () => {
    expect(parseLogLevel(' Debug ')).toBe(LogLevel.DEBUG);
    expect(parseLogLevel('WARN')).toBe(LogLevel.WARN);
    expect(parseLogLevel('silent')).toBe(LogLevel.SILENT);
  });

  it('rejects unknown names', () => {
    expect(parseLogLevel('verbose')).toBeUndefined();
    expect(parseLogLevel('constructor')).toBeUndefined();
  });
});

describe('logger', () => {
  afterEach(() => {
    logger.setLevel(LogLevel.SILENT);
    vi.restoreAllMocks();
  });

  it('writes warnings to stderr with the component tag', () => {
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    logger.setLevel(LogLevel.WARN);

    logger.info('Approve', 'hidden');
    logger.warn('Approve', 'No pending academic graduation requests found');

    expect(error).toHaveBeenCalledTimes(1);
    expect(String(error.mock.calls[0][0])).toContain('[Approve]');
    expect(String(error.mock.calls[0][0])).toContain('No pending academic graduation requests found');
  });

  it('stays quiet when silent', () => {
    const log = vi.spyOn(console, 'log').mockImplementation(() => undefined);
    const error = vi.spyOn(console, 'error').mockImplementation(() => undefined);

    logger.error('Export', 'nothing to see');
    logger.summary('Totals', { Total: 1 });

    expect(log).not.toHaveBeenCalled();
    expect(error).not.toHaveBeenCalled();
  });
});
