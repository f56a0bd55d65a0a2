import { StderrLogger, toNestLogLevels } from './stderr.logger';

describe('StderrLogger', () => {
  let stderrSpy: jest.SpyInstance;
  let stdoutSpy: jest.SpyInstance;

  beforeEach(() => {
    stderrSpy = jest.spyOn(process.stderr, 'write').mockImplementation(() => true);
    stdoutSpy = jest.spyOn(process.stdout, 'write').mockImplementation(() => true);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should write every level to stderr', () => {
    const logger = new StderrLogger('DiskCheck');

    logger.log('checking /work/project');
    logger.warn('config malformed');

    expect(stdoutSpy).not.toHaveBeenCalled();
    expect(stderrSpy).toHaveBeenCalledTimes(2);
    expect(String(stderrSpy.mock.calls[0][0])).toContain('checking /work/project');
    expect(String(stderrSpy.mock.calls[1][0])).toContain('[DiskCheck]');
  });

  it('should skip levels that are not enabled', () => {
    const logger = new StderrLogger('DiskCheck', { logLevels: toNestLogLevels('warn') });

    logger.debug('hidden');
    logger.log('hidden');
    logger.warn('shown');

    expect(stderrSpy).toHaveBeenCalledTimes(1);
    expect(String(stderrSpy.mock.calls[0][0])).toContain('shown');
  });
});

describe('toNestLogLevels', () => {
  it('should map hook log levels onto Nest levels', () => {
    expect(toNestLogLevels('debug')).toEqual(['error', 'warn', 'log', 'debug']);
    expect(toNestLogLevels('info')).toEqual(['error', 'warn', 'log']);
    expect(toNestLogLevels('error')).toEqual(['error']);
  });
});
