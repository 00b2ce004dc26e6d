import { Logger } from './logger';

describe('Logger', () => {
  let log: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
  });

  afterEach(() => {
    log.mockRestore();
  });

  test('should align table columns', () => {
    new Logger('test').table([
      ['part', 'first'],
      ['0', '12']
    ]);

    expect(log).toHaveBeenCalledTimes(2);
    expect(log).toHaveBeenLastCalledWith('0     12');
  });

  test('should stay silent when quiet', () => {
    const logger = new Logger('test', { quiet: true });
    logger.info('hidden');
    logger.success('hidden');
    logger.table([['part']]);

    expect(log).not.toHaveBeenCalled();
  });

  test('should keep the quiet flag in child loggers', () => {
    new Logger('test', { quiet: true }).child('part').info('hidden');

    expect(log).not.toHaveBeenCalled();
  });
});
