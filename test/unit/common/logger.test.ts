import { createLogger, defaultLogger, FrameworkLogger } from '../../../src/common/logger';
import { ServiceRecordStore } from '../../../src/registry/ServiceRecordStore';

describe('FrameworkLogger', () => {
  let log: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    log = jest.spyOn(console, 'log').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('should only print enabled categories', () => {
    const logger = createLogger({ enableRegistryLogs: true, enableTestMode: false });

    logger.registry('registered %s', 'api');
    logger.store('saved');
    logger.warn('careful');

    expect(log).toHaveBeenCalledTimes(1);
    expect(log).toHaveBeenCalledWith('[REGISTRY] registered %s', 'api');
    expect(warn).toHaveBeenCalledWith('[WARN] careful');
  });

  it('should stay quiet in test mode', () => {
    const logger = new FrameworkLogger({ enableRegistryLogs: true, enableConfigLogs: true, enableTestMode: true });

    logger.registry('registered');
    logger.store('saved');
    logger.warn('careful');

    expect(log).not.toHaveBeenCalled();
    expect(warn).not.toHaveBeenCalled();
  });

  it('should detect the test runner for the shared default', () => {
    defaultLogger.registry('registered');
    defaultLogger.coordinator('started');

    expect(log).not.toHaveBeenCalled();
  });

  it('should back components constructed without a logger', () => {
    const store = new ServiceRecordStore();

    store.register({ name: 'api', host: 'localhost', port: 4080, serviceType: 'api' });

    expect(store.has('api')).toBe(true);
    expect(log).not.toHaveBeenCalled();
  });
});
