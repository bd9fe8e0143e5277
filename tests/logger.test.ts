import { consoleLogger } from '../src/core/logger';

describe('consoleLogger', () => {
  let info: jest.SpyInstance;
  let warn: jest.SpyInstance;

  beforeEach(() => {
    info = jest.spyOn(console, 'info').mockImplementation(() => undefined);
    warn = jest.spyOn(console, 'warn').mockImplementation(() => undefined);
  });

  afterEach(() => {
    jest.restoreAllMocks();
  });

  it('prints progress events to info', () => {
    consoleLogger('taxonomy:loaded', { skills: 3 });
    expect(info).toHaveBeenCalledWith('[taxonomy:loaded] {"skills":3}');
    expect(warn).not.toHaveBeenCalled();
  });

  it('prints skips and misses to warn', () => {
    consoleLogger('sync:record-skipped', { index: 0 });
    consoleLogger('taxonomy:catalog-missing');
    expect(warn).toHaveBeenNthCalledWith(1, '[sync:record-skipped] {"index":0}');
    expect(warn).toHaveBeenNthCalledWith(2, '[taxonomy:catalog-missing]');
  });
});
