import { afterEach, describe, it, expect, vi } from 'vitest';
import { createLogger } from '../logger.js';

describe('createLogger', () => {
  afterEach(() => {
    vi.restoreAllMocks();
  });

  it('keeps progress output quiet unless verbose', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const warn = vi.spyOn(console, 'warn').mockImplementation(() => {});

    const logger = createLogger();
    logger.info('Loaded 3 triples');
    logger.debug('detail');
    logger.warn('Dropped record 1');

    expect(stderr).not.toHaveBeenCalled();
    expect(warn).toHaveBeenCalledWith('Warning: Dropped record 1');
  });

  it('writes progress to stderr when verbose', () => {
    const stderr = vi.spyOn(console, 'error').mockImplementation(() => {});
    const stdout = vi.spyOn(console, 'log').mockImplementation(() => {});

    const logger = createLogger({ verbose: true });
    logger.info('Loaded 3 triples');
    logger.debug('detail');
    logger.error('broken');

    expect(stderr.mock.calls).toEqual([['Loaded 3 triples'], ['  detail'], ['Error: broken']]);
    expect(stdout).not.toHaveBeenCalled();
  });
});
