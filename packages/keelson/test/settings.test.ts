import { afterEach, describe, expect, it, vi } from 'vitest';

import { createLogger, getLogLevel, setLogLevel } from '../src/utils/logger';
import { loadSettings } from '../src/utils/settings';

describe('loadSettings', () => {
  it('reads the environment', () => {
    expect(
      loadSettings({
        PACKET_AUTH_TOKEN: 'test-token',
        KEELSON_CHARTS_DIR: '/charts',
        KEELSON_HELM: '/usr/local/bin/helm',
        KEELSON_LOG_LEVEL: 'DEBUG',
      }),
    ).toEqual({
      packetAuthToken: 'test-token',
      chartsDir: '/charts',
      helmExecutable: '/usr/local/bin/helm',
      logLevel: 'debug',
    });
  });

  it('falls back to defaults', () => {
    expect(loadSettings({ KEELSON_LOG_LEVEL: 'loud' })).toEqual({ helmExecutable: 'helm', logLevel: 'info' });
  });
});

describe('Logger', () => {
  const initial = getLogLevel();

  afterEach(() => {
    setLogLevel(initial);
    vi.restoreAllMocks();
  });

  it('prefixes messages and honours the level', () => {
    const spy = vi.spyOn(console, 'error').mockImplementation(() => undefined);
    setLogLevel('warn');
    const log = createLogger('contour');

    log.info('hidden');
    log.warn('shown');

    expect(spy).toHaveBeenCalledTimes(1);
    expect(String(spy.mock.calls[0]?.[0])).toContain('[contour] shown');
  });
});
