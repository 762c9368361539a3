import { afterEach, describe, expect, it, vi } from 'vitest';
import {
  ConsoleLogSink,
  Severity,
  createLoggerFacade,
  getDefaultLogger,
  setDefaultLogger,
} from '../logging/index.ts';

describe('shared logger', () => {
  afterEach(() => {
    vi.unstubAllEnvs();
    setDefaultLogger(null);
  });

  it('builds the default lazily and reuses it', () => {
    setDefaultLogger(null);

    const first = getDefaultLogger();

    expect(getDefaultLogger()).toBe(first);
    expect(first.getConfig().permanentSink).toBeInstanceOf(ConsoleLogSink);
    expect(first.getConfig().displaySink).toBeUndefined();
  });

  it('reads the display threshold from DISPLAY_LOG_LEVEL', () => {
    vi.stubEnv('DISPLAY_LOG_LEVEL', 'error');
    setDefaultLogger(null);

    expect(getDefaultLogger().getDisplayThreshold()).toBe(Severity.Error);
  });

  it('returns an installed facade', () => {
    const installed = createLoggerFacade({ permanentSink: { write: vi.fn() } });

    setDefaultLogger(installed);

    expect(getDefaultLogger()).toBe(installed);
  });
});
