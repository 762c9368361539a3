import { afterEach, describe, expect, it } from 'vitest';
import { ConsoleLogSink, OnScreenMessageBoard, Severity, getDefaultLogger, setDefaultLogger } from '@shared/logging/index.ts';
import { createOverlayLogging, readLoggingConfig } from '../src/logging/index.js';

describe('server logging configuration', () => {
  afterEach(() => {
    setDefaultLogger(null);
  });

  it('uses defaults for an empty environment', () => {
    expect(readLoggingConfig({})).toEqual({
      displayThreshold: Severity.Display,
      consoleMinChannel: Severity.VeryVerbose,
      useColors: true,
      showTimestamp: true,
      tickRate: 10,
    });
  });

  it('reads overrides from the environment', () => {
    expect(readLoggingConfig({
      DISPLAY_LOG_LEVEL: 'warning',
      CONSOLE_LOG_LEVEL: 'Log',
      LOG_COLORS: 'false',
      LOG_TIMESTAMPS: 'FALSE',
      OVERLAY_TICK_RATE: '30',
    })).toEqual({
      displayThreshold: Severity.Warning,
      consoleMinChannel: Severity.Log,
      useColors: false,
      showTimestamp: false,
      tickRate: 30,
    });
  });

  it('ignores tick rates that are not positive numbers', () => {
    expect(readLoggingConfig({ OVERLAY_TICK_RATE: 'fast' }).tickRate).toBe(10);
    expect(readLoggingConfig({ OVERLAY_TICK_RATE: '0' }).tickRate).toBe(10);
  });

  it('wires the facade to the console sink and the board, and installs it as default', () => {
    const { logger, board, consoleSink } = createOverlayLogging(readLoggingConfig({ DISPLAY_LOG_LEVEL: 'Error' }));

    const config = logger.getConfig();
    expect(config.permanentSink).toBe(consoleSink);
    expect(consoleSink).toBeInstanceOf(ConsoleLogSink);
    expect(config.displaySink).toBe(board);
    expect(board).toBeInstanceOf(OnScreenMessageBoard);
    expect(logger.getDisplayThreshold()).toBe(Severity.Error);
    expect(getDefaultLogger()).toBe(logger);
  });
});
