/**
 * Server-Side Logger Configuration
 *
 * Reads logging settings from the environment and wires the facade to the
 * console sink and the on-screen message board served to overlay clients.
 */

import {
  ConsoleLogSink,
  OnScreenMessageBoard,
  Severity,
  createLoggerFacade,
  parseSeverity,
  setDefaultLogger,
  type LoggerFacade,
} from '@shared/logging/index.ts';

export interface OverlayLoggingConfig {
  /** Initial on-screen threshold */
  displayThreshold: Severity;
  /** Lowest channel printed on the console */
  consoleMinChannel: Severity;
  useColors: boolean;
  showTimestamp: boolean;
  /** Board expiry checks per second */
  tickRate: number;
}

export interface OverlayLogging {
  logger: LoggerFacade;
  board: OnScreenMessageBoard;
  consoleSink: ConsoleLogSink;
}

function readFlag(value: string | undefined, fallback: boolean): boolean {
  if (value === undefined) return fallback;
  return value.toLowerCase() === 'true';
}

function readPositiveNumber(value: string | undefined, fallback: number): number {
  const parsed = Number(value);
  return Number.isFinite(parsed) && parsed > 0 ? parsed : fallback;
}

/**
 * Read configuration from environment
 */
export function readLoggingConfig(env: NodeJS.ProcessEnv = process.env): OverlayLoggingConfig {
  return {
    displayThreshold: parseSeverity(env.DISPLAY_LOG_LEVEL ?? 'Display'),
    consoleMinChannel: parseSeverity(env.CONSOLE_LOG_LEVEL ?? 'VeryVerbose', Severity.VeryVerbose),
    useColors: readFlag(env.LOG_COLORS, true),
    showTimestamp: readFlag(env.LOG_TIMESTAMPS, true),
    tickRate: readPositiveNumber(env.OVERLAY_TICK_RATE, 10),
  };
}

/**
 * Build the facade and its sinks, and install it as the process default
 */
export function createOverlayLogging(
  config: OverlayLoggingConfig,
  options: { now?: () => number } = {},
): OverlayLogging {
  const consoleSink = new ConsoleLogSink({
    category: 'LogOverlay',
    minChannel: config.consoleMinChannel,
    useColors: config.useColors,
    showTimestamp: config.showTimestamp,
    timestampFormat: 'time',
  });
  const board = new OnScreenMessageBoard({ now: options.now });

  const logger = createLoggerFacade({
    permanentSink: consoleSink,
    displaySink: board,
    displayThreshold: config.displayThreshold,
  });
  setDefaultLogger(logger);

  return { logger, board, consoleSink };
}
