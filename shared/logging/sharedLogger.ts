/**
 * Shared Logger Instance
 *
 * Lazily built process default for code that has no facade injected. Hosts
 * install their own with `setDefaultLogger`; otherwise the default writes to
 * the console and has no display surface.
 */

import { LoggerFacade, createLoggerFacade } from './Logger.ts';
import { Severity, parseSeverity } from './Severity.ts';
import { ConsoleLogSink } from './sinks/ConsoleLogSink.ts';

let _logger: LoggerFacade | null = null;

/**
 * Get the configured display threshold
 */
function getDisplayThreshold(): Severity {
  if (typeof process !== 'undefined' && process.env?.DISPLAY_LOG_LEVEL) {
    return parseSeverity(process.env.DISPLAY_LOG_LEVEL);
  }
  return Severity.Display;
}

function initializeLogger(): LoggerFacade {
  return createLoggerFacade({
    permanentSink: new ConsoleLogSink({ useColors: true }),
    displayThreshold: getDisplayThreshold(),
  });
}

/**
 * Get the shared facade (lazy initialization)
 */
export function getDefaultLogger(): LoggerFacade {
  if (!_logger) {
    _logger = initializeLogger();
  }
  return _logger;
}

/**
 * Replace the shared facade; `null` resets it to the lazy default
 */
export function setDefaultLogger(logger: LoggerFacade | null): void {
  _logger = logger;
}
