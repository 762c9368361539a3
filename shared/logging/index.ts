/**
 * On-screen aware logging facade
 *
 * Every call is formatted as `[Level]\tContext: Message`, written to a
 * permanent sink, and shown on screen (colored by severity) when its severity
 * meets the display threshold.
 *
 * @example
 * ```typescript
 * import { createLoggerFacade, ConsoleLogSink, OnScreenMessageBoard, Severity } from '@shared/logging/index.ts';
 *
 * const board = new OnScreenMessageBoard();
 * const logger = createLoggerFacade({ permanentSink: new ConsoleLogSink(), displaySink: board });
 *
 * const turret = { name: 'Turret', owner: { name: 'Base' } };
 * logger.logFloat(turret, 'Heat', 2.5, Severity.Warning);
 * // LogOverlay: Warning: [Warning]	Base.Turret: Heat: 2.5
 * ```
 */

// Core exports
export {
  LoggerFacade,
  ScopedLogger,
  createLoggerFacade,
  formatLogLine,
  ON_SCREEN_DURATION_SECONDS,
  INDEPENDENT_MESSAGE_KEY,
} from './Logger.ts';
export {
  Severity,
  SEVERITY_NAMES,
  ALL_SEVERITIES,
  UNKNOWN_SEVERITY_NAME,
  isSeverity,
  severityName,
  parseSeverity,
  channelForSeverity,
} from './Severity.ts';
export {
  Colors,
  DEFAULT_COLOR,
  SEVERITY_COLORS,
  getColorForSeverity,
  colorsEqual,
  colorToHex,
  colorToAnsi,
  type Color,
} from './colors.ts';
export { EntityContextResolver, UNKNOWN_CONTEXT, presenceLiveness } from './context.ts';
export {
  renderBool,
  renderInt,
  renderFloat,
  renderVector,
  renderRotator,
  renderObject,
  appendValue,
  NULL_OBJECT_NAME,
  type Vector3,
  type Rotator,
} from './formatters.ts';
export {
  ValidityCondition,
  BooleanCondition,
  ValidityOutcome,
  ConditionOutcome,
  shouldLogOnValidity,
  shouldLogOnCondition,
} from './gates.ts';
export type {
  Entity,
  LogEvent,
  ContextResolver,
  PermanentLogSink,
  TransientDisplaySink,
  EntityLiveness,
  LoggerFacadeConfig,
} from './types.ts';

// Sink exports
export * from './sinks/index.ts';

// Shared logger exports
export { getDefaultLogger, setDefaultLogger } from './sharedLogger.ts';
