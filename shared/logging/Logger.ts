import { Severity, channelForSeverity, severityName } from './Severity.ts';
import { getColorForSeverity } from './colors.ts';
import { EntityContextResolver, UNKNOWN_CONTEXT, presenceLiveness } from './context.ts';
import {
  appendValue,
  renderBool,
  renderFloat,
  renderInt,
  renderObject,
  renderRotator,
  renderVector,
  type Rotator,
  type Vector3,
} from './formatters.ts';
import {
  shouldLogOnCondition,
  shouldLogOnValidity,
  toConditionOutcome,
  toValidityOutcome,
  type BooleanCondition,
  type ConditionOutcome,
  type ValidityCondition,
  type ValidityOutcome,
} from './gates.ts';
import type {
  ContextResolver,
  Entity,
  EntityLiveness,
  LogEvent,
  LoggerFacadeConfig,
  PermanentLogSink,
  TransientDisplaySink,
} from './types.ts';

/** Seconds a line stays on screen */
export const ON_SCREEN_DURATION_SECONDS = 5;

/** Display key meaning "new entry, never replace another" */
export const INDEPENDENT_MESSAGE_KEY = -1;

/**
 * Format a resolved event as `[Level]\tContext: Message`
 */
export function formatLogLine(event: LogEvent): string {
  return `[${severityName(event.severity)}]\t${event.contextName}: ${event.message}`;
}

/**
 * Logger Facade - routes each call to a permanent sink and, above the display
 * threshold, to an on-screen sink
 *
 * Nothing here throws: collaborator failures are reported on the console and
 * the call carries on with the sentinel context or without that sink.
 */
export class LoggerFacade {
  private config: LoggerFacadeConfig;

  constructor(config: LoggerFacadeConfig) {
    this.config = config;
  }

  /**
   * Bind a caller so it does not need to be passed on every call
   */
  forContext(caller: Entity | null | undefined): ScopedLogger {
    return new ScopedLogger(this, caller);
  }

  setDisplayThreshold(level: Severity): void {
    this.config.displayThreshold = level;
  }

  getDisplayThreshold(): Severity {
    return this.config.displayThreshold;
  }

  /**
   * Check if a severity would reach the display sink
   */
  isDisplayed(level: Severity): boolean {
    return level >= this.config.displayThreshold;
  }

  log(context: Entity | null | undefined, message: string, level: Severity = Severity.Display): void {
    const line = formatLogLine({
      severity: level,
      contextName: this.resolveContext(context),
      message,
    });

    try {
      this.config.permanentSink.write(channelForSeverity(level), line);
    } catch (err) {
      console.error('[LoggerFacade] Permanent sink failed:', err);
    }

    const displaySink = this.config.displaySink;
    if (displaySink && this.isDisplayed(level)) {
      try {
        displaySink.show(line, getColorForSeverity(level), ON_SCREEN_DURATION_SECONDS, INDEPENDENT_MESSAGE_KEY);
      } catch (err) {
        console.error('[LoggerFacade] Display sink failed:', err);
      }
    }
  }

  logBool(context: Entity | null | undefined, message: string, value: boolean, level: Severity = Severity.Display): void {
    this.log(context, appendValue(message, renderBool(value)), level);
  }

  logInt(context: Entity | null | undefined, message: string, value: number | bigint, level: Severity = Severity.Display): void {
    this.log(context, appendValue(message, renderInt(value)), level);
  }

  logFloat(context: Entity | null | undefined, message: string, value: number, level: Severity = Severity.Display): void {
    this.log(context, appendValue(message, renderFloat(value)), level);
  }

  logVector(context: Entity | null | undefined, message: string, value: Vector3, level: Severity = Severity.Display): void {
    this.log(context, appendValue(message, renderVector(value)), level);
  }

  logRotator(context: Entity | null | undefined, message: string, value: Rotator, level: Severity = Severity.Display): void {
    this.log(context, appendValue(message, renderRotator(value)), level);
  }

  logObject(context: Entity | null | undefined, message: string, value: Entity | null | undefined, level: Severity = Severity.Display): void {
    this.log(context, appendValue(message, renderObject(value)), level);
  }

  /**
   * Log when the candidate's validity matches `mode`. The outcome reflects the
   * candidate only, whether or not a line was written.
   */
  logOnValidity(
    context: Entity | null | undefined,
    candidate: Entity | null | undefined,
    mode: ValidityCondition,
    message: string,
    level: Severity = Severity.Display,
  ): ValidityOutcome {
    const isValid = this.isValid(candidate);
    if (shouldLogOnValidity(isValid, mode)) {
      this.log(context, message, level);
    }
    return toValidityOutcome(isValid);
  }

  /**
   * Log when `condition` matches `mode`. The outcome reflects the condition
   * only, whether or not a line was written.
   */
  logOnCondition(
    context: Entity | null | undefined,
    condition: boolean,
    mode: BooleanCondition,
    message: string,
    level: Severity = Severity.Display,
  ): ConditionOutcome {
    if (shouldLogOnCondition(condition, mode)) {
      this.log(context, message, level);
    }
    return toConditionOutcome(condition);
  }

  /**
   * Get current configuration
   */
  getConfig(): LoggerFacadeConfig {
    return { ...this.config };
  }

  private resolveContext(context: Entity | null | undefined): string {
    try {
      const name = this.config.contextResolver.resolve(context);
      return name ? name : UNKNOWN_CONTEXT;
    } catch (err) {
      console.error('[LoggerFacade] Context resolver failed:', err);
      return UNKNOWN_CONTEXT;
    }
  }

  private isValid(candidate: Entity | null | undefined): boolean {
    if (!candidate) return false;
    try {
      return this.config.liveness.isAlive(candidate);
    } catch (err) {
      console.error('[LoggerFacade] Liveness check failed:', err);
      return false;
    }
  }
}

/**
 * A facade bound to one caller
 */
export class ScopedLogger {
  private readonly facade: LoggerFacade;
  private readonly caller: Entity | null | undefined;

  constructor(facade: LoggerFacade, caller: Entity | null | undefined) {
    this.facade = facade;
    this.caller = caller;
  }

  log(message: string, level?: Severity): void {
    this.facade.log(this.caller, message, level);
  }

  logBool(message: string, value: boolean, level?: Severity): void {
    this.facade.logBool(this.caller, message, value, level);
  }

  logInt(message: string, value: number | bigint, level?: Severity): void {
    this.facade.logInt(this.caller, message, value, level);
  }

  logFloat(message: string, value: number, level?: Severity): void {
    this.facade.logFloat(this.caller, message, value, level);
  }

  logVector(message: string, value: Vector3, level?: Severity): void {
    this.facade.logVector(this.caller, message, value, level);
  }

  logRotator(message: string, value: Rotator, level?: Severity): void {
    this.facade.logRotator(this.caller, message, value, level);
  }

  logObject(message: string, value: Entity | null | undefined, level?: Severity): void {
    this.facade.logObject(this.caller, message, value, level);
  }

  logOnValidity(candidate: Entity | null | undefined, mode: ValidityCondition, message: string, level?: Severity): ValidityOutcome {
    return this.facade.logOnValidity(this.caller, candidate, mode, message, level);
  }

  logOnCondition(condition: boolean, mode: BooleanCondition, message: string, level?: Severity): ConditionOutcome {
    return this.facade.logOnCondition(this.caller, condition, mode, message, level);
  }
}

/**
 * Create a facade with minimal configuration (for quick setup)
 */
export function createLoggerFacade(options: {
  permanentSink: PermanentLogSink;
  displaySink?: TransientDisplaySink;
  contextResolver?: ContextResolver;
  liveness?: EntityLiveness;
  displayThreshold?: Severity;
}): LoggerFacade {
  return new LoggerFacade({
    permanentSink: options.permanentSink,
    displaySink: options.displaySink,
    contextResolver: options.contextResolver ?? new EntityContextResolver(),
    liveness: options.liveness ?? presenceLiveness,
    displayThreshold: options.displayThreshold ?? Severity.Display,
  });
}
