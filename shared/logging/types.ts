import type { Severity } from './Severity.ts';
import type { Color } from './colors.ts';

/**
 * Anything that can call into the logger or be logged: an actor, a component,
 * a subsystem. Parts of a larger entity carry their owner.
 */
export interface Entity {
  /** Display identity */
  readonly name: string;
  /** Owning entity when this is a part (component) of something larger */
  readonly owner?: Entity | null;
  /** Host liveness check, if the host exposes one */
  isAlive?(): boolean;
}

/**
 * A single log call, fully resolved and ready to format
 */
export interface LogEvent {
  severity: Severity;
  contextName: string;
  message: string;
}

/**
 * Turns a caller into the context name printed on each line
 */
export interface ContextResolver {
  resolve(caller?: Entity | null): string;
}

/**
 * Durable log destination. Written for every call.
 */
export interface PermanentLogSink {
  write(channel: Severity, line: string): void;
}

/**
 * Ephemeral on-screen destination. Written only when the severity meets the
 * display threshold. Must be a no-op when no display surface is active.
 */
export interface TransientDisplaySink {
  show(line: string, color: Color, durationSeconds: number, key: number): void;
}

export interface EntityLiveness {
  isAlive(entity: Entity): boolean;
}

/**
 * Logger facade configuration
 */
export interface LoggerFacadeConfig {
  permanentSink: PermanentLogSink;
  /** Omitted when the host has no display surface */
  displaySink?: TransientDisplaySink;
  contextResolver: ContextResolver;
  liveness: EntityLiveness;
  /** Minimum severity shown on screen */
  displayThreshold: Severity;
}
