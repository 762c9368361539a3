import {
  BooleanCondition,
  Severity,
  ValidityCondition,
  colorToHex,
  parseSeverity,
  severityName,
  type Entity,
  type LoggerFacade,
  type OnScreenMessage,
} from '@shared/logging/index.ts';
import type {
  EntityDescriptor,
  LogOnConditionRequest,
  LogOnValidityRequest,
  LogValue,
  OverlayMessageSnapshot,
  SeverityName,
} from '@shared/types/overlay.types.ts';

export const SEVERITY_NAME_LIST: readonly SeverityName[] = [
  'VeryVerbose',
  'Verbose',
  'Log',
  'Display',
  'Warning',
  'Error',
  'Fatal',
];

export function toSeverity(name: SeverityName | undefined): Severity {
  return name === undefined ? Severity.Display : parseSeverity(name);
}

export function toSeverityName(level: Severity): SeverityName {
  return SEVERITY_NAME_LIST.find(name => name === severityName(level)) ?? 'Display';
}

/**
 * Rebuild an entity sent by a client. `alive: false` makes it fail liveness.
 */
export function toEntity(descriptor: EntityDescriptor | null | undefined): Entity | null {
  if (!descriptor) return null;
  const alive = descriptor.alive !== false;
  return {
    name: descriptor.name,
    owner: toEntity(descriptor.owner),
    isAlive: () => alive,
  };
}

export function logWireValue(
  logger: LoggerFacade,
  context: Entity | null,
  message: string,
  value: LogValue,
  level: Severity,
): void {
  switch (value.type) {
    case 'bool':
      logger.logBool(context, message, value.value, level);
      break;
    case 'int':
      logger.logInt(context, message, value.value, level);
      break;
    case 'float':
      logger.logFloat(context, message, value.value, level);
      break;
    case 'vector':
      logger.logVector(context, message, value.value, level);
      break;
    case 'rotator':
      logger.logRotator(context, message, value.value, level);
      break;
    case 'object':
      logger.logObject(context, message, toEntity(value.value), level);
      break;
  }
}

export function toOverlaySnapshot(message: OnScreenMessage): OverlayMessageSnapshot {
  return {
    id: message.id,
    key: message.key,
    line: message.line,
    color: colorToHex(message.color),
    expiresAt: message.expiresAt,
  };
}

export function toValidityCondition(mode: LogOnValidityRequest['mode']): ValidityCondition {
  return mode === 'LogWhenValid' ? ValidityCondition.LogWhenValid : ValidityCondition.LogWhenInvalid;
}

export function toBooleanCondition(mode: LogOnConditionRequest['mode']): BooleanCondition {
  return mode === 'LogWhenTrue' ? BooleanCondition.LogWhenTrue : BooleanCondition.LogWhenFalse;
}
