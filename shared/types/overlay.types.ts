export const PROTOCOL_VERSION = '0.1.0';

/**
 * An entity as sent by a remote game client. `alive: false` marks a destroyed
 * entity; anything else present counts as alive.
 */
export interface EntityDescriptor {
  name: string;
  owner?: EntityDescriptor | null;
  alive?: boolean;
}

export type SeverityName =
  | 'VeryVerbose'
  | 'Verbose'
  | 'Log'
  | 'Display'
  | 'Warning'
  | 'Error'
  | 'Fatal';

/**
 * Typed value attached to a log line
 */
export type LogValue =
  | { type: 'bool'; value: boolean }
  | { type: 'int'; value: number }
  | { type: 'float'; value: number }
  | { type: 'vector'; value: { x: number; y: number; z: number } }
  | { type: 'rotator'; value: { pitch: number; yaw: number; roll: number } }
  | { type: 'object'; value: EntityDescriptor | null };

// ========== HTTP request bodies ==========

export interface LogRequest {
  context?: EntityDescriptor | null;
  message: string;
  level?: SeverityName;
}

export interface LogValueRequest extends LogRequest {
  value: LogValue;
}

export interface LogOnValidityRequest extends LogRequest {
  candidate?: EntityDescriptor | null;
  mode: 'LogWhenValid' | 'LogWhenInvalid';
}

export interface LogOnConditionRequest extends LogRequest {
  condition: boolean;
  mode: 'LogWhenTrue' | 'LogWhenFalse';
}

export interface DisplayThresholdRequest {
  level: SeverityName;
}

// ========== Server-to-Client Messages ==========

/**
 * On-screen line as rendered by overlay clients
 */
export interface OverlayMessageSnapshot {
  id: number;
  key: number;
  line: string;
  /** `#RRGGBB` */
  color: string;
  expiresAt: number;
}

export interface HandshakeMessage {
  type: 'handshake';
  payload: {
    protocolVersion: string;
    serverTime: number;
  };
}

export interface SnapshotMessage {
  type: 'snapshot';
  payload: {
    messages: OverlayMessageSnapshot[];
    displayThreshold: SeverityName;
  };
}

export interface OverlayLineMessage {
  type: 'message';
  payload: OverlayMessageSnapshot;
}

export interface ExpiredMessage {
  type: 'expired';
  payload: {
    ids: number[];
  };
}

export interface HeartbeatMessage {
  type: 'heartbeat';
  payload: {
    serverTime: number;
  };
}

export type ServerMessage =
  | HandshakeMessage
  | SnapshotMessage
  | OverlayLineMessage
  | ExpiredMessage
  | HeartbeatMessage;
