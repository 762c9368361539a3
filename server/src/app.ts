import Fastify from 'fastify';
import websocket from '@fastify/websocket';
import cors from '@fastify/cors';
import { WebSocket } from 'ws';
import type { LoggerFacade, OnScreenMessageBoard } from '@shared/logging/index.ts';
import {
  PROTOCOL_VERSION,
  type DisplayThresholdRequest,
  type LogOnConditionRequest,
  type LogOnValidityRequest,
  type LogRequest,
  type LogValueRequest,
  type ServerMessage,
} from '@shared/types/overlay.types.ts';
import { createOverlayLogging, readLoggingConfig, type OverlayLoggingConfig } from './logging/index.js';
import { OverlayLoop } from './overlay/OverlayLoop.js';
import {
  displayThresholdRequestSchema,
  entityDescriptorSchema,
  logOnConditionRequestSchema,
  logOnValidityRequestSchema,
  logRequestSchema,
  logValueRequestSchema,
} from './overlay/schemas.js';
import {
  logWireValue,
  toBooleanCondition,
  toEntity,
  toOverlaySnapshot,
  toSeverity,
  toSeverityName,
  toValidityCondition,
} from './overlay/wire.js';

export interface BuildOptions {
  logger?: boolean;
  /** Overrides the environment-derived logging configuration */
  logging?: Partial<OverlayLoggingConfig>;
  now?: () => number;
}

declare module 'fastify' {
  interface FastifyInstance {
    overlayLogger: LoggerFacade;
    messageBoard: OnScreenMessageBoard;
    overlayLoop: OverlayLoop;
  }
}

export async function buildServer(options: BuildOptions = {}) {
  const fastify = Fastify({
    logger: options.logger ?? true
  });

  await fastify.register(cors, { origin: true });
  await fastify.register(websocket);
  fastify.addSchema(entityDescriptorSchema);

  const config: OverlayLoggingConfig = { ...readLoggingConfig(), ...options.logging };
  const { logger, board } = createOverlayLogging(config, { now: options.now });
  const overlayLoop = new OverlayLoop(board, { tickRate: config.tickRate, now: options.now });
  fastify.decorate('overlayLogger', logger);
  fastify.decorate('messageBoard', board);
  fastify.decorate('overlayLoop', overlayLoop);

  const clients = new Set<WebSocket>();
  const HEARTBEAT_INTERVAL_MS = 15000;
  let heartbeatTimer: NodeJS.Timeout | null = null;

  const sendMessage = (socket: WebSocket, message: ServerMessage) => {
    if (socket.readyState !== WebSocket.OPEN) {
      clients.delete(socket);
      return;
    }
    try {
      socket.send(JSON.stringify(message));
    } catch (error) {
      fastify.log.warn({ err: error }, 'Failed to send message to overlay client');
      clients.delete(socket);
    }
  };

  const broadcast = (message: ServerMessage) => {
    const payload = JSON.stringify(message);
    for (const socket of clients) {
      if (socket.readyState === WebSocket.OPEN) {
        socket.send(payload);
      } else {
        clients.delete(socket);
      }
    }
  };

  const ensureHeartbeat = () => {
    if (heartbeatTimer) return;
    heartbeatTimer = setInterval(() => {
      if (clients.size === 0) {
        return;
      }
      broadcast({
        type: 'heartbeat',
        payload: { serverTime: Date.now() }
      });
    }, HEARTBEAT_INTERVAL_MS);
  };

  const stopHeartbeat = () => {
    if (heartbeatTimer) {
      clearInterval(heartbeatTimer);
      heartbeatTimer = null;
    }
  };

  const dropClient = (socket: WebSocket) => {
    clients.delete(socket);
    if (clients.size === 0) {
      stopHeartbeat();
    }
  };

  fastify.get('/health', async () => {
    return {
      status: 'ok',
      displayThreshold: toSeverityName(logger.getDisplayThreshold()),
      visibleMessages: board.getVisibleMessages().length,
      overlayClients: clients.size,
    };
  });

  fastify.get('/display-threshold', async () => {
    return { level: toSeverityName(logger.getDisplayThreshold()) };
  });

  fastify.put<{ Body: DisplayThresholdRequest }>(
    '/display-threshold',
    { schema: { body: displayThresholdRequestSchema } },
    async (request) => {
      logger.setDisplayThreshold(toSeverity(request.body.level));
      return { level: toSeverityName(logger.getDisplayThreshold()) };
    }
  );

  fastify.post<{ Body: LogRequest }>(
    '/log',
    { schema: { body: logRequestSchema } },
    async (request, reply) => {
      const { context, message, level } = request.body;
      logger.log(toEntity(context), message, toSeverity(level));
      return reply.code(204).send();
    }
  );

  fastify.post<{ Body: LogValueRequest }>(
    '/log/value',
    { schema: { body: logValueRequestSchema } },
    async (request, reply) => {
      const { context, message, value, level } = request.body;
      logWireValue(logger, toEntity(context), message, value, toSeverity(level));
      return reply.code(204).send();
    }
  );

  fastify.post<{ Body: LogOnValidityRequest }>(
    '/log/validity',
    { schema: { body: logOnValidityRequestSchema } },
    async (request) => {
      const { context, candidate, mode, message, level } = request.body;
      const outcome = logger.logOnValidity(
        toEntity(context),
        toEntity(candidate),
        toValidityCondition(mode),
        message,
        toSeverity(level),
      );
      return { outcome };
    }
  );

  fastify.post<{ Body: LogOnConditionRequest }>(
    '/log/condition',
    { schema: { body: logOnConditionRequestSchema } },
    async (request) => {
      const { context, condition, mode, message, level } = request.body;
      const outcome = logger.logOnCondition(
        toEntity(context),
        condition,
        toBooleanCondition(mode),
        message,
        toSeverity(level),
      );
      return { outcome };
    }
  );

  fastify.get('/overlay', async () => {
    return board.getVisibleMessages().map(toOverlaySnapshot);
  });

  fastify.get('/ws/overlay', { websocket: true }, (socket, req) => {
    fastify.log.info({ ip: req.ip }, 'Overlay client connected');
    clients.add(socket);
    ensureHeartbeat();

    sendMessage(socket, {
      type: 'handshake',
      payload: {
        protocolVersion: PROTOCOL_VERSION,
        serverTime: Date.now(),
      }
    });
    sendMessage(socket, {
      type: 'snapshot',
      payload: {
        messages: board.getVisibleMessages().map(toOverlaySnapshot),
        displayThreshold: toSeverityName(logger.getDisplayThreshold()),
      }
    });

    socket.on('close', () => {
      dropClient(socket);
    });

    socket.on('error', (error: Error) => {
      fastify.log.warn({ err: error }, 'Overlay client error');
      dropClient(socket);
    });
  });

  board.onMessage((message) => {
    if (clients.size === 0) return;
    broadcast({ type: 'message', payload: toOverlaySnapshot(message) });
  });

  board.onExpired((expired) => {
    if (clients.size === 0) return;
    broadcast({ type: 'expired', payload: { ids: expired.map(message => message.id) } });
  });

  fastify.addHook('onClose', async () => {
    overlayLoop.stop();
    stopHeartbeat();

    // 1001 = "Going Away"
    for (const socket of clients) {
      socket.close(1001, 'Server shutting down');
    }
    clients.clear();
  });

  return fastify;
}
