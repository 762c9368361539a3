import { afterEach, beforeEach, describe, expect, it, vi, type MockInstance } from 'vitest';
import type { FastifyInstance } from 'fastify';
import type { WebSocket } from 'ws';
import { Severity } from '@shared/logging/index.ts';
import type { ServerMessage } from '@shared/types/overlay.types.ts';
import { buildServer } from '../src/app.js';

const NOW = 1_700_000_000_000;

describe('overlay host', () => {
  let app: FastifyInstance;
  let closed: boolean;
  let info: MockInstance<typeof console.info>;
  let warn: MockInstance<typeof console.warn>;

  beforeEach(async () => {
    info = vi.spyOn(console, 'info').mockImplementation(() => {});
    warn = vi.spyOn(console, 'warn').mockImplementation(() => {});
    vi.spyOn(console, 'debug').mockImplementation(() => {});
    vi.spyOn(console, 'error').mockImplementation(() => {});

    closed = false;
    app = await buildServer({
      logger: false,
      now: () => NOW,
      logging: {
        displayThreshold: Severity.Display,
        consoleMinChannel: Severity.VeryVerbose,
        useColors: false,
        showTimestamp: false,
      },
    });
    await app.ready();
  });

  afterEach(async () => {
    if (!closed) {
      await app.close();
    }
  });

  it('reports health', async () => {
    const response = await app.inject({ method: 'GET', url: '/health' });

    expect(response.statusCode).toBe(200);
    expect(response.json()).toEqual({ status: 'ok', displayThreshold: 'Display', visibleMessages: 0, overlayClients: 0 });
  });

  it('logs to the console and the overlay at or above the threshold', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/log',
      payload: {
        context: { name: 'Gun', owner: { name: 'Player' } },
        message: 'fired',
        level: 'Warning',
      },
    });

    expect(response.statusCode).toBe(204);
    expect(warn).toHaveBeenCalledWith('LogOverlay: Warning: [Warning]\tPlayer.Gun: fired');

    const overlay = await app.inject({ method: 'GET', url: '/overlay' });
    expect(overlay.json()).toEqual([
      { id: 1, key: -1, line: '[Warning]\tPlayer.Gun: fired', color: '#FFFF00', expiresAt: NOW + 5000 },
    ]);
  });

  it('keeps lines below the threshold off the overlay', async () => {
    await app.inject({ method: 'POST', url: '/log', payload: { message: 'quiet', level: 'Log' } });

    expect(info).toHaveBeenCalledWith('LogOverlay: [Log]\tUnknownContext: quiet');
    expect(app.messageBoard.size).toBe(0);
  });

  it('defaults the level to Display', async () => {
    await app.inject({ method: 'POST', url: '/log', payload: { context: { name: 'HUD' }, message: 'ready' } });

    expect(info).toHaveBeenCalledWith('LogOverlay: Display: [Display]\tHUD: ready');
    expect(app.messageBoard.getVisibleMessages().map(message => message.line)).toEqual(['[Display]\tHUD: ready']);
  });

  it('changes the display threshold', async () => {
    const put = await app.inject({ method: 'PUT', url: '/display-threshold', payload: { level: 'Error' } });
    expect(put.json()).toEqual({ level: 'Error' });

    await app.inject({ method: 'POST', url: '/log', payload: { message: 'hot', level: 'Warning' } });

    expect(app.messageBoard.size).toBe(0);
    const get = await app.inject({ method: 'GET', url: '/display-threshold' });
    expect(get.json()).toEqual({ level: 'Error' });
  });

  it('rejects unknown severities and missing messages', async () => {
    const badLevel = await app.inject({ method: 'PUT', url: '/display-threshold', payload: { level: 'Loud' } });
    const noMessage = await app.inject({ method: 'POST', url: '/log', payload: { level: 'Log' } });

    expect(badLevel.statusCode).toBe(400);
    expect(noMessage.statusCode).toBe(400);
  });

  it('logs typed values', async () => {
    const context = { name: 'Player' };
    await app.inject({ method: 'POST', url: '/log/value', payload: { context, message: 'Speed', value: { type: 'float', value: 2.5 } } });
    await app.inject({ method: 'POST', url: '/log/value', payload: { context, message: 'At', value: { type: 'vector', value: { x: 1, y: 2, z: 3.5 } } } });
    await app.inject({ method: 'POST', url: '/log/value', payload: { context, message: 'Target', value: { type: 'object', value: null } } });

    expect(app.messageBoard.getVisibleMessages().map(message => message.line)).toEqual([
      '[Display]\tPlayer: Target: NULL',
      '[Display]\tPlayer: At: X=1.0 Y=2.0 Z=3.5',
      '[Display]\tPlayer: Speed: 2.5',
    ]);
  });

  it('rejects values that do not match their type', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/log/value',
      payload: { message: 'Ammo', value: { type: 'int', value: 2.5 } },
    });

    expect(response.statusCode).toBe(400);
  });

  it('reports NotValid and logs for a missing candidate in LogWhenInvalid mode', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/log/validity',
      payload: { context: { name: 'Spawner' }, candidate: null, mode: 'LogWhenInvalid', message: 'no target', level: 'Log' },
    });

    expect(response.json()).toEqual({ outcome: 'NotValid' });
    expect(info).toHaveBeenCalledWith('LogOverlay: [Log]\tSpawner: no target');
  });

  it('treats candidates marked dead as not valid', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/log/validity',
      payload: { candidate: { name: 'Door', alive: false }, mode: 'LogWhenValid', message: 'door ok', level: 'Log' },
    });

    expect(response.json()).toEqual({ outcome: 'NotValid' });
    expect(info).not.toHaveBeenCalled();
  });

  it('reports True without logging for a true condition in LogWhenFalse mode', async () => {
    const response = await app.inject({
      method: 'POST',
      url: '/log/condition',
      payload: { condition: true, mode: 'LogWhenFalse', message: 'never', level: 'Error' },
    });

    expect(response.json()).toEqual({ outcome: 'True' });
    expect(app.messageBoard.size).toBe(0);
  });

  it('stops the overlay loop on close', async () => {
    app.overlayLoop.start();
    expect(app.overlayLoop.isRunning()).toBe(true);

    await app.close();
    closed = true;

    expect(app.overlayLoop.isRunning()).toBe(false);
  });

  describe('overlay stream', () => {
    async function connect(): Promise<{ socket: WebSocket; received: ServerMessage[] }> {
      const received: ServerMessage[] = [];
      const socket = await app.injectWS('/ws/overlay', {}, {
        onInit: (ws) => {
          ws.on('message', (data) => {
            const message: ServerMessage = JSON.parse(data.toString());
            received.push(message);
          });
        },
      });
      return { socket, received };
    }

    it('sends a handshake, then a snapshot of the visible lines', async () => {
      await app.inject({ method: 'POST', url: '/log', payload: { context: { name: 'HUD' }, message: 'ready' } });

      const { socket, received } = await connect();

      await vi.waitFor(() => expect(received).toHaveLength(2));
      expect(received.map(message => message.type)).toEqual(['handshake', 'snapshot']);
      expect(received[1]).toEqual({
        type: 'snapshot',
        payload: {
          messages: [{ id: 1, key: -1, line: '[Display]\tHUD: ready', color: '#00FFFF', expiresAt: NOW + 5000 }],
          displayThreshold: 'Display',
        },
      });
      socket.terminate();
    });

    it('pushes new lines and expiries', async () => {
      const { socket, received } = await connect();
      await vi.waitFor(() => expect(received).toHaveLength(2));

      await app.inject({ method: 'POST', url: '/log', payload: { message: 'boom', level: 'Error' } });
      await vi.waitFor(() => expect(received).toHaveLength(3));
      expect(received[2]).toEqual({
        type: 'message',
        payload: { id: 1, key: -1, line: '[Error]\tUnknownContext: boom', color: '#FF0000', expiresAt: NOW + 5000 },
      });

      app.messageBoard.tick(NOW + 5000);
      await vi.waitFor(() => expect(received).toHaveLength(4));
      expect(received[3]).toEqual({ type: 'expired', payload: { ids: [1] } });
      socket.terminate();
    });

    it('drops clients that disconnect', async () => {
      const { socket, received } = await connect();
      await vi.waitFor(() => expect(received).toHaveLength(2));

      const connected = await app.inject({ method: 'GET', url: '/health' });
      expect(connected.json().overlayClients).toBe(1);

      socket.close();

      await vi.waitFor(async () => {
        const health = await app.inject({ method: 'GET', url: '/health' });
        expect(health.json().overlayClients).toBe(0);
      });
    });
  });
});
