import type { OnScreenMessageBoard } from '@shared/logging/index.ts';

export interface OverlayLoopOptions {
  /** Ticks per second */
  tickRate?: number;
  now?: () => number;
}

const DEFAULT_TICK_RATE = 10; // Hz

/**
 * Expires on-screen messages at a fixed rate. Expiry listeners registered on
 * the board fire from here.
 */
export class OverlayLoop {
  private readonly board: OnScreenMessageBoard;
  private readonly tickIntervalMs: number;
  private readonly now: () => number;
  private timer: NodeJS.Timeout | null = null;
  private ticks = 0;

  constructor(board: OnScreenMessageBoard, options: OverlayLoopOptions = {}) {
    const tickRate = options.tickRate ?? DEFAULT_TICK_RATE;
    this.board = board;
    this.tickIntervalMs = 1000 / tickRate;
    this.now = options.now ?? Date.now;
  }

  get tickCount(): number {
    return this.ticks;
  }

  isRunning(): boolean {
    return this.timer !== null;
  }

  start(): void {
    if (this.timer) return;
    this.timer = setInterval(() => this.runTick(), this.tickIntervalMs);
  }

  stop(): void {
    if (!this.timer) return;
    clearInterval(this.timer);
    this.timer = null;
  }

  runTick(): void {
    this.ticks += 1;
    this.board.tick(this.now());
  }
}
