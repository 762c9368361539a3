import { Severity, SEVERITY_NAMES, isSeverity } from '../Severity.ts';
import { colorToAnsi, getColorForSeverity } from '../colors.ts';
import type { PermanentLogSink } from '../types.ts';

const ANSI = {
  RESET: '\x1b[0m',
  BOLD: '\x1b[1m',
  TIMESTAMP: '\x1b[90m', // Gray
} as const;

type ConsoleMethod = (...data: unknown[]) => void;

export interface ConsoleLogSinkOptions {
  /** Log category printed before each line (default: LogOverlay) */
  category?: string;
  /** Lowest channel this sink prints (default: VeryVerbose) */
  minChannel?: Severity;
  /** Use ANSI colors in output (default: true) */
  useColors?: boolean;
  /** Show timestamp (default: false) */
  showTimestamp?: boolean;
  /** Timestamp format: 'iso' | 'time' | 'epoch' */
  timestampFormat?: 'iso' | 'time' | 'epoch';
  /** Clock, for tests */
  now?: () => Date;
}

/**
 * Console Log Sink - engine-style output log on the Node console
 *
 * Lines look like `LogOverlay: Warning: [Warning]\tPlayer: low health`; the Log
 * channel omits its verbosity label. Fatal lines are printed, never fatal.
 */
export class ConsoleLogSink implements PermanentLogSink {
  private options: Required<ConsoleLogSinkOptions>;

  constructor(options: ConsoleLogSinkOptions = {}) {
    this.options = {
      category: options.category ?? 'LogOverlay',
      minChannel: options.minChannel ?? Severity.VeryVerbose,
      useColors: options.useColors ?? true,
      showTimestamp: options.showTimestamp ?? false,
      timestampFormat: options.timestampFormat ?? 'time',
      now: options.now ?? (() => new Date()),
    };
  }

  write(channel: Severity, line: string): void {
    if (channel < this.options.minChannel) return;

    const output = this.options.useColors
      ? this.formatColored(channel, line)
      : this.formatPlain(channel, line);

    this.getConsoleMethod(channel)(output);
  }

  /**
   * Uncolored output line for a channel
   */
  formatPlain(channel: Severity, line: string): string {
    const parts: string[] = [];

    if (this.options.showTimestamp) {
      parts.push(this.formatTimestamp());
    }

    parts.push(this.formatPrefix(channel));
    parts.push(line);

    return parts.join(' ');
  }

  private formatColored(channel: Severity, line: string): string {
    const parts: string[] = [];

    if (this.options.showTimestamp) {
      parts.push(`${ANSI.TIMESTAMP}${this.formatTimestamp()}${ANSI.RESET}`);
    }

    const color = colorToAnsi(getColorForSeverity(channel));
    parts.push(`${color}${ANSI.BOLD}${this.formatPrefix(channel)}${ANSI.RESET}`);
    parts.push(`${color}${line}${ANSI.RESET}`);

    return parts.join(' ');
  }

  private formatPrefix(channel: Severity): string {
    if (channel === Severity.Log || !isSeverity(channel)) {
      return `${this.options.category}:`;
    }
    return `${this.options.category}: ${SEVERITY_NAMES[channel]}:`;
  }

  private formatTimestamp(): string {
    const now = this.options.now();
    switch (this.options.timestampFormat) {
      case 'iso':
        return now.toISOString();
      case 'epoch':
        return String(now.getTime());
      case 'time':
      default:
        // HH:MM:SS.mmm
        return now.toISOString().slice(11, 23);
    }
  }

  private getConsoleMethod(channel: Severity): ConsoleMethod {
    switch (channel) {
      case Severity.VeryVerbose:
      case Severity.Verbose:
        return console.debug;
      case Severity.Log:
      case Severity.Display:
        return console.info;
      case Severity.Warning:
        return console.warn;
      case Severity.Error:
      case Severity.Fatal:
        return console.error;
      default:
        return console.log;
    }
  }
}
