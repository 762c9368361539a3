import { Severity } from './Severity.ts';

/**
 * 8-bit RGBA color, as handed to on-screen display sinks
 */
export interface Color {
  readonly r: number;
  readonly g: number;
  readonly b: number;
  readonly a: number;
}

function rgb(r: number, g: number, b: number): Color {
  return Object.freeze({ r, g, b, a: 255 });
}

// Engine debug palette
export const Colors = Object.freeze({
  White: rgb(255, 255, 255),
  Purple: rgb(169, 7, 228),
  Blue: rgb(0, 0, 255),
  Green: rgb(0, 255, 0),
  Cyan: rgb(0, 255, 255),
  Yellow: rgb(255, 255, 0),
  Red: rgb(255, 0, 0),
  Magenta: rgb(255, 0, 255),
});

export const DEFAULT_COLOR: Color = Colors.White;

/**
 * On-screen color per severity. Fixed at load time.
 */
export const SEVERITY_COLORS: ReadonlyMap<Severity, Color> = new Map<Severity, Color>([
  [Severity.VeryVerbose, Colors.Purple],
  [Severity.Verbose, Colors.Blue],
  [Severity.Log, Colors.Green],
  [Severity.Display, Colors.Cyan],
  [Severity.Warning, Colors.Yellow],
  [Severity.Error, Colors.Red],
  [Severity.Fatal, Colors.Magenta],
]);

export function getColorForSeverity(level: Severity): Color {
  return SEVERITY_COLORS.get(level) ?? DEFAULT_COLOR;
}

export function colorsEqual(a: Color, b: Color): boolean {
  return a.r === b.r && a.g === b.g && a.b === b.b && a.a === b.a;
}

/**
 * `#RRGGBB` form used on the wire
 */
export function colorToHex(color: Color): string {
  const hex = (channel: number) => channel.toString(16).padStart(2, '0').toUpperCase();
  return `#${hex(color.r)}${hex(color.g)}${hex(color.b)}`;
}

/**
 * 24-bit ANSI foreground escape for terminal output
 */
export function colorToAnsi(color: Color): string {
  return `\x1b[38;2;${color.r};${color.g};${color.b}m`;
}
