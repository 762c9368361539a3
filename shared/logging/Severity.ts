/**
 * Severities in order of importance (lowest to highest)
 */
export enum Severity {
  VeryVerbose = 0,
  Verbose = 1,
  Log = 2,
  Display = 3,
  Warning = 4,
  Error = 5,
  Fatal = 6,
}

/**
 * Display names for severities, as they appear in formatted lines
 */
export const SEVERITY_NAMES: Record<Severity, string> = {
  [Severity.VeryVerbose]: 'VeryVerbose',
  [Severity.Verbose]: 'Verbose',
  [Severity.Log]: 'Log',
  [Severity.Display]: 'Display',
  [Severity.Warning]: 'Warning',
  [Severity.Error]: 'Error',
  [Severity.Fatal]: 'Fatal',
};

export const UNKNOWN_SEVERITY_NAME = 'Unknown';

export const ALL_SEVERITIES: readonly Severity[] = [
  Severity.VeryVerbose,
  Severity.Verbose,
  Severity.Log,
  Severity.Display,
  Severity.Warning,
  Severity.Error,
  Severity.Fatal,
];

export function isSeverity(value: number): value is Severity {
  return ALL_SEVERITIES.includes(value);
}

export function severityName(level: Severity): string {
  return isSeverity(level) ? SEVERITY_NAMES[level] : UNKNOWN_SEVERITY_NAME;
}

/**
 * Parse a severity from its name (case-insensitive)
 */
export function parseSeverity(text: string, fallback: Severity = Severity.Display): Severity {
  const normalized = text.trim().toLowerCase();
  switch (normalized) {
    case 'veryverbose': return Severity.VeryVerbose;
    case 'verbose': return Severity.Verbose;
    case 'log': return Severity.Log;
    case 'display': return Severity.Display;
    case 'warning': return Severity.Warning;
    case 'error': return Severity.Error;
    case 'fatal': return Severity.Fatal;
    default: return fallback;
  }
}

/**
 * Permanent-sink channel for a severity. Values outside the enumeration go to
 * the Log channel.
 */
export function channelForSeverity(level: Severity): Severity {
  switch (level) {
    case Severity.VeryVerbose: return Severity.VeryVerbose;
    case Severity.Verbose: return Severity.Verbose;
    case Severity.Log: return Severity.Log;
    case Severity.Display: return Severity.Display;
    case Severity.Warning: return Severity.Warning;
    case Severity.Error: return Severity.Error;
    case Severity.Fatal: return Severity.Fatal;
    default: return Severity.Log;
  }
}
