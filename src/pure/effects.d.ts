/**
 * EFFECTS LAYER
 *
 * Everything the report run needs from the outside world, as small
 * synchronous interfaces. Implementations throw on failure; the coordinator
 * decides which failures are fatal.
 */

// ============================================================================
// Effect Interfaces
// ============================================================================

export interface DocumentReader {
  readText(path: string): string;
}

export interface ReportWriter {
  write(path: string, text: string): void;
}

export interface ReportConsole {
  print(text: string): void;
}

export interface DiagnosticSink {
  warn(message: string): void;
  error(message: string): void;
}

export interface Clock {
  /** Milliseconds from an arbitrary origin. */
  now(): number;
}

// ============================================================================
// Combined Dependencies
// ============================================================================

export type AppEffects = {
  readonly documents: DocumentReader;
  readonly reports: ReportWriter;
  readonly console: ReportConsole;
  readonly diagnostics: DiagnosticSink;
  readonly clock: Clock;
}
