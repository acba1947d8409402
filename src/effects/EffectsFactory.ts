/**
 * PRODUCTION EFFECTS IMPLEMENTATION
 *
 * The real implementations behind the effect interfaces:
 * - the local filesystem for the input documents and the report file
 * - stdout for the report, stderr for warnings and errors
 * - the high resolution timer for the elapsed time
 */
import {
  AppEffects,
  Clock,
  DiagnosticSink,
  DocumentReader,
  ReportConsole,
  ReportWriter,
} from '../pure/effects';
import {SalesReportConfig} from './types';
import {readFileSync, writeFileSync} from 'fs';
import {performance} from 'perf_hooks';

export const DEFAULT_REPORT_FILE = 'SalesResults.txt';

// ============================================================================
// Configuration
// ============================================================================

function encodingFromEnv(value: string | undefined): BufferEncoding {
  return value && Buffer.isEncoding(value) ? value : 'utf-8';
}

// Load configuration from environment variables
export function loadConfigFromEnv(env: NodeJS.ProcessEnv = process.env): SalesReportConfig {
  return {
    reportFile: env.SALES_REPORT_FILE || DEFAULT_REPORT_FILE,
    encoding: encodingFromEnv(env.SALES_REPORT_ENCODING),
  };
}

// ============================================================================
// Filesystem Documents & Reports
// ============================================================================

export class FsDocumentReader implements DocumentReader {
  constructor(private encoding: BufferEncoding) {}

  readText(path: string): string {
    return readFileSync(path, {encoding: this.encoding});
  }
}

export class FsReportWriter implements ReportWriter {
  constructor(private encoding: BufferEncoding) {}

  write(path: string, text: string): void {
    writeFileSync(path, text, {encoding: this.encoding});
  }
}

// ============================================================================
// Console
// ============================================================================

class StdoutReportConsole implements ReportConsole {
  print(text: string): void {
    console.log(text);
  }
}

class StderrDiagnosticSink implements DiagnosticSink {
  warn(message: string): void {
    console.warn(message);
  }

  error(message: string): void {
    console.error(message);
  }
}

class PerformanceClock implements Clock {
  now(): number {
    return performance.now();
  }
}

// ============================================================================
// Effects Factory
// ============================================================================

export class EffectsFactory implements AppEffects {
  private _documentReader?: DocumentReader;
  private _reportWriter?: ReportWriter;
  private _reportConsole?: ReportConsole;
  private _diagnosticSink?: DiagnosticSink;
  private _clock?: Clock;

  constructor(private config: SalesReportConfig) {}

  get documents(): DocumentReader {
    if (!this._documentReader) {
      this._documentReader = new FsDocumentReader(this.config.encoding);
    }
    return this._documentReader;
  }

  get reports(): ReportWriter {
    if (!this._reportWriter) {
      this._reportWriter = new FsReportWriter(this.config.encoding);
    }
    return this._reportWriter;
  }

  get console(): ReportConsole {
    if (!this._reportConsole) {
      this._reportConsole = new StdoutReportConsole();
    }
    return this._reportConsole;
  }

  get diagnostics(): DiagnosticSink {
    if (!this._diagnosticSink) {
      this._diagnosticSink = new StderrDiagnosticSink();
    }
    return this._diagnosticSink;
  }

  get clock(): Clock {
    if (!this._clock) {
      this._clock = new PerformanceClock();
    }
    return this._clock;
  }

  /**
   * Static factory method to create production effects
   */
  static make(config?: SalesReportConfig): AppEffects {
    return new EffectsFactory(config || loadConfigFromEnv());
  }
}

// Export a factory function
export function makeAppEffects(config?: SalesReportConfig): AppEffects {
  return EffectsFactory.make(config);
}
