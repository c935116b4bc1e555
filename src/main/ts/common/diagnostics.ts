import type { Span } from "./span.js";

export enum DiagnosticSeverity {
  Error,
  Warning,
  Info,
  Hint,
}

export interface Diagnostic {
  severity: DiagnosticSeverity;
  message: string;
  code?: string;
  span?: Span;
}

export interface ReporterOptions {
  /** Record diagnostics without writing them to the console. */
  quiet?: boolean;
  /** Receives each diagnostic in place of the console line. */
  sink?: (diagnostic: Diagnostic) => void;
}

export class DiagnosticReporter {
  private diagnostics: Diagnostic[] = [];
  private readonly quiet: boolean;
  private readonly sink?: (diagnostic: Diagnostic) => void;

  constructor(options: ReporterOptions = {}) {
    this.quiet = options.quiet ?? false;
    this.sink = options.sink;
  }

  report(diagnostic: Diagnostic) {
    this.diagnostics.push(diagnostic);
    if (this.quiet) return;
    if (this.sink) this.sink(diagnostic);
    else this.printDiagnostic(diagnostic);
  }

  private printDiagnostic(diagnostic: Diagnostic) {
    const severityStr = DiagnosticSeverity[diagnostic.severity].toUpperCase();
    let message = `[${severityStr}] ${diagnostic.message}`;

    if (diagnostic.span) {
      const { start, sourceFile } = diagnostic.span;
      message = `${sourceFile}:${start.line}:${start.column} - ${message}`;
    }

    if (diagnostic.severity === DiagnosticSeverity.Error) {
      console.error(message);
    } else {
      console.log(message);
    }
  }

  hasErrors(): boolean {
    return this.diagnostics.some(
      (d) => d.severity === DiagnosticSeverity.Error
    );
  }

  getDiagnostics(): Diagnostic[] {
    return this.diagnostics;
  }
}
