import type { SourceLocation } from './sexpr';

export type DiagnosticSeverity = 'info' | 'warning' | 'error';

export interface Diagnostic {
  readonly severity: DiagnosticSeverity;
  readonly message: string;
  readonly location?: SourceLocation;
  /** Where in the document the problem was found, e.g. "kicad_pcb > segment" */
  readonly context?: string;
}

/** Collects diagnostics in the order they were reported */
export class DiagnosticBag {
  private readonly entries: Diagnostic[] = [];

  add(diagnostic: Diagnostic): void {
    this.entries.push(Object.freeze({ ...diagnostic }));
  }

  info(message: string, location?: SourceLocation, context?: string): void {
    this.add({ severity: 'info', message, location, context });
  }

  warning(message: string, location?: SourceLocation, context?: string): void {
    this.add({ severity: 'warning', message, location, context });
  }

  error(message: string, location?: SourceLocation, context?: string): void {
    this.add({ severity: 'error', message, location, context });
  }

  get all(): readonly Diagnostic[] {
    return this.entries;
  }

  get hasErrors(): boolean {
    return this.entries.some(d => d.severity === 'error');
  }

  get size(): number {
    return this.entries.length;
  }
}

/** "error 3:7: Unterminated string" */
export function formatDiagnostic(diagnostic: Diagnostic): string {
  const where = diagnostic.location ? ` ${diagnostic.location.line}:${diagnostic.location.column}` : '';
  const context = diagnostic.context ? ` (${diagnostic.context})` : '';
  return `${diagnostic.severity}${where}: ${diagnostic.message}${context}`;
}
