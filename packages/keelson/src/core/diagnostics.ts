export type Severity = 'error' | 'warning';

export interface SourceRange {
  filename: string;
  /** 1-based */
  line: number;
  /** 1-based */
  column: number;
}

export interface Diagnostic {
  severity: Severity;
  summary: string;
  detail?: string;
  range?: SourceRange;
}

export function errorDiagnostic(summary: string, detail?: string, range?: SourceRange): Diagnostic {
  return withOptional({ severity: 'error', summary }, detail, range);
}

function withOptional(base: Diagnostic, detail?: string, range?: SourceRange): Diagnostic {
  return {
    ...base,
    ...(detail !== undefined ? { detail } : {}),
    ...(range !== undefined ? { range } : {}),
  };
}

export function hasErrors(diagnostics: readonly Diagnostic[]): boolean {
  return diagnostics.some((d) => d.severity === 'error');
}

export function formatRange(range: SourceRange): string {
  return `${range.filename}:${range.line}:${range.column}`;
}

export function formatDiagnostic(diagnostic: Diagnostic): string {
  const prefix = diagnostic.severity === 'error' ? 'Error' : 'Warning';
  let text = `${prefix}: ${diagnostic.summary}`;
  if (diagnostic.detail && diagnostic.detail !== diagnostic.summary) {
    text += `; ${diagnostic.detail}`;
  }
  if (diagnostic.range) {
    text += ` (${formatRange(diagnostic.range)})`;
  }
  return text;
}

/** Returned by loadConfig when a component with required fields gets no configuration at all. */
export const CONFIG_ABSENT: Diagnostic = {
  severity: 'error',
  summary: 'component requires configuration',
  detail: 'component has required fields in its configuration, so configuration block must be created',
};
