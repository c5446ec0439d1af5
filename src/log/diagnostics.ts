export type DiagnosticLevel = "error" | "warn" | "info";

export type Diagnostic = {
  level: DiagnosticLevel;
  code: string;
  message: string;
  path?: string;
  details?: Record<string, unknown>;
};

export function diag(
  level: DiagnosticLevel,
  code: string,
  message: string,
  extra?: Pick<Diagnostic, "path" | "details">
): Diagnostic {
  return { level, code, message, ...extra };
}

export function errorMessage(err: unknown): string {
  return err instanceof Error ? err.message : String(err);
}
