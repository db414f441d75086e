export type SourceSpan = {
  file: string;
  start: number;
  end: number;
};

export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase =
  | "class-declarations"
  | "instance-declarations"
  | "resolution";

export type DiagnosticHint = {
  message: string;
};

export type Diagnostic = {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  span: SourceSpan;
  phase?: DiagnosticPhase;
  related?: readonly Diagnostic[];
  hints?: readonly DiagnosticHint[];
};

export type DiagnosticInput = Omit<Diagnostic, "severity" | "phase"> & {
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
};
