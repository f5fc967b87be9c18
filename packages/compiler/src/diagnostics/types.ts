export type DiagnosticSeverity = "error" | "warning" | "note";

export type DiagnosticPhase =
  | "query"
  | "signature"
  | "fields"
  | "call-resolution"
  | "internal";

export type SourceSpan = {
  file: string;
  start: number;
  end: number;
};

export type DiagnosticHint = {
  message: string;
};

export type Diagnostic = {
  code: string;
  message: string;
  severity: DiagnosticSeverity;
  phase?: DiagnosticPhase;
  span: SourceSpan;
  /** Key of the syntax node the diagnostic is attached to. */
  nodeId?: string;
  related?: readonly Diagnostic[];
  hints?: readonly DiagnosticHint[];
};

export type DiagnosticInput = Omit<Diagnostic, "severity" | "phase"> & {
  severity?: DiagnosticSeverity;
  phase?: DiagnosticPhase;
};
