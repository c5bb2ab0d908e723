export type Artifact = {
  kind: string;
  payload: unknown;
};

export const TOOL_ERROR_KINDS = [
  'infrastructure',
  'timeout',
  'cancelled',
  'malformed_result',
  'no_result',
  'execution',
  'rejected',
  'reasoning'
] as const;

export type ToolErrorKind = (typeof TOOL_ERROR_KINDS)[number];

export type ToolOutput = {
  success: boolean;
  output: string;
  error: string | null;
  errorKind: ToolErrorKind | null;
  artifacts: Artifact[];
};

export type ExecuteRequest = {
  sessionId: string;
  code: string;
  resourceRefs: string[];
  signal?: AbortSignal;
};

export type InstallRequest = {
  sessionId: string;
  packageSpec: string;
  signal?: AbortSignal;
};

/**
 * An isolated, stateful place to run code. Implementations never throw for a failed run; every
 * failure comes back as a ToolOutput with an errorKind.
 */
export interface ExecutionBackend {
  readonly name: string;
  execute(request: ExecuteRequest): Promise<ToolOutput>;
  installPackage(request: InstallRequest): Promise<ToolOutput>;
  resetSession(sessionId: string): Promise<boolean>;
}
