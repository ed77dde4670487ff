export type AgentErrorCode = 'CONFIG_INVALID' | 'PROXY_LIST_UNREADABLE' | 'STATUS_UNREADABLE';

export class AgentError extends Error {
  public readonly code: AgentErrorCode;
  public readonly details?: Record<string, unknown>;

  public constructor(params: {
    code: AgentErrorCode;
    message: string;
    details?: Record<string, unknown>;
  }) {
    super(params.message);
    this.name = 'AgentError';
    this.code = params.code;
    if (params.details !== undefined) {
      this.details = params.details;
    }
  }
}

export function formatAgentError(error: AgentError): string {
  return `${error.code}: ${error.message}`;
}

export function toErrorMessage(error: unknown): string {
  if (error instanceof AgentError) return formatAgentError(error);
  if (error instanceof Error) return error.message;
  return String(error);
}
