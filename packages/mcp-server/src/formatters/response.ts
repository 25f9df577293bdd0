import { describeError, StepFailure } from "@competitive-intel/agents";

export interface ToolResponse {
  [key: string]: unknown;
  content: Array<{ type: "text"; text: string }>;
  isError?: boolean;
}

/** Errors carry the failing step, when there is one. */
export function errorBody(err: unknown): Record<string, unknown> {
  const body: Record<string, unknown> = {
    error: describeError(err),
    kind: err instanceof Error ? err.name : "Error",
  };
  if (err instanceof StepFailure) {
    body.step = err.stepName;
    body.agent = err.agent;
  }
  return body;
}

export function wrapResponse(result: unknown): ToolResponse {
  if (result instanceof Error) {
    return {
      content: [{ type: "text" as const, text: JSON.stringify(errorBody(result)) }],
      isError: true,
    };
  }
  const text = typeof result === "string" ? result : JSON.stringify(result, null, 2);
  return {
    content: [{ type: "text" as const, text }],
  };
}
