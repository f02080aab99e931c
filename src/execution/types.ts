/**
 * What a conversation sends to the agent for one turn.
 */
export interface AgentRequest {
  text: string;
  /** Session to continue; null starts a new one. */
  resumeSessionId: string | null;
  model: string | null;
}

/** The agent's answer to one AgentRequest. */
export interface AgentResult {
  response: string;
  sessionId: string;
  cost: number;
  durationMs: number;
  model: string;
}

export interface InvokeOptions {
  timeoutMs: number;
}

/**
 * Boundary to the external agent. Implementations must reject with an
 * ExecutionError on failure or timeout and must not leave a child running.
 */
export interface AgentClient {
  invoke(request: AgentRequest, options: InvokeOptions): Promise<AgentResult>;
}

/** An AgentResult stamped with the time the turn finished. */
export interface ExecutionRecord extends AgentResult {
  timestamp: string;
}
