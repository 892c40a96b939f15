import { payloadJsonSchema, type PayloadJsonSchema } from "../core/helpers/payload.js";
import { createInitialState } from "../core/helpers/state.js";
import { renderMessage } from "../core/helpers/template.js";
import { createLogger, type Logger } from "../core/services/logger.js";
import { runTurn, type PropertyTaxGraph } from "../graph.js";
import { SessionStateSchema, type SessionData, type SessionState, type SessionStatus } from "../state.js";
import type { SessionStore } from "./store.js";

/** What a chat front end receives after each turn. */
export interface TurnResponse {
  session_id: string;
  status: SessionStatus;
  description: string;
  /** JSON schema of the payload expected next; null for final or fatal messages. */
  payload_schema: PayloadJsonSchema | null;
  error_message: string | null;
  data: SessionData;
}

function toResponse(state: SessionState): TurnResponse {
  const pending = state.pending_response;
  return {
    session_id: state.session_id,
    status: state.status,
    description: pending?.description ?? "",
    payload_schema: pending?.payload_schema ? payloadJsonSchema(pending.payload_schema) : null,
    error_message: pending?.error_message ?? null,
    data: state.data,
  };
}

/**
 * Entry point for driving the workflow one turn at a time. Turns for the same
 * session run strictly in arrival order; different sessions run independently.
 */
export class TurnRunner {
  private readonly queues = new Map<string, Promise<void>>();
  private readonly logger: Logger;

  constructor(
    private readonly graphApp: PropertyTaxGraph,
    private readonly store: SessionStore,
    logger?: Logger
  ) {
    this.logger = logger ?? createLogger("turn-runner");
  }

  runTurn(sessionId: string, payload: Record<string, unknown> = {}): Promise<TurnResponse> {
    const previous = this.queues.get(sessionId) ?? Promise.resolve();
    const turn = previous.then(() => this.execute(sessionId, payload));
    // The queue only tracks completion; callers see the outcome through `turn`.
    const settled = turn.then(
      () => undefined,
      () => undefined
    );
    this.queues.set(sessionId, settled);
    void settled.then(() => {
      if (this.queues.get(sessionId) === settled) this.queues.delete(sessionId);
    });
    return turn;
  }

  private async loadState(sessionId: string): Promise<SessionState> {
    const persisted = await this.store.load(sessionId);
    if (!persisted) return createInitialState({ sessionId });
    return SessionStateSchema.parse({ ...persisted, session_id: sessionId });
  }

  private async execute(sessionId: string, payload: Record<string, unknown>): Promise<TurnResponse> {
    const state = await this.loadState(sessionId);
    this.logger.debug({ sessionId, fields: Object.keys(payload) }, "turn started");

    let next: SessionState;
    try {
      next = await runTurn(this.graphApp, state, payload);
    } catch (error) {
      this.logger.error({ err: error, sessionId }, "turn failed");
      await this.store.save(sessionId, { status: "error", data: state.data, internal: state.internal });
      return {
        session_id: sessionId,
        status: "error",
        description: renderMessage("internal_error"),
        payload_schema: null,
        error_message: error instanceof Error ? error.name : null,
        data: state.data,
      };
    }

    await this.store.save(sessionId, { status: next.status, data: next.data, internal: next.internal });
    this.logger.info(
      { sessionId, status: next.status, expects: next.pending_response?.payload_schema ?? null },
      "turn finished"
    );
    return toResponse(next);
  }
}
