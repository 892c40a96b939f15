import crypto from "node:crypto";
import {
  SessionDataSchema,
  SessionStateSchema,
  type DataField,
  type InternalField,
  type PendingResponse,
  type SessionData,
  type SessionInternal,
  type SessionState,
} from "../../state.js";
import type { PayloadContract } from "./payload.js";

export function patchData(state: SessionState, patch: Partial<SessionData>): SessionState {
  return { ...state, data: { ...state.data, ...patch } };
}

export function patchInternal(state: SessionState, patch: Partial<SessionInternal>): SessionState {
  return { ...state, internal: { ...state.internal, ...patch } };
}

export function createInitialState(params?: { sessionId?: string }): SessionState {
  const session_id = params?.sessionId ?? crypto.randomUUID();
  return SessionStateSchema.parse({ session_id });
}

/** Sets the question for the caller; the graph halts on the next edge. */
export function respond(
  state: SessionState,
  response: { description: string; payloadSchema: PayloadContract | null; errorMessage?: string | null }
): SessionState {
  const pending: PendingResponse = {
    description: response.description,
    payload_schema: response.payloadSchema,
    error_message: response.errorMessage ?? null,
  };
  return { ...state, pending_response: pending };
}

export function proceed(state: SessionState): SessionState {
  return state.pending_response === null ? state : { ...state, pending_response: null };
}

function omitData(data: SessionData, keys: readonly DataField[]): SessionData {
  const copy: SessionData = { ...data };
  for (const key of keys) delete copy[key];
  return copy;
}

function omitInternal(internal: SessionInternal, keys: readonly InternalField[]): SessionInternal {
  const copy: SessionInternal = { ...internal };
  for (const key of keys) delete copy[key];
  return copy;
}

/** Clears both durable namespaces, optionally keeping the property id. */
export function resetAll(state: SessionState, options: { keepPropertyId?: boolean } = {}): SessionState {
  const propertyId = state.data.property_id;
  const data: SessionData = options.keepPropertyId && propertyId !== undefined ? { property_id: propertyId } : {};
  return { ...state, data, internal: {} };
}

/** Clears both namespaces but keeps one data field as it was. */
export function resetAllKeeping(state: SessionState, field: DataField): SessionState {
  const others = SessionDataSchema.keyof().options.filter((key) => key !== field);
  return { ...state, data: omitData(state.data, others), internal: {} };
}

export function resetFields(
  state: SessionState,
  fields: { data?: readonly DataField[]; internal?: readonly InternalField[] },
  options: { keepPropertyId?: boolean } = {}
): SessionState {
  const dataKeys = (fields.data ?? []).filter((key) => !(options.keepPropertyId && key === "property_id"));
  return {
    ...state,
    data: omitData(state.data, dataKeys),
    internal: omitInternal(state.internal, fields.internal ?? []),
  };
}

const FLOW_FLAGS: readonly InternalField[] = [
  "separate_slips",
  "data_confirmed",
  "slips_generated",
  "next_question_type",
  "wants_more_installments",
  "wants_other_guides",
  "wants_other_property",
];

// Back to installment selection on the same guide; issued slips stay listed.
export function resetForInstallmentSelection(state: SessionState): SessionState {
  return resetFields(state, { data: ["selected_installments"], internal: FLOW_FLAGS }, { keepPropertyId: true });
}

// Back to guide selection for the same property and year.
export function resetForGuideSelection(state: SessionState): SessionState {
  return resetFields(
    state,
    { data: ["selected_guide", "installments", "selected_installments"], internal: FLOW_FLAGS },
    { keepPropertyId: true }
  );
}

// Back to year selection for the same property.
export function resetForYearSelection(state: SessionState): SessionState {
  return resetFields(
    state,
    {
      data: [
        "fiscal_year",
        "guides",
        "selected_guide",
        "installments",
        "selected_installments",
        "generated_slips",
        "active_debt",
      ],
      internal: [...FLOW_FLAGS, "guides_consulted"],
    },
    { keepPropertyId: true }
  );
}
