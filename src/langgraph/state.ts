import * as z from "zod";
import { Annotation } from "@langchain/langgraph";
import {
  DebtInfoSchema,
  GeneratedSlipSchema,
  GuideSetSchema,
  InstallmentSetSchema,
} from "./core/services/tax-api/records.js";
import { PAYLOAD_CONTRACTS } from "./core/helpers/payload.js";

export type SessionStatus = "progress" | "completed" | "error";

// Follow-up question asked after a successful slip generation.
export const NEXT_QUESTION_TYPES = ["more_installments", "other_guides", "other_property"] as const;
export type NextQuestionType = (typeof NEXT_QUESTION_TYPES)[number];

// Durable facts gathered during the conversation.
export const SessionDataSchema = z.object({
  property_id: z.string().optional(),
  address: z.string().nullable().optional(),
  owner: z.string().nullable().optional(),
  fiscal_year: z.number().int().optional(),
  guides: GuideSetSchema.optional(),
  selected_guide: z.string().optional(),
  installments: InstallmentSetSchema.optional(),
  selected_installments: z.array(z.string()).optional(),
  generated_slips: z.array(GeneratedSlipSchema).optional(),
  active_debt: DebtInfoSchema.optional(),
});
export type SessionData = z.infer<typeof SessionDataSchema>;

// Bookkeeping flags never shown to the user.
export const SessionInternalSchema = z.object({
  guides_consulted: z.boolean().optional(),
  data_confirmed: z.boolean().optional(),
  separate_slips: z.boolean().optional(),
  slips_generated: z.boolean().optional(),
  next_question_type: z.enum(NEXT_QUESTION_TYPES).optional(),
  wants_more_installments: z.boolean().optional(),
  wants_other_guides: z.boolean().optional(),
  wants_other_property: z.boolean().optional(),
  failed_year_attempts: z.record(z.string(), z.number().int().min(0)).optional(),
});
export type SessionInternal = z.infer<typeof SessionInternalSchema>;

export type DataField = keyof SessionData;
export type InternalField = keyof SessionInternal;

// Question handed back to the caller; halts the graph while set.
export const PendingResponseSchema = z.object({
  description: z.string(),
  payload_schema: z.enum(PAYLOAD_CONTRACTS).nullable(),
  error_message: z.string().nullable(),
});
export type PendingResponse = z.infer<typeof PendingResponseSchema>;

export const SessionStateSchema = z.object({
  session_id: z.string(),
  status: z.enum(["progress", "completed", "error"]).default("progress"),
  payload: z.record(z.string(), z.unknown()).default({}),
  data: SessionDataSchema.default({}),
  internal: SessionInternalSchema.default({}),
  pending_response: PendingResponseSchema.nullable().default(null),
});
export type SessionState = z.infer<typeof SessionStateSchema>;

// Layout written by the session stores: the transient channels are dropped.
export const PersistedSessionSchema = z.object({
  status: z.enum(["progress", "completed", "error"]).default("progress"),
  data: SessionDataSchema.default({}),
  internal: SessionInternalSchema.default({}),
});
export type PersistedSession = z.infer<typeof PersistedSessionSchema>;

function replace<T>(initial: () => T) {
  return Annotation<T>({
    reducer: (_left: T, right: T) => right,
    default: initial,
  });
}

/**
 * Graph channels mirroring SessionState. Every channel is last-write-wins:
 * steps always hand back a complete copy of the namespace they touched.
 */
export const SessionAnnotation = Annotation.Root({
  session_id: replace<string>(() => ""),
  status: replace<SessionStatus>(() => "progress"),
  payload: replace<Record<string, unknown>>(() => ({})),
  data: replace<SessionData>(() => ({})),
  internal: replace<SessionInternal>(() => ({})),
  pending_response: replace<PendingResponse | null>(() => null),
});
