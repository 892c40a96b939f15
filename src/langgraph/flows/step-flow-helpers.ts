import type { Logger } from "../core/services/logger.js";
import type { PropertyTaxApi } from "../core/services/tax-api/types.js";
import type { Installment } from "../core/services/tax-api/records.js";
import { respond } from "../core/helpers/state.js";
import { renderMessage } from "../core/helpers/template.js";
import type { NextQuestionType, SessionData, SessionState } from "../state.js";

export interface NodeDeps {
  api: PropertyTaxApi;
  logger: Logger;
}

export type StepNode = (state: SessionState) => Promise<SessionState>;

/** Halts with an internal error when a step runs without its preconditions. */
export function missingField(state: SessionState, field: string): SessionState {
  return respond(state, {
    description: renderMessage("missing_required_field", { field }),
    payloadSchema: null,
  });
}

export function authenticationFailed(state: SessionState): SessionState {
  return respond(state, { description: renderMessage("authentication_failed"), payloadSchema: null });
}

// Installments of the selected guide that already have a slip in this transaction.
export function issuedInstallments(data: SessionData): Set<string> {
  const issued = new Set<string>();
  for (const slip of data.generated_slips ?? []) {
    if (slip.fiscal_year !== data.fiscal_year || slip.guide_number !== data.selected_guide) continue;
    for (const number of slip.installments) issued.add(number);
  }
  return issued;
}

/** Unpaid installments of the selected guide without an issued slip. */
export function availableInstallments(data: SessionData): Installment[] {
  const issued = issuedInstallments(data);
  return (data.installments?.installments ?? []).filter((item) => !item.is_paid && !issued.has(item.number));
}

export function hasOtherGuides(data: SessionData): boolean {
  const withSlips = new Set(
    (data.generated_slips ?? []).filter((slip) => slip.fiscal_year === data.fiscal_year).map((slip) => slip.guide_number)
  );
  return (data.guides?.guides ?? []).some(
    (guide) => guide.guide_number !== data.selected_guide && !withSlips.has(guide.guide_number)
  );
}

export function classifyNextQuestion(data: SessionData): NextQuestionType {
  if (availableInstallments(data).length > 0) return "more_installments";
  if (hasOtherGuides(data)) return "other_guides";
  return "other_property";
}

export function slipCount(state: SessionState): number {
  const selected = state.data.selected_installments ?? [];
  return state.internal.separate_slips ? selected.length : 1;
}
