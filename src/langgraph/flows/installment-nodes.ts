import { InstallmentsField, PAYLOAD_FIELDS, readPayloadField } from "../core/helpers/payload.js";
import { parseBrazilianDate } from "../core/helpers/parsing.js";
import {
  patchData,
  patchInternal,
  proceed,
  resetForGuideSelection,
  resetForInstallmentSelection,
  respond,
} from "../core/helpers/state.js";
import { joinBlocks, renderMessage, type TemplateVars } from "../core/helpers/template.js";
import type { MessageKey } from "../core/config/messaging.js";
import { AuthenticationError, ServiceUnavailableError } from "../core/services/tax-api/errors.js";
import type { InstallmentSet } from "../core/services/tax-api/records.js";
import { formatGuideChoices, formatInstallmentList, formatServiceUnavailable } from "../templates.js";
import type { SessionState } from "../state.js";
import { SINGLE_INSTALLMENT_CUTOFF } from "./step-flow-config.js";
import {
  authenticationFailed,
  availableInstallments,
  issuedInstallments,
  missingField,
  type NodeDeps,
  type StepNode,
} from "./step-flow-helpers.js";

// Drops the chosen guide and asks for another one.
function backToGuideSelection(state: SessionState, intro: string, errorMessage?: string): SessionState {
  const next = resetForGuideSelection(state);
  const guides = next.data.guides;
  return respond(next, {
    description: joinBlocks(intro, guides ? formatGuideChoices(guides) : null),
    payloadSchema: "guide_number",
    errorMessage,
  });
}

export function createListInstallmentsNode({ api, logger }: NodeDeps): StepNode {
  return async (state) => {
    const { property_id: propertyId, fiscal_year: fiscalYear, selected_guide: guideNumber } = state.data;
    if (propertyId === undefined) return missingField(state, "property_id");
    if (fiscalYear === undefined) return missingField(state, "fiscal_year");
    if (guideNumber === undefined) return missingField(state, "selected_guide");
    if (state.data.installments?.guide_number === guideNumber) return proceed(state);

    let installmentSet: InstallmentSet | null;
    try {
      installmentSet = await api.listInstallments(propertyId, fiscalYear, guideNumber);
    } catch (error) {
      if (error instanceof ServiceUnavailableError) {
        return backToGuideSelection(state, formatServiceUnavailable(error.message), error.message);
      }
      if (error instanceof AuthenticationError) return authenticationFailed(state);
      throw error;
    }

    const vars: TemplateVars = { guide_number: guideNumber };
    const emptyResult = (key: MessageKey) => {
      logger.info({ propertyId, fiscalYear, guideNumber, reason: key }, "guide has nothing to pay");
      return backToGuideSelection(state, renderMessage(key, vars));
    };
    if (!installmentSet || installmentSet.installments.length === 0) return emptyResult("no_installments");
    if (installmentSet.installments.every((item) => item.is_paid)) return emptyResult("installments_paid");

    const guide = state.data.guides?.guides.find((item) => item.guide_number === guideNumber);
    const next = patchData(state, {
      installments: { ...installmentSet, guide_kind: guide?.kind ?? installmentSet.guide_kind },
    });
    if (availableInstallments(next.data).length === 0) return emptyResult("installments_all_issued");
    return proceed(next);
  };
}

function sameSelection(left: readonly string[], right: readonly string[]): boolean {
  return left.length === right.length && left.every((value, idx) => value === right[idx]);
}

/**
 * Collects the installments to pay. Paid, unknown and already issued numbers
 * are rejected, as is a lone installment due on or after the cutoff date.
 */
export function createChooseInstallmentsNode(_deps: NodeDeps): StepNode {
  return async (state) => {
    const installmentSet = state.data.installments;
    if (!installmentSet) return missingField(state, "installments");

    const available = availableInstallments(state.data);
    const issuedCount = issuedInstallments(state.data).size;
    const question = joinBlocks(
      issuedCount > 0 ? renderMessage("slips_already_generated", { count: issuedCount }) : null,
      formatInstallmentList(available)
    );
    const ask = (errorMessage?: string, intro?: string) =>
      respond(state, { description: joinBlocks(intro, question), payloadSchema: "installments", errorMessage });

    const read = readPayloadField<string[]>(state.payload, "installments", InstallmentsField);
    if (read.kind === "invalid") return ask(read.error);
    if (read.kind === "absent") return (state.data.selected_installments?.length ?? 0) > 0 ? proceed(state) : ask();

    const numbers = read.value;
    const paid = numbers.filter((number) =>
      installmentSet.installments.some((item) => item.number === number && item.is_paid)
    );
    if (paid.length > 0) {
      return ask(renderMessage("paid_installments_selected", { installments: paid.join(", ") }));
    }
    const unavailable = numbers.filter((number) => !available.some((item) => item.number === number));
    if (unavailable.length > 0) {
      return ask(renderMessage("unavailable_installments_selected", { installments: unavailable.join(", ") }));
    }

    const [only] = numbers;
    const single = numbers.length === 1 ? available.find((item) => item.number === only) : undefined;
    const dueDate = single ? parseBrazilianDate(single.due_date) : null;
    if (single && dueDate && dueDate.getTime() >= SINGLE_INSTALLMENT_CUTOFF.getTime()) {
      return ask(
        renderMessage("single_installment_after_cutoff_error", { due_date: single.due_date }),
        renderMessage("single_installment_after_cutoff")
      );
    }

    const current = state.data.selected_installments;
    const base = current !== undefined && !sameSelection(current, numbers) ? resetForInstallmentSelection(state) : state;
    return proceed(patchData(base, { selected_installments: numbers }));
  };
}

// One slip per installment or a single slip; only asked for multi-installment selections.
export function createChooseSlipFormatNode(_deps: NodeDeps): StepNode {
  return async (state) => {
    const selected = state.data.selected_installments;
    if (!selected || selected.length === 0) return missingField(state, "selected_installments");
    if (selected.length === 1) {
      return proceed(state.internal.separate_slips === false ? state : patchInternal(state, { separate_slips: false }));
    }

    const read = readPayloadField(state.payload, "separate_slips", PAYLOAD_FIELDS.separate_slips);
    if (read.kind === "valid") return proceed(patchInternal(state, { separate_slips: read.value }));
    if (read.kind === "absent" && state.internal.separate_slips !== undefined) return proceed(state);
    return respond(state, {
      description: renderMessage("ask_slip_format"),
      payloadSchema: "separate_slips",
      errorMessage: read.kind === "invalid" ? read.error : undefined,
    });
  };
}
