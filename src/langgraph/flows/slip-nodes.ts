import { PAYLOAD_FIELDS, readPayloadField } from "../core/helpers/payload.js";
import {
  patchData,
  patchInternal,
  proceed,
  resetAll,
  resetAllKeeping,
  resetFields,
  resetForGuideSelection,
  resetForInstallmentSelection,
  respond,
} from "../core/helpers/state.js";
import { joinBlocks, renderMessage } from "../core/helpers/template.js";
import { AuthenticationError, ServiceUnavailableError } from "../core/services/tax-api/errors.js";
import type { GeneratedSlip, Slip } from "../core/services/tax-api/records.js";
import {
  formatConfirmation,
  formatInstallmentList,
  formatNextQuestion,
  formatSlips,
  formatYearQuestion,
} from "../templates.js";
import type { NextQuestionType, SessionState } from "../state.js";
import {
  authenticationFailed,
  availableInstallments,
  classifyNextQuestion,
  hasOtherGuides,
  missingField,
  slipCount,
  type NodeDeps,
  type StepNode,
} from "./step-flow-helpers.js";

export function createConfirmPaymentDataNode(_deps: NodeDeps): StepNode {
  return async (state) => {
    if (state.internal.data_confirmed) return proceed(state);
    if (!state.data.selected_installments?.length) return missingField(state, "selected_installments");

    const read = readPayloadField(state.payload, "confirmed", PAYLOAD_FIELDS.confirmed);
    if (read.kind !== "valid") {
      return respond(state, {
        description: formatConfirmation(state.data, slipCount(state)),
        payloadSchema: "confirmed",
        errorMessage: read.kind === "invalid" ? read.error : undefined,
      });
    }
    if (read.value) return proceed(patchInternal(state, { data_confirmed: true }));

    // Start over for the same property; the year question still shows what was on file.
    return respond(resetAllKeeping(state, "property_id"), {
      description: joinBlocks(renderMessage("data_not_confirmed"), formatYearQuestion(state.data)),
      payloadSchema: "fiscal_year",
    });
  };
}

function summarize(fiscalYear: number, guideNumber: string, slip: Slip, document: string): GeneratedSlip {
  return {
    fiscal_year: fiscalYear,
    guide_number: guideNumber,
    installments: slip.installments.map((item) => item.number),
    value: slip.value,
    due_date: slip.due_date,
    barcode: slip.barcode,
    digit_line: slip.digit_line,
    document,
  };
}

/**
 * Issues one slip per installment, or one slip for the whole selection.
 * A failure part-way keeps the slips already issued and sends the user back
 * to installment selection on the same guide.
 */
export function createGenerateSlipsNode({ api, logger }: NodeDeps): StepNode {
  const fetchDocument = async (
    propertyId: string,
    fiscalYear: number,
    guideNumber: string,
    installments: readonly string[]
  ): Promise<string> => {
    try {
      const document = await api.downloadSlipDocument(propertyId, fiscalYear, guideNumber, installments);
      return document ?? renderMessage("document_missing");
    } catch (error) {
      logger.error({ err: error, propertyId, guideNumber, installments }, "slip document download failed");
      return renderMessage("document_download_failed");
    }
  };

  const fail = (state: SessionState, issued: GeneratedSlip[], batch: readonly string[], errorMessage: string | null) => {
    const propertyId = state.data.property_id ?? "";
    let next = patchData(state, { generated_slips: [...(state.data.generated_slips ?? []), ...issued] });
    next = resetForInstallmentSelection(next);
    return respond(next, {
      description: joinBlocks(
        issued.length > 0 ? formatSlips(propertyId, issued) : null,
        renderMessage("slip_generation_failed", { installments: batch.join(", ") }),
        formatInstallmentList(availableInstallments(next.data))
      ),
      payloadSchema: "installments",
      errorMessage,
    });
  };

  return async (state) => {
    if (state.internal.slips_generated) return proceed(state);
    const { property_id: propertyId, fiscal_year: fiscalYear, selected_guide: guideNumber } = state.data;
    const selected = state.data.selected_installments;
    if (propertyId === undefined) return missingField(state, "property_id");
    if (fiscalYear === undefined) return missingField(state, "fiscal_year");
    if (guideNumber === undefined) return missingField(state, "selected_guide");
    if (!selected?.length) return missingField(state, "selected_installments");

    const batches = state.internal.separate_slips ? selected.map((number) => [number]) : [selected];
    const issued: GeneratedSlip[] = [];
    for (const batch of batches) {
      let slip: Slip | null;
      try {
        slip = await api.generateSlip(propertyId, fiscalYear, guideNumber, batch);
      } catch (error) {
        if (error instanceof ServiceUnavailableError) {
          logger.warn({ err: error, propertyId, guideNumber, batch, issued: issued.length }, "slip generation failed");
          return fail(state, issued, batch, error.message);
        }
        if (error instanceof AuthenticationError) {
          // Issued slips stay; the confirmed selection is cleared so nothing is reissued.
          const withIssued = patchData(state, { generated_slips: [...(state.data.generated_slips ?? []), ...issued] });
          return authenticationFailed(resetForInstallmentSelection(withIssued));
        }
        throw error;
      }
      if (!slip) {
        logger.warn({ propertyId, guideNumber, batch }, "slip generation returned nothing");
        return fail(state, issued, batch, null);
      }
      const document = await fetchDocument(propertyId, fiscalYear, guideNumber, batch);
      issued.push(summarize(fiscalYear, guideNumber, slip, document));
    }

    const withSlips = patchData(state, { generated_slips: [...(state.data.generated_slips ?? []), ...issued] });
    const questionType = classifyNextQuestion(withSlips.data);
    const next = patchInternal(
      resetFields(withSlips, { internal: ["wants_more_installments", "wants_other_guides", "wants_other_property"] }),
      { slips_generated: true, next_question_type: questionType }
    );
    logger.info({ propertyId, guideNumber, slips: issued.length, questionType }, "slips generated");
    return respond(next, {
      description: joinBlocks(formatSlips(propertyId, issued), formatNextQuestion(questionType, guideNumber)),
      payloadSchema: questionType,
    });
  };
}

function askNext(state: SessionState, questionType: NextQuestionType, errorMessage?: string): SessionState {
  return respond(patchInternal(state, { next_question_type: questionType }), {
    description: formatNextQuestion(questionType, state.data.selected_guide ?? ""),
    payloadSchema: questionType,
    errorMessage,
  });
}

/**
 * Consumes the answer to the follow-up question set by generate_slips and
 * backtracks to the matching step, or finishes the transaction.
 */
export function createPostGenerationNode({ logger }: NodeDeps): StepNode {
  return async (state) => {
    const questionType = state.internal.next_question_type;
    if (questionType === undefined) return missingField(state, "next_question_type");

    const read = readPayloadField(state.payload, questionType, PAYLOAD_FIELDS[questionType]);
    if (read.kind === "absent") return askNext(state, questionType);
    if (read.kind === "invalid") return askNext(state, questionType, read.error);

    switch (questionType) {
      case "more_installments":
        if (read.value) return proceed(patchInternal(resetForInstallmentSelection(state), { wants_more_installments: true }));
        return askNext(state, hasOtherGuides(state.data) ? "other_guides" : "other_property");
      case "other_guides":
        if (read.value) return proceed(patchInternal(resetForGuideSelection(state), { wants_other_guides: true }));
        return askNext(state, "other_property");
      case "other_property": {
        if (read.value) return proceed(patchInternal(resetAll(state), { wants_other_property: true }));
        logger.info({ propertyId: state.data.property_id }, "transaction finished");
        const finished: SessionState = { ...resetAll(state), status: "completed" };
        return respond(finished, { description: renderMessage("transaction_finished"), payloadSchema: null });
      }
    }
  };
}
