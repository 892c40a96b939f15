import { GuideNumberField, readPayloadField } from "../core/helpers/payload.js";
import {
  patchData,
  patchInternal,
  proceed,
  resetAll,
  resetFields,
  resetForGuideSelection,
  respond,
} from "../core/helpers/state.js";
import { joinBlocks, renderMessage } from "../core/helpers/template.js";
import { AuthenticationError, ServiceUnavailableError } from "../core/services/tax-api/errors.js";
import type { DebtInfo, GuideSet } from "../core/services/tax-api/records.js";
import {
  formatClosedGuides,
  formatDebtMessage,
  formatGuideList,
  formatServiceUnavailable,
  formatYearQuestion,
} from "../templates.js";
import type { SessionState } from "../state.js";
import { MAX_FAILED_YEAR_ATTEMPTS } from "./step-flow-config.js";
import { authenticationFailed, missingField, type NodeDeps, type StepNode } from "./step-flow-helpers.js";

function withoutAttempts(attempts: Record<string, number> | undefined, propertyId: string): Record<string, number> {
  return Object.fromEntries(Object.entries(attempts ?? {}).filter(([key]) => key !== propertyId));
}

/**
 * Fetches the guides of the chosen year once per property/year pair.
 *
 * When the year yields nothing, the active-debt registry is consulted to tell
 * the user whether that year went to collections. After
 * MAX_FAILED_YEAR_ATTEMPTS empty years for the same property the
 * conversation goes back to asking for the property id.
 */
export function createListGuidesNode({ api, logger }: NodeDeps): StepNode {
  const lookupDebt = async (propertyId: string): Promise<DebtInfo | null> => {
    try {
      const debt = await api.lookupActiveDebt(propertyId);
      return debt?.has_active_debt ? debt : null;
    } catch (error) {
      logger.warn({ err: error, propertyId }, "active debt lookup failed; continuing without it");
      return null;
    }
  };

  const noGuides = (state: SessionState, propertyId: string, fiscalYear: number, debt: DebtInfo | null): SessionState => {
    const attempts = (state.internal.failed_year_attempts?.[propertyId] ?? 0) + 1;
    const debtMessage = debt ? formatDebtMessage(propertyId, fiscalYear, debt) : null;
    logger.info({ propertyId, fiscalYear, attempts, hasDebt: debt !== null }, "no guides for year");

    if (attempts >= MAX_FAILED_YEAR_ATTEMPTS) {
      return respond(resetAll(state), {
        description: debtMessage
          ? joinBlocks(debtMessage, renderMessage("ask_property_id"))
          : renderMessage("property_not_found_after_attempts"),
        payloadSchema: "property_id",
      });
    }

    let next = resetFields(state, { data: ["fiscal_year"], internal: ["guides_consulted"] }, { keepPropertyId: true });
    next = patchInternal(next, {
      failed_year_attempts: { ...state.internal.failed_year_attempts, [propertyId]: attempts },
    });
    if (debt) next = patchData(next, { active_debt: debt });
    return respond(next, {
      description: debtMessage
        ? joinBlocks(debtMessage, renderMessage("debt_ask_other_year"))
        : renderMessage("no_guides_for_year", { property_id: propertyId, fiscal_year: fiscalYear }),
      payloadSchema: "fiscal_year",
    });
  };

  return async (state) => {
    const { property_id: propertyId, fiscal_year: fiscalYear } = state.data;
    if (propertyId === undefined) return missingField(state, "property_id");
    if (fiscalYear === undefined) return missingField(state, "fiscal_year");
    if (state.internal.guides_consulted && state.data.guides) return proceed(state);

    let guideSet: GuideSet | null;
    try {
      guideSet = await api.listGuides(propertyId, fiscalYear);
    } catch (error) {
      if (error instanceof ServiceUnavailableError) {
        return respond(state, {
          description: joinBlocks(formatServiceUnavailable(error.message), formatYearQuestion(state.data)),
          payloadSchema: "fiscal_year",
          errorMessage: error.message,
        });
      }
      if (error instanceof AuthenticationError) return authenticationFailed(state);
      throw error;
    }

    if (!guideSet) return noGuides(state, propertyId, fiscalYear, await lookupDebt(propertyId));

    const open = guideSet.guides.filter((guide) => guide.is_open);
    if (open.length === 0) {
      return respond(resetAll(state), { description: formatClosedGuides(guideSet), payloadSchema: "property_id" });
    }

    const next = patchData(state, { guides: { ...guideSet, guides: open } });
    return proceed(
      patchInternal(next, {
        guides_consulted: true,
        failed_year_attempts: withoutAttempts(state.internal.failed_year_attempts, propertyId),
      })
    );
  };
}

export function createChooseGuideNode(_deps: NodeDeps): StepNode {
  return async (state) => {
    const guideSet = state.data.guides;
    if (!guideSet) return missingField(state, "guides");
    const ask = (errorMessage?: string) =>
      respond(state, {
        description: formatGuideList(state.data, guideSet),
        payloadSchema: "guide_number",
        errorMessage,
      });

    const read = readPayloadField(state.payload, "guide_number", GuideNumberField);
    if (read.kind === "invalid") return ask(read.error);
    if (read.kind === "absent") return state.data.selected_guide !== undefined ? proceed(state) : ask();

    const guideNumber = read.value;
    if (!guideSet.guides.some((guide) => guide.guide_number === guideNumber)) {
      return ask(renderMessage("guide_not_listed", { guide_number: guideNumber }));
    }
    const current = state.data.selected_guide;
    const base = current !== undefined && current !== guideNumber ? resetForGuideSelection(state) : state;
    return proceed(patchData(base, { selected_guide: guideNumber }));
  };
}
