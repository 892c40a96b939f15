import { FiscalYearField, PropertyIdField, readPayloadField } from "../core/helpers/payload.js";
import { patchData, proceed, resetAll, resetForYearSelection, respond } from "../core/helpers/state.js";
import { renderMessage } from "../core/helpers/template.js";
import {
  AuthenticationError,
  InvalidPropertyIdError,
  ServiceUnavailableError,
} from "../core/services/tax-api/errors.js";
import type { PropertyInfo } from "../core/services/tax-api/types.js";
import { formatYearQuestion } from "../templates.js";
import type { SessionState } from "../state.js";
import type { NodeDeps, StepNode } from "./step-flow-helpers.js";

function askPropertyId(state: SessionState, errorMessage?: string): SessionState {
  return respond(state, {
    description: renderMessage("ask_property_id"),
    payloadSchema: "property_id",
    errorMessage,
  });
}

/**
 * Collects the property registration id. A different id than the one on file
 * starts the transaction over. Address and owner are fetched once per id and
 * fall back to placeholders when the registry is unreachable.
 */
export function createInformPropertyIdNode({ api, logger }: NodeDeps): StepNode {
  return async (state) => {
    const read = readPayloadField(state.payload, "property_id", PropertyIdField);
    if (read.kind === "invalid") return askPropertyId(state, read.error);

    const current = state.data.property_id;
    const propertyId = read.kind === "valid" ? read.value : current;
    if (propertyId === undefined) return askPropertyId(state);

    const base = current !== undefined && current !== propertyId ? resetAll(state) : state;
    if (base.data.property_id === propertyId && base.data.address !== undefined) return proceed(base);

    let info: PropertyInfo | null = null;
    try {
      info = await api.lookupProperty(propertyId);
    } catch (error) {
      if (error instanceof InvalidPropertyIdError) {
        logger.info({ propertyId }, "property id rejected by registry");
        return askPropertyId(resetAll(base), renderMessage("invalid_property_id", { property_id: propertyId }));
      }
      if (!(error instanceof ServiceUnavailableError || error instanceof AuthenticationError)) throw error;
      logger.warn({ err: error, propertyId }, "property lookup failed; using placeholders");
    }

    return proceed(
      patchData(base, {
        property_id: propertyId,
        address: info?.address ?? null,
        owner: info?.owner ?? null,
      })
    );
  };
}

// Changing the year drops everything that was fetched for the previous one.
export function createChooseFiscalYearNode(_deps: NodeDeps): StepNode {
  return async (state) => {
    const read = readPayloadField(state.payload, "fiscal_year", FiscalYearField);
    if (read.kind === "invalid") {
      return respond(state, {
        description: formatYearQuestion(state.data),
        payloadSchema: "fiscal_year",
        errorMessage: read.error,
      });
    }
    if (read.kind === "absent") {
      if (state.data.fiscal_year !== undefined) return proceed(state);
      return respond(state, { description: formatYearQuestion(state.data), payloadSchema: "fiscal_year" });
    }

    const current = state.data.fiscal_year;
    const base = current !== undefined && current !== read.value ? resetForYearSelection(state) : state;
    return proceed(patchData(base, { fiscal_year: read.value }));
  };
}
