import {
  proceed,
  resetAll,
  resetAllKeeping,
  resetForGuideSelection,
  resetForInstallmentSelection,
  resetForYearSelection,
  respond,
} from "../core/helpers/state.js";
import type { SessionState } from "../state.js";
import { makeGuide, makeGuideSet, makeInstallment, makeInstallmentSet, stateWith } from "./testSupport.js";

function fullState(): SessionState {
  return stateWith({
    data: {
      property_id: "01234567890123",
      address: "Rua Fake, Bairro Fake, 0000-0000",
      owner: "Fake da Silva",
      fiscal_year: 2025,
      guides: makeGuideSet([makeGuide("00"), makeGuide("01")]),
      selected_guide: "00",
      installments: makeInstallmentSet("00", [makeInstallment("01"), makeInstallment("02")]),
      selected_installments: ["01"],
      generated_slips: [],
    },
    internal: {
      guides_consulted: true,
      separate_slips: false,
      data_confirmed: true,
      slips_generated: true,
      next_question_type: "more_installments",
      failed_year_attempts: { "01234567890123": 1 },
    },
  });
}

describe("state reset helpers", () => {
  it("keeps the selected guide and its installments when going back to installment selection", () => {
    const next = resetForInstallmentSelection(fullState());
    expect(Object.keys(next.data).sort()).toEqual(
      ["address", "fiscal_year", "generated_slips", "guides", "installments", "owner", "property_id", "selected_guide"].sort()
    );
    expect(next.internal).toEqual({ guides_consulted: true, failed_year_attempts: { "01234567890123": 1 } });
  });

  it("drops the guide choice when going back to guide selection", () => {
    const next = resetForGuideSelection(fullState());
    expect(next.data.selected_guide).toBeUndefined();
    expect(next.data.installments).toBeUndefined();
    expect(next.data.selected_installments).toBeUndefined();
    expect(next.data.guides?.guides).toHaveLength(2);
    expect(next.internal.guides_consulted).toBe(true);
  });

  it("keeps only identification data when going back to year selection", () => {
    const next = resetForYearSelection(fullState());
    expect(next.data).toEqual({
      property_id: "01234567890123",
      address: "Rua Fake, Bairro Fake, 0000-0000",
      owner: "Fake da Silva",
    });
    expect(next.internal).toEqual({ failed_year_attempts: { "01234567890123": 1 } });
  });

  it("clears everything, optionally keeping the property id", () => {
    expect(resetAll(fullState()).data).toEqual({});
    expect(resetAll(fullState()).internal).toEqual({});
    expect(resetAll(fullState(), { keepPropertyId: true }).data).toEqual({ property_id: "01234567890123" });
  });

  it("keeps exactly one named data field", () => {
    const next = resetAllKeeping(fullState(), "property_id");
    expect(next.data).toEqual({ property_id: "01234567890123" });
    expect(next.internal).toEqual({});
  });

  it("does not mutate the state it was given", () => {
    const state = fullState();
    resetForYearSelection(state);
    expect(state.data.selected_guide).toBe("00");
    expect(state.internal.data_confirmed).toBe(true);
  });
});

describe("pending responses", () => {
  it("sets and clears the question for the caller", () => {
    const asked = respond(stateWith({}), { description: "Qual o ano?", payloadSchema: "fiscal_year" });
    expect(asked.pending_response).toEqual({ description: "Qual o ano?", payload_schema: "fiscal_year", error_message: null });
    expect(proceed(asked).pending_response).toBeNull();
  });
});
