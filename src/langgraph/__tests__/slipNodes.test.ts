import { joinBlocks, renderMessage } from "../core/helpers/template.js";
import { AuthenticationError } from "../core/services/tax-api/errors.js";
import type { FakePropertyTaxApi } from "../core/services/tax-api/fake-client.js";
import type { GeneratedSlip, InstallmentSet } from "../core/services/tax-api/records.js";
import {
  createConfirmPaymentDataNode,
  createGenerateSlipsNode,
  createPostGenerationNode,
} from "../flows/slip-nodes.js";
import { formatConfirmation, formatYearQuestion } from "../templates.js";
import type { SessionData } from "../state.js";
import {
  createFakeApi,
  makeGuide,
  makeGuideSet,
  makeInstallment,
  makeInstallmentSet,
  stateWith,
  testLogger,
  useMessageCatalog,
} from "./testSupport.js";

const guides = makeGuideSet([makeGuide("00"), makeGuide("01")]);

async function loadInstallments(api: FakePropertyTaxApi, propertyId: string, guideNumber: string): Promise<InstallmentSet> {
  const set = await api.listInstallments(propertyId, 2025, guideNumber);
  if (!set) throw new Error(`no installments for ${propertyId}/${guideNumber}`);
  return set;
}

beforeAll(() => useMessageCatalog());

describe("confirm_payment_data", () => {
  const node = createConfirmPaymentDataNode({ api: createFakeApi(), logger: testLogger });
  const data: SessionData = {
    property_id: "01234567890123",
    address: "Rua Fake, Bairro Fake, 0000-0000",
    owner: "Fake da Silva",
    fiscal_year: 2025,
    guides,
    selected_guide: "01",
    selected_installments: ["01", "02"],
  };

  it("summarizes the selection with the number of slips to issue", async () => {
    const result = await node(stateWith({ data, internal: { separate_slips: true } }));
    expect(result.pending_response?.description).toBe(formatConfirmation(data, 2));
    expect(result.pending_response?.description).toContain("**Boletos a serem gerados:** 2");
    expect(result.pending_response?.payload_schema).toBe("confirmed");
  });

  it("counts a single slip when the installments are grouped", async () => {
    const result = await node(stateWith({ data, internal: { separate_slips: false } }));
    expect(result.pending_response?.description).toContain("**Boletos a serem gerados:** 1");
  });

  it("records the confirmation", async () => {
    const result = await node(stateWith({ data, internal: { separate_slips: false }, payload: { confirmed: true } }));
    expect(result.pending_response).toBeNull();
    expect(result.internal.data_confirmed).toBe(true);
  });

  it("starts over for the same property when the data is not confirmed", async () => {
    const result = await node(stateWith({ data, internal: { separate_slips: false }, payload: { confirmed: "não" } }));
    expect(result.data).toEqual({ property_id: "01234567890123" });
    expect(result.internal).toEqual({});
    expect(result.pending_response).toEqual({
      description: joinBlocks(renderMessage("data_not_confirmed"), formatYearQuestion(data)),
      payload_schema: "fiscal_year",
      error_message: null,
    });
  });
});

describe("generate_slips", () => {
  let api: FakePropertyTaxApi;

  beforeEach(() => {
    api = createFakeApi();
  });

  async function readyState(propertyId: string, selected: string[], separate: boolean) {
    return stateWith({
      data: {
        property_id: propertyId,
        address: null,
        owner: null,
        fiscal_year: 2025,
        guides,
        selected_guide: "01",
        installments: await loadInstallments(api, propertyId, "01"),
        selected_installments: selected,
      },
      internal: { guides_consulted: true, separate_slips: separate, data_confirmed: true },
    });
  }

  it("issues one grouped slip and offers the remaining installments", async () => {
    const node = createGenerateSlipsNode({ api, logger: testLogger });
    const result = await node(await readyState("01234567890123", ["01"], false));
    const expected: GeneratedSlip = {
      fiscal_year: 2025,
      guide_number: "01",
      installments: ["01"],
      value: 86.67,
      due_date: "29/11/2024",
      barcode: "310-7012345672025010100008667",
      digit_line: "310-7.01234567.2025.01.01.00008667",
      document: "https://fake.iptu.local/darm/01234567890123-2025-01-01.pdf",
    };
    expect(result.data.generated_slips).toEqual([expected]);
    expect(result.internal.slips_generated).toBe(true);
    expect(result.internal.next_question_type).toBe("more_installments");
    expect(result.pending_response?.payload_schema).toBe("more_installments");
    expect(result.pending_response?.description).toContain("**Valor:** R$ 86,67");
    expect(result.pending_response?.description.endsWith(renderMessage("ask_more_installments", { guide_number: "01" }))).toBe(
      true
    );
  });

  it("issues one slip per installment when asked to", async () => {
    const node = createGenerateSlipsNode({ api, logger: testLogger });
    const result = await node(await readyState("01234567890123", ["01", "02", "03"], true));
    expect(result.data.generated_slips?.map((slip) => slip.installments)).toEqual([["01"], ["02"], ["03"]]);
  });

  it("keeps the slips issued before a failure and asks for installments again", async () => {
    const node = createGenerateSlipsNode({ api, logger: testLogger });
    const result = await node(await readyState("99999999990003", ["01", "02"], true));
    expect(result.data.generated_slips?.map((slip) => slip.installments)).toEqual([["01"]]);
    expect(result.data.selected_installments).toBeUndefined();
    expect(result.data.selected_guide).toBe("01");
    expect(result.internal).toEqual({ guides_consulted: true });
    expect(result.pending_response?.payload_schema).toBe("installments");
    expect(result.pending_response?.error_message).toBe("Falha ao gerar DARM para a cota 02 (erro simulado)");
    expect(result.pending_response?.description).toContain(
      "❌ Não foi possível gerar o DARM para as cotas 02."
    );
  });

  it("issues the slip without a document when the download fails", async () => {
    const node = createGenerateSlipsNode({ api, logger: testLogger });
    const result = await node(await readyState("99999999990005", ["01"], false));
    expect(result.data.generated_slips?.[0]?.document).toBe("Não disponível (erro ao baixar)");
    expect(result.internal.slips_generated).toBe(true);
  });

  it("stops on authentication failures", async () => {
    jest.spyOn(api, "generateSlip").mockRejectedValue(new AuthenticationError("denied"));
    const node = createGenerateSlipsNode({ api, logger: testLogger });
    const result = await node(await readyState("01234567890123", ["01"], false));
    expect(result.pending_response).toEqual({
      description: renderMessage("authentication_failed"),
      payload_schema: null,
      error_message: null,
    });
  });

  it("drops the confirmed selection when authentication fails part-way", async () => {
    const generateSlip = api.generateSlip.bind(api);
    const spy = jest
      .spyOn(api, "generateSlip")
      .mockImplementation((propertyId: string, fiscalYear: number, guideNumber: string, batch: readonly string[]) =>
        batch.includes("02")
          ? Promise.reject(new AuthenticationError("denied"))
          : generateSlip(propertyId, fiscalYear, guideNumber, batch)
      );
    const node = createGenerateSlipsNode({ api, logger: testLogger });
    const result = await node(await readyState("01234567890123", ["01", "02"], true));

    expect(result.pending_response?.description).toBe(renderMessage("authentication_failed"));
    expect(result.data.generated_slips?.map((slip) => slip.installments)).toEqual([["01"]]);
    expect(result.data.selected_installments).toBeUndefined();
    expect(result.internal).toEqual({ guides_consulted: true });

    await node({ ...result, pending_response: null });
    expect(spy).toHaveBeenCalledTimes(2);
  });

  it("offers other guides once the selected guide is fully issued", async () => {
    const node = createGenerateSlipsNode({ api, logger: testLogger });
    const state = await readyState("01234567890123", ["01"], false);
    const result = await node({
      ...state,
      data: { ...state.data, installments: makeInstallmentSet("01", [makeInstallment("01")]) },
    });
    expect(result.internal.next_question_type).toBe("other_guides");
    expect(result.pending_response?.description.endsWith(renderMessage("ask_other_guides"))).toBe(true);
  });
});

describe("post_generation", () => {
  const node = createPostGenerationNode({ api: createFakeApi(), logger: testLogger });
  const slip: GeneratedSlip = {
    fiscal_year: 2025,
    guide_number: "01",
    installments: ["01"],
    value: 86.67,
    due_date: "29/11/2024",
    barcode: "310-7012345672025010100008667",
    digit_line: "310-7.01234567.2025.01.01.00008667",
    document: "doc",
  };
  const data: SessionData = {
    property_id: "01234567890123",
    fiscal_year: 2025,
    guides,
    selected_guide: "01",
    installments: makeInstallmentSet("01", [makeInstallment("01"), makeInstallment("02")]),
    selected_installments: ["01"],
    generated_slips: [slip],
  };

  it("goes back to installment selection for more installments", async () => {
    const result = await node(
      stateWith({
        data,
        internal: { slips_generated: true, next_question_type: "more_installments", data_confirmed: true },
        payload: { more_installments: "sim" },
      })
    );
    expect(result.pending_response).toBeNull();
    expect(result.internal).toEqual({ wants_more_installments: true });
    expect(result.data.selected_installments).toBeUndefined();
    expect(result.data.generated_slips).toEqual([slip]);
  });

  it("offers other guides when more installments are declined", async () => {
    const result = await node(
      stateWith({ data, internal: { next_question_type: "more_installments" }, payload: { more_installments: false } })
    );
    expect(result.internal.next_question_type).toBe("other_guides");
    expect(result.pending_response).toEqual({
      description: renderMessage("ask_other_guides"),
      payload_schema: "other_guides",
      error_message: null,
    });
  });

  it("goes back to guide selection for another guide", async () => {
    const result = await node(
      stateWith({ data, internal: { next_question_type: "other_guides" }, payload: { other_guides: true } })
    );
    expect(result.data.selected_guide).toBeUndefined();
    expect(result.internal).toEqual({ wants_other_guides: true });
  });

  it("re-asks the same question on an unclear answer", async () => {
    const result = await node(
      stateWith({ data, internal: { next_question_type: "other_property" }, payload: { other_property: "talvez" } })
    );
    expect(result.pending_response).toEqual({
      description: renderMessage("ask_other_property"),
      payload_schema: "other_property",
      error_message: "Responda com sim ou não",
    });
  });

  it("clears the session for another property", async () => {
    const result = await node(
      stateWith({ data, internal: { next_question_type: "other_property" }, payload: { other_property: "s" } })
    );
    expect(result.data).toEqual({});
    expect(result.internal).toEqual({ wants_other_property: true });
  });

  it("finishes the transaction when nothing else is wanted", async () => {
    const result = await node(
      stateWith({ data, internal: { next_question_type: "other_property" }, payload: { other_property: "não" } })
    );
    expect(result.status).toBe("completed");
    expect(result.data).toEqual({});
    expect(result.pending_response).toEqual({
      description: renderMessage("transaction_finished"),
      payload_schema: null,
      error_message: null,
    });
  });
});
