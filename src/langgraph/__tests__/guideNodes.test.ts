import { joinBlocks, renderMessage } from "../core/helpers/template.js";
import type { FakePropertyTaxApi } from "../core/services/tax-api/fake-client.js";
import { createChooseGuideNode, createListGuidesNode } from "../flows/guide-nodes.js";
import { formatClosedGuides, formatGuideList, formatServiceUnavailable, formatYearQuestion } from "../templates.js";
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

describe("list_guides", () => {
  let api: FakePropertyTaxApi;

  beforeAll(() => useMessageCatalog());
  beforeEach(() => {
    api = createFakeApi();
  });

  it("stores the open guides of the year and marks them consulted", async () => {
    const node = createListGuidesNode({ api, logger: testLogger });
    const result = await node(stateWith({ data: { property_id: "01234567890123", fiscal_year: 2025 } }));
    expect(result.pending_response).toBeNull();
    expect(result.data.guides?.guides.map((guide) => guide.guide_number)).toEqual(["00", "01"]);
    expect(result.data.active_debt).toBeUndefined();
    expect(result.internal).toEqual({ guides_consulted: true, failed_year_attempts: {} });
  });

  it("calls the guide service once per property and year", async () => {
    const listGuides = jest.spyOn(api, "listGuides");
    const node = createListGuidesNode({ api, logger: testLogger });
    const first = await node(stateWith({ data: { property_id: "01234567890123", fiscal_year: 2025 } }));
    await node(first);
    expect(listGuides).toHaveBeenCalledTimes(1);
  });

  it("reports a missing precondition instead of calling the service", async () => {
    const node = createListGuidesNode({ api, logger: testLogger });
    const result = await node(stateWith({ data: { fiscal_year: 2025 } }));
    expect(result.pending_response).toEqual({
      description: "❌ Erro interno: campo obrigatório faltante: property_id",
      payload_schema: null,
      error_message: null,
    });
  });

  it("asks for the year again when the guide service is unavailable", async () => {
    const data = { property_id: "77777777777777", address: null, owner: null, fiscal_year: 2025 };
    const node = createListGuidesNode({ api, logger: testLogger });
    const result = await node(stateWith({ data }));
    const detail = "Serviço IPTU temporariamente indisponível (erro simulado)";
    expect(result.pending_response).toEqual({
      description: joinBlocks(formatServiceUnavailable(detail), formatYearQuestion(data)),
      payload_schema: "fiscal_year",
      error_message: detail,
    });
    expect(result.data).toEqual(data);
  });

  it("stops with a support message on authentication failures", async () => {
    const node = createListGuidesNode({ api, logger: testLogger });
    const result = await node(stateWith({ data: { property_id: "88888888888888", fiscal_year: 2025 } }));
    expect(result.pending_response).toEqual({
      description: renderMessage("authentication_failed"),
      payload_schema: null,
      error_message: null,
    });
  });

  it("asks for another year when the year has no guides", async () => {
    const node = createListGuidesNode({ api, logger: testLogger });
    const result = await node(stateWith({ data: { property_id: "12345678", fiscal_year: 2024 } }));
    expect(result.pending_response).toEqual({
      description: renderMessage("no_guides_for_year", { property_id: "12345678", fiscal_year: 2024 }),
      payload_schema: "fiscal_year",
      error_message: null,
    });
    expect(result.data).toEqual({ property_id: "12345678" });
    expect(result.internal.failed_year_attempts).toEqual({ "12345678": 1 });
  });

  it("accepts the other years of a property with an empty year", async () => {
    const node = createListGuidesNode({ api, logger: testLogger });
    const result = await node(
      stateWith({
        data: { property_id: "12345678", fiscal_year: 2025 },
        internal: { failed_year_attempts: { "12345678": 1 } },
      })
    );
    expect(result.pending_response).toBeNull();
    expect(result.data.guides?.guides.map((guide) => [guide.guide_number, guide.kind, guide.value])).toEqual([
      ["00", "ORDINÁRIA", 1200],
    ]);
    expect(result.internal).toEqual({ guides_consulted: true, failed_year_attempts: {} });
  });

  it("skips the active debt lookup when the year has open guides", async () => {
    const lookupActiveDebt = jest.spyOn(api, "lookupActiveDebt");
    const node = createListGuidesNode({ api, logger: testLogger });
    await node(stateWith({ data: { property_id: "01234567890123", fiscal_year: 2025 } }));
    expect(lookupActiveDebt).not.toHaveBeenCalled();
  });

  it("ignores any active debt lookup failure on the no-guides path", async () => {
    jest.spyOn(api, "lookupActiveDebt").mockRejectedValueOnce(new TypeError("unexpected debt body"));
    const node = createListGuidesNode({ api, logger: testLogger });
    const result = await node(stateWith({ data: { property_id: "12345678", fiscal_year: 2024 } }));
    expect(result.pending_response).toEqual({
      description: renderMessage("no_guides_for_year", { property_id: "12345678", fiscal_year: 2024 }),
      payload_schema: "fiscal_year",
      error_message: null,
    });
    expect(result.data.active_debt).toBeUndefined();
  });

  it("explains the active debt when the year went to collections", async () => {
    const node = createListGuidesNode({ api, logger: testLogger });
    const result = await node(stateWith({ data: { property_id: "10000000", fiscal_year: 2025 } }));
    const description = result.pending_response?.description ?? "";
    expect(description).toContain("⚠️ **IPTU do ano 2025 inscrito na Dívida Ativa Municipal**");
    expect(description).toContain("• Parcelamento 2024/0256907\n  Tipo: Parcelamento Compartilhado\n  Parcelas: 9/84 pagas");
    expect(description).toContain("  Último pagamento: 02/06/2025");
    expect(description.endsWith(renderMessage("debt_ask_other_year"))).toBe(true);
    expect(result.pending_response?.payload_schema).toBe("fiscal_year");
    expect(result.data.fiscal_year).toBeUndefined();
    expect(result.data.active_debt?.has_active_debt).toBe(true);
  });

  it("lists unsplit CDAs with the total balance", async () => {
    const node = createListGuidesNode({ api, logger: testLogger });
    const result = await node(stateWith({ data: { property_id: "20000000", fiscal_year: 2024 } }));
    const description = result.pending_response?.description ?? "";
    expect(description).toContain("• CDA 2024/123456 - Exercício 2024 - Valor: R$3.000,00");
    expect(description).toContain("💰 **Saldo total da dívida:** R$5.000,00");
    expect(description).toContain("📍 **Endereço:** AV ATLÂNTICA, 1000, COPACABANA");
  });

  it("goes back to the property id after the third year without guides", async () => {
    const node = createListGuidesNode({ api, logger: testLogger });
    const result = await node(
      stateWith({
        data: { property_id: "12345678", fiscal_year: 2019 },
        internal: { failed_year_attempts: { "12345678": 2 } },
      })
    );
    expect(result.data).toEqual({});
    expect(result.internal).toEqual({});
    expect(result.pending_response).toEqual({
      description: renderMessage("property_not_found_after_attempts"),
      payload_schema: "property_id",
      error_message: null,
    });
  });

  it("shows the debt summary before asking for another property on the third attempt", async () => {
    const node = createListGuidesNode({ api, logger: testLogger });
    const result = await node(
      stateWith({
        data: { property_id: "30000000", fiscal_year: 2023 },
        internal: { failed_year_attempts: { "30000000": 2 } },
      })
    );
    const description = result.pending_response?.description ?? "";
    expect(description).toContain("• EF 2024/789012 - Processo 0123456-78.2024.8.19.0001 - Valor: R$10.000,00");
    expect(description.endsWith(renderMessage("ask_property_id"))).toBe(true);
    expect(result.pending_response?.payload_schema).toBe("property_id");
  });

  it("forgets earlier failed years once guides are found", async () => {
    const node = createListGuidesNode({ api, logger: testLogger });
    const result = await node(
      stateWith({
        data: { property_id: "12345678", fiscal_year: 2025 },
        internal: { failed_year_attempts: { "12345678": 2, "99999999": 1 } },
      })
    );
    expect(result.internal.failed_year_attempts).toEqual({ "99999999": 1 });
  });

  it("starts over when every guide of the year is closed", async () => {
    const closed = makeGuideSet([makeGuide("00", { statusCode: "02" })]);
    jest.spyOn(api, "listGuides").mockResolvedValue(closed);
    const node = createListGuidesNode({ api, logger: testLogger });
    const result = await node(stateWith({ data: { property_id: "01234567890123", fiscal_year: 2025 } }));
    expect(result.data).toEqual({});
    expect(result.pending_response).toEqual({
      description: formatClosedGuides(closed),
      payload_schema: "property_id",
      error_message: null,
    });
  });
});

describe("choose_guide", () => {
  const node = createChooseGuideNode({ api: createFakeApi(), logger: testLogger });
  const guides = makeGuideSet([makeGuide("00"), makeGuide("01")]);
  const data = { property_id: "01234567890123", address: null, owner: null, fiscal_year: 2025, guides };

  beforeAll(() => useMessageCatalog());

  it("lists the guides and the accepted numbers", async () => {
    const result = await node(stateWith({ data }));
    expect(result.pending_response?.description).toBe(formatGuideList(data, guides));
    expect(result.pending_response?.description).toContain('Informe o número da guia ("00", "01")');
    expect(result.pending_response?.payload_schema).toBe("guide_number");
  });

  it("rejects guides that were not listed", async () => {
    const result = await node(stateWith({ data, payload: { guide_number: "05" } }));
    expect(result.pending_response?.error_message).toBe("A guia 05 não está entre as guias disponíveis.");
  });

  it("pads and stores the chosen guide", async () => {
    const result = await node(stateWith({ data, payload: { guide_number: 1 } }));
    expect(result.pending_response).toBeNull();
    expect(result.data.selected_guide).toBe("01");
  });

  it("drops the installments of the previous guide when switching", async () => {
    const result = await node(
      stateWith({
        data: {
          ...data,
          selected_guide: "00",
          installments: makeInstallmentSet("00", [makeInstallment("01")]),
          selected_installments: ["01"],
        },
        internal: { guides_consulted: true, data_confirmed: true },
        payload: { guide_number: "01" },
      })
    );
    expect(result.data.selected_guide).toBe("01");
    expect(result.data.installments).toBeUndefined();
    expect(result.data.selected_installments).toBeUndefined();
    expect(result.internal).toEqual({ guides_consulted: true });
  });
});
