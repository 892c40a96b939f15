import {
  FiscalYearField,
  GuideNumberField,
  InstallmentsField,
  PAYLOAD_FIELDS,
  PropertyIdField,
  payloadJsonSchema,
  readPayloadField,
} from "../core/helpers/payload.js";
import { parseNumberSelection, parseBrazilianDate } from "../core/helpers/parsing.js";

describe("payload fields", () => {
  it("normalizes property ids to digits padded to eight", () => {
    expect(readPayloadField({ property_id: "0123.456-7" }, "property_id", PropertyIdField)).toEqual({
      kind: "valid",
      value: "01234567",
    });
    expect(readPayloadField({ property_id: "123" }, "property_id", PropertyIdField)).toEqual({
      kind: "valid",
      value: "00000123",
    });
    expect(readPayloadField({ property_id: 12345678 }, "property_id", PropertyIdField)).toEqual({
      kind: "valid",
      value: "12345678",
    });
  });

  it("rejects property ids without digits or longer than fifteen digits", () => {
    expect(readPayloadField({ property_id: "abc" }, "property_id", PropertyIdField)).toEqual({
      kind: "invalid",
      error: "Inscrição imobiliária deve conter dígitos",
    });
    expect(readPayloadField({ property_id: "1234567890123456" }, "property_id", PropertyIdField)).toEqual({
      kind: "invalid",
      error: "Inscrição imobiliária não pode ter mais de 15 dígitos",
    });
  });

  it("treats missing and null fields as absent", () => {
    expect(readPayloadField({}, "property_id", PropertyIdField)).toEqual({ kind: "absent" });
    expect(readPayloadField({ property_id: null }, "property_id", PropertyIdField)).toEqual({ kind: "absent" });
  });

  it("accepts four-digit years inside the supported range", () => {
    expect(readPayloadField({ fiscal_year: "2025" }, "fiscal_year", FiscalYearField)).toEqual({
      kind: "valid",
      value: 2025,
    });
    expect(readPayloadField({ fiscal_year: 2024 }, "fiscal_year", FiscalYearField)).toEqual({ kind: "valid", value: 2024 });
    expect(readPayloadField({ fiscal_year: "25" }, "fiscal_year", FiscalYearField)).toEqual({
      kind: "invalid",
      error: "Ano de exercício inválido",
    });
    expect(readPayloadField({ fiscal_year: 1999 }, "fiscal_year", FiscalYearField)).toEqual({
      kind: "invalid",
      error: "Ano de exercício inválido",
    });
  });

  it("pads guide numbers to two digits", () => {
    expect(readPayloadField({ guide_number: "0" }, "guide_number", GuideNumberField)).toEqual({ kind: "valid", value: "00" });
    expect(readPayloadField({ guide_number: 1 }, "guide_number", GuideNumberField)).toEqual({ kind: "valid", value: "01" });
    expect(readPayloadField({ guide_number: "x" }, "guide_number", GuideNumberField)).toEqual({
      kind: "invalid",
      error: "Número da guia deve conter apenas dígitos",
    });
  });

  it("parses installment selections from lists and free text", () => {
    expect(readPayloadField({ installments: "1, 2 e 03" }, "installments", InstallmentsField)).toEqual({
      kind: "valid",
      value: ["01", "02", "03"],
    });
    expect(readPayloadField({ installments: [1, "2", 2] }, "installments", InstallmentsField)).toEqual({
      kind: "valid",
      value: ["01", "02"],
    });
    expect(readPayloadField({ installments: "" }, "installments", InstallmentsField)).toEqual({
      kind: "invalid",
      error: "Selecione ao menos uma cota",
    });
  });

  it("reads chat-style yes and no answers", () => {
    expect(readPayloadField({ confirmed: "sim" }, "confirmed", PAYLOAD_FIELDS.confirmed)).toEqual({
      kind: "valid",
      value: true,
    });
    expect(readPayloadField({ confirmed: "não" }, "confirmed", PAYLOAD_FIELDS.confirmed)).toEqual({
      kind: "valid",
      value: false,
    });
    expect(readPayloadField({ confirmed: "talvez" }, "confirmed", PAYLOAD_FIELDS.confirmed)).toEqual({
      kind: "invalid",
      error: "Responda com sim ou não",
    });
  });

  it("describes the expected payload as a JSON schema object", () => {
    const schema = payloadJsonSchema("fiscal_year");
    expect(schema).toMatchObject({ type: "object", required: ["fiscal_year"] });
    expect(Object.keys(schema)).toContain("properties");
  });
});

describe("parsing helpers", () => {
  it("returns null for selections without numbers", () => {
    expect(parseNumberSelection("nenhuma")).toBeNull();
  });

  it("parses dd/MM/yyyy dates as UTC and rejects impossible dates", () => {
    expect(parseBrazilianDate("07/02/2026")?.toISOString()).toBe("2026-02-07T00:00:00.000Z");
    expect(parseBrazilianDate("31/02/2024")).toBeNull();
    expect(parseBrazilianDate("2024-02-07")).toBeNull();
  });
});
