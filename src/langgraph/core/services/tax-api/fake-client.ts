import { readFileSync } from "node:fs";
import * as z from "zod";
import { createLogger, type Logger } from "../logger.js";
import { digitsOnly, padNumber } from "../../helpers/parsing.js";
import { formatBrazilianCurrency, parseBrazilianCurrency, sumAmounts } from "../../helpers/currency.js";
import {
  AuthenticationError,
  InvalidPropertyIdError,
  ServiceUnavailableError,
} from "./errors.js";
import {
  INSTALLMENT_STATUS,
  RawDebtResponseSchema,
  RawGuideSchema,
  RawInstallmentSchema,
  RawSlipSchema,
  type DebtInfo,
  type GuideSet,
  type InstallmentSet,
  type Slip,
} from "./records.js";
import type { PropertyInfo, PropertyTaxApi } from "./types.js";

/** Property ids that make the fake client fail in a specific way. */
export const FAKE_SENTINELS = {
  GUIDES_UNAVAILABLE: "77777777777777",
  GUIDES_AUTH_FAILURE: "88888888888888",
  GUIDES_TIMEOUT: "99999999990000",
  INSTALLMENTS_HTTP_500: "99999999990001",
  SLIP_HTTP_503: "99999999990002",
  SLIP_FAILS_ON_SECOND: "99999999990003",
  INVALID_PROPERTY: "99999999990004",
  DOCUMENT_DOWNLOAD_FAILURE: "99999999990005",
} as const;

const InstallmentValueTableSchema = z.record(z.string(), z.string()).refine((table) => "default" in table, {
  message: "installment value table needs a default entry",
});

export const FakeTaxDataSchema = z.object({
  property: z.object({ address: z.string(), owner: z.string() }),
  yearRange: z.object({ min: z.number().int(), max: z.number().int() }),
  aliases: z.record(z.string(), z.string()).default({}),
  emptyYears: z.record(z.string(), z.array(z.number().int())).default({}),
  guides: z.record(z.string(), z.array(z.record(z.string(), z.unknown()))),
  installmentValues: z.object({
    ordinary: InstallmentValueTableSchema,
    extraordinary: InstallmentValueTableSchema,
  }),
  debts: z.record(z.string(), z.unknown()).default({}),
});
export type FakeTaxData = z.infer<typeof FakeTaxDataSchema>;

export function loadFakeTaxData(filePath: string): FakeTaxData {
  return FakeTaxDataSchema.parse(JSON.parse(readFileSync(filePath, "utf-8")));
}

const ORDINARY_GUIDE = "00";
const EXTRAORDINARY_GUIDES = new Set(["01", "02"]);
const ORDINARY_INSTALLMENTS = 32;
const EXTRAORDINARY_INSTALLMENTS = 6;
const SLIP_DUE_DATE = "29/11/2024";

type RawInstallment = z.input<typeof RawInstallmentSchema>;

/**
 * Deterministic PropertyTaxApi backed by a JSON fixture file. Used for local
 * runs (IPTU_USE_FAKE_API=true) and by the test suite.
 */
export class FakePropertyTaxApi implements PropertyTaxApi {
  private readonly logger: Logger;

  constructor(private readonly fixtures: FakeTaxData, logger?: Logger) {
    this.logger = logger ?? createLogger("fake-tax-api");
  }

  static fromFile(filePath: string, logger?: Logger): FakePropertyTaxApi {
    return new FakePropertyTaxApi(loadFakeTaxData(filePath), logger);
  }

  async lookupProperty(propertyId: string): Promise<PropertyInfo | null> {
    const id = digitsOnly(propertyId);
    if (id === FAKE_SENTINELS.INVALID_PROPERTY) {
      throw new InvalidPropertyIdError(`Inscrição ${id} inválida (erro simulado)`, { statusCode: 400 });
    }
    return { address: this.fixtures.property.address, owner: this.fixtures.property.owner };
  }

  async listGuides(propertyId: string, fiscalYear: number): Promise<GuideSet | null> {
    const id = digitsOnly(propertyId);
    this.logger.info({ propertyId: id, fiscalYear }, "fake api: listing guides");

    if (id === FAKE_SENTINELS.GUIDES_UNAVAILABLE) {
      throw new ServiceUnavailableError("Serviço IPTU temporariamente indisponível (erro simulado)");
    }
    if (id === FAKE_SENTINELS.GUIDES_AUTH_FAILURE) {
      throw new AuthenticationError("Falha na autenticação do serviço IPTU (erro simulado)", { statusCode: 401 });
    }
    if (id === FAKE_SENTINELS.GUIDES_TIMEOUT) {
      throw new ServiceUnavailableError(
        "Serviço IPTU não respondeu no tempo esperado. Por favor, tente novamente. (erro simulado)"
      );
    }

    const guides = this.rawGuides(id, fiscalYear).map((raw) =>
      RawGuideSchema.parse({ ...raw, Inscricao: id, Exercicio: String(fiscalYear) })
    );
    const open = guides.filter((guide) => guide.is_open);
    if (open.length === 0) return null;
    return { property_id: id, fiscal_year: fiscalYear, guides: open };
  }

  async listInstallments(propertyId: string, fiscalYear: number, guideNumber: string): Promise<InstallmentSet | null> {
    const id = digitsOnly(propertyId);
    if (id === FAKE_SENTINELS.INSTALLMENTS_HTTP_500) {
      throw new ServiceUnavailableError("Erro interno no serviço IPTU (HTTP 500) (erro simulado)", { statusCode: 500 });
    }

    const raw = this.rawInstallments(id, fiscalYear, guideNumber);
    if (!raw) return null;
    const installments = raw.map((entry) => RawInstallmentSchema.parse(entry));
    if (installments.length === 0) return null;

    const guide = this.rawGuides(id, fiscalYear).find((entry) => entry["NGuia"] === guideNumber);
    const kind = guide?.["Tipo"];
    const guideKind = typeof kind === "string" ? kind : "";
    return {
      property_id: id,
      fiscal_year: fiscalYear,
      guide_number: guideNumber,
      guide_kind: guideKind,
      installments,
      total_value: sumAmounts(installments.map((installment) => installment.value)),
    };
  }

  async generateSlip(
    propertyId: string,
    fiscalYear: number,
    guideNumber: string,
    installmentNumbers: readonly string[]
  ): Promise<Slip | null> {
    const id = digitsOnly(propertyId);
    this.logger.info({ propertyId: id, guideNumber, installments: installmentNumbers }, "fake api: generating slip");

    if (id === FAKE_SENTINELS.SLIP_HTTP_503) {
      throw new ServiceUnavailableError("Serviço IPTU temporariamente indisponível (HTTP 503) (erro simulado)", {
        statusCode: 503,
      });
    }
    if (id === FAKE_SENTINELS.SLIP_FAILS_ON_SECOND && installmentNumbers.includes("02")) {
      throw new ServiceUnavailableError("Falha ao gerar DARM para a cota 02 (erro simulado)", { statusCode: 503 });
    }
    return this.buildSlip(id, fiscalYear, guideNumber, installmentNumbers);
  }

  async downloadSlipDocument(
    propertyId: string,
    fiscalYear: number,
    guideNumber: string,
    installmentNumbers: readonly string[]
  ): Promise<string | null> {
    const id = digitsOnly(propertyId);
    if (id === FAKE_SENTINELS.DOCUMENT_DOWNLOAD_FAILURE) {
      throw new ServiceUnavailableError("Falha ao baixar o PDF do DARM (erro simulado)");
    }
    const slip = this.buildSlip(id, fiscalYear, guideNumber, installmentNumbers);
    if (!slip) return null;
    return `https://fake.iptu.local/darm/${id}-${fiscalYear}-${guideNumber}-${installmentNumbers.join("-")}.pdf`;
  }

  async lookupActiveDebt(propertyId: string): Promise<DebtInfo | null> {
    const id = digitsOnly(propertyId);
    const raw = this.fixtures.debts[this.dataKey(id)];
    if (raw === undefined) return null;
    return RawDebtResponseSchema.parse(raw);
  }

  private dataKey(id: string): string {
    return this.fixtures.aliases[id] ?? id;
  }

  private rawGuides(id: string, fiscalYear: number): Array<Record<string, unknown>> {
    const { min, max } = this.fixtures.yearRange;
    if (fiscalYear < min || fiscalYear > max) return [];
    const key = this.dataKey(id);
    if (this.fixtures.emptyYears[key]?.includes(fiscalYear)) return [];
    return this.fixtures.guides[key] ?? [];
  }

  private installmentValue(id: string, guideNumber: string): string {
    const key = this.dataKey(id);
    const table =
      guideNumber === ORDINARY_GUIDE ? this.fixtures.installmentValues.ordinary : this.fixtures.installmentValues.extraordinary;
    return table[`${key}/${guideNumber}`] ?? table[key] ?? table["default"] ?? "0,00";
  }

  private rawInstallments(id: string, fiscalYear: number, guideNumber: string): RawInstallment[] | null {
    const guideExists = this.rawGuides(id, fiscalYear).some((entry) => entry["NGuia"] === guideNumber);
    if (!guideExists) return null;
    const value = this.installmentValue(id, guideNumber);

    if (guideNumber === ORDINARY_GUIDE) {
      return Array.from({ length: ORDINARY_INSTALLMENTS }, (_, idx) => {
        const n = idx + 1;
        const month = padNumber(n <= 12 ? n : n - 12);
        if (n <= 3) {
          return {
            Situacao: { codigo: INSTALLMENT_STATUS.PAID, descricao: "PAGA" },
            NCota: padNumber(n),
            ValorCota: value,
            DataVencimento: `07/${month}/2024`,
            ValorPago: value,
            DataPagamento: `15/0${n}/2024`,
            QuantDiasEmAtraso: "0",
          };
        }
        const overdue = n > 25;
        return {
          Situacao: overdue
            ? { codigo: INSTALLMENT_STATUS.OVERDUE, descricao: "VENCIDA" }
            : { codigo: INSTALLMENT_STATUS.OPEN, descricao: "EM ABERTO" },
          NCota: padNumber(n),
          ValorCota: value,
          DataVencimento: `07/${month}/2024`,
          ValorPago: "0,00",
          DataPagamento: "",
          QuantDiasEmAtraso: overdue ? "290" : "0",
        };
      });
    }

    if (EXTRAORDINARY_GUIDES.has(guideNumber)) {
      return Array.from({ length: EXTRAORDINARY_INSTALLMENTS }, (_, idx) => ({
        Situacao: { codigo: INSTALLMENT_STATUS.OPEN, descricao: "EM ABERTO" },
        NCota: padNumber(idx + 1),
        ValorCota: value,
        DataVencimento: `07/${padNumber((idx + 1) * 2)}/2024`,
        ValorPago: "0,00",
        DataPagamento: "",
        QuantDiasEmAtraso: "0",
      }));
    }
    return null;
  }

  private buildSlip(id: string, fiscalYear: number, guideNumber: string, installmentNumbers: readonly string[]): Slip | null {
    const installments = this.rawInstallments(id, fiscalYear, guideNumber);
    if (!installments || installmentNumbers.length === 0) return null;
    const known = new Set(installments.map((entry) => entry.NCota));
    if (installmentNumbers.some((number) => !known.has(number))) return null;

    const selected = installments.filter((entry) => installmentNumbers.includes(entry.NCota));
    const total = sumAmounts(selected.map((entry) => parseBrazilianCurrency(entry.ValorCota)));
    const cents = String(Math.round(total * 100)).padStart(8, "0");
    const digitLine = `310-7.${id.slice(0, 8)}.${fiscalYear}.${guideNumber}.${padNumber(installmentNumbers.length)}.${cents}`;

    return RawSlipSchema.parse({
      Cotas: selected.map((entry) => ({ ncota: entry.NCota, valor: entry.ValorCota })),
      Inscricao: id,
      Exercicio: String(fiscalYear),
      NGuia: guideNumber,
      Tipo: guideNumber === ORDINARY_GUIDE ? "ORDINÁRIA" : "EXTRAORDINÁRIA",
      DataVencimento: SLIP_DUE_DATE,
      ValorAPagar: formatBrazilianCurrency(total),
      SequenciaNumerica: digitLine,
      DescricaoDARM: `DARM por cota ref.cotas ${installmentNumbers.join(",")}`,
    });
  }
}
