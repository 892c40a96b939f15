import { resolveProjectPath } from "../../config/appConfig.js";
import { loadMessageCatalog, setMessageCatalog } from "../core/config/messaging.js";
import { createInitialState } from "../core/helpers/state.js";
import type { ErrorRecord, ErrorReporter } from "../core/services/error-reporting/reporter.js";
import { createLogger } from "../core/services/logger.js";
import { FakePropertyTaxApi } from "../core/services/tax-api/fake-client.js";
import {
  RawGuideSchema,
  RawInstallmentSchema,
  type Guide,
  type GuideSet,
  type Installment,
  type InstallmentSet,
} from "../core/services/tax-api/records.js";
import type { SessionData, SessionInternal, SessionState } from "../state.js";

export const MESSAGES_PATH = resolveProjectPath("config", "messages.pt-BR.yaml");
export const FAKE_DATA_PATH = resolveProjectPath("fixtures", "fake-tax-data.json");

export const testLogger = createLogger("test");

export function useMessageCatalog(): void {
  setMessageCatalog(loadMessageCatalog(MESSAGES_PATH));
}

export function createFakeApi(): FakePropertyTaxApi {
  return FakePropertyTaxApi.fromFile(FAKE_DATA_PATH, testLogger);
}

export class RecordingReporter implements ErrorReporter {
  readonly records: ErrorRecord[] = [];

  async report(record: ErrorRecord): Promise<boolean> {
    this.records.push(record);
    return true;
  }
}

export function stateWith(parts: {
  data?: SessionData;
  internal?: SessionInternal;
  payload?: Record<string, unknown>;
}): SessionState {
  return {
    ...createInitialState({ sessionId: "test-session" }),
    data: parts.data ?? {},
    internal: parts.internal ?? {},
    payload: parts.payload ?? {},
  };
}

export function makeGuide(guideNumber: string, options: { statusCode?: string; kind?: string } = {}): Guide {
  return RawGuideSchema.parse({
    Situacao: { codigo: options.statusCode ?? "01", descricao: "EM ABERTO" },
    Inscricao: "01234567890123",
    Exercicio: "2025",
    NGuia: guideNumber,
    Tipo: options.kind ?? (guideNumber === "00" ? "ORDINÁRIA" : "EXTRAORDINÁRIA"),
    ValorIPTUOriginalGuia: "1.000,00",
    DataVenctoDescCotaUnica: "07/02/2025",
    QuantDiasEmAtraso: "0",
    ValorIPTUDescontoAvista: "930,00",
    ValorParcelas: "100,00",
    ValorQuitado: "0,00",
  });
}

export function makeInstallment(
  number: string,
  options: { statusCode?: string; dueDate?: string; value?: string } = {}
): Installment {
  return RawInstallmentSchema.parse({
    Situacao: { codigo: options.statusCode ?? "02", descricao: "" },
    NCota: number,
    ValorCota: options.value ?? "100,00",
    DataVencimento: options.dueDate ?? "07/03/2025",
    ValorPago: "0,00",
    DataPagamento: "",
    QuantDiasEmAtraso: "0",
  });
}

export function makeGuideSet(guides: Guide[]): GuideSet {
  return { property_id: "01234567890123", fiscal_year: 2025, guides };
}

export function makeInstallmentSet(guideNumber: string, installments: Installment[]): InstallmentSet {
  return {
    property_id: "01234567890123",
    fiscal_year: 2025,
    guide_number: guideNumber,
    guide_kind: guideNumber === "00" ? "ORDINÁRIA" : "EXTRAORDINÁRIA",
    installments,
    total_value: installments.reduce((total, item) => total + item.value, 0),
  };
}

export type FetchMock = jest.Mock<Promise<Response>, [string, RequestInit?]>;

export function mockFetch(...responses: Response[]): FetchMock {
  const fetchMock: FetchMock = jest.fn<Promise<Response>, [string, RequestInit?]>();
  for (const response of responses) fetchMock.mockResolvedValueOnce(response);
  return fetchMock;
}

export function jsonResponse(body: unknown, status = 200): Response {
  return new Response(JSON.stringify(body), { status, headers: { "Content-Type": "application/json" } });
}
