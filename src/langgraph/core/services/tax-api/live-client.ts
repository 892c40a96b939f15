import crypto from "node:crypto";
import * as z from "zod";
import { createLogger, type Logger } from "../logger.js";
import { digitsOnly } from "../../helpers/parsing.js";
import { sumAmounts } from "../../helpers/currency.js";
import {
  AuthenticationError,
  DataNotFoundError,
  InvalidPropertyIdError,
  ServiceUnavailableError,
} from "./errors.js";
import {
  RawDebtResponseSchema,
  RawGuideSchema,
  RawInstallmentSchema,
  RawSlipSchema,
  type DebtInfo,
  type GuideSet,
  type InstallmentSet,
  type Slip,
} from "./records.js";
import type { DocumentPublisher } from "./document-publisher.js";
import type { PropertyInfo, PropertyTaxApi } from "./types.js";

export const REQUEST_TIMEOUT_MS = 30_000;

export type FetchLike = (input: string, init?: RequestInit) => Promise<Response>;

export interface LivePropertyTaxApiConfig {
  iptuApi: { baseUrl: string; token: string };
  propertyInfoApi?: { baseUrl: string; token: string; publicKey: string } | null;
  activeDebtApi?: { baseUrl: string; accessKey: string } | null;
}

export interface LivePropertyTaxApiDeps {
  fetchImpl?: FetchLike;
  documentPublisher?: DocumentPublisher | null;
  logger?: Logger;
  now?: () => Date;
  timeoutMs?: number;
}

const PropertyInfoResponseSchema = z.object({
  tipoLogradouro: z.string().nullish(),
  nomeLogradouro: z.string().nullish(),
  numPorta: z.union([z.string(), z.number()]).nullish(),
  complEndereco: z.string().nullish(),
  bairro: z.string().nullish(),
  cep: z.string().nullish(),
  proprietarioPrincipal: z.string().nullish(),
});

const GuideListResponseSchema = z.array(z.unknown());
const InstallmentsResponseSchema = z.object({ Cotas: z.array(z.unknown()) });
const TokenResponseSchema = z.object({ access_token: z.string() });
const ErrorBodySchema = z.object({ codigo: z.string().optional() }).passthrough();

/** Brazilian-format UTC timestamp prefixed to the property-info token before encryption. */
export function formatTokenTimestamp(date: Date): string {
  const p = (n: number) => String(n).padStart(2, "0");
  return (
    `${p(date.getUTCDate())}/${p(date.getUTCMonth() + 1)}/${date.getUTCFullYear()} ` +
    `${p(date.getUTCHours())}:${p(date.getUTCMinutes())}:${p(date.getUTCSeconds())}`
  );
}

export function toPem(publicKey: string): string {
  if (publicKey.includes("BEGIN PUBLIC KEY")) return publicKey.trim();
  const body = publicKey.replace(/\s+/g, "").match(/.{1,64}/g)?.join("\n") ?? "";
  return `-----BEGIN PUBLIC KEY-----\n${body}\n-----END PUBLIC KEY-----`;
}

/** RSA PKCS#1 v1.5 encryption of "<timestamp><token>" encoded as UTF-16LE, base64 output. */
export function encryptPropertyInfoToken(publicKey: string, token: string, now: Date): string {
  const plaintext = Buffer.from(formatTokenTimestamp(now) + token, "utf16le");
  const encrypted = crypto.publicEncrypt(
    { key: toPem(publicKey), padding: crypto.constants.RSA_PKCS1_PADDING },
    plaintext
  );
  return encrypted.toString("base64");
}

/**
 * PropertyTaxApi over the municipal HTTP services. Every request is bounded
 * by a timeout; status codes map onto the PropertyTaxApiError hierarchy.
 */
export class LivePropertyTaxApi implements PropertyTaxApi {
  private readonly fetchImpl: FetchLike;
  private readonly logger: Logger;
  private readonly now: () => Date;
  private readonly timeoutMs: number;
  private readonly documentPublisher: DocumentPublisher | null;

  constructor(private readonly config: LivePropertyTaxApiConfig, deps: LivePropertyTaxApiDeps = {}) {
    this.fetchImpl = deps.fetchImpl ?? fetch;
    this.logger = deps.logger ?? createLogger("iptu-api");
    this.now = deps.now ?? (() => new Date());
    this.timeoutMs = deps.timeoutMs ?? REQUEST_TIMEOUT_MS;
    this.documentPublisher = deps.documentPublisher ?? null;
  }

  async lookupProperty(propertyId: string): Promise<PropertyInfo | null> {
    const api = this.config.propertyInfoApi;
    if (!api) {
      this.logger.debug("property info api not configured");
      return null;
    }
    const id = digitsOnly(propertyId);
    const endpoint = "ConsultarImovel";
    const authorization = `Basic ${encryptPropertyInfoToken(api.publicKey, api.token, this.now())}`;
    const response = await this.send(endpoint, `${api.baseUrl}/${id}`, { headers: { Authorization: authorization } });

    if (response.status === 404) {
      this.logger.warn({ propertyId: id }, "property not found");
      return null;
    }
    if (response.status === 400) {
      const body = ErrorBodySchema.safeParse(await this.readJson(endpoint, response));
      if (body.success && body.data.codigo === "033") {
        throw new InvalidPropertyIdError(`Inscrição imobiliária ${id} não encontrada no sistema`, {
          statusCode: 400,
          endpoint,
        });
      }
    }
    this.assertOk(endpoint, response, "Serviço de dados do imóvel");

    const info = this.parseBody(endpoint, PropertyInfoResponseSchema, await this.readJson(endpoint, response));
    const address = [
      [info.tipoLogradouro, info.nomeLogradouro].filter(Boolean).join(" "),
      info.numPorta,
      info.complEndereco,
      info.bairro,
      info.cep,
    ]
      .map((part) => (part === null || part === undefined ? "" : String(part).trim()))
      .filter(Boolean)
      .join(", ");
    return { address: address || null, owner: info.proprietarioPrincipal ?? null };
  }

  async listGuides(propertyId: string, fiscalYear: number): Promise<GuideSet | null> {
    const id = digitsOnly(propertyId);
    const body = await this.iptuRequest("ConsultarGuias", { inscricao: id, exercicio: String(fiscalYear) });
    const list = GuideListResponseSchema.safeParse(body);
    if (!list.success || list.data.length === 0) return null;

    const guides = list.data.flatMap((raw) => {
      const parsed = RawGuideSchema.safeParse(raw);
      if (!parsed.success) {
        this.logger.warn({ issues: parsed.error.issues }, "skipping malformed guide");
        return [];
      }
      return [parsed.data];
    });
    if (guides.length === 0) return null;
    return { property_id: id, fiscal_year: fiscalYear, guides };
  }

  async listInstallments(propertyId: string, fiscalYear: number, guideNumber: string): Promise<InstallmentSet | null> {
    const id = digitsOnly(propertyId);
    const body = await this.iptuRequest("ConsultarCotas", {
      inscricao: id,
      exercicio: String(fiscalYear),
      guia: guideNumber,
    });
    const parsed = InstallmentsResponseSchema.safeParse(body);
    if (!parsed.success) return null;

    const installments = parsed.data.Cotas.flatMap((raw) => {
      const result = RawInstallmentSchema.safeParse(raw);
      if (!result.success) {
        this.logger.warn({ issues: result.error.issues }, "skipping malformed installment");
        return [];
      }
      return [result.data];
    });
    if (installments.length === 0) return null;
    return {
      property_id: id,
      fiscal_year: fiscalYear,
      guide_number: guideNumber,
      guide_kind: "ORDINÁRIA",
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
    const body = await this.iptuRequest("ConsultarDARM", {
      inscricao: id,
      exercicio: String(fiscalYear),
      guia: guideNumber,
      cotas: installmentNumbers.join(","),
    });
    if (!body) return null;
    const parsed = RawSlipSchema.safeParse(body);
    if (!parsed.success) {
      this.logger.error({ issues: parsed.error.issues, guideNumber }, "malformed slip response");
      return null;
    }
    return parsed.data;
  }

  async downloadSlipDocument(
    propertyId: string,
    fiscalYear: number,
    guideNumber: string,
    installmentNumbers: readonly string[]
  ): Promise<string | null> {
    const id = digitsOnly(propertyId);
    const pdfBase64 = await this.iptuRequest(
      "DownloadPdfDARM",
      { inscricao: id, exercicio: String(fiscalYear), guia: guideNumber, cotas: installmentNumbers.join(",") },
      "text"
    );
    if (typeof pdfBase64 !== "string" || !pdfBase64 || pdfBase64.startsWith("<!DOCTYPE")) return null;
    if (!this.documentPublisher) {
      this.logger.warn("no document publisher configured, slip document not published");
      return null;
    }
    return this.documentPublisher.publish(pdfBase64);
  }

  async lookupActiveDebt(propertyId: string): Promise<DebtInfo | null> {
    const api = this.config.activeDebtApi;
    if (!api) {
      this.logger.debug("active debt api not configured");
      return null;
    }
    try {
      return await this.fetchActiveDebt(api, digitsOnly(propertyId));
    } catch (error) {
      if (error instanceof DataNotFoundError) return null;
      throw error;
    }
  }

  private async fetchActiveDebt(api: { baseUrl: string; accessKey: string }, id: string): Promise<DebtInfo> {
    const tokenEndpoint = "security/token";
    const authResponse = await this.send(tokenEndpoint, `${api.baseUrl}/security/token`, {
      method: "POST",
      body: new URLSearchParams({
        verify: "False",
        grant_type: "password",
        Consumidor: "consultar-dividas-contribuinte",
        ChaveAcesso: api.accessKey,
      }),
    });
    this.assertOk(tokenEndpoint, authResponse, "Serviço de Dívida Ativa");
    const token = TokenResponseSchema.safeParse(await this.readJson(tokenEndpoint, authResponse));
    if (!token.success) {
      throw new AuthenticationError("Falha ao obter token de autenticação da Dívida Ativa", { endpoint: tokenEndpoint });
    }

    const endpoint = "v2/cdas/dividas-contribuinte";
    const response = await this.send(endpoint, `${api.baseUrl}/${endpoint}`, {
      method: "POST",
      headers: { Authorization: `Bearer ${token.data.access_token}` },
      body: new URLSearchParams({ "origem_solicitação": "0", inscricaoImobiliaria: id }),
    });
    this.assertOk(endpoint, response, "Serviço de Dívida Ativa");
    return this.parseBody(endpoint, RawDebtResponseSchema, await this.readJson(endpoint, response));
  }

  private async iptuRequest(
    endpoint: string,
    params: Record<string, string>,
    expect: "json" | "text" = "json"
  ): Promise<unknown> {
    const { baseUrl, token } = this.config.iptuApi;
    const query = new URLSearchParams({ ...params, token });
    const response = await this.send(endpoint, `${baseUrl}/${endpoint}?${query.toString()}`);
    try {
      this.assertOk(endpoint, response, "Serviço IPTU");
    } catch (error) {
      if (error instanceof DataNotFoundError) {
        this.logger.warn({ endpoint }, "iptu api returned 404");
        return null;
      }
      throw error;
    }
    return expect === "json" ? this.readJson(endpoint, response) : response.text();
  }

  private async send(endpoint: string, url: string, init: RequestInit = {}): Promise<Response> {
    try {
      return await this.fetchImpl(url, { ...init, signal: AbortSignal.timeout(this.timeoutMs) });
    } catch (error) {
      if (error instanceof Error && (error.name === "TimeoutError" || error.name === "AbortError")) {
        this.logger.error({ endpoint }, "request timed out");
        throw new ServiceUnavailableError("Serviço não respondeu no tempo esperado. Por favor, tente novamente.", {
          cause: error,
          endpoint,
        });
      }
      this.logger.error({ endpoint, err: error }, "request failed");
      const detail = error instanceof Error ? error.message : String(error);
      throw new ServiceUnavailableError(`Erro ao comunicar com o serviço: ${detail}`, { cause: error, endpoint });
    }
  }

  private assertOk(endpoint: string, response: Response, serviceLabel: string): void {
    if (response.ok) return;
    const statusCode = response.status;
    if (statusCode === 401) {
      this.logger.error({ endpoint }, "authentication failed");
      throw new AuthenticationError(`Falha na autenticação: ${serviceLabel}`, { statusCode, endpoint });
    }
    if (statusCode === 404) {
      throw new DataNotFoundError(`Recurso não encontrado: ${endpoint}`, { statusCode, endpoint });
    }
    this.logger.error({ endpoint, statusCode }, "remote service error");
    if (statusCode === 500 || statusCode === 503) {
      throw new ServiceUnavailableError(`${serviceLabel} temporariamente indisponível (HTTP ${statusCode})`, {
        statusCode,
        endpoint,
      });
    }
    throw new ServiceUnavailableError(`Erro ao comunicar com ${serviceLabel} (HTTP ${statusCode})`, {
      statusCode,
      endpoint,
    });
  }

  // A 200 with an unexpected shape is treated like a faulty service.
  private parseBody<T extends z.ZodTypeAny>(endpoint: string, schema: T, body: unknown): z.output<T> {
    const parsed = schema.safeParse(body);
    if (!parsed.success) {
      this.logger.error({ endpoint, issues: parsed.error.issues }, "unexpected response shape");
      throw new ServiceUnavailableError(`Resposta inválida de ${endpoint}`, { cause: parsed.error, endpoint });
    }
    return parsed.data;
  }

  private async readJson(endpoint: string, response: Response): Promise<unknown> {
    try {
      const body: unknown = await response.json();
      return body;
    } catch (error) {
      throw new ServiceUnavailableError(`Resposta inválida de ${endpoint}`, { cause: error, endpoint });
    }
  }
}
