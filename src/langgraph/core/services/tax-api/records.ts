import * as z from "zod";
import { parseBrazilianCurrency } from "../../helpers/currency.js";

// Status codes returned by the guide and installment endpoints.
export const GUIDE_STATUS = { OPEN: "01", PAID: "02" } as const;
export const INSTALLMENT_STATUS = { PAID: "01", OPEN: "02", OVERDUE: "03" } as const;

const RawStatusSchema = z.object({
  codigo: z.string(),
  descricao: z.string().default(""),
});

const text = z.string().nullish().transform((v) => v ?? "");

// ---------------------------------------------------------------------------
// Guides
// ---------------------------------------------------------------------------

export const GuideSchema = z.object({
  property_id: z.string(),
  fiscal_year: z.string(),
  guide_number: z.string(),
  kind: z.string(),
  status_code: z.string(),
  status_label: z.string(),
  value_text: z.string(),
  value: z.number(),
  discount_value: z.number(),
  installment_value: z.number(),
  discount_due_date: z.string(),
  days_overdue: z.number().int(),
  paid_value: z.number(),
  is_paid: z.boolean(),
  is_open: z.boolean(),
});
export type Guide = z.infer<typeof GuideSchema>;

export const RawGuideSchema = z
  .object({
    Situacao: RawStatusSchema,
    Inscricao: z.string(),
    Exercicio: z.union([z.string(), z.number()]).transform(String),
    NGuia: z.string(),
    Tipo: z.string(),
    ValorIPTUOriginalGuia: z.string(),
    DataVenctoDescCotaUnica: text,
    QuantDiasEmAtraso: text,
    ValorIPTUDescontoAvista: text,
    ValorParcelas: text,
    ValorQuitado: text,
  })
  .transform(
    (raw): Guide => ({
      property_id: raw.Inscricao,
      fiscal_year: raw.Exercicio,
      guide_number: raw.NGuia,
      kind: raw.Tipo,
      status_code: raw.Situacao.codigo,
      status_label: raw.Situacao.descricao,
      value_text: raw.ValorIPTUOriginalGuia,
      value: parseBrazilianCurrency(raw.ValorIPTUOriginalGuia),
      discount_value: parseBrazilianCurrency(raw.ValorIPTUDescontoAvista),
      installment_value: parseBrazilianCurrency(raw.ValorParcelas),
      discount_due_date: raw.DataVenctoDescCotaUnica,
      days_overdue: parseDays(raw.QuantDiasEmAtraso),
      paid_value: parseBrazilianCurrency(raw.ValorQuitado),
      is_paid: raw.Situacao.codigo === GUIDE_STATUS.PAID,
      is_open: raw.Situacao.codigo === GUIDE_STATUS.OPEN,
    })
  );

export const GuideSetSchema = z.object({
  property_id: z.string(),
  fiscal_year: z.number().int(),
  guides: z.array(GuideSchema),
});
export type GuideSet = z.infer<typeof GuideSetSchema>;

// ---------------------------------------------------------------------------
// Installments
// ---------------------------------------------------------------------------

export const InstallmentSchema = z.object({
  number: z.string(),
  due_date: z.string(),
  status_code: z.string(),
  status_label: z.string(),
  value_text: z.string(),
  value: z.number(),
  paid_value: z.number(),
  payment_date: z.string(),
  days_overdue: z.number().int(),
  is_paid: z.boolean(),
  is_overdue: z.boolean(),
});
export type Installment = z.infer<typeof InstallmentSchema>;

export const RawInstallmentSchema = z
  .object({
    Situacao: RawStatusSchema,
    NCota: z.string(),
    ValorCota: z.string(),
    DataVencimento: text,
    ValorPago: text,
    DataPagamento: text,
    QuantDiasEmAtraso: text,
  })
  .transform(
    (raw): Installment => ({
      number: raw.NCota,
      due_date: raw.DataVencimento,
      status_code: raw.Situacao.codigo,
      status_label: raw.Situacao.descricao,
      value_text: raw.ValorCota,
      value: parseBrazilianCurrency(raw.ValorCota),
      paid_value: parseBrazilianCurrency(raw.ValorPago),
      payment_date: raw.DataPagamento,
      days_overdue: parseDays(raw.QuantDiasEmAtraso),
      is_paid: raw.Situacao.codigo === INSTALLMENT_STATUS.PAID,
      is_overdue: raw.Situacao.codigo === INSTALLMENT_STATUS.OVERDUE,
    })
  );

export const InstallmentSetSchema = z.object({
  property_id: z.string(),
  fiscal_year: z.number().int(),
  guide_number: z.string(),
  guide_kind: z.string(),
  installments: z.array(InstallmentSchema),
  total_value: z.number(),
});
export type InstallmentSet = z.infer<typeof InstallmentSetSchema>;

// ---------------------------------------------------------------------------
// Payment slips (DARM)
// ---------------------------------------------------------------------------

export const SlipSchema = z.object({
  property_id: z.string(),
  fiscal_year: z.string(),
  guide_number: z.string(),
  kind: z.string(),
  installments: z.array(z.object({ number: z.string(), value_text: z.string() })),
  due_date: z.string(),
  value_text: z.string(),
  value: z.number(),
  digit_line: z.string(),
  barcode: z.string(),
  description: z.string(),
});
export type Slip = z.infer<typeof SlipSchema>;

export const RawSlipSchema = z
  .object({
    Cotas: z.array(z.object({ ncota: z.string(), valor: z.string() })).default([]),
    Inscricao: z.string(),
    Exercicio: z.union([z.string(), z.number()]).transform(String),
    NGuia: z.string(),
    Tipo: text,
    DataVencimento: text,
    ValorAPagar: z.string(),
    SequenciaNumerica: text,
    DescricaoDARM: text,
  })
  .transform(
    (raw): Slip => ({
      property_id: raw.Inscricao,
      fiscal_year: raw.Exercicio,
      guide_number: raw.NGuia,
      kind: raw.Tipo,
      installments: raw.Cotas.map((c) => ({ number: c.ncota, value_text: c.valor })),
      due_date: raw.DataVencimento,
      value_text: raw.ValorAPagar,
      value: parseBrazilianCurrency(raw.ValorAPagar),
      digit_line: raw.SequenciaNumerica,
      barcode: raw.SequenciaNumerica.replace(/[.\s]/g, ""),
      description: raw.DescricaoDARM,
    })
  );

// Summary of an issued slip kept in the session so later turns can show and exclude it.
export const GeneratedSlipSchema = z.object({
  fiscal_year: z.number().int(),
  guide_number: z.string(),
  installments: z.array(z.string()),
  value: z.number(),
  due_date: z.string(),
  barcode: z.string(),
  digit_line: z.string(),
  document: z.string(),
});
export type GeneratedSlip = z.infer<typeof GeneratedSlipSchema>;

// ---------------------------------------------------------------------------
// Active debt (dívida ativa)
// ---------------------------------------------------------------------------

export const DebtInfoSchema = z.object({
  has_active_debt: z.boolean(),
  due_date: z.string().nullable(),
  total_balance: z.string(),
  unsplit_balance: z.string(),
  installment_plan_balance: z.string(),
  address: z.string().nullable(),
  neighborhood: z.string().nullable(),
  has_document: z.boolean(),
  document_url: z.string().nullable(),
  cdas: z.array(
    z.object({
      number: z.string().nullable(),
      fiscal_year: z.string().nullable(),
      value: z.string().nullable(),
      status: z.string().nullable(),
    })
  ),
  efs: z.array(
    z.object({
      number: z.string().nullable(),
      process_number: z.string().nullable(),
      value: z.string().nullable(),
    })
  ),
  installment_plans: z.array(
    z.object({
      number: z.string().nullable(),
      total_installments: z.string().nullable(),
      paid_installments: z.string().nullable(),
      last_payment_date: z.string().nullable(),
      payment_type: z.string().nullable(),
      status: z.string().nullable(),
      total_value: z.string().nullable(),
    })
  ),
});
export type DebtInfo = z.infer<typeof DebtInfoSchema>;

const optional = z.string().nullish();
const pick = (...candidates: Array<string | null | undefined>) => candidates.find((c) => c) ?? null;

const RawCdaSchema = z.object({
  numero: optional,
  cdaId: optional,
  exercicio: optional,
  numExercicio: optional,
  valorOriginal: optional,
  valorSaldoTotal: optional,
  situacao: optional,
  situacaoPrincipal: optional,
});

const RawEfSchema = z.object({
  numeroEF: optional,
  numeroExecucaoFiscal: optional,
  numeroProcesso: optional,
  valorOriginal: optional,
  saldoExecucaoFiscalNaoParcelada: optional,
});

const RawInstallmentPlanSchema = z.object({
  numero: optional,
  qtdeParcelas: optional,
  qtdPagas: optional,
  dataUltimoPagamento: optional,
  descricaoTipoPagamento: optional,
  descricaoSituacaoGuia: optional,
  valorTotalGuia: optional,
});

export const RawDebtResponseSchema = z
  .object({
    success: z.boolean().default(false),
    data: z
      .object({
        dataVencimento: optional,
        saldoTotalDivida: optional,
        enderecoImovel: optional,
        bairroImovel: optional,
        pdf: optional,
        urlPdf: optional,
        debitosNaoParceladosComSaldoTotal: z
          .object({
            cdasNaoAjuizadasNaoParceladas: z.array(RawCdaSchema).default([]),
            efsNaoParceladas: z.array(RawEfSchema).default([]),
            saldoTotalNaoParcelado: optional,
          })
          .default({}),
        guiasParceladasComSaldoTotal: z
          .object({
            guiasParceladas: z.array(RawInstallmentPlanSchema).default([]),
            saldoTotalParcelado: optional,
          })
          .default({}),
      })
      .default({}),
  })
  .transform((raw): DebtInfo => {
    const data = raw.data;
    const unsplit = data.debitosNaoParceladosComSaldoTotal;
    const plans = data.guiasParceladasComSaldoTotal;
    const cdas = raw.success
      ? unsplit.cdasNaoAjuizadasNaoParceladas.map((cda) => ({
          number: pick(cda.numero, cda.cdaId),
          fiscal_year: pick(cda.exercicio, cda.numExercicio),
          value: pick(cda.valorOriginal, cda.valorSaldoTotal),
          status: pick(cda.situacao, cda.situacaoPrincipal),
        }))
      : [];
    const efs = raw.success
      ? unsplit.efsNaoParceladas.map((ef) => ({
          number: pick(ef.numeroEF, ef.numeroExecucaoFiscal),
          process_number: pick(ef.numeroProcesso, ef.numeroExecucaoFiscal),
          value: pick(ef.valorOriginal, ef.saldoExecucaoFiscalNaoParcelada),
        }))
      : [];
    const installmentPlans = raw.success
      ? plans.guiasParceladas.map((plan) => ({
          number: plan.numero ?? null,
          total_installments: plan.qtdeParcelas ?? null,
          paid_installments: plan.qtdPagas ?? null,
          last_payment_date: plan.dataUltimoPagamento ?? null,
          payment_type: plan.descricaoTipoPagamento ?? null,
          status: plan.descricaoSituacaoGuia ?? null,
          total_value: plan.valorTotalGuia ?? null,
        }))
      : [];
    return {
      has_active_debt: cdas.length > 0 || efs.length > 0 || installmentPlans.length > 0,
      due_date: raw.success ? data.dataVencimento ?? null : null,
      total_balance: (raw.success && data.saldoTotalDivida) || "R$0,00",
      unsplit_balance: (raw.success && unsplit.saldoTotalNaoParcelado) || "R$0,00",
      installment_plan_balance: (raw.success && plans.saldoTotalParcelado) || "R$0,00",
      address: raw.success ? data.enderecoImovel ?? null : null,
      neighborhood: raw.success ? data.bairroImovel ?? null : null,
      has_document: raw.success && Boolean(data.pdf),
      document_url: raw.success ? data.urlPdf ?? null : null,
      cdas,
      efs,
      installment_plans: installmentPlans,
    };
  });

function parseDays(value: string): number {
  return /^\d+$/.test(value) ? Number(value) : 0;
}
