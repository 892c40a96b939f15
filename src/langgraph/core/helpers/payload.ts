import * as z from "zod";
import { zodToJsonSchema } from "zod-to-json-schema";
import { digitsOnly, normalizePropertyId, padNumber, parseNumberSelection } from "./parsing.js";
import { parseYesNo } from "./normalization.js";

// Answer fields a step can ask for; each pending response names exactly one.
export const PAYLOAD_CONTRACTS = [
  "property_id",
  "fiscal_year",
  "guide_number",
  "installments",
  "separate_slips",
  "confirmed",
  "more_installments",
  "other_guides",
  "other_property",
] as const;
export type PayloadContract = (typeof PAYLOAD_CONTRACTS)[number];

export const PROPERTY_ID_MAX_LENGTH = 15;
export const FISCAL_YEAR_MIN = 2000;
export const FISCAL_YEAR_MAX = 2100;

const numberOrString = z.union([z.string(), z.number()]);

export const PropertyIdField = numberOrString
  .transform((v) => digitsOnly(String(v)))
  .pipe(
    z
      .string()
      .min(1, "Inscrição imobiliária deve conter dígitos")
      .max(PROPERTY_ID_MAX_LENGTH, `Inscrição imobiliária não pode ter mais de ${PROPERTY_ID_MAX_LENGTH} dígitos`)
  )
  .transform(normalizePropertyId)
  .describe("Inscrição imobiliária do imóvel (até 15 dígitos)");

export const FiscalYearField = numberOrString
  .transform((v) => (typeof v === "number" ? v : /^\s*\d{4}\s*$/.test(v) ? Number(v) : Number.NaN))
  .pipe(
    z
      .number({ invalid_type_error: "Ano de exercício inválido" })
      .int("Ano de exercício inválido")
      .min(FISCAL_YEAR_MIN, "Ano de exercício inválido")
      .max(FISCAL_YEAR_MAX, "Ano de exercício inválido")
  )
  .describe("Ano de exercício para consulta do IPTU");

export const GuideNumberField = numberOrString
  .transform((v) => String(v).trim())
  .pipe(z.string().regex(/^\d+$/, "Número da guia deve conter apenas dígitos"))
  .transform((v) => padNumber(v))
  .describe("Número da guia escolhida para pagamento (ex: '00', '01')");

export const InstallmentsField = z
  .union([z.array(numberOrString), z.string()])
  .transform((v) =>
    typeof v === "string" ? parseNumberSelection(v) ?? [] : Array.from(new Set(v.map((n) => padNumber(digitsOnly(String(n))))))
  )
  .pipe(z.array(z.string().regex(/^\d{2,}$/, "Número de cota inválido")).min(1, "Selecione ao menos uma cota"))
  .describe("Lista das cotas escolhidas para pagamento (ex: ['01', '02'])");

const yesNoField = (description: string) =>
  z
    .unknown()
    .transform((v) => parseYesNo(v))
    .pipe(z.boolean({ invalid_type_error: "Responda com sim ou não" }))
    .describe(description);

export const PAYLOAD_FIELDS = {
  property_id: PropertyIdField,
  fiscal_year: FiscalYearField,
  guide_number: GuideNumberField,
  installments: InstallmentsField,
  separate_slips: yesNoField("true para um boleto por cota, false para boleto único"),
  confirmed: yesNoField("Confirmação se os dados estão corretos"),
  more_installments: yesNoField("Se deseja pagar mais cotas da mesma guia"),
  other_guides: yesNoField("Se deseja emitir boletos de outra guia do mesmo imóvel"),
  other_property: yesNoField("Se deseja consultar outro imóvel"),
} satisfies Record<PayloadContract, z.ZodTypeAny>;

export type PayloadRead<T> =
  | { kind: "absent" }
  | { kind: "valid"; value: T }
  | { kind: "invalid"; error: string };

/**
 * Reads one answer field from the turn payload. Absent and null values
 * are both "absent"; parse failures carry the first validation message.
 */
export function readPayloadField<T>(
  payload: Record<string, unknown>,
  field: PayloadContract,
  schema: z.ZodType<T, z.ZodTypeDef, unknown>
): PayloadRead<T> {
  const raw = payload[field];
  if (raw === undefined || raw === null) return { kind: "absent" };
  const result = schema.safeParse(raw);
  if (result.success) return { kind: "valid", value: result.data };
  return { kind: "invalid", error: result.error.issues[0]?.message ?? "Valor inválido" };
}

export type PayloadJsonSchema = ReturnType<typeof zodToJsonSchema>;

/** JSON schema of the object `{ [contract]: value }` a caller must send next. */
export function payloadJsonSchema(contract: PayloadContract): PayloadJsonSchema {
  return zodToJsonSchema(z.object({ [contract]: PAYLOAD_FIELDS[contract] }), {
    $refStrategy: "none",
    effectStrategy: "input",
    pipeStrategy: "input",
  });
}
