import { readFileSync } from "node:fs";
import { parse as parseYaml } from "yaml";
import * as z from "zod";

export const MESSAGE_KEYS = [
  "ask_property_id",
  "invalid_property_id",
  "property_not_found_after_attempts",
  "property_header",
  "placeholder_unknown",
  "ask_fiscal_year",
  "no_guides_for_year",
  "guides_header",
  "guide_line",
  "ask_guide",
  "guide_not_listed",
  "guides_all_closed",
  "no_installments",
  "installments_paid",
  "installments_all_issued",
  "installments_header",
  "installment_line",
  "installment_status_open",
  "installment_status_overdue",
  "installments_footer",
  "paid_installments_selected",
  "unavailable_installments_selected",
  "single_installment_after_cutoff",
  "single_installment_after_cutoff_error",
  "ask_slip_format",
  "confirm_data",
  "data_not_confirmed",
  "slip_generation_failed",
  "slips_header",
  "slip_block",
  "slips_already_generated",
  "document_missing",
  "document_download_failed",
  "ask_more_installments",
  "ask_other_guides",
  "ask_other_property",
  "transaction_finished",
  "service_unavailable",
  "service_unavailable_detail",
  "authentication_failed",
  "missing_required_field",
  "internal_error",
  "debt_header",
  "debt_address",
  "debt_section_title",
  "debt_cdas_title",
  "debt_cda_line",
  "debt_efs_title",
  "debt_ef_line",
  "debt_plans_title",
  "debt_plan_line",
  "debt_plan_last_payment",
  "debt_total_balance",
  "debt_footer",
  "debt_ask_other_year",
] as const;
export type MessageKey = (typeof MESSAGE_KEYS)[number];

export const MessageCatalogSchema = z.record(z.string(), z.string()).superRefine((catalog, ctx) => {
  const missing = MESSAGE_KEYS.filter((key) => typeof catalog[key] !== "string");
  if (missing.length > 0) {
    ctx.addIssue({ code: z.ZodIssueCode.custom, message: `Missing message keys: ${missing.join(", ")}` });
  }
});
export type MessageCatalog = z.infer<typeof MessageCatalogSchema>;

let messageCatalog: MessageCatalog | null = null;

export function parseMessageCatalog(yamlText: string): MessageCatalog {
  return MessageCatalogSchema.parse(parseYaml(yamlText));
}

export function loadMessageCatalog(filePath: string): MessageCatalog {
  return parseMessageCatalog(readFileSync(filePath, "utf-8"));
}

export function setMessageCatalog(catalog: MessageCatalog): void {
  messageCatalog = catalog;
}

export function clearMessageCatalog(): void {
  messageCatalog = null;
}

export function requireMessageCatalog(): MessageCatalog {
  if (!messageCatalog) {
    throw new Error("Message catalog not set. Call setMessageCatalog (or buildPropertyTaxGraph) before running the graph.");
  }
  return messageCatalog;
}
