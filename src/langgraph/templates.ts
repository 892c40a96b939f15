import { renderMessage, joinBlocks } from "./core/helpers/template.js";
import { formatBrazilianCurrency, sumAmounts } from "./core/helpers/currency.js";
import type { DebtInfo, GeneratedSlip, GuideSet, Installment } from "./core/services/tax-api/records.js";
import type { NextQuestionType, SessionData } from "./state.js";

function orPlaceholder(value: string | null | undefined): string {
  return value && value.trim() ? value : renderMessage("placeholder_unknown");
}

export function formatPropertyHeader(data: SessionData): string {
  return renderMessage("property_header", {
    property_id: data.property_id ?? "",
    owner: orPlaceholder(data.owner),
    address: orPlaceholder(data.address),
  });
}

export function formatYearQuestion(data: SessionData): string {
  return joinBlocks(formatPropertyHeader(data), renderMessage("ask_fiscal_year"));
}

function formatGuideLines(guideSet: GuideSet): string[] {
  return guideSet.guides.map((guide) =>
    renderMessage("guide_line", {
      guide_number: guide.guide_number,
      kind: guide.kind.toUpperCase(),
      value: formatBrazilianCurrency(guide.value),
      status: guide.status_label || "EM ABERTO",
    })
  );
}

/** Guide lines followed by the question naming the accepted guide numbers. */
export function formatGuideChoices(guideSet: GuideSet): string {
  const options = guideSet.guides.map((guide) => `"${guide.guide_number}"`).join(", ");
  return joinBlocks(...formatGuideLines(guideSet), renderMessage("ask_guide", { options }));
}

export function formatGuideList(data: SessionData, guideSet: GuideSet): string {
  return joinBlocks(
    formatPropertyHeader(data),
    renderMessage("guides_header", { fiscal_year: guideSet.fiscal_year }),
    formatGuideChoices(guideSet)
  );
}

// Every guide of the year is paid or otherwise closed.
export function formatClosedGuides(guideSet: GuideSet): string {
  return joinBlocks(
    renderMessage("guides_all_closed", { fiscal_year: guideSet.fiscal_year, property_id: guideSet.property_id }),
    ...formatGuideLines(guideSet),
    renderMessage("ask_property_id")
  );
}

export function formatInstallmentList(installments: readonly Installment[]): string {
  const lines = installments.map((installment) =>
    renderMessage("installment_line", {
      number: installment.number,
      due_date: installment.due_date || "N/A",
      value: installment.value_text || formatBrazilianCurrency(installment.value),
      status: renderMessage(installment.is_overdue ? "installment_status_overdue" : "installment_status_open"),
    })
  );
  const total = sumAmounts(installments.map((installment) => installment.value));
  return joinBlocks(
    renderMessage("installments_header"),
    lines.join("\n"),
    renderMessage("installments_footer", { total: formatBrazilianCurrency(total) })
  );
}

export function formatConfirmation(data: SessionData, slipCount: number): string {
  return renderMessage("confirm_data", {
    property_id: data.property_id ?? "",
    address: orPlaceholder(data.address),
    owner: orPlaceholder(data.owner),
    guide_number: data.selected_guide ?? "",
    installments: (data.selected_installments ?? []).join(", "),
    slip_count: slipCount,
  });
}

export function formatSlips(propertyId: string, slips: readonly GeneratedSlip[]): string {
  const blocks = slips.map((slip, idx) =>
    renderMessage("slip_block", {
      index: idx + 1,
      property_id: propertyId,
      guide_number: slip.guide_number,
      installments: slip.installments.join(", "),
      value: formatBrazilianCurrency(slip.value),
      due_date: slip.due_date,
      barcode: slip.barcode,
      digit_line: slip.digit_line,
      document: slip.document,
    })
  );
  return joinBlocks(renderMessage("slips_header"), ...blocks);
}

export function formatNextQuestion(type: NextQuestionType, guideNumber: string): string {
  switch (type) {
    case "more_installments":
      return renderMessage("ask_more_installments", { guide_number: guideNumber });
    case "other_guides":
      return renderMessage("ask_other_guides");
    case "other_property":
      return renderMessage("ask_other_property");
  }
}

export function formatServiceUnavailable(detail: string | null): string {
  return joinBlocks(
    renderMessage("service_unavailable"),
    detail ? renderMessage("service_unavailable_detail", { detail }) : null
  );
}

const NA = "N/A";

/** Active-debt summary shown when a year has no guides left to pay. */
export function formatDebtMessage(propertyId: string, fiscalYear: number, debt: DebtInfo): string {
  const header = [renderMessage("debt_header", { fiscal_year: fiscalYear, property_id: propertyId })];
  if (debt.address) {
    const address = debt.neighborhood ? `${debt.address}, ${debt.neighborhood}` : debt.address;
    header.push(renderMessage("debt_address", { address }));
  }

  const sections: string[] = [];
  if (debt.cdas.length > 0) {
    const lines = debt.cdas.map((cda) =>
      renderMessage("debt_cda_line", {
        number: cda.number ?? NA,
        fiscal_year: cda.fiscal_year ?? NA,
        value: cda.value ?? NA,
      })
    );
    sections.push([renderMessage("debt_cdas_title"), ...lines].join("\n"));
  }
  if (debt.efs.length > 0) {
    const lines = debt.efs.map((ef) =>
      renderMessage("debt_ef_line", {
        number: ef.number ?? NA,
        process_number: ef.process_number ?? NA,
        value: ef.value ?? NA,
      })
    );
    sections.push([renderMessage("debt_efs_title"), ...lines].join("\n"));
  }
  if (debt.installment_plans.length > 0) {
    const lines = debt.installment_plans.flatMap((plan) => {
      const entry = [
        renderMessage("debt_plan_line", {
          number: plan.number ?? NA,
          payment_type: plan.payment_type ?? NA,
          paid: plan.paid_installments ?? "0",
          total: plan.total_installments ?? NA,
        }),
      ];
      if (plan.last_payment_date) entry.push(renderMessage("debt_plan_last_payment", { date: plan.last_payment_date }));
      return entry;
    });
    sections.push([renderMessage("debt_plans_title"), ...lines].join("\n"));
  }

  const balance =
    debt.total_balance && debt.total_balance !== "R$0,00"
      ? renderMessage("debt_total_balance", { balance: debt.total_balance })
      : null;

  return joinBlocks(header.join("\n"), renderMessage("debt_section_title"), ...sections, balance, renderMessage("debt_footer"));
}
