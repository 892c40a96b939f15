/**
 * Parses Brazilian currency text ("2.878,00", "R$ 1.234,56", "R$0,00") into a number.
 * Returns 0 for blank or unparseable text.
 */
export function parseBrazilianCurrency(text: string | null | undefined): number {
  const cleaned = (text ?? "").replace(/R\$/g, "").replace(/\s/g, "");
  if (!cleaned) return 0;
  const value = Number(cleaned.replace(/\./g, "").replace(",", "."));
  return Number.isFinite(value) ? value : 0;
}

/** Formats a number as "1.234,56", or "R$ 1.234,56" with `prefix`. */
export function formatBrazilianCurrency(value: number, options?: { prefix?: boolean }): string {
  const [integerPart, decimalPart] = Math.abs(value).toFixed(2).split(".");
  const grouped = integerPart.replace(/\B(?=(\d{3})+(?!\d))/g, ".");
  const sign = value < 0 && Math.abs(value) >= 0.005 ? "-" : "";
  const text = `${sign}${grouped},${decimalPart}`;
  return options?.prefix ? `R$ ${text}` : text;
}

/** Sums amounts in cents so that repeated installment values do not drift. */
export function sumAmounts(values: readonly number[]): number {
  const cents = values.reduce((total, value) => total + Math.round(value * 100), 0);
  return cents / 100;
}
