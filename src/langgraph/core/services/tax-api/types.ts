import type { DebtInfo, GuideSet, InstallmentSet, Slip } from "./records.js";

export interface PropertyInfo {
  address: string | null;
  owner: string | null;
}

/**
 * Capability interface over the municipal IPTU services.
 *
 * Every method may reject with AuthenticationError or ServiceUnavailableError.
 * "Not found" is always reported as `null`, never as a rejection.
 */
export interface PropertyTaxApi {
  lookupProperty(propertyId: string): Promise<PropertyInfo | null>;
  /** May include paid guides; callers keep the open ones. `null` when nothing is found. */
  listGuides(propertyId: string, fiscalYear: number): Promise<GuideSet | null>;
  listInstallments(propertyId: string, fiscalYear: number, guideNumber: string): Promise<InstallmentSet | null>;
  generateSlip(
    propertyId: string,
    fiscalYear: number,
    guideNumber: string,
    installmentNumbers: readonly string[]
  ): Promise<Slip | null>;
  /** Returns a link (or reference) to the slip PDF. */
  downloadSlipDocument(
    propertyId: string,
    fiscalYear: number,
    guideNumber: string,
    installmentNumbers: readonly string[]
  ): Promise<string | null>;
  lookupActiveDebt(propertyId: string): Promise<DebtInfo | null>;
}

export type PropertyTaxApiMethod = keyof PropertyTaxApi;
