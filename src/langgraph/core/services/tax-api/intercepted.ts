import { intercept, type InterceptOptions } from "../error-reporting/interceptor.js";
import type { PropertyTaxApi, PropertyTaxApiMethod } from "./types.js";

export type FacadeInterceptOptions = Omit<InterceptOptions, "functionName" | "extractUserId">;

function propertyIdOf(args: readonly unknown[]): string | null {
  const [propertyId] = args;
  return typeof propertyId === "string" ? propertyId : null;
}

/** Wraps every facade method so failures reach the error reporter before propagating. */
export function interceptPropertyTaxApi(api: PropertyTaxApi, options: FacadeInterceptOptions): PropertyTaxApi {
  const optionsFor = (method: PropertyTaxApiMethod): InterceptOptions => ({
    ...options,
    source: { ...options.source, component: "property-tax-api" },
    functionName: method,
    extractUserId: propertyIdOf,
  });

  return {
    lookupProperty: intercept((propertyId: string) => api.lookupProperty(propertyId), optionsFor("lookupProperty")),
    listGuides: intercept(
      (propertyId: string, fiscalYear: number) => api.listGuides(propertyId, fiscalYear),
      optionsFor("listGuides")
    ),
    listInstallments: intercept(
      (propertyId: string, fiscalYear: number, guideNumber: string) =>
        api.listInstallments(propertyId, fiscalYear, guideNumber),
      optionsFor("listInstallments")
    ),
    generateSlip: intercept(
      (propertyId: string, fiscalYear: number, guideNumber: string, installments: readonly string[]) =>
        api.generateSlip(propertyId, fiscalYear, guideNumber, installments),
      optionsFor("generateSlip")
    ),
    downloadSlipDocument: intercept(
      (propertyId: string, fiscalYear: number, guideNumber: string, installments: readonly string[]) =>
        api.downloadSlipDocument(propertyId, fiscalYear, guideNumber, installments),
      optionsFor("downloadSlipDocument")
    ),
    lookupActiveDebt: intercept((propertyId: string) => api.lookupActiveDebt(propertyId), optionsFor("lookupActiveDebt")),
  };
}
