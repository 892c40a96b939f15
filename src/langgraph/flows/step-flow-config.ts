// ── IPTU graph node names ───────────────────────────────────────────
export const IPTU_GRAPH_ID = "iptu";

export const IPTU_NODES = {
  INFORM_PROPERTY_ID: "inform_property_id",
  CHOOSE_FISCAL_YEAR: "choose_fiscal_year",
  LIST_GUIDES: "list_guides",
  CHOOSE_GUIDE: "choose_guide",
  LIST_INSTALLMENTS: "list_installments",
  CHOOSE_INSTALLMENTS: "choose_installments",
  CHOOSE_SLIP_FORMAT: "choose_slip_format",
  CONFIRM_PAYMENT_DATA: "confirm_payment_data",
  GENERATE_SLIPS: "generate_slips",
  POST_GENERATION: "post_generation",
} as const;

export type IptuNodeName = (typeof IPTU_NODES)[keyof typeof IPTU_NODES];

// "No guides for this year" outcomes per property before asking for another property.
export const MAX_FAILED_YEAR_ATTEMPTS = 3;

// A single installment due on or after this date cannot be paid alone.
export const SINGLE_INSTALLMENT_CUTOFF = new Date(Date.UTC(2026, 0, 1));
