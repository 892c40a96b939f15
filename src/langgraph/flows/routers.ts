import { END } from "@langchain/langgraph";
import type { SessionState } from "../state.js";
import { IPTU_NODES, type IptuNodeName } from "./step-flow-config.js";

export type RouteTarget = IptuNodeName | typeof END;

// Every router halts while a question is pending; payload is never consulted.
function awaitingUser(state: SessionState): boolean {
  return state.pending_response !== null;
}

export function routeAfterPropertyId(state: SessionState): RouteTarget {
  if (awaitingUser(state)) return END;
  return state.data.property_id !== undefined ? IPTU_NODES.CHOOSE_FISCAL_YEAR : END;
}

export function routeAfterFiscalYear(state: SessionState): RouteTarget {
  if (awaitingUser(state)) return END;
  return state.data.fiscal_year !== undefined ? IPTU_NODES.LIST_GUIDES : END;
}

// No guides on file: back to whichever identification step is missing its data.
export function routeAfterListGuides(state: SessionState): RouteTarget {
  if (awaitingUser(state)) return END;
  if (state.data.guides && state.internal.guides_consulted) return IPTU_NODES.CHOOSE_GUIDE;
  if (state.data.property_id === undefined) return IPTU_NODES.INFORM_PROPERTY_ID;
  return IPTU_NODES.CHOOSE_FISCAL_YEAR;
}

export function routeAfterChooseGuide(state: SessionState): RouteTarget {
  if (awaitingUser(state)) return END;
  return state.data.selected_guide !== undefined ? IPTU_NODES.LIST_INSTALLMENTS : END;
}

export function routeAfterListInstallments(state: SessionState): RouteTarget {
  if (awaitingUser(state)) return END;
  return state.data.installments ? IPTU_NODES.CHOOSE_INSTALLMENTS : IPTU_NODES.CHOOSE_GUIDE;
}

export function routeAfterChooseInstallments(state: SessionState): RouteTarget {
  if (awaitingUser(state)) return END;
  return (state.data.selected_installments?.length ?? 0) > 0 ? IPTU_NODES.CHOOSE_SLIP_FORMAT : END;
}

export function routeAfterSlipFormat(state: SessionState): RouteTarget {
  if (awaitingUser(state)) return END;
  return state.internal.separate_slips !== undefined ? IPTU_NODES.CONFIRM_PAYMENT_DATA : END;
}

export function routeAfterConfirmation(state: SessionState): RouteTarget {
  if (awaitingUser(state)) return END;
  return state.internal.data_confirmed ? IPTU_NODES.GENERATE_SLIPS : END;
}

export function routeAfterGeneration(state: SessionState): RouteTarget {
  if (awaitingUser(state)) return END;
  return state.internal.slips_generated ? IPTU_NODES.POST_GENERATION : END;
}

// Backtracks only once the follow-up question has been answered.
export function routeAfterPostGeneration(state: SessionState): RouteTarget {
  if (awaitingUser(state)) return END;
  if (state.internal.wants_more_installments) return IPTU_NODES.CHOOSE_INSTALLMENTS;
  if (state.internal.wants_other_guides) return IPTU_NODES.CHOOSE_GUIDE;
  if (state.internal.wants_other_property) return IPTU_NODES.INFORM_PROPERTY_ID;
  return END;
}
