import { END, START, StateGraph } from "@langchain/langgraph";
import { getMessagesPath } from "../config/appConfig.js";
import { loadMessageCatalog, setMessageCatalog } from "./core/config/messaging.js";
import { intercept } from "./core/services/error-reporting/interceptor.js";
import type { ErrorReporter, ErrorSource } from "./core/services/error-reporting/reporter.js";
import { createLogger, type Logger } from "./core/services/logger.js";
import { interceptPropertyTaxApi } from "./core/services/tax-api/intercepted.js";
import type { PropertyTaxApi } from "./core/services/tax-api/types.js";
import { createChooseFiscalYearNode, createInformPropertyIdNode } from "./flows/identification-nodes.js";
import { createChooseGuideNode, createListGuidesNode } from "./flows/guide-nodes.js";
import {
  createChooseInstallmentsNode,
  createChooseSlipFormatNode,
  createListInstallmentsNode,
} from "./flows/installment-nodes.js";
import {
  routeAfterChooseGuide,
  routeAfterChooseInstallments,
  routeAfterConfirmation,
  routeAfterFiscalYear,
  routeAfterGeneration,
  routeAfterListGuides,
  routeAfterListInstallments,
  routeAfterPostGeneration,
  routeAfterPropertyId,
  routeAfterSlipFormat,
} from "./flows/routers.js";
import { createConfirmPaymentDataNode, createGenerateSlipsNode, createPostGenerationNode } from "./flows/slip-nodes.js";
import { IPTU_GRAPH_ID, IPTU_NODES, type IptuNodeName } from "./flows/step-flow-config.js";
import type { NodeDeps, StepNode } from "./flows/step-flow-helpers.js";
import { SessionAnnotation, SessionStateSchema, type SessionState } from "./state.js";

export type { SessionState } from "./state.js";
export { createInitialState } from "./core/helpers/state.js";

export const RECURSION_LIMIT = 50;

export interface PropertyTaxGraphDeps {
  api: PropertyTaxApi;
  reporter: ErrorReporter;
  logger?: Logger;
  /** Defaults to MESSAGES_PATH or config/messages.pt-BR.yaml. */
  messagesPath?: string;
}

const GRAPH_SOURCE: ErrorSource = { tool: "iptu", workflow: IPTU_GRAPH_ID };

function sessionIdOf(args: readonly unknown[]): string | null {
  const [state] = args;
  if (typeof state !== "object" || state === null || !("session_id" in state)) return null;
  return typeof state.session_id === "string" ? state.session_id : null;
}

/**
 * Builds the fixed IPTU workflow. Every step and every facade call is wrapped
 * by the error interceptor here, at registration time.
 */
export function buildPropertyTaxGraph(deps: PropertyTaxGraphDeps) {
  setMessageCatalog(loadMessageCatalog(deps.messagesPath ?? getMessagesPath()));
  const logger = deps.logger ?? createLogger("iptu-graph");
  const api = interceptPropertyTaxApi(deps.api, { source: GRAPH_SOURCE, reporter: deps.reporter, logger });
  const nodeDeps: NodeDeps = { api, logger };

  const step = (name: IptuNodeName, factory: (deps: NodeDeps) => StepNode): StepNode =>
    intercept(factory(nodeDeps), {
      source: { ...GRAPH_SOURCE, component: "step" },
      functionName: name,
      reporter: deps.reporter,
      logger,
      extractUserId: sessionIdOf,
    });

  return new StateGraph(SessionAnnotation)
    .addNode(IPTU_NODES.INFORM_PROPERTY_ID, step(IPTU_NODES.INFORM_PROPERTY_ID, createInformPropertyIdNode))
    .addNode(IPTU_NODES.CHOOSE_FISCAL_YEAR, step(IPTU_NODES.CHOOSE_FISCAL_YEAR, createChooseFiscalYearNode))
    .addNode(IPTU_NODES.LIST_GUIDES, step(IPTU_NODES.LIST_GUIDES, createListGuidesNode))
    .addNode(IPTU_NODES.CHOOSE_GUIDE, step(IPTU_NODES.CHOOSE_GUIDE, createChooseGuideNode))
    .addNode(IPTU_NODES.LIST_INSTALLMENTS, step(IPTU_NODES.LIST_INSTALLMENTS, createListInstallmentsNode))
    .addNode(IPTU_NODES.CHOOSE_INSTALLMENTS, step(IPTU_NODES.CHOOSE_INSTALLMENTS, createChooseInstallmentsNode))
    .addNode(IPTU_NODES.CHOOSE_SLIP_FORMAT, step(IPTU_NODES.CHOOSE_SLIP_FORMAT, createChooseSlipFormatNode))
    .addNode(IPTU_NODES.CONFIRM_PAYMENT_DATA, step(IPTU_NODES.CONFIRM_PAYMENT_DATA, createConfirmPaymentDataNode))
    .addNode(IPTU_NODES.GENERATE_SLIPS, step(IPTU_NODES.GENERATE_SLIPS, createGenerateSlipsNode))
    .addNode(IPTU_NODES.POST_GENERATION, step(IPTU_NODES.POST_GENERATION, createPostGenerationNode))
    .addEdge(START, IPTU_NODES.INFORM_PROPERTY_ID)
    .addConditionalEdges(IPTU_NODES.INFORM_PROPERTY_ID, routeAfterPropertyId, {
      [IPTU_NODES.CHOOSE_FISCAL_YEAR]: IPTU_NODES.CHOOSE_FISCAL_YEAR,
      [END]: END,
    })
    .addConditionalEdges(IPTU_NODES.CHOOSE_FISCAL_YEAR, routeAfterFiscalYear, {
      [IPTU_NODES.LIST_GUIDES]: IPTU_NODES.LIST_GUIDES,
      [END]: END,
    })
    .addConditionalEdges(IPTU_NODES.LIST_GUIDES, routeAfterListGuides, {
      [IPTU_NODES.CHOOSE_GUIDE]: IPTU_NODES.CHOOSE_GUIDE,
      [IPTU_NODES.CHOOSE_FISCAL_YEAR]: IPTU_NODES.CHOOSE_FISCAL_YEAR,
      [IPTU_NODES.INFORM_PROPERTY_ID]: IPTU_NODES.INFORM_PROPERTY_ID,
      [END]: END,
    })
    .addConditionalEdges(IPTU_NODES.CHOOSE_GUIDE, routeAfterChooseGuide, {
      [IPTU_NODES.LIST_INSTALLMENTS]: IPTU_NODES.LIST_INSTALLMENTS,
      [END]: END,
    })
    .addConditionalEdges(IPTU_NODES.LIST_INSTALLMENTS, routeAfterListInstallments, {
      [IPTU_NODES.CHOOSE_INSTALLMENTS]: IPTU_NODES.CHOOSE_INSTALLMENTS,
      [IPTU_NODES.CHOOSE_GUIDE]: IPTU_NODES.CHOOSE_GUIDE,
      [END]: END,
    })
    .addConditionalEdges(IPTU_NODES.CHOOSE_INSTALLMENTS, routeAfterChooseInstallments, {
      [IPTU_NODES.CHOOSE_SLIP_FORMAT]: IPTU_NODES.CHOOSE_SLIP_FORMAT,
      [END]: END,
    })
    .addConditionalEdges(IPTU_NODES.CHOOSE_SLIP_FORMAT, routeAfterSlipFormat, {
      [IPTU_NODES.CONFIRM_PAYMENT_DATA]: IPTU_NODES.CONFIRM_PAYMENT_DATA,
      [END]: END,
    })
    .addConditionalEdges(IPTU_NODES.CONFIRM_PAYMENT_DATA, routeAfterConfirmation, {
      [IPTU_NODES.GENERATE_SLIPS]: IPTU_NODES.GENERATE_SLIPS,
      [END]: END,
    })
    .addConditionalEdges(IPTU_NODES.GENERATE_SLIPS, routeAfterGeneration, {
      [IPTU_NODES.POST_GENERATION]: IPTU_NODES.POST_GENERATION,
      [END]: END,
    })
    .addConditionalEdges(IPTU_NODES.POST_GENERATION, routeAfterPostGeneration, {
      [IPTU_NODES.CHOOSE_INSTALLMENTS]: IPTU_NODES.CHOOSE_INSTALLMENTS,
      [IPTU_NODES.CHOOSE_GUIDE]: IPTU_NODES.CHOOSE_GUIDE,
      [IPTU_NODES.INFORM_PROPERTY_ID]: IPTU_NODES.INFORM_PROPERTY_ID,
      [END]: END,
    })
    .compile();
}

export type PropertyTaxGraph = ReturnType<typeof buildPropertyTaxGraph>;

/**
 * Runs one conversational turn: the payload replaces the previous one, any
 * pending question is cleared and the graph runs from the entry step until a
 * step asks something or the end marker is reached.
 */
export async function runTurn(
  graphApp: PropertyTaxGraph,
  state: SessionState,
  payload: Record<string, unknown>
): Promise<SessionState> {
  const input = SessionStateSchema.parse({ ...state, status: "progress", payload, pending_response: null });
  const result = await graphApp.invoke(input, { recursionLimit: RECURSION_LIMIT });
  return SessionStateSchema.parse(result);
}
