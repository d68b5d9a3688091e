import { buildRoutePrompt, buildSystemPrompt } from "../llm/prompt";
import { completeWithin } from "../llm/client";
import type { GenerationService } from "../llm/client";
import { errorMessage } from "../utils";
import { ROUTES } from "./types";
import type { Route, StrategySource } from "./types";

export interface RouteDecision {
  route: Route;
  source: StrategySource;
  note?: string;
}

export interface RouteClassifier {
  classify(question: string): Promise<RouteDecision>;
}

const POLICY_TERMS = ["policy", "policies", "return window", "return", "returns"];
const REFERENCE_TERMS = ["according to", "per the", "as stated in", "definition", "definitions", "defined", "define"];
const CAMPAIGN_TERMS = ["during", "summer", "winter", "campaign", "calendar"];
const METRIC_TERMS = ["aov", "average order value", "margin"];
const AGGREGATION_TARGETS = ["revenue", "value", "customer", "quantity", "highest", "top", "total"];

const ROUTE_ALIASES: Record<string, Route> = {
  rag: "document",
  docs: "document",
  sql: "structured",
  database: "structured"
};

// "Return a float ..." style sentences describe the answer format, not the topic.
const FORMAT_INSTRUCTION = /(^|[.?!]\s+)return\b(?!\s+(?:window|policy|policies)\b)[^.?!]*/g;

function mentionsAny(lower: string, terms: string[]): boolean {
  return terms.some((term) => new RegExp(`\\b${term}\\b`).test(lower));
}

/**
 * Policy vocabulary means documents. Campaign or metric language paired with an
 * aggregation target means hybrid. Definition or reference language that is not
 * hybrid means documents. Everything else is structured.
 */
export function classifyRouteByRules(question: string): Route {
  const lower = question.toLowerCase().replace(FORMAT_INSTRUCTION, "$1");

  if (mentionsAny(lower, POLICY_TERMS)) {
    return "document";
  }
  if (
    (mentionsAny(lower, CAMPAIGN_TERMS) || mentionsAny(lower, METRIC_TERMS)) &&
    mentionsAny(lower, AGGREGATION_TARGETS)
  ) {
    return "hybrid";
  }
  if (mentionsAny(lower, REFERENCE_TERMS)) {
    return "document";
  }
  return "structured";
}

/** Reads the first recognised label from free-form model output. */
export function parseRouteLabel(text: string): Route | null {
  const words = text.toLowerCase().match(/[a-z]+/g) ?? [];
  for (const word of words) {
    const direct = ROUTES.find((route) => route === word);
    if (direct) {
      return direct;
    }
    const alias = ROUTE_ALIASES[word];
    if (alias) {
      return alias;
    }
  }
  return null;
}

export class RuleRouteClassifier implements RouteClassifier {
  async classify(question: string): Promise<RouteDecision> {
    return { route: classifyRouteByRules(question), source: "rules" };
  }
}

export class ModelRouteClassifier implements RouteClassifier {
  constructor(
    private readonly service: GenerationService,
    private readonly timeoutMs: number,
    private readonly fallback: RouteClassifier = new RuleRouteClassifier()
  ) {}

  async classify(question: string): Promise<RouteDecision> {
    let raw: string;
    try {
      raw = await completeWithin(this.service, buildRoutePrompt(question), this.timeoutMs, {
        system: buildSystemPrompt(),
        temperature: 0,
        maxTokens: 8
      });
    } catch (error) {
      console.warn("Route classification failed, using rules", errorMessage(error));
      return this.fallbackDecision(question, `classifier unavailable: ${errorMessage(error)}`);
    }

    const route = parseRouteLabel(raw);
    if (!route) {
      return this.fallbackDecision(question, `classifier returned out-of-vocabulary label "${raw.trim().slice(0, 40)}"`);
    }
    return { route, source: "model" };
  }

  private async fallbackDecision(question: string, note: string): Promise<RouteDecision> {
    const decision = await this.fallback.classify(question);
    return { ...decision, note };
  }
}
