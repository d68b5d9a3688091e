import { escapeRegExp } from "../utils";
import type { Constraints, Snippet } from "./types";

interface CampaignEntry {
  name: string;
  keywords: string[];
  startDate: string;
  endDate: string;
}

interface CategoryEntry {
  name: string;
  keywords: string[];
}

interface MetricEntry {
  name: string;
  keywords: string[];
  formula: string;
}

export const REVENUE_EXPRESSION = "od.unit_price * od.quantity * (1 - od.discount)";

export const CAMPAIGN_CATALOGUE: CampaignEntry[] = [
  {
    name: "Summer Beverages 1997",
    keywords: ["summer beverages 1997", "summer"],
    startDate: "1997-06-01",
    endDate: "1997-06-30"
  },
  {
    name: "Winter Classics 1997",
    keywords: ["winter classics 1997", "winter"],
    startDate: "1997-12-01",
    endDate: "1997-12-31"
  }
];

export const CATEGORY_CATALOGUE: CategoryEntry[] = [
  { name: "Beverages", keywords: ["beverage"] },
  { name: "Condiments", keywords: ["condiment"] },
  { name: "Confections", keywords: ["confection"] },
  { name: "Dairy Products", keywords: ["dairy"] },
  { name: "Grains/Cereals", keywords: ["grain", "cereal"] },
  { name: "Meat/Poultry", keywords: ["meat", "poultry"] },
  { name: "Produce", keywords: ["produce"] },
  { name: "Seafood", keywords: ["seafood"] }
];

export const METRIC_CATALOGUE: MetricEntry[] = [
  {
    name: "aov",
    keywords: ["aov", "average order value"],
    formula: `SUM(${REVENUE_EXPRESSION}) / COUNT(DISTINCT o.order_id)`
  },
  {
    name: "gross_margin",
    keywords: ["gross margin", "margin"],
    formula: "SUM((od.unit_price - 0.7 * od.unit_price) * od.quantity * (1 - od.discount))"
  },
  {
    name: "revenue",
    keywords: ["revenue"],
    formula: `SUM(${REVENUE_EXPRESSION})`
  }
];

const DATE_RANGE = /(\d{4}-\d{2}-\d{2})\s*(?:to|through|until|–|—|-)\s*(\d{4}-\d{2}-\d{2})/i;

function matchesKeyword(lower: string, keyword: string): boolean {
  return new RegExp(`\\b${escapeRegExp(keyword)}`).test(lower);
}

/**
 * Looks for an explicit date range stated after the campaign's name in the
 * retrieved evidence, e.g. "Summer Beverages 1997 ... 1997-06-01 to 1997-06-30".
 */
export function findCampaignRangeInEvidence(
  campaign: string,
  snippets: Snippet[]
): { startDate: string; endDate: string } | null {
  const needle = campaign.toLowerCase();
  for (const snippet of snippets) {
    const position = snippet.content.toLowerCase().indexOf(needle);
    if (position < 0) {
      continue;
    }
    const match = DATE_RANGE.exec(snippet.content.slice(position));
    if (match) {
      return { startDate: match[1], endDate: match[2] };
    }
  }
  return null;
}

export function planConstraints(question: string, snippets: Snippet[] = []): Constraints {
  const lower = question.toLowerCase();
  const constraints: Constraints = {};

  const campaign = CAMPAIGN_CATALOGUE.find((entry) => entry.keywords.some((keyword) => matchesKeyword(lower, keyword)));
  if (campaign) {
    const evidenceRange = findCampaignRangeInEvidence(campaign.name, snippets);
    constraints.campaign = campaign.name;
    constraints.start_date = evidenceRange?.startDate ?? campaign.startDate;
    constraints.end_date = evidenceRange?.endDate ?? campaign.endDate;
  }

  const category = CATEGORY_CATALOGUE.find((entry) => entry.keywords.some((keyword) => matchesKeyword(lower, keyword)));
  if (category) {
    constraints.category = category.name;
  }

  const metric = METRIC_CATALOGUE.find((entry) => entry.keywords.some((keyword) => matchesKeyword(lower, keyword)));
  if (metric) {
    constraints.metric = metric.name;
    constraints.metric_formula = metric.formula;
  }

  const year = /\b(19\d{2}|20\d{2})\b/.exec(question);
  if (year && !constraints.start_date) {
    constraints.year = year[1];
  }

  return constraints;
}
