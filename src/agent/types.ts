import type { TraceLog } from "./state";

export const ROUTES = ["document", "structured", "hybrid"] as const;
export type Route = (typeof ROUTES)[number];

export const STAGES = [
  "route",
  "retrieve",
  "plan",
  "draft_query",
  "execute_query",
  "repair",
  "synthesize"
] as const;
export type Stage = (typeof STAGES)[number];

export type StrategySource = "model" | "rules";

export interface Question {
  readonly text: string;
  readonly formatHint: string;
}

export interface Snippet {
  readonly id: string;
  readonly content: string;
  readonly source: string;
  readonly score: number;
}

export type CellValue = string | number | boolean | Date | null;
export type Row = CellValue[];

export interface QueryResult {
  success: boolean;
  columns: string[];
  rows: Row[];
  error: string | null;
  rowCount: number;
}

export type ConstraintKey =
  | "campaign"
  | "start_date"
  | "end_date"
  | "category"
  | "year"
  | "metric"
  | "metric_formula";

export type Constraints = Partial<Record<ConstraintKey, string>>;

export type QuerySource = "template" | "model" | "fallback";

export type AnswerValue =
  | number
  | string
  | boolean
  | null
  | { [field: string]: string | number }
  | Array<{ [field: string]: string | number }>;

export interface TraceEntry {
  stage: Stage;
  summary: string;
}

export interface RunState {
  question: string;
  formatHint: string;
  route: Route | null;
  routeSource: StrategySource | null;
  snippets: Snippet[];
  constraints: Constraints;
  query: string;
  querySource: QuerySource | null;
  templateName: string | null;
  queryResult: QueryResult | null;
  repairCount: number;
  repairNotes: string[];
  finalAnswer: AnswerValue | undefined;
  confidence: number;
  citations: string[];
  explanation: string;
  warnings: string[];
  trace: TraceLog;
}

export interface RunOutput {
  finalAnswer: AnswerValue;
  query: string;
  route: Route;
  confidence: number;
  explanation: string;
  citations: string[];
  repairCount: number;
  warnings: string[];
  trace: TraceEntry[];
}
