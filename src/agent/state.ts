import type {
  AnswerValue,
  Constraints,
  Question,
  QueryResult,
  QuerySource,
  Route,
  RunState,
  Snippet,
  Stage,
  StrategySource,
  TraceEntry
} from "./types";

/**
 * Append-only record of the stages a single run visited. Each run owns its own
 * instance; callers only ever see copies of the entries.
 */
export class TraceLog {
  private readonly items: TraceEntry[] = [];

  append(stage: Stage, summary: string): void {
    this.items.push({ stage, summary });
  }

  get length(): number {
    return this.items.length;
  }

  entries(): TraceEntry[] {
    return this.items.map((entry) => ({ ...entry }));
  }

  visits(stage: Stage): number {
    return this.items.filter((entry) => entry.stage === stage).length;
  }
}

export function createInitialRunState(question: Question): RunState {
  return {
    question: question.text,
    formatHint: question.formatHint,
    route: null,
    routeSource: null,
    snippets: [],
    constraints: {},
    query: "",
    querySource: null,
    templateName: null,
    queryResult: null,
    repairCount: 0,
    repairNotes: [],
    finalAnswer: undefined,
    confidence: 0,
    citations: [],
    explanation: "",
    warnings: [],
    trace: new TraceLog()
  } satisfies RunState;
}

export function failedQueryResult(error: string): QueryResult {
  return { success: false, columns: [], rows: [], error, rowCount: 0 };
}

export function setRoute(state: RunState, route: Route, source: StrategySource): RunState {
  return { ...state, route, routeSource: source };
}

export function setSnippets(state: RunState, snippets: Snippet[]): RunState {
  return { ...state, snippets };
}

export function setConstraints(state: RunState, constraints: Constraints): RunState {
  return { ...state, constraints };
}

export function setDraft(
  state: RunState,
  draft: { query: string; source: QuerySource; templateName: string | null }
): RunState {
  return {
    ...state,
    query: draft.query,
    querySource: draft.source,
    templateName: draft.templateName
  };
}

export function setQueryResult(state: RunState, queryResult: QueryResult): RunState {
  return { ...state, queryResult };
}

export function recordRepair(state: RunState, reason: string): RunState {
  return {
    ...state,
    repairCount: state.repairCount + 1,
    repairNotes: [...state.repairNotes, reason]
  };
}

export function addWarning(state: RunState, warning: string): RunState {
  return { ...state, warnings: [...state.warnings, warning] };
}

export function finalizeAnswer(
  state: RunState,
  result: { answer: AnswerValue; confidence: number; citations: string[]; explanation: string }
): RunState {
  return {
    ...state,
    finalAnswer: result.answer,
    confidence: result.confidence,
    citations: result.citations,
    explanation: result.explanation
  };
}
