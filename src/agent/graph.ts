import { Annotation, END, START, StateGraph } from "@langchain/langgraph";
import type { StructuredStore } from "../db";
import { errorMessage } from "../utils";
import type { QueryDrafter } from "./drafter";
import { planConstraints } from "./planner";
import { classifyRouteByRules } from "./router";
import type { RouteClassifier } from "./router";
import {
  addWarning,
  createInitialRunState,
  failedQueryResult,
  finalizeAnswer,
  recordRepair,
  setConstraints,
  setDraft,
  setQueryResult,
  setRoute,
  setSnippets
} from "./state";
import type { AnswerSynthesizer } from "./synthesizer";
import { DEFAULT_QUERY_TEMPLATE, renderTemplate } from "./templates";
import type { Question, RunState, Snippet, Stage } from "./types";

export interface EvidenceRetriever {
  retrieve(query: string, topK: number, minScore?: number): Snippet[];
}

export interface OrchestratorDependencies {
  router: RouteClassifier;
  evidence: EvidenceRetriever;
  store: Pick<StructuredStore, "execute">;
  drafter: QueryDrafter;
  synthesizer: AnswerSynthesizer;
  retrieval: { topK: number; minScore: number };
  maxRepairs: number;
}

const RunAnnotation = Annotation.Root({
  run: Annotation<RunState>
});

type GraphState = typeof RunAnnotation.State;
type GraphUpdate = typeof RunAnnotation.Update;

interface StageOutcome {
  run: RunState;
  summary: string;
}

function preview(value: unknown, max = 80): string {
  const text = JSON.stringify(value) ?? "null";
  return text.length > max ? `${text.slice(0, max)}…` : text;
}

/**
 * Wraps a stage so it always produces a state update: on error the stage's
 * `recover` result is used instead. Exactly one trace entry is appended per visit.
 */
function stage(
  name: Stage,
  work: (run: RunState) => Promise<StageOutcome>,
  recover: (run: RunState, message: string) => StageOutcome
): (state: GraphState) => Promise<GraphUpdate> {
  return async ({ run }) => {
    let outcome: StageOutcome;
    try {
      outcome = await work(run);
    } catch (error) {
      const message = errorMessage(error);
      console.warn(`Stage ${name} failed, applying fallback`, message);
      outcome = recover(addWarning(run, `${name} failed: ${message}`), message);
    }
    outcome.run.trace.append(name, outcome.summary);
    return { run: outcome.run };
  };
}

export function nextAfterRoute(run: RunState): "retrieve" | "plan" {
  return run.route === "document" || run.route === "hybrid" ? "retrieve" : "plan";
}

export function nextAfterRetrieve(run: RunState): "synthesize" | "plan" {
  return run.route === "document" ? "synthesize" : "plan";
}

export function nextAfterExecute(run: RunState, maxRepairs: number): "repair" | "synthesize" {
  const failed = run.queryResult?.success !== true;
  return failed && run.repairCount < maxRepairs ? "repair" : "synthesize";
}

export function compileRunGraph(deps: OrchestratorDependencies) {
  const builder = new StateGraph(RunAnnotation)
    .addNode(
      "route",
      stage(
        "route",
        async (run) => {
          const decision = await deps.router.classify(run.question);
          let next = setRoute(run, decision.route, decision.source);
          if (decision.note) {
            next = addWarning(next, decision.note);
          }
          return { run: next, summary: `route=${decision.route} via ${decision.source}` };
        },
        (run) => {
          const route = classifyRouteByRules(run.question);
          return { run: setRoute(run, route, "rules"), summary: `route=${route} via rules after error` };
        }
      )
    )
    .addNode(
      "retrieve",
      stage(
        "retrieve",
        async (run) => {
          const snippets = deps.evidence.retrieve(run.question, deps.retrieval.topK, deps.retrieval.minScore);
          const ids = snippets.map((snippet) => snippet.id).join(", ");
          return { run: setSnippets(run, snippets), summary: `${snippets.length} snippets${ids ? `: ${ids}` : ""}` };
        },
        (run) => ({ run: setSnippets(run, []), summary: "0 snippets after error" })
      )
    )
    .addNode(
      "plan",
      stage(
        "plan",
        async (run) => {
          const constraints = planConstraints(run.question, run.snippets);
          const keys = Object.keys(constraints);
          return {
            run: setConstraints(run, constraints),
            summary: keys.length > 0 ? `constraints: ${keys.join(", ")}` : "no constraints"
          };
        },
        (run) => ({ run: setConstraints(run, {}), summary: "no constraints after error" })
      )
    )
    .addNode(
      "draft_query",
      stage(
        "draft_query",
        async (run) => {
          const draft = await deps.drafter.draft({
            question: run.question,
            constraints: run.constraints,
            repairNotes: run.repairNotes,
            repairCount: run.repairCount
          });
          let next = setDraft(run, draft);
          for (const warning of draft.warnings) {
            next = addWarning(next, warning);
          }
          const label = draft.templateName ? `${draft.source}:${draft.templateName}` : draft.source;
          return { run: next, summary: `${label} ${preview(draft.query, 100)}` };
        },
        (run) => {
          const query = renderTemplate(DEFAULT_QUERY_TEMPLATE, run.question, run.constraints);
          return {
            run: setDraft(run, { query, source: "fallback", templateName: DEFAULT_QUERY_TEMPLATE.name }),
            summary: `fallback:${DEFAULT_QUERY_TEMPLATE.name} after error`
          };
        }
      )
    )
    .addNode(
      "execute_query",
      stage(
        "execute_query",
        async (run) => {
          const result = await deps.store.execute(run.query);
          const summary = result.success ? `success, ${result.rowCount} rows` : `failed: ${result.error ?? "unknown error"}`;
          return { run: setQueryResult(run, result), summary };
        },
        (run, message) => ({ run: setQueryResult(run, failedQueryResult(message)), summary: `failed: ${message}` })
      )
    )
    .addNode(
      "repair",
      stage(
        "repair",
        async (run) => {
          const next = recordRepair(run, run.queryResult?.error ?? "unknown error");
          return { run: next, summary: `attempt ${next.repairCount} of ${deps.maxRepairs}` };
        },
        (run) => {
          const next = recordRepair(run, "unknown error");
          return { run: next, summary: `attempt ${next.repairCount} of ${deps.maxRepairs}` };
        }
      )
    )
    .addNode(
      "synthesize",
      stage(
        "synthesize",
        async (run) => {
          const result = await deps.synthesizer.synthesize(run);
          let next = finalizeAnswer(run, result);
          for (const warning of result.warnings) {
            next = addWarning(next, warning);
          }
          return {
            run: next,
            summary: `answer=${preview(result.answer, 50)} via ${result.source}, confidence=${result.confidence}`
          };
        },
        (run) => {
          const result = deps.synthesizer.fallback(run);
          return { run: finalizeAnswer(run, result), summary: `answer=${preview(result.answer, 50)} default after error` };
        }
      )
    )
    .addEdge(START, "route")
    .addConditionalEdges("route", ({ run }) => nextAfterRoute(run), ["retrieve", "plan"])
    .addConditionalEdges("retrieve", ({ run }) => nextAfterRetrieve(run), ["synthesize", "plan"])
    .addEdge("plan", "draft_query")
    .addEdge("draft_query", "execute_query")
    .addConditionalEdges("execute_query", ({ run }) => nextAfterExecute(run, deps.maxRepairs), ["repair", "synthesize"])
    .addEdge("repair", "draft_query")
    .addEdge("synthesize", END);

  return builder.compile();
}

/** Sequences one question through the stages; every run gets a fresh state and trace. */
export class Orchestrator {
  private readonly app: ReturnType<typeof compileRunGraph>;

  constructor(private readonly deps: OrchestratorDependencies) {
    this.app = compileRunGraph(deps);
  }

  async run(question: Question): Promise<RunState> {
    const result = await this.app.invoke(
      { run: createInitialRunState(question) },
      { recursionLimit: 10 + 3 * this.deps.maxRepairs }
    );
    return result.run;
  }
}
