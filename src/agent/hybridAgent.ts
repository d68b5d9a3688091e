import type { Pool } from "pg";
import { createPool } from "../config/db";
import type { ModelStage, Settings } from "../config/settings";
import { PgStructuredStore } from "../db";
import type { StructuredStore } from "../db";
import { createGenerationService } from "../llm/client";
import type { GenerationService } from "../llm/client";
import { EvidenceIndex } from "../rag/evidenceIndex";
import { ModelQueryDrafter, TemplateQueryDrafter } from "./drafter";
import type { QueryDrafter } from "./drafter";
import { Orchestrator } from "./graph";
import type { EvidenceRetriever } from "./graph";
import { ModelRouteClassifier, RuleRouteClassifier } from "./router";
import type { RouteClassifier } from "./router";
import { AnswerSynthesizer, ModelAnswerDrafter, RuleAnswerDrafter } from "./synthesizer";
import type { AnswerDrafter } from "./synthesizer";
import type { RunOutput, RunState } from "./types";

export interface HybridAgentOptions {
  modelStages: ModelStage[];
  generationTimeoutMs: number;
  retrieval: { topK: number; minScore: number };
  maxRepairAttempts: number;
  repairBypassTemplates: boolean;
}

export interface HybridAgentDependencies {
  evidence: EvidenceRetriever;
  store: StructuredStore;
  generation: GenerationService | null;
}

export const DEFAULT_AGENT_OPTIONS: HybridAgentOptions = {
  modelStages: ["route", "draft"],
  generationTimeoutMs: 20_000,
  retrieval: { topK: 3, minScore: 0 },
  maxRepairAttempts: 2,
  repairBypassTemplates: false
};

export function toRunOutput(state: RunState): RunOutput {
  return {
    finalAnswer: state.finalAnswer ?? null,
    query: state.query,
    route: state.route ?? "structured",
    confidence: state.confidence,
    explanation: state.explanation,
    citations: [...state.citations],
    repairCount: state.repairCount,
    warnings: [...state.warnings],
    trace: state.trace.entries()
  } satisfies RunOutput;
}

/**
 * Public entry point: answers one question at a time. Model-backed strategies
 * are used for the stages listed in `modelStages` when a generation service is
 * configured; every other stage runs on rules.
 */
export class HybridAgent {
  private constructor(
    private readonly orchestrator: Orchestrator,
    readonly strategies: { route: string; draft: string; answer: string }
  ) {}

  static async create(deps: HybridAgentDependencies, options: Partial<HybridAgentOptions> = {}): Promise<HybridAgent> {
    const config: HybridAgentOptions = { ...DEFAULT_AGENT_OPTIONS, ...options };
    const [schema, tableNames] = await Promise.all([deps.store.schema(), deps.store.tableNames()]);
    const service = deps.generation;
    const uses = (stage: ModelStage): boolean => service !== null && config.modelStages.includes(stage);

    const router: RouteClassifier =
      service && uses("route") ? new ModelRouteClassifier(service, config.generationTimeoutMs) : new RuleRouteClassifier();
    const drafter: QueryDrafter =
      service && uses("draft")
        ? new ModelQueryDrafter(service, schema, config.generationTimeoutMs, {
            bypassTemplatesOnRepair: config.repairBypassTemplates
          })
        : new TemplateQueryDrafter();
    const answerDrafter: AnswerDrafter =
      service && uses("answer") ? new ModelAnswerDrafter(service, config.generationTimeoutMs) : new RuleAnswerDrafter();

    const orchestrator = new Orchestrator({
      router,
      evidence: deps.evidence,
      store: deps.store,
      drafter,
      synthesizer: new AnswerSynthesizer(answerDrafter, tableNames),
      retrieval: config.retrieval,
      maxRepairs: config.maxRepairAttempts
    });

    return new HybridAgent(orchestrator, {
      route: uses("route") ? "model" : "rules",
      draft: uses("draft") ? "model" : "rules",
      answer: uses("answer") ? "model" : "rules"
    });
  }

  async run(question: string, formatHint = "str"): Promise<RunOutput> {
    const state = await this.orchestrator.run({ text: question, formatHint });
    return toRunOutput(state);
  }
}

export interface HybridAgentHandle {
  agent: HybridAgent;
  close: () => Promise<void>;
}

/**
 * Wires the agent from settings. Throws `DataSourceUnavailableError` when the
 * documents directory or the database cannot be reached.
 */
export async function createHybridAgent(settings: Settings): Promise<HybridAgentHandle> {
  const evidence = await EvidenceIndex.fromDirectory(settings.docsDir);

  const pool: Pool = createPool(settings.database);
  let store: PgStructuredStore;
  try {
    store = await PgStructuredStore.connect(pool, { statementTimeoutMs: settings.database.statementTimeoutMs });
  } catch (error) {
    await pool.end();
    throw error;
  }

  const generation = createGenerationService(settings.generation);
  if (!generation) {
    console.warn("No generation service configured; using rule strategies for every stage");
  }

  const agent = await HybridAgent.create(
    { evidence, store, generation },
    {
      modelStages: settings.modelStages,
      generationTimeoutMs: settings.generation.timeoutMs,
      retrieval: settings.retrieval,
      maxRepairAttempts: settings.maxRepairAttempts,
      repairBypassTemplates: settings.repairBypassTemplates
    }
  );
  console.log(`Agent ready (route: ${agent.strategies.route}, draft: ${agent.strategies.draft}, answer: ${agent.strategies.answer})`);

  return { agent, close: () => pool.end() };
}
