import { z } from "zod";
import { completeWithin } from "../llm/client";
import type { GenerationService } from "../llm/client";
import { buildAnswerPrompt, buildSystemPrompt } from "../llm/prompt";
import { errorMessage, escapeRegExp, safeJsonParse } from "../utils";
import { computeConfidenceScore } from "./confidence";
import { stripCodeFences } from "./drafter";
import { answerSchemaFor, extractAnswerFromRows, parseFormatHint, zeroValue } from "./formatHint";
import type { FormatShape } from "./formatHint";
import type { AnswerValue, RunState, Snippet, StrategySource } from "./types";

export interface AnswerDraft {
  answer: AnswerValue;
  source: StrategySource;
  note?: string;
}

export interface AnswerDrafter {
  draft(state: RunState, shape: FormatShape): Promise<AnswerDraft>;
}

export interface SynthesisResult {
  answer: AnswerValue;
  confidence: number;
  citations: string[];
  explanation: string;
  source: StrategySource;
  warnings: string[];
}

const TOPIC_QUALIFIERS = ["unopened", "opened", "perishables", "perishable", "damaged", "defective"];

const ModelAnswerSchema = z.object({ answer: z.unknown() });

function plural(count: number, noun: string): string {
  return `${count} ${noun}${count === 1 ? "" : "s"}`;
}

function hasRows(state: RunState): boolean {
  return state.queryResult?.success === true && state.queryResult.rows.length > 0;
}

/**
 * Finds "<n> day(s)" in the snippets, first bound to a qualifier the question
 * uses (e.g. "Unopened items: 14 days"), then anywhere.
 */
export function extractDocumentAnswer(question: string, snippets: Snippet[], shape: FormatShape): AnswerValue {
  const text = snippets.map((snippet) => snippet.content).join(" ");
  const lower = question.toLowerCase();

  for (const qualifier of TOPIC_QUALIFIERS) {
    if (!new RegExp(`\\b${qualifier}\\b`).test(lower)) {
      continue;
    }
    const bound = new RegExp(`\\b${qualifier}\\b[^.\\d]{0,40}?(\\d+)\\s*days?\\b`, "i").exec(text);
    if (bound) {
      return Number.parseInt(bound[1], 10);
    }
  }

  const any = /(\d+)\s*days?\b/i.exec(text);
  return any ? Number.parseInt(any[1], 10) : zeroValue(shape);
}

export function referencesTable(query: string, table: string): boolean {
  return new RegExp(`(^|[^\\w])"?${escapeRegExp(table)}"?(?![\\w])`, "i").test(query);
}

export function collectCitations(state: RunState, tableNames: string[]): string[] {
  const citations = new Set(state.snippets.map((snippet) => snippet.id));
  if (state.queryResult?.success && state.query) {
    for (const table of tableNames) {
      if (referencesTable(state.query, table)) {
        citations.add(table);
      }
    }
  }
  return Array.from(citations).sort();
}

export function buildExplanation(state: RunState): string {
  const route = state.route ?? "structured";
  if (route === "document") {
    return `document route: answer taken from ${plural(state.snippets.length, "document snippet")}`;
  }
  if (!state.queryResult?.success) {
    return `${route} route: query failed after ${plural(state.repairCount, "repair attempt")}, returned default answer`;
  }
  const rows = plural(state.queryResult.rowCount, "database row");
  return route === "hybrid"
    ? `hybrid route: computed from ${rows} with ${plural(state.snippets.length, "document snippet")}`
    : `structured route: computed from ${rows}`;
}

export class RuleAnswerDrafter implements AnswerDrafter {
  async draft(state: RunState, shape: FormatShape): Promise<AnswerDraft> {
    if (state.route === "document") {
      return { answer: extractDocumentAnswer(state.question, state.snippets, shape), source: "rules" };
    }
    const result = state.queryResult;
    if (!result?.success) {
      return { answer: zeroValue(shape), source: "rules" };
    }
    return { answer: extractAnswerFromRows(shape, result.columns, result.rows), source: "rules" };
  }
}

export class ModelAnswerDrafter implements AnswerDrafter {
  constructor(
    private readonly service: GenerationService,
    private readonly timeoutMs: number,
    private readonly fallback: AnswerDrafter = new RuleAnswerDrafter()
  ) {}

  async draft(state: RunState, shape: FormatShape): Promise<AnswerDraft> {
    if (state.route !== "document" && !hasRows(state)) {
      return this.fallback.draft(state, shape);
    }

    let raw: string;
    try {
      raw = await completeWithin(
        this.service,
        buildAnswerPrompt({
          question: state.question,
          formatHint: state.formatHint,
          queryResult: state.queryResult,
          snippets: state.snippets
        }),
        this.timeoutMs,
        { system: buildSystemPrompt(), temperature: 0, maxTokens: 300 }
      );
    } catch (error) {
      console.warn("Answer drafting failed, using rules", errorMessage(error));
      return this.fallbackDraft(state, shape, `answer drafting unavailable: ${errorMessage(error)}`);
    }

    const envelope = ModelAnswerSchema.safeParse(safeJsonParse<unknown>(stripCodeFences(raw)));
    if (!envelope.success) {
      return this.fallbackDraft(state, shape, "drafted answer was not a JSON object with an answer field");
    }
    const answer = answerSchemaFor(shape).safeParse(envelope.data.answer);
    if (!answer.success) {
      return this.fallbackDraft(state, shape, `drafted answer did not match format ${state.formatHint}`);
    }
    return { answer: answer.data, source: "model" };
  }

  private async fallbackDraft(state: RunState, shape: FormatShape, note: string): Promise<AnswerDraft> {
    const draft = await this.fallback.draft(state, shape);
    return { ...draft, note };
  }
}

export class AnswerSynthesizer {
  constructor(
    private readonly drafter: AnswerDrafter,
    private readonly tableNames: string[]
  ) {}

  async synthesize(state: RunState): Promise<SynthesisResult> {
    const shape = parseFormatHint(state.formatHint);
    const draft = await this.drafter.draft(state, shape);
    return {
      answer: draft.answer,
      confidence: computeConfidenceScore(state).score,
      citations: collectCitations(state, this.tableNames),
      explanation: buildExplanation(state),
      source: draft.source,
      warnings: draft.note ? [draft.note] : []
    } satisfies SynthesisResult;
  }

  /** Used when synthesis itself throws: zero value, deterministic side data. */
  fallback(state: RunState): SynthesisResult {
    return {
      answer: zeroValue(parseFormatHint(state.formatHint)),
      confidence: computeConfidenceScore(state).score,
      citations: collectCitations(state, this.tableNames),
      explanation: buildExplanation(state),
      source: "rules",
      warnings: []
    };
  }
}
