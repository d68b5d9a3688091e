import { z } from "zod";
import { completeWithin } from "../llm/client";
import type { GenerationService } from "../llm/client";
import { buildQueryPrompt, buildSystemPrompt } from "../llm/prompt";
import { errorMessage, safeJsonParse } from "../utils";
import { renderTemplate, selectTemplate } from "./templates";
import type { QueryTemplate } from "./templates";
import type { Constraints, QuerySource } from "./types";

export interface DraftContext {
  question: string;
  constraints: Constraints;
  repairNotes: string[];
  repairCount: number;
}

export interface QueryDraft {
  query: string;
  source: QuerySource;
  templateName: string | null;
  warnings: string[];
}

export interface QueryDrafter {
  draft(context: DraftContext): Promise<QueryDraft>;
}

export const MIN_QUERY_LENGTH = 10;

const WrappedQuerySchema = z.union([z.object({ sql: z.string() }), z.object({ query: z.string() })]);

export function stripCodeFences(text: string): string {
  const trimmed = text.trim();
  const fenced = /```(?:sql|postgresql|json)?\s*([\s\S]*?)```/i.exec(trimmed);
  const inner = fenced ? fenced[1] : trimmed;
  return inner.replace(/```(?:sql|postgresql|json)?/gi, "").trim();
}

/**
 * Normalises model output into a bare statement: unwraps `{"sql": ...}`
 * payloads, strips Markdown fences, a leading `SQL:` label and trailing
 * semicolons.
 */
export function cleanGeneratedQuery(text: string): string {
  let cleaned = stripCodeFences(text);

  if (cleaned.startsWith("{")) {
    const wrapped = WrappedQuerySchema.safeParse(safeJsonParse<unknown>(cleaned));
    if (wrapped.success) {
      cleaned = ("sql" in wrapped.data ? wrapped.data.sql : wrapped.data.query).trim();
    }
  }

  return cleaned
    .replace(/^sql\s*:\s*/i, "")
    .replace(/[;\s]+$/, "")
    .trim();
}

function templateDraft(template: QueryTemplate, context: DraftContext): QueryDraft {
  const warnings: string[] = [];
  if (template.tier === "primary" && context.repairCount > 0) {
    warnings.push(`Template ${template.name} re-drafted unchanged after a failed execution`);
  }
  return {
    query: renderTemplate(template, context.question, context.constraints),
    source: template.tier === "primary" ? "template" : "fallback",
    templateName: template.name,
    warnings
  };
}

export class TemplateQueryDrafter implements QueryDrafter {
  async draft(context: DraftContext): Promise<QueryDraft> {
    const template =
      selectTemplate(context.question, context.constraints, "primary") ??
      selectTemplate(context.question, context.constraints, "fallback");
    return templateDraft(template, context);
  }
}

export class ModelQueryDrafter implements QueryDrafter {
  constructor(
    private readonly service: GenerationService,
    private readonly schema: string,
    private readonly timeoutMs: number,
    private readonly options: { bypassTemplatesOnRepair?: boolean } = {}
  ) {}

  async draft(context: DraftContext): Promise<QueryDraft> {
    const skipTemplates = this.options.bypassTemplatesOnRepair === true && context.repairCount > 0;
    const primary = skipTemplates ? null : selectTemplate(context.question, context.constraints, "primary");
    if (primary) {
      return templateDraft(primary, context);
    }

    const fallback = (reason: string): QueryDraft => {
      const draft = templateDraft(selectTemplate(context.question, context.constraints, "fallback"), context);
      return { ...draft, warnings: [...draft.warnings, reason] };
    };

    let raw: string;
    try {
      raw = await completeWithin(
        this.service,
        buildQueryPrompt({
          question: context.question,
          schema: this.schema,
          constraints: context.constraints,
          repairNotes: context.repairNotes
        }),
        this.timeoutMs,
        { system: buildSystemPrompt(), temperature: 0.1, maxTokens: 400 }
      );
    } catch (error) {
      console.warn("Query drafting failed, using fallback query", errorMessage(error));
      return fallback(`Query drafting unavailable: ${errorMessage(error)}`);
    }

    const query = cleanGeneratedQuery(raw);
    if (query.length < MIN_QUERY_LENGTH) {
      return fallback(`Generated query rejected (${query.length} characters)`);
    }
    return { query, source: "model", templateName: null, warnings: [] };
  }
}
