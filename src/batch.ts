import fs from "node:fs/promises";
import pLimit from "p-limit";
import { z } from "zod";
import type { AnswerValue, RunOutput } from "./agent/types";
import { errorMessage, truncate } from "./utils";

export const BatchRecordSchema = z.object({
  id: z.string().min(1),
  question: z.string().min(1),
  format_hint: z.string().default("str")
});

export type BatchRecord = z.infer<typeof BatchRecordSchema>;

export interface BatchOutputRecord {
  id: string;
  final_answer: AnswerValue;
  query: string;
  confidence: number;
  explanation: string;
  citations: string[];
}

export interface QuestionAnswerer {
  run(question: string, formatHint: string): Promise<RunOutput>;
}

const EXPLANATION_LIMIT = 200;

/** A line that could not be read as a record; it still gets an output row. */
export interface InvalidBatchLine {
  id: string;
  error: string;
}

export type BatchEntry = BatchRecord | InvalidBatchLine;

const LineIdSchema = z.object({ id: z.string().min(1) });

function invalidLine(raw: unknown, lineNumber: number, error: string): InvalidBatchLine {
  const keyed = LineIdSchema.safeParse(raw);
  return { id: keyed.success ? keyed.data.id : `line-${lineNumber}`, error: `Line ${lineNumber}: ${error}` };
}

/**
 * Parses JSONL text. Blank lines are skipped; a malformed line becomes an
 * {@link InvalidBatchLine} keyed by its `id` when one can be read, else `line-<n>`.
 */
export function parseBatchRecords(text: string): BatchEntry[] {
  const entries: BatchEntry[] = [];
  text.split(/\r?\n/).forEach((line, index) => {
    if (!line.trim()) {
      return;
    }
    const lineNumber = index + 1;
    let raw: unknown;
    try {
      raw = JSON.parse(line);
    } catch (error) {
      entries.push(invalidLine(undefined, lineNumber, `invalid JSON (${errorMessage(error)})`));
      return;
    }
    const parsed = BatchRecordSchema.safeParse(raw);
    if (!parsed.success) {
      const issues = parsed.error.issues.map((issue) => `${issue.path.join(".")}: ${issue.message}`).join("; ");
      entries.push(invalidLine(raw, lineNumber, issues));
      return;
    }
    entries.push(parsed.data);
  });
  return entries;
}

export function isInvalidBatchLine(entry: BatchEntry): entry is InvalidBatchLine {
  return "error" in entry;
}

export async function readBatchFile(filePath: string): Promise<BatchEntry[]> {
  return parseBatchRecords(await fs.readFile(filePath, "utf-8"));
}

export function serializeBatchOutputs(outputs: BatchOutputRecord[]): string {
  return outputs.map((output) => JSON.stringify(output)).join("\n") + (outputs.length > 0 ? "\n" : "");
}

export async function writeBatchFile(filePath: string, outputs: BatchOutputRecord[]): Promise<void> {
  await fs.writeFile(filePath, serializeBatchOutputs(outputs), "utf-8");
}

export function toBatchOutput(id: string, output: RunOutput): BatchOutputRecord {
  return {
    id,
    final_answer: output.finalAnswer,
    query: output.query,
    confidence: output.confidence,
    explanation: truncate(output.explanation, EXPLANATION_LIMIT),
    citations: output.citations
  };
}

export function errorOutput(id: string, error: unknown): BatchOutputRecord {
  return {
    id,
    final_answer: null,
    query: "",
    confidence: 0,
    explanation: truncate(`Error: ${errorMessage(error)}`, EXPLANATION_LIMIT),
    citations: []
  };
}

/**
 * Answers every record, at most `concurrency` at a time. Output order matches
 * input order; an invalid line or a failing record yields an error record
 * instead of aborting.
 */
export async function runBatch(
  agent: QuestionAnswerer,
  records: BatchEntry[],
  options: { concurrency?: number } = {}
): Promise<BatchOutputRecord[]> {
  const limit = pLimit(Math.max(1, options.concurrency ?? 4));
  let completed = 0;

  return Promise.all(
    records.map((record) =>
      limit(async () => {
        let output: BatchOutputRecord;
        if (isInvalidBatchLine(record)) {
          console.warn(`Record ${record.id} skipped`, record.error);
          output = errorOutput(record.id, record.error);
        } else {
          try {
            output = toBatchOutput(record.id, await agent.run(record.question, record.format_hint));
          } catch (error) {
            console.error(`Record ${record.id} failed`, errorMessage(error));
            output = errorOutput(record.id, error);
          }
        }
        completed += 1;
        console.log(`[${completed}/${records.length}] ${record.id}`);
        return output;
      })
    )
  );
}
