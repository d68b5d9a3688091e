import { describe, expect, it } from "vitest";
import { isInvalidBatchLine, parseBatchRecords, runBatch, serializeBatchOutputs } from "../../batch";
import type { QuestionAnswerer } from "../../batch";
import type { RunOutput } from "../../agent/types";

class ScriptedAnswerer implements QuestionAnswerer {
  active = 0;

  peak = 0;

  async run(question: string, formatHint: string): Promise<RunOutput> {
    this.active += 1;
    this.peak = Math.max(this.peak, this.active);
    // later questions finish first
    await new Promise((resolve) => setTimeout(resolve, 30 - question.length));
    this.active -= 1;
    if (question.includes("explode")) {
      throw new Error("store unavailable");
    }
    return buildOutput({ finalAnswer: question.length, explanation: `${formatHint} ${"x".repeat(300)}` });
  }
}

describe("parseBatchRecords", () => {
  it("defaults the format hint and skips blank lines", () => {
    const text = '{"id":"q1","question":"How many orders?"}\n\n{"id":"q2","question":"AOV?","format_hint":"float"}\n';
    expect(parseBatchRecords(text)).toEqual([
      { id: "q1", question: "How many orders?", format_hint: "str" },
      { id: "q2", question: "AOV?", format_hint: "float" }
    ]);
  });

  it("keeps reading past a record that fails validation", () => {
    const text = '{"id":"q1","question":"ok"}\n{"id":"q2"}\n{"id":"q3","question":"fine"}';
    expect(parseBatchRecords(text)).toEqual([
      { id: "q1", question: "ok", format_hint: "str" },
      { id: "q2", error: "Line 2: question: Required" },
      { id: "q3", question: "fine", format_hint: "str" }
    ]);
  });

  it("keys unreadable lines by line number", () => {
    const entries = parseBatchRecords('{"id":"q1","question":"ok"}\n\n{not json');
    expect(entries).toHaveLength(2);
    expect(entries[1]).toMatchObject({ id: "line-3" });
    expect(isInvalidBatchLine(entries[1]) && entries[1].error.startsWith("Line 3: invalid JSON (")).toBe(true);
  });
});

describe("runBatch", () => {
  it("keeps input order and bounds concurrency", async () => {
    const answerer = new ScriptedAnswerer();
    const records = ["a", "bb", "ccc", "dddd"].map((question, index) => ({
      id: `q${index}`,
      question,
      format_hint: "int"
    }));

    const outputs = await runBatch(answerer, records, { concurrency: 2 });

    expect(outputs.map((output) => output.id)).toEqual(["q0", "q1", "q2", "q3"]);
    expect(outputs.map((output) => output.final_answer)).toEqual([1, 2, 3, 4]);
    expect(outputs[0].explanation).toHaveLength(200);
    expect(answerer.peak).toBe(2);
  });

  it("writes an error record for a failing question", async () => {
    const records = [
      { id: "ok", question: "fine", format_hint: "int" },
      { id: "bad", question: "explode", format_hint: "int" }
    ];

    const outputs = await runBatch(new ScriptedAnswerer(), records, { concurrency: 1 });

    expect(outputs[1]).toEqual({
      id: "bad",
      final_answer: null,
      query: "",
      confidence: 0,
      explanation: "Error: store unavailable",
      citations: []
    });
    expect(outputs[0].final_answer).toBe(4);
  });

  it("answers the valid lines of a file with a malformed line", async () => {
    const entries = parseBatchRecords('{"id":"q1","question":"fine"}\n{"id":"q2"}\n{"id":"q3","question":"also fine"}');

    const outputs = await runBatch(new ScriptedAnswerer(), entries, { concurrency: 2 });

    expect(outputs.map((output) => output.id)).toEqual(["q1", "q2", "q3"]);
    expect(outputs.map((output) => output.final_answer)).toEqual([4, null, 9]);
    expect(outputs[1]).toEqual({
      id: "q2",
      final_answer: null,
      query: "",
      confidence: 0,
      explanation: "Error: Line 2: question: Required",
      citations: []
    });
  });
});

describe("serializeBatchOutputs", () => {
  it("writes one JSON object per line", () => {
    const line = {
      id: "q1",
      final_answer: 14,
      query: "",
      confidence: 0.7,
      explanation: "document route",
      citations: ["product_policy::chunk0"]
    };
    expect(serializeBatchOutputs([line])).toBe(
      '{"id":"q1","final_answer":14,"query":"","confidence":0.7,"explanation":"document route","citations":["product_policy::chunk0"]}\n'
    );
  });
});

function buildOutput(overrides: Partial<RunOutput> = {}): RunOutput {
  return {
    finalAnswer: null,
    query: "SELECT COUNT(*) FROM orders",
    route: "structured",
    confidence: 0.8,
    explanation: "structured route",
    citations: ["orders"],
    repairCount: 0,
    warnings: [],
    trace: [],
    ...overrides
  };
}
