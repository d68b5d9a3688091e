import type { Constraints, QueryResult, Snippet } from "../agent/types";

export function buildSystemPrompt(): string {
  return "You are a retail analytics assistant working over a PostgreSQL order database and a small set of policy documents. Answer tersely and exactly in the requested format. Do not reveal chain-of-thought.";
}

export function buildRoutePrompt(question: string): string {
  return [
    "Classify the question by the knowledge source needed to answer it.",
    "- document: answered by the policy/reference documents alone",
    "- structured: answered by a SQL query over the order database alone",
    "- hybrid: needs a document (dates, definitions) AND a SQL query",
    "",
    "Respond with exactly one word: document, structured or hybrid.",
    "",
    `Question: ${question}`
  ].join("\n");
}

export function buildQueryPrompt(input: {
  question: string;
  schema: string;
  constraints: Constraints;
  repairNotes: string[];
}): string {
  const lines = [
    "Write one PostgreSQL SELECT statement that answers the question.",
    "Quote identifiers only when the schema requires it. No comments, no trailing semicolon, no prose.",
    "",
    "Schema:",
    input.schema,
    "",
    "Constraints (dates, categories, formulas) derived from the documents:",
    JSON.stringify(input.constraints, null, 2)
  ];

  if (input.repairNotes.length > 0) {
    lines.push("", "Previous attempts failed with these errors; avoid repeating them:");
    input.repairNotes.forEach((note, index) => lines.push(`${index + 1}. ${note}`));
  }

  lines.push("", `Question: ${input.question}`, "", "SQL:");
  return lines.join("\n");
}

export function buildAnswerPrompt(input: {
  question: string;
  formatHint: string;
  queryResult: QueryResult | null;
  snippets: Snippet[];
}): string {
  const result = input.queryResult?.success
    ? { columns: input.queryResult.columns, rows: input.queryResult.rows.slice(0, 20) }
    : null;

  return [
    "Produce the final answer to the question from the evidence below.",
    `The answer must match this format exactly: ${input.formatHint}`,
    'Respond with a single JSON object: {"answer": <value>}',
    "",
    "Query result:",
    JSON.stringify(result),
    "",
    "Document snippets:",
    JSON.stringify(input.snippets.map((snippet) => ({ id: snippet.id, content: snippet.content }))),
    "",
    `Question: ${input.question}`
  ].join("\n");
}
