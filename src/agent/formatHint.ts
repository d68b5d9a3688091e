import { z } from "zod";
import { roundTo2 } from "../utils";
import type { AnswerValue, CellValue, Row } from "./types";

export type FieldType = "str" | "int" | "float" | "auto";

export interface ShapeField {
  name: string;
  type: FieldType;
}

export type FormatShape =
  | { kind: "int" }
  | { kind: "float" }
  | { kind: "object"; fields: ShapeField[] }
  | { kind: "list"; fields: ShapeField[] }
  | { kind: "generic"; hint: string };

type AnswerRecord = { [field: string]: string | number };

const FIELD_TYPES: Record<string, FieldType> = {
  str: "str",
  string: "str",
  text: "str",
  int: "int",
  integer: "int",
  float: "float",
  number: "float",
  decimal: "float"
};

const NUMERIC_TEXT = /^-?\d+(?:\.\d+)?(?:e[+-]?\d+)?$/i;
const FIELD_NAME = /^[a-z_][\w]*$/i;

function parseFields(inner: string): ShapeField[] {
  const body = inner.trim().replace(/^\{/, "").replace(/\}$/, "").trim();
  if (!body) {
    return [];
  }
  const parts = body.includes(",") || body.includes(":") ? body.split(",") : body.split("+");
  return parts
    .map((part) => {
      const [rawName, rawType] = part.split(":").map((piece) => piece.trim());
      return { name: rawName, type: FIELD_TYPES[rawType?.toLowerCase() ?? ""] ?? "auto" };
    })
    .filter((field) => FIELD_NAME.test(field.name));
}

/**
 * Understands `int`, `float`, `{name:type, ...}`, `a+b`, `list[{...}]` and
 * `list of a+b`. Anything else is a generic hint whose answer is the first cell.
 */
export function parseFormatHint(hint: string): FormatShape {
  const trimmed = hint.trim();
  const lower = trimmed.toLowerCase();

  if (lower === "int" || lower === "integer") {
    return { kind: "int" };
  }
  if (lower === "float" || lower === "number" || lower === "decimal") {
    return { kind: "float" };
  }

  const list = /^list\s*\[(.*)\]$/is.exec(trimmed) ?? /^list\s+of\s+(.+)$/is.exec(trimmed);
  if (list) {
    return { kind: "list", fields: parseFields(list[1]) };
  }
  if (lower === "list") {
    return { kind: "list", fields: [] };
  }

  if (/^\{.*\}$/s.test(trimmed) || /^[a-z_]\w*(?:\s*\+\s*[a-z_]\w*)+$/i.test(trimmed)) {
    return { kind: "object", fields: parseFields(trimmed) };
  }

  return { kind: "generic", hint: trimmed };
}

export function zeroValue(shape: FormatShape): AnswerValue {
  switch (shape.kind) {
    case "int":
    case "float":
      return 0;
    case "object":
      return {};
    case "list":
      return [];
    case "generic":
      return null;
  }
}

export function toNumber(value: CellValue | undefined): number {
  if (typeof value === "number") {
    return Number.isFinite(value) ? value : 0;
  }
  if (typeof value === "string") {
    const parsed = Number(value.trim());
    return value.trim() !== "" && Number.isFinite(parsed) ? parsed : 0;
  }
  if (typeof value === "boolean") {
    return value ? 1 : 0;
  }
  return 0;
}

function toText(value: CellValue | undefined): string {
  if (value === null || value === undefined) {
    return "";
  }
  if (value instanceof Date) {
    return value.toISOString();
  }
  return String(value);
}

export function coerceCell(value: CellValue | undefined, type: FieldType): string | number {
  switch (type) {
    case "str":
      return toText(value);
    case "int":
      return Math.trunc(toNumber(value));
    case "float":
      return roundTo2(toNumber(value));
    case "auto":
      if (typeof value === "number" || (typeof value === "string" && NUMERIC_TEXT.test(value.trim()))) {
        return roundTo2(toNumber(value));
      }
      return toText(value);
  }
}

function isEmptyCell(value: CellValue | undefined): boolean {
  return value === null || value === undefined || value === "";
}

function effectiveFields(fields: ShapeField[], columns: string[]): ShapeField[] {
  return fields.length > 0 ? fields : columns.map((name) => ({ name, type: "auto" }));
}

function rowToRecord(row: Row, fields: ShapeField[]): AnswerRecord {
  const record: AnswerRecord = {};
  fields.forEach((field, index) => {
    record[field.name] = coerceCell(row[index], field.type);
  });
  return record;
}

/** Coerces query rows into the answer shape; no rows means the shape's zero value. */
export function extractAnswerFromRows(shape: FormatShape, columns: string[], rows: Row[]): AnswerValue {
  if (rows.length === 0) {
    return zeroValue(shape);
  }
  const first = rows[0];

  switch (shape.kind) {
    case "int":
      return Math.trunc(toNumber(first[0]));
    case "float":
      return roundTo2(toNumber(first[0]));
    case "object": {
      const fields = effectiveFields(shape.fields, columns);
      if (fields.length === 0 || first.length < fields.length || isEmptyCell(first[0])) {
        return {};
      }
      return rowToRecord(first, fields);
    }
    case "list": {
      const fields = effectiveFields(shape.fields, columns);
      return rows.filter((row) => !isEmptyCell(row[0])).map((row) => rowToRecord(row, fields));
    }
    case "generic": {
      const cell = first[0];
      if (cell === undefined) {
        return null;
      }
      return cell instanceof Date ? cell.toISOString() : cell;
    }
  }
}

const numericSchema = z.union([z.number(), z.string().trim().regex(NUMERIC_TEXT).transform(Number)]);

function fieldSchema(type: FieldType): z.ZodType<string | number, z.ZodTypeDef, unknown> {
  switch (type) {
    case "str":
      return z.union([z.string(), z.number()]).transform(String);
    case "int":
      return numericSchema.transform((value) => Math.trunc(value));
    case "float":
      return numericSchema.transform(roundTo2);
    case "auto":
      return z.union([z.number().transform(roundTo2), z.string()]);
  }
}

function recordSchema(fields: ShapeField[]): z.ZodType<AnswerRecord, z.ZodTypeDef, unknown> {
  if (fields.length === 0) {
    return z.record(z.union([z.string(), z.number()]));
  }
  const shape: Record<string, z.ZodType<string | number, z.ZodTypeDef, unknown>> = {};
  for (const field of fields) {
    shape[field.name] = fieldSchema(field.type);
  }
  return z.object(shape);
}

/** Validation schema for a drafted answer of the given shape. */
export function answerSchemaFor(shape: FormatShape): z.ZodType<AnswerValue, z.ZodTypeDef, unknown> {
  switch (shape.kind) {
    case "int":
      return numericSchema.transform((value) => Math.trunc(value));
    case "float":
      return numericSchema.transform(roundTo2);
    case "object":
      return recordSchema(shape.fields);
    case "list":
      return z.array(recordSchema(shape.fields));
    case "generic":
      return z.union([z.string(), z.number(), z.boolean(), z.null()]);
  }
}
