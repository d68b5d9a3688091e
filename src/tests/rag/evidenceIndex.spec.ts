import os from "node:os";
import path from "node:path";
import fs from "node:fs/promises";
import { describe, expect, it } from "vitest";
import { EvidenceIndex, chunkDocument, extractTerms, tokenize } from "../../rag/evidenceIndex";
import { DataSourceUnavailableError } from "../../errors";

const POLICY = [
  "# Returns",
  "",
  "Unopened items: 14 days from delivery.",
  "",
  "Opened items: 7 days, store credit only."
].join("\n");

const CALENDAR = [
  "# Calendar",
  "",
  "Summer Beverages 1997 runs from 1997-06-01 to 1997-06-30 with tastings."
].join("\n");

describe("chunkDocument", () => {
  it("skips short paragraphs and numbers chunks per document", () => {
    const chunks = chunkDocument(POLICY, "product_policy.md");
    expect(chunks.map((chunk) => chunk.id)).toEqual(["product_policy::chunk0", "product_policy::chunk1"]);
    expect(chunks[0].content).toBe("Unopened items: 14 days from delivery.");
  });

  it("splits long paragraphs on sentence boundaries", () => {
    const sentence = "Perishable goods must be reported within three days of delivery";
    const chunks = chunkDocument(`${sentence}. ${sentence}. ${sentence}.`, "long.md", 100);
    expect(chunks).toHaveLength(3);
    expect(chunks[0].content).toBe(`${sentence}.`);
  });
});

describe("tokenize", () => {
  it("lowercases and drops stop words", () => {
    expect(tokenize("What is the AOV for Beverages?")).toEqual(["aov", "beverages"]);
    expect(extractTerms("return window days")).toEqual(["return", "window", "days", "return window", "window days"]);
  });
});

describe("EvidenceIndex", () => {
  const index = EvidenceIndex.fromDocuments([
    { source: "product_policy.md", content: POLICY },
    { source: "marketing_calendar.md", content: CALENDAR }
  ]);

  it("ranks the most similar chunk first", () => {
    const [top] = index.retrieve("return window for unopened items", 1);
    expect(top.id).toBe("product_policy::chunk0");
    expect(top.source).toBe("product_policy.md");
    expect(top.score).toBeGreaterThan(0);
    expect(top.score).toBeLessThanOrEqual(1);
  });

  it("is deterministic", () => {
    const first = index.retrieve("summer beverages 1997 dates", 3);
    const second = index.retrieve("summer beverages 1997 dates", 3);
    expect(second).toEqual(first);
    expect(first[0].id).toBe("marketing_calendar::chunk0");
  });

  it("honours topK and the minimum score", () => {
    expect(index.retrieve("items", 2)).toHaveLength(2);
    expect(index.retrieve("items", 0)).toEqual([]);
    expect(index.retrieve("unrelated words entirely", 3, 0.01)).toEqual([]);
  });

  it("reports stats and looks up chunks", () => {
    expect(index.stats()).toMatchObject({
      totalChunks: 3,
      totalDocs: 2,
      chunksPerDoc: { "product_policy.md": 2, "marketing_calendar.md": 1 }
    });
    expect(index.getChunk("product_policy::chunk1")?.content).toBe("Opened items: 7 days, store credit only.");
  });

  it("fails to load from a directory without documents", async () => {
    const empty = await fs.mkdtemp(path.join(os.tmpdir(), "evidence-"));
    try {
      await expect(EvidenceIndex.fromDirectory(empty)).rejects.toBeInstanceOf(DataSourceUnavailableError);
      await expect(EvidenceIndex.fromDirectory(path.join(empty, "missing"))).rejects.toThrow(
        "Documents directory not found"
      );
    } finally {
      await fs.rm(empty, { recursive: true, force: true });
    }
  });
});
