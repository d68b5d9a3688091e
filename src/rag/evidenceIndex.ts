import fs from "node:fs/promises";
import path from "node:path";
import { DataSourceUnavailableError } from "../errors";
import type { Snippet } from "../agent/types";
import { errorMessage } from "../utils";

export interface SourceDocument {
  source: string;
  content: string;
}

export interface DocumentChunk {
  id: string;
  content: string;
  source: string;
}

export interface EvidenceIndexStats {
  totalChunks: number;
  totalDocs: number;
  chunksPerDoc: Record<string, number>;
  avgChunkLength: number;
}

const MIN_PARAGRAPH_LENGTH = 20;
const DEFAULT_CHUNK_SIZE = 500;

const STOP_WORDS = new Set([
  "a", "an", "and", "are", "as", "at", "be", "by", "for", "from", "has", "have", "in", "is", "it",
  "its", "of", "on", "or", "that", "the", "their", "this", "to", "was", "were", "what", "which",
  "will", "with"
]);

export function chunkDocument(text: string, source: string, chunkSize = DEFAULT_CHUNK_SIZE): DocumentChunk[] {
  const prefix = source.replace(/\.md$/i, "");
  const chunks: DocumentChunk[] = [];
  const push = (content: string) => {
    chunks.push({ id: `${prefix}::chunk${chunks.length}`, content, source });
  };

  const paragraphs = text
    .split(/\n\s*\n/)
    .map((paragraph) => paragraph.trim())
    .filter((paragraph) => paragraph.length >= MIN_PARAGRAPH_LENGTH);

  for (const paragraph of paragraphs) {
    if (paragraph.length <= chunkSize) {
      push(paragraph);
      continue;
    }

    let current = "";
    for (const rawSentence of paragraph.split(/[.!?]+/)) {
      const sentence = rawSentence.trim();
      if (!sentence) {
        continue;
      }
      if (current.length + sentence.length < chunkSize) {
        current += `${sentence}. `;
      } else {
        if (current) {
          push(current.trim());
        }
        current = `${sentence}. `;
      }
    }
    if (current) {
      push(current.trim());
    }
  }

  return chunks;
}

export function tokenize(text: string): string[] {
  return (text.toLowerCase().match(/[a-z0-9]{2,}/g) ?? []).filter((token) => !STOP_WORDS.has(token));
}

/** Unigrams followed by adjacent bigrams. */
export function extractTerms(text: string): string[] {
  const tokens = tokenize(text);
  const bigrams = tokens.slice(1).map((token, index) => `${tokens[index]} ${token}`);
  return [...tokens, ...bigrams];
}

type SparseVector = Map<string, number>;

/**
 * In-process TF-IDF index over Markdown chunks. Scores are cosine similarities
 * between L2-normalised vectors, so they fall in [0, 1].
 */
export class EvidenceIndex {
  private readonly idf = new Map<string, number>();

  private readonly vectors: SparseVector[];

  private constructor(private readonly chunks: DocumentChunk[]) {
    const documentFrequency = new Map<string, number>();
    const termLists = chunks.map((chunk) => extractTerms(chunk.content));
    for (const terms of termLists) {
      for (const term of new Set(terms)) {
        documentFrequency.set(term, (documentFrequency.get(term) ?? 0) + 1);
      }
    }
    const total = chunks.length;
    for (const [term, frequency] of documentFrequency) {
      this.idf.set(term, Math.log((1 + total) / (1 + frequency)) + 1);
    }
    this.vectors = termLists.map((terms) => this.vectorize(terms));
  }

  static fromDocuments(documents: SourceDocument[], chunkSize = DEFAULT_CHUNK_SIZE): EvidenceIndex {
    const chunks = documents.flatMap((document) => chunkDocument(document.content, document.source, chunkSize));
    return new EvidenceIndex(chunks);
  }

  static async fromDirectory(docsDir: string, chunkSize = DEFAULT_CHUNK_SIZE): Promise<EvidenceIndex> {
    let entries: string[];
    try {
      entries = await fs.readdir(docsDir);
    } catch (error) {
      throw new DataSourceUnavailableError("documents", `Documents directory not found: ${docsDir}`, { cause: error });
    }

    const markdownFiles = entries.filter((entry) => entry.toLowerCase().endsWith(".md")).sort();
    if (markdownFiles.length === 0) {
      throw new DataSourceUnavailableError("documents", `No .md files found in ${docsDir}`);
    }

    const documents: SourceDocument[] = [];
    for (const file of markdownFiles) {
      try {
        documents.push({ source: file, content: await fs.readFile(path.join(docsDir, file), "utf-8") });
      } catch (error) {
        console.warn(`Could not load ${file}: ${errorMessage(error)}`);
      }
    }

    const index = EvidenceIndex.fromDocuments(documents, chunkSize);
    console.log(`Loaded ${index.chunks.length} chunks from ${documents.length} documents`);
    return index;
  }

  retrieve(query: string, topK = 3, minScore = 0): Snippet[] {
    if (this.chunks.length === 0 || topK <= 0) {
      return [];
    }
    const queryVector = this.vectorize(extractTerms(query));

    return this.vectors
      .map((vector, index) => ({ index, score: cosine(queryVector, vector) }))
      .sort((left, right) => right.score - left.score || left.index - right.index)
      .slice(0, topK)
      .filter((entry) => entry.score >= minScore)
      .map(({ index, score }) => {
        const chunk = this.chunks[index];
        return { id: chunk.id, content: chunk.content, source: chunk.source, score };
      });
  }

  getChunk(id: string): DocumentChunk | undefined {
    return this.chunks.find((chunk) => chunk.id === id);
  }

  stats(): EvidenceIndexStats {
    const chunksPerDoc: Record<string, number> = {};
    for (const chunk of this.chunks) {
      chunksPerDoc[chunk.source] = (chunksPerDoc[chunk.source] ?? 0) + 1;
    }
    const totalLength = this.chunks.reduce((sum, chunk) => sum + chunk.content.length, 0);
    return {
      totalChunks: this.chunks.length,
      totalDocs: Object.keys(chunksPerDoc).length,
      chunksPerDoc,
      avgChunkLength: this.chunks.length > 0 ? totalLength / this.chunks.length : 0
    };
  }

  private vectorize(terms: string[]): SparseVector {
    const vector: SparseVector = new Map();
    for (const term of terms) {
      const idf = this.idf.get(term);
      if (idf !== undefined) {
        vector.set(term, (vector.get(term) ?? 0) + idf);
      }
    }
    const norm = Math.sqrt(Array.from(vector.values()).reduce((sum, weight) => sum + weight * weight, 0));
    if (norm > 0) {
      for (const [term, weight] of vector) {
        vector.set(term, weight / norm);
      }
    }
    return vector;
  }
}

function cosine(left: SparseVector, right: SparseVector): number {
  const [small, large] = left.size <= right.size ? [left, right] : [right, left];
  let dot = 0;
  for (const [term, weight] of small) {
    dot += weight * (large.get(term) ?? 0);
  }
  return Math.min(1, dot);
}
