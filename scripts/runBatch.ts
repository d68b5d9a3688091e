#!/usr/bin/env node
import { parseArgs } from "node:util";
import { createHybridAgent } from "../src/agent/hybridAgent";
import { isInvalidBatchLine, readBatchFile, runBatch, writeBatchFile } from "../src/batch";
import { loadSettings } from "../src/config/settings";
import { DataSourceUnavailableError } from "../src/errors";
import { errorMessage } from "../src/utils";

async function main(): Promise<void> {
  const { values } = parseArgs({
    options: {
      batch: { type: "string" },
      out: { type: "string" }
    }
  });
  if (!values.batch || !values.out) {
    console.error("Usage: runBatch --batch <questions.jsonl> --out <outputs.jsonl>");
    process.exitCode = 2;
    return;
  }

  const settings = loadSettings();
  const records = await readBatchFile(values.batch);
  const invalid = records.filter(isInvalidBatchLine).length;
  console.log(`Read ${records.length} questions from ${values.batch} (${invalid} invalid)`);

  const { agent, close } = await createHybridAgent(settings);
  try {
    const outputs = await runBatch(agent, records, { concurrency: settings.batchConcurrency });
    await writeBatchFile(values.out, outputs);
    console.log(`Wrote ${outputs.length} answers to ${values.out}`);
  } finally {
    await close();
  }
}

main().catch((error: unknown) => {
  if (error instanceof DataSourceUnavailableError) {
    console.error(`Cannot run batch: ${error.message}`);
  } else {
    console.error("Batch failed", errorMessage(error));
  }
  process.exit(1);
});
