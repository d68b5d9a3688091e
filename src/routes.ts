import { Router } from "express";
import type { NextFunction, Request, Response } from "express";
import { z } from "zod";
import { BatchRecordSchema, runBatch } from "./batch";
import type { QuestionAnswerer } from "./batch";

const AnswerRequestSchema = z.object({
  question: z.string().trim().min(1),
  format_hint: z.string().trim().min(1).default("str")
});

const BatchRequestSchema = z.object({
  records: z.array(BatchRecordSchema).min(1).max(500)
});

function describeIssues(error: z.ZodError): string {
  return error.issues.map((issue) => `${issue.path.join(".") || "body"}: ${issue.message}`).join("; ");
}

export function createRoutes(agent: QuestionAnswerer, options: { batchConcurrency?: number } = {}): Router {
  const router = Router();

  router.post("/answer", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = AnswerRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: `Invalid request: ${describeIssues(parsed.error)}` });
    }

    try {
      const output = await agent.run(parsed.data.question, parsed.data.format_hint);
      return res.json(output);
    } catch (error) {
      return next(error);
    }
  });

  router.post("/batch", async (req: Request, res: Response, next: NextFunction) => {
    const parsed = BatchRequestSchema.safeParse(req.body ?? {});
    if (!parsed.success) {
      return res.status(400).json({ message: `Invalid request: ${describeIssues(parsed.error)}` });
    }

    try {
      const outputs = await runBatch(agent, parsed.data.records, { concurrency: options.batchConcurrency });
      return res.json({ outputs });
    } catch (error) {
      return next(error);
    }
  });

  return router;
}
