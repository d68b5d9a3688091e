import type { AddressInfo } from "node:net";
import type { Server } from "node:http";
import express from "express";
import type { Request, Response } from "express";
import { afterEach, describe, expect, it, vi } from "vitest";
import {
  OllamaGenerationService,
  OpenAIGenerationService,
  createGenerationService
} from "../../llm/client";
import { GenerationServiceError } from "../../errors";
import { CircuitBreaker, CircuitOpenError, withRetry } from "../../utils";

interface StubReply {
  status: number;
  body: unknown;
}

interface Stub {
  baseUrl: string;
  bodies: unknown[];
}

const servers: Server[] = [];

afterEach(async () => {
  await Promise.all(servers.splice(0).map(closeServer));
});

describe("OllamaGenerationService", () => {
  it("posts a non-streaming generate request and trims the reply", async () => {
    const stub = await startStub("/api/generate", () => ({ status: 200, body: { response: "  pong\n", done: true } }));
    const service = new OllamaGenerationService({ baseUrl: stub.baseUrl, model: "llama3", timeoutMs: 2000 });

    const reply = await service.complete("Ping?", { system: "Answer tersely.", temperature: 0, maxTokens: 50 });

    expect(reply).toBe("pong");
    expect(stub.bodies).toEqual([
      {
        model: "llama3",
        prompt: "Ping?",
        system: "Answer tersely.",
        stream: false,
        options: { temperature: 0, num_predict: 50 }
      }
    ]);
  });

  it("rejects a payload without a response string", async () => {
    const stub = await startStub("/api/generate", () => ({ status: 200, body: { done: true } }));
    const service = new OllamaGenerationService({ baseUrl: stub.baseUrl, model: "llama3", timeoutMs: 2000 });

    const error = await service.complete("Ping?").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GenerationServiceError);
    expect(error instanceof Error && error.message).toBe("Ollama returned an unexpected payload");
  });

  it("retries a failed request once", async () => {
    const stub = await startStub("/api/generate", (hit) =>
      hit === 1 ? { status: 500, body: { error: "loading model" } } : { status: 200, body: { response: "pong" } }
    );
    const service = new OllamaGenerationService({ baseUrl: stub.baseUrl, model: "llama3", timeoutMs: 2000 });

    await expect(service.complete("Ping?")).resolves.toBe("pong");
    expect(stub.bodies).toHaveLength(2);
  });

  it("stops calling the host once the breaker opens", async () => {
    const stub = await startStub("/api/generate", () => ({ status: 500, body: { error: "out of memory" } }));
    const service = new OllamaGenerationService({ baseUrl: stub.baseUrl, model: "llama3", timeoutMs: 2000 });

    for (let call = 0; call < 3; call += 1) {
      await expect(service.complete("Ping?")).rejects.toThrow(
        "Ollama request failed: Request failed with status code 500"
      );
    }
    expect(stub.bodies).toHaveLength(6);

    const error = await service.complete("Ping?").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GenerationServiceError);
    expect(error instanceof Error && error.message).toBe("Ollama request failed: Circuit breaker is open");
    expect(error instanceof Error && error.cause).toBeInstanceOf(CircuitOpenError);
    expect(stub.bodies).toHaveLength(6);
  });
});

describe("OpenAIGenerationService", () => {
  it("sends a chat completion and returns the message content", async () => {
    const stub = await startStub("/v1/chat/completions", () => ({ status: 200, body: chatCompletion("pong") }));
    const service = new OpenAIGenerationService({
      apiKey: "test-secret",
      model: "gpt-4o-mini",
      baseUrl: `${stub.baseUrl}/v1`,
      timeoutMs: 2000
    });

    await expect(service.complete("Ping?", { system: "Answer tersely." })).resolves.toBe("pong");
    expect(stub.bodies).toEqual([
      {
        model: "gpt-4o-mini",
        temperature: 0.1,
        max_tokens: 800,
        messages: [
          { role: "system", content: "Answer tersely." },
          { role: "user", content: "Ping?" }
        ]
      }
    ]);
  });

  it("rejects an empty message", async () => {
    const stub = await startStub("/v1/chat/completions", () => ({ status: 200, body: chatCompletion(null) }));
    const service = new OpenAIGenerationService({
      apiKey: "test-secret",
      model: "gpt-4o-mini",
      baseUrl: `${stub.baseUrl}/v1`,
      timeoutMs: 2000
    });

    const error = await service.complete("Ping?").catch((caught: unknown) => caught);

    expect(error).toBeInstanceOf(GenerationServiceError);
    expect(error instanceof Error && error.message).toBe("Model returned empty response");
  });
});

describe("createGenerationService", () => {
  it("builds the configured provider", () => {
    expect(createGenerationService({ provider: "none", timeoutMs: 1000 })).toBeNull();
    expect(
      createGenerationService({ provider: "openai", apiKey: "test-secret", model: "gpt-4o-mini", timeoutMs: 1000 })
    ).toBeInstanceOf(OpenAIGenerationService);
    expect(
      createGenerationService({ provider: "ollama", baseUrl: "http://127.0.0.1:11434", model: "llama3", timeoutMs: 1000 })
    ).toBeInstanceOf(OllamaGenerationService);
  });
});

describe("withRetry", () => {
  it("returns the first success", async () => {
    let calls = 0;
    const result = await withRetry(
      async () => {
        calls += 1;
        if (calls < 3) {
          throw new Error(`attempt ${calls}`);
        }
        return "done";
      },
      { retries: 2, initialDelayMs: 0 }
    );

    expect(result).toBe("done");
    expect(calls).toBe(3);
  });

  it("rethrows the last error when retries run out", async () => {
    let calls = 0;
    const failing = async (): Promise<string> => {
      calls += 1;
      throw new Error(`attempt ${calls}`);
    };

    await expect(withRetry(failing, { retries: 1, initialDelayMs: 0 })).rejects.toThrow("attempt 2");
    expect(calls).toBe(2);
  });
});

describe("CircuitBreaker", () => {
  afterEach(() => {
    vi.useRealTimers();
  });

  it("opens after the failure threshold and skips the action", async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2, cooldownMs: 60_000 });
    const action = vi.fn(async (): Promise<string> => {
      throw new Error("refused");
    });

    await expect(breaker.exec(action)).rejects.toThrow("refused");
    await expect(breaker.exec(action)).rejects.toThrow("refused");
    await expect(breaker.exec(action)).rejects.toBeInstanceOf(CircuitOpenError);
    expect(action).toHaveBeenCalledTimes(2);
  });

  it("resets the failure count on success", async () => {
    const breaker = new CircuitBreaker({ failureThreshold: 2, cooldownMs: 60_000 });

    await expect(breaker.exec(() => Promise.reject(new Error("refused")))).rejects.toThrow("refused");
    await expect(breaker.exec(() => Promise.resolve("ok"))).resolves.toBe("ok");
    await expect(breaker.exec(() => Promise.reject(new Error("refused")))).rejects.toThrow("refused");
    await expect(breaker.exec(() => Promise.resolve("ok"))).resolves.toBe("ok");
  });

  it("closes again after the cooldown", async () => {
    vi.useFakeTimers();
    const breaker = new CircuitBreaker({ failureThreshold: 1, cooldownMs: 1000 });

    await expect(breaker.exec(() => Promise.reject(new Error("refused")))).rejects.toThrow("refused");
    await expect(breaker.exec(() => Promise.resolve("ok"))).rejects.toBeInstanceOf(CircuitOpenError);

    vi.advanceTimersByTime(1001);

    await expect(breaker.exec(() => Promise.resolve("ok"))).resolves.toBe("ok");
  });
});

async function startStub(path: string, reply: (hit: number) => StubReply): Promise<Stub> {
  const bodies: unknown[] = [];
  const app = express();
  app.use(express.json());
  app.post(path, (request: Request, response: Response) => {
    bodies.push(request.body);
    const { status, body } = reply(bodies.length);
    response.status(status).json(body);
  });
  const server = await new Promise<Server>((resolve) => {
    const listening = app.listen(0, "127.0.0.1", () => resolve(listening));
  });
  servers.push(server);
  const address: AddressInfo | string | null = server.address();
  const baseUrl = typeof address === "object" && address ? `http://127.0.0.1:${address.port}` : "";
  return { baseUrl, bodies };
}

function closeServer(server: Server): Promise<void> {
  server.closeAllConnections();
  return new Promise<void>((resolve, reject) => server.close((error) => (error ? reject(error) : resolve())));
}

function chatCompletion(content: string | null) {
  return {
    id: "chatcmpl-test",
    object: "chat.completion",
    created: 0,
    model: "gpt-4o-mini",
    choices: [{ index: 0, message: { role: "assistant", content }, finish_reason: "stop" }]
  };
}
