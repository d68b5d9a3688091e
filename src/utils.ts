import axios from "axios";
import type { AxiosRequestConfig } from "axios";
import { GenerationTimeoutError } from "./errors";

export interface RetryOptions {
  retries?: number;
  initialDelayMs?: number;
  factor?: number;
}

export interface CircuitBreakerOptions {
  failureThreshold?: number;
  cooldownMs?: number;
}

interface CircuitBreakerState {
  failures: number;
  openedAt: number | null;
}

export async function withRetry<T>(fn: () => Promise<T>, options: RetryOptions = {}): Promise<T> {
  const { retries = 2, initialDelayMs = 250, factor = 2 } = options;
  let attempt = 0;
  let delay = initialDelayMs;
  while (true) {
    try {
      return await fn();
    } catch (error) {
      if (attempt >= retries) {
        throw error;
      }
      await new Promise((resolve) => setTimeout(resolve, delay));
      delay *= factor;
      attempt += 1;
    }
  }
}

/**
 * Rejects with {@link GenerationTimeoutError} when `promise` has not settled
 * within `timeoutMs`. The timer is always cleared so no handle outlives the call.
 */
export async function withTimeout<T>(promise: Promise<T>, timeoutMs: number, label: string): Promise<T> {
  let timer: NodeJS.Timeout | undefined;
  const timeout = new Promise<never>((_resolve, reject) => {
    timer = setTimeout(() => reject(new GenerationTimeoutError(label, timeoutMs)), timeoutMs);
  });
  try {
    return await Promise.race([promise, timeout]);
  } finally {
    clearTimeout(timer);
  }
}

export class CircuitBreaker {
  private readonly state: CircuitBreakerState = { failures: 0, openedAt: null };

  private readonly failureThreshold: number;

  private readonly cooldownMs: number;

  constructor({ failureThreshold = 3, cooldownMs = 15_000 }: CircuitBreakerOptions = {}) {
    this.failureThreshold = failureThreshold;
    this.cooldownMs = cooldownMs;
  }

  exec<T>(action: () => Promise<T>): Promise<T> {
    if (this.isOpen()) {
      return Promise.reject(new CircuitOpenError());
    }

    return action()
      .then((result) => {
        this.reset();
        return result;
      })
      .catch((error: unknown) => {
        this.recordFailure();
        throw error;
      });
  }

  private recordFailure(): void {
    this.state.failures += 1;
    if (this.state.failures >= this.failureThreshold) {
      this.state.openedAt = Date.now();
    }
  }

  private reset(): void {
    this.state.failures = 0;
    this.state.openedAt = null;
  }

  private isOpen(): boolean {
    if (this.state.openedAt === null) {
      return false;
    }
    const elapsed = Date.now() - this.state.openedAt;
    if (elapsed > this.cooldownMs) {
      this.reset();
      return false;
    }
    return true;
  }
}

export class CircuitOpenError extends Error {
  constructor() {
    super("Circuit breaker is open");
    this.name = "CircuitOpenError";
  }
}

const breakerMap = new Map<string, CircuitBreaker>();

function getCircuitBreaker(host: string, options?: CircuitBreakerOptions): CircuitBreaker {
  const key = host.toLowerCase();
  const existing = breakerMap.get(key);
  if (existing) {
    return existing;
  }
  const breaker = new CircuitBreaker(options);
  breakerMap.set(key, breaker);
  return breaker;
}

export function safeJsonParse<T>(input: string): T | null {
  try {
    return JSON.parse(input) as T;
  } catch (_error) {
    return null;
  }
}

export async function fetchJson(
  url: string,
  config: AxiosRequestConfig = {},
  retryOptions?: RetryOptions,
  cbOptions?: CircuitBreakerOptions
): Promise<unknown> {
  const parsed = new URL(url);
  const breaker = getCircuitBreaker(parsed.host, cbOptions);
  const executor = () => axios<unknown>({ url, ...config }).then((response) => response.data);
  return breaker.exec(() => withRetry(executor, retryOptions));
}

export function errorMessage(error: unknown): string {
  return error instanceof Error ? error.message : String(error);
}

export function roundTo2(value: number): number {
  return Math.round((value + Number.EPSILON) * 100) / 100;
}

export function clamp01(value: number): number {
  return Math.max(0, Math.min(1, value));
}

export function truncate(value: string, max: number): string {
  return value.length > max ? value.slice(0, max) : value;
}

export function escapeRegExp(value: string): string {
  return value.replace(/[.*+?^${}()|[\]\\]/g, "\\$&");
}
