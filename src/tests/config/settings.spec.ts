import { describe, expect, it } from "vitest";
import { loadSettings } from "../../config/settings";

describe("loadSettings", () => {
  it("applies defaults", () => {
    const settings = loadSettings({});
    expect(settings.docsDir).toBe("data/docs");
    expect(settings.generation).toEqual({ provider: "none", timeoutMs: 20_000 });
    expect(settings.modelStages).toEqual(["route", "draft"]);
    expect(settings.retrieval).toEqual({ topK: 3, minScore: 0 });
    expect(settings.maxRepairAttempts).toBe(2);
    expect(settings.repairBypassTemplates).toBe(false);
    expect(settings.database.statementTimeoutMs).toBe(10_000);
  });

  it("selects openai when a key is present and treats blank values as unset", () => {
    const settings = loadSettings({ OPENAI_API_KEY: "test-secret", OPENAI_BASE_URL: "", MODEL_STAGES: "route, answer" });
    expect(settings.generation).toMatchObject({ provider: "openai", apiKey: "test-secret", model: "gpt-4o-mini" });
    expect(settings.modelStages).toEqual(["route", "answer"]);
  });

  it("rejects unknown stages and out-of-range repair bounds", () => {
    expect(() => loadSettings({ MODEL_STAGES: "route,plan" })).toThrow('Unknown model stage "plan"');
    expect(() => loadSettings({ MAX_REPAIR_ATTEMPTS: "9" })).toThrow("MAX_REPAIR_ATTEMPTS");
  });

  it("requires a key for the openai provider", () => {
    expect(() => loadSettings({ GENERATION_PROVIDER: "openai" })).toThrow("requires OPENAI_API_KEY");
  });
});
