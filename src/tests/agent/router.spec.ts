import { describe, expect, it } from "vitest";
import { ModelRouteClassifier, classifyRouteByRules, parseRouteLabel } from "../../agent/router";
import { FakeGenerationService } from "../fakes";

describe("classifyRouteByRules", () => {
  it("routes policy questions to documents", () => {
    expect(classifyRouteByRules("According to the returns policy, how many days do I have for unopened items?")).toBe(
      "document"
    );
  });

  it("routes policy vocabulary without a reference phrase to documents", () => {
    expect(classifyRouteByRules("What is the return window for unopened items, in days?")).toBe("document");
    expect(classifyRouteByRules("What is the return policy for opened items?")).toBe("document");
    expect(classifyRouteByRules("How many days do customers have to return perishables?")).toBe("document");
  });

  it("routes definitions that need no aggregation to documents", () => {
    expect(classifyRouteByRules("What is the definition of gross margin?")).toBe("document");
  });

  it("keeps definitions with an aggregation target on hybrid", () => {
    expect(classifyRouteByRules("Using the KPI definition of margin, which customer led in 1997?")).toBe("hybrid");
  });

  it("routes campaign aggregations to hybrid", () => {
    expect(classifyRouteByRules("Which category moved the highest quantity during the summer campaign?")).toBe("hybrid");
  });

  it("ignores format instructions that start with Return", () => {
    const question = "Which category moved the highest quantity in the winter campaign? Return {category:str, quantity:int}.";
    expect(classifyRouteByRules(question)).toBe("hybrid");
    expect(classifyRouteByRules("How many orders shipped to Berlin? Return an integer.")).toBe("structured");
  });

  it("routes metric questions with a target to hybrid", () => {
    expect(classifyRouteByRules("How did average order value move across December 1997?")).toBe("hybrid");
  });

  it("defaults to structured", () => {
    expect(classifyRouteByRules("List the five best-selling products by revenue")).toBe("structured");
  });
});

describe("parseRouteLabel", () => {
  it("reads the first known label", () => {
    expect(parseRouteLabel("Route: hybrid")).toBe("hybrid");
  });

  it("maps aliases", () => {
    expect(parseRouteLabel("RAG")).toBe("document");
    expect(parseRouteLabel("sql")).toBe("structured");
  });

  it("returns null for unknown labels", () => {
    expect(parseRouteLabel("banana")).toBeNull();
  });
});

describe("ModelRouteClassifier", () => {
  const question = "Per the returns policy, how long do opened items stay eligible?";

  it("uses the model label when it is in vocabulary", async () => {
    const classifier = new ModelRouteClassifier(new FakeGenerationService(() => "structured"), 1000);
    await expect(classifier.classify(question)).resolves.toEqual({ route: "structured", source: "model" });
  });

  it("falls back to rules when the service fails", async () => {
    const service = new FakeGenerationService(() => {
      throw new Error("connection refused");
    });
    const decision = await new ModelRouteClassifier(service, 1000).classify(question);
    expect(decision).toEqual({
      route: "document",
      source: "rules",
      note: "classifier unavailable: connection refused"
    });
  });

  it("falls back to rules when the service times out", async () => {
    const service = new FakeGenerationService(() => new Promise<string>(() => undefined));
    const decision = await new ModelRouteClassifier(service, 5).classify(question);
    expect(decision.route).toBe("document");
    expect(decision.source).toBe("rules");
    expect(decision.note).toBe("classifier unavailable: fake completion timed out after 5ms");
  });

  it("falls back to rules on an out-of-vocabulary label", async () => {
    const decision = await new ModelRouteClassifier(new FakeGenerationService(() => "banana"), 1000).classify(question);
    expect(decision).toEqual({
      route: "document",
      source: "rules",
      note: 'classifier returned out-of-vocabulary label "banana"'
    });
  });
});
