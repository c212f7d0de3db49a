import { describe, it, expect } from "vitest";
import { classifyNode } from "./shapes";

const node = (type?: string) => ({
  id: "n",
  name: "n",
  properties: new Map<string, string>(type === undefined ? [] : [["type", type]]),
});

describe("classifyNode", () => {
  it("matches type keywords case-insensitively", () => {
    expect(classifyNode(node("Begin"))).toBe("start");
    expect(classifyNode(node("STOP"))).toBe("end");
    expect(classifyNode(node("condition check"))).toBe("decision");
    expect(classifyNode(node("user input"))).toBe("io");
  });

  it("defaults to process", () => {
    expect(classifyNode(node("task"))).toBe("process");
    expect(classifyNode(node())).toBe("process");
  });
});
