import { describe, it, expect } from "vitest";
import { readWorkflow } from "./workflow";
import { SchemaMismatchError } from "../errors";
import type { GraphModel } from "../types";

const endpoints = (graph: GraphModel) =>
  graph.edges.map((edge) => `${edge.source}->${edge.target}`);

describe("readWorkflow", () => {
  it("builds a start node and handoff edges", () => {
    const graph = readWorkflow(
      '{"flow":{"entry_condition":"start here","nodes":[{"id":"a","name":"A"},{"id":"b","name":"B","next_handoff_destinations":["a"]}]}}',
    );

    expect(graph.nodes.map((node) => node.id)).toEqual(["start", "a", "b"]);
    expect(endpoints(graph)).toEqual(["start->a", "b->a"]);
    expect(graph.edges[0].properties.get("cond")).toBe("start here");
  });

  it("gives the start node its label, type and description", () => {
    const graph = readWorkflow({
      flow: { entry_condition: "ticket opened", nodes: [{ id: "a" }] },
    });
    expect([...graph.nodes[0].properties]).toEqual([
      ["label", "Start"],
      ["type", "start"],
      ["desc", "ticket opened"],
    ]);
  });

  it("maps node fields to properties and joins lists", () => {
    const graph = readWorkflow({
      flow: {
        nodes: [
          {
            id: "review",
            name: "Review",
            entry_condition: "draft ready",
            responsible_team: "Editors",
            core_responsibilities: ["check facts", "fix style"],
            completion_criteria: "approved",
          },
        ],
      },
    });

    expect(graph.nodes[0].name).toBe("Review");
    expect([...graph.nodes[0].properties]).toEqual([
      ["label", "Review"],
      ["type", "process"],
      ["desc", "draft ready"],
      ["team", "Editors"],
      ["resp", "check facts; fix style"],
      ["crit", "approved"],
    ]);
  });

  it("sanitizes ids in nodes and edges", () => {
    const graph = readWorkflow({
      flow: {
        nodes: [
          { id: "1st step", next_handoff_destinations: ["Sign-off"] },
          { id: "Sign-off" },
        ],
      },
    });

    expect(graph.nodes.map((node) => [node.id, node.name])).toEqual([
      ["n_1st_step", "1st step"],
      ["Sign_off", "Sign-off"],
    ]);
    expect(endpoints(graph)).toEqual(["n_1st_step->Sign_off"]);
  });

  it("uses explicit edges and ignores handoff destinations", () => {
    const graph = readWorkflow({
      flow: {
        nodes: [
          { id: "a", next_handoff_destinations: ["b"] },
          { id: "b" },
        ],
        edges: [
          { from: "b", to: "a", condition: "rejected" },
          { from: "a" },
        ],
      },
    });

    expect(endpoints(graph)).toEqual(["b->a"]);
    expect(graph.edges[0].properties.get("cond")).toBe("rejected");
  });

  it("skips node entries without an id", () => {
    const graph = readWorkflow({
      flow: { nodes: [{ name: "nameless" }, "junk", { id: "a" }] },
    });
    expect(graph.nodes.map((node) => node.id)).toEqual(["a"]);
  });

  it("keeps nodes whose optional fields have unexpected types", () => {
    const graph = readWorkflow({
      flow: {
        nodes: [
          { id: 1, name: "One" },
          {
            id: "b",
            responsible_team: { lead: "x" },
            next_handoff_destinations: ["c", 7],
          },
          { id: "c", core_responsibilities: 3 },
        ],
      },
    });

    expect(graph.nodes.map((node) => node.id)).toEqual(["n_1", "b", "c"]);
    expect(graph.nodes[0].name).toBe("One");
    expect(graph.nodes[1].properties.has("team")).toBe(false);
    expect(graph.nodes[2].properties.get("resp")).toBe("3");
    expect(endpoints(graph)).toEqual(["b->c"]);
  });

  it("keeps explicit edges whose condition is not text", () => {
    const graph = readWorkflow({
      flow: {
        nodes: [{ id: "a" }, { id: "b" }],
        edges: [{ from: "a", to: "b", condition: { when: "x" } }],
      },
    });

    expect(endpoints(graph)).toEqual(["a->b"]);
    expect(graph.edges[0].properties.size).toBe(0);
  });

  it("rejects a document without flow", () => {
    expect(() => readWorkflow({ nodes: [] })).toThrow(
      "Invalid JSON format: Missing 'flow' element",
    );
  });

  it("rejects a flow without a nodes array", () => {
    expect(() => readWorkflow({ flow: { nodes: {} } })).toThrow(
      SchemaMismatchError,
    );
  });

  it("rejects invalid JSON text", () => {
    expect(() => readWorkflow("{not json")).toThrow(SchemaMismatchError);
  });
});
