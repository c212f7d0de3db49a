import { describe, it, expect, beforeEach, afterEach, vi } from "vitest";
import { mkdtemp, rm, writeFile } from "fs/promises";
import { tmpdir } from "node:os";
import path from "node:path";
import { readGraphmlFile } from "./reader";
import { loadDefaultConfig } from "../utils/load-config";
import { Logger } from "../utils/logger";
import { Tracker } from "../utils/tracker";
import type { ConversionContext } from "../types";

describe("readGraphmlFile", () => {
  let dir: string;
  let ctx: ConversionContext;

  beforeEach(async () => {
    dir = await mkdtemp(path.join(tmpdir(), "reader-test-"));
    ctx = {
      config: await loadDefaultConfig(),
      tracker: new Tracker(),
      logger: new Logger("info"),
    };
  });

  afterEach(async () => {
    vi.restoreAllMocks();
    await rm(dir, { recursive: true, force: true });
  });

  it("records a repair on the tracker without printing at info level", async () => {
    const file = path.join(dir, "broken.graphml");
    await writeFile(
      file,
      '<graphml><graph><node id="a"><data key="label">R & D</data></node></graph></graphml>',
      "utf-8",
    );
    const log = vi.spyOn(console, "log").mockImplementation(() => undefined);

    const graph = await readGraphmlFile(ctx, file);

    expect(graph.nodes.map((node) => node.name)).toEqual(["R & D"]);
    expect(ctx.tracker.getIssues("repair")).toEqual([
      { type: "repair", path: file, stage: "escape" },
    ]);
    expect(log).not.toHaveBeenCalled();
  });
});
