import fs from "fs";
import os from "os";
import path from "path";
import { fileURLToPath } from "url";
import { afterEach, beforeEach, describe, expect, it } from "vitest";
import { NameNotFoundError } from "../src/errors.js";
import { runPlanFile } from "../src/main.js";
import { BuildContext } from "../src/namespace.js";

const fixture = (name: string) => fileURLToPath(new URL(`./fixtures/${name}`, import.meta.url));

describe("runPlanFile", () => {
  let dir: string;

  beforeEach(() => {
    dir = fs.mkdtempSync(path.join(os.tmpdir(), "hierbore-"));
  });

  afterEach(() => {
    fs.rmSync(dir, { recursive: true, force: true });
  });

  it("writes the annotations of a plan", () => {
    const out = path.join(dir, "annos.json");
    const res = runPlanFile(fixture("plan.yaml"), out, fixture("hierarchy.json"));
    expect(res).toEqual({
      steps: [
        { step: "bore", name: "x" },
        { step: "source", name: "uniqueId" },
        { step: "sink", name: "uniqueId" },
      ],
      annotationCount: 10,
    });
    expect(JSON.parse(fs.readFileSync(out, "utf8"))).toEqual([
      { class: "firrtl.transforms.DontTouchAnnotation", target: "~Top|Constant>x" },
      { class: "firrtl.passes.wiring.SourceAnnotation", target: "Top.Constant.x", pin: "x" },
      { class: "firrtl.transforms.NoDedupAnnotation", target: "~Top|Constant" },
      { class: "firrtl.passes.wiring.SinkAnnotation", target: "Top.Expect.y", pin: "x" },
      { class: "firrtl.transforms.NoDedupAnnotation", target: "~Top|Expect" },
      { class: "firrtl.passes.wiring.SinkAnnotation", target: "Top.Expect.y", pin: "x" },
      { class: "firrtl.transforms.NoDedupAnnotation", target: "~Top|Expect" },
      { class: "firrtl.transforms.DontTouchAnnotation", target: "~Top|Constant>x" },
      { class: "firrtl.passes.wiring.SourceAnnotation", target: "Top.Constant.x", pin: "uniqueId" },
      { class: "firrtl.passes.wiring.SinkAnnotation", target: "Top.Expect.y", pin: "uniqueId" },
    ]);
  });

  it("keeps issued names across runs sharing a context", () => {
    const ctx = new BuildContext();
    runPlanFile(fixture("plan.yaml"), path.join(dir, "a.json"), fixture("hierarchy.json"), ctx);
    const second = runPlanFile(fixture("plan.yaml"), path.join(dir, "b.json"), fixture("hierarchy.json"), ctx);
    expect(second.steps[0]).toEqual({ step: "bore", name: "x_1" });
  });

  it("writes nothing when a step fails", () => {
    const plan = path.join(dir, "plan.yaml");
    const out = path.join(dir, "annos.json");
    fs.writeFileSync(plan, "steps:\n  - sink: { component: \"~Top|Expect>y\", name: nope, force_exists: true }\n", "utf8");
    expect(() => runPlanFile(plan, out)).toThrow(NameNotFoundError);
    expect(fs.existsSync(out)).toBe(false);
  });
});
