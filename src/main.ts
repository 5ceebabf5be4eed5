import { pathToFileURL } from "url";
import { IntentRecorder } from "./boring.js";
import { Hierarchy } from "./hierarchy.js";
import { BuildContext } from "./namespace.js";
import { applyPlan, parsePlan, type StepResult } from "./plan.js";
import { readText, writeText } from "./util.js";

export type RunResult = {
  steps: StepResult[];
  annotationCount: number;
};

export function runPlanFile(planPath: string, outJson: string, hierPath?: string, ctx = new BuildContext()): RunResult {
  const plan = parsePlan(readText(planPath));
  const hierarchy = hierPath ? Hierarchy.load(hierPath) : undefined;
  const recorder = IntentRecorder.fromContext(ctx, { strict: plan.strict });
  const steps = applyPlan(plan, recorder, hierarchy);
  const annotations = ctx.annotations.toJson();
  writeText(outJson, JSON.stringify(annotations, null, 2));
  return { steps, annotationCount: annotations.length };
}

async function main() {
  const [planPath, outJson, hierPath] = process.argv.slice(2);
  if (!planPath || !outJson) {
    console.error("Usage: node dist/main.js <plan.yaml> <out.json> [hierarchy.json]");
    process.exit(1);
  }
  const res = runPlanFile(planPath, outJson, hierPath);
  console.error(`Annotations: ${outJson} (${res.annotationCount})`);
  for (const s of res.steps) console.error(`${s.step}: ${s.name}`);
}

const isMain = !!process.argv[1] && import.meta.url === pathToFileURL(process.argv[1]).href;
if (isMain) {
  main().catch((e: unknown) => {
    console.error(e instanceof Error ? e.message : String(e));
    process.exit(1);
  });
}
