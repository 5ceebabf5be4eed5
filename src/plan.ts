import yaml from "js-yaml";
import { z } from "zod";
import type { IntentRecorder } from "./boring.js";
import { PlanError } from "./errors.js";
import type { Hierarchy } from "./hierarchy.js";
import { parseTarget, serializeTarget, targetComponent, type Annotatable, type ReferenceTarget } from "./targets.js";
import { asArray, die } from "./util.js";

const boreStep = z.object({
  bore: z.object({
    source: z.string(),
    sinks: z.union([z.string(), z.array(z.string())]),
  }),
});

const sourceStep = z.object({
  source: z.object({
    component: z.string(),
    name: z.string(),
    disable_dedup: z.boolean().default(false),
    unique_name: z.boolean().default(false),
  }),
});

const sinkStep = z.object({
  sink: z.object({
    component: z.string(),
    name: z.string(),
    disable_dedup: z.boolean().default(false),
    force_exists: z.boolean().default(false),
  }),
});

const planSchema = z.object({
  strict: z.boolean().default(false),
  steps: z.array(z.union([boreStep, sourceStep, sinkStep])).default([]),
});

export type Plan = z.infer<typeof planSchema>;
export type PlanStep = Plan["steps"][number];

export type StepResult = {
  step: "bore" | "source" | "sink";
  name: string;
};

export function parsePlan(text: string): Plan {
  let raw: unknown;
  try {
    raw = yaml.load(text);
  } catch (e) {
    throw new PlanError(`Plan is not valid YAML: ${e instanceof Error ? e.message : String(e)}`);
  }
  const res = planSchema.safeParse(raw ?? {});
  if (!res.success) {
    throw new PlanError(`Invalid plan: ${res.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ")}`);
  }
  return res.data;
}

/** Component strings are either serialized targets (`~C|M>r`) or hierarchy paths. */
export function resolveComponent(ref: string, hierarchy?: Hierarchy): Annotatable {
  if (ref.trim().startsWith("~")) return targetComponent(parseTarget(ref));
  if (!hierarchy) die(`Component '${ref}' is a hierarchy path but no hierarchy was given`);
  return hierarchy.resolve(ref);
}

function asSource(c: Annotatable, ref: string): Annotatable<ReferenceTarget> {
  const target = c.toTarget();
  if (target.kind !== "reference") {
    die(`Source '${ref}' must be a signal, got '${serializeTarget(target)}'`);
  }
  return { toTarget: () => target, displayName: () => c.displayName() };
}

export function applyPlan(plan: Plan, recorder: IntentRecorder, hierarchy?: Hierarchy): StepResult[] {
  const out: StepResult[] = [];
  for (const step of plan.steps) {
    if ("bore" in step) {
      const source = asSource(resolveComponent(step.bore.source, hierarchy), step.bore.source);
      const sinks = asArray(step.bore.sinks).map((s) => resolveComponent(s, hierarchy));
      out.push({ step: "bore", name: recorder.bore(source, sinks) });
    } else if ("source" in step) {
      const s = step.source;
      const source = asSource(resolveComponent(s.component, hierarchy), s.component);
      out.push({ step: "source", name: recorder.registerSource(source, s.name, s.disable_dedup, s.unique_name) });
    } else {
      const s = step.sink;
      recorder.registerSink(resolveComponent(s.component, hierarchy), s.name, s.disable_dedup, s.force_exists);
      out.push({ step: "sink", name: s.name });
    }
  }
  return out;
}
