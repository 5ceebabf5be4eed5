import { PlanError } from "./errors.js";

export type CircuitTarget = {
  kind: "circuit";
  circuit: string;
};

export type ModuleTarget = {
  kind: "module";
  circuit: string;
  module: string;
};

export type ReferenceTarget = {
  kind: "reference";
  circuit: string;
  module: string;
  ref: string;
};

export type Target = CircuitTarget | ModuleTarget | ReferenceTarget;

/**
 * Anything in the circuit model that can carry an annotation. `displayName`
 * is best effort: anonymous or constant-folded values return undefined.
 */
export interface Annotatable<T extends Target = Target> {
  toTarget(): T;
  displayName(): string | undefined;
}

export function circuitTarget(circuit: string): CircuitTarget {
  return { kind: "circuit", circuit };
}

export function moduleTarget(circuit: string, module: string): ModuleTarget {
  return { kind: "module", circuit, module };
}

export function referenceTarget(circuit: string, module: string, ref: string): ReferenceTarget {
  return { kind: "reference", circuit, module, ref };
}

/** `~Circuit`, `~Circuit|Module` or `~Circuit|Module>ref`. */
export function serializeTarget(t: Target): string {
  if (t.kind === "circuit") return `~${t.circuit}`;
  if (t.kind === "module") return `~${t.circuit}|${t.module}`;
  return `~${t.circuit}|${t.module}>${t.ref}`;
}

/** Dotted form used by the wiring source/sink annotations. */
export function legacyName(t: Target): string {
  if (t.kind === "circuit") return t.circuit;
  if (t.kind === "module") return `${t.circuit}.${t.module}`;
  return `${t.circuit}.${t.module}.${t.ref}`;
}

export function parseTarget(s: string): Target {
  const m = /^~([^|>~]+)(?:\|([^|>~]+)(?:>(.+))?)?$/.exec(s.trim());
  if (!m) throw new PlanError(`Malformed target '${s}'`);
  const [, circuit, module, ref] = m;
  if (module === undefined) return circuitTarget(circuit);
  if (ref === undefined) return moduleTarget(circuit, module);
  return referenceTarget(circuit, module, ref);
}

/** Wraps a parsed target string as a component. */
export function targetComponent(t: Target): Annotatable {
  return {
    toTarget: () => t,
    displayName: () => {
      if (t.kind === "reference") return t.ref;
      if (t.kind === "module") return t.module;
      return undefined;
    },
  };
}
