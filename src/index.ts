export { AnnotationCollector, toAnnotationJson } from "./annotations.js";
export type { Annotation, AnnotationJson, AnnotationSink } from "./annotations.js";
export { IntentRecorder } from "./boring.js";
export type { RecorderOptions } from "./boring.js";
export { BoringError, DuplicateSourceError, InvalidSinkTargetError, NameNotFoundError, PlanError } from "./errors.js";
export { Hierarchy, InstanceComponent, SignalComponent } from "./hierarchy.js";
export type { HierNode } from "./hierarchy.js";
export { BuildContext, Namespace } from "./namespace.js";
export { applyPlan, parsePlan, resolveComponent } from "./plan.js";
export type { Plan, StepResult } from "./plan.js";
export * from "./targets.js";
