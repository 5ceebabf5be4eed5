import type { AnnotationSink, SinkAnnotation } from "./annotations.js";
import { DuplicateSourceError, InvalidSinkTargetError, NameNotFoundError } from "./errors.js";
import type { BuildContext, Namespace } from "./namespace.js";
import { moduleTarget, serializeTarget, type Annotatable, type ReferenceTarget } from "./targets.js";

export type RecorderOptions = {
  namespace: Namespace;
  sink: AnnotationSink;
  // reject a second source declared under the same id
  strict?: boolean;
};

/**
 * Records cross-module wiring intents ("boring"). A source and its sinks
 * are matched by a shared pin name; an external wiring transform threads
 * the actual connection through the instance hierarchy.
 *
 * Hierarchical boring (`bore`) derives a fresh name from the namespace.
 * Non-hierarchical boring (`registerSource`/`registerSink` with a
 * caller-chosen name) is not checked for collisions unless `strict` is set.
 */
export class IntentRecorder {
  private readonly namespace: Namespace;
  private readonly sink: AnnotationSink;
  private readonly strict: boolean;
  private readonly declared = new Set<string>();

  constructor(opts: RecorderOptions) {
    this.namespace = opts.namespace;
    this.sink = opts.sink;
    this.strict = opts.strict ?? false;
  }

  static fromContext(ctx: BuildContext, opts: { strict?: boolean } = {}): IntentRecorder {
    return new IntentRecorder({ namespace: ctx.namespace, sink: ctx.annotations, strict: opts.strict });
  }

  /**
   * Declares `component` as a named source and returns the id used, which
   * differs from `name` only when `uniqueName` is set and `name` is taken.
   */
  registerSource(
    component: Annotatable<ReferenceTarget>,
    name: string,
    disableDedup = false,
    uniqueName = false,
  ): string {
    const target = component.toTarget();
    if (this.strict) {
      const wanted = uniqueName ? this.namespace.peek(name) : name;
      if (this.declared.has(wanted)) throw new DuplicateSourceError(wanted);
    }
    const id = uniqueName ? this.namespace.allocateUnique(name) : name;
    this.declared.add(id);

    this.sink.annotate({ kind: "dont_touch", target });
    this.sink.annotate({ kind: "source", target, pin: id });
    if (disableDedup) {
      this.sink.annotate({ kind: "no_dedup", target: moduleTarget(target.circuit, target.module) });
    }
    return id;
  }

  /**
   * Declares `component` as a sink of the source named `name`. Several
   * sinks may share one source.
   */
  registerSink(component: Annotatable, name: string, disableDedup = false, forceExists = false): void {
    if (forceExists && !this.namespace.exists(name)) {
      throw new NameNotFoundError(name);
    }
    const target = component.toTarget();
    if (target.kind === "circuit") {
      throw new InvalidSinkTargetError(serializeTarget(target));
    }

    const annotation: SinkAnnotation = { kind: "sink", target, pin: name };
    this.sink.annotate(annotation);
    if (disableDedup) {
      this.sink.annotate({ kind: "no_dedup", target: moduleTarget(target.circuit, target.module) });
    }
  }

  /** Connects `source` to every sink; returns the generated pin name. */
  bore(source: Annotatable<ReferenceTarget>, sinks: readonly Annotatable[]): string {
    const label = source.displayName() || "bore";
    const genName = this.registerSource(source, label, true, true);
    for (const s of sinks) this.registerSink(s, genName, true, false);
    return genName;
  }
}
