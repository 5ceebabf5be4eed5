import { legacyName, serializeTarget, type ModuleTarget, type ReferenceTarget } from "./targets.js";

export type DontTouchAnnotation = {
  kind: "dont_touch";
  target: ReferenceTarget;
};

export type SourceAnnotation = {
  kind: "source";
  target: ReferenceTarget;
  pin: string;
};

export type SinkAnnotation = {
  kind: "sink";
  target: ModuleTarget | ReferenceTarget;
  pin: string;
};

export type NoDedupAnnotation = {
  kind: "no_dedup";
  target: ModuleTarget;
};

export type Annotation = DontTouchAnnotation | SourceAnnotation | SinkAnnotation | NoDedupAnnotation;

export type AnnotationJson = {
  class: string;
  target: string;
  pin?: string;
};

/** Receives intents in emission order. */
export interface AnnotationSink {
  annotate(a: Annotation): void;
}

export class AnnotationCollector implements AnnotationSink {
  private readonly items: Annotation[] = [];

  annotate(a: Annotation): void {
    this.items.push(a);
  }

  all(): Annotation[] {
    return [...this.items];
  }

  ofKind<K extends Annotation["kind"]>(kind: K): Extract<Annotation, { kind: K }>[] {
    const out: Extract<Annotation, { kind: K }>[] = [];
    for (const a of this.items) {
      if (isKind(a, kind)) out.push(a);
    }
    return out;
  }

  toJson(): AnnotationJson[] {
    return this.items.map(toAnnotationJson);
  }
}

function isKind<K extends Annotation["kind"]>(a: Annotation, kind: K): a is Extract<Annotation, { kind: K }> {
  return a.kind === kind;
}

export function toAnnotationJson(a: Annotation): AnnotationJson {
  switch (a.kind) {
    case "dont_touch":
      return { class: "firrtl.transforms.DontTouchAnnotation", target: serializeTarget(a.target) };
    case "source":
      return { class: "firrtl.passes.wiring.SourceAnnotation", target: legacyName(a.target), pin: a.pin };
    case "sink":
      return { class: "firrtl.passes.wiring.SinkAnnotation", target: legacyName(a.target), pin: a.pin };
    case "no_dedup":
      return { class: "firrtl.transforms.NoDedupAnnotation", target: serializeTarget(a.target) };
  }
}
