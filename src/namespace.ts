import { AnnotationCollector } from "./annotations.js";

function sanitize(s: string): string {
  const legal = s.replace(/[^A-Za-z0-9_]/g, "");
  return legal === "" || /^[0-9]/.test(legal) ? `_${legal}` : legal;
}

/**
 * Set of issued boring identifiers. Allocation is synchronous, so the
 * lookup and the insert of one `allocateUnique` call never interleave with
 * another allocation.
 */
export class Namespace {
  // next suffix to try per base name; presence means the name is taken
  private readonly counters = new Map<string, number>();

  allocateUnique(prefix: string): string {
    const base = sanitize(prefix);
    const { name, index } = this.next(base);
    if (index !== undefined) this.counters.set(base, index + 1);
    this.counters.set(name, 1);
    return name;
  }

  /** The name `allocateUnique(prefix)` would return, without taking it. */
  peek(prefix: string): string {
    return this.next(sanitize(prefix)).name;
  }

  exists(name: string): boolean {
    return this.counters.has(name);
  }

  /** Issued names in allocation order. */
  names(): string[] {
    return [...this.counters.keys()];
  }

  private next(base: string): { name: string; index?: number } {
    if (!this.counters.has(base)) return { name: base };
    let index = this.counters.get(base) ?? 1;
    let candidate = `${base}_${index}`;
    while (this.counters.has(candidate)) {
      index += 1;
      candidate = `${base}_${index}`;
    }
    return { name: candidate, index };
  }
}

/**
 * State shared by every boring call of one elaboration. The namespace is
 * created on first use and lives as long as the context; reusing a context
 * across builds keeps previously issued names taken.
 */
export class BuildContext {
  readonly annotations = new AnnotationCollector();
  private ns: Namespace | undefined;

  get namespace(): Namespace {
    if (!this.ns) this.ns = new Namespace();
    return this.ns;
  }
}
