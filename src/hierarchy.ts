import { z } from "zod";
import { PlanError } from "./errors.js";
import { moduleTarget, referenceTarget, type Annotatable, type ModuleTarget, type ReferenceTarget } from "./targets.js";
import { die, readText } from "./util.js";

export type HierNode = {
  instance_name?: string;
  module_name?: string;
  instances?: HierNode[];
  children?: HierNode[];
  signals?: string[];
};

const hierNodeSchema: z.ZodType<HierNode> = z.lazy(() =>
  z.object({
    instance_name: z.string().optional(),
    module_name: z.string().optional(),
    instances: z.array(hierNodeSchema).optional(),
    children: z.array(hierNodeSchema).optional(),
    signals: z.array(z.string()).optional(),
  }),
);

function kids(n: HierNode): HierNode[] {
  return n.instances ?? n.children ?? [];
}

function moduleOf(n: HierNode): string {
  const m = (n.module_name ?? "").trim();
  const i = (n.instance_name ?? "").trim();
  return m || i || die("Hierarchy node has neither module_name nor instance_name");
}

export class SignalComponent implements Annotatable<ReferenceTarget> {
  constructor(
    readonly circuit: string,
    readonly module: string,
    readonly signal: string,
  ) {}

  toTarget(): ReferenceTarget {
    return referenceTarget(this.circuit, this.module, this.signal);
  }

  displayName(): string | undefined {
    return this.signal || undefined;
  }
}

export class InstanceComponent implements Annotatable<ModuleTarget> {
  constructor(
    readonly circuit: string,
    readonly node: HierNode,
  ) {}

  toTarget(): ModuleTarget {
    return moduleTarget(this.circuit, moduleOf(this.node));
  }

  displayName(): string | undefined {
    return this.node.instance_name?.trim() || undefined;
  }
}

/**
 * Instance hierarchy of one elaborated circuit. The circuit is named after
 * the root module.
 */
export class Hierarchy {
  readonly circuit: string;

  constructor(readonly root: HierNode) {
    this.circuit = moduleOf(root);
  }

  static parse(json: unknown): Hierarchy {
    const res = hierNodeSchema.safeParse(json);
    if (!res.success) {
      throw new PlanError(`Invalid hierarchy: ${res.error.issues.map((i) => `${i.path.join(".") || "<root>"}: ${i.message}`).join("; ")}`);
    }
    return new Hierarchy(res.data);
  }

  static load(path: string): Hierarchy {
    let json: unknown;
    try {
      json = JSON.parse(readText(path));
    } catch (e) {
      throw new PlanError(`Cannot read hierarchy ${path}: ${e instanceof Error ? e.message : String(e)}`);
    }
    return Hierarchy.parse(json);
  }

  /**
   * Resolves `Top.inst.sub.signal`. The first segment names the root; the
   * longest run of instance names is followed, and whatever remains names a
   * signal of the module reached.
   */
  resolve(path: string): SignalComponent | InstanceComponent {
    const segs = path.split(".").map((s) => s.trim());
    const head = segs[0] ?? "";
    if (head !== this.root.instance_name && head !== this.root.module_name) {
      throw new PlanError(`Path '${path}' does not start at root '${this.circuit}'`);
    }
    let node = this.root;
    let i = 1;
    while (i < segs.length) {
      const next = kids(node).find((c) => c.instance_name === segs[i]);
      if (!next) break;
      node = next;
      i += 1;
    }
    if (i === segs.length) return new InstanceComponent(this.circuit, node);

    const signal = segs.slice(i).join(".");
    if (!(node.signals ?? []).includes(signal)) {
      throw new PlanError(`No instance or signal '${signal}' under '${segs.slice(0, i).join(".")}' in path '${path}'`);
    }
    return new SignalComponent(this.circuit, moduleOf(node), signal);
  }
}
