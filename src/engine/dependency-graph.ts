/**
 * Named dependency graph of a template. Edges point from a step to the steps it depends on.
 */
export interface DependencyNode {
  readonly name: string;
  readonly dependsOn: readonly string[];
}

export class DependencyGraph {
  private readonly edges = new Map<string, string[]>();

  /**
   * Names that are not declared as nodes are ignored; callers decide
   * beforehand whether a dangling name is an error.
   */
  constructor(nodes: readonly DependencyNode[]) {
    const declared = new Set(nodes.map((node) => node.name));
    for (const node of nodes) {
      this.edges.set(
        node.name,
        node.dependsOn.filter((dep) => declared.has(dep)),
      );
    }
  }

  /**
   * Order in which every step comes after all of its dependencies (Kahn's algorithm).
   * Ties keep declaration order. Returns null if the graph has a cycle.
   */
  topologicalOrder(): string[] | null {
    const remaining = new Map<string, number>();
    const dependents = new Map<string, string[]>();

    for (const [name, deps] of this.edges) {
      remaining.set(name, new Set(deps).size);
      for (const dep of new Set(deps)) {
        const list = dependents.get(dep) ?? [];
        list.push(name);
        dependents.set(dep, list);
      }
    }

    const queue = [...remaining].filter(([, count]) => count === 0).map(([name]) => name);
    const order: string[] = [];

    while (queue.length > 0) {
      const name = queue.shift();
      if (name === undefined) break;
      order.push(name);
      for (const dependent of dependents.get(name) ?? []) {
        const count = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, count);
        if (count === 0) queue.push(dependent);
      }
    }

    return order.length === this.edges.size ? order : null;
  }

  /**
   * First cycle found by depth-first search, as a path whose first name is
   * repeated at the end (e.g. `['a', 'b', 'a']`), or null for an acyclic graph.
   */
  findCycle(): string[] | null {
    const visiting = new Set<string>();
    const done = new Set<string>();
    const path: string[] = [];

    const visit = (name: string): string[] | null => {
      if (visiting.has(name)) {
        return [...path.slice(path.indexOf(name)), name];
      }
      if (done.has(name)) return null;

      visiting.add(name);
      path.push(name);
      for (const dep of this.edges.get(name) ?? []) {
        const cycle = visit(dep);
        if (cycle) return cycle;
      }
      path.pop();
      visiting.delete(name);
      done.add(name);
      return null;
    };

    for (const name of this.edges.keys()) {
      const cycle = visit(name);
      if (cycle) return cycle;
    }
    return null;
  }
}
