/**
{
  "description": "Plugin dependency graph. Registers plugins and their declared prerequisites, then resolves a linear build order (Kahn's algorithm) and rejects cycles.",
  "phase": 1
}
*/

import { CycleDetectedError, DuplicatePluginError } from "./errors";

export interface DependencyNode<T> {
  readonly name: string;
  readonly dependencies: readonly T[];
}

export class PluginDependencyGraph<T extends DependencyNode<T>> {
  /** Known plugins keyed by name, in insertion order. */
  private nodes: Map<string, T> = new Map();
  /** Outgoing "must run before" edges: dependency name -> dependent names. */
  private edges: Map<string, Set<string>> = new Map();
  /** Every plugin `addPlugin` has seen, including ones still being expanded. */
  private expanded: Map<string, T> = new Map();

  /**
   * Register `plugin` and, transitively, everything it depends on.
   * Dependencies are inserted before their dependents; re-registering the same
   * object is a no-op, a different object under a taken name throws.
   */
  addPlugin(plugin: T) {
    const seen = this.expanded.get(plugin.name);
    if (seen !== undefined) {
      if (seen !== plugin) throw new DuplicatePluginError(plugin.name);
      return;
    }
    this.expanded.set(plugin.name, plugin);

    for (const dep of plugin.dependencies) {
      this.addPlugin(dep);
      this.addEdge(dep, plugin);
    }
    this.track(plugin);
  }

  get plugins(): T[] {
    return Array.from(this.nodes.values());
  }

  has(name: string): boolean {
    return this.nodes.has(name);
  }

  /** Direct dependents of `name`, i.e. plugins that list it as a dependency. */
  dependentsOf(name: string): string[] {
    return Array.from(this.edges.get(name) ?? []);
  }

  getBuildOrder(): T[] {
    const inDegree = new Map<string, number>();
    for (const name of this.nodes.keys()) inDegree.set(name, 0);
    for (const dependents of this.edges.values()) {
      for (const dependent of dependents) {
        inDegree.set(dependent, (inDegree.get(dependent) ?? 0) + 1);
      }
    }

    const queue: string[] = [];
    for (const [name, degree] of inDegree) {
      if (degree === 0) queue.push(name);
    }

    const order: T[] = [];
    let current = queue.shift();
    while (current !== undefined) {
      const node = this.nodes.get(current);
      if (node) order.push(node);
      for (const neighbor of this.edges.get(current) ?? []) {
        const remaining = (inDegree.get(neighbor) ?? 0) - 1;
        inDegree.set(neighbor, remaining);
        if (remaining === 0) queue.push(neighbor);
      }
      current = queue.shift();
    }

    if (order.length !== this.nodes.size) {
      const pending = Array.from(inDegree.entries())
        .filter(([, degree]) => degree > 0)
        .map(([name]) => name);
      throw new CycleDetectedError(pending);
    }
    return order;
  }

  private track(node: T) {
    if (!this.nodes.has(node.name)) this.nodes.set(node.name, node);
  }

  private addEdge(from: T, to: T) {
    this.track(from);
    let dependents = this.edges.get(from.name);
    if (!dependents) {
      dependents = new Set();
      this.edges.set(from.name, dependents);
    }
    dependents.add(to.name);
  }
}
