import debug from "debug";
import graphlib from "graphlib";
import type { Task } from "../types";
import { ConfigurationError, CycleError } from "./errors";

const { Graph, alg } = graphlib;

const log = debug("shell-dispatch:graph");

export type DependencyGraph = InstanceType<typeof Graph>;

export class GraphBuilder {
  /**
   * Build the dependency graph of a task set. Edges go from a dependency to
   * its dependent: `a.requires: [b]` is `b -> a`, `a.before: [c]` is `a -> c`.
   */
  buildGraph(tasks: readonly Task[]): DependencyGraph {
    const graph = new Graph();

    log("=== Starting graph build ===");
    for (const task of tasks) {
      graph.setNode(task.name);
    }

    const missing: string[] = [];
    for (const task of tasks) {
      for (const dep of task.requires) {
        if (graph.hasNode(dep)) {
          log(`Adding edge ${dep} -> ${task.name} (requires)`);
          graph.setEdge(dep, task.name);
        } else {
          missing.push(`task '${task.name}' requires unknown task '${dep}'`);
        }
      }
      for (const next of task.before) {
        if (graph.hasNode(next)) {
          log(`Adding edge ${task.name} -> ${next} (before)`);
          graph.setEdge(task.name, next);
        } else {
          missing.push(`task '${task.name}' must run before unknown task '${next}'`);
        }
      }
    }

    if (missing.length > 0) {
      throw new ConfigurationError(
        `Unresolved task references: ${missing.join("; ")}`
      );
    }

    this.validateGraph(graph);

    log("Nodes:", graph.nodes());
    log("Edges:", graph.edges());
    log("=== End graph build ===");
    return graph;
  }

  validateGraph(graph: DependencyGraph): void {
    if (!alg.isAcyclic(graph)) {
      throw new CycleError(alg.findCycles(graph));
    }
  }

  /**
   * Topological order of `tasks`. Among tasks whose dependencies are all
   * placed, the one registered first goes next.
   */
  executionOrder(tasks: readonly Task[], graph: DependencyGraph): string[] {
    const index = new Map(tasks.map((task, i) => [task.name, i]));
    const position = (name: string): number => index.get(name) ?? tasks.length;

    const remaining = new Map<string, number>();
    const ready: string[] = [];
    for (const task of tasks) {
      const count = this.dependenciesOf(graph, task.name).length;
      remaining.set(task.name, count);
      if (count === 0) {
        ready.push(task.name);
      }
    }

    const order: string[] = [];
    while (ready.length > 0) {
      ready.sort((a, b) => position(a) - position(b));
      const next = ready.shift();
      if (next === undefined) {
        break;
      }
      order.push(next);

      for (const dependent of this.dependentsOf(graph, next)) {
        const count = (remaining.get(dependent) ?? 0) - 1;
        remaining.set(dependent, count);
        if (count === 0) {
          ready.push(dependent);
        }
      }
    }

    if (order.length !== tasks.length) {
      throw new CycleError(alg.findCycles(graph));
    }

    log("Execution order:", order);
    return order;
  }

  dependenciesOf(graph: DependencyGraph, name: string): string[] {
    const predecessors = graph.predecessors(name);
    return Array.isArray(predecessors) ? predecessors : [];
  }

  dependentsOf(graph: DependencyGraph, name: string): string[] {
    const successors = graph.successors(name);
    return Array.isArray(successors) ? successors : [];
  }
}
