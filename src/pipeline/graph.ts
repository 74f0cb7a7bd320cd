/**
 * Stage dependency graph
 *
 * Stages declare their predecessors. The graph is checked once at construction
 * (unknown predecessor, duplicate stage, cycle) and yields a deterministic
 * topological order: among ready stages, declaration order wins.
 *
 * @module pipeline/graph
 */

import type { StageName } from '../models/pipeline.js';
import { ConfigurationError } from './errors.js';

export interface StageNode {
  name: StageName;
  after: readonly StageName[];
}

/**
 * Predecessors of every stage in the legal pipeline, in declaration order
 */
export const PIPELINE_GRAPH: readonly StageNode[] = [
  { name: 'ocr', after: [] },
  { name: 'dates', after: ['ocr'] },
  { name: 'classification', after: ['dates'] },
  { name: 'vectorization', after: ['classification'] },
  { name: 'versioning', after: ['classification'] },
  { name: 'comparison', after: ['versioning'] },
  { name: 'legalization', after: ['versioning', 'vectorization'] },
  { name: 'report', after: ['versioning', 'comparison', 'legalization'] },
];

export class StageGraph {
  private readonly order: readonly StageName[];

  constructor(nodes: readonly StageNode[] = PIPELINE_GRAPH) {
    const byName = new Map<StageName, StageNode>();
    for (const node of nodes) {
      if (byName.has(node.name)) {
        throw new ConfigurationError(`Stage "${node.name}" declared twice`);
      }
      byName.set(node.name, node);
    }
    for (const node of nodes) {
      for (const dep of node.after) {
        if (!byName.has(dep)) {
          throw new ConfigurationError(`Stage "${node.name}" depends on unknown stage "${dep}"`);
        }
      }
    }
    this.order = topologicalOrder(nodes);
  }

  /** Stages in execution order */
  executionOrder(): readonly StageName[] {
    return this.order;
  }
}

function topologicalOrder(nodes: readonly StageNode[]): StageName[] {
  const done = new Set<StageName>();
  const order: StageName[] = [];

  while (order.length < nodes.length) {
    const ready = nodes.find(
      (node) => !done.has(node.name) && node.after.every((dep) => done.has(dep))
    );
    if (!ready) {
      const stuck = nodes.filter((node) => !done.has(node.name)).map((node) => node.name);
      throw new ConfigurationError(`Stage graph has a cycle among: ${stuck.join(', ')}`);
    }
    done.add(ready.name);
    order.push(ready.name);
  }
  return order;
}
