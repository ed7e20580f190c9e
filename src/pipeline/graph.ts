import { PipelineDefinitionError } from '../shared/errors.js';
import type { StageDefinition } from './types.js';

export interface StageNode {
  stage: StageDefinition;
  /** Position in the declaration, used to break ordering ties. */
  index: number;
  downstream: string[];
}

export interface StageGraph {
  nodes: Map<string, StageNode>;
  /** Topological order; among ready stages, declaration order wins. */
  order: string[];
}

/**
 * Validate the stage list and compute a deterministic topological order.
 * Throws PipelineDefinitionError on duplicate names, unknown or self `needs`, or cycles.
 */
export function buildStageGraph(stages: StageDefinition[]): StageGraph {
  const problems: string[] = [];
  const nodes = new Map<string, StageNode>();

  stages.forEach((stage, index) => {
    if (stage.name.trim() === '') {
      problems.push(`stage #${index + 1} has an empty name`);
      return;
    }
    if (nodes.has(stage.name)) {
      problems.push(`duplicate stage name "${stage.name}"`);
      return;
    }
    nodes.set(stage.name, { stage, index, downstream: [] });
  });

  for (const node of nodes.values()) {
    for (const dep of node.stage.needs) {
      if (dep === node.stage.name) {
        problems.push(`stage "${dep}" depends on itself`);
        continue;
      }
      const upstream = nodes.get(dep);
      if (!upstream) {
        problems.push(`stage "${node.stage.name}" needs unknown stage "${dep}"`);
        continue;
      }
      upstream.downstream.push(node.stage.name);
    }
  }

  if (problems.length > 0) throw new PipelineDefinitionError(problems);

  // Kahn's algorithm; the ready list is kept sorted by declaration index
  const remaining = new Map<string, number>();
  for (const node of nodes.values()) {
    remaining.set(node.stage.name, new Set(node.stage.needs).size);
  }

  const byIndex = (a: string, b: string) => indexOf(nodes, a) - indexOf(nodes, b);
  const ready = [...remaining.entries()].filter(([, n]) => n === 0).map(([name]) => name).sort(byIndex);
  const order: string[] = [];

  while (ready.length > 0) {
    const name = ready.shift();
    if (name === undefined) break;
    order.push(name);
    const node = nodes.get(name);
    for (const next of new Set(node?.downstream ?? [])) {
      const left = (remaining.get(next) ?? 0) - 1;
      remaining.set(next, left);
      if (left === 0) {
        ready.push(next);
        ready.sort(byIndex);
      }
    }
  }

  if (order.length !== nodes.size) {
    const cyclic = [...nodes.keys()].filter((name) => !order.includes(name));
    throw new PipelineDefinitionError([`dependency cycle among ${cyclic.join(', ')}`]);
  }

  return { nodes, order };
}

function indexOf(nodes: Map<string, StageNode>, name: string): number {
  return nodes.get(name)?.index ?? Number.MAX_SAFE_INTEGER;
}

