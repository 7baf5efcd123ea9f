import { TopologyError } from '../errors.js';

export interface GraphNode {
  name: string;
  dependsOn: string[];
}

/**
 * Group nodes into levels: every node's dependencies live in earlier
 * levels. Declaration order is kept within a level so a plain chain
 * starts in the order it was written.
 */
export function dependencyLevels<T extends GraphNode>(nodes: T[]): T[][] {
  const byName = new Map<string, T>();
  for (const node of nodes) {
    if (byName.has(node.name)) {
      throw new TopologyError(`Duplicate service "${node.name}"`);
    }
    byName.set(node.name, node);
  }

  for (const node of nodes) {
    for (const dep of node.dependsOn) {
      if (!byName.has(dep)) {
        throw new TopologyError(
          `Service "${node.name}" depends on unknown service "${dep}"`,
        );
      }
    }
  }

  const placed = new Set<string>();
  const levels: T[][] = [];
  let remaining = [...nodes];

  while (remaining.length > 0) {
    const level = remaining.filter((node) =>
      node.dependsOn.every((dep) => placed.has(dep)),
    );
    if (level.length === 0) {
      const cycle = remaining.map((node) => node.name).join(', ');
      throw new TopologyError(`Dependency cycle between: ${cycle}`);
    }
    for (const node of level) {
      placed.add(node.name);
    }
    levels.push(level);
    remaining = remaining.filter((node) => !placed.has(node.name));
  }

  return levels;
}

export function topologicalOrder<T extends GraphNode>(nodes: T[]): T[] {
  return dependencyLevels(nodes).flat();
}
