import type { JumpPoint, StarSystem, SystemId } from '../../shared/types';
import { DEFAULT_REACH_HOPS } from '../../content/data/static';
import { compareIds, sorted } from '../../shared/sorting';

export type JumpPointFilter = (jumpPoint: JumpPoint, system: StarSystem) => boolean;

// Cheap, stable and well-mapped points make short edges
export const computeEdgeWeight = (jumpPoint: JumpPoint): number =>
  jumpPoint.fuelCostModifier * jumpPoint.travelTimeModifier * (2 - jumpPoint.stability);

/**
 * Directed weighted view of the jump network. It is a derived cache: callers rebuild it
 * wholesale whenever the system set or the known subset changes.
 */
export class JumpNetwork {
  private readonly adjacency = new Map<SystemId, Map<SystemId, number>>();

  buildNetworkGraph(systems: Iterable<StarSystem>, include: JumpPointFilter = () => true): void {
    this.adjacency.clear();
    const systemList = Array.from(systems);
    const systemIds = new Set(systemList.map(system => system.id));

    for (const system of systemList) {
      const edges = new Map<SystemId, number>();

      for (const jumpPoint of system.jumpPoints) {
        const targetId = jumpPoint.connectsTo;
        if (!targetId || !systemIds.has(targetId)) continue;
        if (!include(jumpPoint, system)) continue;

        const weight = computeEdgeWeight(jumpPoint);
        const existing = edges.get(targetId);
        if (existing === undefined || weight < existing) {
          edges.set(targetId, weight);
        }
      }

      this.adjacency.set(system.id, edges);
    }
  }

  get systemCount(): number {
    return this.adjacency.size;
  }

  hasSystem(systemId: SystemId): boolean {
    return this.adjacency.has(systemId);
  }

  getConnections(systemId: SystemId): SystemId[] {
    return Array.from(this.adjacency.get(systemId)?.keys() ?? []);
  }

  getEdgeWeight(originId: SystemId, targetId: SystemId): number | undefined {
    return this.adjacency.get(originId)?.get(targetId);
  }

  toAdjacencyRecord(): Record<SystemId, Record<SystemId, number>> {
    const record: Record<SystemId, Record<SystemId, number>> = {};
    this.adjacency.forEach((edges, systemId) => {
      record[systemId] = Object.fromEntries(edges);
    });
    return record;
  }

  /**
   * Dijkstra over edge weights. Ties resolve by system id so equal-cost routes are stable.
   */
  findShortestPath(originId: SystemId, targetId: SystemId): SystemId[] {
    if (originId === targetId) return [originId];
    if (!this.adjacency.has(originId) || !this.adjacency.has(targetId)) return [];

    const distances = new Map<SystemId, number>();
    const previous = new Map<SystemId, SystemId>();
    const unvisited = new Set<SystemId>(sorted(Array.from(this.adjacency.keys()), compareIds));
    this.adjacency.forEach((_, systemId) => distances.set(systemId, Infinity));
    distances.set(originId, 0);

    while (unvisited.size > 0) {
      let current: SystemId | null = null;
      let currentDistance = Infinity;
      for (const candidate of unvisited) {
        const candidateDistance = distances.get(candidate) ?? Infinity;
        if (candidateDistance < currentDistance) {
          current = candidate;
          currentDistance = candidateDistance;
        }
      }

      // Everything left is unreachable
      if (current === null) break;
      const settled: SystemId = current;
      unvisited.delete(settled);
      if (settled === targetId) break;

      this.adjacency.get(settled)?.forEach((weight, neighbor) => {
        if (!unvisited.has(neighbor)) return;
        const alternative = currentDistance + weight;
        if (alternative < (distances.get(neighbor) ?? Infinity)) {
          distances.set(neighbor, alternative);
          previous.set(neighbor, settled);
        }
      });
    }

    if (!previous.has(targetId)) return [];

    const path: SystemId[] = [targetId];
    let step = previous.get(targetId);
    while (step !== undefined) {
      path.push(step);
      step = previous.get(step);
    }
    return path.reverse();
  }

  /**
   * Breadth-first expansion bounded by hop count, not by weight.
   */
  getReachableSystems(originId: SystemId, maxJumps: number = DEFAULT_REACH_HOPS): Record<SystemId, number> {
    const reachable: Record<SystemId, number> = { [originId]: 0 };
    const queue: Array<{ systemId: SystemId; jumps: number }> = [{ systemId: originId, jumps: 0 }];

    for (let head = 0; head < queue.length; head++) {
      const { systemId, jumps } = queue[head];
      if (jumps >= maxJumps) continue;

      for (const neighbor of this.getConnections(systemId)) {
        if (Object.hasOwn(reachable, neighbor)) continue;
        reachable[neighbor] = jumps + 1;
        queue.push({ systemId: neighbor, jumps: jumps + 1 });
      }
    }

    return reachable;
  }
}
