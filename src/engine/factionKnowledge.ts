import type { JumpPointId, SystemId } from '../shared/types';

/** What one faction has charted of the galaxy-wide network, plus its activity counters. */
export interface FactionNetworkKnowledge {
  knownSystems: Set<SystemId>;
  knownJumpPoints: Set<JumpPointId>;
  explorationMissions: number;
  totalJumps: number;
  discoveredJumpPoints: number;
}

export const createFactionNetworkKnowledge = (): FactionNetworkKnowledge => ({
  knownSystems: new Set(),
  knownJumpPoints: new Set(),
  explorationMissions: 0,
  totalJumps: 0,
  discoveredJumpPoints: 0
});
