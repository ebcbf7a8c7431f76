export * from './shared/types';
export { logger, setLogLevel, getLogLevel, type LogLevel } from './shared/devLogger';
export * from './content/data/static';

export {
  JumpPointEngine,
  type AvailableJumpDetails,
  type FactionJumpNetwork,
  type FleetActivePhase,
  type JumpPointDiscovery,
  type JumpPointEngineOptions,
  type KnownConnection,
  type TurnUpdateResult
} from './engine/JumpPointEngine';
export { RNG } from './engine/rng';
export { describeCommandResult, fail, succeed, type CommandResult } from './engine/commandResult';
export type { FactionNetworkKnowledge } from './engine/factionKnowledge';

export { ExplorationEngine, type MissionTarget } from './engine/exploration/explorationEngine';
export {
  calculateDetectionProbability,
  calculateFleetSurveyCapability,
  calculateSystemDifficulty,
  type DetectionInput
} from './engine/exploration/detection';
export { generateHiddenJumpPoints } from './engine/exploration/hiddenJumpPoints';

export { TravelEngine } from './engine/travel/travelEngine';
export { calculateJumpRequirements, calculatePreparationTime } from './engine/travel/requirements';

export {
  assignJumpDestination,
  calculateFuelCost,
  calculateTravelTime,
  createJumpPoint,
  isAccessibleBy,
  isTravelEligible,
  type JumpPointInit
} from './engine/jumps/jumpPoint';

export { computeEdgeWeight, JumpNetwork, type JumpPointFilter } from './engine/network/jumpNetwork';
export {
  calculateSystemDistance,
  generateEnhancedJumpNetwork,
  type JumpNetworkGenerationSummary
} from './engine/worldgen/jumpNetworkGenerator';

export { vec3, dist, type Vec3 } from './engine/math/vec3';
