import {
  type FactionId,
  type JumpPoint,
  type JumpPointId,
  JumpPointKind,
  JumpPointStatus,
  type StarSystem,
  type SystemId
} from '../../shared/types';
import {
  JUMP_FUEL_COST_BASE,
  JUMP_FUEL_COST_PER_SHIP,
  JUMP_FUEL_MASS_REFERENCE,
  JUMP_SIZE_CLASS_EFFICIENCY,
  JUMP_TIME_BASE,
  SURVEY_LEVEL_TRAVEL
} from '../../content/data/static';
import type { Vec3 } from '../math/vec3';

export type JumpPointInit = Partial<JumpPoint> & { id: JumpPointId; name: string; position: Vec3 };

export const createJumpPoint = (init: JumpPointInit): JumpPoint => ({
  connectsTo: null,
  kind: JumpPointKind.NATURAL,
  status: JumpPointStatus.UNKNOWN,
  stability: 1,
  sizeClass: 1,
  surveyLevel: 0,
  lastSurveyed: null,
  factionAccess: {},
  discoveredBy: null,
  discoveryTime: null,
  lastTransit: null,
  trafficLevel: 0,
  explorationDifficulty: 1,
  fuelCostModifier: 1,
  travelTimeModifier: 1,
  techRequirement: null,
  ...init
});

/**
 * Fuel needed to push a fleet of the given shape through the point.
 * Larger size classes are more efficient; the result never drops below the base cost.
 */
export const calculateFuelCost = (point: JumpPoint, totalFleetMass: number, shipCount: number): number => {
  const crewedCost = JUMP_FUEL_COST_BASE + JUMP_FUEL_COST_PER_SHIP * shipCount;
  const massFactor = Math.sqrt(Math.max(0, totalFleetMass) / JUMP_FUEL_MASS_REFERENCE);
  const sizeEfficiency = Math.max(1, point.sizeClass) * JUMP_SIZE_CLASS_EFFICIENCY;

  const cost = (crewedCost * massFactor * point.fuelCostModifier) / sizeEfficiency;
  return Math.max(JUMP_FUEL_COST_BASE, cost);
};

/**
 * Transit duration in seconds. Only the point's stability and modifier matter;
 * fleet shape is accepted so both cost functions share a signature.
 */
export const calculateTravelTime = (point: JumpPoint, _totalFleetMass: number, _shipCount: number): number => {
  const instabilityFactor = 2 - point.stability;
  const time = JUMP_TIME_BASE * instabilityFactor * point.travelTimeModifier;
  return Math.max(JUMP_TIME_BASE, time);
};

export const isAccessibleBy = (point: JumpPoint, factionId: FactionId): boolean => {
  if (point.status === JumpPointStatus.UNKNOWN || point.status === JumpPointStatus.DESTROYED) {
    return false;
  }

  if (point.surveyLevel === 0 && point.discoveredBy !== factionId) {
    return false;
  }

  const explicitAccess = Object.hasOwn(point.factionAccess, factionId) ? point.factionAccess[factionId] : undefined;
  if (explicitAccess !== undefined) {
    return explicitAccess;
  }

  return point.discoveredBy === factionId || point.status === JumpPointStatus.ACTIVE;
};

export const isTravelEligible = (point: JumpPoint): boolean =>
  (point.status === JumpPointStatus.ACTIVE || point.status === JumpPointStatus.MAPPED) &&
  point.surveyLevel >= SURVEY_LEVEL_TRAVEL;

/**
 * Sets the destination of a point whose far end was undetermined (revealed hidden points).
 * A destination never changes once set; the reverse link is a separate point.
 */
export const assignJumpDestination = (point: JumpPoint, targetSystemId: SystemId): void => {
  if (point.connectsTo !== null) {
    throw new Error(`Jump point ${point.id} already connects to ${point.connectsTo}`);
  }
  point.connectsTo = targetSystemId;
};

export const findJumpPoint = (system: StarSystem, jumpPointId: JumpPointId): JumpPoint | undefined =>
  system.jumpPoints.find(point => point.id === jumpPointId);

export const findJumpPointInSystems = (
  systems: Iterable<StarSystem>,
  jumpPointId: JumpPointId
): { system: StarSystem; jumpPoint: JumpPoint } | null => {
  for (const system of systems) {
    const jumpPoint = findJumpPoint(system, jumpPointId);
    if (jumpPoint) return { system, jumpPoint };
  }
  return null;
};
