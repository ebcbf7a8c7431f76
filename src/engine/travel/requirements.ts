import {
  JumpPointStatus,
  type Fleet,
  type JumpEstimate,
  type JumpPoint,
  type JumpRequirements,
  type JumpRules,
  type ShipRegistry,
  type TechnologyQuery
} from '../../shared/types';
import {
  JUMP_PREPARATION_BASE_TIME,
  JUMP_PREPARATION_INSTABILITY_PENALTY,
  JUMP_PREPARATION_MIN_TIME,
  JUMP_PREPARATION_PER_SHIP,
  SURVEY_LEVEL_TRAVEL
} from '../../content/data/static';
import { calculateFuelCost, calculateTravelTime, isAccessibleBy } from '../jumps/jumpPoint';

export const calculatePreparationTime = (shipCount: number, jumpPoint: JumpPoint): number => {
  const shipFactor = shipCount * JUMP_PREPARATION_PER_SHIP;
  const instabilityFactor = (2 - jumpPoint.stability) * JUMP_PREPARATION_INSTABILITY_PENALTY;
  return Math.max(JUMP_PREPARATION_MIN_TIME, JUMP_PREPARATION_BASE_TIME + shipFactor + instabilityFactor);
};

const blocked = (reason: string, estimate: JumpEstimate | null = null, techRequirements: string[] = []): JumpRequirements => ({
  canJump: false,
  estimate,
  techRequirements,
  failureReasons: [reason]
});

/**
 * Fails closed: the first unmet condition is reported and nothing later is evaluated,
 * except that the cost estimate is attached once the fleet shape is known.
 */
export const calculateJumpRequirements = (
  fleet: Fleet,
  jumpPoint: JumpPoint,
  ships: ShipRegistry,
  technologies: TechnologyQuery,
  rules: Pick<JumpRules, 'minimumJumpFuel'>
): JumpRequirements => {
  if (fleet.shipIds.length === 0) {
    return blocked('Fleet has no ships');
  }

  if (!isAccessibleBy(jumpPoint, fleet.factionId)) {
    return blocked('Jump point not accessible');
  }

  if (jumpPoint.status !== JumpPointStatus.ACTIVE && jumpPoint.status !== JumpPointStatus.MAPPED) {
    return blocked(`Jump point status is ${jumpPoint.status}`);
  }

  if (jumpPoint.surveyLevel < SURVEY_LEVEL_TRAVEL) {
    return blocked('Jump point has not been surveyed');
  }

  if (fleet.fuelRemaining < rules.minimumJumpFuel) {
    return blocked('Insufficient fleet fuel');
  }

  let totalMass = 0;
  let shipCount = 0;
  let jumpCapableShips = 0;

  for (const shipId of fleet.shipIds) {
    const ship = ships.get(shipId);
    if (!ship) continue;
    shipCount++;
    totalMass += ship.mass;
    if (ship.hasJumpDrive) jumpCapableShips++;
  }

  if (jumpCapableShips === 0) {
    return blocked('No ships have jump drive capability');
  }

  const estimate: JumpEstimate = {
    fuelCost: calculateFuelCost(jumpPoint, totalMass, shipCount),
    travelTime: calculateTravelTime(jumpPoint, totalMass, shipCount),
    preparationTime: calculatePreparationTime(shipCount, jumpPoint)
  };
  const techRequirements = jumpPoint.techRequirement ? [jumpPoint.techRequirement] : [];

  if (estimate.fuelCost > fleet.fuelRemaining) {
    return blocked(
      `Insufficient fuel (need ${estimate.fuelCost.toFixed(1)}, have ${fleet.fuelRemaining.toFixed(1)})`,
      estimate,
      techRequirements
    );
  }

  const missingTech = techRequirements.filter(tech => !technologies.has(tech));
  if (missingTech.length > 0) {
    return blocked(`Missing required technology: ${missingTech.join(', ')}`, estimate, techRequirements);
  }

  return { canJump: true, estimate, techRequirements };
};
