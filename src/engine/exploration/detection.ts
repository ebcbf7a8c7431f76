import type { Fleet, StarSystem } from '../../shared/types';
import {
  DETECTION_DISTANCE_FACTOR_MIN,
  DETECTION_EXPERIENCE_BONUS,
  DETECTION_PROBABILITY_MAX,
  DETECTION_PROBABILITY_MIN,
  FLEET_CAPABILITY_MIN,
  FLEET_CAPABILITY_PER_SHIP,
  SYSTEM_DIFFICULTY_MAX,
  SYSTEM_DIFFICULTY_MIN
} from '../../content/data/static';

export const clamp = (value: number, min: number, max: number): number => {
  if (value < min) return min;
  if (value > max) return max;
  return value;
};

/**
 * Survey/exploration capability of a fleet. More hulls cover more volume;
 * sensor fits are not modelled yet, so every ship counts the same.
 */
export const calculateFleetSurveyCapability = (fleet: Pick<Fleet, 'shipIds'>): number =>
  Math.max(FLEET_CAPABILITY_MIN, 1 + fleet.shipIds.length * FLEET_CAPABILITY_PER_SHIP);

/**
 * How hard a system is to search: crowded systems and wide habitable zones leave
 * more volume to cover.
 */
export const calculateSystemDifficulty = (system: StarSystem): number => {
  const habitableZoneWidth = Math.max(0, system.habitableZoneOuter - system.habitableZoneInner);
  const difficulty =
    1 + system.planets.length * 0.1 + system.asteroidBelts.length * 0.2 + habitableZoneWidth * 0.1;
  return clamp(difficulty, SYSTEM_DIFFICULTY_MIN, SYSTEM_DIFFICULTY_MAX);
};

export interface DetectionInput {
  baseChance: number;
  distanceAu: number;
  detectionRangeAu: number;
  fleetCapability: number;
  explorationDifficulty: number;
  explorationProgress: number;
}

// Linear falloff: 1.0 on top of the point, 0.1 at the edge of sensor range
export const distanceFalloff = (distanceAu: number, detectionRangeAu: number): number =>
  Math.max(DETECTION_DISTANCE_FACTOR_MIN, 1 - distanceAu / detectionRangeAu);

export const calculateDetectionProbability = (input: DetectionInput): number => {
  const difficultyFactor = 1 / Math.max(Number.EPSILON, input.explorationDifficulty);
  const experienceBonus = input.explorationProgress * DETECTION_EXPERIENCE_BONUS;

  const chance =
    input.baseChance *
      distanceFalloff(input.distanceAu, input.detectionRangeAu) *
      input.fleetCapability *
      difficultyFactor +
    experienceBonus;

  return clamp(chance, DETECTION_PROBABILITY_MIN, DETECTION_PROBABILITY_MAX);
};
