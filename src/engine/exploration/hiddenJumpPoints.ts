import { JumpPointKind, JumpPointStatus, type JumpPoint, type StarSystem } from '../../shared/types';
import {
  AU_TO_KM,
  HIDDEN_EXTRA_POINT_CHANCE,
  HIDDEN_EXTRA_POINT_ROLLS,
  HIDDEN_FIRST_POINT_CHANCE,
  HIDDEN_POINT_RADIUS_AU
} from '../../content/data/static';
import { createJumpPoint } from '../jumps/jumpPoint';
import { fromPolar } from '../math/vec3';
import type { RNG } from '../rng';

export const rollHiddenPointCount = (rng: RNG): number => {
  let count = rng.chance(HIDDEN_FIRST_POINT_CHANCE) ? 1 : 0;
  for (let roll = 0; roll < HIDDEN_EXTRA_POINT_ROLLS; roll++) {
    if (rng.chance(HIDDEN_EXTRA_POINT_CHANCE)) count++;
  }
  return count;
};

/**
 * Builds a point in the outer system that no faction can see. Its destination stays
 * undetermined until the point is revealed.
 */
export const createHiddenJumpPoint = (system: StarSystem, index: number, rng: RNG): JumpPoint => {
  const radiusKm = rng.range(HIDDEN_POINT_RADIUS_AU[0], HIDDEN_POINT_RADIUS_AU[1]) * AU_TO_KM;
  const bearing = rng.angle();
  const z = rng.range(-0.1 * radiusKm, 0.1 * radiusKm);

  return createJumpPoint({
    id: rng.id(`jp_hidden_${system.id}`),
    name: `Hidden JP-${index + 1}`,
    position: fromPolar(radiusKm, bearing, z),
    connectsTo: null,
    kind: JumpPointKind.NATURAL,
    status: JumpPointStatus.UNKNOWN,
    stability: rng.range(0.7, 1.0),
    sizeClass: rng.int(1, 3),
    explorationDifficulty: rng.range(1.2, 2.0),
    fuelCostModifier: rng.range(0.8, 1.3),
    travelTimeModifier: rng.range(0.9, 1.2)
  });
};

export const generateHiddenJumpPoints = (system: StarSystem, rng: RNG): JumpPoint[] => {
  const count = rollHiddenPointCount(rng);
  return Array.from({ length: count }, (_, index) => createHiddenJumpPoint(system, index, rng));
};
