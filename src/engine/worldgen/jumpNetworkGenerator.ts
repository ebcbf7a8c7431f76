import { JumpPointKind, JumpPointStatus, type JumpPoint, type StarSystem } from '../../shared/types';
import {
  AU_TO_KM,
  DEFAULT_CONNECTIVITY_LEVEL,
  DORMANT_JUMP_POINT_CHANCE,
  JUMP_POINT_RADIUS_AU,
  SECONDARY_LINK_DISTANCE_SCALE,
  SECONDARY_LINK_MIN_CHANCE,
  UNSTABLE_JUMP_POINT_CHANCE
} from '../../content/data/static';
import { logger } from '../../shared/devLogger';
import { jumpPointName } from '../idUtils';
import { createJumpPoint } from '../jumps/jumpPoint';
import { fromPolar } from '../math/vec3';
import type { RNG } from '../rng';

export interface JumpNetworkGenerationSummary {
  backboneLinks: number;
  secondaryLinks: number;
  unstablePoints: number;
  dormantPoints: number;
}

interface NetworkPointOptions {
  kind?: JumpPointKind;
  status?: JumpPointStatus;
  stability?: number;
}

/**
 * Synthetic separation between two systems. It has nothing to do with their spatial
 * coordinates: similar stars with similar planet counts read as "close", plus jitter.
 */
export const calculateSystemDistance = (a: StarSystem, b: StarSystem, rng: RNG): number => {
  const starMassDiff = Math.abs(a.starMass - b.starMass);
  const planetCountDiff = Math.abs(a.planets.length - b.planets.length);
  return starMassDiff + planetCountDiff * 0.5 + rng.range(0.5, 2.0);
};

export const createNetworkJumpPoint = (
  origin: StarSystem,
  target: StarSystem,
  rng: RNG,
  options: NetworkPointOptions = {}
): JumpPoint => {
  const kind = options.kind ?? JumpPointKind.NATURAL;
  const radiusKm = rng.range(JUMP_POINT_RADIUS_AU[0], JUMP_POINT_RADIUS_AU[1]) * AU_TO_KM;
  const bearing = rng.angle();
  const z = rng.range(-0.05 * radiusKm, 0.05 * radiusKm);
  const stability =
    options.stability ?? (kind === JumpPointKind.NATURAL ? rng.range(0.8, 1.0) : rng.range(0.5, 0.9));

  return createJumpPoint({
    id: rng.id(`jp_${origin.id}`),
    name: jumpPointName(target.name),
    position: fromPolar(radiusKm, bearing, z),
    connectsTo: target.id,
    kind,
    status: options.status ?? JumpPointStatus.UNKNOWN,
    stability,
    sizeClass: rng.int(1, 4),
    explorationDifficulty: rng.range(0.8, 1.5),
    fuelCostModifier: rng.range(0.9, 1.1),
    travelTimeModifier: rng.range(0.9, 1.1)
  });
};

const createJumpPointPair = (a: StarSystem, b: StarSystem, rng: RNG): void => {
  a.jumpPoints.push(createNetworkJumpPoint(a, b, rng));
  b.jumpPoints.push(createNetworkJumpPoint(b, a, rng));
};

const isLinked = (origin: StarSystem, target: StarSystem): boolean =>
  origin.jumpPoints.some(point => point.connectsTo === target.id);

/**
 * Greedy spanning backbone: repeatedly links the closest unconnected system to the
 * connected set. Every system ends up reachable from every other one.
 */
const createBackbone = (systems: StarSystem[], rng: RNG): number => {
  if (systems.length < 2) return 0;

  const connected: StarSystem[] = [systems[0]];
  const unconnected = systems.slice(1);
  let links = 0;

  while (unconnected.length > 0) {
    let best: { from: StarSystem; index: number; distance: number } | null = null;

    for (const from of connected) {
      for (let index = 0; index < unconnected.length; index++) {
        const distance = calculateSystemDistance(from, unconnected[index], rng);
        if (best === null || distance < best.distance) {
          best = { from, index, distance };
        }
      }
    }

    if (best === null) break;
    const { from, index } = best;
    const [joining] = unconnected.splice(index, 1);
    createJumpPointPair(from, joining, rng);
    connected.push(joining);
    links++;
  }

  return links;
};

const addSecondaryLinks = (systems: StarSystem[], connectivityLevel: number, rng: RNG): number => {
  if (systems.length < 2) return 0;

  const possiblePairs = (systems.length * (systems.length - 1)) / 2;
  const targetLinks = Math.floor(possiblePairs * connectivityLevel);
  const currentLinks = Math.floor(systems.reduce((sum, system) => sum + system.jumpPoints.length, 0) / 2);
  const attempts = Math.max(0, targetLinks - currentLinks);
  let links = 0;

  for (let attempt = 0; attempt < attempts; attempt++) {
    const firstIndex = rng.int(0, systems.length - 1);
    let secondIndex = rng.int(0, systems.length - 2);
    if (secondIndex >= firstIndex) secondIndex++;

    const a = systems[firstIndex];
    const b = systems[secondIndex];
    if (isLinked(a, b)) continue;

    const distance = calculateSystemDistance(a, b, rng);
    const acceptance = Math.max(SECONDARY_LINK_MIN_CHANCE, 1 - distance / SECONDARY_LINK_DISTANCE_SCALE);
    if (rng.chance(acceptance)) {
      createJumpPointPair(a, b, rng);
      links++;
    }
  }

  return links;
};

const addSpecialJumpPoints = (
  systems: StarSystem[],
  rng: RNG
): Pick<JumpNetworkGenerationSummary, 'unstablePoints' | 'dormantPoints'> => {
  let unstablePoints = 0;
  let dormantPoints = 0;
  if (systems.length < 2) return { unstablePoints, dormantPoints };

  for (const system of systems) {
    const others = systems.filter(other => other.id !== system.id);

    if (rng.chance(UNSTABLE_JUMP_POINT_CHANCE)) {
      const target = rng.pick(others);
      if (target) {
        system.jumpPoints.push(
          createNetworkJumpPoint(system, target, rng, {
            kind: JumpPointKind.UNSTABLE,
            stability: rng.range(0.3, 0.7)
          })
        );
        unstablePoints++;
      }
    }

    if (rng.chance(DORMANT_JUMP_POINT_CHANCE)) {
      const target = rng.pick(others);
      if (target) {
        system.jumpPoints.push(
          createNetworkJumpPoint(system, target, rng, {
            kind: JumpPointKind.DORMANT,
            status: JumpPointStatus.INACTIVE
          })
        );
        dormantPoints++;
      }
    }
  }

  return { unstablePoints, dormantPoints };
};

/**
 * Replaces every jump point in `systems` with a freshly generated network:
 * a connected backbone, extra links up to `connectivityLevel` of all possible pairs,
 * and a sprinkling of one-way unstable and dormant points.
 */
export const generateEnhancedJumpNetwork = (
  systems: StarSystem[],
  rng: RNG,
  connectivityLevel: number = DEFAULT_CONNECTIVITY_LEVEL
): JumpNetworkGenerationSummary => {
  if (!Number.isFinite(connectivityLevel) || connectivityLevel < 0 || connectivityLevel > 1) {
    throw new Error(`generateEnhancedJumpNetwork: connectivity level must be within [0, 1], got ${connectivityLevel}`);
  }

  logger.info(`[JumpNetwork] Generating jump network for ${systems.length} systems.`);

  for (const system of systems) {
    system.jumpPoints.length = 0;
  }

  const backboneLinks = createBackbone(systems, rng);
  const secondaryLinks = addSecondaryLinks(systems, connectivityLevel, rng);
  const special = addSpecialJumpPoints(systems, rng);

  const summary: JumpNetworkGenerationSummary = { backboneLinks, secondaryLinks, ...special };
  logger.info(
    `[JumpNetwork] Generated ${backboneLinks} backbone links, ${secondaryLinks} secondary links, ` +
      `${special.unstablePoints} unstable and ${special.dormantPoints} dormant points.`
  );
  return summary;
};
