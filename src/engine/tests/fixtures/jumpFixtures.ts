import {
  FleetStatus,
  JumpPointStatus,
  type Fleet,
  type JumpPoint,
  type Ship,
  type StarSystem
} from '../../../shared/types';
import { createJumpPoint, type JumpPointInit } from '../../jumps/jumpPoint';
import { vec3 } from '../../math/vec3';
import { RNG } from '../../rng';

export const createFleet = (overrides: Partial<Fleet> = {}): Fleet => ({
  id: 'fleet_1',
  name: 'Scout Group',
  factionId: 'blue',
  systemId: 'sys_a',
  position: vec3(),
  velocity: vec3(),
  destination: null,
  estimatedArrival: null,
  shipIds: ['ship_1'],
  status: FleetStatus.IDLE,
  currentOrders: [],
  totalMass: 500,
  fuelRemaining: 500,
  ...overrides
});

export const createShip = (overrides: Partial<Ship> = {}): Ship => ({
  id: 'ship_1',
  name: 'Pathfinder',
  mass: 500,
  hasJumpDrive: true,
  ...overrides
});

export const createSystem = (overrides: Partial<StarSystem> = {}): StarSystem => ({
  id: 'sys_a',
  name: 'Alpha',
  starMass: 1,
  planets: [],
  asteroidBelts: [],
  habitableZoneInner: 0.95,
  habitableZoneOuter: 1.37,
  jumpPoints: [],
  ...overrides
});

/** A point any faction can travel through right away. */
export const createActivePoint = (overrides: Partial<JumpPointInit> & { id: string }): JumpPoint =>
  createJumpPoint({
    name: 'JP-TST',
    position: vec3(),
    status: JumpPointStatus.ACTIVE,
    surveyLevel: 2,
    sizeClass: 4,
    ...overrides
  });

/** RNG stub that always draws the same value. */
export class FixedRng extends RNG {
  constructor(private readonly value: number) {
    super(1);
  }

  public next(): number {
    return this.value;
  }
}

export const registry = <T extends { id: string }>(...items: T[]): Map<string, T> =>
  new Map(items.map(item => [item.id, item]));

export const noTechnologies = new Set<string>();
