import type { Vec3 } from '../engine/math/vec3';

export type FactionId = string;
export type FleetId = string;
export type SystemId = string;
export type JumpPointId = string;
export type ShipId = string;

// --- Collaborator entities (owned by the simulation, mutated in place by this engine) ---

export enum FleetStatus {
  IDLE = 'idle',
  MOVING = 'moving',
  IN_TRANSIT = 'in_transit',
  ORBITING = 'orbiting',
  EXPLORING = 'exploring',
  SURVEYING = 'surveying',
  FORMING_UP = 'forming_up',
}

export interface Fleet {
  id: FleetId;
  name: string;
  factionId: FactionId;
  systemId: SystemId;
  position: Vec3;
  velocity: Vec3;
  destination: Vec3 | null;
  estimatedArrival: number | null;
  shipIds: ShipId[];
  status: FleetStatus;
  currentOrders: string[];
  totalMass: number;
  fuelRemaining: number;
}

export interface Ship {
  id: ShipId;
  name: string;
  mass: number;
  hasJumpDrive: boolean;
}

export interface CelestialBody {
  id: string;
  name: string;
}

export interface StarSystem {
  id: SystemId;
  name: string;
  starMass: number; // Solar masses
  planets: CelestialBody[];
  asteroidBelts: CelestialBody[];
  habitableZoneInner: number; // AU
  habitableZoneOuter: number; // AU
  jumpPoints: JumpPoint[];
}

/** Technology bookkeeping lives elsewhere; a `Set<string>` of researched tech ids satisfies this. */
export interface TechnologyQuery {
  has(techId: string): boolean;
}

export type FleetRegistry = ReadonlyMap<FleetId, Fleet>;
export type SystemRegistry = ReadonlyMap<SystemId, StarSystem>;
export type ShipRegistry = ReadonlyMap<ShipId, Ship>;

// --- Jump points ---

export enum JumpPointKind {
  NATURAL = 'natural',
  ARTIFICIAL = 'artificial',
  UNSTABLE = 'unstable',
  DORMANT = 'dormant',
  RESTRICTED = 'restricted',
}

export enum JumpPointStatus {
  UNKNOWN = 'unknown',
  DETECTED = 'detected',
  SURVEYED = 'surveyed',
  MAPPED = 'mapped',
  ACTIVE = 'active',
  INACTIVE = 'inactive',
  DESTROYED = 'destroyed',
}

export interface JumpPoint {
  id: JumpPointId;
  name: string;
  position: Vec3; // km from the system centre
  connectsTo: SystemId | null; // null while the destination is undetermined
  kind: JumpPointKind;
  status: JumpPointStatus;
  stability: number; // 0..1
  sizeClass: number;
  surveyLevel: number; // 0 undiscovered, 1 detected, 2 surveyed, 3 mapped
  lastSurveyed: number | null;
  factionAccess: Record<FactionId, boolean>;
  discoveredBy: FactionId | null;
  discoveryTime: number | null;
  lastTransit: number | null;
  trafficLevel: number;
  explorationDifficulty: number;
  fuelCostModifier: number;
  travelTimeModifier: number;
  techRequirement: string | null;
}

// --- Exploration ---

export type MissionKind = 'explore' | 'survey' | 'deep_scan';

export enum ExplorationResult {
  NO_DISCOVERY = 'no_discovery',
  JUMP_POINT_DETECTED = 'jump_point_detected',
  JUMP_POINT_SURVEYED = 'jump_point_surveyed',
  ANOMALY_DETECTED = 'anomaly_detected',
}

export interface ExplorationMission {
  fleetId: FleetId;
  systemId: SystemId;
  kind: MissionKind;
  startTime: number;
  duration: number;
  targetPosition: Vec3 | null;
  targetJumpPointId: JumpPointId | null;
  progress: number;
  completed: boolean;
  results: ExplorationResult[];
}

export interface FactionSystemKnowledge {
  explorationProgress: number;
  surveyCompleteness: number;
  discoveredJumpPointIds: Set<JumpPointId>;
  lastExploration: number | null;
}

export interface SystemExplorationRecord {
  difficulty: number;
  totalExplorationTime: number;
  lastExploration: number | null;
  factions: Map<FactionId, FactionSystemKnowledge>;
}

export interface ExplorationStatus {
  explorationProgress: number;
  surveyCompleteness: number;
  discoveredJumpPoints: number;
  discoveredJumpPointIds: JumpPointId[];
  lastExploration: number | null;
  systemDifficulty: number;
  potentialDiscoveries: number;
}

export interface JumpPointDetection {
  jumpPoint: JumpPoint;
  revealedFromHidden: boolean;
}

export interface MissionReport {
  systemId: SystemId;
  kind: MissionKind;
  progress: number;
  completed: boolean;
  results: ExplorationResult[];
  detections: JumpPointDetection[];
}

// --- Travel ---

export type PreparationStatus = 'pending' | 'preparing' | 'failed' | 'cancelled';
export type OperationStatus = 'jumping' | 'completed' | 'failed';

export interface JumpPreparation {
  fleetId: FleetId;
  jumpPointId: JumpPointId;
  targetSystemId: SystemId;
  startTime: number;
  preparationTime: number;
  fuelCost: number;
  progress: number;
  status: PreparationStatus;
}

export interface JumpOperation {
  fleetId: FleetId;
  originSystemId: SystemId;
  targetSystemId: SystemId;
  jumpPointId: JumpPointId;
  startTime: number;
  travelTime: number;
  fuelConsumed: number;
  progress: number;
  status: OperationStatus;
}

export interface JumpHistoryEntry {
  originSystemId: SystemId;
  targetSystemId: SystemId;
  jumpPointId: JumpPointId;
  startTime: number;
  travelTime: number;
  fuelConsumed: number;
  status: OperationStatus;
  completedAt: number;
}

export interface JumpEstimate {
  fuelCost: number;
  travelTime: number;
  preparationTime: number;
}

export type JumpRequirements =
  | { canJump: true; estimate: JumpEstimate; techRequirements: string[] }
  | { canJump: false; estimate: JumpEstimate | null; techRequirements: string[]; failureReasons: string[] };

export type JumpPhase = 'none' | 'preparing' | 'jumping';

export type JumpStatusView =
  | { phase: 'none' }
  | {
      phase: 'preparing';
      status: PreparationStatus;
      progress: number;
      remainingTime: number;
      jumpPointId: JumpPointId;
      targetSystemId: SystemId;
      fuelCost: number;
    }
  | {
      phase: 'jumping';
      status: OperationStatus;
      progress: number;
      remainingTime: number;
      jumpPointId: JumpPointId;
      originSystemId: SystemId;
      targetSystemId: SystemId;
      fuelConsumed: number;
    };

export type TravelEvent =
  | { kind: 'jump_executed'; jumpPointId: JumpPointId; targetSystemId: SystemId; travelTime: number; message: string }
  | { kind: 'preparation_failed'; jumpPointId: JumpPointId; message: string }
  | { kind: 'arrived'; originSystemId: SystemId; targetSystemId: SystemId; message: string }
  | { kind: 'arrival_failed'; targetSystemId: SystemId; message: string };

export interface AvailableJump {
  jumpPointId: JumpPointId;
  jumpPointName: string;
  targetSystemId: SystemId | null;
  status: JumpPointStatus;
  stability: number;
  sizeClass: number;
  requirements: JumpRequirements;
}

// --- Tunables ---

export interface JumpRules {
  detectionRangeAu: number;
  baseDetectionChance: number;
  hiddenDetectionFactor: number;
  minimumJumpFuel: number;
  jumpHistoryLimit: number;
}
