import {
  FleetStatus,
  type AvailableJump,
  type ExplorationStatus,
  type FactionId,
  type Fleet,
  type FleetId,
  type FleetRegistry,
  type JumpHistoryEntry,
  type JumpPoint,
  type JumpPointDetection,
  type JumpPointId,
  type JumpRules,
  type JumpStatusView,
  type MissionKind,
  type MissionReport,
  type ShipRegistry,
  type StarSystem,
  type SystemId,
  type SystemRegistry,
  type TechnologyQuery,
  type TravelEvent
} from '../shared/types';
import { DEFAULT_HISTORY_QUERY_LIMIT, DEFAULT_JUMP_RULES, DEFAULT_REACH_HOPS } from '../content/data/static';
import { logger } from '../shared/devLogger';
import { sortedKeys } from '../shared/sorting';
import { fail, succeed, type CommandResult } from './commandResult';
import { ExplorationEngine, type MissionTarget } from './exploration/explorationEngine';
import { createFactionNetworkKnowledge, type FactionNetworkKnowledge } from './factionKnowledge';
import { fleetLabel } from './idUtils';
import { assignJumpDestination, findJumpPoint, isAccessibleBy } from './jumps/jumpPoint';
import { JumpNetwork } from './network/jumpNetwork';
import { RNG } from './rng';
import { TravelEngine } from './travel/travelEngine';
import { generateEnhancedJumpNetwork, type JumpNetworkGenerationSummary } from './worldgen/jumpNetworkGenerator';

export interface JumpPointEngineOptions {
  seed?: number;
  rng?: RNG;
  rules?: Partial<JumpRules>;
}

export interface JumpPointDiscovery {
  source: 'mission' | 'passive';
  fleetId: FleetId;
  factionId: FactionId;
  systemId: SystemId;
  jumpPointIds: JumpPointId[];
}

export interface TurnUpdateResult {
  explorationResults: Map<FleetId, MissionReport>;
  travelResults: Map<FleetId, TravelEvent>;
  discoveries: JumpPointDiscovery[];
}

export type FleetActivePhase = 'none' | 'mission' | 'preparing' | 'jumping';

export interface KnownConnection {
  jumpPointId: JumpPointId;
  jumpPointName: string;
  targetSystemId: SystemId | null;
  status: JumpPoint['status'];
  surveyLevel: number;
}

export interface FactionJumpNetwork {
  knownSystems: SystemId[];
  knownJumpPoints: JumpPointId[];
  systemConnections: Record<SystemId, KnownConnection[]>;
  reachableSystems: Record<SystemId, Record<SystemId, number>>;
  statistics: {
    explorationMissions: number;
    totalJumps: number;
    discoveredJumpPoints: number;
  };
}

export interface AvailableJumpDetails extends AvailableJump {
  targetSystemName?: string;
  targetExplorationStatus?: ExplorationStatus;
}

// Fleets in these states sweep their surroundings every tick
const PASSIVE_DETECTION_STATUSES: ReadonlySet<FleetStatus> = new Set([
  FleetStatus.MOVING,
  FleetStatus.IN_TRANSIT,
  FleetStatus.EXPLORING
]);

/**
 * Facade over exploration, travel and the network graph. The simulation calls
 * `processTurnUpdate` once per tick; UI and AI go through the commands and queries.
 */
export class JumpPointEngine {
  readonly rng: RNG;
  readonly rules: JumpRules;
  readonly exploration: ExplorationEngine;
  readonly travel: TravelEngine;
  private readonly network = new JumpNetwork();
  private networkStale = true;
  private networkSystemIds = '';
  private readonly factionKnowledge = new Map<FactionId, FactionNetworkKnowledge>();

  constructor(options: JumpPointEngineOptions = {}) {
    this.rng = options.rng ?? new RNG(options.seed ?? Date.now());
    this.rules = { ...DEFAULT_JUMP_RULES, ...options.rules };
    this.exploration = new ExplorationEngine(this.rng, this.rules);
    this.travel = new TravelEngine(this.rng, this.rules);
  }

  // --- TICK ---

  processTurnUpdate(
    fleets: FleetRegistry,
    systems: SystemRegistry,
    _ships: ShipRegistry,
    currentTime: number,
    deltaSeconds: number
  ): TurnUpdateResult {
    const discoveries: JumpPointDiscovery[] = [];

    const explorationResults = this.exploration.processExplorationMissions(fleets, systems, currentTime, deltaSeconds);
    explorationResults.forEach((report, fleetId) => {
      const fleet = fleets.get(fleetId);
      if (!fleet || report.detections.length === 0) return;
      discoveries.push(this.recordDetections('mission', fleet, report.systemId, report.detections, systems));
    });

    const travelResults = this.travel.processJumpOperations(fleets, systems, currentTime, deltaSeconds);
    travelResults.forEach((event, fleetId) => {
      const fleet = fleets.get(fleetId);
      if (!fleet || event.kind !== 'arrived') return;
      this.getKnowledge(fleet.factionId).knownSystems.add(event.targetSystemId);
    });

    fleets.forEach(fleet => {
      if (!PASSIVE_DETECTION_STATUSES.has(fleet.status)) return;
      const system = systems.get(fleet.systemId);
      if (!system) return;

      const detections = this.exploration.attemptJumpPointDetection(fleet, system, fleet.factionId, currentTime);
      if (detections.length > 0) {
        discoveries.push(this.recordDetections('passive', fleet, system.id, detections, systems));
      }
    });

    return { explorationResults, travelResults, discoveries };
  }

  // --- COMMANDS ---

  startExplorationMission(
    fleet: Fleet,
    system: StarSystem,
    kind: MissionKind = 'explore',
    currentTime: number = 0,
    target: MissionTarget = {}
  ): CommandResult {
    if (this.travel.getPhase(fleet.id) !== 'none') {
      return fail('Fleet is committed to a jump');
    }

    const result = this.exploration.startExplorationMission(fleet, system, kind, currentTime, target);
    if (result.ok) {
      const knowledge = this.getKnowledge(fleet.factionId);
      knowledge.explorationMissions++;
      knowledge.knownSystems.add(system.id);
    }
    return result;
  }

  surveyJumpPoint(fleet: Fleet, jumpPointId: JumpPointId, systems: SystemRegistry, currentTime: number): CommandResult {
    const system = systems.get(fleet.systemId);
    if (!system) return fail('Fleet system not found');

    const jumpPoint = findJumpPoint(system, jumpPointId);
    if (!jumpPoint) return fail('Jump point not found in current system');

    if (this.travel.getPhase(fleet.id) !== 'none') {
      return fail('Fleet is committed to a jump');
    }

    const result = this.exploration.surveyJumpPoint(fleet, system, jumpPoint, fleet.factionId, currentTime);
    if (!result.ok) return result;

    const knowledge = this.getKnowledge(fleet.factionId);
    knowledge.explorationMissions++;
    knowledge.knownSystems.add(system.id);
    knowledge.knownJumpPoints.add(jumpPoint.id);
    return succeed(`Started survey of jump point ${jumpPoint.name}`);
  }

  initiateFleetJump(
    fleet: Fleet,
    jumpPointId: JumpPointId,
    systems: SystemRegistry,
    ships: ShipRegistry,
    technologies: TechnologyQuery,
    currentTime: number
  ): CommandResult {
    const currentSystem = systems.get(fleet.systemId);
    const jumpPoint = currentSystem ? findJumpPoint(currentSystem, jumpPointId) : undefined;
    if (!jumpPoint) return fail('Jump point not found');

    const targetSystemId = jumpPoint.connectsTo;
    if (!targetSystemId) return fail('Jump point destination not set');
    if (!systems.has(targetSystemId)) return fail('Target system does not exist');

    if (this.exploration.hasActiveMission(fleet.id)) {
      return fail('Fleet is busy with an exploration mission');
    }

    const result = this.travel.initiateJumpPreparation(fleet, jumpPoint, targetSystemId, currentTime, ships, technologies);
    if (result.ok) {
      const knowledge = this.getKnowledge(fleet.factionId);
      knowledge.totalJumps++;
      knowledge.knownSystems.add(fleet.systemId);
      knowledge.knownSystems.add(targetSystemId);
      knowledge.knownJumpPoints.add(jumpPointId);
    }
    return result;
  }

  cancelFleetJump(fleetId: FleetId, fleets: FleetRegistry): CommandResult {
    const result = this.travel.cancelJumpOperation(fleetId);
    const fleet = fleets.get(fleetId);
    if (result.ok && fleet && fleet.status === FleetStatus.FORMING_UP) {
      fleet.status = FleetStatus.IDLE;
      fleet.currentOrders.length = 0;
    }
    return result;
  }

  // --- QUERIES ---

  getActivePhase(fleetId: FleetId): FleetActivePhase {
    if (this.exploration.hasActiveMission(fleetId)) return 'mission';
    return this.travel.getPhase(fleetId);
  }

  getAvailableJumpsForFleet(
    fleet: Fleet,
    systems: SystemRegistry,
    ships: ShipRegistry,
    technologies: TechnologyQuery
  ): AvailableJumpDetails[] {
    const currentSystem = systems.get(fleet.systemId);
    if (!currentSystem) return [];

    return this.travel.getAvailableJumps(fleet, currentSystem, ships, technologies).map(jump => {
      const targetSystem = jump.targetSystemId ? systems.get(jump.targetSystemId) : undefined;
      if (!targetSystem) return jump;
      return {
        ...jump,
        targetSystemName: targetSystem.name,
        targetExplorationStatus: this.exploration.getExplorationStatus(targetSystem.id, fleet.factionId)
      };
    });
  }

  getFleetJumpStatus(fleetId: FleetId): JumpStatusView {
    return this.travel.getJumpStatus(fleetId);
  }

  getJumpHistory(fleetId: FleetId, limit: number = DEFAULT_HISTORY_QUERY_LIMIT): JumpHistoryEntry[] {
    return this.travel.getJumpHistory(fleetId, Math.min(limit, this.rules.jumpHistoryLimit));
  }

  getSystemExplorationStatus(systemId: SystemId, factionId: FactionId): ExplorationStatus {
    return this.exploration.getExplorationStatus(systemId, factionId);
  }

  /**
   * The network as one faction knows it: only discovered, accessible points between
   * systems the faction has seen.
   */
  getFactionJumpNetwork(
    factionId: FactionId,
    systems: SystemRegistry,
    maxJumps: number = DEFAULT_REACH_HOPS
  ): FactionJumpNetwork {
    const knowledge = this.getKnowledge(factionId);
    const knownSystems = Array.from(knowledge.knownSystems).filter(systemId => systems.has(systemId));
    const systemConnections: Record<SystemId, KnownConnection[]> = {};

    const isKnownLink = (jumpPoint: JumpPoint): boolean =>
      knowledge.knownJumpPoints.has(jumpPoint.id) && isAccessibleBy(jumpPoint, factionId);

    const knownSystemList: StarSystem[] = [];
    for (const systemId of knownSystems) {
      const system = systems.get(systemId);
      if (!system) continue;
      knownSystemList.push(system);
      systemConnections[systemId] = system.jumpPoints.filter(isKnownLink).map(jumpPoint => ({
        jumpPointId: jumpPoint.id,
        jumpPointName: jumpPoint.name,
        targetSystemId: jumpPoint.connectsTo,
        status: jumpPoint.status,
        surveyLevel: jumpPoint.surveyLevel
      }));
    }

    const factionNetwork = new JumpNetwork();
    factionNetwork.buildNetworkGraph(knownSystemList, isKnownLink);

    const reachableSystems: Record<SystemId, Record<SystemId, number>> = {};
    for (const systemId of knownSystems) {
      reachableSystems[systemId] = factionNetwork.getReachableSystems(systemId, maxJumps);
    }

    return {
      knownSystems,
      knownJumpPoints: Array.from(knowledge.knownJumpPoints),
      systemConnections,
      reachableSystems,
      statistics: {
        explorationMissions: knowledge.explorationMissions,
        totalJumps: knowledge.totalJumps,
        discoveredJumpPoints: knowledge.discoveredJumpPoints
      }
    };
  }

  // --- NETWORK ---

  updateNetwork(systems: SystemRegistry): void {
    this.network.buildNetworkGraph(systems.values());
    this.networkStale = false;
    this.networkSystemIds = sortedKeys(systems).join(',');
    logger.debug(`[JumpPointEngine] Jump network rebuilt with ${systems.size} systems.`);
  }

  generateEnhancedJumpNetwork(systems: StarSystem[], connectivityLevel?: number): JumpNetworkGenerationSummary {
    const summary = generateEnhancedJumpNetwork(systems, this.rng, connectivityLevel);
    this.updateNetwork(new Map(systems.map(system => [system.id, system])));
    return summary;
  }

  findRoute(originId: SystemId, targetId: SystemId, systems: SystemRegistry): SystemId[] {
    this.ensureNetwork(systems);
    return this.network.findShortestPath(originId, targetId);
  }

  getReachableSystems(
    originId: SystemId,
    systems: SystemRegistry,
    maxJumps: number = DEFAULT_REACH_HOPS
  ): Record<SystemId, number> {
    this.ensureNetwork(systems);
    return this.network.getReachableSystems(originId, maxJumps);
  }

  invalidateNetwork(): void {
    this.networkStale = true;
  }

  // --- internals ---

  private ensureNetwork(systems: SystemRegistry): void {
    if (this.networkStale || this.networkSystemIds !== sortedKeys(systems).join(',')) {
      this.updateNetwork(systems);
    }
  }

  private getKnowledge(factionId: FactionId): FactionNetworkKnowledge {
    let knowledge = this.factionKnowledge.get(factionId);
    if (!knowledge) {
      knowledge = createFactionNetworkKnowledge();
      this.factionKnowledge.set(factionId, knowledge);
    }
    return knowledge;
  }

  private recordDetections(
    source: JumpPointDiscovery['source'],
    fleet: Fleet,
    systemId: SystemId,
    detections: JumpPointDetection[],
    systems: SystemRegistry
  ): JumpPointDiscovery {
    const knowledge = this.getKnowledge(fleet.factionId);
    knowledge.knownSystems.add(systemId);
    knowledge.discoveredJumpPoints += detections.length;

    for (const { jumpPoint, revealedFromHidden } of detections) {
      knowledge.knownJumpPoints.add(jumpPoint.id);
      if (revealedFromHidden && jumpPoint.connectsTo === null) {
        this.resolveHiddenDestination(jumpPoint, systemId, systems);
      }
    }

    logger.debug(`[JumpPointEngine] ${fleetLabel(fleet)} added ${detections.length} jump point(s) to ${fleet.factionId} charts.`);

    return {
      source,
      fleetId: fleet.id,
      factionId: fleet.factionId,
      systemId,
      jumpPointIds: detections.map(({ jumpPoint }) => jumpPoint.id)
    };
  }

  // A revealed hidden point leads somewhere other than its own system
  private resolveHiddenDestination(jumpPoint: JumpPoint, systemId: SystemId, systems: SystemRegistry): void {
    const candidates = sortedKeys(systems).filter(candidateId => candidateId !== systemId);
    const targetId = this.rng.pick(candidates);
    if (!targetId) {
      logger.warn(`[JumpPointEngine] No destination available for revealed jump point ${jumpPoint.id}.`);
      return;
    }

    assignJumpDestination(jumpPoint, targetId);
    this.invalidateNetwork();
    logger.info(`[JumpPointEngine] Revealed jump point ${jumpPoint.name} leads to ${targetId}.`);
  }
}
