import {
  ExplorationResult,
  FleetStatus,
  JumpPointStatus,
  type ExplorationMission,
  type ExplorationStatus,
  type FactionId,
  type FactionSystemKnowledge,
  type Fleet,
  type FleetId,
  type FleetRegistry,
  type JumpPoint,
  type JumpPointDetection,
  type JumpPointId,
  type JumpRules,
  type MissionKind,
  type MissionReport,
  type StarSystem,
  type SystemExplorationRecord,
  type SystemId,
  type SystemRegistry
} from '../../shared/types';
import {
  AU_TO_KM,
  MISSION_ANOMALY_CHANCE,
  MISSION_ANOMALY_THRESHOLD,
  MISSION_BASE_TIMES,
  MISSION_DETECTION_CHANCE,
  MISSION_DETECTION_THRESHOLD,
  MISSION_MIN_DURATION,
  SURVEY_BASE_TIME,
  SURVEY_LEVEL_DETECTED,
  SURVEY_LEVEL_MAX,
  SURVEY_LEVEL_TRAVEL
} from '../../content/data/static';
import { logger } from '../../shared/devLogger';
import { fail, succeed, type CommandResult } from '../commandResult';
import { fleetLabel } from '../idUtils';
import { clone, dist, type Vec3 } from '../math/vec3';
import type { RNG } from '../rng';
import { calculateDetectionProbability, calculateFleetSurveyCapability, calculateSystemDifficulty } from './detection';
import { generateHiddenJumpPoints } from './hiddenJumpPoints';

export interface MissionTarget {
  position?: Vec3;
  jumpPointId?: JumpPointId;
}

const EXPLORE_PROGRESS_GAIN = { base: 0.2, perProgress: 0.3 };
const SURVEY_COMPLETENESS_GAIN = { base: 0.15, perProgress: 0.25 };

const createFactionKnowledge = (): FactionSystemKnowledge => ({
  explorationProgress: 0,
  surveyCompleteness: 0,
  discoveredJumpPointIds: new Set<JumpPointId>(),
  lastExploration: null
});

const fleetStatusForMission = (kind: MissionKind): FleetStatus =>
  kind === 'explore' ? FleetStatus.EXPLORING : FleetStatus.SURVEYING;

/**
 * Owns exploration missions, per-(system, faction) knowledge and the pools of hidden
 * jump points. Fleets and systems are borrowed from the caller on every call; only ids
 * are kept between ticks.
 */
export class ExplorationEngine {
  private readonly missions = new Map<FleetId, ExplorationMission>();
  private readonly systemRecords = new Map<SystemId, SystemExplorationRecord>();
  private readonly hiddenPools = new Map<SystemId, JumpPoint[]>();

  constructor(
    private readonly rng: RNG,
    private readonly rules: JumpRules
  ) {}

  initializeSystemExploration(system: StarSystem, factionId: FactionId): FactionSystemKnowledge {
    let record = this.systemRecords.get(system.id);
    if (!record) {
      record = {
        difficulty: calculateSystemDifficulty(system),
        totalExplorationTime: 0,
        lastExploration: null,
        factions: new Map()
      };
      this.systemRecords.set(system.id, record);

      if (!this.hiddenPools.has(system.id)) {
        const hidden = generateHiddenJumpPoints(system, this.rng);
        if (hidden.length > 0) {
          this.hiddenPools.set(system.id, hidden);
          logger.debug(`[Exploration] ${system.name} holds ${hidden.length} hidden jump point(s).`);
        }
      }
    }

    let knowledge = record.factions.get(factionId);
    if (!knowledge) {
      knowledge = createFactionKnowledge();
      record.factions.set(factionId, knowledge);
    }
    return knowledge;
  }

  hasActiveMission(fleetId: FleetId): boolean {
    return this.missions.has(fleetId);
  }

  getMission(fleetId: FleetId): ExplorationMission | undefined {
    return this.missions.get(fleetId);
  }

  getDiscoveredJumpPointIds(systemId: SystemId, factionId: FactionId): JumpPointId[] {
    const knowledge = this.systemRecords.get(systemId)?.factions.get(factionId);
    return knowledge ? Array.from(knowledge.discoveredJumpPointIds) : [];
  }

  startExplorationMission(
    fleet: Fleet,
    system: StarSystem,
    kind: MissionKind,
    currentTime: number,
    target: MissionTarget = {}
  ): CommandResult {
    if (this.missions.has(fleet.id)) {
      logger.warn(`[Exploration] ${fleetLabel(fleet)} already has an active exploration mission.`);
      return fail('Fleet already has an active exploration mission');
    }

    this.initializeSystemExploration(system, fleet.factionId);
    const duration = this.calculateMissionDuration(fleet, kind, system);
    return this.registerMission(fleet, system, kind, currentTime, duration, target);
  }

  surveyJumpPoint(
    fleet: Fleet,
    system: StarSystem,
    jumpPoint: JumpPoint,
    factionId: FactionId,
    currentTime: number
  ): CommandResult {
    if (jumpPoint.surveyLevel >= SURVEY_LEVEL_MAX) {
      return fail('Jump point is already fully surveyed');
    }

    const surveyRangeKm = this.rules.detectionRangeAu * AU_TO_KM * 0.5;
    if (dist(fleet.position, jumpPoint.position) > surveyRangeKm) {
      return fail('Fleet is out of survey range of the jump point');
    }

    if (this.missions.has(fleet.id)) {
      return fail('Fleet already has an active exploration mission');
    }

    this.initializeSystemExploration(system, factionId);
    const duration = Math.max(
      MISSION_MIN_DURATION,
      (SURVEY_BASE_TIME * jumpPoint.explorationDifficulty) / calculateFleetSurveyCapability(fleet)
    );

    return this.registerMission(fleet, system, 'survey', currentTime, duration, {
      position: jumpPoint.position,
      jumpPointId: jumpPoint.id
    });
  }

  processExplorationMissions(
    fleets: FleetRegistry,
    systems: SystemRegistry,
    currentTime: number,
    deltaSeconds: number
  ): Map<FleetId, MissionReport> {
    const reports = new Map<FleetId, MissionReport>();

    for (const [fleetId, mission] of Array.from(this.missions.entries())) {
      const fleet = fleets.get(fleetId);
      const system = systems.get(mission.systemId);

      if (!fleet || !system) {
        logger.debug(`[Exploration] Dropping mission of ${fleetId}: fleet or system no longer exists.`);
        this.missions.delete(fleetId);
        continue;
      }

      mission.progress = Math.min(1, mission.progress + deltaSeconds / mission.duration);

      const { results, detections } = this.processMissionStep(mission, fleet, system, currentTime);
      mission.results.push(...results);

      if (mission.progress >= 1) {
        mission.completed = true;
        if (mission.results.length === 0) {
          results.push(ExplorationResult.NO_DISCOVERY);
          mission.results.push(ExplorationResult.NO_DISCOVERY);
        }
        this.completeMission(mission, fleet, system, currentTime);
        this.missions.delete(fleetId);
      }

      if (results.length > 0 || mission.completed) {
        reports.set(fleetId, {
          systemId: system.id,
          kind: mission.kind,
          progress: mission.progress,
          completed: mission.completed,
          results,
          detections
        });
      }
    }

    return reports;
  }

  attemptJumpPointDetection(
    fleet: Fleet,
    system: StarSystem,
    factionId: FactionId,
    currentTime: number
  ): JumpPointDetection[] {
    const knowledge = this.initializeSystemExploration(system, factionId);
    const detectionRangeKm = this.rules.detectionRangeAu * AU_TO_KM;
    const detected: JumpPointDetection[] = [];

    for (const jumpPoint of [...system.jumpPoints]) {
      if (knowledge.discoveredJumpPointIds.has(jumpPoint.id)) continue;

      const distanceKm = dist(fleet.position, jumpPoint.position);
      if (distanceKm > detectionRangeKm) continue;

      const probability = this.detectionProbability(fleet, jumpPoint, distanceKm, knowledge);
      if (this.rng.chance(probability)) {
        this.discoverJumpPoint(jumpPoint, knowledge, factionId, currentTime);
        detected.push({ jumpPoint, revealedFromHidden: false });
        logger.info(`[Exploration] ${fleetLabel(fleet)} detected jump point ${jumpPoint.name} in ${system.name}.`);
      }
    }

    const hiddenPool = this.hiddenPools.get(system.id) ?? [];
    for (const hiddenPoint of [...hiddenPool]) {
      const distanceKm = dist(fleet.position, hiddenPoint.position);
      if (distanceKm > detectionRangeKm) continue;

      const probability =
        this.detectionProbability(fleet, hiddenPoint, distanceKm, knowledge) * this.rules.hiddenDetectionFactor;
      if (this.rng.chance(probability)) {
        hiddenPool.splice(hiddenPool.indexOf(hiddenPoint), 1);
        this.discoverJumpPoint(hiddenPoint, knowledge, factionId, currentTime);
        system.jumpPoints.push(hiddenPoint);
        detected.push({ jumpPoint: hiddenPoint, revealedFromHidden: true });
        logger.info(`[Exploration] ${fleetLabel(fleet)} uncovered hidden jump point ${hiddenPoint.name} in ${system.name}.`);
      }
    }

    if (hiddenPool.length === 0) {
      this.hiddenPools.delete(system.id);
    }

    return detected;
  }

  getExplorationStatus(systemId: SystemId, factionId: FactionId): ExplorationStatus {
    const record = this.systemRecords.get(systemId);
    const knowledge = record?.factions.get(factionId);

    return {
      explorationProgress: knowledge?.explorationProgress ?? 0,
      surveyCompleteness: knowledge?.surveyCompleteness ?? 0,
      discoveredJumpPoints: knowledge?.discoveredJumpPointIds.size ?? 0,
      discoveredJumpPointIds: knowledge ? Array.from(knowledge.discoveredJumpPointIds) : [],
      lastExploration: knowledge?.lastExploration ?? null,
      systemDifficulty: record?.difficulty ?? 1,
      potentialDiscoveries: this.hiddenPools.get(systemId)?.length ?? 0
    };
  }

  // --- internals ---

  private registerMission(
    fleet: Fleet,
    system: StarSystem,
    kind: MissionKind,
    currentTime: number,
    duration: number,
    target: MissionTarget
  ): CommandResult {
    const mission: ExplorationMission = {
      fleetId: fleet.id,
      systemId: system.id,
      kind,
      startTime: currentTime,
      duration,
      targetPosition: clone(target.position ?? fleet.position),
      targetJumpPointId: target.jumpPointId ?? null,
      progress: 0,
      completed: false,
      results: []
    };
    this.missions.set(fleet.id, mission);

    fleet.status = fleetStatusForMission(kind);
    fleet.currentOrders.push(`Conducting ${kind} mission`);

    logger.info(
      `[Exploration] ${fleetLabel(fleet)} started ${kind} mission in ${system.name} (duration: ${duration.toFixed(1)}s).`
    );
    return succeed(`Started ${kind} mission in ${system.name}`);
  }

  private calculateMissionDuration(fleet: Fleet, kind: MissionKind, system: StarSystem): number {
    const difficulty = this.systemRecords.get(system.id)?.difficulty ?? 1;
    const duration = (MISSION_BASE_TIMES[kind] * difficulty) / calculateFleetSurveyCapability(fleet);
    return Math.max(MISSION_MIN_DURATION, duration);
  }

  private processMissionStep(
    mission: ExplorationMission,
    fleet: Fleet,
    system: StarSystem,
    currentTime: number
  ): { results: ExplorationResult[]; detections: JumpPointDetection[] } {
    const results: ExplorationResult[] = [];
    let detections: JumpPointDetection[] = [];

    if (mission.progress > MISSION_DETECTION_THRESHOLD && this.rng.chance(MISSION_DETECTION_CHANCE)) {
      detections = this.attemptJumpPointDetection(fleet, system, fleet.factionId, currentTime);
      for (const { jumpPoint } of detections) {
        results.push(
          jumpPoint.surveyLevel >= SURVEY_LEVEL_TRAVEL
            ? ExplorationResult.JUMP_POINT_SURVEYED
            : ExplorationResult.JUMP_POINT_DETECTED
        );
      }
    }

    if (mission.progress > MISSION_ANOMALY_THRESHOLD && this.rng.chance(MISSION_ANOMALY_CHANCE)) {
      results.push(ExplorationResult.ANOMALY_DETECTED);
    }

    return { results, detections };
  }

  private completeMission(mission: ExplorationMission, fleet: Fleet, system: StarSystem, currentTime: number): void {
    const knowledge = this.initializeSystemExploration(system, fleet.factionId);
    const record = this.systemRecords.get(system.id);

    if (mission.kind === 'explore' || mission.kind === 'deep_scan') {
      const gain = EXPLORE_PROGRESS_GAIN.base + mission.progress * EXPLORE_PROGRESS_GAIN.perProgress;
      knowledge.explorationProgress = Math.min(1, knowledge.explorationProgress + gain);
    }

    if (mission.kind === 'survey' || mission.kind === 'deep_scan') {
      const gain = SURVEY_COMPLETENESS_GAIN.base + mission.progress * SURVEY_COMPLETENESS_GAIN.perProgress;
      knowledge.surveyCompleteness = Math.min(1, knowledge.surveyCompleteness + gain);
    }

    if (mission.targetJumpPointId) {
      const target = system.jumpPoints.find(point => point.id === mission.targetJumpPointId);
      if (target && target.surveyLevel < SURVEY_LEVEL_MAX) {
        if (target.surveyLevel < SURVEY_LEVEL_DETECTED) {
          this.discoverJumpPoint(target, knowledge, fleet.factionId, currentTime);
        } else {
          target.surveyLevel = Math.min(SURVEY_LEVEL_MAX, target.surveyLevel + 1);
          if (target.surveyLevel >= SURVEY_LEVEL_TRAVEL) {
            target.status = JumpPointStatus.ACTIVE;
          }
          knowledge.discoveredJumpPointIds.add(target.id);
        }
        target.lastSurveyed = currentTime;
      }
    }

    knowledge.lastExploration = currentTime;
    if (record) {
      record.lastExploration = currentTime;
      record.totalExplorationTime += mission.duration;
    }

    fleet.status = FleetStatus.IDLE;
    fleet.currentOrders.length = 0;

    logger.info(`[Exploration] ${fleetLabel(fleet)} completed ${mission.kind} mission in ${system.name}.`);
  }

  private detectionProbability(
    fleet: Fleet,
    jumpPoint: JumpPoint,
    distanceKm: number,
    knowledge: FactionSystemKnowledge
  ): number {
    return calculateDetectionProbability({
      baseChance: this.rules.baseDetectionChance,
      distanceAu: distanceKm / AU_TO_KM,
      detectionRangeAu: this.rules.detectionRangeAu,
      fleetCapability: calculateFleetSurveyCapability(fleet),
      explorationDifficulty: jumpPoint.explorationDifficulty,
      explorationProgress: knowledge.explorationProgress
    });
  }

  private discoverJumpPoint(
    jumpPoint: JumpPoint,
    knowledge: FactionSystemKnowledge,
    factionId: FactionId,
    currentTime: number
  ): void {
    knowledge.discoveredJumpPointIds.add(jumpPoint.id);

    // Only the first discoverer characterises the point; later factions just learn of it.
    if (jumpPoint.discoveredBy === null) {
      jumpPoint.discoveredBy = factionId;
      jumpPoint.discoveryTime = currentTime;
    }
    if (jumpPoint.surveyLevel < SURVEY_LEVEL_DETECTED) {
      jumpPoint.surveyLevel = SURVEY_LEVEL_DETECTED;
      if (jumpPoint.status === JumpPointStatus.UNKNOWN) {
        jumpPoint.status = JumpPointStatus.DETECTED;
      }
    }
  }
}
