import {
  FleetStatus,
  type AvailableJump,
  type Fleet,
  type FleetId,
  type FleetRegistry,
  type JumpHistoryEntry,
  type JumpOperation,
  type JumpPhase,
  type JumpPoint,
  type JumpPreparation,
  type JumpRequirements,
  type JumpRules,
  type JumpStatusView,
  type ShipRegistry,
  type StarSystem,
  type SystemId,
  type SystemRegistry,
  type TechnologyQuery,
  type TravelEvent
} from '../../shared/types';
import {
  DEFAULT_HISTORY_QUERY_LIMIT,
  JUMP_ARRIVAL_OFFSET_KM,
  JUMP_TRAVEL_TIME_JITTER
} from '../../content/data/static';
import { logger } from '../../shared/devLogger';
import { fail, succeed, type CommandResult } from '../commandResult';
import { fleetLabel } from '../idUtils';
import { calculateTravelTime, findJumpPointInSystems, isAccessibleBy, isTravelEligible } from '../jumps/jumpPoint';
import { add, fromPolar, vec3, type Vec3 } from '../math/vec3';
import type { RNG } from '../rng';
import { calculateJumpRequirements } from './requirements';

/**
 * Per-fleet jump state machine:
 *   none -> preparing -> jumping -> none
 *   preparing -> failed | cancelled (back to none)
 * A fleet in transit cannot be recalled. Fuel leaves the tanks only when the
 * preparation turns into a transit.
 */
export class TravelEngine {
  private readonly preparations = new Map<FleetId, JumpPreparation>();
  private readonly operations = new Map<FleetId, JumpOperation>();
  private readonly history = new Map<FleetId, JumpHistoryEntry[]>();

  constructor(
    private readonly rng: RNG,
    private readonly rules: JumpRules
  ) {}

  getPhase(fleetId: FleetId): JumpPhase {
    if (this.preparations.has(fleetId)) return 'preparing';
    if (this.operations.has(fleetId)) return 'jumping';
    return 'none';
  }

  getPreparation(fleetId: FleetId): JumpPreparation | undefined {
    return this.preparations.get(fleetId);
  }

  calculateJumpRequirements(
    fleet: Fleet,
    jumpPoint: JumpPoint,
    ships: ShipRegistry,
    technologies: TechnologyQuery
  ): JumpRequirements {
    return calculateJumpRequirements(fleet, jumpPoint, ships, technologies, this.rules);
  }

  initiateJumpPreparation(
    fleet: Fleet,
    jumpPoint: JumpPoint,
    targetSystemId: SystemId,
    currentTime: number,
    ships: ShipRegistry,
    technologies: TechnologyQuery
  ): CommandResult {
    if (this.getPhase(fleet.id) !== 'none') {
      return fail('Fleet is already preparing for or executing a jump');
    }

    const requirements = this.calculateJumpRequirements(fleet, jumpPoint, ships, technologies);
    if (!requirements.canJump) {
      return fail(requirements.failureReasons.join('; '));
    }

    this.preparations.set(fleet.id, {
      fleetId: fleet.id,
      jumpPointId: jumpPoint.id,
      targetSystemId,
      startTime: currentTime,
      preparationTime: requirements.estimate.preparationTime,
      fuelCost: requirements.estimate.fuelCost,
      progress: 0,
      status: 'pending'
    });

    fleet.status = FleetStatus.FORMING_UP;
    fleet.currentOrders.push(`Preparing jump to ${targetSystemId}`);

    logger.info(
      `[JumpTravel] ${fleetLabel(fleet)} preparing jump to ${targetSystemId} via ${jumpPoint.name} ` +
        `(prep time: ${requirements.estimate.preparationTime.toFixed(1)}s).`
    );
    return succeed('Jump preparation initiated');
  }

  executeJump(fleet: Fleet, preparation: JumpPreparation, jumpPoint: JumpPoint, currentTime: number): CommandResult {
    if (preparation.progress < 1) {
      return fail('Fleet is not ready to jump');
    }
    if (!isTravelEligible(jumpPoint) || !isAccessibleBy(jumpPoint, fleet.factionId)) {
      return fail(`Jump point ${jumpPoint.name} is no longer usable`);
    }
    if (fleet.fuelRemaining < preparation.fuelCost) {
      return fail('Insufficient fuel to execute jump');
    }

    fleet.fuelRemaining = Math.max(0, fleet.fuelRemaining - preparation.fuelCost);

    const baseTravelTime = calculateTravelTime(jumpPoint, fleet.totalMass, fleet.shipIds.length);
    const travelTime = baseTravelTime * this.rng.range(1 - JUMP_TRAVEL_TIME_JITTER, 1 + JUMP_TRAVEL_TIME_JITTER);

    this.operations.set(fleet.id, {
      fleetId: fleet.id,
      originSystemId: fleet.systemId,
      targetSystemId: preparation.targetSystemId,
      jumpPointId: jumpPoint.id,
      startTime: currentTime,
      travelTime,
      fuelConsumed: preparation.fuelCost,
      progress: 0,
      status: 'jumping'
    });
    this.preparations.delete(fleet.id);

    fleet.status = FleetStatus.IN_TRANSIT;
    fleet.currentOrders.length = 0;
    fleet.currentOrders.push(`Jumping to ${preparation.targetSystemId}`);

    jumpPoint.trafficLevel += 1;
    jumpPoint.lastTransit = currentTime;

    logger.info(
      `[JumpTravel] ${fleetLabel(fleet)} jumped toward ${preparation.targetSystemId} ` +
        `(travel time: ${travelTime.toFixed(1)}s, fuel: ${preparation.fuelCost.toFixed(1)}).`
    );
    return succeed(`Jump executed - ETA: ${travelTime.toFixed(1)} seconds`);
  }

  /**
   * Preparation finished: either the fleet leaves through the point or the preparation
   * fails and the fleet stands down. There is no separate confirmation step.
   */
  completePreparation(
    fleet: Fleet,
    preparation: JumpPreparation,
    systems: Iterable<StarSystem>,
    currentTime: number
  ): TravelEvent {
    preparation.status = 'preparing';
    const located = findJumpPointInSystems(systems, preparation.jumpPointId);

    if (!located) {
      this.failPreparation(fleet, preparation);
      logger.warn(`[JumpTravel] ${fleetLabel(fleet)} lost jump point ${preparation.jumpPointId} during preparation.`);
      return { kind: 'preparation_failed', jumpPointId: preparation.jumpPointId, message: 'Jump point not found' };
    }

    const result = this.executeJump(fleet, preparation, located.jumpPoint, currentTime);
    if (!result.ok) {
      this.failPreparation(fleet, preparation);
      logger.warn(`[JumpTravel] ${fleetLabel(fleet)} could not execute jump: ${result.error}`);
      return {
        kind: 'preparation_failed',
        jumpPointId: preparation.jumpPointId,
        message: `Jump execution failed: ${result.error}`
      };
    }

    const operation = this.operations.get(fleet.id);
    return {
      kind: 'jump_executed',
      jumpPointId: preparation.jumpPointId,
      targetSystemId: preparation.targetSystemId,
      travelTime: operation?.travelTime ?? 0,
      message: result.message
    };
  }

  processJumpOperations(
    fleets: FleetRegistry,
    systems: SystemRegistry,
    currentTime: number,
    deltaSeconds: number
  ): Map<FleetId, TravelEvent> {
    const events = new Map<FleetId, TravelEvent>();
    const launchedThisTick = new Set<FleetId>();

    for (const [fleetId, preparation] of Array.from(this.preparations.entries())) {
      const fleet = fleets.get(fleetId);
      if (!fleet) {
        logger.debug(`[JumpTravel] Dropping preparation of ${fleetId}: fleet no longer exists.`);
        this.preparations.delete(fleetId);
        continue;
      }

      preparation.status = 'preparing';
      preparation.progress = Math.min(1, preparation.progress + deltaSeconds / preparation.preparationTime);
      if (preparation.progress < 1) continue;

      const event = this.completePreparation(fleet, preparation, systems.values(), currentTime);
      if (event.kind === 'jump_executed') launchedThisTick.add(fleetId);
      events.set(fleetId, event);
    }

    for (const [fleetId, operation] of Array.from(this.operations.entries())) {
      if (launchedThisTick.has(fleetId)) continue;

      const fleet = fleets.get(fleetId);
      if (!fleet) {
        logger.debug(`[JumpTravel] Dropping transit of ${fleetId}: fleet no longer exists.`);
        this.operations.delete(fleetId);
        continue;
      }

      operation.progress = Math.min(1, operation.progress + deltaSeconds / operation.travelTime);
      if (operation.progress < 1) continue;

      events.set(fleetId, this.completeTransit(fleet, operation, systems, currentTime));
    }

    return events;
  }

  cancelJumpOperation(fleetId: FleetId): CommandResult {
    const preparation = this.preparations.get(fleetId);
    if (preparation) {
      preparation.status = 'cancelled';
      this.preparations.delete(fleetId);
      return succeed('Jump preparation cancelled');
    }

    if (this.operations.has(fleetId)) {
      return fail('Cannot cancel jump in progress');
    }

    return fail('No active jump operation to cancel');
  }

  getJumpStatus(fleetId: FleetId): JumpStatusView {
    const preparation = this.preparations.get(fleetId);
    if (preparation) {
      return {
        phase: 'preparing',
        status: preparation.status,
        progress: preparation.progress,
        remainingTime: Math.max(0, preparation.preparationTime * (1 - preparation.progress)),
        jumpPointId: preparation.jumpPointId,
        targetSystemId: preparation.targetSystemId,
        fuelCost: preparation.fuelCost
      };
    }

    const operation = this.operations.get(fleetId);
    if (operation) {
      return {
        phase: 'jumping',
        status: operation.status,
        progress: operation.progress,
        remainingTime: Math.max(0, operation.travelTime * (1 - operation.progress)),
        jumpPointId: operation.jumpPointId,
        originSystemId: operation.originSystemId,
        targetSystemId: operation.targetSystemId,
        fuelConsumed: operation.fuelConsumed
      };
    }

    return { phase: 'none' };
  }

  getJumpHistory(fleetId: FleetId, limit: number = DEFAULT_HISTORY_QUERY_LIMIT): JumpHistoryEntry[] {
    const entries = this.history.get(fleetId) ?? [];
    return limit > 0 ? entries.slice(-limit) : [...entries];
  }

  /**
   * Every point the fleet's faction can use in the system, blocked or not, so callers can
   * show why a jump is unavailable.
   */
  getAvailableJumps(
    fleet: Fleet,
    system: StarSystem,
    ships: ShipRegistry,
    technologies: TechnologyQuery
  ): AvailableJump[] {
    return system.jumpPoints
      .filter(jumpPoint => isAccessibleBy(jumpPoint, fleet.factionId))
      .map(jumpPoint => ({
        jumpPointId: jumpPoint.id,
        jumpPointName: jumpPoint.name,
        targetSystemId: jumpPoint.connectsTo,
        status: jumpPoint.status,
        stability: jumpPoint.stability,
        sizeClass: jumpPoint.sizeClass,
        requirements: this.calculateJumpRequirements(fleet, jumpPoint, ships, technologies)
      }));
  }

  // --- internals ---

  private failPreparation(fleet: Fleet, preparation: JumpPreparation): void {
    preparation.status = 'failed';
    this.preparations.delete(fleet.id);
    fleet.status = FleetStatus.IDLE;
    fleet.currentOrders.length = 0;
  }

  private completeTransit(
    fleet: Fleet,
    operation: JumpOperation,
    systems: SystemRegistry,
    currentTime: number
  ): TravelEvent {
    const targetSystem = systems.get(operation.targetSystemId);
    let event: TravelEvent;

    if (targetSystem) {
      this.relocateFleet(fleet, operation, targetSystem);
      operation.status = 'completed';
      event = {
        kind: 'arrived',
        originSystemId: operation.originSystemId,
        targetSystemId: operation.targetSystemId,
        message: `Jump to ${operation.targetSystemId} completed`
      };
      logger.info(
        `[JumpTravel] ${fleetLabel(fleet)} arrived in ${targetSystem.name} from ${operation.originSystemId}.`
      );
    } else {
      operation.status = 'failed';
      fleet.status = FleetStatus.IDLE;
      fleet.currentOrders.length = 0;
      event = { kind: 'arrival_failed', targetSystemId: operation.targetSystemId, message: 'Jump completion failed' };
      logger.error(`[JumpTravel] Target system ${operation.targetSystemId} not found for ${fleetLabel(fleet)}.`);
    }

    this.recordHistory(operation, currentTime);
    this.operations.delete(fleet.id);
    return event;
  }

  private relocateFleet(fleet: Fleet, operation: JumpOperation, targetSystem: StarSystem): void {
    const reciprocal = targetSystem.jumpPoints.find(point => point.connectsTo === operation.originSystemId);
    const anchor: Vec3 = reciprocal ? reciprocal.position : vec3();
    const offsetKm = reciprocal ? JUMP_ARRIVAL_OFFSET_KM : this.rng.range(0, JUMP_ARRIVAL_OFFSET_KM);

    fleet.systemId = targetSystem.id;
    fleet.position = add(anchor, fromPolar(offsetKm, this.rng.angle()));
    fleet.velocity = vec3();
    fleet.destination = null;
    fleet.estimatedArrival = null;
    fleet.status = FleetStatus.IDLE;
    fleet.currentOrders.length = 0;
  }

  private recordHistory(operation: JumpOperation, currentTime: number): void {
    const entries = this.history.get(operation.fleetId) ?? [];
    entries.push({
      originSystemId: operation.originSystemId,
      targetSystemId: operation.targetSystemId,
      jumpPointId: operation.jumpPointId,
      startTime: operation.startTime,
      travelTime: operation.travelTime,
      fuelConsumed: operation.fuelConsumed,
      status: operation.status,
      completedAt: currentTime
    });

    if (entries.length > this.rules.jumpHistoryLimit) {
      entries.splice(0, entries.length - this.rules.jumpHistoryLimit);
    }
    this.history.set(operation.fleetId, entries);
  }
}
