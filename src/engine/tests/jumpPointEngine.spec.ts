import assert from 'node:assert';
import { FleetStatus, JumpPointStatus, type StarSystem } from '../../shared/types';
import { JumpPointEngine } from '../JumpPointEngine';
import { vec3 } from '../math/vec3';
import {
  createActivePoint,
  createFleet,
  createShip,
  createSystem,
  FixedRng,
  noTechnologies,
  registry
} from './fixtures/jumpFixtures';

interface TestCase {
  name: string;
  run: () => void;
}

const ships = registry(createShip());

const createCorridor = () => {
  const outbound = createActivePoint({ id: 'jp_ab', connectsTo: 'sys_b' });
  const inbound = createActivePoint({ id: 'jp_ba', connectsTo: 'sys_a', position: vec3(1_000_000, 0, 0) });
  const alpha = createSystem({ jumpPoints: [outbound] });
  const beta = createSystem({ id: 'sys_b', name: 'Beta', jumpPoints: [inbound] });
  return { alpha, beta, outbound, inbound, systems: registry(alpha, beta) };
};

const tests: TestCase[] = [
  {
    name: 'Survey, jump and arrival update the faction charts',
    run: () => {
      const engine = new JumpPointEngine({ rng: new FixedRng(0.999) });
      const { alpha, outbound, systems } = createCorridor();
      outbound.status = JumpPointStatus.DETECTED;
      outbound.surveyLevel = 1;
      const fleet = createFleet();
      const fleets = registry(fleet);

      assert.deepStrictEqual(engine.surveyJumpPoint(fleet, 'jp_ab', systems, 0), {
        ok: true,
        message: 'Started survey of jump point JP-TST'
      });
      assert.strictEqual(engine.getActivePhase(fleet.id), 'mission');
      assert.deepStrictEqual(engine.initiateFleetJump(fleet, 'jp_ab', systems, ships, noTechnologies, 0), {
        ok: false,
        error: 'Fleet is busy with an exploration mission'
      });

      const surveyTick = engine.processTurnUpdate(fleets, systems, ships, 7000, 7000);
      assert.strictEqual(surveyTick.explorationResults.get(fleet.id)?.completed, true);
      assert.deepStrictEqual(surveyTick.discoveries, []);
      assert.strictEqual(outbound.status, JumpPointStatus.ACTIVE);
      assert.strictEqual(outbound.surveyLevel, 2);

      assert.deepStrictEqual(engine.initiateFleetJump(fleet, 'jp_ab', systems, ships, noTechnologies, 7000), {
        ok: true,
        message: 'Jump preparation initiated'
      });
      assert.strictEqual(engine.getActivePhase(fleet.id), 'preparing');
      assert.deepStrictEqual(engine.startExplorationMission(fleet, alpha, 'explore', 7000), {
        ok: false,
        error: 'Fleet is committed to a jump'
      });

      const launchTick = engine.processTurnUpdate(fleets, systems, ships, 7060, 60);
      assert.strictEqual(launchTick.travelResults.get(fleet.id)?.kind, 'jump_executed');
      assert.strictEqual(engine.getFleetJumpStatus(fleet.id).phase, 'jumping');

      const arrivalTick = engine.processTurnUpdate(fleets, systems, ships, 7120, 60);
      assert.strictEqual(arrivalTick.travelResults.get(fleet.id)?.kind, 'arrived');
      assert.strictEqual(fleet.systemId, 'sys_b');
      assert.strictEqual(engine.getActivePhase(fleet.id), 'none');
      assert.strictEqual(engine.getJumpHistory(fleet.id).length, 1);

      assert.deepStrictEqual(engine.getFactionJumpNetwork('blue', systems), {
        knownSystems: ['sys_a', 'sys_b'],
        knownJumpPoints: ['jp_ab'],
        systemConnections: {
          sys_a: [
            {
              jumpPointId: 'jp_ab',
              jumpPointName: 'JP-TST',
              targetSystemId: 'sys_b',
              status: JumpPointStatus.ACTIVE,
              surveyLevel: 2
            }
          ],
          sys_b: []
        },
        reachableSystems: {
          sys_a: { sys_a: 0, sys_b: 1 },
          sys_b: { sys_b: 0 }
        },
        statistics: { explorationMissions: 1, totalJumps: 1, discoveredJumpPoints: 0 }
      });
    }
  },
  {
    name: 'Jump commands validate the point and its destination',
    run: () => {
      const engine = new JumpPointEngine({ seed: 1 });
      const { alpha, systems } = createCorridor();
      alpha.jumpPoints.push(
        createActivePoint({ id: 'jp_open', connectsTo: null }),
        createActivePoint({ id: 'jp_lost', connectsTo: 'sys_z' })
      );
      const fleet = createFleet();

      assert.deepStrictEqual(engine.initiateFleetJump(fleet, 'jp_none', systems, ships, noTechnologies, 0), {
        ok: false,
        error: 'Jump point not found'
      });
      assert.deepStrictEqual(engine.initiateFleetJump(fleet, 'jp_open', systems, ships, noTechnologies, 0), {
        ok: false,
        error: 'Jump point destination not set'
      });
      assert.deepStrictEqual(engine.initiateFleetJump(fleet, 'jp_lost', systems, ships, noTechnologies, 0), {
        ok: false,
        error: 'Target system does not exist'
      });
      assert.strictEqual(engine.getActivePhase(fleet.id), 'none');
    }
  },
  {
    name: 'Survey commands need a known system and point',
    run: () => {
      const engine = new JumpPointEngine({ seed: 1 });
      const { systems } = createCorridor();

      assert.deepStrictEqual(engine.surveyJumpPoint(createFleet({ systemId: 'nowhere' }), 'jp_ab', systems, 0), {
        ok: false,
        error: 'Fleet system not found'
      });
      assert.deepStrictEqual(engine.surveyJumpPoint(createFleet(), 'jp_ba', systems, 0), {
        ok: false,
        error: 'Jump point not found in current system'
      });
    }
  },
  {
    name: 'Cancelling a preparation stands the fleet down',
    run: () => {
      const engine = new JumpPointEngine({ seed: 2 });
      const { systems } = createCorridor();
      const fleet = createFleet();
      const fleets = registry(fleet);

      engine.initiateFleetJump(fleet, 'jp_ab', systems, ships, noTechnologies, 0);
      assert.strictEqual(fleet.status, FleetStatus.FORMING_UP);

      assert.deepStrictEqual(engine.cancelFleetJump(fleet.id, fleets), { ok: true, message: 'Jump preparation cancelled' });
      assert.strictEqual(fleet.status, FleetStatus.IDLE);
      assert.deepStrictEqual(fleet.currentOrders, []);
      assert.deepStrictEqual(engine.cancelFleetJump(fleet.id, fleets), {
        ok: false,
        error: 'No active jump operation to cancel'
      });
    }
  },
  {
    name: 'Rule overrides reach the jump checks',
    run: () => {
      const engine = new JumpPointEngine({ seed: 3, rules: { minimumJumpFuel: 200 } });
      const { systems } = createCorridor();

      assert.strictEqual(engine.rules.minimumJumpFuel, 200);
      assert.strictEqual(engine.rules.jumpHistoryLimit, 50);
      assert.deepStrictEqual(
        engine.initiateFleetJump(createFleet({ fuelRemaining: 150 }), 'jp_ab', systems, ships, noTechnologies, 0),
        { ok: false, error: 'Insufficient fleet fuel' }
      );
    }
  },
  {
    name: 'Moving fleets uncover hidden points and open new routes',
    run: () => {
      const engine = new JumpPointEngine({ rng: new FixedRng(0) });
      const alpha = createSystem();
      const systems = registry(
        alpha,
        createSystem({ id: 'sys_c', name: 'Gamma' }),
        createSystem({ id: 'sys_b', name: 'Beta' })
      );
      const fleet = createFleet({ status: FleetStatus.MOVING });

      assert.deepStrictEqual(engine.findRoute('sys_a', 'sys_b', systems), []);

      const tick = engine.processTurnUpdate(registry(fleet), systems, ships, 10, 10);
      assert.strictEqual(tick.discoveries.length, 1);
      const [discovery] = tick.discoveries;
      assert.strictEqual(discovery.source, 'passive');
      assert.strictEqual(discovery.systemId, 'sys_a');
      assert.deepStrictEqual(
        discovery.jumpPointIds,
        alpha.jumpPoints.map(point => point.id)
      );
      assert.strictEqual(alpha.jumpPoints.length, 3);
      assert.ok(alpha.jumpPoints.every(point => point.connectsTo === 'sys_b'));

      assert.deepStrictEqual(engine.findRoute('sys_a', 'sys_b', systems), ['sys_a', 'sys_b']);
      assert.deepStrictEqual(engine.getReachableSystems('sys_a', systems), { sys_a: 0, sys_b: 1 });

      const status = engine.getSystemExplorationStatus('sys_a', 'blue');
      assert.strictEqual(status.discoveredJumpPoints, 3);
      assert.strictEqual(status.potentialDiscoveries, 0);

      const network = engine.getFactionJumpNetwork('blue', systems);
      assert.deepStrictEqual(network.knownSystems, ['sys_a']);
      assert.strictEqual(network.systemConnections.sys_a.length, 3);
      assert.deepStrictEqual(network.reachableSystems, { sys_a: { sys_a: 0 } });
      assert.strictEqual(network.statistics.discoveredJumpPoints, 3);
    }
  },
  {
    name: 'Idle fleets do not sweep for jump points',
    run: () => {
      const engine = new JumpPointEngine({ rng: new FixedRng(0) });
      const alpha = createSystem();
      const tick = engine.processTurnUpdate(registry(createFleet()), registry(alpha), ships, 10, 10);

      assert.deepStrictEqual(tick.discoveries, []);
      assert.strictEqual(alpha.jumpPoints.length, 0);
    }
  },
  {
    name: 'Available jumps carry the destination name and exploration status',
    run: () => {
      const engine = new JumpPointEngine({ seed: 4 });
      const { alpha, systems } = createCorridor();
      alpha.jumpPoints.push(createActivePoint({ id: 'jp_open', connectsTo: null }));

      const jumps = engine.getAvailableJumpsForFleet(createFleet(), systems, ships, noTechnologies);
      assert.strictEqual(jumps.length, 2);
      assert.strictEqual(jumps[0].targetSystemName, 'Beta');
      assert.deepStrictEqual(jumps[0].targetExplorationStatus, {
        explorationProgress: 0,
        surveyCompleteness: 0,
        discoveredJumpPoints: 0,
        discoveredJumpPointIds: [],
        lastExploration: null,
        systemDifficulty: 1,
        potentialDiscoveries: 0
      });
      assert.strictEqual('targetSystemName' in jumps[1], false);
      assert.deepStrictEqual(
        engine.getAvailableJumpsForFleet(createFleet({ systemId: 'nowhere' }), systems, ships, noTechnologies),
        []
      );
    }
  },
  {
    name: 'Generated galaxy is routable end to end',
    run: () => {
      const engine = new JumpPointEngine({ seed: 9 });
      const cluster: StarSystem[] = Array.from({ length: 5 }, (_, index) =>
        createSystem({ id: `sys_${index}`, name: `Star ${index}`, starMass: 0.6 + index * 0.3 })
      );
      const systems = registry(...cluster);

      const summary = engine.generateEnhancedJumpNetwork(cluster);
      assert.strictEqual(summary.backboneLinks, 4);

      const route = engine.findRoute('sys_0', 'sys_4', systems);
      assert.strictEqual(route[0], 'sys_0');
      assert.strictEqual(route[route.length - 1], 'sys_4');
      assert.strictEqual(Object.keys(engine.getReachableSystems('sys_0', systems)).length, 5);
    }
  },
  {
    name: 'Routes follow a registry whose systems changed but whose size did not',
    run: () => {
      const engine = new JumpPointEngine({ seed: 1 });
      const first = registry(
        createSystem({ jumpPoints: [createActivePoint({ id: 'jp_ab', connectsTo: 'sys_b' })] }),
        createSystem({ id: 'sys_b', name: 'Beta' })
      );
      assert.deepStrictEqual(engine.findRoute('sys_a', 'sys_b', first), ['sys_a', 'sys_b']);

      const second = registry(
        createSystem({ jumpPoints: [createActivePoint({ id: 'jp_ac', connectsTo: 'sys_c' })] }),
        createSystem({ id: 'sys_c', name: 'Gamma' })
      );
      assert.deepStrictEqual(engine.findRoute('sys_a', 'sys_c', second), ['sys_a', 'sys_c']);
      assert.deepStrictEqual(engine.getReachableSystems('sys_a', second), { sys_a: 0, sys_c: 1 });
    }
  },
  {
    name: 'Surveying an undetected point records its discovery',
    run: () => {
      const engine = new JumpPointEngine({ rng: new FixedRng(0.999) });
      const hidden = createActivePoint({
        id: 'jp_x',
        connectsTo: 'sys_b',
        status: JumpPointStatus.UNKNOWN,
        surveyLevel: 0
      });
      const systems = registry(createSystem({ jumpPoints: [hidden] }), createSystem({ id: 'sys_b', name: 'Beta' }));
      const fleet = createFleet();

      assert.strictEqual(engine.surveyJumpPoint(fleet, 'jp_x', systems, 0).ok, true);
      engine.processTurnUpdate(registry(fleet), systems, ships, 7000, 7000);

      assert.strictEqual(hidden.surveyLevel, 1);
      assert.strictEqual(hidden.status, JumpPointStatus.DETECTED);
      assert.strictEqual(hidden.discoveredBy, 'blue');
      assert.strictEqual(hidden.discoveryTime, 7000);
      assert.strictEqual(hidden.lastSurveyed, 7000);
    }
  },
  {
    name: 'Exploration missions keep the ordered target position',
    run: () => {
      const engine = new JumpPointEngine({ rng: new FixedRng(0.999) });
      const { alpha } = createCorridor();
      const fleet = createFleet();

      assert.strictEqual(engine.startExplorationMission(fleet, alpha, 'explore', 0, { position: vec3(5, 0, 0) }).ok, true);
      assert.deepStrictEqual(engine.exploration.getMission(fleet.id)?.targetPosition, { x: 5, y: 0, z: 0 });
    }
  }
];

const results: { name: string; success: boolean; error?: unknown }[] = [];

for (const test of tests) {
  try {
    test.run();
    results.push({ name: test.name, success: true });
  } catch (error) {
    results.push({ name: test.name, success: false, error });
  }
}

const successes = results.filter(result => result.success).length;
const failures = results.length - successes;

results.forEach(result => {
  if (result.success) {
    console.log(`✅ ${result.name}`);
  } else {
    console.error(`❌ ${result.name}`);
    console.error(result.error);
  }
});

if (failures > 0) {
  console.error(`Tests failed: ${failures}/${results.length}`);
  process.exitCode = 1;
} else {
  console.log(`All tests passed (${successes}/${results.length}).`);
}
