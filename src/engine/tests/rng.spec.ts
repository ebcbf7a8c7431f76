import assert from 'node:assert';
import { RNG } from '../rng';

interface TestCase {
  name: string;
  run: () => void;
}

const tests: TestCase[] = [
  {
    name: 'Same seed replays the same sequence',
    run: () => {
      const a = new RNG(42);
      const b = new RNG(42);
      const drawsA = Array.from({ length: 5 }, () => a.next());
      const drawsB = Array.from({ length: 5 }, () => b.next());
      assert.deepStrictEqual(drawsA, drawsB);
    }
  },
  {
    name: 'range and int stay within their bounds',
    run: () => {
      const rng = new RNG(7);
      for (let i = 0; i < 500; i++) {
        const value = rng.range(0.9, 1.1);
        assert.ok(value >= 0.9 && value < 1.1, `range out of bounds: ${value}`);
        const integer = rng.int(1, 4);
        assert.ok(Number.isInteger(integer) && integer >= 1 && integer <= 4, `int out of bounds: ${integer}`);
      }
    }
  },
  {
    name: 'range rejects an inverted interval',
    run: () => {
      const rng = new RNG(1);
      assert.throws(() => rng.range(2, 1), /min <= max/);
    }
  },
  {
    name: 'Restoring state resumes the sequence',
    run: () => {
      const rng = new RNG(99);
      rng.next();
      const saved = rng.getState();
      const expected = rng.next();
      rng.setState(saved);
      assert.strictEqual(rng.next(), expected);
    }
  },
  {
    name: 'Invalid seeds fall back to a usable state',
    run: () => {
      assert.strictEqual(new RNG(Number.NaN).getState(), 1);
      assert.strictEqual(new RNG(0).getState(), 1);
      assert.strictEqual(new RNG(-5.7).getState(), 5);
    }
  },
  {
    name: 'pick returns undefined for an empty list',
    run: () => {
      const rng = new RNG(3);
      assert.strictEqual(rng.pick([]), undefined);
      assert.strictEqual(rng.pick(['only']), 'only');
    }
  },
  {
    name: 'id keeps the prefix and an 8-digit hex suffix',
    run: () => {
      const rng = new RNG(5);
      assert.match(rng.id('jp_sys_a'), /^jp_sys_a_[0-9a-f]{8}$/);
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
