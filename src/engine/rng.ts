import { logger } from '../shared/devLogger';

// Deterministic Random Number Generator
// Algorithm: Mulberry32
// One instance is shared by every consumer of a tick so a fixed seed and call order replay exactly.

export class RNG {
  private state: number;

  constructor(seed: number) {
    this.state = this.normalizeState(seed);
  }

  // --- STATE MANAGEMENT ---

  public getState(): number {
    return this.state;
  }

  public setState(state: number): void {
    this.state = this.normalizeState(state);
  }

  // Handles NaN, Infinity, negatives and non-integers
  private normalizeState(value: number): number {
    if (!Number.isFinite(value)) {
      logger.warn('[RNG] Invalid state value, defaulting to 1');
      return 1;
    }
    return (Math.floor(Math.abs(value)) >>> 0) || 1;
  }

  // --- GENERATION ---

  // Raw Mulberry32 output (0 to 4294967295)
  public nextUint32(): number {
    this.state = (this.state + 0x6d2b79f5) >>> 0;
    let t = this.state;
    t = Math.imul(t ^ (t >>> 15), t | 1);
    t ^= t + Math.imul(t ^ (t >>> 7), t | 61);
    return (t ^ (t >>> 14)) >>> 0;
  }

  // Float in [0, 1)
  public next(): number {
    return this.nextUint32() / 4294967296;
  }

  // Float in [min, max)
  public range(min: number, max: number): number {
    if (max < min) {
      throw new Error(`RNG.range requires min <= max, got [${min}, ${max}]`);
    }
    return min + this.next() * (max - min);
  }

  // Integer in [min, max]
  public int(min: number, max: number): number {
    return Math.min(max, Math.floor(this.range(min, max + 1)));
  }

  // True with probability p
  public chance(probability: number): boolean {
    return this.next() < probability;
  }

  // Bearing in radians
  public angle(): number {
    return this.range(0, 2 * Math.PI);
  }

  public pick<T>(array: readonly T[]): T | undefined {
    if (array.length === 0) {
      logger.debug('[RNG] pick() called on empty array, returning undefined');
      return undefined;
    }
    return array[Math.floor(this.next() * array.length)];
  }

  // prefix_xxxxxxxx, hex of one raw draw
  public id(prefix: string): string {
    const hex = this.nextUint32().toString(16).padStart(8, '0');
    return `${prefix}_${hex}`;
  }
}
