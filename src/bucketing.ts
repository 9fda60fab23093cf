import { BUCKET_COUNT, MAX_PERCENTAGE, MIN_PERCENTAGE } from './constants';
import { hashToUint32 } from './hashing';

/**
 * mulberry32 pseudo-random stream. Instances are cheap and never shared
 * between subjects or calls.
 */
export class SeededRandom {
  private state: number;

  constructor(seed: number) {
    this.state = seed | 0;
  }

  /** Next float in [0, 1). */
  next(): number {
    this.state = (this.state + 0x6d2b79f5) | 0;
    let t = Math.imul(this.state ^ (this.state >>> 15), 1 | this.state);
    t = (t + Math.imul(t ^ (t >>> 7), 61 | t)) ^ t;
    return ((t ^ (t >>> 14)) >>> 0) / 4294967296;
  }

  /** Next integer in [0, bound). */
  nextInt(bound: number): number {
    return Math.floor(this.next() * bound);
  }
}

/** A stream seeded solely from the subject id. */
export function subjectRandom(subjectId: number): SeededRandom {
  return new SeededRandom(hashToUint32(String(subjectId)));
}

function gate(percentage: number, draw: () => number): boolean {
  if (percentage <= MIN_PERCENTAGE) {
    return false;
  }
  if (percentage >= MAX_PERCENTAGE) {
    return true;
  }
  return draw() < percentage;
}

export abstract class Bucketer {
  /** A draw in [0, 100) that only depends on the subject id. */
  abstract draw(subjectId: number): number;

  inBucket(subjectId: number, percentage: number): boolean {
    return gate(percentage, () => this.draw(subjectId));
  }
}

export class SeededBucketer extends Bucketer {
  draw(subjectId: number): number {
    return subjectRandom(subjectId).nextInt(BUCKET_COUNT);
  }
}

export class DeterministicBucketer extends Bucketer {
  /*
  Deterministic bucketing based on a look-up table
  to simplify writing tests
  */
  constructor(private readonly lookup: Record<number, number>) {
    super();
  }

  draw(subjectId: number): number {
    return this.lookup[subjectId] ?? 0;
  }
}

const seededBucketer = new SeededBucketer();

export function inBucket(
  subjectId: number,
  percentage: number,
  bucketer: Bucketer = seededBucketer,
): boolean {
  return bucketer.inBucket(subjectId, percentage);
}

/**
 * Unconditional sampling for calls without a subject. Draws from one stream per
 * sampler, so repeated calls with the same input may disagree. Never use it where
 * a subject must consistently land on the same side.
 */
export abstract class Sampler {
  abstract draw(): number;

  sample(percentage: number): boolean {
    return gate(percentage, () => this.draw());
  }
}

export class RandomSampler extends Sampler {
  private readonly random: SeededRandom;

  constructor(seed: number = Date.now()) {
    super();
    this.random = new SeededRandom(seed);
  }

  draw(): number {
    return this.random.nextInt(BUCKET_COUNT);
  }
}

export class FixedSampler extends Sampler {
  constructor(private readonly value: number) {
    super();
  }

  draw(): number {
    return this.value;
  }
}
