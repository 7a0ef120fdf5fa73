import { randomBytes, randomInt } from 'node:crypto';

const MAX_COUNTER = 0xffffff;
const OBJECT_ID_PATTERN = /^[0-9a-f]{24}$/;

/**
 * Generates 12-byte, 24-hex-character identifiers laid out as
 * 4 bytes of seconds since the epoch, 5 bytes of per-process randomness
 * and a 3-byte wrapping counter. Sortable by creation second.
 */
export class ObjectIdGenerator {
  private readonly processUnique: string;
  private counter: number;

  constructor(opts: { processUnique?: Buffer; counterStart?: number } = {}) {
    const unique = opts.processUnique ?? randomBytes(5);
    if (unique.length !== 5) {
      throw new Error('processUnique must be exactly 5 bytes');
    }
    this.processUnique = unique.toString('hex');
    this.counter = opts.counterStart ?? randomInt(0, MAX_COUNTER + 1);
    if (this.counter < 0 || this.counter > MAX_COUNTER) {
      throw new Error(`counterStart must be between 0 and ${MAX_COUNTER}`);
    }
  }

  generate(now: Date = new Date()): string {
    const seconds = Math.floor(now.getTime() / 1000);
    const counter = this.counter;
    this.counter = (this.counter + 1) & MAX_COUNTER;

    return (
      seconds.toString(16).padStart(8, '0') +
      this.processUnique +
      counter.toString(16).padStart(6, '0')
    );
  }

  static isValid(id: string): boolean {
    return OBJECT_ID_PATTERN.test(id);
  }

  static parse(id: string): { timestamp: Date; counter: number } {
    if (!ObjectIdGenerator.isValid(id)) {
      throw new Error(`Invalid object id: ${id}`);
    }
    const seconds = parseInt(id.slice(0, 8), 16);
    const counter = parseInt(id.slice(18), 16);
    return { timestamp: new Date(seconds * 1000), counter };
  }
}
