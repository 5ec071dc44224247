/**
 * FILE PURPOSE: Run-scoped sequential identifier generator
 *
 * WHY: Ids like `pub_001` must be stable for a given input, so they come from
 *      a counter the coordinator owns and passes in, not a module global.
 *      Pre-existing and already-stored ids are claimed first so a generated
 *      id never collides.
 */

export interface IdSequenceOptions {
  prefix?: string;
  /** Minimum digit count; longer numbers are not truncated. */
  width?: number;
  start?: number;
}

export class IdSequence {
  private readonly prefix: string;
  private readonly width: number;
  private counter: number;
  private readonly claimed = new Set<string>();

  constructor(options: IdSequenceOptions = {}) {
    this.prefix = options.prefix ?? 'pub';
    this.width = options.width ?? 3;
    this.counter = options.start ?? 1;
  }

  /** Reserve an id that already exists so next() skips it. */
  claim(id: string): void {
    this.claimed.add(id);
  }

  format(n: number): string {
    return `${this.prefix}_${String(n).padStart(this.width, '0')}`;
  }

  next(): string {
    let id = this.format(this.counter++);
    while (this.claimed.has(id)) {
      id = this.format(this.counter++);
    }
    this.claimed.add(id);
    return id;
  }
}
