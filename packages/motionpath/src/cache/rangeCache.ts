import { silentLogger, type Logger } from "@keytrail/engine";
import { runScoped } from "./scoped.js";

/** Fork/join loop over `count` independent indices. */
export type ParallelFor = (count: number, body: (index: number) => void) => void;

export const sequentialFor: ParallelFor = (count, body) => {
  for (let index = 0; index < count; index++) {
    body(index);
  }
};

export interface CacheRange {
  start: number;
  end: number;
}

export interface RangeCacheOptions<TInput, TValue> {
  name: string;
  /** Reads external data for one frame. Always runs sequentially. */
  collect(time: number): TInput;
  /** Pure arithmetic on collected input. May run through `parallelFor`. */
  compose(input: TInput): TValue;
  parallelThreshold?: number;
  parallelFor?: ParallelFor;
  logger?: Logger;
}

const DEFAULT_PARALLEL_THRESHOLD = 50;

/**
 * Frame-indexed cache with a validated contiguous range. Lookups inside the
 * range are free; requests past it resolve only the missing frames; an
 * invalidated cache rebuilds in full on the next request. Only whole frames
 * are stored.
 */
export class RangeCache<TInput, TValue> {
  private readonly entries = new Map<number, TValue>();
  private readonly options: RangeCacheOptions<TInput, TValue>;
  private valid = false;
  private rangeStart = 0;
  private rangeEnd = -1;
  private resolves = 0;
  private rebuilding = false;

  constructor(options: RangeCacheOptions<TInput, TValue>) {
    this.options = { ...options };
  }

  /** Number of `collect` calls made so far. */
  get resolveCount(): number {
    return this.resolves;
  }

  get size(): number {
    return this.entries.size;
  }

  isValid(): boolean {
    return this.valid;
  }

  isRebuilding(): boolean {
    return this.rebuilding;
  }

  range(): CacheRange | null {
    return this.valid ? { start: this.rangeStart, end: this.rangeEnd } : null;
  }

  has(time: number): boolean {
    return this.entries.has(time);
  }

  get(time: number): TValue | undefined {
    return this.entries.get(time);
  }

  setParallelism(threshold: number, parallelFor?: ParallelFor): void {
    this.options.parallelThreshold = threshold;
    if (parallelFor) this.options.parallelFor = parallelFor;
  }

  /** Whole frames are kept; times between frames resolve fresh on every call. */
  ensureAt(time: number): TValue {
    const cached = this.entries.get(time);
    if (cached !== undefined) {
      return cached;
    }
    const value = this.resolve(time);
    if (Number.isInteger(time)) {
      this.entries.set(time, value);
    }
    return value;
  }

  ensureRange(start: number, end: number): void {
    const first = Math.floor(Math.min(start, end));
    const last = Math.ceil(Math.max(start, end));

    if (!this.valid) {
      this.rebuild(first, last);
      return;
    }
    if (first >= this.rangeStart && last <= this.rangeEnd && this.entries.size > 0) {
      return;
    }

    for (let frame = first; frame < this.rangeStart; frame++) {
      this.ensureAt(frame);
    }
    for (let frame = this.rangeEnd + 1; frame <= last; frame++) {
      this.ensureAt(frame);
    }
    this.rangeStart = Math.min(this.rangeStart, first);
    this.rangeEnd = Math.max(this.rangeEnd, last);
  }

  invalidate(): void {
    this.entries.clear();
    this.valid = false;
    this.rangeStart = 0;
    this.rangeEnd = -1;
  }

  private resolve(time: number): TValue {
    this.resolves += 1;
    return this.options.compose(this.options.collect(time));
  }

  private rebuild(first: number, last: number): void {
    const logger = this.options.logger ?? silentLogger;
    const threshold = this.options.parallelThreshold ?? DEFAULT_PARALLEL_THRESHOLD;
    const count = last - first + 1;

    runScoped(
      () => {
        this.rebuilding = true;
        this.invalidate();
      },
      () => {
        this.rebuilding = false;
      },
      () => {
        if (count <= threshold) {
          for (let frame = first; frame <= last; frame++) {
            this.entries.set(frame, this.resolve(frame));
          }
        } else {
          const inputs: TInput[] = [];
          for (let frame = first; frame <= last; frame++) {
            this.resolves += 1;
            inputs.push(this.options.collect(frame));
          }

          const outputs: TValue[] = new Array<TValue>(count);
          const parallelFor = this.options.parallelFor ?? sequentialFor;
          parallelFor(count, (index) => {
            outputs[index] = this.options.compose(inputs[index]);
          });

          for (let index = 0; index < count; index++) {
            this.entries.set(first + index, outputs[index]);
          }
        }
        this.rangeStart = first;
        this.rangeEnd = last;
        this.valid = true;
      },
    );

    logger.debug(`rebuilt ${this.options.name} cache`, { start: first, end: last, frames: count });
  }
}
