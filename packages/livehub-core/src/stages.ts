/**
 * Transformation stages for derived hubs
 *
 * A stage sees every source element exactly once, in order, and may emit any
 * number of outputs for it. `flush` runs when the source completes so buffering
 * stages can emit what they still hold.
 */

export type Emit<U> = (value: U) => void;

export interface Stage<T, U> {
  process(value: T, emit: Emit<U>): void;
  flush?(emit: Emit<U>): void;
}

export interface TimeWindow<T> {
  /** Inclusive start of the bucket, in clock milliseconds */
  start: number;
  /** Exclusive end of the bucket */
  end: number;
  values: T[];
}

function assertPositiveInteger(value: number, what: string): void {
  if (!Number.isInteger(value) || value < 1) {
    throw new RangeError(`${what} must be a positive integer, got ${value}`);
  }
}

export function mapStage<T, U>(project: (value: T) => U): Stage<T, U> {
  return {
    process(value, emit) {
      emit(project(value));
    },
  };
}

export function filterStage<T>(predicate: (value: T) => boolean): Stage<T, T> {
  return {
    process(value, emit) {
      if (predicate(value)) {
        emit(value);
      }
    },
  };
}

/**
 * Running aggregate: emits the accumulator after every element
 */
export function scanStage<T, A>(reducer: (accumulator: A, value: T) => A, seed: A): Stage<T, A> {
  let accumulator = seed;
  return {
    process(value, emit) {
      accumulator = reducer(accumulator, value);
      emit(accumulator);
    },
  };
}

/**
 * Non-overlapping windows of `size` elements. A partial window is emitted when the
 * source completes.
 */
export function tumblingWindow<T>(size: number): Stage<T, T[]> {
  assertPositiveInteger(size, 'Window size');
  let window: T[] = [];

  return {
    process(value, emit) {
      window.push(value);
      if (window.length === size) {
        emit(window);
        window = [];
      }
    },
    flush(emit) {
      if (window.length > 0) {
        emit(window);
        window = [];
      }
    },
  };
}

/**
 * Windows of `size` elements advancing by `step`. The first window is emitted once
 * `size` elements have arrived; incomplete trailing windows are not emitted.
 */
export function slidingWindow<T>(size: number, step = 1): Stage<T, T[]> {
  assertPositiveInteger(size, 'Window size');
  assertPositiveInteger(step, 'Window step');
  let buffer: T[] = [];
  let sinceLastEmit = 0;
  let filled = false;

  return {
    process(value, emit) {
      buffer.push(value);
      if (buffer.length > size) {
        buffer = buffer.slice(buffer.length - size);
      }
      if (!filled) {
        if (buffer.length === size) {
          filled = true;
          sinceLastEmit = 0;
          emit([...buffer]);
        }
        return;
      }

      sinceLastEmit += 1;
      if (sinceLastEmit === step) {
        sinceLastEmit = 0;
        emit([...buffer]);
      }
    },
  };
}

/**
 * Groups elements into fixed, aligned time buckets of `windowMs`. A bucket is
 * emitted when the first element of a later bucket arrives, or on completion.
 */
export function timeWindow<T>(windowMs: number, clock: () => number = Date.now): Stage<T, TimeWindow<T>> {
  if (!Number.isFinite(windowMs) || windowMs <= 0) {
    throw new RangeError(`Window duration must be positive, got ${windowMs}`);
  }
  let current: TimeWindow<T> | null = null;

  return {
    process(value, emit) {
      const now = clock();
      const start = Math.floor(now / windowMs) * windowMs;
      if (current && current.start !== start) {
        emit(current);
        current = null;
      }
      if (!current) {
        current = { start, end: start + windowMs, values: [] };
      }
      current.values.push(value);
    },
    flush(emit) {
      if (current) {
        emit(current);
        current = null;
      }
    },
  };
}
