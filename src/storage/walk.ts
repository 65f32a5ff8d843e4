// Ordered, resumable enumeration of object names.
//
// Each backend supplies a `NameLister`: an async generator of base names under
// a prefix, in ascending order. Listers may use `startingPoint` to skip ahead
// natively (pagination markers); the gate below re-applies it either way.
// Servers list in key order, which is not name order once an extension is
// appended; `inNameOrder` restores it.

import { StoreInvalidUsageError, isStopIteration, upstream } from './errors.js';
import { STOP } from './types.js';
import type { WalkVisitor } from './types.js';

export type NameLister = (
  prefix: string,
  startingPoint: string,
  signal?: AbortSignal
) => AsyncIterable<string>;

/** Ascending UTF-16 code unit order, the order every walk uses. */
export function compareNames(a: string, b: string): number {
  if (a === b) return 0;
  return a < b ? -1 : 1;
}

export function assertStartingPoint(prefix: string, startingPoint: string): void {
  if (startingPoint !== '' && !startingPoint.startsWith(prefix)) {
    throw new StoreInvalidUsageError(
      `starting point "${startingPoint}" must start with prefix "${prefix}"`
    );
  }
}

/**
 * Exclusive "start after" marker for servers that only skip past a key.
 *
 * Any proper prefix of the target sorts strictly before it, in code units and
 * in UTF-8 bytes alike, so dropping the last code point (never half a
 * surrogate pair) gives a marker that still lets the target itself through.
 * Returns undefined when the result would be empty: no marker, full scan.
 */
export function startAfterMarker(keyPrefix: string, startingPoint: string): string | undefined {
  if (!startingPoint) return undefined;
  const marker = keyPrefix + Array.from(startingPoint).slice(0, -1).join('');
  return marker || undefined;
}

/**
 * Names from `lister` that are >= `startingPoint`, each one checked.
 * Lister failures are wrapped as StoreUpstreamError with `context`.
 */
export async function* gatedNames(
  lister: NameLister,
  prefix: string,
  startingPoint: string,
  context: string,
  signal?: AbortSignal
): AsyncGenerator<string> {
  assertStartingPoint(prefix, startingPoint);

  try {
    for await (const name of lister(prefix, startingPoint, signal)) {
      signal?.throwIfAborted();
      if (name < startingPoint) continue;
      yield name;
    }
  } catch (error) {
    throw upstream(context, error);
  }
}

/**
 * Reorder names listed in `name + suffix` order into name order.
 *
 * The two orders only disagree when one name is a proper prefix `p` of
 * another and the suffix sorts after the rest of the longer name, so the
 * longer name arrives first. A name is held back while a later key could
 * still be such a prefix of it. Keys sort contiguously by prefix, so that
 * is only possible while the latest key starts with `p` and `p + suffix`
 * sorts after it.
 */
export async function* inNameOrder(
  names: AsyncIterable<string>,
  suffix: string
): AsyncGenerator<string> {
  if (!suffix) {
    yield* names;
    return;
  }

  const held: string[] = [];
  const mayPrecede = (name: string, key: string): boolean => {
    for (let length = 1; length < name.length && name[length - 1] === key[length - 1]; length++) {
      if (suffix > key.slice(length)) return true;
    }
    return false;
  };

  for await (const name of names) {
    const at = held.findIndex((other) => other > name);
    held.splice(at === -1 ? held.length : at, 0, name);

    const key = name + suffix;
    while (held.length > 0 && !mayPrecede(held[0], key)) {
      yield held[0];
      held.shift();
    }
  }
  yield* held;
}

/**
 * Drive `visit` over the gated names. A visitor returning STOP or throwing
 * StopIterationError ends the walk successfully; other visitor errors
 * propagate as thrown.
 */
export async function visitNames(names: AsyncIterable<string>, visit: WalkVisitor): Promise<void> {
  for await (const name of names) {
    let result: Awaited<ReturnType<WalkVisitor>>;
    try {
      result = await visit(name);
    } catch (error) {
      if (isStopIteration(error)) return;
      throw error;
    }
    if (result === STOP) return;
  }
}

/** Collect at most `max` names (negative for all of them). */
export async function collectNames(
  walk: (visit: WalkVisitor) => Promise<void>,
  max: number
): Promise<string[]> {
  const names: string[] = [];
  if (max === 0) return names;

  await walk((name) => {
    names.push(name);
    if (max > 0 && names.length >= max) return STOP;
    return undefined;
  });
  return names;
}
