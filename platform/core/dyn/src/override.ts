import { UnconditionalOverridePolicy } from "./override-policies";
import { Path } from "./path";
import { Mapping, type MappingPair, type Value } from "./value";

/**
 * Decides what happens at every node where the overlay differs from the
 * base. Throwing from any callback aborts the whole override.
 */
export interface OverridePolicy {
  onInsert(path: Path, next: Value): Value;
  onUpdate(path: Path, previous: Value, next: Value): Value;
  onDelete(path: Path, previous: Value): void;
}

/**
 * Walks `base` and `overlay` in lock-step and returns the overlaid tree.
 * Without a policy the overlay wins at every differing node. Inputs are
 * never modified; on error nothing is returned.
 */
export function override(
  base: Value,
  overlay: Value,
  policy: OverridePolicy = new UnconditionalOverridePolicy(),
): Value {
  return overrideAt(Path.root, base, overlay, policy);
}

function overrideAt(
  path: Path,
  base: Value,
  overlay: Value,
  policy: OverridePolicy,
): Value {
  if (base.kind !== overlay.kind) {
    return policy.onUpdate(path, base, overlay);
  }

  switch (base.kind) {
    case "mapping":
      return base.withMapping(
        overrideMapping(path, base.asMapping(), overlay.asMapping(), policy),
      );
    case "sequence":
      return base.withSequence(
        overrideSequence(path, base.asSequence(), overlay.asSequence(), policy),
      );
    case "nil":
      return base;
    default:
      return base.equals(overlay) ? base : policy.onUpdate(path, base, overlay);
  }
}

function overrideMapping(
  path: Path,
  base: Mapping,
  overlay: Mapping,
  policy: OverridePolicy,
): Mapping {
  const pairs: MappingPair[] = [];

  for (const pair of base.pairs()) {
    const childPath = path.key(pair.key);
    const next = overlay.get(pair.key);

    if (next === undefined) {
      policy.onDelete(childPath, pair.value);
      continue;
    }

    pairs.push({ ...pair, value: overrideAt(childPath, pair.value, next, policy) });
  }

  for (const pair of overlay.pairs()) {
    if (base.has(pair.key)) {
      continue;
    }

    pairs.push({ ...pair, value: policy.onInsert(path.key(pair.key), pair.value) });
  }

  return new Mapping(pairs);
}

function overrideSequence(
  path: Path,
  base: readonly Value[],
  overlay: readonly Value[],
  policy: OverridePolicy,
): Value[] {
  const shared = Math.min(base.length, overlay.length);
  const items: Value[] = [];

  for (let position = 0; position < shared; position += 1) {
    items.push(overrideAt(path.index(position), base[position], overlay[position], policy));
  }

  for (let position = shared; position < overlay.length; position += 1) {
    items.push(policy.onInsert(path.index(position), overlay[position]));
  }

  for (let position = shared; position < base.length; position += 1) {
    policy.onDelete(path.index(position), base[position]);
  }

  return items;
}
