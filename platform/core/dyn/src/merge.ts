import { Mapping, type MappingPair, type Value } from "./value";

/**
 * Structural merge used to combine files of one bundle: mappings merge key
 * by key, sequences concatenate, and otherwise `right` wins while keeping
 * the locations of `left` as additional locations.
 */
export function merge(left: Value, right: Value): Value {
  if (left.isNil()) {
    return right;
  }

  if (right.isNil()) {
    return left;
  }

  if (left.kind === "mapping" && right.kind === "mapping") {
    const leftMapping = left.asMapping();
    const rightMapping = right.asMapping();
    const pairs: MappingPair[] = leftMapping.pairs().map((pair) => {
      const counterpart = rightMapping.get(pair.key);
      return counterpart === undefined
        ? pair
        : { ...pair, value: merge(pair.value, counterpart) };
    });

    for (const pair of rightMapping.pairs()) {
      if (!leftMapping.has(pair.key)) {
        pairs.push(pair);
      }
    }

    return left.withMapping(new Mapping(pairs)).appendLocationsFrom(right);
  }

  if (left.kind === "sequence" && right.kind === "sequence") {
    return left
      .withSequence([...left.asSequence(), ...right.asSequence()])
      .appendLocationsFrom(right);
  }

  return right.appendLocationsFrom(left);
}
