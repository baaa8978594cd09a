import { DuplicateKeyError, TypeMismatchError } from "./errors";
import { EMPTY_LOCATION, type Location } from "./location";
import { Path } from "./path";

export type Kind =
  | "nil"
  | "bool"
  | "int"
  | "float"
  | "string"
  | "sequence"
  | "mapping";

export type PlainValue =
  | null
  | boolean
  | number
  | bigint
  | string
  | PlainValue[]
  | { [key: string]: PlainValue };

type Payload =
  | { readonly kind: "nil" }
  | { readonly kind: "bool"; readonly value: boolean }
  | { readonly kind: "int"; readonly value: bigint }
  | { readonly kind: "float"; readonly value: number }
  | { readonly kind: "string"; readonly value: string }
  | { readonly kind: "sequence"; readonly value: readonly Value[] }
  | { readonly kind: "mapping"; readonly value: Mapping };

const MIN_INT64 = -(2n ** 63n);
const MAX_INT64 = 2n ** 63n - 1n;
const MIN_SAFE_INT = BigInt(Number.MIN_SAFE_INTEGER);
const MAX_SAFE_INT = BigInt(Number.MAX_SAFE_INTEGER);

export function isInt64(value: bigint): boolean {
  return value >= MIN_INT64 && value <= MAX_INT64;
}

export interface MappingPair {
  readonly key: string;
  readonly keyLocation: Location;
  readonly value: Value;
}

/**
 * Insertion-ordered, immutable string-keyed mapping. Each key keeps the
 * location it was written at so duplicate and unknown-key diagnostics can
 * point at the key rather than its value.
 */
export class Mapping {
  private readonly entries: ReadonlyMap<string, MappingPair>;

  constructor(pairs: Iterable<MappingPair> = []) {
    const entries = new Map<string, MappingPair>();
    for (const pair of pairs) {
      const existing = entries.get(pair.key);
      if (existing) {
        throw new DuplicateKeyError(
          Path.of(Path.key(pair.key)),
          existing.keyLocation,
          pair.keyLocation,
        );
      }
      entries.set(pair.key, pair);
    }
    this.entries = entries;
  }

  get size(): number {
    return this.entries.size;
  }

  has(key: string): boolean {
    return this.entries.has(key);
  }

  get(key: string): Value | undefined {
    return this.entries.get(key)?.value;
  }

  pair(key: string): MappingPair | undefined {
    return this.entries.get(key);
  }

  keys(): string[] {
    return Array.from(this.entries.keys());
  }

  pairs(): MappingPair[] {
    return Array.from(this.entries.values());
  }

  /**
   * Returns a mapping with `key` bound to `value`. An existing key keeps its
   * position and key location.
   */
  set(key: string, value: Value, keyLocation: Location = value.location): Mapping {
    const existing = this.entries.get(key);
    if (!existing) {
      return new Mapping([...this.entries.values(), { key, keyLocation, value }]);
    }

    return new Mapping(
      this.pairs().map((pair) => (pair.key === key ? { ...pair, value } : pair)),
    );
  }

  delete(key: string): Mapping {
    if (!this.entries.has(key)) {
      return this;
    }
    return new Mapping(this.pairs().filter((pair) => pair.key !== key));
  }
}

/**
 * Immutable dynamically-typed document node. Every node carries the location
 * it was read from plus any additional locations its content was merged from.
 */
export class Value {
  private constructor(
    private readonly payload: Payload,
    readonly location: Location,
    readonly additionalLocations: readonly Location[] = [],
  ) {}

  static nil(location: Location = EMPTY_LOCATION): Value {
    return new Value({ kind: "nil" }, location);
  }

  static bool(value: boolean, location: Location = EMPTY_LOCATION): Value {
    return new Value({ kind: "bool", value }, location);
  }

  /**
   * Ints are 64-bit signed. Numbers must be integral; anything outside the
   * range throws a `RangeError`.
   */
  static int(value: number | bigint, location: Location = EMPTY_LOCATION): Value {
    if (typeof value === "number" && !Number.isInteger(value)) {
      throw new RangeError(`${value} is not representable as an integer`);
    }
    const int = BigInt(value);
    if (!isInt64(int)) {
      throw new RangeError(`${int} is out of the 64-bit integer range`);
    }
    return new Value({ kind: "int", value: int }, location);
  }

  static float(value: number, location: Location = EMPTY_LOCATION): Value {
    return new Value({ kind: "float", value }, location);
  }

  static string(value: string, location: Location = EMPTY_LOCATION): Value {
    return new Value({ kind: "string", value }, location);
  }

  static sequence(
    items: readonly Value[],
    location: Location = EMPTY_LOCATION,
  ): Value {
    return new Value({ kind: "sequence", value: [...items] }, location);
  }

  static mapping(
    mapping: Mapping = new Mapping(),
    location: Location = EMPTY_LOCATION,
  ): Value {
    return new Value({ kind: "mapping", value: mapping }, location);
  }

  /**
   * Builds a value tree from plain JavaScript data. Every node, including
   * mapping keys, receives the same location.
   */
  static fromPlain(plain: unknown, location: Location = EMPTY_LOCATION): Value {
    if (plain === null) {
      return Value.nil(location);
    }

    if (typeof plain === "boolean") {
      return Value.bool(plain, location);
    }

    if (typeof plain === "number") {
      return Number.isSafeInteger(plain)
        ? Value.int(plain, location)
        : Value.float(plain, location);
    }

    if (typeof plain === "bigint") {
      return Value.int(plain, location);
    }

    if (typeof plain === "string") {
      return Value.string(plain, location);
    }

    if (Array.isArray(plain)) {
      return Value.sequence(
        plain.map((item: unknown) => Value.fromPlain(item, location)),
        location,
      );
    }

    if (typeof plain !== "object") {
      throw new TypeError(`cannot represent ${typeof plain} as a value`);
    }

    const pairs = Object.entries(plain).map(([key, item]: [string, unknown]) => ({
      key,
      keyLocation: location,
      value: Value.fromPlain(item, location),
    }));
    return Value.mapping(new Mapping(pairs), location);
  }

  get kind(): Kind {
    return this.payload.kind;
  }

  get locations(): readonly Location[] {
    return [this.location, ...this.additionalLocations];
  }

  isNil(): boolean {
    return this.payload.kind === "nil";
  }

  asBool(): boolean {
    const payload = this.payload;
    if (payload.kind === "bool") {
      return payload.value;
    }
    throw this.mismatch("bool");
  }

  asInt(): bigint {
    const payload = this.payload;
    if (payload.kind === "int") {
      return payload.value;
    }
    throw this.mismatch("int");
  }

  asFloat(): number {
    const payload = this.payload;
    if (payload.kind === "float") {
      return payload.value;
    }
    throw this.mismatch("float");
  }

  asString(): string {
    const payload = this.payload;
    if (payload.kind === "string") {
      return payload.value;
    }
    throw this.mismatch("string");
  }

  asSequence(): readonly Value[] {
    const payload = this.payload;
    if (payload.kind === "sequence") {
      return payload.value;
    }
    throw this.mismatch("sequence");
  }

  asMapping(): Mapping {
    const payload = this.payload;
    if (payload.kind === "mapping") {
      return payload.value;
    }
    throw this.mismatch("mapping");
  }

  get(key: string): Value | undefined {
    return this.asMapping().get(key);
  }

  index(position: number): Value | undefined {
    return this.asSequence()[position];
  }

  /**
   * Deep structural equality. Locations are ignored.
   */
  equals(other: Value): boolean {
    const left = this.payload;
    const right = other.payload;

    switch (left.kind) {
      case "nil":
        return right.kind === "nil";
      case "bool":
        return right.kind === "bool" && right.value === left.value;
      case "int":
        return right.kind === "int" && right.value === left.value;
      case "float":
        return (
          right.kind === "float" &&
          (right.value === left.value || Object.is(right.value, left.value))
        );
      case "string":
        return right.kind === "string" && right.value === left.value;
      case "sequence": {
        if (right.kind !== "sequence" || right.value.length !== left.value.length) {
          return false;
        }
        return left.value.every((item, position) => {
          const counterpart = right.value[position];
          return counterpart !== undefined && item.equals(counterpart);
        });
      }
      case "mapping": {
        if (right.kind !== "mapping" || right.value.size !== left.value.size) {
          return false;
        }
        return left.value.pairs().every((pair) => {
          const counterpart = right.value.get(pair.key);
          return counterpart !== undefined && pair.value.equals(counterpart);
        });
      }
    }
  }

  toPlain(): PlainValue {
    const payload = this.payload;
    switch (payload.kind) {
      case "nil":
        return null;
      case "int":
        // Ints beyond the safe range stay bigints.
        return payload.value >= MIN_SAFE_INT && payload.value <= MAX_SAFE_INT
          ? Number(payload.value)
          : payload.value;
      case "bool":
      case "float":
      case "string":
        return payload.value;
      case "sequence":
        return payload.value.map((item) => item.toPlain());
      case "mapping": {
        const result: { [key: string]: PlainValue } = {};
        for (const pair of payload.value.pairs()) {
          result[pair.key] = pair.value.toPlain();
        }
        return result;
      }
    }
  }

  withLocation(location: Location): Value {
    return new Value(this.payload, location, this.additionalLocations);
  }

  /**
   * Recursively records `location` as an additional location of this node
   * and every node below it. Kinds and content are unchanged.
   */
  withAdditionalLocation(location: Location): Value {
    const payload = this.payload;
    const additional = [...this.additionalLocations, location];

    switch (payload.kind) {
      case "sequence":
        return new Value(
          {
            kind: "sequence",
            value: payload.value.map((item) => item.withAdditionalLocation(location)),
          },
          this.location,
          additional,
        );
      case "mapping":
        return new Value(
          {
            kind: "mapping",
            value: new Mapping(
              payload.value.pairs().map((pair) => ({
                ...pair,
                value: pair.value.withAdditionalLocation(location),
              })),
            ),
          },
          this.location,
          additional,
        );
      default:
        return new Value(payload, this.location, additional);
    }
  }

  /**
   * Appends every location of `other` to this node's additional locations.
   */
  appendLocationsFrom(other: Value): Value {
    return new Value(this.payload, this.location, [
      ...this.additionalLocations,
      ...other.locations,
    ]);
  }

  withMapping(mapping: Mapping): Value {
    if (this.payload.kind !== "mapping") {
      throw this.mismatch("mapping");
    }
    return new Value(
      { kind: "mapping", value: mapping },
      this.location,
      this.additionalLocations,
    );
  }

  withSequence(items: readonly Value[]): Value {
    if (this.payload.kind !== "sequence") {
      throw this.mismatch("sequence");
    }
    return new Value(
      { kind: "sequence", value: [...items] },
      this.location,
      this.additionalLocations,
    );
  }

  private mismatch(expected: Kind): TypeMismatchError {
    return new TypeMismatchError(expected, this.payload.kind);
  }
}
