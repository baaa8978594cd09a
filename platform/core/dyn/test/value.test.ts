import { describe, expect, it } from "vitest";

import { DuplicateKeyError, TypeMismatchError } from "../src/errors";
import { createLocation, formatLocation } from "../src/location";
import { Path } from "../src/path";
import { Mapping, Value } from "../src/value";
import { getByPath, setByPath, walk } from "../src/visit";

const here = createLocation("bundle.yml", 3, 5);
const there = createLocation("other.yml", 7, 1);

describe("Value", () => {
  it("exposes scalars through kind-checked accessors", () => {
    expect(Value.string("x", here).asString()).toBe("x");
    expect(Value.int(42, here).asInt()).toBe(42n);
    expect(Value.float(1.5, here).asFloat()).toBe(1.5);
    expect(Value.bool(true, here).asBool()).toBe(true);
    expect(Value.nil(here).isNil()).toBe(true);
  });

  it("throws TypeMismatchError when the caller assumes the wrong kind", () => {
    const value = Value.string("x", here);

    expect(() => value.asInt()).toThrow(TypeMismatchError);
    expect(() => value.asMapping()).toThrow("expected mapping, found string");
    expect(() => Value.int(1).asFloat()).toThrow("expected float, found int");
  });

  it("rejects non-integral numbers and ints beyond 64 bits", () => {
    expect(() => Value.int(1.5)).toThrow(RangeError);
    expect(() => Value.int(2n ** 63n)).toThrow("9223372036854775808 is out of the 64-bit integer range");
    expect(Value.int(-(2n ** 63n)).asInt()).toBe(-9223372036854775808n);
  });

  it("keeps ints beyond 2^53 exact", () => {
    const value = Value.int(2n ** 53n + 1n);

    expect(value.asInt()).toBe(9007199254740993n);
    expect(value.toPlain()).toBe(9007199254740993n);
    expect(Value.int(2n ** 60n).equals(Value.int(2n ** 60n + 1n))).toBe(false);
    expect(Value.fromPlain(2n ** 60n).asInt()).toBe(1152921504606846976n);
  });

  it("builds trees from plain data and strips locations again", () => {
    const plain = {
      resources: { jobs: { job0: { name: "job_0", max_retries: 3, ratio: 0.5 } } },
      include: ["a.yml", "b.yml"],
      enabled: false,
      extra: null,
    };

    const value = Value.fromPlain(plain, here);

    expect(value.toPlain()).toEqual(plain);
    expect(getByPath(value, Path.parse("resources.jobs.job0.max_retries"))?.kind).toBe("int");
    expect(getByPath(value, Path.parse("resources.jobs.job0.ratio"))?.kind).toBe("float");
    expect(getByPath(value, Path.parse("include[1]"))?.asString()).toBe("b.yml");
    expect(value.location).toEqual(here);
  });

  it("preserves mapping insertion order", () => {
    const value = Value.fromPlain({ zeta: 1, alpha: 2, mid: 3 });

    expect(value.asMapping().keys()).toEqual(["zeta", "alpha", "mid"]);
    expect(Object.keys(value.toPlain() ?? {})).toEqual(["zeta", "alpha", "mid"]);
  });

  it("compares deeply while ignoring locations", () => {
    const left = Value.fromPlain({ a: [1, "two", { three: true }] }, here);
    const right = Value.fromPlain({ a: [1, "two", { three: true }] }, there);

    expect(left.equals(right)).toBe(true);
    expect(left.equals(Value.fromPlain({ a: [1, "two"] }))).toBe(false);
    expect(Value.int(1).equals(Value.float(1))).toBe(false);
    expect(Value.nil(here).equals(Value.nil(there))).toBe(true);
  });

  it("treats NaN floats as equal to each other", () => {
    expect(Value.float(Number.NaN, here).equals(Value.float(Number.NaN, there))).toBe(true);
    expect(Value.float(0).equals(Value.float(-0))).toBe(true);
    expect(Value.float(Number.NaN).equals(Value.float(1))).toBe(false);
  });

  it("adds a location to every node without changing kinds", () => {
    const original = Value.fromPlain({ job: { tasks: [{ key: "a" }] } }, here);
    const rehomed = original.withAdditionalLocation(there);

    const visited: string[] = [];
    walk(rehomed, (path, node) => {
      visited.push(`${path.toString()}=${node.kind}`);
      expect(node.location).toEqual(here);
      expect(node.locations.map(formatLocation)).toEqual([
        "bundle.yml:3:5",
        "other.yml:7:1",
      ]);
    });

    expect(visited).toEqual([
      "=mapping",
      "job=mapping",
      "job.tasks=sequence",
      "job.tasks[0]=mapping",
      "job.tasks[0].key=string",
    ]);
    expect(rehomed.equals(original)).toBe(true);
    expect(original.additionalLocations).toEqual([]);
  });

  it("replaces the primary location without touching children", () => {
    const value = Value.fromPlain({ a: 1 }, here).withLocation(there);

    expect(value.location).toEqual(there);
    expect(value.get("a")?.location).toEqual(here);
  });
});

describe("Mapping", () => {
  it("rejects duplicate keys", () => {
    expect(
      () =>
        new Mapping([
          { key: "name", keyLocation: here, value: Value.string("a", here) },
          { key: "name", keyLocation: there, value: Value.string("b", there) },
        ]),
    ).toThrow(DuplicateKeyError);
  });

  it("returns new mappings from set and delete", () => {
    const original = new Mapping([
      { key: "a", keyLocation: here, value: Value.int(1, here) },
      { key: "b", keyLocation: here, value: Value.int(2, here) },
    ]);

    const updated = original.set("a", Value.int(10, there)).set("c", Value.int(3, there));
    const trimmed = updated.delete("b");

    expect(updated.keys()).toEqual(["a", "b", "c"]);
    expect(updated.get("a")?.asInt()).toBe(10n);
    expect(updated.pair("a")?.keyLocation).toEqual(here);
    expect(updated.pair("c")?.keyLocation).toEqual(there);
    expect(trimmed.keys()).toEqual(["a", "c"]);
    expect(original.get("a")?.asInt()).toBe(1n);
    expect(original.size).toBe(2);
  });
});

describe("getByPath", () => {
  const document = Value.fromPlain({ resources: { jobs: { job0: { tasks: [{ key: "t" }] } } } }, here);

  it("returns undefined for absent keys and indices", () => {
    expect(getByPath(document, Path.parse("resources.pipelines"))).toBeUndefined();
    expect(getByPath(document, Path.parse("resources.jobs.job0.tasks[4]"))).toBeUndefined();
    expect(getByPath(document, Path.parse("resources.pipelines.x.y"))).toBeUndefined();
  });

  it("rejects key access on a sequence", () => {
    expect(() => getByPath(document, Path.parse("resources.jobs.job0.tasks.key"))).toThrow(
      'expected a mapping at "resources.jobs.job0.tasks" to access key "key", found sequence',
    );
  });

  it("rejects index access on a mapping", () => {
    expect(() => getByPath(document, Path.parse("resources[0]"))).toThrow(TypeMismatchError);
  });
});

describe("setByPath", () => {
  const here = { file: "bundle.yml", line: 2, column: 3 };
  const generated = { file: "/project/__generated__.yml", line: 1, column: 1 };

  it("replaces a nested node and leaves the input untouched", () => {
    const original = Value.fromPlain({ resources: { jobs: { job0: { tasks: [{ key: "a" }, { key: "b" }] } } } }, here);

    const updated = setByPath(
      original,
      Path.parse("resources.jobs.job0.tasks[1].key"),
      Value.string("c", generated),
    );

    expect(updated.toPlain()).toEqual({
      resources: { jobs: { job0: { tasks: [{ key: "a" }, { key: "c" }] } } },
    });
    expect(original.toPlain()).toEqual({
      resources: { jobs: { job0: { tasks: [{ key: "a" }, { key: "b" }] } } },
    });
    expect(getByPath(updated, Path.parse("resources.jobs.job0.tasks[1].key"))?.location).toEqual(generated);
    expect(getByPath(updated, Path.parse("resources.jobs.job0.tasks[0].key"))?.location).toEqual(here);
  });

  it("creates missing intermediate mappings", () => {
    const updated = setByPath(Value.fromPlain({}, here), Path.parse("a.b"), Value.int(1, generated));

    expect(updated.toPlain()).toEqual({ a: { b: 1 } });
  });

  it("rejects an index past the end of a sequence", () => {
    const original = Value.fromPlain({ list: [1] }, here);

    expect(() => setByPath(original, Path.parse("list[3]"), Value.int(2))).toThrow(
      'invalid path "list[3]": index 3 out of range for sequence of length 1',
    );
  });
});
