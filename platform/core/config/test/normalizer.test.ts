import { describe, expect, it } from "vitest";
import { Path, TypeMismatchError, getByPath } from "@bundlekit/dyn";

import { loadYaml } from "../src/loader/yaml-loader";
import { BUNDLE_SCHEMA } from "../src/schema/bundle.schema";
import { array, boolean, integer, number, object, string } from "../src/schema/schema-node";
import { Normalizer } from "../src/validation/normalizer";
import { createTypeValidators } from "../src/validation/type-validators";
import { NotAnIntegerError } from "../src/validation/validation-errors";

const scalars = object({
  s: string(),
  i: integer(),
  n: number(),
  b: boolean(),
});

function createNormalizer(): Normalizer {
  return new Normalizer(createTypeValidators());
}

describe("Normalizer", () => {
  it("drops unknown fields with a warning at the key", () => {
    const value = loadYaml(
      "output.yml",
      ["resources:", "  jobs:", "    job0:", "      unknown_property: my job", "      name: job_0"].join("\n"),
    );

    const result = createNormalizer().normalize(BUNDLE_SCHEMA, value);

    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({
      severity: "warning",
      summary: "unknown field: unknown_property",
      location: { file: "output.yml", line: 4, column: 7 },
    });
    expect(result.diagnostics[0]?.path.toString()).toBe("resources.jobs.job0.unknown_property");
    expect(result.value.toPlain()).toEqual({ resources: { jobs: { job0: { name: "job_0" } } } });
  });

  it("reports a structural mismatch as an error and drops the node", () => {
    const value = loadYaml(
      "bundle.yml",
      ["resources:", "  jobs:", "    job0:", "      tasks: oops", "      name: job_0"].join("\n"),
    );

    const result = createNormalizer().normalize(BUNDLE_SCHEMA, value);

    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]).toMatchObject({
      severity: "error",
      summary: "expected sequence, found string",
      location: { file: "bundle.yml", line: 4, column: 14 },
    });
    expect(result.diagnostics[0]?.error).toBeInstanceOf(TypeMismatchError);
    expect(result.value.toPlain()).toEqual({ resources: { jobs: { job0: { name: "job_0" } } } });
  });

  it("converts scalars where no information is lost", () => {
    const value = loadYaml("in.yml", "s: 42\ni: \"7\"\nn: 3\nb: \"true\"");

    const result = createNormalizer().normalize(scalars, value);

    expect(result.diagnostics).toEqual([]);
    expect(result.value.toPlain()).toEqual({ s: "42", i: 7, n: 3, b: true });
    expect(result.value.get("i")?.kind).toBe("int");
    expect(result.value.get("n")?.kind).toBe("float");
    expect(result.value.get("s")?.location).toEqual({ file: "in.yml", line: 1, column: 4 });
  });

  it("turns an integral float into an integer", () => {
    const result = createNormalizer().normalize(scalars, loadYaml("in.yml", "i: 2.0"));

    expect(result.diagnostics).toEqual([]);
    expect(result.value.get("i")?.kind).toBe("int");
    expect(result.value.get("i")?.asInt()).toBe(2n);
  });

  it("parses integer strings without losing digits", () => {
    const result = createNormalizer().normalize(scalars, loadYaml("in.yml", 'i: "9007199254740993"'));

    expect(result.diagnostics).toEqual([]);
    expect(result.value.get("i")?.asInt()).toBe(9007199254740993n);
  });

  it("refuses to truncate a fractional float", () => {
    const result = createNormalizer().normalize(scalars, loadYaml("in.yml", "i: 2.5"));

    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]?.summary).toBe("expected i to have integer value but it is 2.5");
    expect(result.diagnostics[0]?.error).toBeInstanceOf(NotAnIntegerError);
    expect(result.value.toPlain()).toEqual({});
  });

  it("accepts variable references for any scalar type", () => {
    const value = loadYaml("in.yml", "i: ${var.count}\nn: ${var.ratio}\nb: ${var.flags[0]}");

    const result = createNormalizer().normalize(scalars, value);

    expect(result.diagnostics).toEqual([]);
    expect(result.value.toPlain()).toEqual({
      i: "${var.count}",
      n: "${var.ratio}",
      b: "${var.flags[0]}",
    });
  });

  it("accepts nil for every type", () => {
    const result = createNormalizer().normalize(scalars, loadYaml("in.yml", "s:\ni:\nn:\nb:"));

    expect(result.diagnostics).toEqual([]);
    expect(result.value.toPlain()).toEqual({ s: null, i: null, n: null, b: null });
  });

  it("rejects strings that are not booleans", () => {
    const result = createNormalizer().normalize(scalars, loadYaml("in.yml", "b: yes"));

    expect(result.diagnostics.map((diagnostic) => diagnostic.summary)).toEqual([
      "expected bool, found string",
    ]);
  });

  it("drops invalid sequence items and keeps the rest", () => {
    const result = createNormalizer().normalize(array(integer()), loadYaml("in.yml", "[1, x, 3]"));

    expect(result.value.toPlain()).toEqual([1, 3]);
    expect(result.diagnostics).toHaveLength(1);
    expect(result.diagnostics[0]?.summary).toBe("expected int, found string");
    expect(result.diagnostics[0]?.path.toString()).toBe("[1]");
  });

  it("keeps the locations of normalized nodes", () => {
    const value = loadYaml(
      "bundle.yml",
      ["experimental:", "  plugins:", "    enabled: true", "    venv_path: .venv"].join("\n"),
    );

    const result = createNormalizer().normalize(BUNDLE_SCHEMA, value);

    expect(getByPath(result.value, Path.parse("experimental.plugins.venv_path"))?.location).toEqual({
      file: "bundle.yml",
      line: 4,
      column: 16,
    });
  });

  it("falls back to the built-in validators when none are injected", () => {
    const result = new Normalizer().normalize(scalars, loadYaml("in.yml", "n: \"1.5\""));

    expect(result.value.get("n")?.asFloat()).toBe(1.5);
  });
});
