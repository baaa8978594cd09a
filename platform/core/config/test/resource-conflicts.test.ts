import { describe, expect, it } from "vitest";

import {
  ConflictError,
  buildResourceIndex,
  detectResourceConflicts,
} from "../src/conflicts/resource-conflicts";
import { loadYaml } from "../src/loader/yaml-loader";

function file(path: string, lines: string[]) {
  return { path, value: loadYaml(path, lines.join("\n")) };
}

describe("detectResourceConflicts", () => {
  it("indexes every resource section under one namespace", () => {
    const index = buildResourceIndex([
      file("bundle.yml", [
        "resources:",
        "  jobs:",
        "    nightly:",
        "      name: nightly",
        "  schemas:",
        "    raw:",
        "      name: raw",
      ]),
    ]);

    expect([...index.keys()]).toEqual(["nightly", "raw"]);
    expect(index.get("raw")).toEqual([
      { kind: "schema", location: { file: "bundle.yml", line: 7, column: 7 } },
    ]);
  });

  it("reports every occurrence in scan order", () => {
    const files = [
      file("bundle.yml", ["resources:", "  jobs:", "    foo:", "      name: job foo"]),
      file("a.yml", ["resources:", "  models:", "    foo:", "      name: model foo"]),
      file("b.yml", ["resources:", "  pipelines:", "    foo:", "      name: pipeline foo"]),
    ];

    expect(() => detectResourceConflicts(files)).toThrow(
      "multiple resources named foo (job at bundle.yml:4:7, model at a.yml:4:7, pipeline at b.yml:4:7)",
    );
  });

  it("treats identical re-declarations of the same kind as conflicts", () => {
    const files = [
      file("a.yml", ["resources:", "  jobs:", "    foo:", "      name: foo"]),
      file("b.yml", ["resources:", "  jobs:", "    foo:", "      name: foo"]),
    ];

    let caught: unknown;
    try {
      detectResourceConflicts(files);
    } catch (error) {
      caught = error;
    }

    expect(caught).toBeInstanceOf(ConflictError);
    if (caught instanceof ConflictError) {
      expect(caught.resourceName).toBe("foo");
      expect(caught.occurrences.map((occurrence) => occurrence.kind)).toEqual(["job", "job"]);
    }
  });

  it("compares names case-sensitively", () => {
    const files = [
      file("bundle.yml", [
        "resources:",
        "  jobs:",
        "    Foo:",
        "      name: upper",
        "  pipelines:",
        "    foo:",
        "      name: lower",
      ]),
    ];

    expect(() => detectResourceConflicts(files)).not.toThrow();
  });

  it("ignores documents without resources", () => {
    expect(() =>
      detectResourceConflicts([file("bundle.yml", ["bundle:", "  name: demo"])]),
    ).not.toThrow();
  });
});
