import type { Value } from "./value";

/**
 * Compact JSON text for a value tree, in the form `JSON.stringify` gives for
 * `toPlain()`. Ints are written with every digit, including those beyond the
 * safe integer range.
 */
export function toJsonText(value: Value): string {
  switch (value.kind) {
    case "nil":
      return "null";
    case "bool":
      return String(value.asBool());
    case "int":
      return value.asInt().toString();
    case "float":
      return JSON.stringify(value.asFloat());
    case "string":
      return JSON.stringify(value.asString());
    case "sequence":
      return `[${value.asSequence().map(toJsonText).join(",")}]`;
    case "mapping": {
      const members = value
        .asMapping()
        .pairs()
        .map((pair) => `${JSON.stringify(pair.key)}:${toJsonText(pair.value)}`);
      return `{${members.join(",")}}`;
    }
  }
}
