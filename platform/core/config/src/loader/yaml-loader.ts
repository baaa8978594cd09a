import fs from "fs/promises";
import {
  isAlias,
  isMap,
  isScalar,
  isSeq,
  LineCounter,
  parseDocument,
  type Document,
  type Node,
} from "yaml";
import {
  createLocation,
  DuplicateKeyError,
  isInt64,
  Mapping,
  Path,
  Value,
  type Location,
  type MappingPair,
} from "@bundlekit/dyn";
import { ParseError } from "./parse-error";

export interface LoadYamlFileOptions {
  /**
   * File name recorded in every Location instead of the physical path.
   */
  virtualPath?: string;
}

interface LoadContext {
  readonly file: string;
  readonly document: Document;
  readonly lineCounter: LineCounter;
}

/**
 * Parses YAML (or JSON) text into a located value tree. Every node carries
 * the position of its first character; mapping keys keep their own.
 */
export function loadYaml(file: string, text: string): Value {
  const lineCounter = new LineCounter();
  const document = parseDocument(text, {
    lineCounter,
    prettyErrors: false,
    uniqueKeys: false,
    intAsBigInt: true,
  });

  const [error] = document.errors;
  if (error) {
    const { line, col } = lineCounter.linePos(error.pos[0]);
    throw new ParseError(file, line, col, error.message);
  }

  const contents = document.contents;
  if (contents === null) {
    return Value.mapping(new Mapping(), createLocation(file, 1, 1));
  }

  return toValue({ file, document, lineCounter }, contents, Path.root);
}

export async function loadYamlFile(
  physicalPath: string,
  options: LoadYamlFileOptions = {},
): Promise<Value> {
  const text = await fs.readFile(physicalPath, "utf-8");
  return loadYaml(options.virtualPath ?? physicalPath, text);
}

function locate(context: LoadContext, node: Node): Location {
  const offset = node.range?.[0] ?? 0;
  const { line, col } = context.lineCounter.linePos(offset);
  return createLocation(context.file, line, col);
}

function toValue(context: LoadContext, node: Node, path: Path): Value {
  const location = locate(context, node);

  if (isAlias(node)) {
    const target = node.resolve(context.document);
    if (!target) {
      throw new ParseError(
        location.file,
        location.line,
        location.column,
        `unresolved alias "${node.source}"`,
      );
    }
    return toValue(context, target, path).withLocation(location);
  }

  if (isMap(node)) {
    const pairs: MappingPair[] = [];
    const seen = new Map<string, Location>();

    for (const pair of node.items) {
      if (!isScalar(pair.key)) {
        throw new ParseError(
          location.file,
          location.line,
          location.column,
          "only scalar mapping keys are supported",
        );
      }

      const key = String(pair.key.value);
      const keyLocation = locate(context, pair.key);
      const childPath = path.key(key);

      const firstLocation = seen.get(key);
      if (firstLocation) {
        throw new DuplicateKeyError(childPath, firstLocation, keyLocation);
      }
      seen.set(key, keyLocation);

      const value = isNode(pair.value)
        ? toValue(context, pair.value, childPath)
        : Value.nil(keyLocation);
      pairs.push({ key, keyLocation, value });
    }

    return Value.mapping(new Mapping(pairs), location);
  }

  if (isSeq(node)) {
    const items = node.items.map((item, position) =>
      isNode(item) ? toValue(context, item, path.index(position)) : Value.nil(location),
    );
    return Value.sequence(items, location);
  }

  return scalarValue(node, location);
}

function scalarValue(node: Node, location: Location): Value {
  const raw: unknown = isScalar(node) ? node.value : null;

  if (raw === null || raw === undefined) {
    return Value.nil(location);
  }

  if (typeof raw === "boolean") {
    return Value.bool(raw, location);
  }

  // Integer literals arrive as bigints, everything else numeric as numbers.
  if (typeof raw === "bigint") {
    return isInt64(raw) ? Value.int(raw, location) : Value.float(Number(raw), location);
  }

  if (typeof raw === "number") {
    return Value.float(raw, location);
  }

  return Value.string(String(raw), location);
}

function isNode(candidate: unknown): candidate is Node {
  return (
    isAlias(candidate) ||
    isMap(candidate) ||
    isSeq(candidate) ||
    isScalar(candidate)
  );
}
