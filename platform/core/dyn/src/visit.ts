import { InvalidPathError, TypeMismatchError } from "./errors";
import { isKeyComponent, Path, type PathComponent } from "./path";
import { Mapping, Value } from "./value";

/**
 * Resolves `path` inside `root`. Returns `undefined` when a key or index
 * along the way is absent; throws `TypeMismatchError` when a component is
 * applied to the wrong kind of node.
 */
export function getByPath(root: Value, path: Path): Value | undefined {
  let current: Value | undefined = root;
  let visited = Path.root;

  for (const component of path.components) {
    if (!current) {
      return undefined;
    }

    if (isKeyComponent(component)) {
      if (current.kind !== "mapping") {
        throw new TypeMismatchError("mapping", current.kind, {
          path: visited,
          message: `expected a mapping at "${visited.toString()}" to access key "${component.key}", found ${current.kind}`,
        });
      }
      current = current.get(component.key);
    } else {
      if (current.kind !== "sequence") {
        throw new TypeMismatchError("sequence", current.kind, {
          path: visited,
          message: `expected a sequence at "${visited.toString()}" to access index ${component.index}, found ${current.kind}`,
        });
      }
      current = current.index(component.index);
    }

    visited = visited.append(component);
  }

  return current;
}

export type ValueVisitor = (path: Path, value: Value) => void;

/**
 * Depth-first, pre-order traversal of every node below `root`.
 */
export function walk(root: Value, visitor: ValueVisitor, path: Path = Path.root): void {
  visitor(path, root);

  if (root.kind === "mapping") {
    for (const pair of root.asMapping().pairs()) {
      walk(pair.value, visitor, path.key(pair.key));
    }
  } else if (root.kind === "sequence") {
    root.asSequence().forEach((item, position) => {
      walk(item, visitor, path.index(position));
    });
  }
}

/**
 * Returns a copy of `root` with the node at `path` replaced by `next`.
 * Missing mapping keys along the way are created as empty mappings; an
 * index past the end of a sequence is rejected.
 */
export function setByPath(root: Value, path: Path, next: Value): Value {
  return setAt(root, path.components, 0, next, Path.root);
}

function setAt(
  current: Value,
  components: readonly PathComponent[],
  depth: number,
  next: Value,
  visited: Path,
): Value {
  const component = components[depth];
  if (component === undefined) {
    return next;
  }

  const childPath = visited.append(component);

  if (isKeyComponent(component)) {
    if (current.kind !== "mapping") {
      throw new TypeMismatchError("mapping", current.kind, {
        path: visited,
        message: `expected a mapping at "${visited.toString()}" to set key "${component.key}", found ${current.kind}`,
      });
    }

    const mapping = current.asMapping();
    const pair = mapping.pair(component.key);
    const child = pair?.value ?? Value.mapping(new Mapping(), next.location);
    const updated = setAt(child, components, depth + 1, next, childPath);
    return current.withMapping(
      mapping.set(component.key, updated, pair?.keyLocation ?? next.location),
    );
  }

  if (current.kind !== "sequence") {
    throw new TypeMismatchError("sequence", current.kind, {
      path: visited,
      message: `expected a sequence at "${visited.toString()}" to set index ${component.index}, found ${current.kind}`,
    });
  }

  const items = current.asSequence();
  const child = items[component.index];
  if (child === undefined) {
    throw new InvalidPathError(
      childPath.toString(),
      `index ${component.index} out of range for sequence of length ${items.length}`,
    );
  }

  const updated = setAt(child, components, depth + 1, next, childPath);
  return current.withSequence(
    items.map((item, position) => (position === component.index ? updated : item)),
  );
}
