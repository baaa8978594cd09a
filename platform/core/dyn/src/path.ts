import { InvalidPathError } from "./errors";

export type PathComponent =
  | { readonly key: string }
  | { readonly index: number };

export function isKeyComponent(
  component: PathComponent,
): component is { readonly key: string } {
  return "key" in component;
}

/**
 * Address of a node inside a value tree. Paths are immutable; every
 * operation returns a new instance.
 */
export class Path {
  static readonly root = new Path([]);

  private constructor(readonly components: readonly PathComponent[]) {}

  static of(...components: PathComponent[]): Path {
    return components.length === 0 ? Path.root : new Path([...components]);
  }

  static key(key: string): PathComponent {
    return { key };
  }

  static index(index: number): PathComponent {
    if (!Number.isSafeInteger(index) || index < 0) {
      throw new InvalidPathError(String(index), "index must be a non-negative integer");
    }
    return { index };
  }

  /**
   * Parses the dotted/bracketed notation produced by {@link Path.toString},
   * e.g. `resources.jobs.job0.tasks[0]`.
   */
  static parse(input: string): Path {
    if (input === "") {
      return Path.root;
    }

    const components: PathComponent[] = [];
    let cursor = 0;

    while (cursor < input.length) {
      if (input[cursor] === "[") {
        const close = input.indexOf("]", cursor);
        if (close === -1) {
          throw new InvalidPathError(input, "unterminated index");
        }

        const digits = input.slice(cursor + 1, close);
        if (!/^\d+$/.test(digits)) {
          throw new InvalidPathError(input, `invalid index "${digits}"`);
        }

        components.push(Path.index(Number(digits)));
        cursor = close + 1;
      } else {
        let end = cursor;
        while (end < input.length && input[end] !== "." && input[end] !== "[") {
          end += 1;
        }

        const key = input.slice(cursor, end);
        if (key === "") {
          throw new InvalidPathError(input, "empty key");
        }

        components.push(Path.key(key));
        cursor = end;
      }

      if (cursor >= input.length) {
        break;
      }

      if (input[cursor] === ".") {
        cursor += 1;
        if (cursor >= input.length) {
          throw new InvalidPathError(input, "trailing separator");
        }
      } else if (input[cursor] !== "[") {
        throw new InvalidPathError(input, `unexpected character "${input[cursor]}"`);
      }
    }

    return new Path(components);
  }

  get length(): number {
    return this.components.length;
  }

  append(...components: PathComponent[]): Path {
    return new Path([...this.components, ...components]);
  }

  key(key: string): Path {
    return this.append(Path.key(key));
  }

  index(index: number): Path {
    return this.append(Path.index(index));
  }

  parent(): Path {
    return this.components.length === 0
      ? this
      : Path.of(...this.components.slice(0, -1));
  }

  last(): PathComponent | undefined {
    return this.components[this.components.length - 1];
  }

  hasPrefix(prefix: Path): boolean {
    if (prefix.length > this.length) {
      return false;
    }

    return prefix.components.every((component, position) =>
      componentsEqual(component, this.components[position]),
    );
  }

  equals(other: Path): boolean {
    return other.length === this.length && this.hasPrefix(other);
  }

  toString(): string {
    let rendered = "";
    this.components.forEach((component, position) => {
      if (isKeyComponent(component)) {
        rendered += position === 0 ? component.key : `.${component.key}`;
      } else {
        rendered += `[${component.index}]`;
      }
    });
    return rendered;
  }
}

function componentsEqual(
  left: PathComponent,
  right: PathComponent | undefined,
): boolean {
  if (!right) {
    return false;
  }

  if (isKeyComponent(left)) {
    return isKeyComponent(right) && left.key === right.key;
  }

  return !isKeyComponent(right) && left.index === right.index;
}
