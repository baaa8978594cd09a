import { MergeViolationError } from "./errors";
import type { OverridePolicy } from "./override";
import type { Path } from "./path";
import type { Value } from "./value";

export type OverridePolicyKind = "unconditional" | "append-only" | "amend";

/**
 * Minimal logging surface accepted by policies; pino and Nest loggers both
 * satisfy it.
 */
export interface PolicyLogger {
  debug(message: string): void;
}

/**
 * Accepts every change: the overlay wins wherever it differs.
 */
export class UnconditionalOverridePolicy implements OverridePolicy {
  readonly kind = "unconditional" as const;

  onInsert(_path: Path, next: Value): Value {
    return next;
  }

  onUpdate(_path: Path, _previous: Value, next: Value): Value {
    return next;
  }

  onDelete(): void {}
}

/**
 * Only allows adding brand-new entries directly below `root`. Any update,
 * any delete and any insert elsewhere (including a new field inside an
 * existing entry) is rejected.
 */
export class AppendOnlyPolicy implements OverridePolicy {
  readonly kind = "append-only" as const;

  constructor(
    readonly root: Path,
    private readonly logger?: PolicyLogger,
  ) {}

  onInsert(path: Path, next: Value): Value {
    if (!path.hasPrefix(this.root) || path.length !== this.root.length + 1) {
      throw new MergeViolationError(path, "insert");
    }

    this.logger?.debug(`Insert value at "${path.toString()}"`);
    return next;
  }

  onUpdate(path: Path): Value {
    throw new MergeViolationError(path, "update");
  }

  onDelete(path: Path): void {
    throw new MergeViolationError(path, "delete");
  }
}

/**
 * Allows inserting, updating and deleting anything below `root`, except
 * deleting a whole entry directly below it. Changes outside `root` are
 * rejected.
 */
export class AmendPolicy implements OverridePolicy {
  readonly kind = "amend" as const;

  constructor(
    readonly root: Path,
    private readonly logger?: PolicyLogger,
  ) {}

  onInsert(path: Path, next: Value): Value {
    if (!path.hasPrefix(this.root)) {
      throw new MergeViolationError(path, "insert");
    }

    this.logger?.debug(`Insert value at "${path.toString()}"`);
    return next;
  }

  onUpdate(path: Path, _previous: Value, next: Value): Value {
    if (!path.hasPrefix(this.root)) {
      throw new MergeViolationError(path, "update");
    }

    this.logger?.debug(`Update value at "${path.toString()}"`);
    return next;
  }

  onDelete(path: Path): void {
    if (!path.hasPrefix(this.root) || path.length === this.root.length + 1) {
      throw new MergeViolationError(path, "delete");
    }

    this.logger?.debug(`Delete value at "${path.toString()}"`);
  }
}

export type NamedOverridePolicy =
  | UnconditionalOverridePolicy
  | AppendOnlyPolicy
  | AmendPolicy;
