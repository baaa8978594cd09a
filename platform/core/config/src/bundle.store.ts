import { Inject, Injectable, Optional } from "@nestjs/common";
import { BehaviorSubject, Observable, distinctUntilChanged } from "rxjs";
import { Mapping, Value } from "@bundlekit/dyn";

export const INITIAL_BUNDLE_TOKEN = Symbol("BUNDLEKIT_INITIAL_BUNDLE");

export type BundleTransform = (current: Value) => Value | Promise<Value>;

/**
 * Holds the current bundle document. Values are immutable, so snapshots are
 * shared rather than cloned; every change installs a new tree.
 */
@Injectable()
export class BundleStore {
  private static snapshotsMatch(previous: Value, next: Value): boolean {
    return previous === next || previous.equals(next);
  }

  private readonly subject: BehaviorSubject<Value>;

  private queue: Promise<unknown> = Promise.resolve();

  private projectRoot?: string;

  readonly changes$: Observable<Value>;

  constructor(
    @Optional()
    @Inject(INITIAL_BUNDLE_TOKEN)
    initialBundle?: Value,
  ) {
    this.subject = new BehaviorSubject<Value>(
      initialBundle ?? Value.mapping(new Mapping()),
    );
    this.changes$ = this.subject
      .asObservable()
      .pipe(distinctUntilChanged(BundleStore.snapshotsMatch));
  }

  setSnapshot(snapshot: Value): void {
    this.subject.next(snapshot);
  }

  getSnapshot(): Value {
    return this.subject.getValue();
  }

  /** Directory the current document was loaded from. */
  setProjectRoot(root: string): void {
    this.projectRoot = root;
  }

  getProjectRoot(): string | undefined {
    return this.projectRoot;
  }

  /**
   * Runs `transform` against the current document and installs its result.
   * Transactions run one after another; when one throws, the document is
   * left as it was and the returned promise rejects.
   */
  mutate(transform: BundleTransform): Promise<Value> {
    const run = async (): Promise<Value> => {
      const next = await transform(this.subject.getValue());
      this.subject.next(next);
      return next;
    };

    const result = this.queue.then(run);
    // Failures reach the caller through `result`; the queue only orders work.
    this.queue = result.then(
      () => undefined,
      () => undefined,
    );
    return result;
  }
}
