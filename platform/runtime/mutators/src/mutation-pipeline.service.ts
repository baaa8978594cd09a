import { Inject, Injectable } from "@nestjs/common";
import type { Logger } from "pino";
import type { BundleStore } from "@bundlekit/config";
import type { Value } from "@bundlekit/dyn";
import { InjectLogger } from "@bundlekit/io";
import type { MutationRunOptions } from "@bundlekit/types";
import { PluginCancelledError } from "./errors";
import { BUNDLE_MUTATORS_TOKEN, MUTATORS_LOGGER_SCOPE } from "./mutators.const";
import type { BundleMutator } from "./plugin-mutator";

@Injectable()
export class MutationPipelineService {
  constructor(
    @Inject(BUNDLE_MUTATORS_TOKEN)
    private readonly mutators: readonly BundleMutator[],
    @InjectLogger(MUTATORS_LOGGER_SCOPE)
    private readonly logger: Logger,
  ) {}

  get mutatorNames(): string[] {
    return this.mutators.map((mutator) => mutator.name);
  }

  /**
   * Applies every mutator to `store` in order. The first failure stops the
   * run; the store keeps whatever earlier mutators installed.
   */
  async run(store: BundleStore, options: MutationRunOptions = {}): Promise<Value> {
    for (const mutator of this.mutators) {
      if (options.signal?.aborted) {
        throw new PluginCancelledError();
      }

      this.logger.debug({ mutator: mutator.name }, "Applying mutator");
      try {
        await mutator.apply(store, options);
      } catch (error) {
        this.logger.error({ mutator: mutator.name, err: error }, "Mutator failed");
        throw error;
      }
    }

    return store.getSnapshot();
  }
}
