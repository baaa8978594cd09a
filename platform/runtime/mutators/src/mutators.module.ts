import { Module } from "@nestjs/common";
import type { Provider } from "@nestjs/common";
import type { Logger } from "pino";
import { Normalizer, RUNTIME_OPTIONS_TOKEN } from "@bundlekit/config";
import { createLoggerProvider, getLoggerToken } from "@bundlekit/io";
import { PLUGIN_PHASES, type RuntimeOptions } from "@bundlekit/types";
import { FileChannelFactory, type ChannelFactory } from "./channels";
import { MutationPipelineService } from "./mutation-pipeline.service";
import {
  BUNDLE_MUTATORS_TOKEN,
  CHANNEL_FACTORY_TOKEN,
  MUTATORS_LOGGER_SCOPE,
  PROCESS_RUNNER_TOKEN,
} from "./mutators.const";
import { createPluginMutators } from "./plugin-mutator";
import { SpawnProcessRunner, type ProcessRunner } from "./process-runner";

const mutatorsLoggerProvider = createLoggerProvider(MUTATORS_LOGGER_SCOPE);

const processRunnerProvider: Provider = {
  provide: PROCESS_RUNNER_TOKEN,
  useFactory: (): ProcessRunner => new SpawnProcessRunner(),
};

const channelFactoryProvider: Provider = {
  provide: CHANNEL_FACTORY_TOKEN,
  useFactory: (options: RuntimeOptions): ChannelFactory =>
    new FileChannelFactory(options.tempDir),
  inject: [RUNTIME_OPTIONS_TOKEN],
};

const bundleMutatorsProvider: Provider = {
  provide: BUNDLE_MUTATORS_TOKEN,
  useFactory: (
    options: RuntimeOptions,
    normalizer: Normalizer,
    runner: ProcessRunner,
    channels: ChannelFactory,
    logger: Logger,
  ) =>
    createPluginMutators(
      {
        projectRoot: options.projectRoot,
        normalizer,
        runner,
        channels,
        logger,
      },
      PLUGIN_PHASES,
    ),
  inject: [
    RUNTIME_OPTIONS_TOKEN,
    Normalizer,
    PROCESS_RUNNER_TOKEN,
    CHANNEL_FACTORY_TOKEN,
    getLoggerToken(MUTATORS_LOGGER_SCOPE),
  ],
};

/**
 * Plugin mutators and the pipeline that runs them. Expects `ConfigModule`
 * and `IoModule` to be registered by the application.
 */
@Module({
  providers: [
    mutatorsLoggerProvider,
    processRunnerProvider,
    channelFactoryProvider,
    bundleMutatorsProvider,
    MutationPipelineService,
  ],
  exports: [MutationPipelineService, BUNDLE_MUTATORS_TOKEN],
})
export class MutatorsModule {}
