import { Global, Module } from "@nestjs/common";
import { ConfigModule as NestConfigModule } from "@nestjs/config";
import type { RuntimeOptions } from "@bundlekit/types";
import { BundleLoaderService } from "./bundle-loader.service";
import { BundleStore } from "./bundle.store";
import {
  ConfigurableModuleClass,
  MODULE_OPTIONS_TOKEN,
  RUNTIME_OPTIONS_TOKEN,
  TYPE_VALIDATORS_TOKEN,
} from "./config.const";
import { bundlekitConfig } from "./config.namespace";
import { resolveRuntimeOptions } from "./runtime-env";
import { createTypeValidators } from "./validation/type-validators";
import { Normalizer } from "./validation/normalizer";

@Global()
@Module({
  imports: [NestConfigModule.forFeature(bundlekitConfig)],
  providers: [
    {
      provide: RUNTIME_OPTIONS_TOKEN,
      useFactory: (
        moduleOptions: RuntimeOptions | undefined,
        envOptions: RuntimeOptions,
      ): RuntimeOptions => resolveRuntimeOptions(moduleOptions, envOptions),
      inject: [
        { token: MODULE_OPTIONS_TOKEN, optional: true },
        bundlekitConfig.KEY,
      ],
    },
    {
      provide: TYPE_VALIDATORS_TOKEN,
      useFactory: createTypeValidators,
    },
    Normalizer,
    BundleStore,
    BundleLoaderService,
  ],
  exports: [
    RUNTIME_OPTIONS_TOKEN,
    TYPE_VALIDATORS_TOKEN,
    Normalizer,
    BundleStore,
    BundleLoaderService,
    NestConfigModule,
  ],
})
export class ConfigModule extends ConfigurableModuleClass {
  static register(
    options: RuntimeOptions,
  ): ReturnType<typeof ConfigurableModuleClass["register"]> {
    return {
      ...super.register(options),
      global: true,
    };
  }

  static registerAsync(
    options: Parameters<typeof ConfigurableModuleClass["registerAsync"]>[0],
  ): ReturnType<typeof ConfigurableModuleClass["registerAsync"]> {
    return {
      ...super.registerAsync(options),
      global: true,
    };
  }
}
