import { ConfigurableModuleBuilder } from "@nestjs/common";
import type { RuntimeOptions } from "@bundlekit/types";

const configurableModule =
  new ConfigurableModuleBuilder<RuntimeOptions>().build();

export const { ConfigurableModuleClass } = configurableModule;

/**
 * Provides the module options token for runtime configuration passed to
 * `ConfigModule.register`.
 */
export const { MODULE_OPTIONS_TOKEN } = configurableModule;

/**
 * Provides the token for the resolved runtime options: module options layered
 * over values read from the environment.
 */
export const RUNTIME_OPTIONS_TOKEN = Symbol("BUNDLEKIT_RUNTIME_OPTIONS");

/**
 * Provides the token for the scalar type dispatch table shared by the
 * normalizer and template schemas.
 */
export const TYPE_VALIDATORS_TOKEN = Symbol("BUNDLEKIT_TYPE_VALIDATORS");
