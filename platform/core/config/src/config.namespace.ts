import { registerAs } from "@nestjs/config";
import type { RuntimeOptions } from "@bundlekit/types";
import { resolveRuntimeOptionsFromEnv } from "./runtime-env";

export const CONFIG_NAMESPACE = "bundlekit" as const;

export const bundlekitConfig = registerAs(
  CONFIG_NAMESPACE,
  (): RuntimeOptions => resolveRuntimeOptionsFromEnv(process.env),
);
