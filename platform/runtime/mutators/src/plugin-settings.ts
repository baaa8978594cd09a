import { z } from "zod";
import { getByPath, Path, type Value } from "@bundlekit/dyn";
import type { PluginSettings } from "@bundlekit/types";
import { PluginSettingsError } from "./errors";

export const DEFAULT_PLUGIN_MODULE = "bundlekit_plugins.build";

export const PLUGIN_SETTINGS_PATH = Path.parse("experimental.plugins");

const pluginSettingsSchema = z
  .object({
    enabled: z.boolean().nullish(),
    venv_path: z.string().nullish(),
    module: z.string().nullish(),
  })
  .loose();

/**
 * Reads `experimental.plugins` from a bundle document. A missing or empty
 * section means plugins are disabled.
 */
export function readPluginSettings(document: Value): PluginSettings {
  const section = getByPath(document, PLUGIN_SETTINGS_PATH);
  const plain = section === undefined || section.isNil() ? {} : section.toPlain();

  const parsed = pluginSettingsSchema.safeParse(plain);
  if (!parsed.success) {
    throw new PluginSettingsError(
      `invalid "experimental.plugins": ${z.prettifyError(parsed.error)}`,
      { cause: parsed.error },
    );
  }

  const enabled = parsed.data.enabled ?? false;
  const venvPath = parsed.data.venv_path || undefined;

  if (enabled && !venvPath) {
    throw new PluginSettingsError(
      '"experimental.plugins.enabled" can only be used when "experimental.plugins.venv_path" is set',
    );
  }

  return {
    enabled,
    venvPath,
    module: parsed.data.module || DEFAULT_PLUGIN_MODULE,
  };
}
