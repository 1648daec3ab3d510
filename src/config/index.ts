import { existsSync } from "node:fs";
import { readFile } from "node:fs/promises";
import { parse as parseYaml } from "yaml";
import { z } from "zod/v4";

export const CatalogConfigSchema = z.object({
  zeroDiameterIsUnknown: z.boolean().optional(),
  strictLinking: z.boolean().optional(),
  quiet: z.boolean().optional(),
});

export interface CatalogConfig {
  /** Treat a diameter of 0 as unknown (NaN) */
  zeroDiameterIsUnknown: boolean;
  /** Throw instead of collecting link issues */
  strictLinking: boolean;
  /** Suppress info and warning output */
  quiet: boolean;
}

export const DEFAULT_CONFIG: CatalogConfig = {
  zeroDiameterIsUnknown: true,
  strictLinking: false,
  quiet: false,
};

/**
 * Parse a YAML config string and merge it onto the defaults
 */
export function parseConfig(content: string): CatalogConfig {
  // An empty document parses to null
  const data: unknown = parseYaml(content) ?? {};
  const parsed = CatalogConfigSchema.parse(data);
  return {
    zeroDiameterIsUnknown:
      parsed.zeroDiameterIsUnknown ?? DEFAULT_CONFIG.zeroDiameterIsUnknown,
    strictLinking: parsed.strictLinking ?? DEFAULT_CONFIG.strictLinking,
    quiet: parsed.quiet ?? DEFAULT_CONFIG.quiet,
  };
}

/**
 * Load config from a YAML file. A missing file yields the defaults.
 */
export async function loadConfig(configPath: string): Promise<CatalogConfig> {
  if (!existsSync(configPath)) {
    return { ...DEFAULT_CONFIG };
  }
  const content = await readFile(configPath, "utf-8");
  return parseConfig(content);
}
