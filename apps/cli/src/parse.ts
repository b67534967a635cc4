/**
 * Simple arg parsing helpers.
 * Supports --key=value and --flag syntax.
 */

export function parseKV(args: string[]): Record<string, string> {
  const result: Record<string, string> = {};
  for (const arg of args) {
    if (arg.startsWith("--")) {
      const eqIdx = arg.indexOf("=");
      if (eqIdx > 0) {
        result[arg.slice(2, eqIdx)] = arg.slice(eqIdx + 1);
      } else {
        result[arg.slice(2)] = "true";
      }
    }
  }
  return result;
}

/** Comma-separated list, e.g. `--ids=97,256,257`. */
export function listArg(kv: Record<string, string>, key: string): string[] | undefined {
  const val = kv[key];
  if (val === undefined) return undefined;
  return val.split(",").map((s) => s.trim()).filter((s) => s.length > 0);
}

/** Load a JSON config file and merge with CLI overrides. */
export async function loadConfig(kv: Record<string, string>): Promise<Record<string, unknown>> {
  const configPath = kv["config"];
  if (!configPath) return kv;
  const fs = await import("node:fs/promises");
  const raw = await fs.readFile(configPath, "utf-8");
  const config: unknown = JSON.parse(raw);
  if (typeof config !== "object" || config === null || Array.isArray(config)) {
    throw new Error(`Config file ${configPath} must contain a JSON object`);
  }
  // CLI overrides take precedence
  return { ...config, ...kv };
}
