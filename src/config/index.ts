// pattern: Imperative Shell
import { readFileSync } from "node:fs";
import { parse } from "yaml";
import { ConfigError, formatIssues } from "../errors";
import { appConfigSchema } from "./schema";
import type { AppConfig } from "./schema";

function readConfigText(configPath: string): string {
  try {
    return readFileSync(configPath, "utf-8");
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`cannot read feedmap config ${configPath}: ${message}`, configPath, {
      cause: err,
    });
  }
}

/**
 * Loads a feedmap YAML config and applies defaults.
 * @throws ConfigError naming every invalid setting, `(root)` when the document
 * is not a mapping.
 */
export function loadConfig(configPath: string): AppConfig {
  const raw = readConfigText(configPath);

  let document: unknown;
  try {
    document = parse(raw);
  } catch (err) {
    const message = err instanceof Error ? err.message : String(err);
    throw new ConfigError(`feedmap config ${configPath} is not valid YAML: ${message}`, configPath, {
      cause: err,
    });
  }

  const result = appConfigSchema.safeParse(document);
  if (!result.success) {
    throw new ConfigError(
      `invalid feedmap config ${configPath}:\n${formatIssues(result.error.issues)}`,
      configPath,
    );
  }
  return result.data;
}

export type { AppConfig };
