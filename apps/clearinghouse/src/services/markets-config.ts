/**
 * Markets Config Loader
 *
 * Reads the venue bootstrap file and validates it against MarketsConfigSchema.
 */

import { readFileSync } from "node:fs";

import { err, ok, Result } from "neverthrow";

import { MarketsConfigSchema, type MarketsConfig } from "../types/schemas";

export type ConfigError =
  | { type: "CONFIG_READ_ERROR"; message: string }
  | { type: "CONFIG_INVALID"; message: string };

const errorMessage = (error: unknown): string => (error instanceof Error ? error.message : String(error));

const parseJson = Result.fromThrowable(
  (text: string): unknown => JSON.parse(text),
  (error): ConfigError => ({ type: "CONFIG_INVALID", message: `invalid JSON: ${errorMessage(error)}` }),
);

export function parseMarketsConfig(text: string): Result<MarketsConfig, ConfigError> {
  return parseJson(text).andThen(json => {
    const parsed = MarketsConfigSchema.safeParse(json);
    if (!parsed.success) {
      const message = parsed.error.issues.map(issue => `${issue.path.map(String).join(".")}: ${issue.message}`).join("; ");
      return err<MarketsConfig, ConfigError>({ type: "CONFIG_INVALID", message });
    }
    return ok(parsed.data);
  });
}

export function loadMarketsConfig(path: string): Result<MarketsConfig, ConfigError> {
  const read = Result.fromThrowable(
    () => readFileSync(path, "utf8"),
    (error): ConfigError => ({ type: "CONFIG_READ_ERROR", message: `${path}: ${errorMessage(error)}` }),
  );
  return read().andThen(parseMarketsConfig);
}
