import { readEnum, readInt } from "./env.js";

/** Thresholds accepted by the structured logger. */
export const LOG_THRESHOLDS = ["debug", "info", "warn", "error", "silent"] as const;

export type LogThreshold = (typeof LOG_THRESHOLDS)[number];

/** Dialects of TGF node numbering: 0-based (default) or 1-based. */
export type TgfIndexBase = 0 | 1;

export interface RuntimeConfig {
  /** Minimum level written by loggers built through {@link createLogger}. */
  readonly logLevel: LogThreshold;
  /** Index base applied by the TGF codec when the caller does not choose one. */
  readonly tgfIndexBase: TgfIndexBase;
}

/** Environment variable selecting the logger threshold. */
export const LOG_LEVEL_ENV = "MATRIX_GRAPH_LOG_LEVEL";

/** Environment variable selecting the default TGF index base. */
export const TGF_INDEX_BASE_ENV = "MATRIX_GRAPH_TGF_INDEX_BASE";

/**
 * Resolves the runtime configuration from the environment. Nothing is cached
 * so a change to `process.env` takes effect on the next call.
 */
export function loadRuntimeConfig(): RuntimeConfig {
  const logLevel = readEnum(LOG_LEVEL_ENV, LOG_THRESHOLDS, "warn");
  const tgfIndexBase = readInt(TGF_INDEX_BASE_ENV, 0, { min: 0, max: 1 }) === 1 ? 1 : 0;
  return { logLevel, tgfIndexBase };
}
