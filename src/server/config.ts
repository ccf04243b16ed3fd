export interface AppConfig {
  port: number;
  maxUploadMb: number;
  workerCount: number;
  showSourceBanner: boolean;
  mergeAttachments: boolean;
  /** Directory /api/batch paths are confined to; the endpoint is off without one */
  batchRoot: string | undefined;
}

export const DEFAULT_CONFIG: AppConfig = {
  port: 3000,
  maxUploadMb: 50,
  workerCount: 4,
  showSourceBanner: true,
  mergeAttachments: true,
  batchRoot: undefined,
};

const TRUE_VALUES = new Set(["1", "true", "yes", "on"]);
const FALSE_VALUES = new Set(["0", "false", "no", "off"]);

export function parsePositiveInt(value: string | undefined, fallback: number): number {
  if (value === undefined || value.trim() === "") return fallback;
  const parsed = Number(value);
  return Number.isInteger(parsed) && parsed > 0 ? parsed : fallback;
}

export function parseFlag(value: string | undefined, fallback: boolean): boolean {
  const normalized = value?.trim().toLowerCase();
  if (normalized === undefined) return fallback;
  if (TRUE_VALUES.has(normalized)) return true;
  if (FALSE_VALUES.has(normalized)) return false;
  return fallback;
}

/**
 * Reads settings from the environment. Unset or invalid values fall back to
 * the defaults.
 */
export function loadConfig(env: NodeJS.ProcessEnv = process.env): AppConfig {
  return {
    port: parsePositiveInt(env.PORT, DEFAULT_CONFIG.port),
    maxUploadMb: parsePositiveInt(env.MAX_UPLOAD_MB, DEFAULT_CONFIG.maxUploadMb),
    workerCount: parsePositiveInt(env.MSG_TO_PDF_WORKERS, DEFAULT_CONFIG.workerCount),
    showSourceBanner: parseFlag(env.MSG_TO_PDF_BANNER, DEFAULT_CONFIG.showSourceBanner),
    mergeAttachments: parseFlag(env.MSG_TO_PDF_MERGE, DEFAULT_CONFIG.mergeAttachments),
    batchRoot: env.MSG_TO_PDF_BATCH_ROOT?.trim() || DEFAULT_CONFIG.batchRoot,
  };
}
