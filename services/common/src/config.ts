export interface RuntimeConfig {
  serviceName: string;
  logLevel: string;
}

export interface ServiceConfig {
  runtime: RuntimeConfig;
}

let cachedConfig: ServiceConfig | null = null;

const LOG_LEVELS = ['fatal', 'error', 'warn', 'info', 'debug', 'trace', 'silent'] as const;

export function parseNumber(value: string | undefined, defaultValue: number): number {
  if (value === undefined || value.trim().length === 0) {
    return defaultValue;
  }

  const parsed = Number(value);
  return Number.isFinite(parsed) ? parsed : defaultValue;
}

export function parsePositiveNumber(value: string | undefined, defaultValue: number): number {
  const parsed = parseNumber(value, defaultValue);
  return parsed > 0 ? parsed : defaultValue;
}

export function parseBoolean(value: string | undefined, defaultValue: boolean): boolean {
  if (value === undefined) {
    return defaultValue;
  }

  const normalized = value.trim().toLowerCase();
  if (['true', '1', 'yes', 'y', 'on'].includes(normalized)) {
    return true;
  }

  if (['false', '0', 'no', 'n', 'off'].includes(normalized)) {
    return false;
  }

  return defaultValue;
}

export function readOptionalString(value: string | undefined): string | undefined {
  const trimmed = value?.trim();
  return trimmed && trimmed.length > 0 ? trimmed : undefined;
}

function resolveLogLevel(): string {
  const value = process.env.LOG_LEVEL?.trim().toLowerCase();
  if (!value) {
    return 'info';
  }

  return LOG_LEVELS.some((level) => level === value) ? value : 'info';
}

export function getConfig(): ServiceConfig {
  if (cachedConfig) {
    return cachedConfig;
  }

  cachedConfig = {
    runtime: {
      serviceName: readOptionalString(process.env.SERVICE_NAME) ?? 'jm-service',
      logLevel: resolveLogLevel()
    }
  };

  return cachedConfig;
}

export function resetConfigForTesting(): void {
  cachedConfig = null;
}
