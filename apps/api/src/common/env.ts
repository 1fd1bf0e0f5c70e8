import type { ConfigService } from '@nestjs/config'

function readRaw(config: ConfigService, name: string): string | undefined {
  const raw = config.get<string | number | boolean>(name)
  if (raw == null) return undefined
  const value = String(raw).trim()
  return value ? value : undefined
}

export function readStringEnv(config: ConfigService, name: string): string | undefined
export function readStringEnv(config: ConfigService, name: string, fallback: string): string
export function readStringEnv(config: ConfigService, name: string, fallback?: string) {
  return readRaw(config, name) ?? fallback
}

export function readIntEnv(
  config: ConfigService,
  name: string,
  fallback: number,
  bounds: { min?: number; max?: number } = {},
) {
  const raw = readRaw(config, name)
  const parsed = raw == null ? Number.NaN : Number.parseInt(raw, 10)
  const value = Number.isFinite(parsed) ? parsed : fallback
  const min = bounds.min ?? Number.MIN_SAFE_INTEGER
  const max = bounds.max ?? Number.MAX_SAFE_INTEGER
  return Math.max(min, Math.min(value, max))
}

export function readBooleanEnv(config: ConfigService, name: string, fallback: boolean) {
  const raw = readRaw(config, name)
  if (raw == null) return fallback
  const normalized = raw.toLowerCase()
  if (['1', 'true', 'yes', 'on'].includes(normalized)) return true
  if (['0', 'false', 'no', 'off'].includes(normalized)) return false
  return fallback
}

export function readListEnv(config: ConfigService, name: string) {
  return (readRaw(config, name) ?? '')
    .split(',')
    .map((value) => value.trim())
    .filter(Boolean)
}
