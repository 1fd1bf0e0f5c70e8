import { Injectable, Logger } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import {
  ARTIFACT_DEFAULT_EXPIRY_MINUTES,
  ARTIFACT_MAX_EXPIRY_MINUTES,
  type ArtifactFormat,
  type IssuedArtifact,
} from '@invoice-agent/shared'
import { readIntEnv, readStringEnv } from '../common/env'
import { AgentError, ArtifactSerializationError, IssuerUnavailableError, describeError } from '../common/errors'
import { isRecord } from '../common/records'
import { withTimeout } from '../common/timeout'
import { buildArtifactKey, slugifyFilename } from './artifact-key'
import { ObjectStorage } from './object-storage'
import { serializeCsv } from './serializers/csv.serializer'
import { renderPdfReport } from './serializers/pdf.serializer'

export interface ArtifactMetadata {
  filename?: string
  title?: string
  summary?: string
  /** Column order; defaults to the keys of the first row. */
  columns?: string[]
  expiryMinutes?: number
  signal?: AbortSignal
}

const CONTENT_TYPES: Record<ArtifactFormat, string> = {
  csv: 'text/csv; charset=utf-8',
  pdf: 'application/pdf',
}

export function clampExpiryMinutes(minutes: number) {
  if (!Number.isFinite(minutes)) return ARTIFACT_DEFAULT_EXPIRY_MINUTES
  return Math.max(1, Math.min(Math.round(minutes), ARTIFACT_MAX_EXPIRY_MINUTES))
}

@Injectable()
export class ArtifactsService {
  private readonly logger = new Logger(ArtifactsService.name)
  private readonly prefix: string
  private readonly defaultExpiryMinutes: number
  private readonly timeoutMs: number

  constructor(
    private readonly storage: ObjectStorage,
    config: ConfigService,
  ) {
    this.prefix = readStringEnv(config, 'ARTIFACT_PREFIX', 'sessiondumps')
    this.defaultExpiryMinutes = clampExpiryMinutes(
      readIntEnv(config, 'ARTIFACT_DEFAULT_EXPIRY_MINUTES', ARTIFACT_DEFAULT_EXPIRY_MINUTES),
    )
    this.timeoutMs = readIntEnv(config, 'STORAGE_TIMEOUT_MS', 15_000, { min: 1_000, max: 120_000 })
  }

  /** Serializes `rows` in memory, stores the file privately and returns a time-boxed download link. */
  async issue(format: ArtifactFormat, rows: unknown[], metadata: ArtifactMetadata = {}): Promise<IssuedArtifact> {
    const records = rows.map((row, index) => {
      if (!isRecord(row)) throw new ArtifactSerializationError(`Row ${index + 1} is not an object`)
      return row
    })
    const columns = metadata.columns?.length ? metadata.columns : Object.keys(records[0] ?? {})
    const expiryMinutes = clampExpiryMinutes(metadata.expiryMinutes ?? this.defaultExpiryMinutes)
    const filename = `${slugifyFilename(metadata.filename ?? metadata.title)}.${format}`
    const issuedAt = new Date()

    const body = format === 'csv'
      ? serializeCsv(records, columns)
      : await renderPdfReport({
        title: metadata.title ?? 'Query report',
        summary: metadata.summary,
        columns,
        rows: records,
        generatedAt: issuedAt,
      })

    const key = buildArtifactKey(this.prefix, issuedAt, filename)
    try {
      await withTimeout(
        'Artifact upload',
        this.timeoutMs,
        (signal) => this.storage.put({ key, body, contentType: CONTENT_TYPES[format], signal }),
        metadata.signal,
      )
    } catch (error) {
      throw this.storageError(key, error)
    }

    let url: string
    try {
      url = await withTimeout(
        'Artifact signing',
        this.timeoutMs,
        () => this.storage.presignGet(key, { expiresInSeconds: expiryMinutes * 60, filename }),
        metadata.signal,
      )
    } catch (error) {
      await this.discard(key)
      throw this.storageError(key, error)
    }

    const expiresAt = new Date(Date.now() + expiryMinutes * 60_000).toISOString()
    this.logger.log(`Issued ${format} artifact ${key} (${body.length} bytes, expires ${expiresAt})`)
    return { url, expiresAt, filename, format, byteLength: body.length }
  }

  private async discard(key: string) {
    try {
      await this.storage.delete(key)
    } catch (error) {
      this.logger.warn(`Could not delete unsigned artifact ${key}: ${describeError(error)}`)
    }
  }

  private storageError(key: string, error: unknown) {
    if (error instanceof AgentError) return error
    this.logger.warn(`Artifact storage failed for ${key}: ${describeError(error)}`)
    return new IssuerUnavailableError('Artifact storage is unavailable', { cause: error })
  }
}
