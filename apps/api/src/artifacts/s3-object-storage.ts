import { Injectable, Logger, OnModuleDestroy } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { DeleteObjectCommand, GetObjectCommand, PutObjectCommand, S3Client } from '@aws-sdk/client-s3'
import { getSignedUrl } from '@aws-sdk/s3-request-presigner'
import { readBooleanEnv, readStringEnv } from '../common/env'
import { IssuerUnavailableError } from '../common/errors'
import { ObjectStorage, type PresignOptions, type StoredObject } from './object-storage'

@Injectable()
export class S3ObjectStorage extends ObjectStorage implements OnModuleDestroy {
  private readonly logger = new Logger(S3ObjectStorage.name)
  private readonly client: S3Client
  private readonly bucket: string | undefined

  constructor(config: ConfigService) {
    super()
    this.bucket = readStringEnv(config, 'ARTIFACT_BUCKET')
    const endpoint = readStringEnv(config, 'S3_ENDPOINT')
    this.client = new S3Client({
      region: readStringEnv(config, 'AWS_REGION', 'us-east-1'),
      ...(endpoint ? { endpoint } : {}),
      forcePathStyle: readBooleanEnv(config, 'S3_FORCE_PATH_STYLE', false),
    })
    if (!this.bucket) {
      this.logger.warn('ARTIFACT_BUCKET is not set; exports will fail until it is configured.')
    }
  }

  onModuleDestroy() {
    this.client.destroy()
  }

  async put({ key, body, contentType, signal }: StoredObject) {
    await this.client.send(
      new PutObjectCommand({
        Bucket: this.requireBucket(),
        Key: key,
        Body: body,
        ContentType: contentType,
        CacheControl: 'private, no-store',
        ServerSideEncryption: 'AES256',
      }),
      { abortSignal: signal },
    )
  }

  async presignGet(key: string, { expiresInSeconds, filename }: PresignOptions) {
    const command = new GetObjectCommand({
      Bucket: this.requireBucket(),
      Key: key,
      ResponseContentDisposition: `attachment; filename="${filename.replace(/"/g, '')}"`,
    })
    return getSignedUrl(this.client, command, { expiresIn: expiresInSeconds })
  }

  async delete(key: string) {
    await this.client.send(new DeleteObjectCommand({ Bucket: this.requireBucket(), Key: key }))
  }

  private requireBucket() {
    if (!this.bucket) throw new IssuerUnavailableError('Artifact storage is not configured')
    return this.bucket
  }
}
