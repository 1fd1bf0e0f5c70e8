import { Module } from '@nestjs/common'
import { ArtifactsService } from './artifacts.service'
import { ObjectStorage } from './object-storage'
import { S3ObjectStorage } from './s3-object-storage'

@Module({
  providers: [
    S3ObjectStorage,
    { provide: ObjectStorage, useExisting: S3ObjectStorage },
    ArtifactsService,
  ],
  exports: [ArtifactsService],
})
export class ArtifactsModule {}
