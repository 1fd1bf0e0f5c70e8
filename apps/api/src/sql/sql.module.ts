import { Module } from '@nestjs/common'
import { SqlRewriterService } from './sql-rewriter.service'

@Module({
  providers: [SqlRewriterService],
  exports: [SqlRewriterService],
})
export class SqlModule {}
