import { Module } from '@nestjs/common'
import { ArtifactsModule } from '../artifacts/artifacts.module'
import { DatabaseModule } from '../database/database.module'
import { EmailModule } from '../email/email.module'
import { SqlModule } from '../sql/sql.module'
import { ToolsService } from './tools.service'
import { ToolsController } from './tools.controller'
import { QueryRunner } from './connectors/query-runner'
import { SqlQueryTool } from './connectors/sql-query.tool'
import { ExportCsvTool } from './connectors/export-csv.tool'
import { ExportReportTool } from './connectors/export-report.tool'
import { EmailConsentTool } from './connectors/email-consent.tool'

@Module({
  imports: [SqlModule, DatabaseModule, ArtifactsModule, EmailModule],
  providers: [ToolsService, QueryRunner, SqlQueryTool, ExportCsvTool, ExportReportTool, EmailConsentTool],
  controllers: [ToolsController],
  exports: [ToolsService],
})
export class ToolsModule {}
