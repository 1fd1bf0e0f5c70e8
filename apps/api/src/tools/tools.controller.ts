import { Controller, Get, HttpCode, Post } from '@nestjs/common'
import { ApiTags } from '@nestjs/swagger'
import { SchemaCatalogService } from '../database/schema-catalog.service'
import { ToolsService } from './tools.service'

@ApiTags('tools')
@Controller('tools')
export class ToolsController {
  constructor(
    private tools: ToolsService,
    private schemaCatalog: SchemaCatalogService,
  ) {}

  @Get()
  list() {
    return this.tools.describeAll()
  }

  @Post('schema/refresh')
  @HttpCode(200)
  refreshSchema() {
    this.schemaCatalog.invalidate()
    return this.schemaCatalog.describe()
  }
}
