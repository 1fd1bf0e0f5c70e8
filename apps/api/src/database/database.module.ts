import { Module } from '@nestjs/common'
import { DatabaseService } from './database.service'
import { SchemaCatalogService } from './schema-catalog.service'
import { SchemaIntrospectionService } from './schema-introspection.service'
import { SchemaSource } from './schema-source'
import { SqlExecutor } from './sql-executor'

@Module({
  providers: [
    DatabaseService,
    { provide: SqlExecutor, useExisting: DatabaseService },
    SchemaIntrospectionService,
    { provide: SchemaSource, useExisting: SchemaIntrospectionService },
    SchemaCatalogService,
  ],
  exports: [SqlExecutor, SchemaCatalogService],
})
export class DatabaseModule {}
