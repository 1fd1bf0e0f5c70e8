import { Module } from '@nestjs/common'
import { ConfigModule } from '@nestjs/config'
import { AgentModule } from './agent/agent.module'
import { ApprovalsModule } from './approvals/approvals.module'
import { ArtifactsModule } from './artifacts/artifacts.module'
import { validate } from './config/env.validation'
import { ConversationsModule } from './conversations/conversations.module'
import { DatabaseModule } from './database/database.module'
import { EmailModule } from './email/email.module'
import { SqlModule } from './sql/sql.module'
import { ToolsModule } from './tools/tools.module'

@Module({
  imports: [
    ConfigModule.forRoot({ isGlobal: true, validate }),
    SqlModule,
    DatabaseModule,
    ArtifactsModule,
    EmailModule,
    ToolsModule,
    ApprovalsModule,
    AgentModule,
    ConversationsModule,
  ],
})
export class AppModule {}
