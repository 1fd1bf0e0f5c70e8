import { Module } from '@nestjs/common'
import { ApprovalsModule } from '../approvals/approvals.module'
import { ToolsModule } from '../tools/tools.module'
import { AgentService } from './agent.service'
import { ChatModel } from './chat-model'
import { LLMService } from './llm.service'

@Module({
  imports: [ToolsModule, ApprovalsModule],
  providers: [AgentService, LLMService, { provide: ChatModel, useExisting: LLMService }],
  exports: [AgentService],
})
export class AgentModule {}
