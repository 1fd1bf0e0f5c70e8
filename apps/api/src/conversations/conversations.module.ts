import { Module } from '@nestjs/common'
import { AgentModule } from '../agent/agent.module'
import { ApprovalsModule } from '../approvals/approvals.module'
import { ChatController } from './chat.controller'
import { ChatService } from './chat.service'

@Module({
  imports: [AgentModule, ApprovalsModule],
  controllers: [ChatController],
  providers: [ChatService],
})
export class ConversationsModule {}
