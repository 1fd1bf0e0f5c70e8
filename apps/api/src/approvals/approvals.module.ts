import { Module } from '@nestjs/common'
import { ToolsModule } from '../tools/tools.module'
import { ApprovalsController } from './approvals.controller'
import { ApprovalsService } from './approvals.service'
import { InMemoryPendingActionStore, PendingActionStore } from './pending-action.store'

@Module({
  imports: [ToolsModule],
  providers: [
    InMemoryPendingActionStore,
    { provide: PendingActionStore, useExisting: InMemoryPendingActionStore },
    ApprovalsService,
  ],
  controllers: [ApprovalsController],
  exports: [ApprovalsService],
})
export class ApprovalsModule {}
