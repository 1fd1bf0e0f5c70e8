import { Body, Controller, Get, HttpCode, Param, Post } from '@nestjs/common'
import { ApiTags } from '@nestjs/swagger'
import { toPendingActionView } from './approval-followup'
import { ApprovalsService } from './approvals.service'
import { ResolveActionDto } from './resolve-action.dto'

@ApiTags('approvals')
@Controller('approvals')
export class ApprovalsController {
  constructor(private approvals: ApprovalsService) {}

  @Get(':token')
  async get(@Param('token') token: string) {
    return toPendingActionView(await this.approvals.get(token))
  }

  @Post(':token/approve')
  @HttpCode(200)
  async approve(@Param('token') token: string, @Body() dto: ResolveActionDto) {
    const { action, result } = await this.approvals.approve(token, dto.conversationId)
    return { action: toPendingActionView(action), result }
  }

  @Post(':token/reject')
  @HttpCode(200)
  async reject(@Param('token') token: string, @Body() dto: ResolveActionDto) {
    return toPendingActionView(await this.approvals.reject(token, dto.conversationId))
  }
}
