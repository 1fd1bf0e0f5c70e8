import { Body, Controller, HttpCode, Post, Res } from '@nestjs/common'
import { ApiTags } from '@nestjs/swagger'
import { Response } from 'express'
import { ChatDto } from './chat.dto'
import { ChatService } from './chat.service'

@ApiTags('chat')
@Controller('chat')
export class ChatController {
  constructor(private chat: ChatService) {}

  @Post()
  @HttpCode(200)
  async send(@Body() dto: ChatDto, @Res({ passthrough: true }) res: Response) {
    // a client that hangs up stops the run; consent state is settled by the approvals store
    const abort = new AbortController()
    const onClose = () => {
      if (!res.writableFinished) abort.abort()
    }
    res.on('close', onClose)
    try {
      return await this.chat.handle(dto, abort.signal)
    } finally {
      res.off('close', onClose)
    }
  }
}
