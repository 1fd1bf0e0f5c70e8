import { Module } from '@nestjs/common'
import { EmailService } from './email.service'
import { MailTransport } from './mail-transport'
import { ResendMailTransport } from './resend-mail-transport'

@Module({
  providers: [ResendMailTransport, { provide: MailTransport, useExisting: ResendMailTransport }, EmailService],
  exports: [EmailService],
})
export class EmailModule {}
