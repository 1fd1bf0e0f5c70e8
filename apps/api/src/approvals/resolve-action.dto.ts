import { ApiProperty } from '@nestjs/swagger'
import { IsNotEmpty, IsString, MaxLength } from 'class-validator'

export class ResolveActionDto {
  @ApiProperty({ description: 'Conversation the action belongs to.' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  conversationId!: string
}
