import { ApiProperty, ApiPropertyOptional } from '@nestjs/swagger'
import { Type } from 'class-transformer'
import {
  Allow,
  ArrayMaxSize,
  IsArray,
  IsBoolean,
  IsIn,
  IsNotEmpty,
  IsObject,
  IsOptional,
  IsString,
  MaxLength,
  ValidateNested,
} from 'class-validator'
import type { ConsentDecision, ErrorKind } from '@invoice-agent/shared'

const MAX_HISTORY_TURNS = 400
const MAX_MESSAGE_CHARS = 8000

const ERROR_KINDS: Record<ErrorKind, true> = {
  ValidationError: true,
  UnknownTool: true,
  RewriteError: true,
  QueryFailed: true,
  UpstreamTimeout: true,
  UpstreamUnavailable: true,
  IssuerUnavailable: true,
  SerializationError: true,
  DeliveryFailed: true,
  NoPendingAction: true,
  ActionAlreadyExecuted: true,
  PendingActionConflict: true,
  RoundLimitExceeded: true,
  RequestCancelled: true,
  Skipped: true,
  NotFound: true,
  InternalError: true,
}

class ErrorBodyDto {
  @IsIn(Object.keys(ERROR_KINDS)) kind!: ErrorKind
  @IsString() message!: string
}

class ToolResultDto {
  @IsBoolean() success!: boolean
  @Allow() output!: unknown
  @IsOptional() @ValidateNested() @Type(() => ErrorBodyDto) error?: ErrorBodyDto
  @IsBoolean() requiresConsent!: boolean
}

class ToolCallRequestDto {
  @IsString() @IsNotEmpty() id!: string
  @IsString() @IsNotEmpty() name!: string
  @IsObject() input!: Record<string, unknown>
  @IsOptional() @IsString() malformedInput?: string
}

/** Fallback for turns whose role matches no known shape, so they fail validation. */
class TurnDto {
  @IsIn(['user', 'assistant', 'tool']) role!: string
}

class UserTurnDto {
  @IsIn(['user']) role!: 'user'
  @IsString() content!: string
}

class AssistantTurnDto {
  @IsIn(['assistant']) role!: 'assistant'
  @IsString() content!: string
  @IsOptional() @IsArray() @ValidateNested({ each: true }) @Type(() => ToolCallRequestDto) toolCalls?: ToolCallRequestDto[]
}

class ToolTurnDto {
  @IsIn(['tool']) role!: 'tool'
  @IsString() @IsNotEmpty() callId!: string
  @IsString() @IsNotEmpty() toolName!: string
  @ValidateNested() @Type(() => ToolResultDto) result!: ToolResultDto
}

export class ChatActionDto {
  @ApiProperty({ description: 'Token of the action waiting for consent.' })
  @IsString()
  @IsNotEmpty()
  token!: string

  @ApiProperty({ enum: ['approve', 'reject'] })
  @IsIn(['approve', 'reject'])
  decision!: ConsentDecision
}

export class ChatDto {
  @ApiProperty({ description: 'Caller-owned conversation id.' })
  @IsString()
  @IsNotEmpty()
  @MaxLength(200)
  conversationId!: string

  @ApiProperty({ description: 'Turns so far, as returned by the previous response.', type: [Object] })
  @IsArray()
  @ArrayMaxSize(MAX_HISTORY_TURNS)
  @ValidateNested({ each: true })
  @Type(() => TurnDto, {
    discriminator: {
      property: 'role',
      subTypes: [
        { value: UserTurnDto, name: 'user' },
        { value: AssistantTurnDto, name: 'assistant' },
        { value: ToolTurnDto, name: 'tool' },
      ],
    },
    keepDiscriminatorProperty: true,
  })
  history!: Array<UserTurnDto | AssistantTurnDto | ToolTurnDto>

  @ApiPropertyOptional({ description: 'New user message.' })
  @IsOptional()
  @IsString()
  @IsNotEmpty()
  @MaxLength(MAX_MESSAGE_CHARS)
  message?: string

  @ApiPropertyOptional({ type: ChatActionDto })
  @IsOptional()
  @ValidateNested()
  @Type(() => ChatActionDto)
  action?: ChatActionDto
}
