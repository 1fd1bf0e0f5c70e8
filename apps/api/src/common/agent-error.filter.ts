import { ArgumentsHost, Catch, ExceptionFilter, HttpException, Logger } from '@nestjs/common'
import type { Response } from 'express'
import type { ErrorBody, ErrorKind } from '@invoice-agent/shared'
import { AgentError } from './errors'
import { isRecord } from './records'

export interface RenderedError {
  status: number
  body: ErrorBody
}

function httpKind(status: number): ErrorKind {
  if (status === 404) return 'NotFound'
  return status < 500 ? 'ValidationError' : 'InternalError'
}

function httpMessage(exception: HttpException) {
  const response = exception.getResponse()
  if (typeof response === 'string') return response
  if (isRecord(response)) {
    const { message } = response
    if (typeof message === 'string') return message
    if (Array.isArray(message)) return message.filter((entry) => typeof entry === 'string').join('; ')
  }
  return exception.message
}

const logger = new Logger('AgentErrorFilter')

/** Maps anything thrown to `{ kind, message }`; stacks stay in the log. */
export function renderError(exception: unknown): RenderedError {
  if (exception instanceof AgentError) {
    return { status: exception.status, body: exception.toBody() }
  }
  if (exception instanceof HttpException) {
    const status = exception.getStatus()
    return { status, body: { kind: httpKind(status), message: httpMessage(exception) } }
  }
  logger.error('Unhandled error', exception instanceof Error ? exception.stack : String(exception))
  return { status: 500, body: { kind: 'InternalError', message: 'Internal server error' } }
}

@Catch()
export class AgentErrorFilter implements ExceptionFilter {
  catch(exception: unknown, host: ArgumentsHost) {
    const response = host.switchToHttp().getResponse<Response>()
    const { status, body } = renderError(exception)
    if (response.headersSent) {
      logger.warn(`Dropped ${body.kind} after the response had started: ${body.message}`)
      return
    }
    response.status(status).json(body)
  }
}
