import 'reflect-metadata'
import { Logger, ValidationPipe } from '@nestjs/common'
import { ConfigService } from '@nestjs/config'
import { NestFactory } from '@nestjs/core'
import type { NestExpressApplication } from '@nestjs/platform-express'
import { DocumentBuilder, SwaggerModule } from '@nestjs/swagger'
import type { NextFunction, Request, Response } from 'express'
import { API_VERSION } from '@invoice-agent/shared'
import { AppModule } from './app.module'
import { AgentErrorFilter } from './common/agent-error.filter'
import { readIntEnv, readListEnv, readStringEnv } from './common/env'

const logger = new Logger('Bootstrap')

async function bootstrap() {
  const app = await NestFactory.create<NestExpressApplication>(AppModule)
  const config = app.get(ConfigService)
  app.set('trust proxy', 1)
  app.enableShutdownHooks()

  app.setGlobalPrefix(`api/${API_VERSION}`)

  app.useGlobalPipes(
    new ValidationPipe({
      whitelist: true,
      transform: true,
      forbidNonWhitelisted: true,
    }),
  )
  app.useGlobalFilters(new AgentErrorFilter())

  const isProduction = readStringEnv(config, 'NODE_ENV', '').toLowerCase() === 'production'
  const explicitOrigins = readListEnv(config, 'FRONTEND_URLS')
  const fallbackOrigins = isProduction ? [] : ['http://localhost:3000', 'http://127.0.0.1:3000']
  const frontendOrigins = explicitOrigins.length > 0 ? [...new Set(explicitOrigins)] : fallbackOrigins

  if (isProduction && frontendOrigins.length === 0) {
    throw new Error('CORS is not configured. Set FRONTEND_URLS in production.')
  }

  app.use((req: Request, res: Response, next: NextFunction) => {
    res.setHeader('X-Content-Type-Options', 'nosniff')
    res.setHeader('X-Frame-Options', 'DENY')
    res.setHeader('Referrer-Policy', 'no-referrer')
    res.setHeader('Cross-Origin-Resource-Policy', 'same-site')
    if (isProduction) {
      res.setHeader('Strict-Transport-Security', 'max-age=31536000; includeSubDomains')
    }
    next()
  })

  app.enableCors({
    origin: (origin, callback) => {
      if (!origin || frontendOrigins.includes(origin)) {
        callback(null, true)
        return
      }
      callback(new Error('Not allowed by CORS'))
    },
  })

  const swagger = new DocumentBuilder()
    .setTitle('Invoice Agent API')
    .setDescription('Chat with invoice, purchase order and contract data.')
    .setVersion('1.0')
    .build()
  SwaggerModule.setup('docs', app, SwaggerModule.createDocument(app, swagger))

  const port = readIntEnv(config, 'API_PORT', 3001, { min: 1, max: 65535 })
  await app.listen(port)
  logger.log(`API running on http://localhost:${port}`)
  logger.log(`Swagger docs: http://localhost:${port}/docs`)
}

bootstrap().catch((error: unknown) => {
  logger.error('Failed to start the API', error instanceof Error ? error.stack : String(error))
  process.exit(1)
})
