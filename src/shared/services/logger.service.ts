import { Injectable } from '@nestjs/common'

export interface TokenUsageContext {
  service: string
  operation: string
  inputTokens?: number
  outputTokens?: number
  totalTokens?: number
  model: string
  requestId?: string
}

export interface ErrorContext {
  service?: string
  operation?: string
  path?: string
  method?: string
  statusCode?: number
  requestId?: string
  [key: string]: unknown
}

export interface RequestLogContext {
  method: string
  path: string
  statusCode: number
  durationMs: number
}

type LogType = 'TOKEN_USAGE' | 'ERROR' | 'REQUEST' | 'INFO' | 'WARNING'

@Injectable()
export class LoggerService {
  /**
   * Log token usage for Gemini API calls
   */
  logTokenUsage(context: TokenUsageContext) {
    this.write('TOKEN_USAGE', { ...context })
  }

  /**
   * Log errors with structured context
   */
  logError(error: unknown, context?: ErrorContext) {
    const errorObj = error instanceof Error ? error : new Error(String(error))

    this.write('ERROR', {
      message: errorObj.message,
      stack: errorObj.stack,
      ...context,
    })
  }

  logRequest(context: RequestLogContext) {
    this.write('REQUEST', { ...context })
  }

  logInfo(message: string, context?: Record<string, unknown>) {
    this.write('INFO', { message, ...context })
  }

  logWarning(message: string, context?: Record<string, unknown>) {
    this.write('WARNING', { message, ...context })
  }

  private write(type: LogType, fields: Record<string, unknown>) {
    const line = JSON.stringify({
      type,
      timestamp: new Date().toISOString(),
      ...fields,
    })

    if (type === 'ERROR') {
      console.error(line)
    } else if (type === 'WARNING') {
      console.warn(line)
    } else {
      console.log(line)
    }
  }
}
