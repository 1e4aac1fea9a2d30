import { Logger } from '@aws-lambda-powertools/logger'

// Shared powertools logger, used wherever the caller doesn't inject one
export const logger = new Logger({ serviceName: 'cuesmith' })
