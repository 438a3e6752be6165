import type { AppConfig } from './config.js'
import { FileReservationRepository } from './data/fileRepository.js'
import { MemoryReservationRepository } from './data/memoryRepository.js'
import type { ReservationRepository } from './data/types.js'
import { ConfigError } from './domain/errors.js'
import type { ReservationObserver } from './domain/observers.js'
import { ReservationService } from './domain/ReservationService.js'
import { ReservationValidator } from './domain/ReservationValidator.js'
import { logger as defaultLogger, type Logger } from './lib/logger.js'
import { LogNotifier, MultiNotifier, NoopNotifier, type Notifier } from './notifications/notifiers.js'

export const REPOSITORY_TYPES = ['memory', 'file'] as const
export const NOTIFIER_TYPES = ['log', 'none', 'multi'] as const

// Channels that 'multi' fans out to.
const MULTI_CHANNELS = ['log']

export function createRepository(type: string, options: { filePath?: string; logger?: Logger } = {}): ReservationRepository | null {
  switch (type.trim().toLowerCase()) {
    case 'memory':
    case 'in_memory':
      return new MemoryReservationRepository()
    case 'file':
      return new FileReservationRepository(options.filePath ?? 'reservations.json', options.logger)
    default:
      return null
  }
}

/**
 * `multi` fans out to every channel; a comma-separated list such as `log,none`
 * fans out to the channels named.
 */
export function createNotifier(type: string, options: { logger?: Logger } = {}): Notifier | null {
  const key = type.trim().toLowerCase()
  if (key === 'multi' || key.includes(',')) {
    const names = key === 'multi' ? MULTI_CHANNELS : key.split(',')
    const channels: Notifier[] = []
    for (const name of names) {
      const channel = channelNotifier(name.trim(), options.logger)
      if (!channel) return null
      channels.push(channel)
    }
    return new MultiNotifier(channels, options.logger)
  }
  return channelNotifier(key, options.logger)
}

function channelNotifier(name: string, logger?: Logger): Notifier | null {
  switch (name) {
    case 'log':
      return new LogNotifier(logger)
    case 'none':
      return new NoopNotifier()
    default:
      return null
  }
}

/**
 * Wires a service from configuration. Unknown repository or notifier types
 * fail here, at construction, rather than on first use.
 */
export function createReservationService(
  config: Pick<
    AppConfig,
    'REPOSITORY' | 'RESERVATIONS_FILE' | 'NOTIFIER' | 'MIN_DURATION_HOURS' | 'MAX_DURATION_HOURS' | 'BUSINESS_START' | 'BUSINESS_END' | 'MAX_ADVANCE_DAYS'
  >,
  options: { observers?: ReservationObserver[]; logger?: Logger } = {},
): ReservationService {
  const logger = options.logger ?? defaultLogger
  const repository = createRepository(config.REPOSITORY, { filePath: config.RESERVATIONS_FILE, logger })
  if (!repository) {
    throw new ConfigError(`Invalid repository type: ${config.REPOSITORY}`, [`expected one of ${REPOSITORY_TYPES.join(', ')}`])
  }
  const notifier = createNotifier(config.NOTIFIER, { logger })
  if (!notifier) {
    throw new ConfigError(`Invalid notifier type: ${config.NOTIFIER}`, [`expected one of ${NOTIFIER_TYPES.join(', ')}`])
  }
  const validator = new ReservationValidator({
    minDurationHours: config.MIN_DURATION_HOURS,
    maxDurationHours: config.MAX_DURATION_HOURS,
    businessStart: config.BUSINESS_START,
    businessEnd: config.BUSINESS_END,
    maxAdvanceDays: config.MAX_ADVANCE_DAYS,
  })
  return new ReservationService({ repository, notifier, validator, observers: options.observers, logger })
}
