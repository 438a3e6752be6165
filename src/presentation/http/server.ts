import { loadConfig } from '../../config.js'
import { RoomCatalog } from '../../domain/catalog.js'
import { DomainError } from '../../domain/errors.js'
import { AuditLogObserver, StatisticsObserver } from '../../domain/observers.js'
import { createReservationService } from '../../factory.js'
import { errorFields, logger, setLogLevel } from '../../lib/logger.js'
import { createApp } from './app.js'

async function main() {
  const config = loadConfig()
  setLogLevel(config.LOG_LEVEL)
  const catalog = await RoomCatalog.fromJson(config.ROOMS_FILE)
  const stats = new StatisticsObserver()
  const audit = new AuditLogObserver()
  const service = createReservationService(config, { observers: [stats, audit], logger })
  const app = createApp({ service, catalog, stats, audit, logger })
  app.listen(config.PORT, () =>
    logger.info('HTTP server listening', { port: config.PORT, repository: config.REPOSITORY, rooms: catalog.size }),
  )
}

main().catch((e: unknown) => {
  logger.error('startup failed', { error: errorFields(e), details: e instanceof DomainError ? e.details : undefined })
  process.exitCode = 1
})
