import express, { type Response } from 'express'
import { z } from 'zod'
import type { RoomCatalog } from '../../domain/catalog.js'
import { DomainError, NotFoundError, type ErrorCode, type ServiceResult } from '../../domain/errors.js'
import type { AuditLogObserver, StatisticsObserver } from '../../domain/observers.js'
import type { Reservation } from '../../domain/Reservation.js'
import type { ReservationService } from '../../domain/ReservationService.js'
import { roomEquipment, roomLabel, type Room } from '../../domain/rooms.js'
import { errorFields, logger as defaultLogger, type Logger } from '../../lib/logger.js'

export type AppDeps = {
  service: ReservationService
  catalog: RoomCatalog
  stats?: StatisticsObserver
  audit?: AuditLogObserver
  logger?: Logger
}

const STATUS_BY_CODE: Record<ErrorCode, number> = {
  invalid_input: 400,
  invalid_range: 400,
  validation_failed: 400,
  not_found: 404,
  conflict: 409,
  already_cancelled: 409,
  storage_error: 500,
  config_error: 500,
  system_error: 500,
}

export function statusFor(err: DomainError): number {
  return err.http ?? STATUS_BY_CODE[err.code]
}

// Schemas
const rangeSchema = z
  .object({
    start: z.coerce.date(),
    end: z.coerce.date(),
  })
  .refine(r => r.start < r.end, { message: 'start must be before end' })

const createReservationSchema = z.object({
  roomId: z.string().min(1),
  userName: z.string(),
  start: z.coerce.date(),
  end: z.coerce.date(),
  purpose: z.string().max(500).optional(),
})

const uncheckedSchema = z.object({ unchecked: z.enum(['true', 'false']).optional() })

export function roomView(room: Room) {
  return {
    id: room.id,
    name: room.name,
    capacity: room.capacity,
    type: room.kind,
    label: roomLabel(room),
    equipment: roomEquipment(room),
  }
}

export function reservationView(r: Reservation) {
  return {
    id: r.id,
    room: { id: r.room.id, name: r.room.name, type: r.room.kind },
    userName: r.userName,
    start: r.start.toISOString(),
    end: r.end.toISOString(),
    purpose: r.purpose,
    status: r.status,
  }
}

export function createApp({ service, catalog, stats, audit, logger = defaultLogger }: AppDeps) {
  const app = express()
  app.use(express.json())

  function sendError(res: Response, err: unknown) {
    if (err instanceof z.ZodError) {
      return res.status(400).json({ error: 'invalid_input', message: err.errors.map(er => er.message).join(', ') })
    }
    if (err instanceof DomainError) {
      return res.status(statusFor(err)).json({ error: err.code, message: err.message, details: err.details })
    }
    logger.error('unhandled request error', { error: errorFields(err) })
    return res.status(500).json({ error: 'system_error', message: 'unexpected error' })
  }

  function sendResult<T>(res: Response, result: ServiceResult<T>, render: (value: T) => unknown, status = 200) {
    if (!result.ok) return sendError(res, result.error)
    return res.status(status).json(render(result.value))
  }

  function roomOrThrow(id: string): Room {
    const room = catalog.get(id)
    if (!room) throw new NotFoundError('Room', id)
    return room
  }

  app.get('/', (_req, res) => {
    res.json({
      status: 'ok',
      service: 'Room Reservation API',
      endpoints: [
        'GET /rooms',
        'GET /rooms/:id/availability',
        'GET /reservations',
        'GET /reservations/:id',
        'POST /reservations',
        'POST /reservations/:id/cancel',
        'DELETE /reservations/:id',
        'GET /stats',
        'GET /audit',
      ],
    })
  })

  app.get('/rooms', (_req, res) => {
    res.json({ rooms: catalog.list().map(roomView) })
  })

  app.get('/rooms/:id/availability', async (req, res) => {
    try {
      const room = roomOrThrow(req.params.id)
      const { start, end } = rangeSchema.parse(req.query)
      sendResult(res, await service.getRoomAvailability(room, start, end), conflicts => ({
        available: conflicts.length === 0,
        conflicts: conflicts.map(reservationView),
      }))
    } catch (e) {
      sendError(res, e)
    }
  })

  app.get('/reservations', async (_req, res) => {
    try {
      sendResult(res, await service.getAllReservations(), all => ({ reservations: all.map(reservationView) }))
    } catch (e) {
      sendError(res, e)
    }
  })

  app.get('/reservations/:id', async (req, res) => {
    try {
      const found = await service.getReservation(req.params.id)
      if (!found.ok) return sendError(res, found.error)
      if (!found.value) throw new NotFoundError('Reservation', req.params.id)
      res.json(reservationView(found.value))
    } catch (e) {
      sendError(res, e)
    }
  })

  app.post('/reservations', async (req, res) => {
    try {
      const body = createReservationSchema.parse(req.body)
      const { unchecked } = uncheckedSchema.parse(req.query)
      const input = { ...body, room: roomOrThrow(body.roomId) }
      if (unchecked === 'true') {
        sendResult(res, await service.createReservation(input), r => ({ reservation: reservationView(r), warnings: [] }), 201)
      } else {
        sendResult(
          res,
          await service.bookReservation(input),
          b => ({ reservation: reservationView(b.reservation), warnings: b.warnings }),
          201,
        )
      }
    } catch (e) {
      sendError(res, e)
    }
  })

  app.post('/reservations/:id/cancel', async (req, res) => {
    try {
      sendResult(res, await service.cancelReservation(req.params.id), reservationView)
    } catch (e) {
      sendError(res, e)
    }
  })

  app.delete('/reservations/:id', async (req, res) => {
    try {
      const deleted = await service.deleteReservation(req.params.id)
      if (!deleted.ok) return sendError(res, deleted.error)
      res.status(204).end()
    } catch (e) {
      sendError(res, e)
    }
  })

  app.get('/stats', (_req, res) => {
    res.json(stats ? stats.snapshot() : {})
  })

  app.get('/audit', (_req, res) => {
    res.json({ entries: (audit?.log ?? []).map(e => ({ ...e, timestamp: e.timestamp.toISOString() })) })
  })

  return app
}
