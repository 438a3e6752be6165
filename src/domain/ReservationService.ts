import { customAlphabet } from 'nanoid'
import type { ReservationRepository } from '../data/types.js'
import type { Notifier } from '../notifications/notifiers.js'
import { errorFields, logger as defaultLogger, type Logger } from '../lib/logger.js'
import { ConflictError, DomainError, NotFoundError, StorageError, fail, ok, type ServiceResult } from './errors.js'
import type { ReservationObserver } from './observers.js'
import { Reservation } from './Reservation.js'
import { ReservationValidator } from './ReservationValidator.js'
import type { Room } from './rooms.js'

const hex8 = customAlphabet('0123456789ABCDEF', 8)

export function generateReservationId(): string {
  return `RES-${hex8()}`
}

export type CreateReservationInput = {
  room: Room
  userName: string
  start: Date
  end: Date
  purpose?: string
}

export type Booking = {
  reservation: Reservation
  warnings: string[]
}

export type ReservationServiceDeps = {
  repository: ReservationRepository
  notifier: Notifier
  observers?: ReservationObserver[]
  validator?: ReservationValidator
  logger?: Logger
  generateId?: () => string
}

const MAX_ID_ATTEMPTS = 5

/**
 * Owns the reservation lifecycle: conflict checks, persistence, and the
 * notifications and observer events that follow a committed change.
 *
 * Every operation, queries included, returns a ServiceResult. Storage faults
 * raised by a repository are caught here and reported as `storage_error`.
 *
 * Mutations run one at a time in call order, so a conflict check and the save
 * that follows it never interleave with another mutation on this instance.
 */
export class ReservationService {
  private readonly repository: ReservationRepository
  private readonly notifier: Notifier
  private readonly observers: ReservationObserver[]
  private readonly validator: ReservationValidator
  private readonly logger: Logger
  private readonly generateId: () => string
  private tail: Promise<unknown> = Promise.resolve()

  constructor(deps: ReservationServiceDeps) {
    this.repository = deps.repository
    this.notifier = deps.notifier
    this.observers = [...(deps.observers ?? [])]
    this.validator = deps.validator ?? new ReservationValidator()
    this.logger = deps.logger ?? defaultLogger
    this.generateId = deps.generateId ?? generateReservationId
  }

  subscribe(observer: ReservationObserver): () => void {
    this.observers.push(observer)
    return () => {
      const i = this.observers.indexOf(observer)
      if (i >= 0) this.observers.splice(i, 1)
    }
  }

  // Checks only time order and conflicts. Use bookReservation for the business rules.
  async createReservation(input: CreateReservationInput): Promise<ServiceResult<Reservation>> {
    const { room, userName, start, end, purpose = '' } = input
    if (!(start < end)) {
      return this.reject(new DomainError('invalid_range', 'End time must be after start time', { http: 400 }))
    }
    return this.exclusive(() => this.insert(room, userName, start, end, purpose))
  }

  private async insert(room: Room, userName: string, start: Date, end: Date, purpose: string): Promise<ServiceResult<Reservation>> {
    try {
      const conflicts = await this.repository.findByRoomAndTime(room, start, end)
      if (conflicts.length > 0) {
        const error = new ConflictError(room.name)
        error.details = conflicts.map(c => c.id)
        return this.reject(error)
      }
      const reservation = new Reservation({ id: await this.nextId(), room, userName, start, end, purpose })
      if (!(await this.repository.save(reservation))) {
        return this.reject(new StorageError(`failed to save reservation ${reservation.id}`))
      }
      await this.notify('confirmed', reservation)
      this.emit(o => o.onReservationCreated?.(reservation))
      return ok(reservation)
    } catch (e) {
      return this.reject(asDomainError(e))
    }
  }

  // Validate-then-create: every business rule must pass before the unchecked path runs.
  async bookReservation(input: CreateReservationInput): Promise<ServiceResult<Booking>> {
    const report = this.validator.validateAll(input.room, input.start, input.end, input.userName)
    if (!report.valid) {
      return this.reject(
        new DomainError('validation_failed', report.errors.join('; '), { http: 400, details: report.errors }),
      )
    }
    const created = await this.createReservation(input)
    if (!created.ok) return created
    return ok({ reservation: created.value, warnings: report.warnings })
  }

  cancelReservation(id: string): Promise<ServiceResult<Reservation>> {
    return this.exclusive(() => this.cancel(id))
  }

  private async cancel(id: string): Promise<ServiceResult<Reservation>> {
    try {
      const reservation = await this.repository.findById(id)
      if (!reservation) return this.reject(new NotFoundError('Reservation', id))
      if (reservation.isCancelled) {
        return this.reject(new DomainError('already_cancelled', `Reservation ${id} is already cancelled`, { http: 409 }))
      }
      reservation.cancel()
      // on failure the entity stays CANCELLED in memory while storage still says CONFIRMED
      if (!(await this.repository.save(reservation))) {
        return this.reject(new StorageError(`failed to update reservation ${id}`))
      }
      await this.notify('cancelled', reservation)
      this.emit(o => o.onReservationCancelled?.(reservation))
      return ok(reservation)
    } catch (e) {
      return this.reject(asDomainError(e))
    }
  }

  // Absent ids resolve to ok(null).
  getReservation(id: string): Promise<ServiceResult<Reservation | null>> {
    return this.query(() => this.repository.findById(id))
  }

  getAllReservations(): Promise<ServiceResult<Reservation[]>> {
    return this.query(() => this.repository.findAll())
  }

  // Reservations blocking the slot; empty means the room is free.
  getRoomAvailability(room: Room, start: Date, end: Date): Promise<ServiceResult<Reservation[]>> {
    return this.query(() => this.repository.findByRoomAndTime(room, start, end))
  }

  isRoomAvailable(room: Room, start: Date, end: Date): Promise<ServiceResult<boolean>> {
    return this.query(async () => (await this.repository.findByRoomAndTime(room, start, end)).length === 0)
  }

  /**
   * Hard delete, for data retention only; business callers cancel instead.
   * Resolves to the removed reservation.
   */
  deleteReservation(id: string): Promise<ServiceResult<Reservation>> {
    return this.exclusive(async () => {
      try {
        const existing = await this.repository.findById(id)
        if (!existing) return this.reject(new NotFoundError('Reservation', id))
        if (!(await this.repository.delete(id))) {
          return this.reject(new StorageError(`failed to delete reservation ${id}`))
        }
        return ok(existing)
      } catch (e) {
        return this.reject(asDomainError(e))
      }
    })
  }

  private exclusive<T>(op: () => Promise<T>): Promise<T> {
    const run = this.tail.then(op, op)
    this.tail = run.then(
      () => undefined,
      () => undefined,
    )
    return run
  }

  private async query<T>(read: () => Promise<T>): Promise<ServiceResult<T>> {
    try {
      return ok(await read())
    } catch (e) {
      return this.reject(asDomainError(e))
    }
  }

  private async nextId(): Promise<string> {
    for (let attempt = 0; attempt < MAX_ID_ATTEMPTS; attempt++) {
      const id = this.generateId()
      if (!(await this.repository.findById(id))) return id
    }
    throw new DomainError('system_error', 'could not generate a unique reservation id')
  }

  private async notify(event: 'confirmed' | 'cancelled', reservation: Reservation): Promise<void> {
    try {
      const delivered =
        event === 'confirmed'
          ? await this.notifier.notifyConfirmed(reservation)
          : await this.notifier.notifyCancelled(reservation)
      if (!delivered) this.logger.warn(`${event} notification not delivered`, { reservationId: reservation.id })
    } catch (e) {
      this.logger.warn(`${event} notification failed`, { reservationId: reservation.id, error: errorFields(e) })
    }
  }

  private emit(call: (observer: ReservationObserver) => void): void {
    for (const observer of this.observers) {
      try {
        call(observer)
      } catch (e) {
        this.logger.warn('reservation observer failed', { error: errorFields(e) })
      }
    }
  }

  private reject<T>(error: DomainError): ServiceResult<T> {
    const level = error.code === 'storage_error' || error.code === 'system_error' ? 'error' : 'warn'
    this.logger[level]('reservation request rejected', { error: { code: error.code, message: error.message } })
    return fail(error)
  }
}

function asDomainError(e: unknown): DomainError {
  if (e instanceof DomainError) return e
  return new StorageError(e instanceof Error ? e.message : String(e), e)
}
