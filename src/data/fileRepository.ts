import { mkdir, readFile, writeFile } from 'node:fs/promises'
import { dirname } from 'node:path'
import type { Reservation } from '../domain/Reservation.js'
import type { Room } from '../domain/rooms.js'
import { StorageError } from '../domain/errors.js'
import { errorFields, logger as defaultLogger, type Logger } from '../lib/logger.js'
import { fromRecord, reservationFileSchema, toRecord } from './records.js'
import { isConflicting, type ReservationRepository } from './types.js'

function isMissingFile(e: unknown): boolean {
  return typeof e === 'object' && e !== null && 'code' in e && e.code === 'ENOENT'
}

/**
 * JSON-file store. Every call reads the whole file and every mutation
 * rewrites it whole.
 *
 * There is no lock and no write-ahead protection: two writers interleaving
 * (in this process or another) can lose updates, and a crash mid-write can
 * leave a truncated file that later reads reject with a StorageError.
 */
export class FileReservationRepository implements ReservationRepository {
  constructor(
    readonly filePath: string,
    private readonly logger: Logger = defaultLogger,
  ) {}

  private async readRaw(): Promise<string> {
    try {
      return await readFile(this.filePath, 'utf8')
    } catch (e) {
      if (!isMissingFile(e)) throw e
      await mkdir(dirname(this.filePath), { recursive: true })
      await writeFile(this.filePath, '[]', 'utf8')
      this.logger.info('initialized empty reservation file', { path: this.filePath })
      return '[]'
    }
  }

  private async load(): Promise<Reservation[]> {
    let raw: unknown
    try {
      raw = JSON.parse(await this.readRaw())
    } catch (e) {
      throw new StorageError(`cannot read ${this.filePath}`, e)
    }
    const parsed = reservationFileSchema.safeParse(raw)
    if (!parsed.success) {
      const first = parsed.error.issues[0]
      throw new StorageError(`malformed reservation file ${this.filePath}: ${first ? `${first.path.join('.')} ${first.message}` : 'invalid'}`)
    }
    return parsed.data.map(fromRecord)
  }

  private async persist(reservations: Reservation[]): Promise<boolean> {
    try {
      await writeFile(this.filePath, JSON.stringify(reservations.map(toRecord), null, 2), 'utf8')
      return true
    } catch (e) {
      this.logger.error('failed to write reservation file', { path: this.filePath, error: errorFields(e) })
      return false
    }
  }

  // Mutations report storage faults as false instead of rejecting.
  private async loadForWrite(): Promise<Reservation[] | null> {
    try {
      return await this.load()
    } catch (e) {
      this.logger.error('failed to load reservation file', { path: this.filePath, error: errorFields(e) })
      return null
    }
  }

  async save(reservation: Reservation): Promise<boolean> {
    const reservations = await this.loadForWrite()
    if (!reservations) return false
    const index = reservations.findIndex(r => r.id === reservation.id)
    if (index >= 0) {
      reservations[index] = reservation
    } else {
      reservations.push(reservation)
    }
    return this.persist(reservations)
  }

  async findById(id: string): Promise<Reservation | null> {
    const reservations = await this.load()
    return reservations.find(r => r.id === id) ?? null
  }

  async findByRoomAndTime(room: Room, start: Date, end: Date): Promise<Reservation[]> {
    const reservations = await this.load()
    return reservations.filter(r => isConflicting(r, room, start, end))
  }

  async findAll(): Promise<Reservation[]> {
    return this.load()
  }

  async delete(id: string): Promise<boolean> {
    const reservations = await this.loadForWrite()
    if (!reservations) return false
    const remaining = reservations.filter(r => r.id !== id)
    if (remaining.length === reservations.length) return false
    return this.persist(remaining)
  }
}
