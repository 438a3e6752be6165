import type { Room } from './rooms.js'

export type ReservationStatus = 'CONFIRMED' | 'CANCELLED'

export type ReservationInit = {
  id: string
  room: Room
  userName: string
  start: Date
  end: Date
  purpose?: string
  status?: ReservationStatus
}

// [start, end): touching intervals do not overlap
export function overlaps(aStart: Date, aEnd: Date, bStart: Date, bEnd: Date): boolean {
  return aStart < bEnd && bStart < aEnd
}

/**
 * A booking of one room for a half-open time interval.
 *
 * The entity does not check its own times or room; the service and the
 * validator do that before one is created.
 */
export class Reservation {
  readonly id: string
  readonly room: Room
  readonly userName: string
  readonly start: Date
  readonly end: Date
  readonly purpose: string
  private _status: ReservationStatus

  constructor(init: ReservationInit) {
    this.id = init.id
    this.room = init.room
    this.userName = init.userName
    this.start = init.start
    this.end = init.end
    this.purpose = init.purpose ?? ''
    this._status = init.status ?? 'CONFIRMED'
  }

  get status(): ReservationStatus {
    return this._status
  }

  get isCancelled(): boolean {
    return this._status === 'CANCELLED'
  }

  get durationMinutes(): number {
    return (this.end.getTime() - this.start.getTime()) / 60_000
  }

  // Ignores status; callers filter cancelled reservations themselves.
  overlapsWith(start: Date, end: Date): boolean {
    return overlaps(this.start, this.end, start, end)
  }

  cancel(): void {
    this._status = 'CANCELLED'
  }
}
