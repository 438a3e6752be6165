import type { Reservation } from './Reservation.js'

// Receives committed state changes. Purely informational: the service ignores
// whatever an observer does, including throwing.
export interface ReservationObserver {
  onReservationCreated?(reservation: Reservation): void
  onReservationCancelled?(reservation: Reservation): void
}

export type ReservationStats = {
  totalCreated: number
  totalCancelled: number
  active: number
}

export class StatisticsObserver implements ReservationObserver {
  private stats: ReservationStats = { totalCreated: 0, totalCancelled: 0, active: 0 }

  onReservationCreated(): void {
    this.stats.totalCreated += 1
    this.stats.active += 1
  }

  onReservationCancelled(): void {
    this.stats.totalCancelled += 1
    this.stats.active -= 1
  }

  snapshot(): ReservationStats {
    return { ...this.stats }
  }
}

export type AuditEvent = 'CREATED' | 'CANCELLED'

export type AuditEntry = {
  timestamp: Date
  event: AuditEvent
  reservationId: string
  roomName: string
  userName: string
}

export class AuditLogObserver implements ReservationObserver {
  private readonly entries: AuditEntry[] = []

  constructor(private readonly clock: () => Date = () => new Date()) {}

  onReservationCreated(reservation: Reservation): void {
    this.record('CREATED', reservation)
  }

  onReservationCancelled(reservation: Reservation): void {
    this.record('CANCELLED', reservation)
  }

  get log(): readonly AuditEntry[] {
    return this.entries
  }

  private record(event: AuditEvent, reservation: Reservation): void {
    this.entries.push({
      timestamp: this.clock(),
      event,
      reservationId: reservation.id,
      roomName: reservation.room.name,
      userName: reservation.userName,
    })
  }
}
