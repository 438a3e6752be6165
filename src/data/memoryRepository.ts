import type { Reservation } from '../domain/Reservation.js'
import type { Room } from '../domain/rooms.js'
import { copyOf, isConflicting, type ReservationRepository } from './types.js'

// Volatile store; contents are lost with the process.
export class MemoryReservationRepository implements ReservationRepository {
  private readonly reservations = new Map<string, Reservation>()

  async save(reservation: Reservation): Promise<boolean> {
    this.reservations.set(reservation.id, copyOf(reservation))
    return true
  }

  async findById(id: string): Promise<Reservation | null> {
    const found = this.reservations.get(id)
    return found ? copyOf(found) : null
  }

  async findByRoomAndTime(room: Room, start: Date, end: Date): Promise<Reservation[]> {
    return [...this.reservations.values()].filter(r => isConflicting(r, room, start, end)).map(copyOf)
  }

  async findAll(): Promise<Reservation[]> {
    return [...this.reservations.values()].map(copyOf)
  }

  async delete(id: string): Promise<boolean> {
    return this.reservations.delete(id)
  }
}
