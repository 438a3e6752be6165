import { Reservation } from '../domain/Reservation.js'
import type { Room } from '../domain/rooms.js'

// Storage contract shared by every backend. Backends must be observably identical.
export interface ReservationRepository {
  /** Upsert by id. Resolves false when the write could not be completed. */
  save(reservation: Reservation): Promise<boolean>
  findById(id: string): Promise<Reservation | null>
  /** Non-cancelled reservations of `room` overlapping [start, end). Order unspecified. */
  findByRoomAndTime(room: Room, start: Date, end: Date): Promise<Reservation[]>
  findAll(): Promise<Reservation[]>
  /** Hard delete. Resolves false when the id is absent or the write failed. */
  delete(id: string): Promise<boolean>
}

export function isConflicting(reservation: Reservation, room: Room, start: Date, end: Date): boolean {
  return reservation.room.id === room.id && reservation.overlapsWith(start, end) && !reservation.isCancelled
}

// Stores hand out copies so that mutating a returned entity never bypasses save().
export function copyOf(reservation: Reservation): Reservation {
  return new Reservation({
    id: reservation.id,
    room: reservation.room,
    userName: reservation.userName,
    start: new Date(reservation.start),
    end: new Date(reservation.end),
    purpose: reservation.purpose,
    status: reservation.status,
  })
}
