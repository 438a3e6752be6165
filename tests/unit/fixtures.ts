import { createRoom, type Room } from '../../src/domain/rooms.js'
import { Reservation } from '../../src/domain/Reservation.js'

function room(kind: string, id: string, name: string, capacity: number): Room {
  const r = createRoom(kind, id, name, capacity)
  if (!r) throw new Error(`bad fixture room ${id}`)
  return r
}

export const classroom = room('classroom', 'CL-101', 'Lecture Hall A', 40)
export const conferenceRoom = room('conference_room', 'CR-201', 'Board Room', 12)
export const huddleRoom = room('conference_room', 'CR-202', 'Huddle Room', 4)

// Local wall-clock time in January 2030 (no DST change that month).
export function at(day: number, hour: number, minute = 0): Date {
  return new Date(2030, 0, day, hour, minute, 0, 0)
}

export function reservation(id: string, r: Room, start: Date, end: Date, extra: Partial<{ userName: string; purpose: string }> = {}) {
  return new Reservation({ id, room: r, userName: extra.userName ?? 'Ada Lovelace', start, end, purpose: extra.purpose ?? '' })
}
