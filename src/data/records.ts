import { z } from 'zod'
import { Reservation } from '../domain/Reservation.js'
import { attributesFromEquipment, createRoom, inferRoomKind, roomEquipment, type Room } from '../domain/rooms.js'

// On-disk shape of one reservation in the JSON file.

const isoTimestamp = z.string().refine(s => !Number.isNaN(Date.parse(s)), { message: 'invalid ISO timestamp' })

export const roomRecordSchema = z.object({
  type: z.string().min(1),
  room_id: z.string().min(1),
  name: z.string(),
  capacity: z.number().int().positive(),
  equipment: z.record(z.union([z.boolean(), z.number(), z.string()])).default({}),
})

export const reservationRecordSchema = z.object({
  reservation_id: z.string().min(1),
  room: roomRecordSchema,
  user_name: z.string(),
  start_time: isoTimestamp,
  end_time: isoTimestamp,
  purpose: z.string().default(''),
  status: z.enum(['CONFIRMED', 'CANCELLED']).default('CONFIRMED'),
})

export const reservationFileSchema = z.array(reservationRecordSchema)

export type RoomRecord = z.infer<typeof roomRecordSchema>
export type ReservationRecord = z.infer<typeof reservationRecordSchema>

export function roomToRecord(room: Room): RoomRecord {
  return {
    type: room.kind,
    room_id: room.id,
    name: room.name,
    capacity: room.capacity,
    equipment: roomEquipment(room),
  }
}

export function roomFromRecord(record: RoomRecord): Room {
  const kind = inferRoomKind(record.type)
  const room = createRoom(kind, record.room_id, record.name, record.capacity, attributesFromEquipment(kind, record.equipment))
  // kind and capacity were both checked above, so createRoom cannot refuse
  if (!room) throw new Error(`unreadable room record ${record.room_id}`)
  return room
}

export function toRecord(reservation: Reservation): ReservationRecord {
  return {
    reservation_id: reservation.id,
    room: roomToRecord(reservation.room),
    user_name: reservation.userName,
    start_time: reservation.start.toISOString(),
    end_time: reservation.end.toISOString(),
    purpose: reservation.purpose,
    status: reservation.status,
  }
}

export function fromRecord(record: ReservationRecord): Reservation {
  return new Reservation({
    id: record.reservation_id,
    room: roomFromRecord(record.room),
    userName: record.user_name,
    start: new Date(record.start_time),
    end: new Date(record.end_time),
    purpose: record.purpose,
    status: record.status,
  })
}
