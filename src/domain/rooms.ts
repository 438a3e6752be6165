export const ROOM_KINDS = ['classroom', 'conference_room', 'laboratory', 'computer_lab'] as const

export type RoomKind = (typeof ROOM_KINDS)[number]

type RoomBase = {
  readonly id: string
  readonly name: string
  readonly capacity: number
}

export type Classroom = RoomBase & {
  readonly kind: 'classroom'
  readonly hasProjector: boolean
  readonly whiteboard: boolean
}

export type ConferenceRoom = RoomBase & {
  readonly kind: 'conference_room'
  readonly videoConference: boolean
  readonly soundSystem: boolean
}

export type Laboratory = RoomBase & {
  readonly kind: 'laboratory'
  readonly labType: string
  readonly safetyEquipment: boolean
}

export type ComputerLab = RoomBase & {
  readonly kind: 'computer_lab'
  readonly computers: number
  readonly hasPrinter: boolean
}

export type Room = Classroom | ConferenceRoom | Laboratory | ComputerLab

export type EquipmentValue = boolean | number | string
export type Equipment = Record<string, EquipmentValue>

export type RoomAttributes = {
  hasProjector?: boolean
  whiteboard?: boolean
  videoConference?: boolean
  soundSystem?: boolean
  labType?: string
  safetyEquipment?: boolean
  computers?: number
  hasPrinter?: boolean
}

const KIND_ALIASES: Record<string, RoomKind> = {
  classroom: 'classroom',
  conference: 'conference_room',
  conference_room: 'conference_room',
  laboratory: 'laboratory',
  lab: 'laboratory',
  computer_lab: 'computer_lab',
}

export function parseRoomKind(raw: string): RoomKind | null {
  const key = raw.trim().toLowerCase().replace(/\s+/g, '_')
  return Object.hasOwn(KIND_ALIASES, key) ? KIND_ALIASES[key] : null
}

/**
 * Builds a room variant with its type-specific defaults.
 * Returns null for an unknown kind or a capacity that is not a positive integer.
 */
export function createRoom(kind: string, id: string, name: string, capacity: number, attrs: RoomAttributes = {}): Room | null {
  const parsed = parseRoomKind(kind)
  if (!parsed) return null
  if (!Number.isInteger(capacity) || capacity <= 0) return null
  const base = { id, name, capacity }
  switch (parsed) {
    case 'classroom':
      return Object.freeze({
        ...base,
        kind: parsed,
        hasProjector: attrs.hasProjector ?? true,
        whiteboard: attrs.whiteboard ?? true,
      })
    case 'conference_room':
      return Object.freeze({
        ...base,
        kind: parsed,
        videoConference: attrs.videoConference ?? true,
        soundSystem: attrs.soundSystem ?? true,
      })
    case 'laboratory':
      return Object.freeze({
        ...base,
        kind: parsed,
        labType: attrs.labType ?? 'General',
        safetyEquipment: attrs.safetyEquipment ?? true,
      })
    case 'computer_lab':
      // one workstation per seat unless told otherwise
      return Object.freeze({
        ...base,
        kind: parsed,
        computers: attrs.computers !== undefined && attrs.computers > 0 ? attrs.computers : capacity,
        hasPrinter: attrs.hasPrinter ?? true,
      })
  }
}

export function roomEquipment(room: Room): Equipment {
  switch (room.kind) {
    case 'classroom':
      return { projector: room.hasProjector, whiteboard: room.whiteboard, desks: true }
    case 'conference_room':
      return {
        video_conference: room.videoConference,
        sound_system: room.soundSystem,
        projector: true,
        conference_table: true,
      }
    case 'laboratory':
      return { lab_type: room.labType, safety_equipment: room.safetyEquipment, workbenches: true, storage: true }
    case 'computer_lab':
      return { computers: room.computers, printer: room.hasPrinter, network: true }
  }
}

export function roomLabel(room: Room): string {
  switch (room.kind) {
    case 'classroom':
      return 'Classroom'
    case 'conference_room':
      return 'Conference Room'
    case 'laboratory':
      return `Laboratory (${room.labType})`
    case 'computer_lab':
      return 'Computer Lab'
  }
}

export function describeRoom(room: Room): string {
  return `${roomLabel(room)} - ${room.name} (ID: ${room.id}, Capacity: ${room.capacity})`
}

// Older files carry the display label instead of the kind.
export function inferRoomKind(tag: string): RoomKind {
  const exact = parseRoomKind(tag)
  if (exact) return exact
  if (tag.includes('Classroom')) return 'classroom'
  if (tag.includes('Conference')) return 'conference_room'
  if (tag.includes('Computer')) return 'computer_lab'
  return 'laboratory'
}

// Reverse of roomEquipment: picks the variant attributes back out of an equipment snapshot.
export function attributesFromEquipment(kind: RoomKind, equipment: Equipment): RoomAttributes {
  const bool = (key: string): boolean | undefined => {
    const v = equipment[key]
    return typeof v === 'boolean' ? v : undefined
  }
  switch (kind) {
    case 'classroom':
      return { hasProjector: bool('projector'), whiteboard: bool('whiteboard') }
    case 'conference_room':
      return { videoConference: bool('video_conference'), soundSystem: bool('sound_system') }
    case 'laboratory': {
      const labType = equipment['lab_type']
      return { labType: typeof labType === 'string' ? labType : undefined, safetyEquipment: bool('safety_equipment') }
    }
    case 'computer_lab': {
      const computers = equipment['computers']
      return { computers: typeof computers === 'number' ? computers : undefined, hasPrinter: bool('printer') }
    }
  }
}
