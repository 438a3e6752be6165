import { readFile } from 'node:fs/promises'
import { z } from 'zod'
import { ConfigError } from './errors.js'
import { createRoom, type Room, type RoomKind } from './rooms.js'

const roomDefinitionSchema = z.object({
  type: z.string().min(1),
  id: z.string().min(1),
  name: z.string().min(1),
  capacity: z.number().int().positive(),
  hasProjector: z.boolean().optional(),
  whiteboard: z.boolean().optional(),
  videoConference: z.boolean().optional(),
  soundSystem: z.boolean().optional(),
  labType: z.string().optional(),
  safetyEquipment: z.boolean().optional(),
  computers: z.number().int().optional(),
  hasPrinter: z.boolean().optional(),
})

export const catalogFileSchema = z.array(roomDefinitionSchema)

export type RoomDefinition = z.infer<typeof roomDefinitionSchema>

// Rooms keyed by id. Rooms are shared by reference with every reservation made for them.
export class RoomCatalog {
  private readonly rooms = new Map<string, Room>()

  constructor(rooms: Room[] = []) {
    for (const room of rooms) this.add(room)
  }

  add(room: Room): boolean {
    if (this.rooms.has(room.id)) return false
    this.rooms.set(room.id, room)
    return true
  }

  get(id: string): Room | null {
    return this.rooms.get(id) ?? null
  }

  list(): Room[] {
    return [...this.rooms.values()]
  }

  byKind(kind: RoomKind): Room[] {
    return this.list().filter(r => r.kind === kind)
  }

  get size(): number {
    return this.rooms.size
  }

  static fromDefinitions(definitions: RoomDefinition[]): RoomCatalog {
    const catalog = new RoomCatalog()
    const problems: string[] = []
    for (const { type, id, name, capacity, ...attrs } of definitions) {
      const room = createRoom(type, id, name, capacity, attrs)
      if (!room) {
        problems.push(`room ${id}: unknown type "${type}"`)
      } else if (!catalog.add(room)) {
        problems.push(`room ${id}: duplicate id`)
      }
    }
    if (problems.length > 0) throw new ConfigError('invalid room catalog', problems)
    return catalog
  }

  static async fromJson(path: string): Promise<RoomCatalog> {
    let raw: unknown
    try {
      raw = JSON.parse(await readFile(path, 'utf8'))
    } catch (e) {
      throw new ConfigError(`cannot read room catalog ${path}: ${e instanceof Error ? e.message : String(e)}`)
    }
    const parsed = catalogFileSchema.safeParse(raw)
    if (!parsed.success) {
      throw new ConfigError('invalid room catalog', parsed.error.issues.map(i => `${i.path.join('.')}: ${i.message}`))
    }
    return RoomCatalog.fromDefinitions(parsed.data)
  }
}
