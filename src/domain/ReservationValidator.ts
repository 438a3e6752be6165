import { ConfigError } from './errors.js'
import type { Room } from './rooms.js'
import {
  calendarDaysBetween,
  formatTimeOfDay,
  hoursBetween,
  parseTimeOfDay,
  secondsOfDay,
  timeOfDaySeconds,
  type TimeOfDay,
} from '../lib/time.js'

export type ValidatorOptions = {
  minDurationHours?: number
  maxDurationHours?: number
  businessStart?: string // HH:MM
  businessEnd?: string // HH:MM
  maxAdvanceDays?: number
  smallRoomThreshold?: number
  now?: () => Date
}

export type ValidationReport = {
  valid: boolean
  errors: string[]
  // advisory only, never affects `valid`
  warnings: string[]
}

function requireTimeOfDay(name: string, value: string): TimeOfDay {
  const t = parseTimeOfDay(value)
  if (!t) throw new ConfigError(`${name} must be HH:MM, got "${value}"`)
  return t
}

/**
 * Business rules for a booking request. Stateless apart from its settings;
 * `validateAll` checks every rule so callers can show the full list at once.
 *
 * Each rule returns its message, or null when it passes.
 */
export class ReservationValidator {
  readonly minDurationHours: number
  readonly maxDurationHours: number
  readonly businessStart: TimeOfDay
  readonly businessEnd: TimeOfDay
  readonly maxAdvanceDays: number
  readonly smallRoomThreshold: number
  private readonly now: () => Date

  constructor(options: ValidatorOptions = {}) {
    this.minDurationHours = options.minDurationHours ?? 1
    this.maxDurationHours = options.maxDurationHours ?? 8
    this.businessStart = requireTimeOfDay('businessStart', options.businessStart ?? '07:00')
    this.businessEnd = requireTimeOfDay('businessEnd', options.businessEnd ?? '22:00')
    this.maxAdvanceDays = options.maxAdvanceDays ?? 90
    this.smallRoomThreshold = options.smallRoomThreshold ?? 5
    this.now = options.now ?? (() => new Date())
  }

  validateAll(room: Room, start: Date, end: Date, userName: string): ValidationReport {
    const errors = [
      this.checkTimeOrder(start, end),
      this.checkDuration(start, end),
      this.checkBusinessHours(start, end),
      this.checkAdvanceBooking(start),
      this.checkNotInPast(start),
      this.checkUserName(userName),
    ].filter((m): m is string => m !== null)
    const warning = this.checkRoomSize(room)
    return { valid: errors.length === 0, errors, warnings: warning ? [warning] : [] }
  }

  checkTimeOrder(start: Date, end: Date): string | null {
    return start < end ? null : 'End time must be after start time'
  }

  checkDuration(start: Date, end: Date): string | null {
    const hours = hoursBetween(start, end)
    if (hours < this.minDurationHours) return `Minimum reservation duration is ${this.minDurationHours} hour(s)`
    if (hours > this.maxDurationHours) return `Maximum reservation duration is ${this.maxDurationHours} hours`
    return null
  }

  checkBusinessHours(start: Date, end: Date): string | null {
    if (secondsOfDay(start) < timeOfDaySeconds(this.businessStart) || secondsOfDay(end) > timeOfDaySeconds(this.businessEnd)) {
      return `Reservations must be between ${formatTimeOfDay(this.businessStart)} and ${formatTimeOfDay(this.businessEnd)}`
    }
    return null
  }

  checkAdvanceBooking(start: Date): string | null {
    if (calendarDaysBetween(this.now(), start) > this.maxAdvanceDays) {
      return `Cannot book more than ${this.maxAdvanceDays} days in advance`
    }
    return null
  }

  checkNotInPast(start: Date): string | null {
    return start > this.now() ? null : 'Cannot book reservations in the past'
  }

  checkUserName(userName: string): string | null {
    return userName.trim().length >= 2 ? null : 'User name must be at least 2 characters'
  }

  checkRoomSize(room: Room): string | null {
    return room.capacity < this.smallRoomThreshold ? `Small room capacity (${room.capacity} people)` : null
  }
}

export type CapacityCheck = { ok: boolean; message?: string }

// Attendee count against room capacity; above 90% passes with a warning.
export class CapacityValidator {
  validate(room: Room, attendees: number): CapacityCheck {
    if (attendees <= 0) return { ok: false, message: 'Number of attendees must be positive' }
    if (attendees > room.capacity) {
      return { ok: false, message: `Room capacity (${room.capacity}) exceeded by ${attendees - room.capacity} people` }
    }
    if (attendees > room.capacity * 0.9) {
      return { ok: true, message: `Room will be at ${Math.round((attendees / room.capacity) * 100)}% capacity` }
    }
    return { ok: true }
  }
}
