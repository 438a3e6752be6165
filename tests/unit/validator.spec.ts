import { afterEach, beforeEach, describe, expect, it, vi } from 'vitest'
import { ConfigError } from '../../src/domain/errors.js'
import { CapacityValidator, ReservationValidator } from '../../src/domain/ReservationValidator.js'
import { at, classroom, huddleRoom } from './fixtures.js'

// Monday 2030-01-07 08:00 local
const now = at(7, 8)

describe('ReservationValidator', () => {
  beforeEach(() => {
    vi.useFakeTimers()
    vi.setSystemTime(now)
  })

  afterEach(() => {
    vi.useRealTimers()
  })

  const validator = () => new ReservationValidator()

  it('validateAll: accepts a well-formed request', () => {
    const report = validator().validateAll(classroom, at(8, 9), at(8, 11), 'Ada')
    expect(report).toEqual({ valid: true, errors: [], warnings: [] })
  })

  it('validateAll: reports every violated rule at once', () => {
    // reversed, zero-length-or-less, ends after 22:00
    const report = validator().validateAll(classroom, at(8, 23), at(8, 22, 30), 'Ada')
    expect(report.valid).toBe(false)
    expect(report.errors).toEqual([
      'End time must be after start time',
      'Minimum reservation duration is 1 hour(s)',
      'Reservations must be between 07:00 and 22:00',
    ])
  })

  it('validateAll: collects past, name and hours violations together', () => {
    const report = validator().validateAll(classroom, at(7, 6), at(7, 7, 30), ' x ')
    expect(report.errors).toEqual([
      'Reservations must be between 07:00 and 22:00',
      'Cannot book reservations in the past',
      'User name must be at least 2 characters',
    ])
  })

  it('validateAll: small rooms produce a warning without failing', () => {
    const report = validator().validateAll(huddleRoom, at(8, 9), at(8, 10), 'Ada')
    expect(report).toEqual({ valid: true, errors: [], warnings: ['Small room capacity (4 people)'] })
  })

  it('checkDuration: enforces both bounds', () => {
    const v = validator()
    expect(v.checkDuration(at(8, 9), at(8, 9, 30))).toBe('Minimum reservation duration is 1 hour(s)')
    expect(v.checkDuration(at(8, 8), at(8, 17))).toBe('Maximum reservation duration is 8 hours')
    expect(v.checkDuration(at(8, 9), at(8, 17))).toBeNull()
    expect(v.checkDuration(at(8, 9), at(8, 10))).toBeNull()
  })

  it('checkBusinessHours: boundaries are inclusive', () => {
    const v = validator()
    expect(v.checkBusinessHours(at(8, 7), at(8, 22))).toBeNull()
    expect(v.checkBusinessHours(at(8, 6, 59), at(8, 8))).toBe('Reservations must be between 07:00 and 22:00')
    expect(v.checkBusinessHours(at(8, 20), at(8, 22, 1))).toBe('Reservations must be between 07:00 and 22:00')
  })

  it('checkAdvanceBooking: counts calendar days from today', () => {
    const v = validator()
    // 2030-01-07 + 90 days = 2030-04-07
    expect(v.checkAdvanceBooking(new Date(2030, 3, 7, 9))).toBeNull()
    expect(v.checkAdvanceBooking(new Date(2030, 3, 8, 9))).toBe('Cannot book more than 90 days in advance')
  })

  it('checkNotInPast: the current moment itself is rejected', () => {
    const v = validator()
    expect(v.checkNotInPast(now)).toBe('Cannot book reservations in the past')
    expect(v.checkNotInPast(at(7, 8, 1))).toBeNull()
  })

  it('checkUserName: trims before measuring', () => {
    const v = validator()
    expect(v.checkUserName('  A  ')).toBe('User name must be at least 2 characters')
    expect(v.checkUserName('Al')).toBeNull()
  })

  it('honours custom settings and an injected clock', () => {
    const v = new ReservationValidator({
      minDurationHours: 2,
      maxDurationHours: 3,
      businessStart: '09:00',
      businessEnd: '17:00',
      maxAdvanceDays: 1,
      smallRoomThreshold: 50,
      now: () => at(1, 12),
    })
    const report = v.validateAll(classroom, at(7, 8), at(7, 9), 'Ada')
    expect(report.errors).toEqual([
      'Minimum reservation duration is 2 hour(s)',
      'Reservations must be between 09:00 and 17:00',
      'Cannot book more than 1 days in advance',
    ])
    expect(report.warnings).toEqual(['Small room capacity (40 people)'])
  })

  it('rejects a malformed business hour setting', () => {
    expect(() => new ReservationValidator({ businessStart: '7am' })).toThrow(ConfigError)
  })
})

describe('CapacityValidator', () => {
  const capacity = new CapacityValidator()

  it('rejects non-positive attendee counts', () => {
    expect(capacity.validate(classroom, 0)).toEqual({ ok: false, message: 'Number of attendees must be positive' })
  })

  it('rejects counts above capacity', () => {
    expect(capacity.validate(classroom, 45)).toEqual({ ok: false, message: 'Room capacity (40) exceeded by 5 people' })
  })

  it('warns above 90% of capacity', () => {
    expect(capacity.validate(classroom, 38)).toEqual({ ok: true, message: 'Room will be at 95% capacity' })
  })

  it('passes comfortably sized groups', () => {
    expect(capacity.validate(classroom, 36)).toEqual({ ok: true })
  })
})
