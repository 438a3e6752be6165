import { describe, expect, it } from 'vitest'
import { overlaps, Reservation } from '../../src/domain/Reservation.js'
import { at, classroom, reservation } from './fixtures.js'

describe('overlaps', () => {
  const nine = at(7, 9)
  const ten = at(7, 10)
  const eleven = at(7, 11)
  const noon = at(7, 12)

  it('matches the half-open rule for every arrangement', () => {
    const points = [nine, ten, eleven, noon]
    for (const s1 of points) {
      for (const e1 of points) {
        for (const s2 of points) {
          for (const e2 of points) {
            if (!(s1 < e1 && s2 < e2)) continue
            expect(overlaps(s1, e1, s2, e2)).toBe(s1 < e2 && s2 < e1)
            expect(overlaps(s1, e1, s2, e2)).toBe(overlaps(s2, e2, s1, e1))
          }
        }
      }
    }
  })

  it('is reflexive on identical ranges', () => {
    expect(overlaps(nine, eleven, nine, eleven)).toBe(true)
  })

  it('touching endpoints do not overlap', () => {
    expect(overlaps(nine, ten, ten, eleven)).toBe(false)
    expect(overlaps(ten, eleven, nine, ten)).toBe(false)
  })

  it('containment overlaps', () => {
    expect(overlaps(nine, noon, ten, eleven)).toBe(true)
  })
})

describe('Reservation', () => {
  it('starts CONFIRMED with an empty purpose by default', () => {
    const r = new Reservation({ id: 'RES-00000001', room: classroom, userName: 'Ada', start: at(7, 9), end: at(7, 11) })
    expect(r.status).toBe('CONFIRMED')
    expect(r.purpose).toBe('')
    expect(r.isCancelled).toBe(false)
    expect(r.durationMinutes).toBe(120)
  })

  it('overlapsWith uses the reservation interval', () => {
    const r = reservation('RES-1', classroom, at(7, 9), at(7, 11))
    expect(r.overlapsWith(at(7, 10), at(7, 12))).toBe(true)
    expect(r.overlapsWith(at(7, 11), at(7, 12))).toBe(false)
    expect(r.overlapsWith(at(7, 8), at(7, 9))).toBe(false)
  })

  it('overlapsWith ignores status', () => {
    const r = reservation('RES-1', classroom, at(7, 9), at(7, 11))
    r.cancel()
    expect(r.overlapsWith(at(7, 10), at(7, 12))).toBe(true)
  })

  it('cancel moves to CANCELLED and stays there', () => {
    const r = reservation('RES-1', classroom, at(7, 9), at(7, 11))
    r.cancel()
    expect(r.status).toBe('CANCELLED')
    r.cancel()
    expect(r.status).toBe('CANCELLED')
    expect(r.isCancelled).toBe(true)
  })

  it('shares the room by reference', () => {
    const a = reservation('RES-1', classroom, at(7, 9), at(7, 11))
    const b = reservation('RES-2', classroom, at(7, 12), at(7, 13))
    expect(a.room).toBe(b.room)
  })
})
