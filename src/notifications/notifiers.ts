import type { Reservation } from '../domain/Reservation.js'
import { roomLabel } from '../domain/rooms.js'
import { errorFields, logger as defaultLogger, type Logger } from '../lib/logger.js'

export interface Notifier {
  notifyConfirmed(reservation: Reservation): boolean | Promise<boolean>
  notifyCancelled(reservation: Reservation): boolean | Promise<boolean>
}

function summary(reservation: Reservation) {
  return {
    reservationId: reservation.id,
    roomId: reservation.room.id,
    room: `${roomLabel(reservation.room)} ${reservation.room.name}`,
    user: reservation.userName,
    start: reservation.start.toISOString(),
    end: reservation.end.toISOString(),
  }
}

// Writes each event as a log entry.
export class LogNotifier implements Notifier {
  constructor(private readonly logger: Logger = defaultLogger) {}

  notifyConfirmed(reservation: Reservation): boolean {
    this.logger.info('reservation confirmed', { ...summary(reservation), purpose: reservation.purpose || undefined })
    return true
  }

  notifyCancelled(reservation: Reservation): boolean {
    this.logger.info('reservation cancelled', summary(reservation))
    return true
  }
}

export class NoopNotifier implements Notifier {
  notifyConfirmed(): boolean {
    return true
  }

  notifyCancelled(): boolean {
    return true
  }
}

/**
 * Fans an event out to every channel. Resolves true only when all of them
 * reported success; a channel that throws counts as a failure and does not
 * stop the others.
 */
export class MultiNotifier implements Notifier {
  private readonly notifiers: Notifier[] = []

  constructor(notifiers: Notifier[] = [], private readonly logger: Logger = defaultLogger) {
    this.notifiers.push(...notifiers)
  }

  add(notifier: Notifier): void {
    this.notifiers.push(notifier)
  }

  get channels(): number {
    return this.notifiers.length
  }

  notifyConfirmed(reservation: Reservation): Promise<boolean> {
    return this.fanOut(n => n.notifyConfirmed(reservation))
  }

  notifyCancelled(reservation: Reservation): Promise<boolean> {
    return this.fanOut(n => n.notifyCancelled(reservation))
  }

  private async fanOut(send: (n: Notifier) => boolean | Promise<boolean>): Promise<boolean> {
    const results = await Promise.all(
      this.notifiers.map(async n => {
        try {
          return await send(n)
        } catch (e) {
          this.logger.warn('notification channel failed', { error: errorFields(e) })
          return false
        }
      }),
    )
    return results.every(Boolean)
  }
}
