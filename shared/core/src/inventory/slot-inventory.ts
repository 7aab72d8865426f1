/**
 * SlotInventory
 *
 * Bookable unit counters per slot (e.g. tables for a venue time slot). Each
 * reserve/cancel is a read-check-then-write sequence run under that slot's
 * lock from a KeyLockRegistry, so concurrent reservations can never oversell
 * and a lock timeout leaves the counter untouched.
 */

import crypto from 'crypto';
import { NotFoundError, SlotUnavailableError, ValidationError } from '@tierstack/types';
import { validateSlotInventoryConfig } from '@tierstack/config';
import { KeyLockRegistry } from '../async/key-lock-registry';
import { createLogger } from '../logging';
import type { ILogger } from '../logging';

export interface Reservation {
  id: string;
  slotKey: string;
  holder: string;
  units: number;
  createdAt: number;
}

export interface SlotInventoryOptions {
  /** Shared lock table; a private one is created when omitted */
  locks?: KeyLockRegistry;
  logger?: ILogger;
  /** Per-call lock wait; defaults to the registry's timeout */
  acquireTimeoutMs?: number;
}

const LOCK_PREFIX = 'slot:';

function assertUnits(field: string, units: number, min: number): void {
  if (!Number.isInteger(units) || units < min) {
    throw new ValidationError(`${field} must be an integer >= ${min}, got ${units}`, {
      field,
      receivedValue: units,
    });
  }
}

export class SlotInventory {
  private readonly locks: KeyLockRegistry;
  private readonly logger: ILogger;
  private readonly acquireTimeoutMs?: number;

  private readonly remaining = new Map<string, number>();
  private readonly reservations = new Map<string, Reservation>();

  constructor(options: SlotInventoryOptions = {}) {
    const config = validateSlotInventoryConfig({ acquireTimeoutMs: options.acquireTimeoutMs });
    this.logger = options.logger ?? createLogger('slot-inventory');
    this.locks = options.locks ?? new KeyLockRegistry({}, { logger: this.logger });
    this.acquireTimeoutMs = config.acquireTimeoutMs;
  }

  /**
   * Set the number of free units for a slot, replacing any previous value.
   */
  async setCapacity(slotKey: string, units: number): Promise<void> {
    assertUnits('units', units, 0);
    await this.withSlotLock(slotKey, () => {
      this.remaining.set(slotKey, units);
    });
  }

  available(slotKey: string): number {
    return this.remaining.get(slotKey) ?? 0;
  }

  /**
   * Take `units` from a slot.
   *
   * @throws ValidationError for non-positive units
   * @throws SlotUnavailableError when the slot is unknown or has too few units
   * @throws LockTimeoutError when the slot stays locked past the deadline
   */
  async reserve(slotKey: string, holder: string, units = 1): Promise<Reservation> {
    assertUnits('units', units, 1);

    return this.withSlotLock(slotKey, () => {
      const free = this.remaining.get(slotKey);
      if (free === undefined) {
        throw new SlotUnavailableError(slotKey, 'unknown_slot');
      }
      if (free < units) {
        throw new SlotUnavailableError(slotKey, 'sold_out', { requested: units, available: free });
      }

      this.remaining.set(slotKey, free - units);
      const reservation: Reservation = {
        id: crypto.randomUUID(),
        slotKey,
        holder,
        units,
        createdAt: Date.now(),
      };
      this.reservations.set(reservation.id, reservation);

      this.logger.debug('Slot reserved', { slotKey, holder, units, remaining: free - units });
      return reservation;
    });
  }

  /**
   * Return a reservation's units to its slot.
   *
   * @throws NotFoundError for unknown (or already cancelled) reservations
   */
  async cancel(reservationId: string): Promise<Reservation> {
    const reservation = this.reservations.get(reservationId);
    if (!reservation) {
      throw new NotFoundError('Reservation', reservationId);
    }

    return this.withSlotLock(reservation.slotKey, () => {
      // A concurrent cancel may have won while we waited
      if (!this.reservations.delete(reservationId)) {
        throw new NotFoundError('Reservation', reservationId);
      }
      const free = this.remaining.get(reservation.slotKey) ?? 0;
      this.remaining.set(reservation.slotKey, free + reservation.units);
      return reservation;
    });
  }

  listReservations(slotKey?: string): Reservation[] {
    const all = [...this.reservations.values()];
    return slotKey === undefined ? all : all.filter(r => r.slotKey === slotKey);
  }

  private withSlotLock<T>(slotKey: string, fn: () => T): Promise<T> {
    return this.locks.withLock(`${LOCK_PREFIX}${slotKey}`, fn, this.acquireTimeoutMs);
  }
}
