export { SlotInventory } from './slot-inventory';
export type { Reservation, SlotInventoryOptions } from './slot-inventory';
