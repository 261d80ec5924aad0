import { EventDetails, EventStatus, EventView } from '../types/event.types';

/**
 * Event
 *
 * Holds references only: attendee ids and an allocation ledger keyed by
 * inventory item id. The matching InventoryItem counters are kept in step by
 * the catalog, which must allocate on the item first and record here only
 * after that succeeded.
 */
export class Event implements EventDetails {
  private readonly attendeeIds = new Set<number>();
  private readonly allocatedInventory = new Map<number, number>();

  constructor(
    public readonly id: number,
    public name: string,
    public date: string,
    public time: string,
    public location: string,
    public description: string,
    public category: string,
    public status: EventStatus = EventStatus.UPCOMING
  ) {}

  static fromDetails(id: number, details: EventDetails, status?: EventStatus): Event {
    return new Event(
      id,
      details.name,
      details.date,
      details.time,
      details.location,
      details.description,
      details.category,
      status
    );
  }

  get isOpenForRegistration(): boolean {
    return this.status !== EventStatus.CANCELED && this.status !== EventStatus.COMPLETED;
  }

  /**
   * Returns false (and changes nothing) when the attendee is already listed
   */
  addAttendee(attendeeId: number): boolean {
    if (this.attendeeIds.has(attendeeId)) {
      return false;
    }
    this.attendeeIds.add(attendeeId);
    return true;
  }

  removeAttendee(attendeeId: number): boolean {
    return this.attendeeIds.delete(attendeeId);
  }

  hasAttendee(attendeeId: number): boolean {
    return this.attendeeIds.has(attendeeId);
  }

  get attendees(): number[] {
    return [...this.attendeeIds];
  }

  /**
   * Record an allocation in the ledger. Repeated calls accumulate;
   * non-positive quantities are ignored.
   */
  allocateInventoryItem(itemId: number, quantity: number): void {
    if (quantity <= 0) return;
    this.allocatedInventory.set(itemId, (this.allocatedInventory.get(itemId) ?? 0) + quantity);
  }

  /**
   * Remove up to `quantity` units of an item from the ledger.
   *
   * Returns the amount actually removed, which is what the caller must hand
   * to InventoryItem.deallocate. The entry disappears once it reaches zero.
   */
  deallocateInventoryItem(itemId: number, quantity: number): number {
    if (quantity <= 0) return 0;

    const current = this.allocatedInventory.get(itemId);
    if (current === undefined) return 0;

    const released = Math.min(current, quantity);
    const remaining = current - released;

    if (remaining <= 0) {
      this.allocatedInventory.delete(itemId);
    } else {
      this.allocatedInventory.set(itemId, remaining);
    }

    return released;
  }

  allocatedQuantityOf(itemId: number): number {
    return this.allocatedInventory.get(itemId) ?? 0;
  }

  get allocations(): ReadonlyMap<number, number> {
    return this.allocatedInventory;
  }

  toView(): EventView {
    return {
      id: this.id,
      name: this.name,
      date: this.date,
      time: this.time,
      location: this.location,
      description: this.description,
      category: this.category,
      status: this.status,
      attendeeIds: this.attendees,
      allocations: [...this.allocatedInventory].map(([itemId, quantity]) => ({ itemId, quantity })),
    };
  }
}
