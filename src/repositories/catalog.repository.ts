import { Attendee, GENERIC_PROFILE_EVENT_ID } from '../models/attendee.model';
import { Event } from '../models/event.model';
import { InventoryItem } from '../models/inventory-item.model';
import { MIN_PASSWORD_LENGTH, isAdmin, makeUser } from '../models/user.model';
import { decodeAttendee, encodeAttendees } from '../codecs/attendee.codec';
import { decodeEvent, encodeEvents } from '../codecs/event.codec';
import { decodeInventoryItem, encodeInventory } from '../codecs/inventory.codec';
import { decodeUser, encodeUsers } from '../codecs/user.codec';
import {
  RecordDecoder,
  RecordEncoder,
  SkippedRecord,
  breaksRecord,
  decodeLines,
} from '../codecs/fields';
import { RecordStore } from './record-store';
import { isValidDate, isValidTime } from '../validators/schedule';
import { ErrorCode } from '../types/error.types';
import { Failure, Result, fail, succeed } from '../types/result.types';
import { CreateUserInput, User } from '../types/user.types';
import {
  DeleteEventOutcome,
  EventDetails,
  EventStatus,
  UpdateEventInput,
} from '../types/event.types';
import {
  AllocationChange,
  CreateItemInput,
  ReconcileResult,
  ReconciledItem,
  UpdateItemInput,
} from '../types/inventory.types';
import {
  CheckInOutcome,
  ContactUpdateOutcome,
  OrphanedAttendee,
  RegistrationOutcome,
} from '../types/attendee.types';
import { logger } from '../config/logger';

export const COLLECTION_NAMES = ['users', 'events', 'attendees', 'inventory'] as const;

export type CollectionName = (typeof COLLECTION_NAMES)[number];

export const COLLECTION_FILES: Record<CollectionName, string> = {
  users: 'users.txt',
  events: 'events.txt',
  attendees: 'attendees.txt',
  inventory: 'inventory.txt',
};

export interface CollectionLoadReport {
  loaded: number;
  skipped: SkippedRecord[];
}

export interface LoadReport {
  collections: Record<CollectionName, CollectionLoadReport>;
  orphanedAttendees: OrphanedAttendee[];
  reconcile: ReconcileResult;
}

/**
 * Monotonic id counter; never hands out an id at or below one it has seen
 */
class IdSequence {
  private nextId = 1;

  next(): number {
    return this.nextId++;
  }

  advancePast(id: number): void {
    if (id >= this.nextId) {
      this.nextId = id + 1;
    }
  }
}

/**
 * Catalog Repository
 *
 * Owns the users, events, attendees and inventory collections and keeps them
 * consistent with each other:
 * - an item's allocated quantity is the sum of every event ledger entry for it
 * - an attendee id sits in at most one event's attendee set
 * - ids are never reused while the process runs
 *
 * Every mutation saves the collections it touched before returning.
 * Expected failures come back as Result values; only storage errors throw.
 */
export class Catalog {
  private readonly users = new Map<number, User>();
  private readonly events = new Map<number, Event>();
  private readonly attendees = new Map<number, Attendee>();
  private readonly inventory = new Map<number, InventoryItem>();

  private readonly sequences: Record<CollectionName, IdSequence> = {
    users: new IdSequence(),
    events: new IdSequence(),
    attendees: new IdSequence(),
    inventory: new IdSequence(),
  };

  constructor(private readonly store: RecordStore) {}

  // ---------------------------------------------------------------------------
  // Load / save
  // ---------------------------------------------------------------------------

  /**
   * Load every collection, then repair what an interrupted save can leave
   * behind: attendee-set entries without a matching attendee record are
   * dropped, and allocated quantities are rebuilt from the event ledgers
   * instead of trusting the persisted inventory counters.
   */
  load(): LoadReport {
    const collections: Record<CollectionName, CollectionLoadReport> = {
      users: this.loadInto('users', decodeUser, this.users),
      events: this.loadInto('events', decodeEvent, this.events),
      attendees: this.loadInto('attendees', decodeAttendee, this.attendees),
      inventory: this.loadInto('inventory', decodeInventoryItem, this.inventory),
    };

    const orphanedAttendees = this.reconcileAttendeeSets();
    const reconcile = this.reconcileAllocations();

    logger.info('Catalog loaded', {
      users: collections.users.loaded,
      events: collections.events.loaded,
      attendees: collections.attendees.loaded,
      inventory: collections.inventory.loaded,
      skipped: COLLECTION_NAMES.reduce((sum, name) => sum + collections[name].skipped.length, 0),
      orphanedAttendees: orphanedAttendees.length,
      adjustedItems: reconcile.adjustedItems.length,
    });

    return { collections, orphanedAttendees, reconcile };
  }

  /**
   * Recompute every item's allocated quantity from the event ledgers.
   * Ledger entries that point at unknown items are left out of the sums.
   */
  reconcileAllocations(): ReconcileResult {
    const totals = new Map<number, number>();
    const orphanedAllocations: ReconcileResult['orphanedAllocations'] = [];

    for (const event of this.events.values()) {
      for (const [itemId, quantity] of event.allocations) {
        if (!this.inventory.has(itemId)) {
          orphanedAllocations.push({ eventId: event.id, itemId, quantity });
          logger.debug('Ignoring allocation to unknown item', { eventId: event.id, itemId, quantity });
          continue;
        }
        totals.set(itemId, (totals.get(itemId) ?? 0) + quantity);
      }
    }

    const adjustedItems: ReconciledItem[] = [];
    for (const item of this.inventory.values()) {
      const allocatedQuantity = totals.get(item.id) ?? 0;

      if (allocatedQuantity !== item.allocatedQuantity) {
        adjustedItems.push({
          itemId: item.id,
          previousAllocatedQuantity: item.allocatedQuantity,
          allocatedQuantity,
        });
      }
      if (allocatedQuantity > item.totalQuantity) {
        logger.warn('Event ledgers exceed item total', {
          itemId: item.id,
          totalQuantity: item.totalQuantity,
          allocatedQuantity,
        });
      }

      item.resetAllocated(allocatedQuantity);
    }

    return { adjustedItems, orphanedAllocations };
  }

  save(...names: CollectionName[]): void {
    for (const name of names) {
      this.writeCollection(name, COLLECTION_FILES[name]);
    }
  }

  /**
   * Write a collection in its record format under another document name
   */
  exportCollection(name: CollectionName, documentName: string): number {
    return this.writeCollection(name, documentName);
  }

  /**
   * Encode records with the given encoder and store the text
   */
  writeDocument<T>(documentName: string, records: readonly T[], encode: RecordEncoder<T>): void {
    this.store.write(documentName, encode(records));
  }

  // ---------------------------------------------------------------------------
  // Users
  // ---------------------------------------------------------------------------

  createUser(input: CreateUserInput): Result<User> {
    const unsafe = this.checkRecordText({ username: input.username, password: input.password });
    if (unsafe) return unsafe;

    if (this.findUserByUsername(input.username)) {
      return fail(ErrorCode.USERNAME_TAKEN, `Username '${input.username}' already exists`);
    }
    if (input.password.length < MIN_PASSWORD_LENGTH) {
      return fail(
        ErrorCode.PASSWORD_TOO_SHORT,
        `Password must be at least ${MIN_PASSWORD_LENGTH} characters long`
      );
    }

    const user = makeUser(this.sequences.users.next(), input.username, input.password, input.role);
    this.users.set(user.id, user);
    this.save('users');

    logger.info('User created', { userId: user.id, username: user.username, role: user.role });
    return succeed(user);
  }

  deleteUser(username: string, actingUserId: number): Result<User> {
    const user = this.findUserByUsername(username);
    if (!user) {
      return fail(ErrorCode.USER_NOT_FOUND, `User '${username}' not found`);
    }
    if (user.id === actingUserId) {
      return fail(ErrorCode.SELF_DELETION, 'Cannot delete the currently logged-in user');
    }

    this.users.delete(user.id);
    this.save('users');

    logger.info('User deleted', { userId: user.id, username });
    return succeed(user);
  }

  findUserById(id: number): User | null {
    return this.users.get(id) ?? null;
  }

  findUserByUsername(username: string): User | null {
    for (const user of this.users.values()) {
      if (user.username === username) return user;
    }
    return null;
  }

  verifyCredentials(username: string, password: string): User | null {
    const user = this.findUserByUsername(username);
    return user && user.password === password ? user : null;
  }

  listUsers(): User[] {
    return [...this.users.values()];
  }

  // ---------------------------------------------------------------------------
  // Events
  // ---------------------------------------------------------------------------

  createEvent(details: EventDetails): Result<Event> {
    const invalid = this.checkRecordText({ ...details }) ?? this.checkSchedule(details);
    if (invalid) return invalid;

    const event = Event.fromDetails(this.sequences.events.next(), details);
    this.events.set(event.id, event);
    this.save('events');

    logger.info('Event created', { eventId: event.id, name: event.name });
    return succeed(event);
  }

  updateEventDetails(id: number, changes: UpdateEventInput): Result<Event> {
    const event = this.events.get(id);
    if (!event) return this.eventNotFound(id);

    const invalid = this.checkRecordText({ ...changes }) ?? this.checkSchedule(changes);
    if (invalid) return invalid;

    if (changes.name !== undefined) event.name = changes.name;
    if (changes.date !== undefined) event.date = changes.date;
    if (changes.time !== undefined) event.time = changes.time;
    if (changes.location !== undefined) event.location = changes.location;
    if (changes.description !== undefined) event.description = changes.description;
    if (changes.category !== undefined) event.category = changes.category;
    this.save('events');

    logger.info('Event details updated', { eventId: id, fields: Object.keys(changes) });
    return succeed(event);
  }

  setEventStatus(id: number, status: EventStatus): Result<Event> {
    const event = this.events.get(id);
    if (!event) return this.eventNotFound(id);

    event.status = status;
    this.save('events');

    logger.info('Event status updated', { eventId: id, status });
    return succeed(event);
  }

  /**
   * Delete an event and cascade:
   * 1. return its ledger quantities to the items (unknown items are skipped)
   * 2. remove every attendee registered for it
   * 3. remove the event
   * Each step runs even if an earlier one could not complete.
   */
  deleteEvent(id: number): Result<DeleteEventOutcome> {
    const event = this.events.get(id);
    if (!event) return this.eventNotFound(id);

    const outcome: DeleteEventOutcome = {
      eventId: id,
      releasedItems: [],
      missingItemIds: [],
      removedAttendeeIds: [],
    };

    for (const [itemId, quantity] of event.allocations) {
      const item = this.inventory.get(itemId);
      if (!item) {
        outcome.missingItemIds.push(itemId);
        continue;
      }
      outcome.releasedItems.push({ itemId, quantity: this.releaseFromItem(item, quantity) });
    }

    for (const attendee of [...this.attendees.values()]) {
      if (attendee.eventIdRegisteredFor === id) {
        this.attendees.delete(attendee.id);
        outcome.removedAttendeeIds.push(attendee.id);
      }
    }

    this.events.delete(id);
    this.save('events', 'inventory', 'attendees');

    logger.info('Event deleted', { ...outcome, name: event.name });
    return succeed(outcome);
  }

  findEvent(id: number): Event | null {
    return this.events.get(id) ?? null;
  }

  listEvents(): Event[] {
    return [...this.events.values()];
  }

  /**
   * Case-insensitive match on the name, or a substring of the date
   */
  searchEvents(term: string): Event[] {
    const needle = term.toLowerCase();
    return this.listEvents().filter(
      (event) => event.name.toLowerCase().includes(needle) || event.date.includes(needle)
    );
  }

  // ---------------------------------------------------------------------------
  // Inventory
  // ---------------------------------------------------------------------------

  addItem(input: CreateItemInput): Result<InventoryItem> {
    const unsafe = this.checkRecordText({ name: input.name, description: input.description });
    if (unsafe) return unsafe;

    if (!Number.isSafeInteger(input.totalQuantity) || input.totalQuantity <= 0) {
      return fail(ErrorCode.INVALID_QUANTITY, 'Total quantity must be positive', {
        totalQuantity: input.totalQuantity,
      });
    }

    const item = new InventoryItem(
      this.sequences.inventory.next(),
      input.name,
      input.totalQuantity,
      0,
      input.description
    );
    this.inventory.set(item.id, item);
    this.save('inventory');

    logger.info('Inventory item added', { itemId: item.id, name: item.name });
    return succeed(item);
  }

  /**
   * Edit an item; a rejected total quantity leaves every field unchanged
   */
  updateItem(id: number, changes: UpdateItemInput): Result<InventoryItem> {
    const item = this.inventory.get(id);
    if (!item) return this.itemNotFound(id);

    const unsafe = this.checkRecordText({ name: changes.name, description: changes.description });
    if (unsafe) return unsafe;

    if (changes.totalQuantity !== undefined) {
      const resized = item.setTotalQuantity(changes.totalQuantity);
      if (!resized.ok) return resized;
    }
    if (changes.name !== undefined) item.rename(changes.name);
    if (changes.description !== undefined) item.describe(changes.description);
    this.save('inventory');

    logger.info('Inventory item updated', { itemId: id, fields: Object.keys(changes) });
    return succeed(item);
  }

  findItem(id: number): InventoryItem | null {
    return this.inventory.get(id) ?? null;
  }

  findItemByName(name: string): InventoryItem | null {
    const needle = name.toLowerCase();
    for (const item of this.inventory.values()) {
      if (item.name.toLowerCase() === needle) return item;
    }
    return null;
  }

  listItems(): InventoryItem[] {
    return [...this.inventory.values()];
  }

  /**
   * Reserve item stock for an event. The item is charged first; the event
   * ledger is written only when that succeeded.
   */
  allocateToEvent(eventId: number, itemId: number, quantity: number): Result<AllocationChange> {
    const event = this.events.get(eventId);
    if (!event) return this.eventNotFound(eventId);
    const item = this.inventory.get(itemId);
    if (!item) return this.itemNotFound(itemId);

    const allocated = item.allocate(quantity);
    if (!allocated.ok) return allocated;

    event.allocateInventoryItem(itemId, quantity);
    this.save('inventory', 'events');

    logger.info('Inventory allocated to event', { eventId, itemId, quantity });
    return succeed(this.allocationChange(event, item, quantity));
  }

  /**
   * Return stock from an event to the item. Asking for more than the event
   * holds releases what it holds; `quantity` in the result is that amount.
   */
  deallocateFromEvent(eventId: number, itemId: number, quantity: number): Result<AllocationChange> {
    const event = this.events.get(eventId);
    if (!event) return this.eventNotFound(eventId);
    const item = this.inventory.get(itemId);
    if (!item) return this.itemNotFound(itemId);

    if (!Number.isSafeInteger(quantity) || quantity <= 0) {
      return fail(ErrorCode.INVALID_QUANTITY, 'Deallocation quantity must be a positive integer', {
        quantity,
      });
    }
    if (event.allocatedQuantityOf(itemId) === 0) {
      return fail(
        ErrorCode.NOT_ALLOCATED,
        `'${item.name}' was not allocated to event '${event.name}'`,
        { eventId, itemId }
      );
    }

    const released = event.deallocateInventoryItem(itemId, quantity);
    this.releaseFromItem(item, released);
    this.save('inventory', 'events');

    logger.info('Inventory deallocated from event', { eventId, itemId, requested: quantity, released });
    return succeed(this.allocationChange(event, item, released));
  }

  // ---------------------------------------------------------------------------
  // Attendees
  // ---------------------------------------------------------------------------

  /**
   * Register a regular user for an open event. Registering twice returns the
   * existing attendee with `created: false`.
   */
  registerForEvent(user: User, eventId: number, contactInfo: string): Result<RegistrationOutcome> {
    if (isAdmin(user)) {
      return fail(ErrorCode.FORBIDDEN, 'Only regular users can register for events');
    }
    const unsafe = this.checkRecordText({ contactInfo });
    if (unsafe) return unsafe;

    const event = this.events.get(eventId);
    if (!event) return this.eventNotFound(eventId);
    if (!event.isOpenForRegistration) {
      return fail(ErrorCode.REGISTRATION_CLOSED, `Cannot register for a ${event.status} event`, {
        status: event.status,
      });
    }

    const existing = this.findUserAttendee(user.id, eventId);
    if (existing) {
      if (event.addAttendee(existing.id)) {
        this.save('events');
      }
      logger.debug('User already registered for event', { userId: user.id, eventId });
      return succeed({ attendee: existing.toView(), created: false });
    }

    const profile = this.findUserAttendee(user.id, GENERIC_PROFILE_EVENT_ID);
    if (profile) {
      profile.contactInfo = contactInfo;
    }

    const attendee = new Attendee(
      this.sequences.attendees.next(),
      user.username,
      contactInfo,
      eventId,
      false,
      user.id
    );
    this.attendees.set(attendee.id, attendee);
    event.addAttendee(attendee.id);
    // Attendee record first: a set entry without its record is dropped on load
    this.save('attendees', 'events');

    logger.info('Attendee registered', { attendeeId: attendee.id, userId: user.id, eventId });
    return succeed({ attendee: attendee.toView(), created: true });
  }

  cancelRegistration(user: User, eventId: number): Result<Attendee> {
    if (isAdmin(user)) {
      return fail(ErrorCode.FORBIDDEN, 'Only regular users can cancel their own registrations');
    }

    const event = this.events.get(eventId);
    if (!event) return this.eventNotFound(eventId);

    const attendee = this.findUserAttendee(user.id, eventId);
    if (!attendee) {
      return fail(ErrorCode.NOT_REGISTERED, `You are not registered for event '${event.name}'`);
    }

    event.removeAttendee(attendee.id);
    this.attendees.delete(attendee.id);
    this.save('events', 'attendees');

    logger.info('Registration canceled', { attendeeId: attendee.id, userId: user.id, eventId });
    return succeed(attendee);
  }

  checkIn(eventId: number, attendeeId: number): Result<CheckInOutcome> {
    const event = this.events.get(eventId);
    if (!event) return this.eventNotFound(eventId);

    const attendee = this.attendees.get(attendeeId);
    if (!attendee || attendee.eventIdRegisteredFor !== eventId) {
      return fail(
        ErrorCode.ATTENDEE_NOT_FOUND,
        `Attendee ID ${attendeeId} not found or not registered for event ID ${eventId}`
      );
    }

    const changed = attendee.checkIn();
    if (changed) {
      this.save('attendees');
      logger.info('Attendee checked in', { attendeeId, eventId });
    }

    return succeed({ attendee: attendee.toView(), alreadyCheckedIn: !changed });
  }

  /**
   * Update the contact info on every attendee record the user owns,
   * creating a generic profile when the user has none.
   */
  updateContactInfo(user: User, contactInfo: string): Result<ContactUpdateOutcome> {
    if (isAdmin(user)) {
      return fail(ErrorCode.FORBIDDEN, 'Contact info belongs to regular user attendee profiles');
    }
    const unsafe = this.checkRecordText({ contactInfo });
    if (unsafe) return unsafe;

    const owned = [...this.attendees.values()].filter((attendee) => attendee.userId === user.id);
    for (const attendee of owned) {
      attendee.contactInfo = contactInfo;
    }

    let createdProfileId: number | null = null;
    if (!owned.some((attendee) => attendee.isGenericProfile)) {
      const profile = new Attendee(
        this.sequences.attendees.next(),
        user.username,
        contactInfo,
        GENERIC_PROFILE_EVENT_ID,
        false,
        user.id
      );
      this.attendees.set(profile.id, profile);
      createdProfileId = profile.id;
    }
    this.save('attendees');

    logger.info('Contact info updated', { userId: user.id, updated: owned.length, createdProfileId });
    return succeed({ updatedAttendeeIds: owned.map((attendee) => attendee.id), createdProfileId });
  }

  findAttendee(id: number): Attendee | null {
    return this.attendees.get(id) ?? null;
  }

  listAttendees(eventId?: number): Attendee[] {
    const all = [...this.attendees.values()];
    return eventId === undefined
      ? all
      : all.filter((attendee) => attendee.eventIdRegisteredFor === eventId);
  }

  // ---------------------------------------------------------------------------
  // Internals
  // ---------------------------------------------------------------------------

  /**
   * Keep only attendee-set entries backed by an attendee registered for that
   * event. Every listed id still advances the attendee sequence so a new
   * registration never reuses it.
   */
  private reconcileAttendeeSets(): OrphanedAttendee[] {
    const orphaned: OrphanedAttendee[] = [];

    for (const event of this.events.values()) {
      for (const attendeeId of event.attendees) {
        this.sequences.attendees.advancePast(attendeeId);

        const attendee = this.attendees.get(attendeeId);
        if (attendee && attendee.eventIdRegisteredFor === event.id) continue;

        event.removeAttendee(attendeeId);
        orphaned.push({ eventId: event.id, attendeeId });
        logger.warn('Dropping attendee id with no matching registration', {
          eventId: event.id,
          attendeeId,
        });
      }
    }

    return orphaned;
  }

  private loadInto<T extends { id: number }>(
    name: CollectionName,
    decode: RecordDecoder<T>,
    target: Map<number, T>
  ): CollectionLoadReport {
    const text = this.store.read(COLLECTION_FILES[name]) ?? '';
    const decoded = decodeLines(text, decode, name);

    target.clear();
    for (const record of decoded.records) {
      if (target.has(record.id)) {
        logger.warn('Duplicate record id, keeping the later line', { collection: name, id: record.id });
      }
      target.set(record.id, record);
      this.sequences[name].advancePast(record.id);
    }

    return { loaded: target.size, skipped: decoded.skipped };
  }

  private writeCollection(name: CollectionName, documentName: string): number {
    switch (name) {
      case 'users':
        this.writeDocument(documentName, this.listUsers(), encodeUsers);
        return this.users.size;
      case 'events':
        this.writeDocument(documentName, this.listEvents(), encodeEvents);
        return this.events.size;
      case 'attendees':
        this.writeDocument(documentName, this.listAttendees(), encodeAttendees);
        return this.attendees.size;
      case 'inventory':
        this.writeDocument(documentName, this.listItems(), encodeInventory);
        return this.inventory.size;
    }
  }

  /**
   * Give back up to `quantity` units to an item, never more than it has
   * allocated. Returns the amount released.
   */
  private releaseFromItem(item: InventoryItem, quantity: number): number {
    const releasable = Math.min(quantity, item.allocatedQuantity);
    if (releasable < quantity) {
      logger.warn('Item holds less than the event ledger; releasing what it holds', {
        itemId: item.id,
        requested: quantity,
        allocated: item.allocatedQuantity,
      });
    }
    if (releasable <= 0) return 0;

    const released = item.deallocate(releasable);
    if (!released.ok) {
      logger.error('Failed to release item stock', { itemId: item.id, error: released.message });
      return 0;
    }
    return releasable;
  }

  private findUserAttendee(userId: number, eventId: number): Attendee | null {
    for (const attendee of this.attendees.values()) {
      if (attendee.userId === userId && attendee.eventIdRegisteredFor === eventId) {
        return attendee;
      }
    }
    return null;
  }

  private allocationChange(event: Event, item: InventoryItem, quantity: number): AllocationChange {
    return {
      eventId: event.id,
      itemId: item.id,
      quantity,
      itemAllocatedQuantity: item.allocatedQuantity,
      itemAvailableQuantity: item.availableQuantity,
      eventAllocatedQuantity: event.allocatedQuantityOf(item.id),
    };
  }

  /**
   * Records are comma-separated lines, so stored text may hold neither
   */
  private checkRecordText(fields: Record<string, string | undefined>): Failure | null {
    for (const [field, text] of Object.entries(fields)) {
      if (text !== undefined && breaksRecord(text)) {
        return fail(ErrorCode.VALIDATION_ERROR, `${field} must not contain commas or line breaks`, {
          field,
        });
      }
    }
    return null;
  }

  private checkSchedule(details: UpdateEventInput): Failure | null {
    if (details.date !== undefined && !isValidDate(details.date)) {
      return fail(ErrorCode.INVALID_DATE, 'Date must be YYYY-MM-DD', { date: details.date });
    }
    if (details.time !== undefined && !isValidTime(details.time)) {
      return fail(ErrorCode.INVALID_TIME, 'Time must be HH:MM (24-hour)', { time: details.time });
    }
    return null;
  }

  private eventNotFound(id: number): Failure {
    return fail(ErrorCode.EVENT_NOT_FOUND, `Event with ID ${id} not found`, { eventId: id });
  }

  private itemNotFound(id: number): Failure {
    return fail(ErrorCode.ITEM_NOT_FOUND, `Inventory item with ID ${id} not found`, { itemId: id });
  }
}
