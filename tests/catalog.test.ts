import { describe, it, expect, beforeEach } from 'vitest';
import { Catalog } from '../src/repositories/catalog.repository';
import { MemoryRecordStore } from '../src/repositories/record-store';
import { seedInitialData } from '../src/repositories/seed';
import { ErrorCode } from '../src/types/error.types';
import { EventStatus, EventDetails } from '../src/types/event.types';
import { Role, User } from '../src/types/user.types';
import { Result } from '../src/types/result.types';

const expo: EventDetails = {
  name: 'Expo',
  date: '2025-05-05',
  time: '09:00',
  location: 'Hall',
  description: 'Trade show',
  category: 'Expo',
};

function value<T>(result: Result<T>): T {
  if (!result.ok) throw new Error(`${result.code}: ${result.message}`);
  return result.value;
}

function loadedCatalog(documents: Record<string, string>): { catalog: Catalog; store: MemoryRecordStore } {
  const store = new MemoryRecordStore(documents);
  const catalog = new Catalog(store);
  catalog.load();
  return { catalog, store };
}

describe('Catalog loading', () => {
  it('rebuilds allocated quantities from the event ledgers', () => {
    const store = new MemoryRecordStore({
      'inventory.txt': '5,Projector,10,0,HD Projector\n',
      'events.txt':
        '1,A,2025-01-01,10:00,Hall,Desc,Conf,0,,5:3\n2,B,2025-01-02,10:00,Hall,Desc,Conf,0,,5:4\n',
    });
    const catalog = new Catalog(store);

    const report = catalog.load();

    expect(catalog.findItem(5)?.allocatedQuantity).toBe(7);
    expect(report.reconcile.adjustedItems).toEqual([
      { itemId: 5, previousAllocatedQuantity: 0, allocatedQuantity: 7 },
    ]);
    expect(report.collections.events.loaded).toBe(2);
  });

  it('reports ledger entries for unknown items without counting them', () => {
    const { catalog } = loadedCatalog({
      'inventory.txt': '1,Projector,10,2,HD Projector\n',
      'events.txt': '1,A,2025-01-01,10:00,Hall,Desc,Conf,0,,1:2;9:2\n',
    });

    const result = catalog.reconcileAllocations();

    expect(result.adjustedItems).toEqual([]);
    expect(result.orphanedAllocations).toEqual([{ eventId: 1, itemId: 9, quantity: 2 }]);
    expect(catalog.findItem(1)?.allocatedQuantity).toBe(2);
  });

  it('skips malformed lines and keeps loading', () => {
    const store = new MemoryRecordStore({
      'users.txt': '1,admin,adminpass,0\nnot-a-record\n2,user1,user1pass,1\n',
    });
    const catalog = new Catalog(store);

    const report = catalog.load();

    expect(report.collections.users.loaded).toBe(2);
    expect(report.collections.users.skipped).toHaveLength(1);
    expect(report.collections.users.skipped[0]?.lineNumber).toBe(2);
  });

  it('never hands out an id at or below one already loaded', () => {
    const { catalog } = loadedCatalog({
      'users.txt': '1,admin,adminpass,0\n7,bob,bobpass1,1\n',
      'events.txt': '3,A,2025-01-01,10:00,Hall,Desc,Conf,0\n',
    });

    expect(value(catalog.createUser({ username: 'carol', password: 'carolpass', role: Role.REGULAR_USER })).id).toBe(8);

    const event = value(catalog.createEvent(expo));
    expect(event.id).toBe(4);
    value(catalog.deleteEvent(4));
    expect(value(catalog.createEvent(expo)).id).toBe(5);
  });

  it('skips records whose ids are past the safe integer range', () => {
    const store = new MemoryRecordStore({
      'inventory.txt': '99999999999999999999,Chairs,10,0,Standard\n',
    });
    const catalog = new Catalog(store);

    const report = catalog.load();

    expect(report.collections.inventory.loaded).toBe(0);
    expect(report.collections.inventory.skipped).toEqual([
      {
        lineNumber: 1,
        line: '99999999999999999999,Chairs,10,0,Standard',
        reason: 'id: must be a safe integer',
      },
    ]);
    expect(value(catalog.addItem({ name: 'Chairs', totalQuantity: 10, description: 'Standard' })).id).toBe(1);
    expect(value(catalog.addItem({ name: 'Tables', totalQuantity: 4, description: 'Folding' })).id).toBe(2);
  });

  it('drops attendee ids left without a registration and never reuses them', () => {
    // An events.txt written before the attendees.txt that should hold id 1
    const store = new MemoryRecordStore({
      'events.txt':
        '1,A,2025-01-01,10:00,Hall,Desc,Conf,0,1,\n2,B,2025-01-02,10:00,Hall,Desc,Conf,0,,\n',
    });
    const catalog = new Catalog(store);

    const report = catalog.load();
    const user1 = value(catalog.createUser({ username: 'user1', password: 'user1pass', role: Role.REGULAR_USER }));
    const outcome = value(catalog.registerForEvent(user1, 2, 'user1@example.com'));

    expect(report.orphanedAttendees).toEqual([{ eventId: 1, attendeeId: 1 }]);
    expect(outcome.attendee.id).toBe(2);
    expect(catalog.findEvent(1)?.attendees).toEqual([]);
    expect(catalog.findEvent(2)?.attendees).toEqual([2]);
    expect(catalog.listAttendees(1)).toEqual([]);
  });

  it('drops attendee ids registered for a different event', () => {
    const { catalog } = loadedCatalog({
      'events.txt':
        '1,A,2025-01-01,10:00,Hall,Desc,Conf,0,1;2,\n2,B,2025-01-02,10:00,Hall,Desc,Conf,0,,\n',
      'attendees.txt': '1,Ann,ann@example.com,1,0\n2,Bob,bob@example.com,2,0\n',
    });

    expect(catalog.findEvent(1)?.attendees).toEqual([1]);
    expect(catalog.findEvent(2)?.attendees).toEqual([]);
  });
});

describe('Catalog event deletion', () => {
  it('releases allocations and removes attendees before removing the event', () => {
    const { catalog, store } = loadedCatalog({
      'inventory.txt': '5,Tables,20,10,Folding\n',
      'events.txt': '3,Expo,2025-05-05,09:00,Hall,Trade,Expo,0,1;2,5:10\n',
      'attendees.txt': '1,Ann,ann@example.com,3,0\n2,Bob,bob@example.com,3,1\n4,Cat,cat@example.com,0,0\n',
    });
    expect(catalog.findItem(5)?.allocatedQuantity).toBe(10);

    const outcome = value(catalog.deleteEvent(3));

    expect(outcome).toEqual({
      eventId: 3,
      releasedItems: [{ itemId: 5, quantity: 10 }],
      missingItemIds: [],
      removedAttendeeIds: [1, 2],
    });
    expect(catalog.findItem(5)?.allocatedQuantity).toBe(0);
    expect(catalog.findEvent(3)).toBeNull();
    expect(store.read('events.txt')).toBe('');
    expect(store.read('inventory.txt')).toBe('5,Tables,20,0,Folding\n');
    expect(store.read('attendees.txt')).toBe('4,Cat,cat@example.com,0,0\n');
  });

  it('skips items that no longer exist', () => {
    const { catalog } = loadedCatalog({
      'events.txt': '1,Expo,2025-05-05,09:00,Hall,Trade,Expo,0,,9:2\n',
    });

    expect(value(catalog.deleteEvent(1)).missingItemIds).toEqual([9]);
  });

  it('fails for an unknown event', () => {
    const { catalog } = loadedCatalog({});

    expect(catalog.deleteEvent(42)).toMatchObject({ ok: false, code: ErrorCode.EVENT_NOT_FOUND });
  });
});

describe('Catalog allocation', () => {
  let catalog: Catalog;
  let store: MemoryRecordStore;

  beforeEach(() => {
    ({ catalog, store } = loadedCatalog({}));
    value(catalog.createEvent(expo));
    value(catalog.addItem({ name: 'Projector', totalQuantity: 5, description: 'HD Projector' }));
  });

  it('charges the item and records the ledger entry', () => {
    expect(value(catalog.allocateToEvent(1, 1, 3))).toEqual({
      eventId: 1,
      itemId: 1,
      quantity: 3,
      itemAllocatedQuantity: 3,
      itemAvailableQuantity: 2,
      eventAllocatedQuantity: 3,
    });
    expect(store.read('events.txt')).toBe('1,Expo,2025-05-05,09:00,Hall,Trade show,Expo,0,,1:3\n');
    expect(store.read('inventory.txt')).toBe('1,Projector,5,3,HD Projector\n');
  });

  it('leaves both sides untouched when stock is short', () => {
    value(catalog.allocateToEvent(1, 1, 3));

    expect(catalog.allocateToEvent(1, 1, 3)).toMatchObject({
      ok: false,
      code: ErrorCode.INSUFFICIENT_AVAILABLE,
    });
    expect(catalog.findItem(1)?.allocatedQuantity).toBe(3);
    expect(catalog.findEvent(1)?.allocatedQuantityOf(1)).toBe(3);
  });

  it('releases at most what the event holds', () => {
    value(catalog.allocateToEvent(1, 1, 3));

    const change = value(catalog.deallocateFromEvent(1, 1, 10));

    expect(change.quantity).toBe(3);
    expect(change.itemAllocatedQuantity).toBe(0);
    expect(change.eventAllocatedQuantity).toBe(0);
    expect(catalog.deallocateFromEvent(1, 1, 1)).toMatchObject({ ok: false, code: ErrorCode.NOT_ALLOCATED });
    expect(catalog.deallocateFromEvent(1, 1, 0)).toMatchObject({ ok: false, code: ErrorCode.INVALID_QUANTITY });
  });

  it('rejects unknown events and items', () => {
    expect(catalog.allocateToEvent(2, 1, 1)).toMatchObject({ ok: false, code: ErrorCode.EVENT_NOT_FOUND });
    expect(catalog.allocateToEvent(1, 2, 1)).toMatchObject({ ok: false, code: ErrorCode.ITEM_NOT_FOUND });
  });

  it('applies an item edit only when the new total is acceptable', () => {
    value(catalog.allocateToEvent(1, 1, 3));

    expect(catalog.updateItem(1, { name: 'Beamer', totalQuantity: 1 })).toMatchObject({
      ok: false,
      code: ErrorCode.BELOW_ALLOCATED,
    });
    expect(catalog.findItem(1)?.name).toBe('Projector');

    const item = value(catalog.updateItem(1, { name: 'Beamer', totalQuantity: 8 }));
    expect(item.toView()).toEqual({
      id: 1,
      name: 'Beamer',
      totalQuantity: 8,
      allocatedQuantity: 3,
      availableQuantity: 5,
      description: 'HD Projector',
    });
  });

  it('requires a positive total for new items', () => {
    expect(catalog.addItem({ name: 'Chairs', totalQuantity: 0, description: 'Standard' })).toMatchObject({
      ok: false,
      code: ErrorCode.INVALID_QUANTITY,
    });
  });

  it('finds items by name regardless of case', () => {
    expect(catalog.findItemByName('projector')?.id).toBe(1);
    expect(catalog.findItemByName('screen')).toBeNull();
  });
});

describe('Catalog events', () => {
  it('validates the schedule on create and edit', () => {
    const { catalog } = loadedCatalog({});

    expect(catalog.createEvent({ ...expo, date: '2025-13-01' })).toMatchObject({
      ok: false,
      code: ErrorCode.INVALID_DATE,
    });
    expect(catalog.createEvent({ ...expo, time: '24:00' })).toMatchObject({
      ok: false,
      code: ErrorCode.INVALID_TIME,
    });

    value(catalog.createEvent(expo));
    expect(catalog.updateEventDetails(1, { date: '1899-01-01' })).toMatchObject({
      ok: false,
      code: ErrorCode.INVALID_DATE,
    });
    expect(value(catalog.updateEventDetails(1, { location: 'Annex' })).location).toBe('Annex');
  });

  it('refuses text that would split a stored record', () => {
    const { catalog, store } = loadedCatalog({});

    expect(catalog.createEvent({ ...expo, name: 'Food, Wine' })).toEqual({
      ok: false,
      code: ErrorCode.VALIDATION_ERROR,
      message: 'name must not contain commas or line breaks',
      details: { field: 'name' },
    });
    expect(store.read('events.txt')).toBeNull();

    value(catalog.createEvent(expo));
    expect(catalog.updateEventDetails(1, { location: 'Hall A\nHall B' })).toMatchObject({
      ok: false,
      code: ErrorCode.VALIDATION_ERROR,
    });
    expect(catalog.findEvent(1)?.location).toBe('Hall');
    expect(catalog.addItem({ name: 'Chairs', totalQuantity: 5, description: 'Red,blue' })).toMatchObject({
      ok: false,
      code: ErrorCode.VALIDATION_ERROR,
    });
    expect(catalog.listItems()).toEqual([]);
  });

  it('searches names case-insensitively and dates by substring', () => {
    const { catalog } = loadedCatalog({});
    seedInitialData(catalog);

    expect(catalog.searchEvents('TECH').map((event) => event.name)).toEqual(['Tech Conference']);
    expect(catalog.searchEvents('2025-07').map((event) => event.name)).toEqual(['Summer Music Festival']);
    expect(catalog.searchEvents('opera')).toEqual([]);
  });
});

describe('Catalog users', () => {
  let catalog: Catalog;
  let admin: User;

  beforeEach(() => {
    ({ catalog } = loadedCatalog({}));
    admin = value(catalog.createUser({ username: 'admin', password: 'adminpass', role: Role.ADMIN }));
    value(catalog.createUser({ username: 'user1', password: 'user1pass', role: Role.REGULAR_USER }));
  });

  it('rejects duplicate usernames and short passwords', () => {
    expect(catalog.createUser({ username: 'user1', password: 'another', role: Role.REGULAR_USER })).toMatchObject({
      ok: false,
      code: ErrorCode.USERNAME_TAKEN,
    });
    expect(catalog.createUser({ username: 'user2', password: 'short', role: Role.REGULAR_USER })).toMatchObject({
      ok: false,
      code: ErrorCode.PASSWORD_TOO_SHORT,
    });
    expect(catalog.createUser({ username: 'user2', password: 'pass,word', role: Role.REGULAR_USER })).toMatchObject({
      ok: false,
      code: ErrorCode.VALIDATION_ERROR,
    });
  });

  it('checks credentials exactly', () => {
    expect(catalog.verifyCredentials('user1', 'user1pass')?.id).toBe(2);
    expect(catalog.findUserById(2)?.username).toBe('user1');
    expect(catalog.verifyCredentials('user1', 'USER1PASS')).toBeNull();
    expect(catalog.verifyCredentials('nobody', 'user1pass')).toBeNull();
  });

  it('does not let a user delete themselves', () => {
    expect(catalog.deleteUser('admin', admin.id)).toMatchObject({ ok: false, code: ErrorCode.SELF_DELETION });
    expect(catalog.deleteUser('ghost', admin.id)).toMatchObject({ ok: false, code: ErrorCode.USER_NOT_FOUND });
    expect(value(catalog.deleteUser('user1', admin.id)).username).toBe('user1');
    expect(catalog.findUserByUsername('user1')).toBeNull();
  });
});

describe('Catalog registration', () => {
  let catalog: Catalog;
  let store: MemoryRecordStore;
  let admin: User;
  let user1: User;

  beforeEach(() => {
    ({ catalog, store } = loadedCatalog({}));
    admin = value(catalog.createUser({ username: 'admin', password: 'adminpass', role: Role.ADMIN }));
    user1 = value(catalog.createUser({ username: 'user1', password: 'user1pass', role: Role.REGULAR_USER }));
    value(catalog.createEvent(expo));
  });

  it('only registers regular users', () => {
    expect(catalog.registerForEvent(admin, 1, 'admin@example.com')).toMatchObject({
      ok: false,
      code: ErrorCode.FORBIDDEN,
    });
  });

  it('rejects contact info spanning lines or fields', () => {
    expect(catalog.registerForEvent(user1, 1, 'ann@example.com\n5,Eve,x,1,1')).toMatchObject({
      ok: false,
      code: ErrorCode.VALIDATION_ERROR,
    });
    expect(catalog.updateContactInfo(user1, 'a@example.com, b@example.com')).toMatchObject({
      ok: false,
      code: ErrorCode.VALIDATION_ERROR,
    });
    expect(catalog.listAttendees()).toEqual([]);
    expect(store.read('attendees.txt')).toBeNull();
  });

  it('returns the existing registration on a repeat', () => {
    const first = value(catalog.registerForEvent(user1, 1, 'user1@example.com'));
    const second = value(catalog.registerForEvent(user1, 1, 'other@example.com'));

    expect(first).toEqual({
      attendee: {
        id: 1,
        name: 'user1',
        contactInfo: 'user1@example.com',
        eventId: 1,
        userId: 2,
        isCheckedIn: false,
      },
      created: true,
    });
    expect(second.created).toBe(false);
    expect(second.attendee.id).toBe(1);
    expect(catalog.findEvent(1)?.attendees).toEqual([1]);
  });

  it('refuses completed and canceled events', () => {
    value(catalog.setEventStatus(1, EventStatus.COMPLETED));

    expect(catalog.registerForEvent(user1, 1, 'user1@example.com')).toMatchObject({
      ok: false,
      code: ErrorCode.REGISTRATION_CLOSED,
    });
  });

  it('cancels a registration on both sides', () => {
    value(catalog.registerForEvent(user1, 1, 'user1@example.com'));

    expect(value(catalog.cancelRegistration(user1, 1)).id).toBe(1);
    expect(catalog.findEvent(1)?.attendees).toEqual([]);
    expect(catalog.findAttendee(1)).toBeNull();
    expect(catalog.cancelRegistration(user1, 1)).toMatchObject({ ok: false, code: ErrorCode.NOT_REGISTERED });
  });

  it('checks in only attendees of that event', () => {
    value(catalog.registerForEvent(user1, 1, 'user1@example.com'));
    value(catalog.createEvent({ ...expo, name: 'Other' }));

    expect(value(catalog.checkIn(1, 1)).alreadyCheckedIn).toBe(false);
    expect(value(catalog.checkIn(1, 1)).alreadyCheckedIn).toBe(true);
    expect(catalog.checkIn(2, 1)).toMatchObject({ ok: false, code: ErrorCode.ATTENDEE_NOT_FOUND });
  });

  it('keeps contact info in step across the generic profile and registrations', () => {
    expect(value(catalog.updateContactInfo(user1, 'first@example.com'))).toEqual({
      updatedAttendeeIds: [],
      createdProfileId: 1,
    });

    value(catalog.registerForEvent(user1, 1, 'new@example.com'));
    expect(store.read('attendees.txt')).toBe(
      '1,user1,new@example.com,0,0,2\n2,user1,new@example.com,1,0,2\n'
    );

    expect(value(catalog.updateContactInfo(user1, 'final@example.com'))).toEqual({
      updatedAttendeeIds: [1, 2],
      createdProfileId: null,
    });
    expect(catalog.listAttendees(1).map((attendee) => attendee.contactInfo)).toEqual(['final@example.com']);
  });
});

describe('seedInitialData', () => {
  it('fills empty collections once', () => {
    const { catalog } = loadedCatalog({});

    expect(seedInitialData(catalog)).toBe(true);
    expect(catalog.listUsers().map((user) => user.username)).toEqual(['admin', 'user1', 'user2']);
    expect(catalog.listItems().map((item) => [item.name, item.totalQuantity])).toEqual([
      ['Projector', 5],
      ['Chairs', 100],
    ]);
    expect(seedInitialData(catalog)).toBe(false);
  });
});
