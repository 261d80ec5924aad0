import { describe, it, expect } from 'vitest';
import { decodeEvent, encodeEvent, encodeEvents } from '../src/codecs/event.codec';
import { decodeAttendee, encodeAttendee } from '../src/codecs/attendee.codec';
import { decodeInventoryItem, encodeInventoryItem } from '../src/codecs/inventory.codec';
import { decodeUser, encodeUser } from '../src/codecs/user.codec';
import { decodeLines, splitFields } from '../src/codecs/fields';
import { ErrorCode } from '../src/types/error.types';
import { EventStatus } from '../src/types/event.types';
import { Role } from '../src/types/user.types';

describe('splitFields', () => {
  it('leaves the remainder in the last field', () => {
    expect(splitFields('1,Chairs,100,5,Standard, stackable', 5)).toEqual([
      '1',
      'Chairs',
      '100',
      '5',
      'Standard, stackable',
    ]);
    expect(splitFields('1,admin', 4)).toEqual(['1', 'admin']);
  });
});

describe('event codec', () => {
  const line = '4,Gala,2025-12-01,19:30,Ballroom,Formal dinner,Social,0,3;7;12,2:5;9:1';

  it('decodes attendee ids and the allocation ledger', () => {
    const decoded = decodeEvent(line);

    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;
    const event = decoded.value;
    expect(event.id).toBe(4);
    expect(event.status).toBe(EventStatus.UPCOMING);
    expect(event.attendees).toEqual([3, 7, 12]);
    expect([...event.allocations]).toEqual([
      [2, 5],
      [9, 1],
    ]);
    expect(encodeEvent(event)).toBe(line);
  });

  it('treats missing trailing fields as empty', () => {
    const decoded = decodeEvent('5,Meetup,2025-01-02,18:00,Cafe,Chat,Social,1');

    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;
    expect(decoded.value.status).toBe(EventStatus.ONGOING);
    expect(decoded.value.attendees).toEqual([]);
    expect(decoded.value.allocations.size).toBe(0);
    expect(encodeEvent(decoded.value)).toBe('5,Meetup,2025-01-02,18:00,Cafe,Chat,Social,1,,');
  });

  it('skips malformed allocation entries and keeps the last repeat', () => {
    const decoded = decodeEvent('6,Fair,2025-01-02,18:00,Field,Stalls,Market,2,,2:5;oops;3:x;4:0;2:8');

    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;
    expect(decoded.value.status).toBe(EventStatus.COMPLETED);
    expect([...decoded.value.allocations]).toEqual([[2, 8]]);
  });

  it('rejects an unknown status code', () => {
    const decoded = decodeEvent('7,Fair,2025-01-02,18:00,Field,Stalls,Market,7');

    expect(decoded.ok).toBe(false);
    if (decoded.ok) return;
    expect(decoded.code).toBe(ErrorCode.MALFORMED_RECORD);
    expect(decoded.message).toContain('unknown status code 7');
  });

  it('writes one line per record', () => {
    const first = decodeEvent('1,A,2025-01-01,10:00,Hall,Desc,Conf,0,,1:3');
    const second = decodeEvent('2,B,2025-01-02,10:00,Hall,Desc,Conf,3,5,');
    if (!first.ok || !second.ok) throw new Error('fixture did not decode');

    expect(encodeEvents([first.value, second.value])).toBe(
      '1,A,2025-01-01,10:00,Hall,Desc,Conf,0,,1:3\n2,B,2025-01-02,10:00,Hall,Desc,Conf,3,5,\n'
    );
    expect(encodeEvents([])).toBe('');
  });
});

describe('attendee codec', () => {
  it('decodes records without an owner as unlinked', () => {
    const decoded = decodeAttendee('3,Ann,ann@example.com,4,1');

    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;
    expect(decoded.value.toView()).toEqual({
      id: 3,
      name: 'Ann',
      contactInfo: 'ann@example.com',
      eventId: 4,
      userId: 0,
      isCheckedIn: true,
    });
    expect(encodeAttendee(decoded.value)).toBe('3,Ann,ann@example.com,4,1');
  });

  it('keeps the owning user id', () => {
    const decoded = decodeAttendee('3,Ann,ann@example.com,4,0,2');

    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;
    expect(decoded.value.userId).toBe(2);
    expect(decoded.value.isCheckedIn).toBe(false);
    expect(encodeAttendee(decoded.value)).toBe('3,Ann,ann@example.com,4,0,2');
  });
});

describe('inventory codec', () => {
  it('lets the description contain commas', () => {
    const decoded = decodeInventoryItem('2,Chairs,100,5,Standard, stackable');

    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;
    expect(decoded.value.description).toBe('Standard, stackable');
    expect(decoded.value.availableQuantity).toBe(95);
    expect(encodeInventoryItem(decoded.value)).toBe('2,Chairs,100,5,Standard, stackable');
  });

  it('rejects a negative total', () => {
    expect(decodeInventoryItem('2,Chairs,-1,0,x')).toMatchObject({
      ok: false,
      code: ErrorCode.MALFORMED_RECORD,
    });
  });

  it('rejects ids too large to stay distinct', () => {
    expect(decodeInventoryItem('99999999999999999999,Chairs,10,0,x')).toEqual({
      ok: false,
      code: ErrorCode.MALFORMED_RECORD,
      message: 'id: must be a safe integer',
    });
  });
});

describe('user codec', () => {
  it('maps role codes', () => {
    const decoded = decodeUser('1,admin,adminpass,0');

    expect(decoded.ok).toBe(true);
    if (!decoded.ok) return;
    expect(decoded.value).toEqual({ id: 1, username: 'admin', password: 'adminpass', role: Role.ADMIN });
    expect(encodeUser(decoded.value)).toBe('1,admin,adminpass,0');
    expect(decodeUser('2,bob,bobpass,5').ok).toBe(false);
  });
});

describe('decodeLines', () => {
  it('skips malformed lines and reports where they were', () => {
    const text = '1,admin,adminpass,0\r\nabc,bob,bobpass,1\n\n3,carol,carolpass,1\n';

    const decoded = decodeLines(text, decodeUser, 'users');

    expect(decoded.records.map((user) => user.username)).toEqual(['admin', 'carol']);
    expect(decoded.skipped).toEqual([
      { lineNumber: 2, line: 'abc,bob,bobpass,1', reason: 'id: must be an integer' },
    ]);
  });
});
