import { AttendeeView } from '../types/attendee.types';

// Event id carried by a profile that is not registered for any event
export const GENERIC_PROFILE_EVENT_ID = 0;

// User id carried by an attendee record that no account owns
export const UNLINKED_USER_ID = 0;

/**
 * Attendee
 *
 * A registration of one person for at most one event. Check-in only moves
 * from false to true.
 */
export class Attendee {
  constructor(
    public readonly id: number,
    public name: string,
    public contactInfo: string,
    public readonly eventIdRegisteredFor: number,
    private checkedIn: boolean = false,
    public readonly userId: number = UNLINKED_USER_ID
  ) {}

  get isCheckedIn(): boolean {
    return this.checkedIn;
  }

  get isGenericProfile(): boolean {
    return this.eventIdRegisteredFor === GENERIC_PROFILE_EVENT_ID;
  }

  /**
   * Returns false when the attendee was already checked in
   */
  checkIn(): boolean {
    if (this.checkedIn) return false;
    this.checkedIn = true;
    return true;
  }

  toView(): AttendeeView {
    return {
      id: this.id,
      name: this.name,
      contactInfo: this.contactInfo,
      eventId: this.eventIdRegisteredFor,
      userId: this.userId,
      isCheckedIn: this.checkedIn,
    };
  }
}
