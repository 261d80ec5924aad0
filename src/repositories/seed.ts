import { Catalog } from './catalog.repository';
import { Role } from '../types/user.types';
import { Result } from '../types/result.types';
import { logger } from '../config/logger';

/**
 * Seed starter data into empty collections.
 *
 * Each collection is checked on its own, so a data directory that only has
 * users still gets the sample events and items.
 */
export function seedInitialData(catalog: Catalog): boolean {
  let seeded = false;

  if (catalog.listUsers().length === 0) {
    logger.info('No users found, seeding initial accounts');
    report(catalog.createUser({ username: 'admin', password: 'adminpass', role: Role.ADMIN }));
    report(catalog.createUser({ username: 'user1', password: 'user1pass', role: Role.REGULAR_USER }));
    report(catalog.createUser({ username: 'user2', password: 'user2pass', role: Role.REGULAR_USER }));
    seeded = true;
  }

  if (catalog.listEvents().length === 0) {
    logger.info('No events found, seeding initial events');
    report(
      catalog.createEvent({
        name: 'Tech Conference',
        date: '2025-10-20',
        time: '09:00',
        location: 'Grand Hall',
        description: 'Annual tech conference',
        category: 'Conference',
      })
    );
    report(
      catalog.createEvent({
        name: 'Summer Music Festival',
        date: '2025-07-15',
        time: '14:00',
        location: 'City Park',
        description: 'Outdoor music event',
        category: 'Social',
      })
    );
    seeded = true;
  }

  if (catalog.listItems().length === 0) {
    logger.info('No inventory found, seeding initial items');
    report(catalog.addItem({ name: 'Projector', totalQuantity: 5, description: 'HD Projector' }));
    report(catalog.addItem({ name: 'Chairs', totalQuantity: 100, description: 'Standard chairs' }));
    seeded = true;
  }

  return seeded;
}

function report<T>(result: Result<T>): void {
  if (!result.ok) {
    logger.error('Failed to seed record', { code: result.code, error: result.message });
  }
}
