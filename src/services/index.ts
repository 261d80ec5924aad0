import { Catalog } from '../repositories/catalog.repository';
import { AttendeeService } from './attendee.service';
import { EventService } from './event.service';
import { InventoryService } from './inventory.service';
import { MaintenanceService } from './maintenance.service';
import { ReportService } from './report.service';
import { UserService } from './user.service';

export interface Services {
  users: UserService;
  events: EventService;
  inventory: InventoryService;
  attendees: AttendeeService;
  reports: ReportService;
  maintenance: MaintenanceService;
}

/**
 * Wire every service to one catalog
 */
export function createServices(catalog: Catalog): Services {
  return {
    users: new UserService(catalog),
    events: new EventService(catalog),
    inventory: new InventoryService(catalog),
    attendees: new AttendeeService(catalog),
    reports: new ReportService(catalog),
    maintenance: new MaintenanceService(catalog),
  };
}
