import path from 'path';
import swaggerJsdoc from 'swagger-jsdoc';
import { env } from '../config/environment';

/**
 * Swagger/OpenAPI Configuration
 *
 * Generates OpenAPI 3.0 specification from JSDoc comments in route files
 */
const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Event Inventory API',
      version: '1.0.0',
      description: `
A REST API for running events: accounts, event scheduling, attendee
registration and check-in, and allocation of a shared equipment inventory.

## Authentication
Every \`/v1\` route except \`POST /v1/users/register\` takes HTTP Basic
credentials. Routes marked *(admin)* need an ADMIN account.

## Inventory Guarantees
For every item: \`0 ≤ allocated_quantity ≤ total_quantity\`, and the allocated
quantity equals what all events hold of it.

## Event Lifecycle
UPCOMING → ONGOING → COMPLETED, or CANCELED. Completed and canceled events
take no new registrations.
      `.trim(),
    },
    servers: [
      {
        url: `http://localhost:${env.PORT}`,
        description: env.NODE_ENV === 'production' ? 'Production server' : 'Development server',
      },
    ],
    security: [{ basicAuth: [] }],
    tags: [
      { name: 'Users', description: 'Accounts and roles' },
      { name: 'Events', description: 'Event management' },
      { name: 'Allocations', description: 'Inventory allocated to events' },
      { name: 'Attendees', description: 'Registration and check-in' },
      { name: 'Inventory', description: 'Inventory item management' },
      { name: 'Reports', description: 'Attendance and inventory reports' },
      { name: 'Maintenance', description: 'Reconcile and export operations' },
    ],
    components: {
      securitySchemes: {
        basicAuth: { type: 'http', scheme: 'basic' },
      },
      parameters: {
        EventId: {
          in: 'path',
          name: 'id',
          required: true,
          schema: { type: 'integer', minimum: 1 },
        },
      },
      schemas: {
        Credentials: {
          type: 'object',
          required: ['username', 'password'],
          properties: {
            username: { type: 'string' },
            password: { type: 'string', minLength: 6 },
          },
        },
        EventDetails: {
          type: 'object',
          required: ['name', 'date', 'time', 'location', 'description', 'category'],
          properties: {
            name: { type: 'string' },
            date: { type: 'string', example: '2025-10-20', description: 'YYYY-MM-DD' },
            time: { type: 'string', example: '09:00', description: 'HH:MM, 24-hour' },
            location: { type: 'string' },
            description: { type: 'string' },
            category: { type: 'string' },
          },
        },
        Allocation: {
          type: 'object',
          required: ['item_id', 'quantity'],
          properties: {
            item_id: { type: 'integer', minimum: 1 },
            quantity: { type: 'integer', minimum: 1 },
          },
        },
        InventoryItem: {
          type: 'object',
          properties: {
            id: { type: 'integer' },
            name: { type: 'string' },
            totalQuantity: { type: 'integer', minimum: 0 },
            allocatedQuantity: { type: 'integer', minimum: 0 },
            availableQuantity: { type: 'integer', minimum: 0 },
            description: { type: 'string' },
          },
        },
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: { type: 'string', description: 'Error code' },
                message: { type: 'string', description: 'Human-readable error message' },
                details: { type: 'object', description: 'Additional error details' },
              },
            },
          },
        },
      },
    },
  },
  apis: [path.join(__dirname, '../routes/**/*.{ts,js}')],
};

export const swaggerSpec = swaggerJsdoc(options);
