import { config } from 'dotenv';
import { z } from 'zod';

// Load environment variables from .env file
config();

// Define environment variable schema with Zod for type-safe validation
const envSchema = z.object({
  // Node environment
  NODE_ENV: z.enum(['development', 'production', 'test']).default('development'),

  // Server configuration
  PORT: z.string().default('3000').transform(Number),

  // Directory holding users.txt, events.txt, attendees.txt and inventory.txt
  DATA_DIR: z.string().min(1, 'Data directory is required').default('data'),

  // Seed sample accounts, events and items into empty collections
  SEED_INITIAL_DATA: z
    .string()
    .default('true')
    .transform((val) => val === 'true'),

  // Logging configuration
  LOG_LEVEL: z.enum(['error', 'warn', 'info', 'debug']).default('info'),
  LOG_DIR: z.string().default('logs'),

  // CORS configuration (comma-separated origins, or *)
  ALLOWED_ORIGINS: z.string().default('*'),
});

// Parse and validate environment variables
const parsed = envSchema.safeParse(process.env);

if (!parsed.success) {
  const errorMessage = `❌ Invalid environment variables: ${JSON.stringify(parsed.error.format(), null, 2)}`;
  console.error(errorMessage);
  throw new Error(errorMessage);
}

// Export validated environment variables
export const env = parsed.data;

// Parsed CORS origins; `true` allows any origin
export const ALLOWED_ORIGINS: string[] | true =
  env.ALLOWED_ORIGINS.trim() === '*'
    ? true
    : env.ALLOWED_ORIGINS.split(',')
        .map((origin) => origin.trim())
        .filter((origin) => origin.length > 0);

// Log environment on startup
if (env.NODE_ENV !== 'test') {
  console.log('✅ Environment variables validated successfully');
  console.log(`📝 Environment: ${env.NODE_ENV}`);
  console.log(`🚀 Port: ${env.PORT}`);
  console.log(`📂 Data directory: ${env.DATA_DIR}`);
}
