import fs from 'fs';
import path from 'path';
import { swaggerSpec } from '../src/swagger/swagger.config';
import { logger } from '../src/config/logger';

/**
 * Write the OpenAPI document to dist/openapi.json for publishing alongside
 * the build
 */
const outputPath = path.join(__dirname, '../dist/openapi.json');

fs.mkdirSync(path.dirname(outputPath), { recursive: true });
fs.writeFileSync(outputPath, JSON.stringify(swaggerSpec, null, 2));

const paths =
  'paths' in swaggerSpec && typeof swaggerSpec.paths === 'object' && swaggerSpec.paths !== null
    ? Object.keys(swaggerSpec.paths).length
    : 0;

logger.info('OpenAPI spec generated', { outputPath, paths });
