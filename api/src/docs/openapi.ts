import fs from 'fs';
import path from 'path';
import swaggerJSDoc from 'swagger-jsdoc';
import type { Options } from 'swagger-jsdoc';
import { Express } from 'express';
import { serve as swaggerServe, setup as swaggerSetup } from 'swagger-ui-express';

// Annotated files, wherever this module was loaded from (src via ts-node/jest, or dist).
const apiGlobs: string[] = [
  path.join(__dirname, '..', 'routes', '*.{ts,js}'),
  path.join(__dirname, '..', 'server.{ts,js}')
];

function readPackageVersion(): string {
  const candidates = [path.resolve(__dirname, '../../../package.json'), path.resolve(process.cwd(), 'package.json')];
  for (const p of candidates) {
    try {
      const pkg: unknown = JSON.parse(fs.readFileSync(p, 'utf8'));
      if (pkg && typeof pkg === 'object' && 'version' in pkg && typeof pkg.version === 'string') return pkg.version;
    } catch {
      // try the next location
    }
  }
  return '0.1.0';
}

const options: Options = {
  apis: apiGlobs,
  definition: {
    openapi: '3.0.3',
    info: {
      title: 'Vault Config API',
      version: readPackageVersion(),
      description: 'Loads its database connection string from Azure Key Vault and reports the database principal it connects as'
    },
    servers: [{ url: '/', description: 'Relative to current host' }],
    tags: [
      { name: 'User', description: 'Database connection probe' },
      { name: 'Health', description: 'Liveness' }
    ],
    components: {
      schemas: {
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'object',
              properties: {
                code: { type: 'string' },
                message: { type: 'string' }
              },
              required: ['code', 'message']
            }
          },
          required: ['error']
        }
      }
    }
  }
};

export function buildOpenApiSpec(): Record<string, unknown> {
  return { ...swaggerJSDoc(options) };
}

export function setupOpenApi(app: Express) {
  const spec = buildOpenApiSpec();
  app.get('/openapi.json', (_req, res) => res.json(spec));
  app.use('/api/docs', swaggerServe, swaggerSetup(spec, {
    explorer: true,
    swaggerOptions: { deepLinking: true, tagsSorter: 'alpha' },
    customCss: '.swagger-ui .topbar { display: none }'
  }));
}
