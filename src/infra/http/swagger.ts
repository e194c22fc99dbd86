import swaggerJsdoc from 'swagger-jsdoc';
import { dirname, join } from 'path';
import { fileURLToPath } from 'url';

const routesDir = join(dirname(fileURLToPath(import.meta.url)), 'routes');

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Web Session Auth API',
      version: '1.0.0',
      description: 'Cookie session login, logout and registration',
    },
    components: {
      securitySchemes: {
        sessionCookie: {
          type: 'apiKey',
          in: 'cookie',
          name: 'web_authenticate_session',
        },
      },
      schemas: {
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'UNAUTHORIZED',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Invalid username or password',
            },
            details: {
              type: 'object',
              description: 'Additional error details (optional)',
              additionalProperties: true,
            },
          },
        },
      },
    },
    tags: [{ name: 'Auth', description: 'Session authentication endpoints' }],
  },
  // .ts under tsx/vitest, .js once built
  apis: [join(routesDir, '*.ts'), join(routesDir, '*.js')],
};

export function createSwaggerSpec(): object {
  return swaggerJsdoc(options);
}
