import swaggerJsdoc from 'swagger-jsdoc';

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'Finance Tracker',
      version: '1.0.0',
      description: 'Server-rendered income and expense tracker with CSV export',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      securitySchemes: {
        sessionCookie: {
          type: 'apiKey',
          in: 'cookie',
          name: 'session',
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
              example: 'DB_UNAVAILABLE',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'Database unavailable',
            },
          },
        },
      },
    },
    tags: [
      { name: 'Auth', description: 'Login and logout' },
      { name: 'Ledger', description: 'Dashboard, history and new transactions' },
      { name: 'Reports', description: 'CSV export' },
      { name: 'Health', description: 'Liveness probe' },
    ],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

/**
 * OpenAPI document assembled from the @openapi blocks in the route files.
 */
export function buildOpenApiSpec(): object {
  return swaggerJsdoc(options);
}
