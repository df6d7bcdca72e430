import swaggerJsdoc from 'swagger-jsdoc';

const userProperties = {
  id: { type: 'integer', example: 1 },
  email: { type: 'string', format: 'email', example: 'a@x.com' },
  username: { type: 'string', example: 'alice' },
  fullName: { type: 'string', example: 'Alice Example' },
  isActive: { type: 'boolean', example: true },
  createdAt: { type: 'string', format: 'date-time' },
  updatedAt: { type: 'string', format: 'date-time' },
};

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'User Directory API',
      version: '1.0.0',
      description: 'REST API for managing users',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      schemas: {
        User: {
          type: 'object',
          required: Object.keys(userProperties),
          properties: userProperties,
        },
        UserList: {
          type: 'object',
          required: ['users', 'total', 'offset', 'limit'],
          properties: {
            users: { type: 'array', items: { $ref: '#/components/schemas/User' } },
            total: { type: 'integer' },
            offset: { type: 'integer' },
            limit: { type: 'integer' },
          },
        },
        CreateUserCommand: {
          type: 'object',
          required: ['email', 'username', 'fullName'],
          properties: {
            email: { type: 'string', format: 'email', maxLength: 255 },
            username: { type: 'string', minLength: 1, maxLength: 50 },
            fullName: { type: 'string', minLength: 1, maxLength: 100 },
          },
        },
        UpdateUserCommand: {
          type: 'object',
          additionalProperties: false,
          properties: {
            fullName: { type: 'string', minLength: 1, maxLength: 100 },
          },
        },
        ErrorResponse: {
          type: 'object',
          required: ['code', 'message'],
          properties: {
            code: {
              type: 'string',
              description: 'Error code identifier',
              example: 'NOT_FOUND',
            },
            message: {
              type: 'string',
              description: 'Human-readable error message',
              example: 'User with id 42 not found',
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
    tags: [
      { name: 'Users', description: 'User lifecycle' },
      { name: 'Health', description: 'Liveness and database reachability' },
    ],
  },
  apis: [
    './src/infra/http/routes/*.ts',
    './src/infra/http/app.ts',
    './dist/infra/http/routes/*.js',
    './dist/infra/http/app.js',
  ],
};

export const swaggerSpec = swaggerJsdoc(options);
