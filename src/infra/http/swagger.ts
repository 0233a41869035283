import swaggerJsdoc from 'swagger-jsdoc';

const userSchema = {
  type: 'object',
  required: ['id', 'username', 'password'],
  properties: {
    id: { type: 'string', example: '0b7e3c9e-58c4-4b8e-9a53-2a1d0e1f5c11' },
    username: { type: 'string', example: 'testUser' },
    password: { type: 'string', description: 'Stored password hash' },
  },
};

const statusNameSchema = {
  type: 'string',
  description: 'Name of the HTTP status the response was sent with',
  enum: [
    'OK',
    'CREATED',
    'BAD_REQUEST',
    'UNAUTHORIZED',
    'NOT_FOUND',
    'CONFLICT',
    'TOO_MANY_REQUESTS',
    'INTERNAL_SERVER_ERROR',
  ],
};

const options: swaggerJsdoc.Options = {
  definition: {
    openapi: '3.0.0',
    info: {
      title: 'User Accounts API',
      version: '1.0.0',
      description: 'Create users, fetch them by id, and log in',
    },
    servers: [
      {
        url: 'http://localhost:3000',
        description: 'Development server',
      },
    ],
    components: {
      schemas: {
        UserRequest: {
          type: 'object',
          properties: {
            username: { type: 'string', nullable: true, example: 'testUser' },
            password: { type: 'string', nullable: true, example: 'testPass' },
          },
        },
        User: userSchema,
        ApiResponse: {
          type: 'object',
          required: ['message', 'status', 'data'],
          properties: {
            message: { type: 'string', example: 'User not found' },
            status: statusNameSchema,
            data: { type: 'object', additionalProperties: true },
          },
        },
        UserResponse: {
          type: 'object',
          required: ['message', 'status', 'data'],
          properties: {
            message: { type: 'string', example: 'User fetched successfully' },
            status: statusNameSchema,
            data: {
              type: 'object',
              properties: { user: { $ref: '#/components/schemas/User' } },
            },
          },
        },
      },
    },
    tags: [{ name: 'Users', description: 'User accounts and login' }],
  },
  apis: ['./src/infra/http/routes/*.ts'],
};

export const swaggerSpec = swaggerJsdoc(options);
