/**
 * OpenAPI 3.0 description of the Blogboard HTTP API.
 */
export interface OpenAPISpec {
  readonly openapi: string;
  readonly info: {
    readonly title: string;
    readonly version: string;
    readonly description: string;
  };
  readonly paths: Record<string, unknown>;
  readonly components: Record<string, unknown>;
}

const jsonBody = (schema: Record<string, unknown>) => ({
  'application/json': { schema },
});

const postIdParameter = {
  name: 'id',
  in: 'path',
  required: true,
  schema: { type: 'integer', minimum: 0 },
  description: 'Post identifier',
};

export function createOpenAPISpec(): OpenAPISpec {
  return {
    openapi: '3.0.3',
    info: {
      title: 'Blogboard API',
      version: '0.1.0',
      description:
        'Register, log in, and manage blog posts. ' +
        'Every /api/posts route requires a bearer token obtained from /login.',
    },
    paths: {
      '/register': {
        post: {
          summary: 'Register a user',
          operationId: 'register',
          tags: ['Auth'],
          requestBody: {
            required: true,
            content: jsonBody({ $ref: '#/components/schemas/Credentials' }),
          },
          responses: {
            '201': {
              description: 'User created',
              content: jsonBody({ $ref: '#/components/schemas/MessageResponse' }),
            },
            '400': { $ref: '#/components/responses/BadRequest' },
          },
        },
      },
      '/login': {
        post: {
          summary: 'Exchange credentials for an access token',
          operationId: 'login',
          tags: ['Auth'],
          requestBody: {
            required: true,
            content: jsonBody({ $ref: '#/components/schemas/Credentials' }),
          },
          responses: {
            '200': {
              description: 'Signed access token',
              content: jsonBody({
                type: 'object',
                properties: { access_token: { type: 'string' } },
              }),
            },
            '400': { $ref: '#/components/responses/BadRequest' },
            '401': { $ref: '#/components/responses/Unauthorized' },
          },
        },
      },
      '/api/posts': {
        get: {
          summary: 'List posts',
          description: 'Optionally sorted by one field, then paginated.',
          operationId: 'listPosts',
          tags: ['Posts'],
          security: [{ bearerAuth: [] }],
          parameters: [
            {
              name: 'sort',
              in: 'query',
              schema: { type: 'string', enum: ['title', 'content', 'author', 'date'] },
            },
            {
              name: 'direction',
              in: 'query',
              schema: { type: 'string', enum: ['asc', 'desc'], default: 'asc' },
            },
            { name: 'page', in: 'query', schema: { type: 'integer', default: 1 } },
            { name: 'per_page', in: 'query', schema: { type: 'integer', default: 10 } },
          ],
          responses: {
            '200': {
              description: 'One page of posts',
              content: jsonBody({ type: 'array', items: { $ref: '#/components/schemas/Post' } }),
            },
            '400': { $ref: '#/components/responses/BadRequest' },
            '401': { $ref: '#/components/responses/Unauthorized' },
          },
        },
        post: {
          summary: 'Create a post',
          operationId: 'createPost',
          tags: ['Posts'],
          security: [{ bearerAuth: [] }],
          requestBody: {
            required: true,
            content: jsonBody({ $ref: '#/components/schemas/PostDraft' }),
          },
          responses: {
            '201': {
              description: 'The created post',
              content: jsonBody({ $ref: '#/components/schemas/Post' }),
            },
            '400': { $ref: '#/components/responses/BadRequest' },
            '401': { $ref: '#/components/responses/Unauthorized' },
          },
        },
      },
      '/api/posts/search': {
        get: {
          summary: 'Search posts',
          description:
            'Every given filter must match. title, content and author match ' +
            'case-insensitive substrings; date matches a substring of YYYY-MM-DD.',
          operationId: 'searchPosts',
          tags: ['Posts'],
          security: [{ bearerAuth: [] }],
          parameters: ['title', 'content', 'author', 'date'].map((name) => ({
            name,
            in: 'query',
            schema: { type: 'string' },
          })),
          responses: {
            '200': {
              description: 'Matching posts',
              content: jsonBody({ type: 'array', items: { $ref: '#/components/schemas/Post' } }),
            },
            '401': { $ref: '#/components/responses/Unauthorized' },
          },
        },
      },
      '/api/posts/{id}': {
        put: {
          summary: 'Update a post',
          description: 'Only the fields present in the body change.',
          operationId: 'updatePost',
          tags: ['Posts'],
          security: [{ bearerAuth: [] }],
          parameters: [postIdParameter],
          requestBody: {
            required: true,
            content: jsonBody({ $ref: '#/components/schemas/PostPatch' }),
          },
          responses: {
            '200': {
              description: 'The updated post',
              content: jsonBody({ $ref: '#/components/schemas/Post' }),
            },
            '400': { $ref: '#/components/responses/BadRequest' },
            '401': { $ref: '#/components/responses/Unauthorized' },
            '404': { $ref: '#/components/responses/NotFound' },
          },
        },
        delete: {
          summary: 'Delete a post',
          operationId: 'deletePost',
          tags: ['Posts'],
          security: [{ bearerAuth: [] }],
          parameters: [postIdParameter],
          responses: {
            '200': {
              description: 'Deletion confirmation',
              content: jsonBody({ $ref: '#/components/schemas/MessageResponse' }),
            },
            '401': { $ref: '#/components/responses/Unauthorized' },
            '404': { $ref: '#/components/responses/NotFound' },
          },
        },
      },
      '/health': {
        get: {
          summary: 'Health check',
          operationId: 'healthCheck',
          tags: ['System'],
          responses: {
            '200': {
              description: 'Server is running',
              content: jsonBody({
                type: 'object',
                properties: {
                  status: { type: 'string', enum: ['ok'] },
                  timestamp: { type: 'string', format: 'date-time' },
                },
              }),
            },
          },
        },
      },
    },
    components: {
      securitySchemes: {
        bearerAuth: {
          type: 'http',
          scheme: 'bearer',
          bearerFormat: 'JWT',
          description: 'Access token from POST /login',
        },
      },
      schemas: {
        Credentials: {
          type: 'object',
          required: ['username', 'password'],
          properties: {
            username: { type: 'string', minLength: 1 },
            password: { type: 'string', minLength: 1 },
          },
        },
        Post: {
          type: 'object',
          required: ['id', 'title', 'content', 'author', 'date'],
          properties: {
            id: { type: 'integer' },
            title: { type: 'string' },
            content: { type: 'string' },
            author: { type: 'string' },
            date: { type: 'string', format: 'date' },
          },
        },
        PostDraft: {
          type: 'object',
          required: ['title', 'content', 'author', 'date'],
          properties: {
            title: { type: 'string' },
            content: { type: 'string' },
            author: { type: 'string' },
            date: { type: 'string', format: 'date' },
          },
        },
        PostPatch: {
          type: 'object',
          properties: {
            title: { type: 'string' },
            content: { type: 'string' },
            author: { type: 'string' },
            date: { type: 'string' },
          },
        },
        MessageResponse: {
          type: 'object',
          properties: { message: { type: 'string' } },
        },
        ErrorResponse: {
          type: 'object',
          properties: { error: { type: 'string' } },
        },
      },
      responses: {
        BadRequest: {
          description: 'Invalid input',
          content: jsonBody({ $ref: '#/components/schemas/ErrorResponse' }),
        },
        Unauthorized: {
          description: 'Missing, invalid or expired token, or bad credentials',
          content: jsonBody({ $ref: '#/components/schemas/ErrorResponse' }),
        },
        NotFound: {
          description: 'Post not found',
          content: jsonBody({ $ref: '#/components/schemas/ErrorResponse' }),
        },
      },
    },
  };
}
