import type { AppConfig } from '../../config';

const errorResponse = (description: string) => ({
  description,
  content: { 'application/json': { schema: { $ref: '#/components/schemas/Error' } } },
});

const paginationParameters = [
  { name: 'skip', in: 'query', schema: { type: 'integer', minimum: 0, default: 0 } },
  { name: 'limit', in: 'query', schema: { type: 'integer', minimum: 1, maximum: 100, default: 100 } },
];

const idParameter = (name: string) => ({
  name,
  in: 'path',
  required: true,
  schema: { type: 'string', pattern: '^[a-f0-9]{24}$' },
});

const bearerOnly = [{ BearerAuth: [] }];
const bearerOrApiKey = [{ BearerAuth: [] }, { ApiKeyAuth: [] }];

const json = (schema: Record<string, unknown>) => ({ 'application/json': { schema } });

/** OpenAPI 3.0 description of the public API, served at `<apiPrefix>/openapi.json`. */
export const buildOpenApiDocument = (config: Pick<AppConfig, 'apiPrefix' | 'projectName'>) => {
  const p = config.apiPrefix;

  return {
    openapi: '3.0.3',
    info: {
      title: config.projectName,
      description: 'Text-to-Speech Service API with authentication',
      version: '1.0.0',
    },
    components: {
      securitySchemes: {
        BearerAuth: { type: 'http', scheme: 'bearer', bearerFormat: 'JWT' },
        ApiKeyAuth: { type: 'apiKey', in: 'header', name: 'X-API-Key' },
        OAuth2PasswordBearer: {
          type: 'oauth2',
          flows: { password: { tokenUrl: `${p}/auth/login/access-token`, scopes: {} } },
        },
      },
      schemas: {
        Error: {
          type: 'object',
          required: ['message'],
          properties: {
            message: { type: 'string' },
            errors: {
              type: 'array',
              items: { type: 'object', properties: { path: { type: 'string' }, message: { type: 'string' } } },
            },
          },
        },
        UserCreate: {
          type: 'object',
          required: ['email', 'password'],
          properties: {
            email: { type: 'string', format: 'email' },
            password: { type: 'string', maxLength: 72, description: 'At most 72 bytes of UTF-8' },
          },
        },
        UserUpdate: {
          type: 'object',
          properties: {
            email: { type: 'string', format: 'email' },
            password: { type: 'string' },
            is_active: { type: 'boolean' },
            is_superuser: { type: 'boolean' },
          },
        },
        UserResponse: {
          type: 'object',
          properties: {
            id: { type: 'string' },
            email: { type: 'string', format: 'email' },
            is_active: { type: 'boolean' },
            is_superuser: { type: 'boolean' },
            created_at: { type: 'string', format: 'date-time' },
          },
        },
        LoginForm: {
          type: 'object',
          required: ['username', 'password'],
          properties: {
            grant_type: { type: 'string', enum: ['password'] },
            username: { type: 'string', description: 'Account email' },
            password: { type: 'string' },
            scope: { type: 'string' },
          },
        },
        Token: {
          type: 'object',
          properties: { access_token: { type: 'string' }, token_type: { type: 'string', enum: ['bearer'] } },
        },
        APIKeyCreate: {
          type: 'object',
          required: ['name'],
          properties: {
            name: { type: 'string', maxLength: 100 },
            is_active: { type: 'boolean', default: true },
            expires_at: { type: 'string', format: 'date-time', nullable: true },
          },
        },
        APIKeyResponse: {
          type: 'object',
          properties: {
            id: { type: 'string' },
            name: { type: 'string' },
            is_active: { type: 'boolean' },
            expires_at: { type: 'string', format: 'date-time', nullable: true },
            created_at: { type: 'string', format: 'date-time' },
            last_used_at: { type: 'string', format: 'date-time', nullable: true },
            prefix: { type: 'string' },
          },
        },
        APIKeyCreateResponse: {
          allOf: [
            { $ref: '#/components/schemas/APIKeyResponse' },
            {
              type: 'object',
              properties: { key: { type: 'string', description: 'Full API key, only shown once' } },
            },
          ],
        },
        VoiceResponse: {
          type: 'object',
          properties: {
            id: { type: 'string' },
            name: { type: 'string' },
            language: { type: 'string', enum: ['en', 'uk', 'ru'] },
            description: { type: 'string', nullable: true },
            status: { type: 'string', enum: ['pending', 'processing', 'ready', 'failed'] },
            created_at: { type: 'string', format: 'date-time' },
            updated_at: { type: 'string', format: 'date-time' },
          },
        },
        TTSRequest: {
          type: 'object',
          required: ['text'],
          properties: {
            text: { type: 'string', maxLength: 2000 },
            voice_id: { type: 'string' },
            stream: { type: 'boolean', default: false },
          },
        },
        TTSResponse: {
          type: 'object',
          properties: {
            audio_url: { type: 'string' },
            duration: { type: 'number', description: 'Seconds' },
            text: { type: 'string' },
          },
        },
      },
    },
    paths: {
      [`${p}/auth/register`]: {
        post: {
          tags: ['auth'],
          summary: 'Register a new user',
          requestBody: { required: true, content: json({ $ref: '#/components/schemas/UserCreate' }) },
          responses: {
            201: { description: 'Created', content: json({ $ref: '#/components/schemas/UserResponse' }) },
            400: errorResponse('Validation error'),
            403: errorResponse('Registration disabled'),
            409: errorResponse('Email already registered'),
          },
        },
      },
      [`${p}/auth/login/access-token`]: {
        post: {
          tags: ['auth'],
          summary: 'OAuth2 compatible token login',
          requestBody: {
            required: true,
            content: {
              'application/x-www-form-urlencoded': { schema: { $ref: '#/components/schemas/LoginForm' } },
              ...json({ $ref: '#/components/schemas/LoginForm' }),
            },
          },
          responses: {
            200: { description: 'Access token', content: json({ $ref: '#/components/schemas/Token' }) },
            401: errorResponse('Incorrect email or password, or inactive user'),
          },
        },
      },
      [`${p}/users/me`]: {
        get: {
          tags: ['users'],
          summary: 'Current user',
          security: bearerOnly,
          responses: {
            200: { description: 'OK', content: json({ $ref: '#/components/schemas/UserResponse' }) },
            401: errorResponse('Not authenticated'),
          },
        },
      },
      [`${p}/users`]: {
        get: {
          tags: ['users'],
          summary: 'List users (superuser)',
          security: bearerOnly,
          parameters: paginationParameters,
          responses: {
            200: {
              description: 'OK',
              content: json({ type: 'array', items: { $ref: '#/components/schemas/UserResponse' } }),
            },
            403: errorResponse('Not a superuser'),
          },
        },
      },
      [`${p}/users/{userId}`]: {
        patch: {
          tags: ['users'],
          summary: 'Update a user (superuser)',
          security: bearerOnly,
          parameters: [idParameter('userId')],
          requestBody: { required: true, content: json({ $ref: '#/components/schemas/UserUpdate' }) },
          responses: {
            200: { description: 'OK', content: json({ $ref: '#/components/schemas/UserResponse' }) },
            403: errorResponse('Not a superuser'),
            404: errorResponse('User not found'),
            409: errorResponse('Email already registered'),
          },
        },
      },
      [`${p}/api-keys`]: {
        post: {
          tags: ['api-keys'],
          summary: 'Create an API key',
          security: bearerOnly,
          requestBody: { required: true, content: json({ $ref: '#/components/schemas/APIKeyCreate' }) },
          responses: {
            201: { description: 'Created', content: json({ $ref: '#/components/schemas/APIKeyCreateResponse' }) },
          },
        },
        get: {
          tags: ['api-keys'],
          summary: 'List your API keys',
          security: bearerOnly,
          parameters: paginationParameters,
          responses: {
            200: {
              description: 'OK',
              content: json({ type: 'array', items: { $ref: '#/components/schemas/APIKeyResponse' } }),
            },
          },
        },
      },
      [`${p}/api-keys/check/{apiKey}`]: {
        get: {
          tags: ['api-keys'],
          summary: 'Inspect an API key (superuser)',
          security: bearerOnly,
          parameters: [{ name: 'apiKey', in: 'path', required: true, schema: { type: 'string' } }],
          responses: { 200: { description: 'Lookup result' }, 403: errorResponse('Not a superuser') },
        },
      },
      [`${p}/api-keys/{apiKeyId}`]: {
        delete: {
          tags: ['api-keys'],
          summary: 'Delete an API key',
          security: bearerOnly,
          parameters: [idParameter('apiKeyId')],
          responses: { 204: { description: 'Deleted' }, 404: errorResponse('API key not found') },
        },
      },
      [`${p}/voices`]: {
        post: {
          tags: ['voices'],
          summary: 'Upload a voice sample',
          security: bearerOrApiKey,
          requestBody: {
            required: true,
            content: {
              'multipart/form-data': {
                schema: {
                  type: 'object',
                  required: ['audio_file', 'name', 'language', 'sample_text'],
                  properties: {
                    audio_file: { type: 'string', format: 'binary' },
                    name: { type: 'string' },
                    language: { type: 'string', enum: ['en', 'uk', 'ru'] },
                    description: { type: 'string' },
                    sample_text: { type: 'string' },
                  },
                },
              },
            },
          },
          responses: {
            201: { description: 'Created', content: json({ $ref: '#/components/schemas/VoiceResponse' }) },
            400: errorResponse('Invalid upload'),
            413: errorResponse('File too large'),
          },
        },
        get: {
          tags: ['voices'],
          summary: 'List your voices',
          security: bearerOrApiKey,
          parameters: paginationParameters,
          responses: {
            200: {
              description: 'OK',
              content: json({ type: 'array', items: { $ref: '#/components/schemas/VoiceResponse' } }),
            },
          },
        },
      },
      [`${p}/voices/{voiceId}`]: {
        get: {
          tags: ['voices'],
          summary: 'Voice details',
          security: bearerOrApiKey,
          parameters: [idParameter('voiceId')],
          responses: {
            200: { description: 'OK', content: json({ $ref: '#/components/schemas/VoiceResponse' }) },
            404: errorResponse('Voice not found'),
          },
        },
        delete: {
          tags: ['voices'],
          summary: 'Delete a voice',
          security: bearerOrApiKey,
          parameters: [idParameter('voiceId')],
          responses: { 204: { description: 'Deleted' }, 404: errorResponse('Voice not found') },
        },
      },
      [`${p}/tts/generate_speech`]: {
        post: {
          tags: ['tts'],
          summary: 'Generate speech from text',
          security: bearerOrApiKey,
          requestBody: { required: true, content: json({ $ref: '#/components/schemas/TTSRequest' }) },
          responses: {
            200: {
              description: 'Download descriptor, or the WAV stream when `stream` is true',
              content: {
                ...json({ $ref: '#/components/schemas/TTSResponse' }),
                'audio/wav': { schema: { type: 'string', format: 'binary' } },
              },
            },
            502: errorResponse('Speech engine failure'),
            503: errorResponse('Speech engine unavailable'),
          },
        },
      },
      [`${p}/tts/download/{filename}`]: {
        get: {
          tags: ['tts'],
          summary: 'Download generated audio',
          security: bearerOrApiKey,
          parameters: [{ name: 'filename', in: 'path', required: true, schema: { type: 'string' } }],
          responses: {
            200: { description: 'WAV file', content: { 'audio/wav': { schema: { type: 'string', format: 'binary' } } } },
            404: errorResponse('Audio file not found'),
          },
        },
      },
      [`${p}/health`]: {
        get: { tags: ['health'], summary: 'Liveness', responses: { 200: { description: 'OK' } } },
      },
    },
  };
};

export type OpenApiDocument = ReturnType<typeof buildOpenApiDocument>;
