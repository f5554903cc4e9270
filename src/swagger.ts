const messageSchema = {
  type: 'object',
  properties: {
    role: { type: 'string', enum: ['system', 'user', 'assistant'] },
    content: { type: 'string' },
  },
};

const errorSchema = {
  type: 'object',
  properties: {
    error: { type: 'string' },
  },
};

const sessionIdParam = {
  name: 'sessionId',
  in: 'path',
  required: true,
  schema: { type: 'string', pattern: '^[A-Za-z0-9_-]+$' },
};

export function buildSwaggerSpec(baseUrl: string) {
  return {
    openapi: '3.0.3',
    info: {
      title: 'toolbound-chat',
      version: '0.1.0',
      description:
        'Chat service that answers through an OpenAI-style chat-completion endpoint and can run one local tool per turn.',
    },
    servers: [
      {
        url: baseUrl,
        description: 'API Server',
      },
    ],
    paths: {
      '/health': {
        get: {
          summary: 'Health check',
          tags: ['System'],
          responses: {
            '200': {
              description: 'Server is healthy',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      status: { type: 'string', example: 'healthy' },
                      service: { type: 'string', example: 'toolbound-chat' },
                      llmConfigured: { type: 'boolean' },
                      toolCallingMode: { type: 'string', enum: ['sentinel', 'native'] },
                    },
                  },
                },
              },
            },
          },
        },
      },
      '/api/v1/tools': {
        get: {
          summary: 'List registered tools',
          tags: ['Chat'],
          responses: {
            '200': {
              description: 'Tools in the order they are advertised to the model',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      tools: {
                        type: 'array',
                        items: {
                          type: 'object',
                          properties: {
                            name: { type: 'string', example: 'hello_tool' },
                            description: { type: 'string' },
                            parameter: { type: 'string', example: 'name' },
                            defaultArgument: { type: 'string', nullable: true, example: 'World' },
                          },
                        },
                      },
                    },
                  },
                },
              },
            },
          },
        },
      },
      '/api/v1/chat': {
        post: {
          summary: 'Run one conversation turn',
          description:
            'Appends the message to the session transcript, calls the model, runs at most one tool and returns the assistant reply. ' +
            'LLM failures are reported in the body with status "failed"; the session stays usable.',
          tags: ['Chat'],
          requestBody: {
            required: true,
            content: {
              'application/json': {
                schema: {
                  type: 'object',
                  required: ['message'],
                  properties: {
                    message: { type: 'string', example: 'Say hello to Alice' },
                    sessionId: { type: 'string', description: 'Omit to start a new session' },
                  },
                },
              },
            },
          },
          responses: {
            '200': {
              description: 'Turn finished (completed or failed)',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      sessionId: { type: 'string' },
                      status: { type: 'string', enum: ['completed', 'failed'] },
                      reply: { type: 'string', example: 'Hello, Alice! Nice to meet you!' },
                      toolCall: {
                        type: 'object',
                        nullable: true,
                        properties: {
                          name: { type: 'string' },
                          argument: { type: 'string' },
                          output: { type: 'string' },
                        },
                      },
                    },
                  },
                },
              },
            },
            '400': { description: 'Invalid request body', content: { 'application/json': { schema: errorSchema } } },
            '503': { description: 'LLM endpoint not configured', content: { 'application/json': { schema: errorSchema } } },
          },
        },
      },
      '/api/v1/chat/{sessionId}': {
        get: {
          summary: 'Get the session transcript',
          tags: ['Chat'],
          parameters: [sessionIdParam],
          responses: {
            '200': {
              description: 'Messages in turn order',
              content: {
                'application/json': {
                  schema: {
                    type: 'object',
                    properties: {
                      sessionId: { type: 'string' },
                      messages: { type: 'array', items: messageSchema },
                    },
                  },
                },
              },
            },
          },
        },
        delete: {
          summary: 'Clear the session transcript',
          tags: ['Chat'],
          parameters: [sessionIdParam],
          responses: {
            '200': { description: 'Transcript cleared' },
          },
        },
      },
    },
  };
}
