const principalParam = {
  name: 'principal',
  in: 'path',
  required: true,
  schema: { type: 'string', example: '0x70997970C51812dc3A010C7d01b50e0d17dc79C8' },
  description: 'Account address of the identity holder',
};

const indexParam = {
  name: 'index',
  in: 'path',
  required: true,
  schema: { type: 'integer', minimum: 0 },
  description: 'Credential index (position in issuance order)',
};

const signedRequest = [{ registrySignature: [] }];

function jsonResponse(description: string, schemaRef: string) {
  return {
    description,
    content: { 'application/json': { schema: { $ref: schemaRef } } },
  };
}

function errorResponse(description: string) {
  return jsonResponse(description, '#/components/schemas/Error');
}

function jsonBody(schemaRef: string) {
  return {
    required: true,
    content: { 'application/json': { schema: { $ref: schemaRef } } },
  };
}

export function buildSwaggerSpec(baseUrl: string) {
  return {
    openapi: '3.0.3',
    info: {
      title: 'identity-registry',
      version: '0.1.0',
      description:
        'Self-owned identities, issuer-attached credentials and bounded reputation scores. ' +
        'Write routes require a caller signature; read routes are public.',
    },
    servers: [
      {
        url: baseUrl,
        description: 'API Server',
      },
    ],
    tags: [
      { name: 'Identities' },
      { name: 'Credentials' },
      { name: 'Issuers' },
      { name: 'Registry' },
      { name: 'System' },
    ],
    paths: {
      '/health': {
        get: {
          summary: 'Health check',
          tags: ['System'],
          responses: { '200': { description: 'Server is healthy' } },
        },
      },
      '/api/v1/identities': {
        post: {
          summary: 'Create the caller\'s identity',
          tags: ['Identities'],
          security: signedRequest,
          requestBody: jsonBody('#/components/schemas/ProfileInput'),
          responses: {
            '201': jsonResponse('Identity created', '#/components/schemas/ReceiptResponse'),
            '400': errorResponse('Empty name or email'),
            '401': errorResponse('Caller not authenticated'),
            '409': errorResponse('Identity already exists'),
          },
        },
      },
      '/api/v1/identities/{principal}': {
        get: {
          summary: 'Get an identity',
          tags: ['Identities'],
          parameters: [principalParam],
          responses: {
            '200': jsonResponse('Identity record', '#/components/schemas/IdentityResponse'),
            '404': errorResponse('No identity for this principal'),
          },
        },
        put: {
          summary: 'Update a profile (self only; use "me" for the caller)',
          tags: ['Identities'],
          security: signedRequest,
          parameters: [principalParam],
          requestBody: jsonBody('#/components/schemas/ProfileInput'),
          responses: {
            '200': jsonResponse('Profile updated', '#/components/schemas/ReceiptResponse'),
            '400': errorResponse('Empty name or email'),
            '403': errorResponse('Caller is not the identity owner'),
            '404': errorResponse('No identity for the caller'),
          },
        },
      },
      '/api/v1/identities/{principal}/verification': {
        post: {
          summary: 'Set or clear the verified flag (trusted issuers)',
          tags: ['Identities'],
          security: signedRequest,
          parameters: [principalParam],
          requestBody: jsonBody('#/components/schemas/VerificationInput'),
          responses: {
            '200': jsonResponse('Verification recorded', '#/components/schemas/ReceiptResponse'),
            '403': errorResponse('Caller is not a trusted issuer'),
            '404': errorResponse('No identity for this principal'),
          },
        },
      },
      '/api/v1/identities/{principal}/credentials': {
        get: {
          summary: 'List credentials with current validity',
          tags: ['Credentials'],
          parameters: [principalParam],
          responses: { '200': { description: 'Credential list' } },
        },
        post: {
          summary: 'Issue a credential (trusted issuers)',
          tags: ['Credentials'],
          security: signedRequest,
          parameters: [principalParam],
          requestBody: jsonBody('#/components/schemas/CredentialInput'),
          responses: {
            '201': jsonResponse('Credential added', '#/components/schemas/ReceiptResponse'),
            '400': errorResponse('Empty type/hash or expiration not in the future'),
            '403': errorResponse('Caller is not a trusted issuer'),
            '404': errorResponse('No identity for this principal'),
          },
        },
      },
      '/api/v1/identities/{principal}/credentials/{index}': {
        get: {
          summary: 'Get one credential',
          tags: ['Credentials'],
          parameters: [principalParam, indexParam],
          responses: {
            '200': { description: 'Credential with validity' },
            '404': errorResponse('Index out of range'),
          },
        },
      },
      '/api/v1/identities/{principal}/credentials/{index}/validity': {
        get: {
          summary: 'Is the credential currently valid (not revoked, not expired)',
          tags: ['Credentials'],
          parameters: [principalParam, indexParam],
          responses: { '200': { description: '{ valid: boolean }' } },
        },
      },
      '/api/v1/identities/{principal}/credentials/{index}/revoke': {
        post: {
          summary: 'Revoke a credential (trusted issuers)',
          tags: ['Credentials'],
          security: signedRequest,
          parameters: [principalParam, indexParam],
          responses: {
            '200': jsonResponse('Credential revoked', '#/components/schemas/ReceiptResponse'),
            '403': errorResponse('Caller is not a trusted issuer'),
            '404': errorResponse('Index out of range'),
          },
        },
      },
      '/api/v1/issuers': {
        post: {
          summary: 'Trust an issuer (owner)',
          tags: ['Issuers'],
          security: signedRequest,
          requestBody: jsonBody('#/components/schemas/IssuerInput'),
          responses: {
            '201': jsonResponse('Issuer trusted', '#/components/schemas/ReceiptResponse'),
            '403': errorResponse('Caller is not the owner'),
          },
        },
      },
      '/api/v1/issuers/{principal}': {
        get: {
          summary: 'Is the principal a trusted issuer',
          tags: ['Issuers'],
          parameters: [principalParam],
          responses: { '200': { description: '{ trusted: boolean }' } },
        },
        delete: {
          summary: 'Stop trusting an issuer (owner; the owner itself cannot be removed)',
          tags: ['Issuers'],
          security: signedRequest,
          parameters: [principalParam],
          responses: {
            '200': jsonResponse('Issuer removed', '#/components/schemas/ReceiptResponse'),
            '403': errorResponse('Caller is not the owner, or target is the owner'),
          },
        },
      },
      '/api/v1/stats': {
        get: {
          summary: 'Registry statistics',
          tags: ['Registry'],
          responses: { '200': { description: '{ totalIdentities, owner }' } },
        },
      },
      '/api/v1/events': {
        get: {
          summary: 'Audit log page',
          tags: ['Registry'],
          parameters: [
            { name: 'offset', in: 'query', schema: { type: 'integer', minimum: 0 } },
            { name: 'limit', in: 'query', schema: { type: 'integer', minimum: 1, maximum: 500 } },
          ],
          responses: { '200': { description: '{ events, offset, limit, total }' } },
        },
      },
      '/mcp': {
        post: {
          summary: 'MCP StreamableHTTP endpoint (read-only registry tools)',
          tags: ['System'],
          responses: { '200': { description: 'JSON-RPC response' } },
        },
      },
    },
    components: {
      securitySchemes: {
        registrySignature: {
          type: 'apiKey',
          in: 'header',
          name: 'x-registry-signature',
          description:
            'EIP-191 signature over "identity-registry:<METHOD>:<path>:<timestamp>:<sha256(JSON body)>", ' +
            'sent with x-registry-address and x-registry-timestamp. Each signed request is accepted once.',
        },
      },
      schemas: {
        Error: {
          type: 'object',
          properties: {
            error: {
              type: 'string',
              enum: ['invalid_input', 'not_found', 'index_out_of_range', 'already_exists', 'forbidden', 'unauthorized', 'internal_error'],
            },
            message: { type: 'string' },
          },
        },
        ProfileInput: {
          type: 'object',
          required: ['name', 'email'],
          properties: {
            name: { type: 'string' },
            email: { type: 'string' },
            profileHash: { type: 'string', description: 'Content hash of the off-registry profile payload' },
          },
        },
        VerificationInput: {
          type: 'object',
          required: ['verified'],
          properties: { verified: { type: 'boolean' } },
        },
        CredentialInput: {
          type: 'object',
          required: ['credentialType', 'credentialHash'],
          properties: {
            credentialType: { type: 'string' },
            credentialHash: { type: 'string' },
            expiresAt: { type: 'integer', minimum: 0, description: 'Unix seconds; 0 = never expires' },
          },
        },
        IssuerInput: {
          type: 'object',
          required: ['issuer'],
          properties: { issuer: { type: 'string' } },
        },
        Identity: {
          type: 'object',
          properties: {
            name: { type: 'string' },
            email: { type: 'string' },
            profileHash: { type: 'string' },
            reputationScore: { type: 'integer', minimum: 0, maximum: 1000 },
            isVerified: { type: 'boolean' },
            createdAt: { type: 'integer' },
            lastUpdated: { type: 'integer' },
          },
        },
        IdentityResponse: {
          type: 'object',
          properties: { identity: { $ref: '#/components/schemas/Identity' } },
        },
        ReceiptResponse: {
          type: 'object',
          properties: {
            receipt: {
              type: 'object',
              properties: {
                sequence: { type: 'integer' },
                type: { type: 'string' },
                sender: { type: 'string' },
                timestamp: { type: 'integer' },
                events: { type: 'array', items: { type: 'object' } },
                credentialIndex: { type: 'integer' },
              },
            },
          },
        },
      },
    },
  };
}
