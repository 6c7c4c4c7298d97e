import { describe, it, expect } from 'vitest';
import express from 'express';
import request from 'supertest';
import { AuthService, JwtTokenService } from '@blogboard/core';
import { createAuthMiddleware, extractBearerToken } from './auth.js';

const tokens = new JwtTokenService({ secret: 'test-secret' });

function createApp(): express.Express {
  const app = express();
  app.use('/private', createAuthMiddleware(new AuthService({ tokens })));
  app.get('/private', (req, res) => {
    res.json({ username: req.username });
  });
  return app;
}

function echoTokenApp(): express.Express {
  const app = express();
  app.get('/token', (req, res) => {
    res.json({ token: extractBearerToken(req) ?? null });
  });
  return app;
}

async function tokenFrom(authorization?: string): Promise<unknown> {
  const req = request(echoTokenApp()).get('/token');
  const res = await (authorization === undefined ? req : req.set('Authorization', authorization));
  return res.body.token;
}

describe('extractBearerToken', () => {
  it('should read the token after the Bearer scheme', async () => {
    expect(await tokenFrom('Bearer abc.def.ghi')).toBe('abc.def.ghi');
  });

  it('should accept the scheme in any case', async () => {
    expect(await tokenFrom('bearer abc')).toBe('abc');
  });

  it('should ignore other schemes', async () => {
    expect(await tokenFrom('Basic dXNlcjpwYXNz')).toBeNull();
  });

  it('should return undefined without a header', async () => {
    expect(await tokenFrom()).toBeNull();
  });
});

describe('createAuthMiddleware', () => {
  it('should expose the token subject as req.username', async () => {
    const token = await tokens.issue('alice');

    const res = await request(createApp()).get('/private').set('Authorization', `Bearer ${token}`);

    expect(res.status).toBe(200);
    expect(res.body).toEqual({ username: 'alice' });
  });

  it('should reject a request without a token', async () => {
    const res = await request(createApp()).get('/private');

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'Missing bearer token' });
  });

  it('should reject a token signed with another secret', async () => {
    const foreign = await new JwtTokenService({ secret: 'other-secret' }).issue('alice');

    const res = await request(createApp()).get('/private').set('Authorization', `Bearer ${foreign}`);

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'Invalid or expired token' });
  });

  it('should reject a garbage token', async () => {
    const res = await request(createApp()).get('/private').set('Authorization', 'Bearer not-a-jwt');

    expect(res.status).toBe(401);
    expect(res.body).toEqual({ error: 'Invalid or expired token' });
  });
});
