/**
 * Bearer Token Authentication Tests
 */

import { describe, it, expect, beforeEach } from '@jest/globals';
import { createSecretKey } from 'crypto';
import express from 'express';
import { SignJWT } from 'jose';
import request from 'supertest';
import { createTokenAuth, requireIdentity, verifyAccessToken } from '../auth/tokenAuth';
import { InMemoryDirectory, makeIdentity } from './fakes';

const SECRET = 'test-secret-value-0123';

async function signToken(subject: string | null, options: { secret?: string; expiresAt?: number } = {}): Promise<string> {
  const jwt = new SignJWT({ scope: 'api' }).setProtectedHeader({ alg: 'HS256' }).setIssuedAt();
  if (subject) jwt.setSubject(subject);
  jwt.setExpirationTime(options.expiresAt ?? Math.floor(Date.now() / 1000) + 3600);
  return await jwt.sign(createSecretKey(Buffer.from(options.secret ?? SECRET, 'utf8')));
}

describe('verifyAccessToken', () => {
  it('returns the subject of a valid token', async () => {
    await expect(verifyAccessToken(await signToken('user-1'), SECRET)).resolves.toBe('user-1');
  });

  it('maps expiry, bad signatures and garbage to distinct messages', async () => {
    const expired = await signToken('user-1', { expiresAt: Math.floor(Date.now() / 1000) - 60 });
    await expect(verifyAccessToken(expired, SECRET)).rejects.toThrow('Token expired');

    const forged = await signToken('user-1', { secret: 'another-test-secret-456' });
    await expect(verifyAccessToken(forged, SECRET)).rejects.toThrow('Invalid token signature');

    await expect(verifyAccessToken('not-a-token', SECRET)).rejects.toThrow('Invalid token');
  });

  it('rejects a token without a subject', async () => {
    await expect(verifyAccessToken(await signToken(null), SECRET)).rejects.toThrow('Invalid token: missing subject');
  });
});

describe('createTokenAuth', () => {
  let app: express.Express;
  let directory: InMemoryDirectory;

  beforeEach(() => {
    directory = new InMemoryDirectory();
    directory.addUser(makeIdentity({ id: 'user-active', role: 'sales_rep' }));
    directory.addUser(makeIdentity({ id: 'user-suspended', status: 'suspended' }));

    app = express();
    app.get('/api/me', createTokenAuth({ secret: SECRET, users: directory }), (req, res) => {
      const identity = requireIdentity(req);
      res.json({ id: identity.id, role: identity.role });
    });
  });

  it('attaches the identity of an active account', async () => {
    const response = await request(app)
      .get('/api/me')
      .set('Authorization', `Bearer ${await signToken('user-active')}`);

    expect(response.status).toBe(200);
    expect(response.body).toEqual({ id: 'user-active', role: 'sales_rep' });
  });

  it('answers 401 without a bearer token', async () => {
    const response = await request(app).get('/api/me');
    expect(response.status).toBe(401);
    expect(response.body).toEqual({ message: 'Authentication required' });
  });

  it('answers 401 for a non-bearer scheme', async () => {
    const response = await request(app).get('/api/me').set('Authorization', 'Basic dXNlcjpwYXNz');
    expect(response.status).toBe(401);
  });

  it('answers 401 for suspended and unknown accounts', async () => {
    const suspended = await request(app)
      .get('/api/me')
      .set('Authorization', `Bearer ${await signToken('user-suspended')}`);
    const unknown = await request(app)
      .get('/api/me')
      .set('Authorization', `Bearer ${await signToken('user-nobody')}`);

    expect(suspended.status).toBe(401);
    expect(unknown.status).toBe(401);
  });

  it('answers 401 for a token signed with another secret', async () => {
    const response = await request(app)
      .get('/api/me')
      .set('Authorization', `Bearer ${await signToken('user-active', { secret: 'another-test-secret-456' })}`);
    expect(response.status).toBe(401);
  });
});
