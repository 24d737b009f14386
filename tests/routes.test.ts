/**
 * Integration tests for HTTP API routes
 * Tests actual HTTP behavior including request/response handling
 * DNS, HTTP and SMTP are stubbed to avoid network traffic
 */

import request from 'supertest';
import { Application } from 'express';
import { loadConfig } from '../src/config/env';
import { createApp } from '../src/http/server';
import { MAX_BATCH_SIZE } from '../src/http/routes';
import { StubDns, StubHttp, StubSmtpConnector } from './helpers/stubs';

function buildApp(): { app: Application; smtp: StubSmtpConnector } {
  const smtp = new StubSmtpConnector({ 'mx.rejecting.example': { RCPT: '550 5.1.1 user unknown' } });
  const dns = new StubDns({
    'validdomain.example': [{ hostname: 'mx.validdomain.example', priority: 10 }],
    'rejecting.example': [{ hostname: 'mx.rejecting.example', priority: 10 }],
    'nodomain.example': [],
  });
  const http = new StubHttp({ 'https://down.example': 503 });
  const app = createApp({ config: loadConfig({}), dependencies: { dns, http, smtp } });
  return { app, smtp };
}

describe('HTTP API', () => {
  let app: Application;

  beforeEach(() => {
    app = buildApp().app;
  });

  describe('GET /health', () => {
    it('should report status and backends', async () => {
      const response = await request(app).get('/health');

      expect(response.status).toBe(200);
      expect(response.body).toMatchObject({
        status: 'ok',
        service: 'Email Pipeline Validator',
        cache: 'memory',
        smtp: 'enabled',
      });
      expect(typeof response.body.timestamp).toBe('string');
    });
  });

  describe('POST /validate', () => {
    it('should accept a deliverable address', async () => {
      const response = await request(app)
        .post('/validate')
        .send({ email: 'good@validdomain.example', website: 'validdomain.example' });

      expect(response.status).toBe(200);
      expect(response.body).toEqual({
        success: true,
        result: { accepted: true, reason: null, stage: 'smtp', detail: '250 2.1.5 OK' },
      });
    });

    it('should report a syntax failure as a normal result', async () => {
      const response = await request(app).post('/validate').send({ email: 'bad-address' });

      expect(response.status).toBe(200);
      expect(response.body.result).toMatchObject({ accepted: false, reason: 'syntax', stage: 'syntax' });
    });

    it('should report an unreachable website', async () => {
      const response = await request(app)
        .post('/validate')
        .send({ email: 'user@validdomain.example', website: 'down.example' });

      expect(response.body.result).toEqual({
        accepted: false,
        reason: 'website-unreachable',
        stage: 'website',
        detail: 'HTTP 503',
      });
    });

    it('should return 400 without an email', async () => {
      const response = await request(app).post('/validate').send({ website: 'example.com' });

      expect(response.status).toBe(400);
      expect(response.body).toEqual({
        success: false,
        error: 'Invalid request',
        message: 'Request body field "email" is required and must be a string',
      });
    });

    it('should return 400 for malformed JSON', async () => {
      const response = await request(app)
        .post('/validate')
        .set('Content-Type', 'application/json')
        .send('{"email": ');

      expect(response.status).toBe(400);
      expect(response.body.success).toBe(false);
    });
  });

  describe('POST /validate-batch', () => {
    it('should return one result per record in input order', async () => {
      const response = await request(app)
        .post('/validate-batch')
        .send({
          records: [
            { email: 'good@validdomain.example' },
            { email: 'bad-address' },
            { email: 'user@nodomain.example', website: 'nodomain.example' },
            { email: 'nobody@rejecting.example' },
          ],
        });

      expect(response.status).toBe(200);
      expect(response.body.summary).toMatchObject({
        total: 4,
        accepted: 1,
        rejected: 3,
        byReason: { syntax: 1, 'no-mail-exchange': 1, 'mailbox-rejected': 1 },
        cancelled: false,
      });
      expect(response.body.results).toMatchObject([
        { email: 'good@validdomain.example', website: null, accepted: true, reason: null },
        { email: 'bad-address', website: null, accepted: false, reason: 'syntax' },
        { email: 'user@nodomain.example', website: 'nodomain.example', accepted: false, reason: 'no-mail-exchange' },
        { email: 'nobody@rejecting.example', website: null, accepted: false, reason: 'mailbox-rejected' },
      ]);
    });

    it('should require a records array', async () => {
      const response = await request(app).post('/validate-batch').send({ records: 'nope' });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Field "records" is required and must be an array');
    });

    it('should refuse an empty batch', async () => {
      const response = await request(app).post('/validate-batch').send({ records: [] });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Field "records" cannot be empty');
    });

    it('should name the first bad record', async () => {
      const response = await request(app)
        .post('/validate-batch')
        .send({ records: [{ email: 'a@validdomain.example' }, { email: 42 }] });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('records[1]: field "email" is required and must be a string');
    });

    it('should refuse batches over the limit', async () => {
      const records = Array.from({ length: MAX_BATCH_SIZE + 1 }, () => ({ email: 'a@validdomain.example' }));

      const response = await request(app).post('/validate-batch').send({ records });

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Maximum 1000 records allowed per batch. Received 1001.');
    });
  });

  describe('POST /upload-csv', () => {
    it('should split an uploaded CSV into pass and fail documents', async () => {
      const csv = 'Email,Web Address\ngood@validdomain.example,validdomain.example\nbad-address,\n';

      const response = await request(app).post('/upload-csv').attach('csv', Buffer.from(csv), 'contacts.csv');

      expect(response.status).toBe(200);
      expect(response.body.summary).toMatchObject({ total: 2, accepted: 1, rejected: 1 });
      expect(response.body.passCsv).toBe('Email,Web Address\r\ngood@validdomain.example,validdomain.example\r\n');
      expect(response.body.failCsv).toBe('Email,Web Address,Reason\r\nbad-address,,syntax\r\n');
    });

    it('should return 400 when no file is uploaded', async () => {
      const response = await request(app).post('/upload-csv');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('No file uploaded');
    });

    it('should return 400 for a header-only file', async () => {
      const response = await request(app)
        .post('/upload-csv')
        .attach('csv', Buffer.from('Email,Web Address\n'), 'contacts.csv');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('No records found');
    });

    it('should return 400 for a file without an email column', async () => {
      const response = await request(app)
        .post('/upload-csv')
        .attach('csv', Buffer.from('Name,Website\nAda,example.com\n'), 'contacts.csv');

      expect(response.status).toBe(400);
      expect(response.body.error).toBe('Invalid file');
    });

    it('should refuse other file types', async () => {
      const response = await request(app)
        .post('/upload-csv')
        .attach('csv', Buffer.from('hello'), 'notes.txt');

      expect(response.status).toBe(400);
      expect(response.body.message).toBe('Only CSV and Excel files (.csv, .xls, .xlsx) are allowed');
    });
  });

  describe('unknown routes', () => {
    it('should return a JSON 404', async () => {
      const response = await request(app).get('/nope');

      expect(response.status).toBe(404);
      expect(response.body).toEqual({
        success: false,
        error: 'Not Found',
        message: 'The requested endpoint does not exist',
      });
    });
  });
});
