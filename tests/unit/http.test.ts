/**
 * HttpClient Unit Tests
 */

import * as https from 'https';
import { AxiosError } from 'axios';
import { HttpAuditEntry, HttpClient } from '../../src/client/HttpClient';
import { ConfigLoader } from '../../src/config';
import { NetworkError, NetworkErrorCode } from '../../src/errors/NetworkError';
import { createLogger } from '../../src/logging/Logger';
import { fakeAdapter, loginResponseXml } from '../helpers/fakeAdapter';

const logger = createLogger({ silent: true });
const loader = new ConfigLoader();

describe('HttpClient', () => {
  describe('post', () => {
    it('should send the XML body to the SOAP endpoint', async () => {
      const fake = fakeAdapter(() => ({ status: 200, body: '<ok/>' }));
      const http = new HttpClient(loader.resolve({ username: 'test-user', password: 'test-secret' }), {
        logger,
        adapter: fake.adapter,
      });

      const response = await http.post('<ping/>');

      expect(fake.requests).toEqual([
        expect.objectContaining({
          method: 'POST',
          url: 'https://sandbox.zuora.example.com/apps/services/a/74.0',
          contentType: 'text/xml',
          body: '<ping/>',
        }),
      ]);
      expect(response).toMatchObject({
        status: 200,
        data: '<ok/>',
        url: 'https://sandbox.zuora.example.com/apps/services/a/74.0',
      });
      expect(response.headers['content-type']).toBe('text/xml; charset=utf-8');
      expect(response.requestId).toMatch(/^zuora-[0-9a-z]+-[0-9a-z]+$/);
    });

    it('should verify TLS certificates by default', async () => {
      const fake = fakeAdapter(() => ({ status: 200, body: '' }));
      const http = new HttpClient(loader.resolve({ username: 'test-user', password: 'test-secret' }), {
        logger,
        adapter: fake.adapter,
      });

      await http.post('<ping/>');

      const agent = fake.requests[0].httpsAgent;
      expect(agent).toBeInstanceOf(https.Agent);
      expect(agent instanceof https.Agent ? agent.options.rejectUnauthorized : undefined).toBe(true);
    });

    it('should pass verifySsl: false to the HTTPS agent', async () => {
      const fake = fakeAdapter(() => ({ status: 200, body: '' }));
      const http = new HttpClient(
        loader.resolve({ username: 'test-user', password: 'test-secret', verifySsl: false }),
        { logger, adapter: fake.adapter }
      );

      await http.post('<ping/>');

      const agent = fake.requests[0].httpsAgent;
      expect(agent).toBeInstanceOf(https.Agent);
      expect(agent instanceof https.Agent ? agent.options.rejectUnauthorized : undefined).toBe(
        false
      );
    });

    it('should return error statuses instead of throwing', async () => {
      const fake = fakeAdapter(() => ({ status: 503, body: 'unavailable' }));
      const http = new HttpClient(loader.resolve({ username: 'test-user', password: 'test-secret' }), {
        logger,
        adapter: fake.adapter,
      });

      await expect(http.post('<ping/>')).resolves.toMatchObject({ status: 503, data: 'unavailable' });
    });

    it('should join a base URL that carries a path', async () => {
      const fake = fakeAdapter(() => ({ status: 200, body: '' }));
      const http = new HttpClient(
        loader.resolve({
          username: 'test-user',
          password: 'test-secret',
          baseUrl: 'https://proxy.example.com/zuora/',
        }),
        { logger, adapter: fake.adapter }
      );

      const response = await http.post('<ping/>');

      expect(response.url).toBe('https://proxy.example.com/zuora/apps/services/a/74.0');
    });

    it('should convert transport failures into NetworkError', async () => {
      const fake = fakeAdapter(() => {
        throw new AxiosError('getaddrinfo ENOTFOUND sandbox.zuora.example.com', 'ENOTFOUND');
      });
      const http = new HttpClient(loader.resolve({ username: 'test-user', password: 'test-secret' }), {
        logger,
        adapter: fake.adapter,
      });

      let caught: unknown;
      try {
        await http.post('<ping/>');
      } catch (error) {
        caught = error;
      }

      expect(caught).toBeInstanceOf(NetworkError);
      expect(caught).toMatchObject({
        networkCode: NetworkErrorCode.DNS_LOOKUP_FAILED,
        message: 'Network error: getaddrinfo ENOTFOUND sandbox.zuora.example.com',
      });
    });

    it('should run request interceptors before sending', async () => {
      const fake = fakeAdapter(() => ({ status: 200, body: '' }));
      const http = new HttpClient(loader.resolve({ username: 'test-user', password: 'test-secret' }), {
        logger,
        adapter: fake.adapter,
      });
      http.addRequestInterceptor((config) => {
        config.headers.set('X-Tenant', 'tenant-1');
        return config;
      });

      await http.post('<ping/>');

      expect(fake.requests[0].headers.get('X-Tenant')).toBe('tenant-1');
    });

    it('should run response interceptors before returning', async () => {
      const fake = fakeAdapter(() => ({ status: 200, body: '<raw/>' }));
      const http = new HttpClient(loader.resolve({ username: 'test-user', password: 'test-secret' }), {
        logger,
        adapter: fake.adapter,
      });
      http.addResponseInterceptor((response) => ({ ...response, data: '<rewritten/>' }));

      await expect(http.post('<ping/>')).resolves.toMatchObject({ data: '<rewritten/>' });
    });
  });

  describe('audit log', () => {
    it('should report each request with credentials redacted', async () => {
      const fake = fakeAdapter(() => ({ status: 200, body: loginResponseXml('test-session-token') }));
      const http = new HttpClient(loader.resolve({ username: 'test-user', password: 'test-secret' }), {
        logger,
        adapter: fake.adapter,
      });
      const entries: HttpAuditEntry[] = [];
      http.setAuditLogCallback((entry) => entries.push(entry));

      await http.post(
        '<ns1:login><ns1:username>test-user</ns1:username><ns1:password>test-secret</ns1:password></ns1:login>'
      );

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        method: 'POST',
        url: 'https://sandbox.zuora.example.com/apps/services/a/74.0',
        success: true,
        body:
          '<ns1:login><ns1:username>test-user</ns1:username><ns1:password>[REDACTED]</ns1:password></ns1:login>',
      });
      expect(entries[0].response?.statusCode).toBe(200);
      expect(entries[0].response?.body).toContain('<ns1:Session>[REDACTED]</ns1:Session>');
      expect(entries[0].response?.body).not.toContain('test-session-token');
    });

    it('should report failed requests', async () => {
      const fake = fakeAdapter(() => {
        throw new AxiosError('timeout of 30000ms exceeded', 'ECONNABORTED');
      });
      const http = new HttpClient(loader.resolve({ username: 'test-user', password: 'test-secret' }), {
        logger,
        adapter: fake.adapter,
      });
      const entries: HttpAuditEntry[] = [];
      http.setAuditLogCallback((entry) => entries.push(entry));

      await expect(http.post('<ping/>')).rejects.toMatchObject({
        networkCode: NetworkErrorCode.TIMEOUT,
      });

      expect(entries).toHaveLength(1);
      expect(entries[0]).toMatchObject({
        success: false,
        error: 'Network error: timeout of 30000ms exceeded',
      });
      expect(entries[0].response).toBeUndefined();
    });

    it('should stay quiet when audit logging is disabled', async () => {
      const fake = fakeAdapter(() => ({ status: 200, body: '' }));
      const http = new HttpClient(
        loader.resolve({ username: 'test-user', password: 'test-secret', enableAuditLog: false }),
        { logger, adapter: fake.adapter }
      );
      const entries: HttpAuditEntry[] = [];
      http.setAuditLogCallback((entry) => entries.push(entry));

      await http.post('<ping/>');

      expect(entries).toHaveLength(0);
    });
  });

  describe('redactSensitiveData', () => {
    const http = new HttpClient(loader.resolve({ username: 'test-user', password: 'test-secret' }), {
      logger,
    });

    it('should redact session headers in envelopes', () => {
      expect(
        http.redactSensitiveData(
          '<ns1:SessionHeader><ns1:session>test-token</ns1:session></ns1:SessionHeader>'
        )
      ).toBe('<ns1:SessionHeader><ns1:session>[REDACTED]</ns1:session></ns1:SessionHeader>');
    });

    it('should redact sensitive headers', () => {
      expect(
        http.redactSensitiveData({ Authorization: 'Bearer test-token', 'Content-Type': 'text/xml' })
      ).toEqual({ Authorization: '[REDACTED]', 'Content-Type': 'text/xml' });
    });
  });
});
