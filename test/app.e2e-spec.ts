import { Test, TestingModule } from '@nestjs/testing';
import { INestApplication } from '@nestjs/common';
import request from 'supertest';
import { AxiosError, AxiosHeaders, AxiosRequestConfig, AxiosResponse } from 'axios';
import { AppModule } from '../src/app.module';
import { configureApp } from '../src/main';
import { FetchHttpClient } from '../src/fetch/fetcher/fetch-http.client';
import { BatchResult } from '../src/fetch/models/fetch-outcome.model';

const EXAMPLE_PAGE =
  '<!doctype html><html><head><title>Example Domain</title>' +
  '<style>body { margin: 0 }</style></head><body><div>' +
  '<h1>Example Domain</h1><p>This domain is for use in examples.</p>' +
  '<p><a href="https://example.org/more">More information</a></p></div></body></html>';

function htmlResponse(url: string, status: number, statusText: string, body: string): AxiosResponse {
  return {
    status,
    statusText,
    headers: { 'content-type': 'text/html; charset=UTF-8' },
    config: { url, headers: new AxiosHeaders() },
    data: Buffer.from(body, 'utf-8'),
  };
}

// In-process stand-in for the network
async function fakeGet(url: string, _config?: AxiosRequestConfig): Promise<AxiosResponse> {
  if (url.startsWith('https://down.example.com')) {
    throw new AxiosError('connect ECONNREFUSED 192.0.2.1:443', 'ECONNREFUSED');
  }
  if (url.endsWith('/forbidden')) {
    return htmlResponse(url, 403, 'Forbidden', '<h1>Forbidden</h1>');
  }
  return htmlResponse(url, 200, 'OK', EXAMPLE_PAGE);
}

describe('URL Reader (e2e)', () => {
  let app: INestApplication;
  const get = jest.fn(fakeGet);

  beforeAll(async () => {
    jest.spyOn(console, 'log').mockImplementation(() => undefined);
    jest.spyOn(console, 'debug').mockImplementation(() => undefined);
    jest.spyOn(console, 'warn').mockImplementation(() => undefined);
    jest.spyOn(console, 'error').mockImplementation(() => undefined);

    const moduleFixture: TestingModule = await Test.createTestingModule({
      imports: [AppModule],
    })
      .overrideProvider(FetchHttpClient)
      .useValue({ get })
      .compile();

    app = moduleFixture.createNestApplication();
    configureApp(app);
    await app.init();
  });

  afterAll(async () => {
    await app.close();
    jest.restoreAllMocks();
  });

  beforeEach(() => {
    get.mockClear();
  });

  describe('GET /health', () => {
    it('should report ok', async () => {
      const response = await request(app.getHttpServer()).get('/health').expect(200);

      expect(response.body).toEqual({ status: 'ok' });
    });

    it('should echo a supplied request id', async () => {
      const response = await request(app.getHttpServer())
        .get('/health')
        .set('x-request-id', 'test-request')
        .expect(200);

      expect(response.headers['x-request-id']).toBe('test-request');
    });
  });

  describe('POST /fetch', () => {
    describe('successful batches', () => {
      it('should return page content as markdown by default', async () => {
        const response = await request(app.getHttpServer())
          .post('/fetch')
          .send({ urls: ['https://example.com'], timeout: 15 })
          .expect(200);

        const body: BatchResult = response.body;
        expect(body.total).toBe(1);
        expect(body.concurrency).toBe(1);
        expect(body.elapsed_ms).toEqual(expect.any(Number));
        expect(body.results).toEqual([
          {
            url: 'https://example.com',
            ok: true,
            status_code: 200,
            charset: 'utf-8',
            content:
              '# Example Domain\n\nThis domain is for use in examples.\n\n' +
              '[More information](https://example.org/more)',
            error: null,
            bytes_downloaded: Buffer.byteLength(EXAMPLE_PAGE),
            elapsed_ms: expect.any(Number),
          },
        ]);
      });

      it('should return plain text without markdown markers', async () => {
        const response = await request(app.getHttpServer())
          .post('/fetch')
          .send({ urls: ['https://example.com/a', 'https://example.com/b'], to_markdown: false })
          .expect(200);

        const body: BatchResult = response.body;
        for (const outcome of body.results) {
          expect(outcome.content).toBe(
            'Example Domain\nExample Domain\nThis domain is for use in examples.\nMore information',
          );
          expect(outcome.content).not.toContain('#');
          expect(outcome.content).not.toContain('](');
        }
      });

      it('should report a 403 as a failed item inside a 200 batch', async () => {
        const response = await request(app.getHttpServer())
          .post('/fetch')
          .send({ urls: ['https://example.com/forbidden'] })
          .expect(200);

        const [outcome] = (response.body as BatchResult).results;
        expect(outcome.ok).toBe(false);
        expect(outcome.status_code).toBe(403);
        expect(outcome.content).toBeNull();
        expect(outcome.error).toContain('403');
      });

      it('should keep order and isolate failures across mixed URLs', async () => {
        const urls = [
          'https://down.example.com/',
          'https://example.com/ok',
          'https://example.com/forbidden',
        ];

        const response = await request(app.getHttpServer())
          .post('/fetch')
          .send({ urls, concurrency: 2 })
          .expect(200);

        const body: BatchResult = response.body;
        expect(body.total).toBe(3);
        expect(body.concurrency).toBe(2);
        expect(body.results.map((r) => r.url)).toEqual(urls);
        expect(body.results.map((r) => r.ok)).toEqual([false, true, false]);
        expect(body.results[0].status_code).toBeNull();
        expect(body.results[0].error).toBe('connection-error: connect ECONNREFUSED 192.0.2.1:443');
      });

      it.each([
        ['a URL longer than 2083 characters', `https://example.com/search?q=${'x'.repeat(2100)}`],
        ['a host name with underscores', 'https://my_host.example.com/'],
      ])('should accept %s', async (_name, url) => {
        const response = await request(app.getHttpServer())
          .post('/fetch')
          .send({ urls: [url], to_markdown: false })
          .expect(200);

        const [outcome] = (response.body as BatchResult).results;
        expect(outcome.url).toBe(url);
        expect(outcome.ok).toBe(true);
        expect(get).toHaveBeenCalledWith(url, { signal: expect.any(AbortSignal) });
      });
    });

    describe('validation errors', () => {
      it('should reject 65 URLs before any fetch', async () => {
        const urls = Array.from({ length: 65 }, (_, i) => `https://site${i}.example.com/`);

        await request(app.getHttpServer()).post('/fetch').send({ urls }).expect(400);

        expect(get).not.toHaveBeenCalled();
      });

      it.each([
        ['missing urls', {}],
        ['empty urls', { urls: [] }],
        ['non-array urls', { urls: 'https://example.com' }],
        ['non-string urls', { urls: [123, null] }],
        ['relative url', { urls: ['not-a-valid-url'] }],
        ['unsupported scheme', { urls: ['ftp://example.com/file'] }],
        ['timeout below range', { urls: ['https://example.com'], timeout: 0 }],
        ['timeout above range', { urls: ['https://example.com'], timeout: 61 }],
        ['non-numeric timeout', { urls: ['https://example.com'], timeout: 'soon' }],
        ['zero concurrency', { urls: ['https://example.com'], concurrency: 0 }],
        ['concurrency above range', { urls: ['https://example.com'], concurrency: 65 }],
        ['fractional concurrency', { urls: ['https://example.com'], concurrency: 1.5 }],
        ['non-boolean to_markdown', { urls: ['https://example.com'], to_markdown: 'yes' }],
        ['unknown property', { urls: ['https://example.com'], depth: 2 }],
      ])('should return 400 for %s', async (_name, payload) => {
        await request(app.getHttpServer()).post('/fetch').send(payload).expect(400);

        expect(get).not.toHaveBeenCalled();
      });
    });
  });
});
