import { describe, it, expect, vi, beforeEach, afterEach } from 'vitest';
import type { DocumentIntelligenceConfig } from '../server/config';
import { CircuitBreaker, DOCUMENT_INTELLIGENCE_CIRCUIT } from '../server/services/circuit-breaker';
import { buildTextFromResult, createDocumentIntelligenceClient } from '../server/services/extraction/document-intelligence';
import { TextExtractionError } from '../server/services/extraction/types';

const config: DocumentIntelligenceConfig = {
  endpoint: 'https://docintel.test',
  apiKey: 'test-secret',
  apiVersion: '2024-11-30',
  locale: 'es',
  pollIntervalMs: 0,
  maxPolls: 3,
};

const OPERATION_URL = 'https://docintel.test/operations/op-1';

type FetchInit = { method?: string; headers?: Record<string, string>; body?: unknown };

function accepted(): Response {
  return new Response(null, { status: 202, headers: { 'Operation-Location': OPERATION_URL } });
}

function operation(body: unknown): Response {
  return new Response(JSON.stringify(body), { status: 200, headers: { 'Content-Type': 'application/json' } });
}

describe('Document Intelligence Client', () => {
  const fetchMock = vi.fn<(url: string, init?: FetchInit) => Promise<Response>>();
  let breaker: CircuitBreaker;

  function client() {
    return createDocumentIntelligenceClient(config, { breaker, maxRetries: 1, retryDelayMs: 0, retryJitterMs: 0 });
  }

  beforeEach(() => {
    fetchMock.mockReset();
    vi.stubGlobal('fetch', fetchMock);
    breaker = new CircuitBreaker();
  });

  afterEach(() => {
    vi.unstubAllGlobals();
  });

  it('should submit to prebuilt-read with the locale and join page lines', async () => {
    fetchMock
      .mockResolvedValueOnce(accepted())
      .mockResolvedValueOnce(operation({ status: 'running' }))
      .mockResolvedValueOnce(operation({
        status: 'succeeded',
        analyzeResult: {
          content: 'ignored',
          pages: [
            { pageNumber: 1, lines: [{ content: 'Línea uno' }, { content: '   ' }, { content: 'Línea dos' }] },
            { pageNumber: 2, lines: [{ content: 'Línea tres' }] },
          ],
        },
      }));

    const result = await client()(Buffer.from('%PDF-1.7'));

    expect(result.text).toBe('Línea uno\nLínea dos\nLínea tres\n');
    expect(result.pageCount).toBe(2);
    expect(result.source).toBe('document-intelligence');
    expect(fetchMock).toHaveBeenCalledTimes(3);

    const [submitUrl, submitInit] = fetchMock.mock.calls[0];
    expect(submitUrl).toBe(
      'https://docintel.test/documentintelligence/documentModels/prebuilt-read:analyze?api-version=2024-11-30&locale=es'
    );
    expect(submitInit?.method).toBe('POST');
    expect(submitInit?.headers?.['Ocp-Apim-Subscription-Key']).toBe('test-secret');
    expect(fetchMock.mock.calls[1][0]).toBe(OPERATION_URL);
  });

  it('should fall back to the flat content when no page has lines', async () => {
    fetchMock
      .mockResolvedValueOnce(accepted())
      .mockResolvedValueOnce(operation({ status: 'succeeded', analyzeResult: { content: 'texto plano', pages: [] } }));

    const result = await client()(Buffer.from('x'));
    expect(result.text).toBe('texto plano');
  });

  it('should raise the service message when analysis fails', async () => {
    fetchMock
      .mockResolvedValueOnce(accepted())
      .mockResolvedValueOnce(operation({ status: 'failed', error: { code: 'InvalidContent', message: 'Documento dañado' } }));

    await expect(client()(Buffer.from('x'))).rejects.toThrow(new TextExtractionError('Documento dañado'));
  });

  it('should time out after the poll budget', async () => {
    fetchMock.mockResolvedValueOnce(accepted());
    fetchMock.mockImplementation(async () => operation({ status: 'running' }));

    await expect(client()(Buffer.from('x'))).rejects.toThrow('Document analysis timed out');
    expect(fetchMock).toHaveBeenCalledTimes(1 + config.maxPolls);
  });

  it('should not retry a rejected submission', async () => {
    fetchMock.mockResolvedValueOnce(new Response('bad request', { status: 400 }));

    await expect(client()(Buffer.from('x'))).rejects.toThrow(
      'Document intelligence rejected the document: 400 - bad request'
    );
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });

  it('should retry a submission that hit a server error', async () => {
    fetchMock
      .mockResolvedValueOnce(new Response('busy', { status: 503 }))
      .mockResolvedValueOnce(accepted())
      .mockResolvedValueOnce(operation({ status: 'succeeded', analyzeResult: { content: 'ok' } }));

    const result = await client()(Buffer.from('x'));
    expect(result.text).toBe('ok');
    expect(fetchMock).toHaveBeenCalledTimes(3);
  });

  it('should fail when the service omits Operation-Location', async () => {
    fetchMock.mockResolvedValueOnce(new Response(null, { status: 202 }));

    await expect(client()(Buffer.from('x'))).rejects.toThrow('No Operation-Location header in response');
  });

  it('should reject an unexpected response shape', async () => {
    fetchMock.mockResolvedValueOnce(accepted()).mockResolvedValueOnce(operation({ state: 'done' }));

    await expect(client()(Buffer.from('x'))).rejects.toBeInstanceOf(TextExtractionError);
  });

  it('should stop calling the service once the circuit is open', async () => {
    breaker.configure(DOCUMENT_INTELLIGENCE_CIRCUIT, { failureThreshold: 1, resetTimeout: 60000 });
    fetchMock.mockResolvedValueOnce(new Response('bad request', { status: 400 }));
    const extract = client();

    await expect(extract(Buffer.from('x'))).rejects.toBeInstanceOf(TextExtractionError);
    await expect(extract(Buffer.from('x'))).rejects.toThrow('Circuit breaker document-intelligence is OPEN');
    expect(fetchMock).toHaveBeenCalledTimes(1);
  });
});

describe('buildTextFromResult', () => {
  it('should return an empty string when there is nothing to read', () => {
    expect(buildTextFromResult(undefined)).toBe('');
    expect(buildTextFromResult({ content: '  ', pages: [{ lines: [] }] })).toBe('');
  });
});
