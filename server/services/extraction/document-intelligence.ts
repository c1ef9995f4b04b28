import { z } from 'zod';
import type { DocumentIntelligenceConfig } from '../../config';
import { documentIntelligenceLogger as logger } from '../../logger';
import { CircuitBreaker, circuitBreaker, DOCUMENT_INTELLIGENCE_CIRCUIT, withRetry } from '../circuit-breaker';
import { TextExtractionError, type ExtractedText } from './types';

const MODEL_ID = 'prebuilt-read';

const analyzeOperationSchema = z.object({
  status: z.enum(['notStarted', 'running', 'succeeded', 'failed', 'canceled']),
  analyzeResult: z
    .object({
      content: z.string().optional(),
      pages: z
        .array(
          z.object({
            pageNumber: z.number().optional(),
            lines: z.array(z.object({ content: z.string() })).optional(),
          })
        )
        .optional(),
    })
    .optional(),
  error: z.object({ code: z.string().optional(), message: z.string() }).optional(),
});

type AnalyzeOperation = z.infer<typeof analyzeOperationSchema>;
type AnalyzeResult = NonNullable<AnalyzeOperation['analyzeResult']>;

export interface DocumentIntelligenceClientOptions {
  breaker?: CircuitBreaker;
  maxRetries?: number;
  retryDelayMs?: number;
  retryJitterMs?: number;
}

class RetryableSubmitError extends Error {}

function sleep(ms: number): Promise<void> {
  return new Promise(resolve => setTimeout(resolve, ms));
}

/** Joins non-blank page lines with '\n'; falls back to the flat content when no line carries text. */
export function buildTextFromResult(result: AnalyzeResult | undefined): string {
  const lines: string[] = [];
  for (const page of result?.pages ?? []) {
    for (const line of page.lines ?? []) {
      if (line.content.trim().length > 0) lines.push(line.content);
    }
  }

  if (lines.length === 0) {
    const content = result?.content ?? '';
    return content.trim().length > 0 ? content : '';
  }

  return lines.map(line => `${line}\n`).join('');
}

export function createDocumentIntelligenceClient(
  config: DocumentIntelligenceConfig,
  options: DocumentIntelligenceClientOptions = {}
): (content: Uint8Array) => Promise<ExtractedText> {
  const breaker = options.breaker ?? circuitBreaker;
  const maxRetries = options.maxRetries ?? 2;
  const retryDelayMs = options.retryDelayMs ?? 1000;
  const retryJitterMs = options.retryJitterMs ?? 500;

  const analyzeUrl =
    `${config.endpoint}/documentintelligence/documentModels/${MODEL_ID}:analyze` +
    `?api-version=${encodeURIComponent(config.apiVersion)}&locale=${encodeURIComponent(config.locale)}`;

  async function submit(content: Uint8Array): Promise<string> {
    const response = await withRetry(
      async () => {
        const res = await fetch(analyzeUrl, {
          method: 'POST',
          headers: {
            'Ocp-Apim-Subscription-Key': config.apiKey,
            'Content-Type': 'application/octet-stream',
          },
          body: content,
        });
        if (res.status === 429 || res.status >= 500) {
          throw new RetryableSubmitError(`Document intelligence returned ${res.status}`);
        }
        return res;
      },
      maxRetries,
      retryDelayMs,
      2,
      retryJitterMs
    );

    if (!response.ok) {
      const errorText = await response.text();
      throw new TextExtractionError(`Document intelligence rejected the document: ${response.status} - ${errorText}`);
    }

    const operationLocation = response.headers.get('Operation-Location');
    if (!operationLocation) {
      throw new TextExtractionError('No Operation-Location header in response');
    }
    return operationLocation;
  }

  async function poll(operationLocation: string): Promise<AnalyzeOperation> {
    for (let i = 0; i < config.maxPolls; i++) {
      await sleep(config.pollIntervalMs);

      const pollResponse = await fetch(operationLocation, {
        method: 'GET',
        headers: { 'Ocp-Apim-Subscription-Key': config.apiKey },
      });

      if (!pollResponse.ok) {
        logger.debug({ status: pollResponse.status, attempt: i + 1 }, 'Poll request not ok, retrying');
        continue;
      }

      const parsed = analyzeOperationSchema.safeParse(await pollResponse.json());
      if (!parsed.success) {
        throw new TextExtractionError('Unexpected analysis response shape', { cause: parsed.error });
      }

      const operation = parsed.data;
      if (operation.status === 'succeeded') return operation;
      if (operation.status === 'failed' || operation.status === 'canceled') {
        throw new TextExtractionError(operation.error?.message || 'Document analysis failed');
      }
    }

    throw new TextExtractionError('Document analysis timed out');
  }

  return async function extractWithDocumentIntelligence(content: Uint8Array): Promise<ExtractedText> {
    const startTime = Date.now();
    logger.info({ modelId: MODEL_ID, locale: config.locale, bufferSize: content.byteLength }, 'Starting document analysis');

    try {
      const operation = await breaker.execute(DOCUMENT_INTELLIGENCE_CIRCUIT, async () => poll(await submit(content)));
      const text = buildTextFromResult(operation.analyzeResult);
      const pageCount = operation.analyzeResult?.pages?.length ?? 0;
      const processingTimeMs = Date.now() - startTime;

      logger.info({ textLength: text.length, pageCount, processingTimeMs }, 'Document analysis complete');
      return { text, source: 'document-intelligence', pageCount, processingTimeMs };
    } catch (error) {
      const message = error instanceof Error ? error.message : String(error);
      logger.error({ error: message, processingTimeMs: Date.now() - startTime }, 'Document analysis failed');
      if (error instanceof TextExtractionError) throw error;
      throw new TextExtractionError(message, { cause: error });
    }
  };
}
