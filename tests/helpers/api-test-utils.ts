import { vi } from 'vitest';
import type { Express } from 'express';
import { createApp } from '../../server/app';
import { loadConfig } from '../../server/config';
import type { ExtractionDependencies } from '../../server/services/extraction/dependencies';
import { decodePlainText } from '../../server/services/extraction/text-decoder';
import type { ExtractedText } from '../../server/services/extraction/types';

export function toBase64(text: string, encoding: BufferEncoding = 'utf8'): string {
  return Buffer.from(text, encoding).toString('base64');
}

export function analyzedText(text: string): ExtractedText {
  return { text, source: 'document-intelligence', pageCount: 1, processingTimeMs: 3 };
}

/** In-process stand-in for the document intelligence service. */
export function fakeDependencies(
  text: string,
  overrides: Partial<ExtractionDependencies> = {}
): ExtractionDependencies {
  return {
    extractWithDocumentIntelligence: vi.fn(async (_content: Uint8Array): Promise<ExtractedText> => analyzedText(text)),
    isDocumentIntelligenceConfigured: () => true,
    decodePlainText,
    ...overrides,
  };
}

export function createTestApp(dependencies: ExtractionDependencies, env: NodeJS.ProcessEnv = {}): Express {
  const config = loadConfig({ NODE_ENV: 'test', ...env });
  return createApp({ config, dependencies });
}
