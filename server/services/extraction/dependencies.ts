import type { AppConfig } from '../../config';
import { createDocumentIntelligenceClient } from './document-intelligence';
import { decodePlainText } from './text-decoder';
import { DocumentIntelligenceNotConfiguredError, type ExtractedText } from './types';

export interface ExtractionDependencies {
  extractWithDocumentIntelligence: (content: Uint8Array) => Promise<ExtractedText>;
  isDocumentIntelligenceConfigured: () => boolean;
  decodePlainText: (content: Uint8Array) => string;
}

async function documentIntelligenceUnavailable(): Promise<ExtractedText> {
  throw new DocumentIntelligenceNotConfiguredError();
}

export function createProductionDependencies(config: AppConfig): ExtractionDependencies {
  const documentIntelligence = config.documentIntelligence;
  return {
    extractWithDocumentIntelligence: documentIntelligence
      ? createDocumentIntelligenceClient(documentIntelligence)
      : documentIntelligenceUnavailable,
    isDocumentIntelligenceConfigured: () => documentIntelligence !== null,
    decodePlainText,
  };
}
