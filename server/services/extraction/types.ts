export type SupportedExtension = '.docx' | '.pdf' | '.xlsx' | '.txt';

export type TextSource = 'plain-text' | 'document-intelligence';

export interface ExtractedText {
  text: string;
  source: TextSource;
  pageCount: number;
  processingTimeMs: number;
}

export class TextExtractionError extends Error {
  constructor(message: string, options?: { cause?: unknown }) {
    super(message, options);
    this.name = 'TextExtractionError';
  }
}

export class DocumentIntelligenceNotConfiguredError extends Error {
  constructor() {
    super('Document intelligence is not configured');
    this.name = 'DocumentIntelligenceNotConfiguredError';
  }
}
