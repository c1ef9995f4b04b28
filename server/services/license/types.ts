export interface LicenseMetadataRecord {
  readonly caseReference: string | null;
  readonly authority: string | null;
  readonly municipality: string | null;
  readonly holder: string | null;
  readonly taxId: string | null;
  readonly premisesAddress: string | null;
  readonly activity: string | null;
  readonly concessionDate: Date | null;
  readonly expiryDate: Date | null;
  readonly renewalDate: Date | null;
  readonly confidence: number;
  readonly reviewReason: string | null;
  readonly keywordHints: readonly string[];
  readonly summary: string | null;
}

export type DateRole = 'expiry' | 'concession' | 'renewal';

export interface AnchoredDate {
  date: Date | null;
  hints: string[];
}

/**
 * Fields resolved from the document before scoring. `authorityFromDocument`
 * records whether the authority came from the text rather than the caller's hint.
 */
export interface ExtractedLicenseFields {
  caseReference: string | null;
  authority: string | null;
  authorityFromDocument: boolean;
  municipality: string | null;
  holder: string | null;
  taxId: string | null;
  premisesAddress: string | null;
  activity: string | null;
  concessionDate: Date | null;
  expiryDate: Date | null;
  renewalDate: Date | null;
  keywordHints: string[];
}
