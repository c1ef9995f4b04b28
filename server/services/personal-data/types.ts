export type PersonalDataCategory =
  | 'Identificativo'
  | 'Contacto'
  | 'Direcciones'
  | 'Financiero'
  | 'Especial';

export interface DetectionRule {
  readonly category: PersonalDataCategory;
  readonly pattern: RegExp;
  readonly weight: number;
  readonly isSpecialCategory: boolean;
}

export interface PersonalDataRecord {
  readonly fileType: string;
  readonly containsPersonalData: boolean;
  readonly containsSpecialCategoryData: boolean;
  readonly score: number;
  readonly textLength: number;
  readonly categoriesDetected: readonly PersonalDataCategory[];
  readonly indicators: readonly string[];
  readonly reviewReason: string | null;
  readonly summary: string;
}
