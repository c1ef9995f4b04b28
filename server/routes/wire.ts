import type { LicenseMetadataResponse, PersonalDataResponse } from '@shared/schema';
import { formatIsoDate, type LicenseMetadataRecord } from '../services/license';
import type { PersonalDataRecord } from '../services/personal-data';

function isoOrNull(date: Date | null): string | null {
  return date ? formatIsoDate(date) : null;
}

export function toLicenseMetadataResponse(record: LicenseMetadataRecord): LicenseMetadataResponse {
  return {
    expediente: record.caseReference,
    ayuntamiento: record.authority,
    municipio: record.municipality,
    titular: record.holder,
    nifCif: record.taxId,
    direccionLocal: record.premisesAddress,
    actividad: record.activity,
    fechaConcesion: isoOrNull(record.concessionDate),
    fechaCaducidad: isoOrNull(record.expiryDate),
    fechaRenovacion: isoOrNull(record.renewalDate),
    confianzaExtraccion: record.confidence,
    motivoRevision: record.reviewReason,
    palabrasClaveDetectadas: [...record.keywordHints],
    resumen: record.summary,
  };
}

export function toPersonalDataResponse(record: PersonalDataRecord): PersonalDataResponse {
  return {
    fileType: record.fileType,
    containsPersonalData: record.containsPersonalData,
    containsSpecialCategoryData: record.containsSpecialCategoryData,
    score: record.score,
    textLength: record.textLength,
    categoriesDetected: [...record.categoriesDetected],
    indicators: [...record.indicators],
    reviewReason: record.reviewReason,
    summary: record.summary,
  };
}
