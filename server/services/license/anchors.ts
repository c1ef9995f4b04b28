import type { DateRole } from './types';

export const DATE_ANCHOR_WINDOW = 3;

export const DATE_ANCHORS: Readonly<Record<DateRole, readonly string[]>> = Object.freeze({
  expiry: Object.freeze(['caduc', 'vencim', 'validez', 'hasta']),
  concession: Object.freeze(['conces', 'resoluci', 'emisi', 'otorga']),
  renewal: Object.freeze(['renovac']),
});

export const CASE_REFERENCE_ANCHORS = Object.freeze(['expediente', 'expte', 'exp.']);

/** Field labels that end a value captured on the same line as another label. */
export const BOUNDARY_LABELS = Object.freeze([
  'expediente',
  'expte',
  'titular',
  'nif',
  'cif',
  'nie',
  'domicilio',
  'direcci[oó]n',
  'emplazamiento',
  'actividad',
  'fecha',
  'licencia',
  'resoluci[oó]n',
  'municipio',
]);

export const ACTIVITY_STOP_TOKENS = Object.freeze(['IAE', 'CNAE', 'NIF', 'CIF']);

export const TAX_ID_LABEL = String.raw`(?:N\.?\s?I\.?\s?F|C\.?\s?I\.?\s?F|N\.?\s?I\.?\s?E)\.?`;

export const AUTHORITY_KEYWORDS = Object.freeze(['Ayuntamiento', 'Ajuntament', 'Concello']);
