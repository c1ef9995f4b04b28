export { classifyPersonalData, MESSAGES } from './detector';
export { DETECTION_RULES } from './rules';
export { passesLuhn } from './luhn';
export type { DetectionRule, PersonalDataCategory, PersonalDataRecord } from './types';
