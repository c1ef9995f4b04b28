import path from 'path';
import type { SupportedExtension } from './types';

export const SUPPORTED_EXTENSIONS: readonly SupportedExtension[] = Object.freeze(['.docx', '.pdf', '.xlsx', '.txt']);

export function isSupportedExtension(extension: string): extension is SupportedExtension {
  return SUPPORTED_EXTENSIONS.some(supported => supported === extension);
}

/** Lower-cased extension of a file name including the dot, or '' when there is none. */
export function fileExtension(fileName: string): string {
  return path.extname(fileName.trim()).toLowerCase();
}

export function isPlainText(extension: SupportedExtension): boolean {
  return extension === '.txt';
}
