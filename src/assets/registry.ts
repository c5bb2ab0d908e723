import { extname } from 'node:path';
import type { RoleKind } from '../engine/types.js';

export type AssetFormat = 'csv' | 'workbook' | 'legacy-binary' | 'slides' | 'word' | 'pdf' | 'text' | 'code' | 'other';

export type AssetType = {
  fileType: string;
  format: AssetFormat;
  role: RoleKind;
  label: string;
};

const CODE_LANGUAGES: Record<string, string> = {
  py: 'Python',
  js: 'JavaScript',
  ts: 'TypeScript',
  java: 'Java',
  cpp: 'C++',
  c: 'C',
  cs: 'C#',
  go: 'Go',
  rb: 'Ruby',
  php: 'PHP',
  rs: 'Rust',
  sql: 'SQL',
  sh: 'Shell',
  html: 'HTML',
  css: 'CSS'
};

const KNOWN_TYPES: Record<string, Omit<AssetType, 'fileType'>> = {
  csv: { format: 'csv', role: 'spreadsheet', label: 'CSV file' },
  xlsx: { format: 'workbook', role: 'spreadsheet', label: 'Excel workbook' },
  xls: { format: 'legacy-binary', role: 'spreadsheet', label: 'Legacy Excel workbook' },
  pptx: { format: 'slides', role: 'presentation', label: 'PowerPoint deck' },
  ppt: { format: 'legacy-binary', role: 'presentation', label: 'Legacy PowerPoint deck' },
  docx: { format: 'word', role: 'document', label: 'Word document' },
  doc: { format: 'legacy-binary', role: 'document', label: 'Legacy Word document' },
  pdf: { format: 'pdf', role: 'document', label: 'PDF document' },
  txt: { format: 'text', role: 'document', label: 'Text file' },
  md: { format: 'text', role: 'document', label: 'Markdown document' }
};

export function assetTypeFor(path: string): AssetType {
  const fileType = extname(path).slice(1).toLowerCase();
  const known = KNOWN_TYPES[fileType];
  if (known) {
    return { fileType, ...known };
  }
  const language = CODE_LANGUAGES[fileType];
  if (language) {
    return { fileType, format: 'code', role: 'code', label: `${language} source file` };
  }
  return { fileType: fileType || 'unknown', format: 'other', role: 'general', label: 'File' };
}
