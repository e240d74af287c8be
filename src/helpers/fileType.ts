import path from 'path';
import type { FileCategory } from '../types';

const EXTENSION_GROUPS: [FileCategory, readonly string[]][] = [
  ['video', ['.mp4', '.mov', '.m4v', '.mkv', '.asf', '.avi', '.wmv', '.m2ts', '.3g2', '.flv', '.webm', '.ts']],
  ['image', ['.jpg', '.jpeg', '.png', '.gif', '.webp', '.svg', '.bmp', '.heic']],
  ['audio', ['.mp3', '.wav', '.flac', '.aac', '.ogg', '.m4a']],
  ['document', ['.pdf', '.doc', '.docx', '.txt', '.rtf', '.xls', '.xlsx', '.ppt', '.pptx', '.epub']],
  ['archive', ['.zip', '.rar', '.7z', '.tar', '.gz']],
];

const CATEGORY_BY_EXTENSION = new Map<string, FileCategory>(
  EXTENSION_GROUPS.flatMap(([category, exts]) =>
    exts.map((ext): [string, FileCategory] => [ext, category])),
);

export function classifyFile(name: string): FileCategory {
  const ext = path.extname(name).toLowerCase();
  return CATEGORY_BY_EXTENSION.get(ext) ?? 'other';
}
