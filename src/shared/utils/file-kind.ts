import path from 'path';
import fileKinds from '../../config/file-kinds.json';
import { JobKind } from '../types';

const KIND_BY_EXTENSION = new Map<string, JobKind>();

const classified: Array<[JobKind, string[]]> = [
  ['image', fileKinds.image],
  ['pdf', fileKinds.pdf],
  ['cad', fileKinds.cad],
  ['office', fileKinds.office],
  ['text', fileKinds.text],
];

for (const [kind, extensions] of classified) {
  for (const extension of extensions) {
    KIND_BY_EXTENSION.set(extension, kind);
  }
}

export function fileExtension(filename: string): string {
  return path.extname(filename).toLowerCase();
}

/** Declared kind for a file name; anything unlisted is `unknown`. */
export function classifyKind(filename: string): JobKind {
  return KIND_BY_EXTENSION.get(fileExtension(filename)) ?? 'unknown';
}
