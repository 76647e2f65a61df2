import { extname } from 'node:path';

export const getFileExtension = (path: string) => extname(path).slice(1).toLowerCase();
